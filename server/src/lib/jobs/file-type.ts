import { extname } from 'node:path';
import { FILE_CATEGORIES, type FileCategory } from './types';

const EXTENSION_CATEGORIES = new Map<string, FileCategory>([
  ['.png', 'image'],
  ['.jpg', 'image'],
  ['.jpeg', 'image'],
  ['.pdf', 'pdf'],
  ['.pptx', 'slide-deck'],
  ['.ppt', 'slide-deck'],
]);

export function resolveFileCategory(fileName: string): FileCategory | null {
  const extension = extname(fileName).toLowerCase();
  return EXTENSION_CATEGORIES.get(extension) ?? null;
}

export function isFileCategory(value: unknown): value is FileCategory {
  return typeof value === 'string' && FILE_CATEGORIES.some((entry) => entry === value);
}

export function getSupportedExtensions(category?: FileCategory): string[] {
  return Array.from(EXTENSION_CATEGORIES.entries())
    .filter(([, mapped]) => !category || mapped === category)
    .map(([extension]) => extension);
}
