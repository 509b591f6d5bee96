import { randomUUID } from 'node:crypto';
import { basename, join } from 'node:path';
import fs from 'fs-extra';
import { getUploadDir } from './env';
import { UnsupportedFileTypeError } from './jobs/errors';
import { getSupportedExtensions, resolveFileCategory } from './jobs/file-type';
import type { FileCategory } from './jobs/types';

export interface StoredUpload {
  originalName: string;
  storedName: string;
  storedPath: string;
  sizeBytes: number;
  mimeType: string;
  category: FileCategory;
  uploadedAt: string;
}

/** The parts of a multipart `File` entry that uploads rely on. */
export type UploadedFile = {
  name: string;
  type: string;
  arrayBuffer(): Promise<ArrayBuffer>;
};

export function sanitizeFileName(filename: string): string {
  const withoutPath = basename(filename);
  const sanitized = withoutPath.replace(/[^a-zA-Z0-9._-]/g, '_');
  return sanitized || 'file';
}

export function getAllowedUploadExtensions(category?: FileCategory): string[] {
  return getSupportedExtensions(category);
}

/**
 * Validates and writes one uploaded file to `UPLOAD_DIR`. With `expectedCategory`, the file
 * extension must map to that category.
 */
export async function saveUploadedFile(file: UploadedFile, expectedCategory?: FileCategory): Promise<StoredUpload> {
  const originalName = file.name.trim();
  if (!originalName) {
    throw new UnsupportedFileTypeError('unknown', 'File name is required');
  }

  const category = resolveFileCategory(originalName);
  if (!category) {
    throw new UnsupportedFileTypeError(
      originalName,
      `Unsupported file type for ${originalName}. Allowed: ${getAllowedUploadExtensions().join(', ')}`
    );
  }

  if (expectedCategory && category !== expectedCategory) {
    throw new UnsupportedFileTypeError(
      originalName,
      `Invalid file type for ${expectedCategory}. Allowed: ${getAllowedUploadExtensions(expectedCategory).join(', ')}`
    );
  }

  const arrayBuffer = await file.arrayBuffer();
  const sizeBytes = arrayBuffer.byteLength;
  if (sizeBytes === 0) {
    throw new UnsupportedFileTypeError(originalName, 'File is empty');
  }

  const uploadDir = getUploadDir();
  await fs.ensureDir(uploadDir);

  const storedName = `${randomUUID()}-${sanitizeFileName(originalName)}`;
  const storedPath = join(uploadDir, storedName);
  await fs.writeFile(storedPath, Buffer.from(arrayBuffer));

  return {
    originalName,
    storedName,
    storedPath,
    sizeBytes,
    mimeType: file.type || 'application/octet-stream',
    category,
    uploadedAt: new Date().toISOString(),
  };
}
