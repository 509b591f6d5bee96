import { basename, join } from 'node:path';
import fs from 'fs-extra';
import { getExtractionServiceTimeoutMs, getExtractionServiceUrl } from '../env';
import { toErrorMessage } from './errors';
import type { FileCategory } from './types';

export type ExtractedImagePayload = {
  name: string;
  data: string;
};

export type ExtractionServicePayload = {
  texts: string[];
  tables: string[];
  images: ExtractedImagePayload[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function buildUrl(path: string): string {
  const baseUrl = getExtractionServiceUrl().replace(/\/+$/, '');
  return `${baseUrl}${path}`;
}

async function parseJsonResponse(response: Response): Promise<unknown> {
  const payload: unknown = await response.json().catch(() => ({}));
  if (!response.ok) {
    const bodyError =
      isRecord(payload) && typeof payload.error === 'string'
        ? payload.error
        : `HTTP ${response.status} ${response.statusText}`;
    throw new Error(bodyError);
  }

  return payload;
}

function readStringArray(value: unknown, field: string): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((entry) => typeof entry === 'string')) {
    throw new Error(`Extraction response field "${field}" must be an array of strings`);
  }
  return value;
}

function readImages(value: unknown): ExtractedImagePayload[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error('Extraction response field "images" must be an array');
  }

  const images: ExtractedImagePayload[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.data !== 'string') {
      throw new Error('Extraction response contains a malformed image entry');
    }
    images.push({ name: entry.name, data: entry.data });
  }
  return images;
}

export function normalizeExtractionPayload(payload: unknown): ExtractionServicePayload {
  if (!isRecord(payload)) {
    throw new Error('Extraction response was not a JSON object');
  }

  return {
    texts: readStringArray(payload.texts, 'texts'),
    tables: readStringArray(payload.tables, 'tables'),
    images: readImages(payload.images),
  };
}

/**
 * Image names come from a remote service, so only their base name is kept and anything outside
 * `[a-zA-Z0-9._-]` is replaced before the file is written into `imageOutputDir`.
 */
export function sanitizeImageName(name: string): string {
  const sanitized = basename(name).replace(/[^a-zA-Z0-9._-]/g, '_');
  return sanitized && sanitized !== '.' && sanitized !== '..' ? sanitized : 'image';
}

export async function writeExtractedImages(
  images: ExtractedImagePayload[],
  imageOutputDir: string
): Promise<string[]> {
  if (images.length === 0) {
    return [];
  }

  await fs.ensureDir(imageOutputDir);
  const written: string[] = [];
  for (const image of images) {
    const target = join(imageOutputDir, sanitizeImageName(image.name));
    await fs.writeFile(target, Buffer.from(image.data, 'base64'));
    written.push(target);
  }
  return written;
}

export async function requestExtraction(
  category: FileCategory,
  filePath: string
): Promise<ExtractionServicePayload> {
  const timeoutMs = getExtractionServiceTimeoutMs();

  try {
    const content = await fs.readFile(filePath);
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(content)]), basename(filePath));

    const response = await fetch(buildUrl(`/extract/${category}`), {
      method: 'POST',
      body: form,
      ...(timeoutMs > 0 ? { signal: AbortSignal.timeout(timeoutMs) } : {}),
    });

    return normalizeExtractionPayload(await parseJsonResponse(response));
  } catch (error) {
    throw new Error(`Extraction service request failed: ${toErrorMessage(error, 'Unknown extraction service error')}`);
  }
}
