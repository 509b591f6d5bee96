import { JobStoreError } from './errors';
import { isFileCategory } from './file-type';
import {
  isJobStatus,
  isOutputFormat,
  type FragmentSource,
  type ImageReference,
  type Job,
  type JobResult,
  type TableFragment,
  type TextFragment,
} from './types';

export const DEFAULT_RETENTION_SECONDS = 60 * 60 * 24;
export const DEFAULT_KEY_PREFIX = 'extract';

/**
 * Persistence for job metadata and results. Every write expires after the retention window,
 * and a time-ordered index of job ids backs `sweepExpired`.
 */
export interface JobStore {
  readonly retentionSeconds: number;
  put(job: Job): Promise<void>;
  /** Overwrites an existing job only; returns false when the record is gone. */
  replace(job: Job): Promise<boolean>;
  get(id: string): Promise<Job | null>;
  /** Marks the job as taken by a dispatcher. Only the first caller gets true. */
  claim(id: string): Promise<boolean>;
  /** Throws JobNotFoundError when the owning job record is gone. */
  putResult(id: string, result: JobResult): Promise<void>;
  getResult(id: string): Promise<JobResult | null>;
  deleteResult(id: string): Promise<void>;
  indexAdd(id: string, timestampMs: number): Promise<void>;
  /** Removes every indexed job created at or before `nowMs - retention`; returns how many. */
  sweepExpired(nowMs: number): Promise<number>;
  /** Returns false when neither a job nor a result existed for `id`. */
  delete(id: string): Promise<boolean>;
  close(): Promise<void>;
}

export function jobKey(prefix: string, id: string): string {
  return `${prefix}:job:${id}`;
}

export function resultKey(prefix: string, id: string): string {
  return `${prefix}:result:${id}`;
}

export function claimKey(prefix: string, id: string): string {
  return `${prefix}:claim:${id}`;
}

export function jobIndexKey(prefix: string): string {
  return `${prefix}:jobs`;
}

type UnknownRecord = Record<string, unknown>;

const FRAGMENT_SOURCES: readonly FragmentSource[] = ['image', 'text', 'ocr', 'pdf', 'page', 'slide'];

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFragmentSource(value: unknown): value is FragmentSource {
  return typeof value === 'string' && FRAGMENT_SOURCES.some((entry) => entry === value);
}

function readPageNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

function parseJson(raw: string, what: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'invalid JSON';
    throw new JobStoreError(`Stored ${what} is not valid JSON: ${reason}`);
  }
}

export function parseJobRecord(raw: string): Job {
  const value = parseJson(raw, 'job');
  if (!isRecord(value)) {
    throw new JobStoreError('Stored job is not an object');
  }

  const { id, fileName, category, status, progress, message, createdAt, updatedAt } = value;
  if (
    typeof id !== 'string' ||
    typeof fileName !== 'string' ||
    !isFileCategory(category) ||
    !isJobStatus(status) ||
    typeof createdAt !== 'string' ||
    typeof updatedAt !== 'string'
  ) {
    throw new JobStoreError('Stored job is missing required fields');
  }

  return {
    id,
    fileName,
    category,
    status,
    progress: typeof progress === 'number' && Number.isFinite(progress) ? progress : 0,
    ...(typeof message === 'string' ? { message } : {}),
    createdAt,
    updatedAt,
  };
}

function parseFragments<T>(
  value: unknown,
  field: string,
  build: (entry: UnknownRecord, source: FragmentSource, pageNumber: number | null) => T | null
): T[] {
  if (!Array.isArray(value)) {
    throw new JobStoreError(`Stored result is missing "${field}"`);
  }

  const fragments: T[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || !isFragmentSource(entry.source)) {
      throw new JobStoreError(`Stored result has a malformed "${field}" entry`);
    }
    const fragment = build(entry, entry.source, readPageNumber(entry.pageNumber));
    if (fragment === null) {
      throw new JobStoreError(`Stored result has a malformed "${field}" entry`);
    }
    fragments.push(fragment);
  }
  return fragments;
}

export function parseJobResultRecord(raw: string): JobResult {
  const value = parseJson(raw, 'result');
  if (!isRecord(value)) {
    throw new JobStoreError('Stored result is not an object');
  }

  const { jobId, fileName, category, outputFiles, metadata } = value;
  if (typeof jobId !== 'string' || typeof fileName !== 'string' || !isFileCategory(category)) {
    throw new JobStoreError('Stored result is missing required fields');
  }

  const texts = parseFragments<TextFragment>(value.texts, 'texts', (entry, source, pageNumber) =>
    typeof entry.text === 'string' ? { text: entry.text, source, pageNumber } : null
  );
  const tables = parseFragments<TableFragment>(value.tables, 'tables', (entry, source, pageNumber) =>
    typeof entry.html === 'string' ? { html: entry.html, source, pageNumber } : null
  );
  const images = parseFragments<ImageReference>(value.images, 'images', (entry, source, pageNumber) =>
    typeof entry.path === 'string' ? { path: entry.path, source, pageNumber } : null
  );

  const files: Record<string, string> = {};
  if (isRecord(outputFiles)) {
    for (const [name, path] of Object.entries(outputFiles)) {
      if (typeof path === 'string') {
        files[name] = path;
      }
    }
  }

  const outputFormat = isRecord(metadata) && isOutputFormat(metadata.outputFormat) ? metadata.outputFormat : 'json';
  const outputDirectory =
    isRecord(metadata) && typeof metadata.outputDirectory === 'string' ? metadata.outputDirectory : null;

  return {
    jobId,
    fileName,
    category,
    texts,
    tables,
    images,
    outputFiles: files,
    metadata: { outputFormat, outputDirectory },
  };
}
