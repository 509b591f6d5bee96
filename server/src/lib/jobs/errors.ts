import type { JobStatus } from './types';

export type JobErrorCode =
  | 'unsupported_file_type'
  | 'job_not_found'
  | 'job_not_ready'
  | 'job_failed'
  | 'invalid_transition'
  | 'store_error';

export type JobErrorHttpStatus = 202 | 400 | 404 | 409 | 500;

/**
 * Base class for every error the job engine raises on purpose. `httpStatus` is what the API layer
 * answers with; anything that is not a JobServiceError is treated as an internal fault.
 */
export class JobServiceError extends Error {
  readonly code: JobErrorCode;
  readonly httpStatus: JobErrorHttpStatus;

  constructor(code: JobErrorCode, httpStatus: JobErrorHttpStatus, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
  }
}

export class UnsupportedFileTypeError extends JobServiceError {
  readonly fileName: string;

  constructor(fileName: string, reason?: string) {
    super('unsupported_file_type', 400, reason ?? `Unsupported file type for ${fileName}`);
    this.fileName = fileName;
  }
}

export class JobNotFoundError extends JobServiceError {
  readonly jobId: string;

  constructor(jobId: string) {
    super('job_not_found', 404, `Job ${jobId} not found`);
    this.jobId = jobId;
  }
}

export class JobNotReadyError extends JobServiceError {
  readonly jobId: string;
  readonly status: JobStatus;
  readonly progress: number;

  constructor(jobId: string, status: JobStatus, progress: number) {
    super('job_not_ready', 202, `Job ${jobId} is still ${status}. Current progress: ${progress}%`);
    this.jobId = jobId;
    this.status = status;
    this.progress = progress;
  }
}

export class JobFailedError extends JobServiceError {
  readonly jobId: string;
  readonly failureMessage: string;

  constructor(jobId: string, failureMessage: string) {
    super('job_failed', 409, `Job ${jobId} failed: ${failureMessage}`);
    this.jobId = jobId;
    this.failureMessage = failureMessage;
  }
}

export class InvalidJobTransitionError extends JobServiceError {
  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super('invalid_transition', 409, `Job ${jobId} cannot move from ${from} to ${to}`);
  }
}

export class JobStoreError extends JobServiceError {
  constructor(message: string) {
    super('store_error', 500, message);
  }
}

export function toErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  return typeof error === 'string' && error ? error : fallback;
}
