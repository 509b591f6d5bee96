import { randomUUID } from 'node:crypto';
import type { BackgroundRunner } from './background-runner';
import type { JobDispatcher } from './dispatcher';
import {
  JobFailedError,
  JobNotFoundError,
  JobNotReadyError,
  JobStoreError,
  UnsupportedFileTypeError,
  toErrorMessage,
} from './errors';
import { resolveFileCategory } from './file-type';
import { applyJobUpdate } from './job-state';
import type { JobStore } from './job-store';
import type { DispatchOptions, FileCategory, Job, JobResult } from './types';

const MAX_ID_ATTEMPTS = 5;

export type JobServiceOptions = {
  store: JobStore;
  dispatcher: Pick<JobDispatcher, 'dispatch'>;
  runner: BackgroundRunner;
  now?: () => Date;
  generateId?: () => string;
};

/**
 * Front door of the job engine. Creation, polling and cleanup never wait on extraction; the only
 * link to a running dispatch is the shared store.
 */
export class JobService {
  private readonly store: JobStore;
  private readonly dispatcher: Pick<JobDispatcher, 'dispatch'>;
  private readonly runner: BackgroundRunner;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: JobServiceOptions) {
    this.store = options.store;
    this.dispatcher = options.dispatcher;
    this.runner = options.runner;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Persists a `pending` job. `category` may be `'auto'`, in which case it is resolved from the
   * file name and an unknown extension is rejected as a client error.
   */
  async create(fileName: string, category: FileCategory | 'auto' = 'auto'): Promise<Job> {
    const resolved = category === 'auto' ? resolveFileCategory(fileName) : category;
    if (!resolved) {
      throw new UnsupportedFileTypeError(fileName);
    }

    const id = await this.allocateId();
    const createdAt = this.now();
    const job: Job = {
      id,
      fileName,
      category: resolved,
      status: 'pending',
      progress: 0,
      createdAt: createdAt.toISOString(),
      updatedAt: createdAt.toISOString(),
    };

    await this.store.put(job);
    await this.store.indexAdd(id, createdAt.getTime());
    console.log(`[jobs] Created job ${id} fileName="${fileName}" category=${resolved}`);
    return job;
  }

  /** Hands the job to the background runner and returns immediately. */
  schedule(job: Job, filePath: string, options: DispatchOptions = { outputFormat: 'json' }): void {
    const accepted = this.runner.submit(`dispatch:${job.id}`, () =>
      this.dispatcher.dispatch(job.id, filePath, options)
    );

    if (!accepted) {
      void this.rejectUnscheduled(job.id);
    }
  }

  async status(id: string): Promise<Job> {
    const job = await this.store.get(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }

  async result(id: string): Promise<JobResult> {
    const job = await this.status(id);

    if (job.status === 'failed') {
      throw new JobFailedError(id, job.message || 'Unknown error');
    }

    if (job.status !== 'completed') {
      throw new JobNotReadyError(id, job.status, job.progress);
    }

    const result = await this.store.getResult(id);
    if (!result) {
      throw new JobStoreError(`Job ${id} is completed but its result is missing`);
    }
    return result;
  }

  async cleanup(): Promise<number> {
    const removed = await this.store.sweepExpired(this.now().getTime());
    console.log(`[jobs] Cleaned up ${removed} old job(s)`);
    return removed;
  }

  /** Removes stored data only; a dispatch already running is not interrupted. */
  async delete(id: string): Promise<void> {
    const removed = await this.store.delete(id);
    if (!removed) {
      throw new JobNotFoundError(id);
    }
    console.log(`[jobs] Deleted job ${id}`);
  }

  private async allocateId(): Promise<string> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt += 1) {
      const id = this.generateId();
      if ((await this.store.get(id)) === null) {
        return id;
      }
    }
    throw new JobStoreError(`Could not allocate a unique job id after ${MAX_ID_ATTEMPTS} attempts`);
  }

  private async rejectUnscheduled(id: string): Promise<void> {
    try {
      const job = await this.store.get(id);
      if (!job || job.status !== 'pending') {
        return;
      }
      await this.store.replace(
        applyJobUpdate(job, { status: 'failed', message: 'Processing failed: the service is shutting down' }, this.now())
      );
      console.warn(`[jobs] Job ${id} was not scheduled because the runner is shutting down`);
    } catch (error) {
      console.error(`[jobs] Failed to mark unscheduled job ${id} as failed: ${toErrorMessage(error)}`);
    }
  }
}
