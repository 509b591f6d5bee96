import { JobNotFoundError } from './errors';
import { DEFAULT_RETENTION_SECONDS, type JobStore } from './job-store';
import type { Job, JobResult } from './types';

type Entry<T> = {
  value: T;
  expiresAtMs: number;
};

export type MemoryJobStoreOptions = {
  retentionSeconds?: number;
  /** Clock used for passive expiry; tests move it forward instead of sleeping. */
  now?: () => number;
};

/**
 * In-process JobStore with the same expiry semantics as the Redis store. Values are cloned on the
 * way in and out so callers never share references with the stored copy.
 */
export class MemoryJobStore implements JobStore {
  readonly retentionSeconds: number;
  private readonly now: () => number;
  private readonly jobs = new Map<string, Entry<Job>>();
  private readonly results = new Map<string, Entry<JobResult>>();
  private readonly claims = new Map<string, Entry<true>>();
  private readonly index = new Map<string, number>();

  constructor(options: MemoryJobStoreOptions = {}) {
    this.retentionSeconds = options.retentionSeconds ?? DEFAULT_RETENTION_SECONDS;
    this.now = options.now ?? Date.now;
  }

  async put(job: Job): Promise<void> {
    this.jobs.set(job.id, this.entry(job));
  }

  async replace(job: Job): Promise<boolean> {
    if (this.read(this.jobs, job.id) === null) {
      return false;
    }
    this.jobs.set(job.id, this.entry(job));
    return true;
  }

  async claim(id: string): Promise<boolean> {
    if (this.read(this.claims, id) !== null) {
      return false;
    }
    this.claims.set(id, this.entry(true));
    return true;
  }

  async get(id: string): Promise<Job | null> {
    return this.read(this.jobs, id);
  }

  async putResult(id: string, result: JobResult): Promise<void> {
    if (this.read(this.jobs, id) === null) {
      throw new JobNotFoundError(id);
    }
    this.results.set(id, this.entry(result));
  }

  async getResult(id: string): Promise<JobResult | null> {
    return this.read(this.results, id);
  }

  async deleteResult(id: string): Promise<void> {
    this.results.delete(id);
  }

  async indexAdd(id: string, timestampMs: number): Promise<void> {
    this.index.set(id, timestampMs);
  }

  async sweepExpired(nowMs: number): Promise<number> {
    const cutoff = nowMs - this.retentionSeconds * 1000;
    let count = 0;

    for (const [id, createdAtMs] of this.index.entries()) {
      if (createdAtMs > cutoff) {
        continue;
      }
      this.jobs.delete(id);
      this.results.delete(id);
      this.claims.delete(id);
      this.index.delete(id);
      count += 1;
    }

    return count;
  }

  async delete(id: string): Promise<boolean> {
    const hadJob = this.read(this.jobs, id) !== null;
    const hadResult = this.read(this.results, id) !== null;
    this.jobs.delete(id);
    this.results.delete(id);
    this.claims.delete(id);
    this.index.delete(id);
    return hadJob || hadResult;
  }

  async close(): Promise<void> {
    this.jobs.clear();
    this.results.clear();
    this.claims.clear();
    this.index.clear();
  }

  private entry<T>(value: T): Entry<T> {
    return {
      value: structuredClone(value),
      expiresAtMs: this.now() + this.retentionSeconds * 1000,
    };
  }

  private read<T>(map: Map<string, Entry<T>>, id: string): T | null {
    const entry = map.get(id);
    if (!entry) {
      return null;
    }

    if (this.now() >= entry.expiresAtMs) {
      map.delete(id);
      return null;
    }

    return structuredClone(entry.value);
  }
}
