import type { Redis } from 'ioredis';
import { JobNotFoundError } from './errors';
import {
  DEFAULT_KEY_PREFIX,
  DEFAULT_RETENTION_SECONDS,
  claimKey,
  jobIndexKey,
  jobKey,
  parseJobRecord,
  parseJobResultRecord,
  resultKey,
  type JobStore,
} from './job-store';
import type { Job, JobResult } from './types';

export type RedisClient = Pick<Redis, 'get' | 'set' | 'exists' | 'del' | 'zadd' | 'zrangebyscore' | 'zrem' | 'quit'>;

export type RedisJobStoreOptions = {
  retentionSeconds?: number;
  keyPrefix?: string;
};

export class RedisJobStore implements JobStore {
  readonly retentionSeconds: number;
  private readonly prefix: string;

  constructor(
    private readonly redis: RedisClient,
    options: RedisJobStoreOptions = {}
  ) {
    this.retentionSeconds = options.retentionSeconds ?? DEFAULT_RETENTION_SECONDS;
    this.prefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  async put(job: Job): Promise<void> {
    await this.redis.set(jobKey(this.prefix, job.id), JSON.stringify(job), 'EX', this.retentionSeconds);
  }

  async replace(job: Job): Promise<boolean> {
    const reply = await this.redis.set(jobKey(this.prefix, job.id), JSON.stringify(job), 'EX', this.retentionSeconds, 'XX');
    return reply === 'OK';
  }

  async claim(id: string): Promise<boolean> {
    const reply = await this.redis.set(claimKey(this.prefix, id), '1', 'EX', this.retentionSeconds, 'NX');
    return reply === 'OK';
  }

  async get(id: string): Promise<Job | null> {
    const raw = await this.redis.get(jobKey(this.prefix, id));
    return raw === null ? null : parseJobRecord(raw);
  }

  async putResult(id: string, result: JobResult): Promise<void> {
    const jobExists = await this.redis.exists(jobKey(this.prefix, id));
    if (jobExists === 0) {
      throw new JobNotFoundError(id);
    }

    await this.redis.set(resultKey(this.prefix, id), JSON.stringify(result), 'EX', this.retentionSeconds);
  }

  async getResult(id: string): Promise<JobResult | null> {
    const raw = await this.redis.get(resultKey(this.prefix, id));
    return raw === null ? null : parseJobResultRecord(raw);
  }

  async deleteResult(id: string): Promise<void> {
    await this.redis.del(resultKey(this.prefix, id));
  }

  async indexAdd(id: string, timestampMs: number): Promise<void> {
    await this.redis.zadd(jobIndexKey(this.prefix), timestampMs, id);
  }

  async sweepExpired(nowMs: number): Promise<number> {
    const cutoff = nowMs - this.retentionSeconds * 1000;
    const expiredIds = await this.redis.zrangebyscore(jobIndexKey(this.prefix), '-inf', cutoff);
    if (expiredIds.length === 0) {
      return 0;
    }

    // Keys that already expired on their own are simply absent; DEL ignores them.
    const keys = expiredIds.flatMap((id) => [
      jobKey(this.prefix, id),
      resultKey(this.prefix, id),
      claimKey(this.prefix, id),
    ]);
    await this.redis.del(...keys);
    await this.redis.zrem(jobIndexKey(this.prefix), ...expiredIds);

    return expiredIds.length;
  }

  async delete(id: string): Promise<boolean> {
    const removed = await this.redis.del(jobKey(this.prefix, id), resultKey(this.prefix, id));
    await this.redis.del(claimKey(this.prefix, id));
    await this.redis.zrem(jobIndexKey(this.prefix), id);
    return removed > 0;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
