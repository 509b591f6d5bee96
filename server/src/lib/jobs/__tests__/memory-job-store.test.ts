import { describe, expect, it } from 'vitest';
import { JobNotFoundError } from '../errors';
import { MemoryJobStore } from '../memory-job-store';
import type { Job, JobResult } from '../types';

const job: Job = {
  id: 'job-1',
  fileName: 'scan.png',
  category: 'image',
  status: 'pending',
  progress: 0,
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
};

const result: JobResult = {
  jobId: 'job-1',
  fileName: 'scan.png',
  category: 'image',
  texts: [{ text: 'hello', source: 'image', pageNumber: null }],
  tables: [],
  images: [],
  outputFiles: {},
  metadata: { outputFormat: 'json', outputDirectory: null },
};

function createStore() {
  let nowMs = 1_000_000;
  const store = new MemoryJobStore({ retentionSeconds: 60, now: () => nowMs });
  return {
    store,
    advance(ms: number) {
      nowMs += ms;
    },
  };
}

describe('MemoryJobStore', () => {
  it('returns copies of stored jobs', async () => {
    const { store } = createStore();
    await store.put(job);

    const loaded = await store.get('job-1');
    expect(loaded).toEqual(job);
    expect(loaded).not.toBe(job);
    expect(await store.get('missing')).toBeNull();
  });

  it('replaces only jobs that still exist', async () => {
    const { store } = createStore();

    expect(await store.replace(job)).toBe(false);
    expect(await store.get('job-1')).toBeNull();

    await store.put(job);
    expect(await store.replace({ ...job, status: 'processing', progress: 10 })).toBe(true);
    expect((await store.get('job-1'))?.status).toBe('processing');
  });

  it('grants a claim to the first caller only', async () => {
    const { store } = createStore();

    expect(await store.claim('job-1')).toBe(true);
    expect(await store.claim('job-1')).toBe(false);

    await store.delete('job-1');
    expect(await store.claim('job-1')).toBe(true);
  });

  it('refuses a result for a job that does not exist', async () => {
    const { store } = createStore();
    await expect(store.putResult('job-1', result)).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it('expires jobs and results after the retention window', async () => {
    const { store, advance } = createStore();
    await store.put(job);
    await store.putResult('job-1', result);

    advance(59_999);
    expect(await store.getResult('job-1')).toEqual(result);

    advance(1);
    expect(await store.get('job-1')).toBeNull();
    expect(await store.getResult('job-1')).toBeNull();
  });

  it('refreshes expiry on every write', async () => {
    const { store, advance } = createStore();
    await store.put(job);
    advance(50_000);
    await store.put({ ...job, status: 'processing', progress: 10 });
    advance(50_000);

    expect((await store.get('job-1'))?.progress).toBe(10);
  });

  it('sweeps indexed jobs created at or before the cutoff', async () => {
    const { store } = createStore();
    await store.put(job);
    await store.put({ ...job, id: 'job-2' });
    await store.indexAdd('job-1', 1_000);
    await store.indexAdd('job-2', 5_000);

    expect(await store.sweepExpired(1_000 + 60_000)).toBe(1);
    expect(await store.get('job-1')).toBeNull();
    expect(await store.get('job-2')).not.toBeNull();
    expect(await store.sweepExpired(1_000 + 60_000)).toBe(0);
  });

  it('deletes a job with its result and reports whether anything existed', async () => {
    const { store } = createStore();
    await store.put(job);
    await store.putResult('job-1', result);

    expect(await store.delete('job-1')).toBe(true);
    expect(await store.getResult('job-1')).toBeNull();
    expect(await store.delete('job-1')).toBe(false);
  });
});
