import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BackgroundRunner } from '../background-runner';
import { JobDispatcher } from '../dispatcher';
import { JobFailedError, JobNotFoundError, JobNotReadyError, JobStoreError, UnsupportedFileTypeError } from '../errors';
import { JobService } from '../job-service';
import { MemoryJobStore } from '../memory-job-store';
import type { DispatchOptions, JobResult } from '../types';

const START_MS = Date.parse('2024-03-01T12:00:00.000Z');

function createHarness(ids: string[] = ['job-1', 'job-2', 'job-3']) {
  let nowMs = START_MS;
  const store = new MemoryJobStore({ retentionSeconds: 60, now: () => nowMs });
  const dispatcher = {
    dispatch: vi.fn(async (_jobId: string, _filePath: string, _options: DispatchOptions) => null),
  };
  const runner = new BackgroundRunner();
  const queue = [...ids];
  const service = new JobService({
    store,
    dispatcher,
    runner,
    now: () => new Date(nowMs),
    generateId: () => queue.shift() ?? 'exhausted',
  });

  return {
    store,
    dispatcher,
    runner,
    service,
    advance(ms: number) {
      nowMs += ms;
    },
  };
}

function completedResult(jobId: string): JobResult {
  return {
    jobId,
    fileName: 'scan.png',
    category: 'image',
    texts: [{ text: 'hello', source: 'image', pageNumber: null }],
    tables: [],
    images: [],
    outputFiles: {},
    metadata: { outputFormat: 'json', outputDirectory: null },
  };
}

describe('JobService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates a pending job with a resolved category', async () => {
    const { service, store } = createHarness();

    const job = await service.create('scan.PNG');

    expect(job).toEqual({
      id: 'job-1',
      fileName: 'scan.PNG',
      category: 'image',
      status: 'pending',
      progress: 0,
      createdAt: '2024-03-01T12:00:00.000Z',
      updatedAt: '2024-03-01T12:00:00.000Z',
    });
    expect(await store.get('job-1')).toEqual(job);
  });

  it('accepts an explicit category and rejects unknown extensions on auto', async () => {
    const { service } = createHarness();

    expect((await service.create('upload.bin', 'pdf')).category).toBe('pdf');
    await expect(service.create('notes.txt')).rejects.toBeInstanceOf(UnsupportedFileTypeError);
    await expect(service.create('notes.txt')).rejects.toThrow('Unsupported file type for notes.txt');
  });

  it('never reuses an id that is already stored', async () => {
    const { service, store } = createHarness(['taken', 'taken', 'fresh']);
    await store.put({
      id: 'taken',
      fileName: 'old.pdf',
      category: 'pdf',
      status: 'completed',
      progress: 100,
      createdAt: '2024-03-01T11:00:00.000Z',
      updatedAt: '2024-03-01T11:00:00.000Z',
    });

    expect((await service.create('new.pdf')).id).toBe('fresh');
    expect((await store.get('taken'))?.fileName).toBe('old.pdf');
  });

  it('gives up when no unique id can be allocated', async () => {
    const { service } = createHarness(['a']);
    await service.create('first.pdf');
    await service.create('second.pdf');

    await expect(service.create('third.pdf')).rejects.toBeInstanceOf(JobStoreError);
  });

  it('hands scheduled jobs to the dispatcher in the background', async () => {
    const { service, dispatcher, runner } = createHarness();
    const job = await service.create('report.pdf');

    service.schedule(job, '/uploads/report.pdf', { outputFormat: 'files' });
    await runner.whenIdle();

    expect(dispatcher.dispatch).toHaveBeenCalledWith('job-1', '/uploads/report.pdf', { outputFormat: 'files' });
  });

  it('fails jobs scheduled after the runner stopped accepting work', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { service, dispatcher, runner } = createHarness();
    const job = await service.create('report.pdf');

    await runner.drain();
    service.schedule(job, '/uploads/report.pdf');

    await vi.waitFor(async () => {
      expect((await service.status('job-1')).status).toBe('failed');
    });
    expect((await service.status('job-1')).message).toBe('Processing failed: the service is shutting down');
    expect(dispatcher.dispatch).not.toHaveBeenCalled();
  });

  it('reports each result outcome', async () => {
    const { service, store } = createHarness();
    const pending = await service.create('scan.png');
    const failed = await service.create('scan.png');
    const completed = await service.create('scan.png');

    await store.put({ ...failed, status: 'failed', progress: 30, message: 'Processing failed: boom' });
    await store.put({ ...completed, status: 'completed', progress: 100 });
    await store.putResult(completed.id, completedResult(completed.id));

    await expect(service.result(pending.id)).rejects.toThrow(new JobNotReadyError('job-1', 'pending', 0));
    await expect(service.result(pending.id)).rejects.toThrow('Job job-1 is still pending. Current progress: 0%');
    await expect(service.result(failed.id)).rejects.toBeInstanceOf(JobFailedError);
    await expect(service.result(failed.id)).rejects.toThrow('Job job-2 failed: Processing failed: boom');
    expect(await service.result(completed.id)).toEqual(completedResult('job-3'));
    await expect(service.result('nope')).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it('treats a completed job without a stored result as a store fault', async () => {
    const { service, store } = createHarness();
    const job = await service.create('scan.png');
    await store.put({ ...job, status: 'completed', progress: 100 });

    await expect(service.result(job.id)).rejects.toBeInstanceOf(JobStoreError);
  });

  it('sweeps jobs past the retention window', async () => {
    const { service, advance } = createHarness();
    await service.create('old.pdf');
    advance(30_000);
    await service.create('recent.pdf');

    advance(30_000);
    expect(await service.cleanup()).toBe(1);
    await expect(service.status('job-1')).rejects.toBeInstanceOf(JobNotFoundError);
    expect((await service.status('job-2')).fileName).toBe('recent.pdf');
  });

  it('deletes jobs and reports unknown ids', async () => {
    const { service } = createHarness();
    await service.create('report.pdf');

    await service.delete('job-1');
    await expect(service.status('job-1')).rejects.toBeInstanceOf(JobNotFoundError);
    await expect(service.delete('job-1')).rejects.toThrow('Job job-1 not found');
  });
});

describe('JobService with the dispatcher', () => {
  let workRoot: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    workRoot = await mkdtemp(join(tmpdir(), 'job-service-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(workRoot, { recursive: true, force: true });
  });

  it('executes a job once even when it is scheduled twice', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new MemoryJobStore();
    const runner = new BackgroundRunner();
    const extract = vi.fn(async () => ({ texts: ['body'], tables: [] }));
    const dispatcher = new JobDispatcher({
      store,
      outputRoot: join(workRoot, 'parsed'),
      scratchRoot: join(workRoot, 'scratch'),
      capabilities: { pdf: { id: 'fake:pdf', extract } },
    });
    const service = new JobService({ store, dispatcher, runner });
    const inputPath = join(workRoot, 'report.pdf');
    await writeFile(inputPath, 'fixture');

    const job = await service.create('report.pdf');
    service.schedule(job, inputPath);
    service.schedule(job, inputPath);
    await runner.whenIdle();

    expect(extract).toHaveBeenCalledTimes(1);
    expect((await service.status(job.id)).status).toBe('completed');
    expect((await service.result(job.id)).texts).toEqual([{ text: 'body', source: 'text', pageNumber: null }]);
  });

  it('only ever shows non-decreasing progress while a job runs', async () => {
    const store = new MemoryJobStore();
    const runner = new BackgroundRunner();
    const observed: number[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const dispatcher = new JobDispatcher({
      store,
      outputRoot: join(workRoot, 'parsed'),
      scratchRoot: join(workRoot, 'scratch'),
      capabilities: {
        pdf: {
          id: 'fake:pdf',
          extract: async () => {
            await gate;
            return { texts: ['body'], tables: [] };
          },
        },
      },
    });
    const service = new JobService({ store, dispatcher, runner });
    const inputPath = join(workRoot, 'report.pdf');
    await writeFile(inputPath, 'fixture');

    const job = await service.create('report.pdf');
    observed.push((await service.status(job.id)).progress);
    service.schedule(job, inputPath);

    await vi.waitFor(async () => {
      expect((await service.status(job.id)).progress).toBe(30);
    });
    observed.push((await service.status(job.id)).progress);

    release();
    await runner.whenIdle();
    const finished = await service.status(job.id);
    observed.push(finished.progress);

    expect(observed).toEqual([0, 30, 100]);
    expect(finished.status).toBe('completed');
    expect((await service.result(job.id)).texts).toEqual([{ text: 'body', source: 'text', pageNumber: null }]);
  });
});
