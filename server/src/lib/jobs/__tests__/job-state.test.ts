import { describe, expect, it } from 'vitest';
import { InvalidJobTransitionError } from '../errors';
import { applyJobUpdate, canTransition } from '../job-state';
import type { Job } from '../types';

function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 'job-1',
    fileName: 'report.pdf',
    category: 'pdf',
    status: 'pending',
    progress: 0,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('job state transitions', () => {
  it('allows only forward transitions', () => {
    expect(canTransition('pending', 'processing')).toBe(true);
    expect(canTransition('pending', 'failed')).toBe(true);
    expect(canTransition('pending', 'completed')).toBe(false);
    expect(canTransition('processing', 'processing')).toBe(true);
    expect(canTransition('processing', 'completed')).toBe(true);
    expect(canTransition('completed', 'failed')).toBe(false);
    expect(canTransition('failed', 'processing')).toBe(false);
  });

  it('applies status, progress, message and timestamp', () => {
    const now = new Date('2024-01-01T00:00:05.000Z');
    const next = applyJobUpdate(makeJob(), { status: 'processing', progress: 10, message: 'Starting pdf processing' }, now);

    expect(next).toEqual(
      makeJob({
        status: 'processing',
        progress: 10,
        message: 'Starting pdf processing',
        updatedAt: '2024-01-01T00:00:05.000Z',
      })
    );
  });

  it('never lowers progress and clamps it to 0..100', () => {
    const job = makeJob({ status: 'processing', progress: 70 });

    expect(applyJobUpdate(job, { status: 'processing', progress: 30 }).progress).toBe(70);
    expect(applyJobUpdate(job, { status: 'processing', progress: 250 }).progress).toBe(100);
    expect(applyJobUpdate(makeJob(), { status: 'processing', progress: -5 }).progress).toBe(0);
  });

  it('keeps the previous message when none is given', () => {
    const job = makeJob({ status: 'processing', progress: 20, message: 'Detected category: pdf' });
    expect(applyJobUpdate(job, { status: 'processing', progress: 30 }).message).toBe('Detected category: pdf');
  });

  it('rejects updates to terminal jobs', () => {
    const job = makeJob({ status: 'completed', progress: 100 });
    expect(() => applyJobUpdate(job, { status: 'failed', message: 'late failure' })).toThrow(InvalidJobTransitionError);
    expect(() => applyJobUpdate(job, { status: 'failed' })).toThrow('Job job-1 cannot move from completed to failed');
  });
});
