import { InvalidJobTransitionError } from './errors';
import type { Job, JobStatus } from './types';

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['processing', 'failed'],
  processing: ['processing', 'completed', 'failed'],
  completed: [],
  failed: [],
};

export type JobUpdate = {
  status: JobStatus;
  progress?: number;
  message?: string;
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

function clampProgress(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

/**
 * Returns the next version of `job`. Terminal jobs are never rewritten and progress only moves
 * forward, so a reader can never observe a regression.
 */
export function applyJobUpdate(job: Job, update: JobUpdate, now: Date = new Date()): Job {
  if (!canTransition(job.status, update.status)) {
    throw new InvalidJobTransitionError(job.id, job.status, update.status);
  }

  const progress =
    update.progress === undefined ? job.progress : Math.max(job.progress, clampProgress(update.progress));

  return {
    ...job,
    status: update.status,
    progress,
    ...(update.message !== undefined ? { message: update.message } : {}),
    updatedAt: now.toISOString(),
  };
}
