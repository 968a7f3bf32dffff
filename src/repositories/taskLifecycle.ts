import { InvalidTransitionError } from '../errors/http-error';
import type { CrawlTask, TaskStatus, TaskTransition } from '../types/tasks';

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running'],
  running: ['succeeded', 'failed'],
  succeeded: [],
  failed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function clampProgress(progress: number): number {
  if (!Number.isFinite(progress)) return 0;
  return Math.min(100, Math.max(0, Math.round(progress)));
}

export function createPendingTask(
  id: string,
  crawlerType: string,
  target: string,
  now: Date,
): CrawlTask {
  return {
    id,
    crawlerType,
    target,
    status: 'pending',
    progress: 0,
    currentStep: 'Queued',
    createdAt: now.toISOString(),
  };
}

/**
 * Returns the task after `change`, stamping the timestamp that belongs to the
 * new status. Throws InvalidTransitionError for any edge outside
 * pending -> running -> succeeded | failed.
 */
export function applyTransition(task: CrawlTask, change: TaskTransition, now: Date): CrawlTask {
  if (!canTransition(task.status, change.status)) {
    throw new InvalidTransitionError(task.id, task.status, change.status);
  }

  const timestamp = now.toISOString();

  switch (change.status) {
    case 'running':
      return {
        ...task,
        status: 'running',
        startedAt: timestamp,
        currentStep: 'Starting',
      };
    case 'succeeded':
      return {
        ...finish(task, now),
        status: 'succeeded',
        progress: 100,
        currentStep: 'Completed',
        resultSummary: { ...change.resultSummary },
      };
    case 'failed':
      return {
        ...finish(task, now),
        status: 'failed',
        currentStep: 'Failed',
        error: { ...change.error },
      };
  }
}

function finish(task: CrawlTask, now: Date): CrawlTask {
  const startedMs = task.startedAt ? Date.parse(task.startedAt) : now.getTime();
  return {
    ...task,
    completedAt: now.toISOString(),
    executionTimeMs: Math.max(0, now.getTime() - startedMs),
  };
}

export function cloneTask(task: CrawlTask): CrawlTask {
  const copy: CrawlTask = { ...task };
  if (task.resultSummary) copy.resultSummary = structuredClone(task.resultSummary);
  if (task.error) copy.error = structuredClone(task.error);
  return copy;
}
