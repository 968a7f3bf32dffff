import type { TaskStatus } from '../types/tasks';

export class HttpError extends Error {
  status?: number;
  data?: unknown;

  constructor(message: string, status?: number, data?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.data = data;
  }
}

export class InvalidTargetError extends HttpError {
  constructor(message: string, data?: unknown) {
    super(message, 400, data);
    this.name = 'InvalidTargetError';
  }
}

export class TaskNotFoundError extends HttpError {
  constructor(readonly taskId: string) {
    super(`Task '${taskId}' not found`, 404);
    this.name = 'TaskNotFoundError';
  }
}

export class UnknownCrawlerTypeError extends HttpError {
  constructor(
    readonly crawlerType: string,
    supportedCrawlers: string[],
  ) {
    super(`Unknown crawler type '${crawlerType}'`, 404, { supportedCrawlers });
    this.name = 'UnknownCrawlerTypeError';
  }
}

/**
 * An active task already exists for the same crawler type and target.
 */
export class ConflictError extends HttpError {
  constructor(
    readonly taskId: string,
    readonly crawlerType: string,
    readonly target: string,
  ) {
    super('A crawl for this target is already in progress', 409, { taskId, crawlerType, target });
    this.name = 'ConflictError';
  }
}

export class CapacityExceededError extends HttpError {
  constructor(active: number, queued: number) {
    super('Crawl capacity exceeded, retry later', 503, { active, queued });
    this.name = 'CapacityExceededError';
  }
}

/** Illegal status edge. Indicates a defect, never user input. */
export class InvalidTransitionError extends HttpError {
  constructor(
    readonly taskId: string,
    readonly from: TaskStatus,
    readonly to: TaskStatus,
  ) {
    super(`Invalid task transition ${from} -> ${to} for task '${taskId}'`, 500);
    this.name = 'InvalidTransitionError';
  }
}

export function getErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}
