export type TaskStatus = 'pending' | 'running' | 'succeeded' | 'failed';

export const ACTIVE_STATUSES: readonly TaskStatus[] = ['pending', 'running'];

export type TaskErrorKind =
  | 'network'
  | 'timeout'
  | 'upstream'
  | 'no_data'
  | 'validation'
  | 'sink'
  | 'interrupted'
  | 'unknown_crawler_type'
  | 'unknown';

export interface TaskError {
  kind: TaskErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Opaque summary a crawler returns on success, e.g. `{ rows: 42 }`.
 */
export type CrawlResultSummary = Record<string, unknown>;

export interface CrawlTask {
  id: string;
  crawlerType: string;
  target: string;
  status: TaskStatus;
  progress: number;
  currentStep?: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  executionTimeMs?: number;
  resultSummary?: CrawlResultSummary;
  error?: TaskError;
}

export type TaskTransition =
  | { status: 'running' }
  | { status: 'succeeded'; resultSummary: CrawlResultSummary }
  | { status: 'failed'; error: TaskError };

export interface TaskListFilter {
  crawlerType?: string;
  status?: TaskStatus;
  limit?: number;
}

export function isActiveStatus(status: TaskStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}
