import { randomUUID } from 'crypto';
import { ConflictError, TaskNotFoundError } from '../errors/http-error';
import type { CrawlTask, TaskListFilter, TaskTransition } from '../types/tasks';
import { isActiveStatus } from '../types/tasks';
import {
  applyTransition,
  clampProgress,
  cloneTask,
  createPendingTask,
} from './taskLifecycle';

/**
 * Single source of truth for task state.
 *
 * Every method is synchronous. Because the process runs on one event loop,
 * a synchronous check-and-insert in `create` cannot interleave with another
 * caller, which gives per-key linearizability without explicit locks.
 */
export interface TaskRepository {
  create(crawlerType: string, target: string): CrawlTask;
  transition(id: string, change: TaskTransition): CrawlTask;
  /** Returns false when the task is not running; progress is not recorded then. */
  updateProgress(id: string, progress: number, step?: string): boolean;
  get(id: string): CrawlTask;
  findActive(crawlerType: string, target: string): CrawlTask | undefined;
  list(filter?: TaskListFilter): CrawlTask[];
  /** Tasks matching `filter`, ignoring its limit. */
  count(filter?: TaskListFilter): number;
  close(): void;
}

export interface TaskRepositoryOptions {
  now?: () => Date;
  generateId?: () => string;
}

function activeKey(crawlerType: string, target: string): string {
  return `${crawlerType}\u0000${target}`;
}

export class InMemoryTaskRepository implements TaskRepository {
  private readonly tasks = new Map<string, CrawlTask>();
  private readonly sequence = new Map<string, number>();
  private readonly active = new Map<string, string>();
  private nextSequence = 0;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: TaskRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  create(crawlerType: string, target: string): CrawlTask {
    const key = activeKey(crawlerType, target);
    const existingId = this.active.get(key);
    if (existingId) {
      throw new ConflictError(existingId, crawlerType, target);
    }

    const task = createPendingTask(this.generateId(), crawlerType, target, this.now());
    this.tasks.set(task.id, task);
    this.sequence.set(task.id, this.nextSequence++);
    this.active.set(key, task.id);

    return cloneTask(task);
  }

  transition(id: string, change: TaskTransition): CrawlTask {
    const current = this.require(id);
    const next = applyTransition(current, change, this.now());
    this.tasks.set(id, next);

    if (!isActiveStatus(next.status)) {
      this.active.delete(activeKey(next.crawlerType, next.target));
    }

    return cloneTask(next);
  }

  updateProgress(id: string, progress: number, step?: string): boolean {
    const task = this.require(id);
    if (task.status !== 'running') {
      return false;
    }

    task.progress = clampProgress(progress);
    if (step) {
      task.currentStep = step;
    }
    return true;
  }

  get(id: string): CrawlTask {
    return cloneTask(this.require(id));
  }

  findActive(crawlerType: string, target: string): CrawlTask | undefined {
    const id = this.active.get(activeKey(crawlerType, target));
    return id ? this.get(id) : undefined;
  }

  list(filter: TaskListFilter = {}): CrawlTask[] {
    const matches = this.matching(filter);

    matches.sort((a, b) => {
      if (a.createdAt !== b.createdAt) {
        return a.createdAt < b.createdAt ? 1 : -1;
      }
      return (this.sequence.get(b.id) ?? 0) - (this.sequence.get(a.id) ?? 0);
    });

    const limited = filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
    return limited.map(cloneTask);
  }

  count(filter: TaskListFilter = {}): number {
    return this.matching(filter).length;
  }

  close(): void {
    // nothing to release
  }

  private matching(filter: TaskListFilter): CrawlTask[] {
    return Array.from(this.tasks.values()).filter(
      (task) =>
        (!filter.crawlerType || task.crawlerType === filter.crawlerType) &&
        (!filter.status || task.status === filter.status),
    );
  }

  private require(id: string): CrawlTask {
    const task = this.tasks.get(id);
    if (!task) {
      throw new TaskNotFoundError(id);
    }
    return task;
  }
}
