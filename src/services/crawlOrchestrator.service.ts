import {
  CapacityExceededError,
  ConflictError,
  InvalidTargetError,
} from '../errors/http-error';
import type { TaskRepository } from '../repositories/task.repository';
import type { Crawler, CrawlerDescriptor } from '../types/crawl';
import type { CrawlTask, TaskListFilter } from '../types/tasks';
import { logger } from '../utils/logger';
import type { CrawlExecutor, ExecutorStats } from './crawlExecutor.service';
import type { CrawlerRegistry } from './crawlerRegistry.service';

export interface RecoveryReport {
  interrupted: number;
  resubmitted: number;
  orphaned: number;
}

/**
 * Public entry point for crawls: de-duplicates requests per
 * (crawler type, target), creates tasks, and hands them to the executor.
 */
export class CrawlOrchestrator {
  constructor(
    private readonly registry: CrawlerRegistry,
    private readonly store: TaskRepository,
    private readonly executor: CrawlExecutor,
  ) {}

  /**
   * Accepts a crawl and returns its task without waiting for the crawl.
   *
   * Throws UnknownCrawlerTypeError, InvalidTargetError, ConflictError (an
   * active task already exists for the key) or CapacityExceededError. No task
   * is created when any of them is thrown.
   */
  requestCrawl(crawlerType: string, rawTarget?: string): CrawlTask {
    const crawler = this.registry.resolve(crawlerType);
    const target = this.resolveTarget(crawler, rawTarget);

    const active = this.store.findActive(crawlerType, target);
    if (active) {
      throw new ConflictError(active.id, crawlerType, target);
    }

    if (!this.executor.canAccept()) {
      const { active: running, queued } = this.executor.stats();
      throw new CapacityExceededError(running, queued);
    }

    const task = this.store.create(crawlerType, target);
    logger.info('Crawl task accepted', { taskId: task.id, crawlerType, target });

    this.dispatch(task, crawler, false);
    return this.store.get(task.id);
  }

  getStatus(taskId: string): CrawlTask {
    return this.store.get(taskId);
  }

  listTasks(filter: TaskListFilter = {}): CrawlTask[] {
    if (filter.crawlerType) {
      this.registry.resolve(filter.crawlerType);
    }
    return this.store.list(filter);
  }

  /** One page of tasks plus the number of tasks matching the filter overall. */
  findTasks(filter: TaskListFilter = {}): { tasks: CrawlTask[]; total: number } {
    const tasks = this.listTasks(filter);
    return { tasks, total: this.store.count(filter) };
  }

  listCrawlers(): CrawlerDescriptor[] {
    return this.registry.describe();
  }

  executorStats(): ExecutorStats {
    return this.executor.stats();
  }

  /**
   * Settles tasks left behind by a previous process: `running` tasks fail as
   * interrupted, `pending` tasks are resubmitted oldest first.
   */
  recoverInterrupted(): RecoveryReport {
    const report: RecoveryReport = { interrupted: 0, resubmitted: 0, orphaned: 0 };

    for (const task of this.store.list({ status: 'running' })) {
      this.store.transition(task.id, {
        status: 'failed',
        error: {
          kind: 'interrupted',
          message: 'The service stopped while this crawl was running',
        },
      });
      report.interrupted += 1;
    }

    const pending = this.store.list({ status: 'pending' }).reverse();
    for (const task of pending) {
      if (!this.registry.has(task.crawlerType)) {
        this.store.transition(task.id, { status: 'running' });
        this.store.transition(task.id, {
          status: 'failed',
          error: {
            kind: 'unknown_crawler_type',
            message: `Crawler type '${task.crawlerType}' is no longer registered`,
          },
        });
        report.orphaned += 1;
        continue;
      }

      this.dispatch(task, this.registry.resolve(task.crawlerType), true);
      report.resubmitted += 1;
    }

    if (report.interrupted + report.resubmitted + report.orphaned > 0) {
      logger.warn('Recovered tasks from a previous run', { ...report });
    }
    return report;
  }

  private resolveTarget(crawler: Crawler, rawTarget?: string): string {
    const trimmed = rawTarget?.trim();
    if (!trimmed) {
      if (crawler.defaultTarget) {
        return crawler.defaultTarget();
      }
      throw new InvalidTargetError('A target is required for this crawler');
    }
    return crawler.normalizeTarget ? crawler.normalizeTarget(trimmed) : trimmed;
  }

  private dispatch(task: CrawlTask, crawler: Crawler, force: boolean): void {
    void this.executor.submit(task, crawler, { force }).catch((error: unknown) => {
      logger.error('Crawl task ended without a terminal state', { taskId: task.id, error });
    });
  }
}
