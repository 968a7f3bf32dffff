import { CrawlError, toTaskError } from '../errors/crawl-error';
import { CapacityExceededError } from '../errors/http-error';
import type { TaskRepository } from '../repositories/task.repository';
import type { CrawlContext, Crawler } from '../types/crawl';
import type { CrawlResultSummary, CrawlTask, TaskTransition } from '../types/tasks';
import { logger } from '../utils/logger';

export type QueuePolicy = 'queue' | 'reject';

export interface CrawlExecutorOptions {
  /** Crawls allowed to run at the same time. */
  concurrency: number;
  /** What to do with a submission when every worker is busy. */
  queuePolicy: QueuePolicy;
  /** Waiting submissions allowed under the `queue` policy. */
  maxQueueSize: number;
  /** Per-crawl deadline in ms; 0 disables it. */
  timeoutMs: number;
}

export interface ExecutorStats {
  active: number;
  queued: number;
  concurrency: number;
  queuePolicy: QueuePolicy;
  maxQueueSize: number;
}

export interface SubmitOptions {
  /** Bypass capacity checks; used when resuming tasks after a restart. */
  force?: boolean;
}

const DEFAULT_OPTIONS: CrawlExecutorOptions = {
  concurrency: 2,
  queuePolicy: 'queue',
  maxQueueSize: 50,
  timeoutMs: 0,
};

interface QueuedCrawl {
  task: CrawlTask;
  crawler: Crawler;
  resolve: (task: CrawlTask) => void;
  reject: (error: unknown) => void;
}

function toSummary(value: unknown): CrawlResultSummary {
  if (value === undefined || value === null) {
    return {};
  }
  if (typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return { result: value };
}

/**
 * Bounded worker pool for crawls. Submissions return immediately; each crawl
 * moves its task to `running` when a worker picks it up and to exactly one
 * terminal state when the crawler settles or times out.
 */
export class CrawlExecutor {
  private readonly options: CrawlExecutorOptions;
  private readonly queue: QueuedCrawl[] = [];
  private readonly inFlight = new Map<string, Promise<CrawlTask>>();
  private readonly controllers = new Map<string, AbortController>();
  private idleWaiters: Array<() => void> = [];
  private active = 0;
  private stopped = false;

  constructor(
    private readonly store: TaskRepository,
    options: Partial<CrawlExecutorOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    if (!Number.isInteger(this.options.concurrency) || this.options.concurrency < 1) {
      throw new Error(`Executor concurrency must be a positive integer, got ${this.options.concurrency}`);
    }
  }

  canAccept(): boolean {
    if (this.stopped) {
      return false;
    }
    if (this.active < this.options.concurrency) {
      return true;
    }
    return this.options.queuePolicy === 'queue' && this.queue.length < this.options.maxQueueSize;
  }

  /**
   * Queues `task` for execution. Throws CapacityExceededError synchronously
   * when the pool cannot take it. The returned promise resolves with the
   * terminal task after the terminal state has been written to the store.
   */
  submit(task: CrawlTask, crawler: Crawler, options: SubmitOptions = {}): Promise<CrawlTask> {
    if (this.inFlight.has(task.id)) {
      throw new Error(`Task '${task.id}' has already been submitted`);
    }
    if (this.stopped) {
      throw new CapacityExceededError(this.active, this.queue.length);
    }
    if (!options.force && !this.canAccept()) {
      throw new CapacityExceededError(this.active, this.queue.length);
    }

    const settled = new Promise<CrawlTask>((resolve, reject) => {
      this.queue.push({ task, crawler, resolve, reject });
    });
    this.inFlight.set(task.id, settled);

    this.pump();
    return settled;
  }

  /** Completion promise of a queued or running task, if any. */
  whenSettled(taskId: string): Promise<CrawlTask> | undefined {
    return this.inFlight.get(taskId);
  }

  stats(): ExecutorStats {
    return {
      active: this.active,
      queued: this.queue.length,
      concurrency: this.options.concurrency,
      queuePolicy: this.options.queuePolicy,
      maxQueueSize: this.options.maxQueueSize,
    };
  }

  /** Once stopped, queued crawls are never started and count as settled. */
  isIdle(): boolean {
    return this.active === 0 && (this.stopped || this.queue.length === 0);
  }

  isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Stops picking up queued crawls. Their tasks stay `pending` in the store so
   * that the next process resubmits them; running crawls are left to finish.
   */
  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    if (this.queue.length > 0) {
      logger.info('Executor stopped, leaving queued crawls pending', {
        taskIds: this.queue.map((entry) => entry.task.id),
      });
    }
    this.notifyIfIdle();
  }

  /**
   * Resolves true once every queued and running crawl has settled (running
   * ones only, after `stop`), or false if `timeoutMs` elapses first.
   * Without `timeoutMs` it waits indefinitely.
   */
  async drain(timeoutMs?: number): Promise<boolean> {
    if (this.isIdle()) {
      return true;
    }

    const idle = new Promise<boolean>((resolve) => {
      this.idleWaiters.push(() => resolve(true));
    });
    if (timeoutMs === undefined) {
      return idle;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([idle, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Stops the executor and aborts every running crawl. Their tasks end as
   * `failed` with kind `interrupted`; queued tasks stay `pending`.
   */
  abortAll(reason: string): void {
    this.stop();
    for (const [taskId, controller] of this.controllers) {
      logger.warn('Aborting running crawl', { taskId, reason });
      controller.abort(new CrawlError('interrupted', reason));
    }
  }

  private pump(): void {
    while (!this.stopped && this.active < this.options.concurrency) {
      const next = this.queue.shift();
      if (!next) {
        break;
      }

      this.active += 1;
      void this.execute(next.task, next.crawler)
        .then(next.resolve, next.reject)
        .finally(() => {
          this.active -= 1;
          this.inFlight.delete(next.task.id);
          this.pump();
          this.notifyIfIdle();
        });
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  private async execute(task: CrawlTask, crawler: Crawler): Promise<CrawlTask> {
    const taskLogger = logger.child({
      taskId: task.id,
      crawlerType: task.crawlerType,
      target: task.target,
    });

    this.store.transition(task.id, { status: 'running' });
    taskLogger.info('Crawl task started');

    const controller = new AbortController();
    this.controllers.set(task.id, controller);

    const context: CrawlContext = {
      taskId: task.id,
      signal: controller.signal,
      logger: taskLogger,
      reportProgress: (progress, step) => {
        try {
          this.store.updateProgress(task.id, progress, step);
        } catch (error) {
          taskLogger.warn('Failed to record crawl progress', { error });
        }
      },
    };

    let timer: NodeJS.Timeout | undefined;
    let outcome: TaskTransition;

    // an aborted crawl settles at once, whether or not the crawler watches its signal
    let rejectAborted: (reason: unknown) => void = () => undefined;
    const aborted = new Promise<never>((_resolve, reject) => {
      rejectAborted = reject;
    });
    const onAbort = () => rejectAborted(controller.signal.reason);
    controller.signal.addEventListener('abort', onAbort, { once: true });

    const deadline = this.options.timeoutMs;
    if (deadline > 0) {
      timer = setTimeout(() => {
        controller.abort(
          new CrawlError('timeout', `Crawl exceeded the ${deadline} ms deadline`, { timeoutMs: deadline }),
        );
      }, deadline);
    }

    try {
      // Promise.resolve().then turns a synchronous throw into a rejection
      const run = Promise.resolve().then(() => crawler.run(task.target, context));
      const summary = await Promise.race([run, aborted]);

      outcome = { status: 'succeeded', resultSummary: toSummary(summary) };
    } catch (error) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : undefined;
      outcome = { status: 'failed', error: toTaskError(reason instanceof CrawlError ? reason : error) };
    } finally {
      clearTimeout(timer);
      controller.signal.removeEventListener('abort', onAbort);
      this.controllers.delete(task.id);
    }

    const finished = this.store.transition(task.id, outcome);
    if (finished.status === 'succeeded') {
      taskLogger.info('Crawl task succeeded', {
        executionTimeMs: finished.executionTimeMs,
        resultSummary: finished.resultSummary,
      });
    } else {
      taskLogger.error('Crawl task failed', {
        executionTimeMs: finished.executionTimeMs,
        error: finished.error,
      });
    }
    return finished;
  }
}
