import { beforeEach, describe, expect, it } from 'vitest';
import { BaseCrawler } from '../../src/crawlers/baseCrawler';
import {
  CapacityExceededError,
  ConflictError,
  InvalidTargetError,
  TaskNotFoundError,
  UnknownCrawlerTypeError,
} from '../../src/errors/http-error';
import { InMemoryTaskRepository } from '../../src/repositories/task.repository';
import { CrawlExecutor } from '../../src/services/crawlExecutor.service';
import { CrawlOrchestrator } from '../../src/services/crawlOrchestrator.service';
import { CrawlerRegistry } from '../../src/services/crawlerRegistry.service';
import type { CrawlResultSummary } from '../../src/types/tasks';
import { ControlledCrawler, flush } from '../helpers/crawlers';

class DatedCrawler extends BaseCrawler {
  readonly description = 'Crawler keyed by trade date';

  async run(target: string): Promise<CrawlResultSummary> {
    return { tradeDate: target };
  }
}

describe('CrawlOrchestrator', () => {
  let store: InMemoryTaskRepository;
  let crawler: ControlledCrawler;
  let registry: CrawlerRegistry;
  let executor: CrawlExecutor;
  let orchestrator: CrawlOrchestrator;
  let ids: number;

  beforeEach(() => {
    ids = 0;
    store = new InMemoryTaskRepository({ generateId: () => `task-${++ids}` });
    crawler = new ControlledCrawler();
    registry = new CrawlerRegistry().register('test', crawler).register('dated', new DatedCrawler());
    executor = new CrawlExecutor(store, { concurrency: 2, queuePolicy: 'reject' });
    orchestrator = new CrawlOrchestrator(registry, store, executor);
  });

  it('accepts a crawl and runs it in the background', async () => {
    const task = orchestrator.requestCrawl('test', 'alpha');

    expect(task).toMatchObject({ id: 'task-1', crawlerType: 'test', target: 'alpha', status: 'running' });

    await flush();
    crawler.runs[0].deferred.resolve({ rows: 42 });
    await executor.drain();

    expect(orchestrator.getStatus('task-1')).toMatchObject({
      status: 'succeeded',
      resultSummary: { rows: 42 },
    });
  });

  it('returns Conflict with the active task id for a duplicate request', async () => {
    const first = orchestrator.requestCrawl('test', 'alpha');

    let caught: unknown;
    try {
      orchestrator.requestCrawl('test', 'alpha');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConflictError);
    expect(caught).toMatchObject({ taskId: first.id, status: 409 });
    expect(store.list()).toHaveLength(1);

    await flush();
    crawler.runs[0].deferred.resolve({});
    await executor.drain();

    const again = orchestrator.requestCrawl('test', 'alpha');
    expect(again.id).toBe('task-2');
  });

  it('creates nothing for an unknown crawler type', () => {
    expect(() => orchestrator.requestCrawl('nonexistent', 'alpha')).toThrow(UnknownCrawlerTypeError);
    expect(store.list()).toEqual([]);
  });

  it('creates nothing when the executor is full', () => {
    orchestrator.requestCrawl('test', 'a');
    orchestrator.requestCrawl('test', 'b');

    expect(() => orchestrator.requestCrawl('test', 'c')).toThrow(CapacityExceededError);
    expect(store.list().map((task) => task.target)).toEqual(['b', 'a']);
  });

  it('requires a target when the crawler has no default', () => {
    expect(() => orchestrator.requestCrawl('test')).toThrow(InvalidTargetError);
    expect(() => orchestrator.requestCrawl('test', '   ')).toThrow('A target is required for this crawler');
  });

  it('normalizes targets so equivalent spellings conflict', () => {
    const task = orchestrator.requestCrawl('dated', '20240801');
    expect(task.target).toBe('2024-08-01');

    expect(() => orchestrator.requestCrawl('dated', ' 2024-08-01 ')).toThrow(ConflictError);
    expect(() => orchestrator.requestCrawl('dated', '2024-13-01')).toThrow(InvalidTargetError);
  });

  it('falls back to the crawler default target', () => {
    const task = orchestrator.requestCrawl('dated');
    expect(task.target).toMatch(/^\d{4}-\d{2}-\d{2}$/);
  });

  it('lists tasks and crawlers', () => {
    orchestrator.requestCrawl('test', 'a');
    orchestrator.requestCrawl('dated', '2024-08-01');

    expect(orchestrator.listTasks({ crawlerType: 'test' }).map((task) => task.id)).toEqual(['task-1']);
    expect(orchestrator.listTasks()).toHaveLength(2);
    expect(() => orchestrator.listTasks({ crawlerType: 'nope' })).toThrow(UnknownCrawlerTypeError);
    expect(orchestrator.findTasks({ limit: 1 })).toMatchObject({ tasks: [{ id: 'task-2' }], total: 2 });
    expect(() => orchestrator.findTasks({ crawlerType: 'nope' })).toThrow(UnknownCrawlerTypeError);
    expect(orchestrator.listCrawlers()).toEqual([
      { name: 'dated', description: 'Crawler keyed by trade date' },
      { name: 'test', description: 'Crawler driven by the test' },
    ]);
    expect(orchestrator.executorStats()).toMatchObject({ active: 2, concurrency: 2, queuePolicy: 'reject' });
  });

  it('throws TaskNotFoundError for unknown task ids', () => {
    expect(() => orchestrator.getStatus('missing')).toThrow(TaskNotFoundError);
  });

  it('settles tasks left over from a previous process', async () => {
    store.create('test', 'was-running');
    store.transition('task-1', { status: 'running' });
    store.create('test', 'was-pending');
    store.create('retired', 'orphan');

    const report = orchestrator.recoverInterrupted();

    expect(report).toEqual({ interrupted: 1, resubmitted: 1, orphaned: 1 });
    expect(store.get('task-1')).toMatchObject({
      status: 'failed',
      error: { kind: 'interrupted', message: 'The service stopped while this crawl was running' },
    });
    expect(store.get('task-2').status).toBe('running');
    expect(store.get('task-3')).toMatchObject({
      status: 'failed',
      error: { kind: 'unknown_crawler_type', message: "Crawler type 'retired' is no longer registered" },
    });

    await flush();
    expect(crawler.runs.map((run) => run.target)).toEqual(['was-pending']);
  });
});
