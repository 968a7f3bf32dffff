import type { Express } from 'express';
import type { Server } from 'http';
import { createServer } from './app';
import { KrxCrawler } from './crawlers/krxCrawler';
import { openDatabase } from './db/connection';
import { runMigrations } from './db/migrate';
import { SqliteTaskRepository } from './repositories/sqliteTask.repository';
import { InMemoryTaskRepository, TaskRepository } from './repositories/task.repository';
import { CrawlExecutor } from './services/crawlExecutor.service';
import { CrawlOrchestrator } from './services/crawlOrchestrator.service';
import { CrawlerRegistry } from './services/crawlerRegistry.service';
import { HttpRecordSink, LogRecordSink } from './services/recordSink.service';
import { KrxSite } from './sites/krx/krx.site';
import type { RecordSink } from './types/crawl';
import type { AppConfig } from './utils/config';
import { logger } from './utils/logger';

export interface Application {
  config: AppConfig;
  store: TaskRepository;
  registry: CrawlerRegistry;
  executor: CrawlExecutor;
  orchestrator: CrawlOrchestrator;
  app: Express;
}

export interface ApplicationOverrides {
  store?: TaskRepository;
  /** Replaces the default crawler set. */
  registry?: CrawlerRegistry;
}

export function createTaskRepository(config: AppConfig): TaskRepository {
  if (config.taskStore === 'sqlite') {
    const db = openDatabase(config.dbPath);
    const applied = runMigrations(db);
    logger.info('Task database ready', { dbPath: config.dbPath, applied });
    return new SqliteTaskRepository(db);
  }
  return new InMemoryTaskRepository();
}

function createRecordSink(config: AppConfig): RecordSink {
  const { url, token, batchSize } = config.recordSink;
  if (!url) {
    logger.warn('RECORD_SINK_URL is not set, crawled records will only be logged');
    return new LogRecordSink();
  }
  return new HttpRecordSink({
    url,
    token,
    batchSize,
    timeoutMs: config.http.timeoutMs,
    crawlerName: config.appName,
  });
}

export function createDefaultRegistry(config: AppConfig): CrawlerRegistry {
  const site = new KrxSite({
    baseUrl: config.krx.baseUrl,
    timeoutMs: config.http.timeoutMs,
    userAgent: config.http.userAgent,
  });

  return new CrawlerRegistry().register(
    'krx',
    new KrxCrawler(site, createRecordSink(config), {
      markets: config.krx.markets,
      retry: {
        maxRetries: config.http.maxRetries,
        baseDelayMs: config.http.retryBaseDelayMs,
      },
    }),
  );
}

export function buildApplication(config: AppConfig, overrides: ApplicationOverrides = {}): Application {
  const store = overrides.store ?? createTaskRepository(config);
  const registry = overrides.registry ?? createDefaultRegistry(config);
  const executor = new CrawlExecutor(store, config.executor);
  const orchestrator = new CrawlOrchestrator(registry, store, executor);
  const app = createServer({ orchestrator, appName: config.appName, version: config.version });

  return { config, store, registry, executor, orchestrator, app };
}

export interface ShutdownTargets {
  server: Server;
  executor: CrawlExecutor;
  store: TaskRepository;
  config: Pick<AppConfig, 'shutdownTimeoutMs'>;
}

/** Grace period for aborted crawls to record their failure. */
const ABORT_GRACE_MS = 5_000;

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Stops accepting connections and queued work, waits up to
 * `shutdownTimeoutMs` for running crawls, aborts what is left, and closes the
 * task store. Queued tasks stay `pending` for the next start to resume.
 */
export async function shutdownApplication(
  { server, executor, store, config }: ShutdownTargets,
  reason: string,
): Promise<void> {
  logger.info('Shutting down', { reason });

  executor.stop();
  await closeServer(server);

  const drained = await executor.drain(config.shutdownTimeoutMs);
  if (!drained) {
    executor.abortAll(`Service shutting down (${reason})`);
    if (!(await executor.drain(ABORT_GRACE_MS))) {
      logger.warn('Crawls still running after abort', { active: executor.stats().active });
    }
  }

  store.close();
}
