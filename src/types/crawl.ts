import type { CrawlResultSummary } from './tasks';
import type { Logger } from '../utils/logger';

export interface CrawlContext {
  taskId: string;
  /**
   * Aborted when the executor gives up on the crawl (timeout or shutdown).
   * Implementations should pass it to their HTTP client.
   */
  signal: AbortSignal;
  reportProgress: (progress: number, step?: string) => void;
  logger: Logger;
}

/**
 * A named data source the orchestrator can run against a target.
 */
export interface Crawler {
  readonly description?: string;

  run(target: string, context: CrawlContext): Promise<CrawlResultSummary>;

  /**
   * Validates a raw target and returns its canonical form, so that equivalent
   * spellings share one de-duplication key.
   */
  normalizeTarget?(raw: string): string;

  /** Target used when a request does not name one. */
  defaultTarget?(): string;
}

export interface CrawlerDescriptor {
  name: string;
  description: string | null;
}

export type Market = 'KOSPI' | 'KOSDAQ' | 'KONEX';

export interface DailyPriceRecord {
  ticker: string;
  name: string;
  market: Market;
  tradeDate: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number;
  volume: number;
  changeRate: number | null;
  changeAmount: number | null;
  tradingValue: number | null;
  marketCap: number | null;
  sharesOutstanding: number | null;
  currency: 'KRW';
  dataSource: 'KRX';
}

export interface SinkWriteResult {
  written: number;
  failed: number;
}

/**
 * Durable destination for crawled price records.
 */
export interface RecordSink {
  write(records: DailyPriceRecord[], signal?: AbortSignal): Promise<SinkWriteResult>;
}
