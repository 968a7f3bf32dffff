import { CrawlError, toCrawlError } from '../errors/crawl-error';
import { InvalidTargetError } from '../errors/http-error';
import type { CrawlContext, Crawler } from '../types/crawl';
import type { CrawlResultSummary } from '../types/tasks';
import { parseTradeDate, latestWeekday } from '../utils/tradeDate';

export interface RetryOptions {
  /** Attempts after the first one. */
  maxRetries: number;
  /** Delay before the first retry; doubles on each further retry. */
  baseDelayMs: number;
}

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1_000,
};

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(toCrawlError(signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(toCrawlError(signal.reason));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Shared plumbing for market crawlers keyed by trade date: target handling,
 * retries with exponential backoff, and progress reporting.
 */
export abstract class BaseCrawler implements Crawler {
  abstract readonly description: string;

  protected readonly retry: RetryOptions;

  constructor(retry: Partial<RetryOptions> = {}) {
    this.retry = { ...DEFAULT_RETRY, ...retry };
  }

  abstract run(target: string, context: CrawlContext): Promise<CrawlResultSummary>;

  normalizeTarget(raw: string): string {
    const tradeDate = parseTradeDate(raw);
    if (!tradeDate) {
      throw new InvalidTargetError(`Invalid trade date '${raw}', expected YYYY-MM-DD or YYYYMMDD`);
    }
    return tradeDate;
  }

  defaultTarget(): string {
    return latestWeekday();
  }

  /**
   * Runs `operation` until it succeeds, fails with a non-retryable error, the
   * retry budget is spent, or the signal is aborted.
   */
  protected async withRetry<T>(
    label: string,
    context: CrawlContext,
    operation: () => Promise<T>,
  ): Promise<T> {
    let attempt = 0;

    for (;;) {
      this.assertNotAborted(context);

      try {
        return await operation();
      } catch (error) {
        const crawlError = toCrawlError(error);
        if (!crawlError.retryable || attempt >= this.retry.maxRetries || context.signal.aborted) {
          throw crawlError;
        }

        const delay = this.retry.baseDelayMs * 2 ** attempt;
        attempt += 1;
        context.logger.warn(`${label} failed, retrying`, {
          attempt,
          maxRetries: this.retry.maxRetries,
          delayMs: delay,
          error: crawlError.message,
        });
        await sleep(delay, context.signal);
      }
    }
  }

  protected assertNotAborted(context: CrawlContext): void {
    if (context.signal.aborted) {
      const reason: unknown = context.signal.reason;
      throw reason instanceof CrawlError ? reason : new CrawlError('interrupted', 'Crawl aborted');
    }
  }
}
