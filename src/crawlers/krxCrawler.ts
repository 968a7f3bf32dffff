import { CrawlError } from '../errors/crawl-error';
import { mapKrxRowToRecord } from '../sites/krx/krx.mapper';
import type { KrxSite } from '../sites/krx/krx.site';
import type { CrawlContext, DailyPriceRecord, Market, RecordSink } from '../types/crawl';
import type { CrawlResultSummary } from '../types/tasks';
import { parseTradeDate, toCompactDate } from '../utils/tradeDate';
import { BaseCrawler, RetryOptions } from './baseCrawler';

export interface KrxCrawlerOptions {
  markets: readonly Market[];
  retry?: Partial<RetryOptions>;
}

// fetching takes this share of the progress bar, writing the rest
const FETCH_PROGRESS_SHARE = 80;

/**
 * Daily prices of every issue listed on the configured KRX markets for one
 * trade date.
 */
export class KrxCrawler extends BaseCrawler {
  readonly description = 'Korea Exchange daily stock prices (KOSPI, KOSDAQ, KONEX)';

  private readonly markets: readonly Market[];

  constructor(
    private readonly site: KrxSite,
    private readonly sink: RecordSink,
    options: KrxCrawlerOptions,
  ) {
    super(options.retry);
    if (options.markets.length === 0) {
      throw new Error('KrxCrawler needs at least one market');
    }
    this.markets = options.markets;
  }

  async run(target: string, context: CrawlContext): Promise<CrawlResultSummary> {
    const tradeDate = parseTradeDate(target);
    if (!tradeDate) {
      throw new CrawlError('validation', `Invalid trade date '${target}'`);
    }
    const compactDate = toCompactDate(tradeDate);

    const records: DailyPriceRecord[] = [];
    const perMarket: Record<string, number> = {};
    let fetched = 0;
    let skipped = 0;

    for (const [index, market] of this.markets.entries()) {
      context.reportProgress(
        Math.round((index / this.markets.length) * FETCH_PROGRESS_SHARE),
        `Fetching ${market} prices`,
      );

      const rows = await this.withRetry(`Fetch ${market} prices`, context, () =>
        this.site.fetchDailyPrices(market, compactDate, context.signal),
      );
      fetched += rows.length;

      let kept = 0;
      for (const row of rows) {
        const record = mapKrxRowToRecord(row, market, tradeDate);
        if (record) {
          records.push(record);
          kept += 1;
        } else {
          skipped += 1;
        }
      }
      perMarket[market] = kept;
      context.logger.debug('Market prices fetched', { market, rows: rows.length, kept });
    }

    if (records.length === 0) {
      throw new CrawlError('no_data', `KRX returned no usable price rows for ${tradeDate}`, {
        tradeDate,
        markets: [...this.markets],
        fetched,
      });
    }

    this.assertNotAborted(context);
    context.reportProgress(FETCH_PROGRESS_SHARE + 5, `Writing ${records.length} records`);

    const { written, failed } = await this.sink.write(records, context.signal);
    if (failed > 0) {
      throw new CrawlError('sink', `${failed} of ${records.length} records could not be written`, {
        written,
        failed,
      });
    }

    return {
      rows: written,
      tradeDate,
      markets: perMarket,
      fetched,
      skipped,
    };
  }
}
