import { DailyPriceRecord } from '../../types/crawl';

export interface PriceCreateRequest {
  ticker: string;
  name: string;
  market: string;
  tradeDate: string;
  open?: number;
  high?: number;
  low?: number;
  close: number;
  volume: number;
  changeRate?: number;
  changeAmount?: number;
  tradingValue?: number;
  marketCap?: number;
  sharesOutstanding?: number;
  currency: string;
  dataSource: string;
  crawlerName?: string;
}

function optional(value: number | null): number | undefined {
  return value === null ? undefined : value;
}

export function mapPriceRecordToApiRequest(record: DailyPriceRecord, crawlerName?: string): PriceCreateRequest {
  return {
    ticker: record.ticker,
    name: record.name || record.ticker,
    market: record.market,
    tradeDate: record.tradeDate,
    open: optional(record.open),
    high: optional(record.high),
    low: optional(record.low),
    close: record.close,
    volume: record.volume,
    changeRate: optional(record.changeRate),
    changeAmount: optional(record.changeAmount),
    tradingValue: optional(record.tradingValue),
    marketCap: optional(record.marketCap),
    sharesOutstanding: optional(record.sharesOutstanding),
    currency: record.currency,
    dataSource: record.dataSource,
    crawlerName: crawlerName || undefined,
  };
}
