import type { DailyPriceRecord, Market } from '../../types/crawl';
import type { KrxPriceRow } from './krx.site';

/**
 * Parses KRX numeric text such as `"71,000"` or `"-1.23"`. Blank values and
 * the `-` placeholder become null.
 */
export function cleanNumeric(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const cleaned = value.replace(/[,\s₩]/g, '');
  if (cleaned === '' || cleaned === '-') {
    return null;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

// KRX reports 0 for open/high/low when an issue did not trade
function cleanPrice(value: string | undefined): number | null {
  const parsed = cleanNumeric(value);
  return parsed === null || parsed <= 0 ? null : parsed;
}

function isConsistent(record: DailyPriceRecord): boolean {
  const prices = [record.open, record.low, record.close, record.high].filter(
    (price): price is number => price !== null,
  );
  const { high, low } = record;
  if (high !== null && prices.some((price) => price > high)) {
    return false;
  }
  if (low !== null && prices.some((price) => price < low)) {
    return false;
  }
  return record.volume >= 0;
}

/**
 * Maps one KRX row to a price record, or returns undefined when the row has
 * no usable close price or its prices contradict each other.
 */
export function mapKrxRowToRecord(
  row: KrxPriceRow,
  market: Market,
  tradeDate: string,
): DailyPriceRecord | undefined {
  const ticker = row.ISU_SRT_CD.trim();
  const close = cleanPrice(row.TDD_CLSPRC);
  if (!ticker || close === null) {
    return undefined;
  }

  const volume = cleanNumeric(row.ACC_TRDVOL) ?? 0;
  const record: DailyPriceRecord = {
    ticker,
    name: row.ISU_ABBRV.trim(),
    market,
    tradeDate,
    open: cleanPrice(row.TDD_OPNPRC),
    high: cleanPrice(row.TDD_HGPRC),
    low: cleanPrice(row.TDD_LWPRC),
    close,
    volume,
    changeRate: cleanNumeric(row.FLUC_RT),
    changeAmount: cleanNumeric(row.CMPPREVDD_PRC),
    tradingValue: cleanNumeric(row.ACC_TRDVAL) ?? close * volume,
    marketCap: cleanNumeric(row.MKTCAP),
    sharesOutstanding: cleanNumeric(row.LIST_SHRS),
    currency: 'KRW',
    dataSource: 'KRX',
  };

  return isConsistent(record) ? record : undefined;
}
