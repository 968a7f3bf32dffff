import { describe, expect, it } from 'vitest';
import { cleanNumeric, mapKrxRowToRecord } from '../../src/sites/krx/krx.mapper';
import type { KrxPriceRow } from '../../src/sites/krx/krx.site';

function row(overrides: Partial<KrxPriceRow> = {}): KrxPriceRow {
  return {
    ISU_SRT_CD: '000100',
    ISU_ABBRV: 'Alpha Holdings',
    MKT_NM: 'KOSPI',
    TDD_CLSPRC: '71,000',
    CMPPREVDD_PRC: '-500',
    FLUC_RT: '-0.70',
    TDD_OPNPRC: '71,500',
    TDD_HGPRC: '72,000',
    TDD_LWPRC: '70,800',
    ACC_TRDVOL: '12,345,678',
    ACC_TRDVAL: '876,543,210,000',
    MKTCAP: '423,000,000,000,000',
    LIST_SHRS: '5,969,782,550',
    ...overrides,
  };
}

describe('cleanNumeric', () => {
  it('parses numbers with separators and signs', () => {
    expect(cleanNumeric('1,234')).toBe(1234);
    expect(cleanNumeric('-0.70')).toBe(-0.7);
    expect(cleanNumeric('₩1,000')).toBe(1000);
  });

  it('maps placeholders and garbage to null', () => {
    expect(cleanNumeric(undefined)).toBeNull();
    expect(cleanNumeric('')).toBeNull();
    expect(cleanNumeric(' - ')).toBeNull();
    expect(cleanNumeric('n/a')).toBeNull();
  });
});

describe('mapKrxRowToRecord', () => {
  it('maps a complete row', () => {
    expect(mapKrxRowToRecord(row(), 'KOSPI', '2024-08-01')).toEqual({
      ticker: '000100',
      name: 'Alpha Holdings',
      market: 'KOSPI',
      tradeDate: '2024-08-01',
      open: 71_500,
      high: 72_000,
      low: 70_800,
      close: 71_000,
      volume: 12_345_678,
      changeRate: -0.7,
      changeAmount: -500,
      tradingValue: 876_543_210_000,
      marketCap: 423_000_000_000_000,
      sharesOutstanding: 5_969_782_550,
      currency: 'KRW',
      dataSource: 'KRX',
    });
  });

  it('skips rows without a close price', () => {
    expect(mapKrxRowToRecord(row({ TDD_CLSPRC: '-' }), 'KOSPI', '2024-08-01')).toBeUndefined();
    expect(mapKrxRowToRecord(row({ TDD_CLSPRC: undefined }), 'KOSPI', '2024-08-01')).toBeUndefined();
    expect(mapKrxRowToRecord(row({ ISU_SRT_CD: ' ' }), 'KOSPI', '2024-08-01')).toBeUndefined();
  });

  it('skips rows whose high or low contradict the other prices', () => {
    expect(mapKrxRowToRecord(row({ TDD_HGPRC: '70,900' }), 'KOSPI', '2024-08-01')).toBeUndefined();
    expect(mapKrxRowToRecord(row({ TDD_LWPRC: '71,200' }), 'KOSPI', '2024-08-01')).toBeUndefined();
  });

  it('treats zero open/high/low of untraded issues as missing', () => {
    const record = mapKrxRowToRecord(
      row({ TDD_OPNPRC: '0', TDD_HGPRC: '0', TDD_LWPRC: '0', ACC_TRDVOL: '0', ACC_TRDVAL: '0' }),
      'KOSDAQ',
      '2024-08-01',
    );

    expect(record).toMatchObject({ open: null, high: null, low: null, close: 71_000, volume: 0, tradingValue: 0 });
  });

  it('derives trading value when KRX omits it', () => {
    const record = mapKrxRowToRecord(
      row({ ACC_TRDVOL: '10', ACC_TRDVAL: undefined }),
      'KONEX',
      '2024-08-01',
    );
    expect(record?.tradingValue).toBe(710_000);
  });
});
