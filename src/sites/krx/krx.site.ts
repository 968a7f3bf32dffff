import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { CrawlError } from '../../errors/crawl-error';
import type { Market } from '../../types/crawl';

const DAILY_PRICES_BLD = 'dbms/MDC/STAT/standard/MDCSTAT01501';
export const KRX_DATA_PATH = '/comm/bldAttendant/getJsonData.cmd';

const MARKET_IDS: Record<Market, string> = {
  KOSPI: 'STK',
  KOSDAQ: 'KSQ',
  KONEX: 'KNX',
};

const optionalText = z.string().optional();

const krxPriceRowSchema = z
  .object({
    ISU_SRT_CD: z.string(),
    ISU_ABBRV: z.string(),
    MKT_NM: optionalText,
    TDD_CLSPRC: optionalText,
    CMPPREVDD_PRC: optionalText,
    FLUC_RT: optionalText,
    TDD_OPNPRC: optionalText,
    TDD_HGPRC: optionalText,
    TDD_LWPRC: optionalText,
    ACC_TRDVOL: optionalText,
    ACC_TRDVAL: optionalText,
    MKTCAP: optionalText,
    LIST_SHRS: optionalText,
  })
  .passthrough();

export type KrxPriceRow = z.infer<typeof krxPriceRowSchema>;

const dailyPricesResponseSchema = z.object({
  OutBlock_1: z.array(krxPriceRowSchema).default([]),
});

export interface KrxSiteOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  /** Pre-built client; the other options are ignored when given. */
  client?: AxiosInstance;
}

/**
 * Client for the KRX market data service (data.krx.co.kr).
 */
export class KrxSite {
  private readonly client: AxiosInstance;

  constructor(options: KrxSiteOptions) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: {
          'User-Agent': options.userAgent,
          Referer: `${options.baseUrl}/contents/MDC/MDI/mdiLoader/index.cmd`,
        },
      });
  }

  /** All listed issues of `market` for one trade date (`YYYYMMDD`). */
  async fetchDailyPrices(market: Market, compactDate: string, signal?: AbortSignal): Promise<KrxPriceRow[]> {
    const form = new URLSearchParams({
      bld: DAILY_PRICES_BLD,
      locale: 'ko_KR',
      mktId: MARKET_IDS[market],
      trdDd: compactDate,
      share: '1',
      money: '1',
      csvxls_isNo: 'false',
    });

    const response = await this.client.post<unknown>(KRX_DATA_PATH, form.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8' },
      signal,
    });

    const parsed = dailyPricesResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new CrawlError('upstream', 'Unexpected KRX response shape', {
        market,
        tradeDate: compactDate,
        issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data.OutBlock_1;
  }
}
