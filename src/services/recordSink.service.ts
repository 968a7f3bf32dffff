import axios, { AxiosInstance } from 'axios';
import type { DailyPriceRecord, RecordSink, SinkWriteResult } from '../types/crawl';
import { logger } from '../utils/logger';
import { mapPriceRecordToApiRequest } from './api-mappers/price-api.mapper';

interface BaseResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

export interface HttpRecordSinkOptions {
  url: string;
  token?: string;
  batchSize: number;
  timeoutMs: number;
  crawlerName?: string;
  client?: AxiosInstance;
}

function describeFailure(error: unknown): { message: string; status?: number } {
  if (axios.isAxiosError<BaseResponse<unknown>>(error)) {
    const body = error.response?.data;
    return {
      message: body?.message || body?.error || error.message,
      status: error.response?.status,
    };
  }
  return { message: error instanceof Error ? error.message : String(error) };
}

/**
 * Posts price records in batches to the ingestion API. A failed batch is
 * counted and logged; the remaining batches are still sent.
 */
export class HttpRecordSink implements RecordSink {
  private readonly client: AxiosInstance;
  private readonly headers: Record<string, string> = { 'Content-Type': 'application/json' };

  constructor(private readonly options: HttpRecordSinkOptions) {
    if (options.token) {
      this.headers.Authorization = `Bearer ${options.token}`;
    }

    this.client = options.client ?? axios.create({ timeout: options.timeoutMs });

    logger.info('HttpRecordSink initialized', { url: options.url, batchSize: options.batchSize });
  }

  async write(records: DailyPriceRecord[], signal?: AbortSignal): Promise<SinkWriteResult> {
    const result: SinkWriteResult = { written: 0, failed: 0 };
    const batchSize = Math.max(1, this.options.batchSize);

    for (let start = 0; start < records.length; start += batchSize) {
      const batch = records.slice(start, start + batchSize);
      if (signal?.aborted) {
        result.failed += records.length - start;
        break;
      }

      try {
        const response = await this.client.post<BaseResponse<unknown>>(
          this.options.url,
          { records: batch.map((record) => mapPriceRecordToApiRequest(record, this.options.crawlerName)) },
          { headers: this.headers, signal },
        );

        if (response.data?.success === false) {
          logger.warn('Record batch rejected by ingestion API', {
            offset: start,
            size: batch.length,
            response: response.data,
          });
          result.failed += batch.length;
          continue;
        }
        result.written += batch.length;
      } catch (error) {
        const { message, status } = describeFailure(error);
        logger.error('Failed to write record batch', { offset: start, size: batch.length, error: message, status });
        result.failed += batch.length;
      }
    }

    return result;
  }
}

/**
 * Sink used when no ingestion API is configured: records are only counted
 * and summarized in the log.
 */
export class LogRecordSink implements RecordSink {
  async write(records: DailyPriceRecord[]): Promise<SinkWriteResult> {
    const byMarket: Record<string, number> = {};
    for (const record of records) {
      byMarket[record.market] = (byMarket[record.market] ?? 0) + 1;
    }
    logger.info('Price records collected', { count: records.length, byMarket });
    return { written: records.length, failed: 0 };
  }
}
