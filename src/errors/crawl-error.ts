import axios from 'axios';
import type { TaskError, TaskErrorKind } from '../types/tasks';

/**
 * Failure raised by a crawler implementation. Recorded on the task, never
 * surfaced to the HTTP caller.
 */
export class CrawlError extends Error {
  readonly kind: TaskErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: TaskErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CrawlError';
    this.kind = kind;
    this.details = details;
  }

  get retryable(): boolean {
    return this.kind === 'network' || this.kind === 'timeout' || this.kind === 'upstream';
  }
}

function fromAxiosError(error: unknown): CrawlError | undefined {
  if (!axios.isAxiosError(error)) {
    return undefined;
  }

  const details: Record<string, unknown> = {};
  if (error.code) details.code = error.code;
  if (error.config?.url) details.url = error.config.url;
  if (error.response) details.status = error.response.status;

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new CrawlError('timeout', error.message, details);
  }
  if (error.response) {
    return new CrawlError('upstream', `Upstream responded with HTTP ${error.response.status}`, details);
  }
  return new CrawlError('network', error.message, details);
}

/** Normalizes anything a crawler may throw into a CrawlError. */
export function toCrawlError(error: unknown): CrawlError {
  if (error instanceof CrawlError) {
    return error;
  }

  const fromAxios = fromAxiosError(error);
  if (fromAxios) {
    return fromAxios;
  }

  if (error instanceof Error) {
    return new CrawlError('unknown', error.message || error.name);
  }

  return new CrawlError('unknown', typeof error === 'string' && error ? error : 'Unknown error');
}

export function toTaskError(error: unknown): TaskError {
  const crawlError = toCrawlError(error);
  const taskError: TaskError = { kind: crawlError.kind, message: crawlError.message };
  if (crawlError.details && Object.keys(crawlError.details).length > 0) {
    taskError.details = crawlError.details;
  }
  return taskError;
}
