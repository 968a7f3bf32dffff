import { z } from 'zod';
import type { Market } from '../types/crawl';

const marketList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim().toUpperCase())
      .filter((item) => item.length > 0),
  )
  .pipe(z.array(z.enum(['KOSPI', 'KOSDAQ', 'KONEX'])).min(1));

const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  APP_NAME: z.string().min(1).default('Market Crawl Orchestrator'),
  APP_VERSION: z.string().min(1).default('1.0.0'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  TASK_STORE: z.enum(['memory', 'sqlite']).default('memory'),
  DB_PATH: z.string().min(1).default('data/tasks.db'),

  CRAWL_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  CRAWL_QUEUE_POLICY: z.enum(['queue', 'reject']).default('queue'),
  CRAWL_MAX_QUEUE: z.coerce.number().int().min(0).default(50),
  CRAWL_TIMEOUT_MS: z.coerce.number().int().min(0).default(600_000),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),

  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  USER_AGENT: z
    .string()
    .min(1)
    .default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36'),

  KRX_BASE_URL: z.string().url().default('http://data.krx.co.kr'),
  KRX_MARKETS: marketList.default('KOSPI,KOSDAQ'),

  RECORD_SINK_URL: z.string().url().optional(),
  RECORD_SINK_TOKEN: z.string().min(1).optional(),
  RECORD_SINK_BATCH_SIZE: z.coerce.number().int().positive().default(500),
});

type RawConfig = z.infer<typeof configSchema>;

export interface AppConfig {
  port: number;
  appName: string;
  version: string;
  logLevel: RawConfig['LOG_LEVEL'];
  taskStore: RawConfig['TASK_STORE'];
  dbPath: string;
  executor: {
    concurrency: number;
    queuePolicy: RawConfig['CRAWL_QUEUE_POLICY'];
    maxQueueSize: number;
    timeoutMs: number;
  };
  shutdownTimeoutMs: number;
  http: {
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    userAgent: string;
  };
  krx: {
    baseUrl: string;
    markets: Market[];
  };
  recordSink: {
    url?: string;
    token?: string;
    batchSize: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Empty strings count as unset so that `FOO=` in a .env file falls back to
 * the default.
 */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

export function parseConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }

  const raw = parsed.data;
  return {
    port: raw.PORT,
    appName: raw.APP_NAME,
    version: raw.APP_VERSION,
    logLevel: raw.LOG_LEVEL,
    taskStore: raw.TASK_STORE,
    dbPath: raw.DB_PATH,
    executor: {
      concurrency: raw.CRAWL_CONCURRENCY,
      queuePolicy: raw.CRAWL_QUEUE_POLICY,
      maxQueueSize: raw.CRAWL_MAX_QUEUE,
      timeoutMs: raw.CRAWL_TIMEOUT_MS,
    },
    shutdownTimeoutMs: raw.SHUTDOWN_TIMEOUT_MS,
    http: {
      timeoutMs: raw.REQUEST_TIMEOUT_MS,
      maxRetries: raw.MAX_RETRIES,
      retryBaseDelayMs: raw.RETRY_BASE_DELAY_MS,
      userAgent: raw.USER_AGENT,
    },
    krx: {
      baseUrl: raw.KRX_BASE_URL.replace(/\/+$/, ''),
      markets: Array.from(new Set(raw.KRX_MARKETS)),
    },
    recordSink: {
      url: raw.RECORD_SINK_URL,
      token: raw.RECORD_SINK_TOKEN,
      batchSize: raw.RECORD_SINK_BATCH_SIZE,
    },
  };
}
