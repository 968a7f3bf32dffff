export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function currentLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'info';
}

function serializeMeta(meta: unknown): string {
  if (meta === undefined) {
    return '';
  }

  try {
    return ` ${JSON.stringify(meta, (_key, value: unknown) => {
      if (value instanceof Error) {
        return { name: value.name, message: value.message, stack: value.stack };
      }
      return value;
    })}`;
  } catch {
    return ` ${String(meta)}`;
  }
}

export class Logger {
  constructor(private readonly context: Record<string, unknown> = {}) {}

  debug(message: string, meta?: Record<string, unknown>) {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown) {
    this.write('error', message, meta);
  }

  /**
   * Logger whose context is merged into every entry, e.g. `{ taskId }`.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...context });
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) {
      return;
    }

    const merged = this.merge(meta);
    const line = `[${level.toUpperCase()}] ${new Date().toISOString()} - ${message}${serializeMeta(merged)}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  private merge(meta: unknown): unknown {
    if (Object.keys(this.context).length === 0) {
      return meta;
    }
    if (meta === undefined) {
      return this.context;
    }
    if (meta !== null && typeof meta === 'object' && !Array.isArray(meta) && !(meta instanceof Error)) {
      return { ...this.context, ...meta };
    }
    return { ...this.context, meta };
  }
}

export const logger = new Logger();
