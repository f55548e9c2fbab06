export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function formatMeta(meta: unknown[]): string {
  if (meta.length === 0) return '';
  const parts = meta.map((item) => {
    if (item instanceof Error) {
      return item.stack ?? `${item.name}: ${item.message}`;
    }
    if (typeof item === 'string') return item;
    try {
      return JSON.stringify(item);
    } catch {
      return String(item);
    }
  });
  return ` ${parts.join(' ')}`;
}

export class Logger {
  private threshold: number;

  constructor(
    private level: LogLevel = 'info',
    private scope?: string
  ) {
    this.threshold = LEVEL_ORDER[level];
  }

  /**
   * Derive a logger that prefixes every line with `[scope]`.
   */
  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write('debug', message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write('info', message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write('warn', message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown[]): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const prefix = this.scope ? `[${this.scope}] ` : '';
    const line = `${new Date().toISOString()} ${level.toUpperCase()} ${prefix}${message}${formatMeta(meta)}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}
