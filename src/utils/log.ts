export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export type LogFn = (level: LogLevel, source: string, message: string, meta?: Record<string, unknown>) => void;

const RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Default sink: console, tagged with the source in brackets. */
export const consoleLog: LogFn = (level, source, message, meta) => {
  const line = `[${source}] ${message}`;
  const args: unknown[] = meta && Object.keys(meta).length > 0 ? [line, meta] : [line];
  switch (level) {
    case 'debug': console.debug(...args); break;
    case 'info': console.info(...args); break;
    case 'warn': console.warn(...args); break;
    case 'error': console.error(...args); break;
  }
};

/**
 * Logger bound to one source tag. Messages under the threshold are dropped
 * before they reach the sink.
 */
export class Logger {
  constructor(
    private readonly source: string,
    private readonly threshold: LogThreshold = 'warn',
    private readonly sink: LogFn = consoleLog,
  ) {}

  child(source: string): Logger {
    return new Logger(source, this.threshold, this.sink);
  }

  enabled(level: LogLevel): boolean {
    return RANK[level] >= RANK[this.threshold];
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (this.enabled(level)) {
      this.sink(level, this.source, message, meta);
    }
  }
}
