export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Sink for formatted lines. Defaults to stderr. */
  write?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.opts.level ?? 'info';
  }

  isEnabled(level: LogLevel): boolean {
    return levelRank[level] >= levelRank[this.level];
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const write = this.opts.write ?? ((line: string) => process.stderr.write(line));

    if (this.opts.json) {
      write(`${JSON.stringify({ timestamp, level, message, data })}\n`);
      return;
    }

    const line = data === undefined ? `${timestamp} ${level} ${message}` : `${timestamp} ${level} ${message} ${safeJson(data)}`;
    write(`${line}\n`);
  }
}

/**
 * `--verbose` wins over `--quiet`; quiet keeps errors only.
 */
export function resolveLogLevel(flags: { verbose?: boolean; quiet?: boolean }): LogLevel {
  if (flags.verbose) return 'debug';
  if (flags.quiet) return 'error';
  return 'warn';
}

/** Logger that drops everything; the default for library callers. */
export function silentLogger(): Logger {
  return new Logger({ level: 'error', write: () => {} });
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
