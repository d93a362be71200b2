/**
 * Leveled logging for the command-line tool. Entries are single JSON lines on
 * stderr; the library itself does not log.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: levelFromEnv(process.env) });
 * logger.debug('check_start', { file: 'app.tot' });
 * ```
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/** A level, or `off` to silence everything. */
export type LogThreshold = LogLevel | 'off';

export interface LogEntry {
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly level: LogLevel;
  /** Short event identifier, e.g. "convert_done". */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Most verbose level that is emitted (default "info"). */
  level?: LogThreshold;
  /** Clock, injectable for testing. */
  now?: () => Date;
  /** Line sink (default: process.stderr). */
  write?: (line: string) => void;
}

/** Environment variable that sets the CLI log level. */
export const LOG_ENV = 'TOT_LOG';

const SEVERITY: Readonly<Record<LogThreshold, number>> = {
  off: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

function isThreshold(value: string): value is LogThreshold {
  return Object.hasOwn(SEVERITY, value);
}

/**
 * Read the threshold from `TOT_LOG`; unset or unknown values give `fallback`.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv, fallback: LogThreshold = 'debug'): LogThreshold {
  const raw = env[LOG_ENV]?.trim().toLowerCase();
  return raw !== undefined && isThreshold(raw) ? raw : fallback;
}

export class Logger {
  private readonly threshold: number;
  private readonly now: () => Date;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.threshold = SEVERITY[options.level ?? 'info'];
    this.now = options.now ?? ((): Date => new Date());
    this.write = options.write ?? ((line: string): void => void process.stderr.write(line));
  }

  enabled(level: LogLevel): boolean {
    return SEVERITY[level] <= this.threshold;
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  trace(event: string, data?: Record<string, unknown>): void {
    this.log('trace', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.enabled(level)) return;
    const entry: LogEntry = { timestamp: this.now().toISOString(), level, event, ...(data !== undefined ? { data } : {}) };
    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // circular or bigint data
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
      });
    }
    this.write(line + '\n');
  }
}
