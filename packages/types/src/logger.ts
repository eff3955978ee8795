/**
 * Structured logging for Tessera.
 *
 * A zero-dependency logger that emits JSON entries with a level, message,
 * timestamp and optional component. Child loggers extend the component
 * path (`shortcode.render`).
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is emitted only when its level is greater
 * than or equal to the logger's threshold.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  /** Suppress all logging output. */
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A single structured log entry. */
export interface LogEntry {
  /** Level name (e.g. "DEBUG", "WARN"). */
  level: string;
  message: string;
  /** ISO 8601 timestamp. */
  timestamp: string;
  component?: string;
  /** Arbitrary contextual fields. */
  [key: string]: unknown;
}

/** Sink that receives each emitted {@link LogEntry}. */
export type LogOutput = (entry: LogEntry) => void;

// ─── Helpers ────────────────────────────────────────────────────────────────────

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/** Default output: JSON to stdout. */
const defaultOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry));
};

/**
 * Map a level name (`"debug"`, `"WARN"`, ...) to a {@link LogLevel}.
 * Returns `undefined` for names that are not levels.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVELS_BY_NAME[name.toLowerCase()];
}

// ─── Logger options ─────────────────────────────────────────────────────────────

/** Configuration options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  /** Custom output sink. Defaults to JSON via `console.log`. */
  output?: LogOutput;
}

// ─── Logger class ───────────────────────────────────────────────────────────────

/**
 * Structured logger with level filtering, contextual fields, and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'shortcode' });
 * log.debug('parsed document', { nodes: 12 });
 * log.child('render').warn('fallback used', { directive: 'gallery' });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? defaultOutput;
  }

  // ── Public API ──────────────────────────────────────────────────────────────

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger sharing this logger's level and output. The child's
   * component is `parent.child` when this logger already has one.
   */
  child(component: string): Logger {
    const childComponent = this.component
      ? `${this.component}.${component}`
      : component;

    return new Logger({
      level: this.level,
      component: childComponent,
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Whether an entry at `level` would currently be emitted. */
  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...fields,
    };

    this.output(entry);
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

/** Convenience wrapper around `new Logger(options)`. */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/** Shared logger at {@link LogLevel.INFO} with JSON output. */
export const defaultLogger: Logger = createLogger();
