/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr so that hosts can collect engine
 * events alongside their own logs.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /** ISO 8601 timestamp when the entry was created. */
  readonly timestamp: string;
  /** Severity level of the entry. */
  readonly level: LogLevel;
  /**
   * Name of the component that generated this entry.
   * @example "InterviewEngine"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "interview_started"
   */
  readonly event: string;
  /** Additional JSON-serializable context. */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;
  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
  /** Function to get the current time (injectable for testing). */
  readonly now?: () => Date;
}

/**
 * Serializes an entry, replacing data that JSON.stringify cannot handle.
 */
function stringifyEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    );
  } catch (error) {
    const { data: _data, ...rest } = entry;
    return JSON.stringify({
      ...rest,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'InterviewEngine', debugMode: true });
 * logger.info('interview_started', { interviewId: 'new-registration' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Returns a logger for a sub-component sharing this logger's settings.
   *
   * @param component - Name of the sub-component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, now: this.now });
  }

  /** Whether debug entries are written. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. A no-op unless debugMode is enabled.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base = {
      timestamp: this.now().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data !== undefined ? { ...base, data } : base;
    process.stderr.write(stringifyEntry(entry) + '\n');
  }
}

/**
 * Creates a logger for a component.
 *
 * @param component - Component name.
 * @param debugMode - Whether debug entries are written.
 */
export function createLogger(component: string, debugMode = false): Logger {
  return new Logger({ component, debugMode });
}
