/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr so that loader and validator
 * events can be collected alongside the rendered errors.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: detailed diagnostic information, only written in debug mode
 * - `info`: normal operation
 * - `warn`: conditions that do not stop the operation
 * - `error`: failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;
  readonly level: LogLevel;
  /**
   * Component that produced the entry.
   * @example "ModuleLoader"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "module_loaded"
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
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ModuleLoader', debugMode: true });
 * logger.debug('module_loaded', { module: 'com.example' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /** Whether debug-level entries are written. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. Only written when debugMode is enabled.
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
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data === undefined ? {} : { data }),
    };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry to a single JSON line. Data that cannot be
 * serialized (cycles, BigInt) is replaced by a marker and the reason.
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { data: _data, ...base } = entry;
    return JSON.stringify({
      ...base,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Default logger instance for library code that is not handed one.
 */
export const logger = new Logger({ component: 'Theta', debugMode: false });
