/**
 * Structured logging utility.
 *
 * Every component of the orchestrator logs through this class. Entries are
 * single JSON lines on stderr so that stdout stays free for the MCP
 * JSON-RPC stream.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: diagnostic detail, emitted only in debug mode
 * - `info`: normal operation (transitions, agent calls)
 * - `warn`: recoverable conditions (rejected transitions, retried agent calls)
 * - `error`: failures an operator should look at
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
   * Name of the component that produced the entry.
   * @example "Orchestrator"
   */
  readonly component: string;

  /**
   * Snake-case event name.
   * @example "transition_committed"
   */
  readonly event: string;

  /**
   * Additional JSON-serializable context.
   * @example { userId: "u1", fromState: "onboarding" }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines. Defaults to stderr.
 */
export type LogSink = (line: string) => void;

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

  /** Line sink (injectable for testing). */
  readonly sink?: LogSink;

  /** Clock (injectable for testing). */
  readonly now?: () => Date;
}

function writeToStderr(line: string): void {
  process.stderr.write(line);
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Orchestrator', debugMode: true });
 * logger.info('transition_committed', { userId: 'u1', toState: 'project_generation' });
 * logger.error('persistence_failed', { userId: 'u1', operator_alert: true });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  /**
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? writeToStderr;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Returns a logger for a sub-component sharing this logger's settings.
   *
   * @param component - Name of the sub-component.
   */
  child(component: string): Logger {
    return new Logger({
      component,
      debugMode: this.debugMode,
      sink: this.sink,
      now: this.now,
    });
  }

  /** Whether debug entries are emitted. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   *
   * @param event - Snake-case event name.
   * @param data - Optional structured context.
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
      timestamp: this.now().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    this.sink(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, falling back to a data-less line when the payload
 * cannot be represented as JSON (circular references, BigInt).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Formats an unknown thrown value for a log entry.
 *
 * @param error - The caught value.
 * @returns A message string.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
