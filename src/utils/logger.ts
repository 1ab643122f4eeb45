/**
 * Structured logging utility for the feature lifecycle engine.
 *
 * Every component owns a {@link Logger} that writes one JSON object per line
 * to stderr, so stdout stays free for command output.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, only emitted in debug mode
 * - `info`: Normal operation, including expected policy outcomes such as a gate not being ready
 * - `warn`: Conditions that may need attention but do not stop the operation
 * - `error`: Failed operations
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2026-02-02T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that produced the entry.
   * @example "DecisionGate"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "decision_gate_approved"
   */
  readonly event: string;

  /**
   * Additional JSON-serializable context.
   * @example { slug: "mea-otp-checkout-recovery", phase: "decision_gate" }
   */
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
  readonly debugMode?: boolean | undefined;
}

/**
 * Serializes an entry, falling back to a reduced entry when the data cannot be
 * represented as JSON (circular references, BigInt values).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const fallback = {
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    };
    return JSON.stringify(fallback);
  }
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'FeatureEngine', debugMode: true });
 * logger.info('feature_created', { slug: 'mea-otp-checkout-recovery' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Turns debug output on or off after construction, so module-level loggers
   * can follow the loaded configuration.
   */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data === undefined ? base : { ...base, data };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

const registry = new Map<string, Logger>();
let defaultDebugMode = false;

/**
 * Returns the shared logger for a component, creating it on first use.
 *
 * @param component - Component name.
 * @returns The component's logger.
 */
export function getLogger(component: string): Logger {
  let logger = registry.get(component);
  if (logger === undefined) {
    logger = new Logger({ component, debugMode: defaultDebugMode });
    registry.set(component, logger);
  }
  return logger;
}

/**
 * Enables or disables debug output on every component logger, current and future.
 *
 * @param enabled - Whether debug entries should be written.
 */
export function setDebugLogging(enabled: boolean): void {
  defaultDebugMode = enabled;
  for (const logger of registry.values()) {
    logger.setDebugMode(enabled);
  }
}
