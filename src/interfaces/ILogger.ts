/**
 * Logger Interface
 *
 * Abstraction over the logging backend. Services and adapters depend on this
 * interface, never on pino directly, so tests can pass a silent logger.
 */

/**
 * Log metadata - structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Logger interface following the pino call shape: optional metadata first
 */
export interface ILogger {
  /**
   * Debug level - per-instrument fetch outcomes, cache hits
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - batch completed, cache refreshed, server lifecycle
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - degraded operation: fallback data served, live mode without credentials
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Error level - failed requests, unexpected exceptions
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Fatal level - the process cannot continue
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Logger Factory Interface
 */
export interface ILoggerFactory {
  /**
   * @param context - Optional component name (e.g., "MarketSnapshotService")
   */
  createLogger(context?: string): ILogger;
}
