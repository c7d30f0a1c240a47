import consola from "consola";

/**
 * Logger abstraction for wiregen
 *
 * Allows swapping between different logging implementations:
 * - consola (CLI) - Rich terminal output with colors and icons
 * - Prefixed (embedding) - Forward to a host tool's logger
 * - Silent logger (testing) - No-op for tests or silent mode
 */
export interface WiregenLogger {
  /** Log an informational message */
  info(message: string): void;
  /** Log a success message */
  success(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /** Log an error message */
  error(message: string): void;
  /** Log a "starting" message */
  start(message: string): void;
  /** Log a boxed message (for summaries) */
  box(options: { title: string; message: string }): void;
}

/**
 * Create a logger that uses consola for rich terminal output.
 * This is the default logger used by the CLI.
 */
export function createConsolaLogger(): WiregenLogger {
  return {
    info: (message) => consola.info(message),
    success: (message) => consola.success(message),
    warn: (message) => consola.warn(message),
    error: (message) => consola.error(message),
    start: (message) => consola.start(message),
    box: (options) => consola.box(options),
  };
}

/**
 * Minimal logger shape most build tools expose
 */
export interface LogSinkLike {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

/**
 * Create a logger that forwards to another tool's logger.
 * All messages are prefixed with [wiregen] for easy identification.
 */
export function createPrefixedLogger(sink: LogSinkLike): WiregenLogger {
  const prefix = "[wiregen]";

  return {
    info: (message) => sink.info(`${prefix} ${message}`),
    success: (message) => sink.info(`${prefix} ${message}`),
    warn: (message) => sink.warn(`${prefix} ${message}`),
    error: (message) => sink.error(`${prefix} ${message}`),
    start: (message) => sink.info(`${prefix} ${message}`),
    box: (options) => {
      sink.info(`${prefix} ${options.title}`);
      for (const line of options.message.split("\n")) {
        sink.info(`${prefix}   ${line}`);
      }
    },
  };
}

/**
 * Create a silent logger that does nothing.
 * Useful for testing or when output should be suppressed.
 */
export function createSilentLogger(): WiregenLogger {
  const noop = () => {};
  return {
    info: noop,
    success: noop,
    warn: noop,
    error: noop,
    start: noop,
    box: noop,
  };
}

/**
 * Default logger instance using consola.
 * Used when no logger is explicitly provided.
 */
export const defaultLogger = createConsolaLogger();
