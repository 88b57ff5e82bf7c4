/**
 * Diagnostics for traversals and file operations.
 *
 * A Logger is handed to each operation through its options and travels with
 * the traversal context; there is no module-level logger to reconfigure.
 * The level is fixed when the logger is created.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  /** Minimum level written. Default: 'info' */
  readonly level?: LogLevel;
  /** Receives each formatted line, without a trailing newline */
  readonly write: (line: string) => void;
  /** Clock used for timestamps. Default: () => new Date() */
  readonly now?: () => Date;
}

/** Lines look like `2024-05-01T10:00:00.000Z - WARNING - message`. */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = SEVERITY[options.level ?? 'info'];
  const now = options.now ?? (() => new Date());

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (SEVERITY[level] < threshold) return;
    const label = level === 'warn' ? 'WARNING' : level.toUpperCase();
    options.write(`${now().toISOString()} - ${label} - ${message}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message, err) => {
      emit('error', message);
      // Stack traces only when debugging
      if (err instanceof Error && err.stack && threshold <= SEVERITY.debug) {
        emit('debug', err.stack);
      }
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
