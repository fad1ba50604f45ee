/** Severity levels understood by the logger, lowest first. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Minimal logging surface shared by the engine and its collaborators. */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/** The subset of `console` a logger writes to. Swappable in tests. */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Create a logger that prefixes every line with `[scope]` and drops anything
 * below `level`.
 */
export function createLogger(scope: string, level: LogLevel = 'info', sink: LogSink = console): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${scope}]`;

  const write = (at: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[at] < threshold) return;
    sink[at](`${prefix} ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
