// Structured logging for the resolver

/**
 * Structured logger interface.
 * Hosts usually pass an adapter around their own log; tests pass the
 * silent or capturing logger.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = keyof Logger;

/**
 * Create a console logger that tags every line with a scope.
 */
export function createConsoleLogger(scope = 'station-locale'): Logger {
  const line = (level: LogLevel, message: string) => `[${level.toUpperCase()}] [${scope}] ${message}`;

  return {
    debug(message, data) {
      console.debug(line('debug', message), data ?? '');
    },
    info(message, data) {
      console.info(line('info', message), data ?? '');
    },
    warn(message, data) {
      console.warn(line('warn', message), data ?? '');
    },
    error(message, data) {
      console.error(line('error', message), data ?? '');
    },
  };
}

export const consoleLogger: Logger = createConsoleLogger();

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
};

export type CapturingLogger = Logger & {
  entries: LogEntry[];
  /** Messages logged at one level, in order */
  messages(level: LogLevel): string[];
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): CapturingLogger {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({ level, message, data });
  };

  return {
    entries,
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
