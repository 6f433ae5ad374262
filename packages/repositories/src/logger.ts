// Structured logging for repositories and stores

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type RepositoryLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console logger that drops entries below minLevel
 */
export function createConsoleLogger(options: { minLevel?: LogLevel } = {}): RepositoryLogger {
  const minLevel = LEVEL_ORDER[options.minLevel ?? 'debug'];
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= minLevel;

  return {
    debug(message, data) {
      if (enabled('debug')) console.debug(`[DEBUG] ${message}`, data ?? '');
    },
    info(message, data) {
      if (enabled('info')) console.info(`[INFO] ${message}`, data ?? '');
    },
    warn(message, data) {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, data ?? '');
    },
    error(message, data) {
      if (enabled('error')) console.error(`[ERROR] ${message}`, data ?? '');
    },
  };
}

/**
 * Default console logger implementation
 */
export const consoleLogger: RepositoryLogger = createConsoleLogger();

/**
 * Silent logger for testing
 */
export const silentLogger: RepositoryLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

export function createCapturingLogger(): RepositoryLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
