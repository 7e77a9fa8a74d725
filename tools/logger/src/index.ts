type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

/**
 * Build a Logger that writes to the console, dropping calls below `level`.
 */
function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (target: LogLevel) =>
    LOG_LEVEL_ORDER[target] >= LOG_LEVEL_ORDER[level];

  return new Logger({
    debug: enabled('debug') ? (...args) => console.debug(...args) : noop,
    info: enabled('info') ? (...args) => console.info(...args) : noop,
    warn: enabled('warn') ? (...args) => console.warn(...args) : noop,
    error: enabled('error') ? (...args) => console.error(...args) : noop,
  });
}

export { Logger, createConsoleLogger };
export type { LoggerMethods, LogFn, LogLevel };
