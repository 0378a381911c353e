type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
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

  /**
   * Returns a logger that drops every call below `level`.
   */
  withLevel(level: LogLevel): Logger {
    const threshold = LEVEL_ORDER[level];
    const pick = (name: Exclude<LogLevel, 'silent'>, fn: LogFn): LogFn =>
      LEVEL_ORDER[name] >= threshold ? fn : noop;

    return new Logger({
      debug: pick('debug', this.debug),
      info: pick('info', this.info),
      warn: pick('warn', this.warn),
      error: pick('error', this.error),
    });
  }
}

/**
 * Console-backed logger filtered at `level`.
 */
function createConsoleLogger(level: LogLevel = 'info'): Logger {
  return new Logger({
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  }).withLevel(level);
}

export { Logger, createConsoleLogger, LEVEL_ORDER };
export type { LoggerMethods, LogFn, LogLevel };
