type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

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
   * Logger that drops every message. Used as the default where a logger is optional.
   */
  static silent(): Logger {
    const noop: LogFn = () => {};
    return new Logger({ debug: noop, info: noop, warn: noop, error: noop });
  }
}

export { Logger };
export type { LoggerMethods, LogFn };
