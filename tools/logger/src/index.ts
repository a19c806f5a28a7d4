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
}

/**
 * Build a Logger that writes to the console.
 * When a prefix is given it is prepended to every message.
 */
function createConsoleLogger(prefix?: string): Logger {
  const bind =
    (write: LogFn): LogFn =>
    (...args: unknown[]) =>
      prefix === undefined ? write(...args) : write(prefix, ...args);

  return new Logger({
    debug: bind(console.debug),
    info: bind(console.info),
    warn: bind(console.warn),
    error: bind(console.error),
  });
}

export { Logger, createConsoleLogger };
export type { LoggerMethods, LogFn };
