// ---------- Logger interface ----------

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const nullLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Console logger for `--debug` runs. Everything goes to stderr so that
 * report and JSON output on stdout stays clean.
 */
export function createConsoleLogger(prefix = "[givenergy]"): Logger {
  return {
    debug: (...args: unknown[]) => console.error(prefix, "debug:", ...args),
    info: (...args: unknown[]) => console.error(prefix, ...args),
    warn: (...args: unknown[]) => console.error(prefix, "warning:", ...args),
    error: (...args: unknown[]) => console.error(prefix, "error:", ...args),
  };
}

export interface LoggerOptions {
  /** Enable verbose/debug logging. Default: false */
  verbose?: boolean;
  /** Custom logger instance */
  logger?: Logger;
}

/** Pick the injected logger, else a console logger when verbose, else silence. */
export function resolveLogger(options: LoggerOptions): Logger {
  if (options.logger) {
    return options.logger;
  }
  return options.verbose ? createConsoleLogger() : nullLogger;
}
