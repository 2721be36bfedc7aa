// Interview Dialogue Engine - Logging
// Every component takes a Logger so tests can inject silent vi.fn() loggers.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug?(message: string, ...args: unknown[]): void;
}

/**
 * Console-backed logger. Lines look like `[INFO] [SessionManager] message`.
 * Debug output is only written when `debug` is true.
 */
export function createConsoleLogger(component: string, options: { debug?: boolean } = {}): Logger {
  const prefix = (level: string) => `[${level}] [${component}]`;
  const logger: Logger = {
    info: (msg, ...args) => console.log(`${prefix("INFO")} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix("WARN")} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix("ERROR")} ${msg}`, ...args),
  };
  if (options.debug) {
    logger.debug = (msg, ...args) => console.debug(`${prefix("DEBUG")} ${msg}`, ...args);
  }
  return logger;
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
