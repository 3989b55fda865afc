/**
 * Logger for repository and connector diagnostics.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = '[sql-rowmap]';

/**
 * Logger that writes to the console.
 */
export const consoleLogger: Logger = {
  debug: (message) => console.debug(`${PREFIX} ${message}`),
  info: (message) => console.info(`${PREFIX} ${message}`),
  warn: (message) => console.warn(`${PREFIX} ${message}`),
  error: (message) => console.error(`${PREFIX} ${message}`),
};

/**
 * Silent logger that discards all output.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
