/**
 * Diagnostics sink used by the HTTP adapter.
 *
 * The SDK itself writes nothing unless a logger is configured.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Logger that writes through the console, prefixed with the SDK name
 */
export const consoleLogger: Logger = {
  debug: (message, context) => {
    console.debug(`[fxtrade-sdk] ${message}`, context ?? '');
  },
  warn: (message, context) => {
    console.warn(`[fxtrade-sdk] ${message}`, context ?? '');
  },
  error: (message, context) => {
    console.error(`[fxtrade-sdk] ${message}`, context ?? '');
  },
};
