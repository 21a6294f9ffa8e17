/**
 * Logging seam for the order codec.
 * Decoders default to {@link consoleLogger}; hosts pass their own logger through the
 * decoder options to route messages elsewhere, and tests use {@link silentLogger}
 * or a spy.
 */

export interface OrderLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Forwards to the global console. Debug output is only emitted when `enableDebug` is set,
 * since the decoder traces every order it reads.
 */
export function createConsoleLogger(enableDebug = false): OrderLogger {
  return {
    debug: (message) => {
      if (enableDebug) {
        console.debug(message);
      }
    },
    info: (message) => console.info(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  };
}

export const consoleLogger: OrderLogger = createConsoleLogger();

export const silentLogger: OrderLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
