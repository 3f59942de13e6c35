export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  error(message: string): void;
}

/**
 * Console logger. Everything goes to stderr so diagnostics never mix with
 * what the running program prints on stdout.
 */
export function createLogger(verbose = false): Logger {
  return {
    debug: (message) => {
      if (verbose) {
        console.error(message);
      }
    },
    info: (message) => console.error(message),
    error: (message) => console.error(message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  error: () => undefined,
};
