export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

type LoggerOptions = {
  verbose?: boolean;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;

  return {
    info: (message) => console.log(`[INFO] ${message}`),
    warn: (message) => console.warn(`[WARNING] ${message}`),
    error: (message) => console.error(`[ERROR] ${message}`),
    debug: (message) => {
      if (verbose) {
        console.debug(`[DEBUG] ${message}`);
      }
    }
  };
}

/** Logger that drops everything; for callers that do not report progress. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
