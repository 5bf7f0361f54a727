// src/core/logger.ts
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

export function createConsoleLogger(scope: string, options: ConsoleLoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  const verbose = options.verbose ?? false;

  return {
    debug: (message) => {
      if (verbose) console.log(`${prefix} ${message}`);
    },
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
    child: (childScope) => createConsoleLogger(childScope, options),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
