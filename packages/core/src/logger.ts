import type { Logger } from './types.js';

/** Console logger with a bracketed component prefix. Debug output is opt-in. */
export function createConsoleLogger(prefix = '[TokenSim]', options: { debug?: boolean } = {}): Logger {
  const debugEnabled = options.debug ?? false;
  return {
    debug: (message, ...meta) => {
      if (debugEnabled) console.debug(`${prefix} ${message}`, ...meta);
    },
    info: (message, ...meta) => console.log(`${prefix} ${message}`, ...meta),
    warn: (message, ...meta) => console.warn(`${prefix} ${message}`, ...meta),
    error: (message, ...meta) => console.error(`${prefix} ${message}`, ...meta),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export const defaultLogger: Logger = createConsoleLogger();
