/**
 * BackgammonLogger - Scoped console logging
 *
 * Debug output is off by default.
 *
 * @module backgammon/BackgammonLogger
 */

let debugEnabled = false;
let loggingEnabled = true;

/**
 * Enable or disable debug output
 */
export const setDebugLogging = (enabled: boolean): void => {
  debugEnabled = enabled;
};

/**
 * Enable or disable all output (tests and benchmarks)
 */
export const setLoggingEnabled = (enabled: boolean): void => {
  loggingEnabled = enabled;
};

export const isDebugEnabled = (): boolean => loggingEnabled && debugEnabled;

export interface BackgammonLogger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): BackgammonLogger {
  const prefix = `[${scope}]`;
  return {
    scope,
    debug(message, ...details) {
      if (isDebugEnabled()) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (loggingEnabled) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (loggingEnabled) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (loggingEnabled) console.error(prefix, message, ...details);
    },
  };
}
