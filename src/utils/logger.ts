/**
 * Scoped console logging.
 *
 * Stdout carries bookmark output, so every diagnostic goes to stderr.
 */

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export interface Logger {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => {
      if (verbose) console.error(prefix, ...args);
    },
    warn: (...args) => console.warn(prefix, ...args),
  };
}
