/**
 * Scoped console logger.
 *
 * Debug and info output stay silent unless debug logging is switched on,
 * either programmatically or through STOCKPILE_DEBUG=1. Warnings and errors
 * always reach the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  readonly scope: string;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

let enabled = false;

export function isDebugEnabled(): boolean {
  return enabled || process.env.STOCKPILE_DEBUG === '1';
}

/** Enable/disable debug logging programmatically (mostly for tests). */
export function setDebugEnabled(value: boolean): void {
  enabled = value;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    scope,
    debug(...args) {
      if (!isDebugEnabled()) return;
      console.debug(prefix, ...args);
    },
    info(...args) {
      if (!isDebugEnabled()) return;
      console.info(prefix, ...args);
    },
    warn(...args) {
      console.warn(prefix, ...args);
    },
    error(...args) {
      console.error(prefix, ...args);
    },
  };
}
