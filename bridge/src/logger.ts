// ============================================================================
// TsuryPhone Bridge - Logging
// Thin wrapper over console that stamps every line with a component prefix
// ("[DeviceSession 10.0.0.5:80] ..."). Debug lines are dropped unless
// debug logging has been switched on from config.
// ============================================================================

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

let debugEnabled = false;

/** Toggle debug output for every logger, including ones already created */
export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

/** Create a logger whose lines start with `[prefix]` */
export function createLogger(prefix: string): Logger {
  const tag = `[${prefix}]`;
  return {
    debug: (...args) => {
      if (debugEnabled) console.log(tag, ...args);
    },
    info: (...args) => console.log(tag, ...args),
    warn: (...args) => console.warn(tag, ...args),
    error: (...args) => console.error(tag, ...args),
  };
}
