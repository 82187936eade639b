/**
 * Environment-aware logger utility
 * Debug output only when LOOKUP_ENUMS_DEBUG is set; warnings and errors always go to stderr
 */

let debugEnabled = process.env.LOOKUP_ENUMS_DEBUG === '1' || process.env.NODE_ENV === 'development';

export const logger = {
  debug: (...args: unknown[]) => {
    if (debugEnabled) console.debug(...args);
  },
  info: (...args: unknown[]) => {
    console.info(...args);
  },
  warn: (...args: unknown[]) => {
    console.warn(...args); // Always show warnings
  },
  error: (...args: unknown[]) => {
    console.error(...args); // Always show errors
  },
};

export type Logger = typeof logger;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export default logger;
