/**
 * Console logging.
 *
 * Debug output is printed in dev builds, or in any build started with
 * `VITE_DEBUG_LOGS=true`. Errors are always printed.
 */

const DEBUG_ENABLED = import.meta.env.DEV || import.meta.env.VITE_DEBUG_LOGS === 'true';

const PREFIX = '[drift-field]';

export function isDebugEnabled(): boolean {
  return DEBUG_ENABLED;
}

export function debugLog(...args: unknown[]): void {
  if (DEBUG_ENABLED) console.log(PREFIX, ...args);
}

export function debugWarn(...args: unknown[]): void {
  if (DEBUG_ENABLED) console.warn(PREFIX, ...args);
}

/**
 * Reports a failure that stopped part of the app, with the thrown value when
 * there is one.
 */
export function logError(message: string, error?: unknown): void {
  if (error === undefined) {
    console.error(PREFIX, message);
  } else {
    console.error(PREFIX, message, error);
  }
}
