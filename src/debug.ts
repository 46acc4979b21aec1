/**
 * Debug logging
 *
 * Logs only when the `debug` configuration flag is set, the DEBUG
 * environment variable mentions identity-testing, or IDENTITY_TESTING_DEBUG
 * is `1` or `true`. Loggers read the environment once, when created.
 */

import { isDebugConfigured } from './api.js';

export interface DebugLogger {
  (message: string, data?: Record<string, unknown>): void;
  /** Whether a call would print; check it before building a costly payload */
  enabled(): boolean;
}

function isDebugEnvSet(): boolean {
  const debugEnv = process.env['DEBUG'];
  const scopedEnv = process.env['IDENTITY_TESTING_DEBUG'];
  return debugEnv?.includes('identity-testing') === true || scopedEnv === '1' || scopedEnv === 'true';
}

/**
 * Whether debug output is currently enabled
 */
export function isDebugEnabled(): boolean {
  return isDebugConfigured() || isDebugEnvSet();
}

/**
 * Create a debug logger for one module
 *
 * @param scope - Suffix shown in the log prefix, e.g. `freivalds`
 */
export function createDebugLogger(scope: string): DebugLogger {
  const fromEnv = isDebugEnvSet();
  const enabled = (): boolean => fromEnv || isDebugConfigured();

  const log = (message: string, data?: Record<string, unknown>): void => {
    if (!enabled()) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [identity-testing:${scope}]`;
    if (data) {
      console.debug(`${prefix} ${message}`, data);
    } else {
      console.debug(`${prefix} ${message}`);
    }
  };

  return Object.assign(log, { enabled });
}
