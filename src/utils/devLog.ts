import { isDebugLoggingEnabled } from './getEnv';

export type DevLog = (context: string, details?: Record<string, unknown>) => void;

/**
 * Prefixed debug logger. Silent unless `SCHOOLDAY_DEBUG_LOGS=1` or outside production.
 */
export function createDevLog(prefix: string): DevLog {
  return (context, details) => {
    if (!isDebugLoggingEnabled()) return;
    if (details) {
      // eslint-disable-next-line no-console
      console.log(`${prefix} ${context}`, details);
    } else {
      // eslint-disable-next-line no-console
      console.log(`${prefix} ${context}`);
    }
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === 'string' && error.trim()) return error.trim();
  return 'unknown error';
}
