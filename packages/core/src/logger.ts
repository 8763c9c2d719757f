import type { Logger } from 'pino';
import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured log event through the root logger.
 *
 * The event name doubles as the log message so that plain-text sinks stay
 * readable; structured data lands under `data` where the redaction paths apply.
 * @param level - Log severity level
 * @param event - Event identifier, e.g. 'auth:token_refreshed'
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>,
): void {
  rootLogger[level]({ event, data }, event);
}

/**
 * Logs an error event with its stack and code.
 * @param context - Label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: Record<string, unknown>,
): void {
  const err =
    rawError instanceof Error ? rawError : new Error(String(rawError));
  rootLogger.error({ event: `error:${context}`, err, data: extra }, err.message);
}

/**
 * Creates a child logger bound to a scope, e.g. 'server:oauth'.
 * @param scope - Scope recorded on every line of the child
 * @public
 */
export function createScopedLogger(scope: string): Logger {
  return rootLogger.child({ scope });
}
