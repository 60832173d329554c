/**
 * Library logger.
 *
 * Components take an injected pino Logger and fall back to this one. The level
 * comes from RELAY_LLM_LOG_LEVEL (default "warn").
 */

import { pino, type Logger } from 'pino';

export type { Logger };

export const DEFAULT_LOG_LEVEL = 'warn';

export function createLogger(level: string = process.env.RELAY_LLM_LOG_LEVEL || DEFAULT_LOG_LEVEL): Logger {
  return pino({ name: 'relay-llm', level });
}

let defaultLogger: Logger | undefined;

/**
 * Shared logger, created on first use.
 */
export function getLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}
