/**
 * Configuration for relay-llm.
 *
 * Environment variables:
 * - RELAY_LLM_FALLBACK: default chain, "provider:model,provider:model,..."
 * - RELAY_LLM_DEFAULT_MODEL: model used when nothing else names one
 * - RELAY_LLM_LOG_LEVEL: pino level for the library logger
 */

import { ConfigurationError } from './errors.js';
import type { FallbackConfig, ProviderChoice, RetryPolicy } from './types.js';

export const FALLBACK_ENV_VAR = 'RELAY_LLM_FALLBACK';
export const DEFAULT_MODEL_ENV_VAR = 'RELAY_LLM_DEFAULT_MODEL';
export const DEFAULT_MODEL = 'gpt-4.1';

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  initialBackoffMs: 500,
  maxBackoffMs: 8000,
  timeoutMs: 60000,
  jitter: true,
});

type Env = Record<string, string | undefined>;

/**
 * Parse one "provider:model" entry. The first colon separates the two, so model
 * names may contain colons.
 */
export function parseChoice(entry: string): ProviderChoice {
  const trimmed = entry.trim();
  const colonIndex = trimmed.indexOf(':');
  const provider = colonIndex === -1 ? '' : trimmed.substring(0, colonIndex).trim();
  const model = colonIndex === -1 ? '' : trimmed.substring(colonIndex + 1).trim();
  if (!provider || !model) {
    throw new ConfigurationError(
      `Invalid fallback entry '${trimmed}'. Expected 'provider:model'.`,
    );
  }
  return Object.freeze({ provider: provider.toLowerCase(), model });
}

/**
 * Parse a comma-separated chain such as "openai:gpt-4o,anthropic:claude-sonnet-4".
 */
export function parseFallbackChain(value: string): ProviderChoice[] {
  const chain = value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(parseChoice);
  if (chain.length === 0) {
    throw new ConfigurationError('Fallback chain is empty.');
  }
  return chain;
}

/**
 * The default chain from RELAY_LLM_FALLBACK, or undefined when unset or blank.
 */
export function fallbackChainFromEnv(env: Env = process.env): ProviderChoice[] | undefined {
  const value = env[FALLBACK_ENV_VAR];
  if (!value || value.trim() === '') {
    return undefined;
  }
  return parseFallbackChain(value);
}

/**
 * The default model from RELAY_LLM_DEFAULT_MODEL.
 */
export function defaultModelFromEnv(env: Env = process.env): string {
  const value = env[DEFAULT_MODEL_ENV_VAR]?.trim();
  return value || DEFAULT_MODEL;
}

/**
 * Merge a partial policy over the defaults and validate it.
 */
export function resolveRetryPolicy(partial: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy: RetryPolicy = {
    maxAttempts: partial.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    initialBackoffMs: partial.initialBackoffMs ?? DEFAULT_RETRY_POLICY.initialBackoffMs,
    maxBackoffMs: partial.maxBackoffMs ?? DEFAULT_RETRY_POLICY.maxBackoffMs,
    timeoutMs: partial.timeoutMs ?? DEFAULT_RETRY_POLICY.timeoutMs,
    jitter: partial.jitter ?? DEFAULT_RETRY_POLICY.jitter,
  };

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ConfigurationError(`maxAttempts must be an integer >= 1 (got ${policy.maxAttempts}).`);
  }
  if (!(policy.initialBackoffMs > 0)) {
    throw new ConfigurationError(`initialBackoffMs must be > 0 (got ${policy.initialBackoffMs}).`);
  }
  if (!(policy.maxBackoffMs >= policy.initialBackoffMs)) {
    throw new ConfigurationError(
      `maxBackoffMs (${policy.maxBackoffMs}) must be >= initialBackoffMs (${policy.initialBackoffMs}).`,
    );
  }
  if (!(policy.timeoutMs > 0)) {
    throw new ConfigurationError(`timeoutMs must be > 0 (got ${policy.timeoutMs}).`);
  }

  return Object.freeze(policy);
}

export interface FallbackConfigInput {
  chain: ReadonlyArray<ProviderChoice | string>;
  retry?: Partial<RetryPolicy>;
  allowMidStreamSwitch?: boolean;
}

/**
 * Build a frozen FallbackConfig. String entries use the "provider:model" form.
 */
export function resolveFallbackConfig(input: FallbackConfigInput): FallbackConfig {
  const chain = input.chain.map((entry): ProviderChoice => {
    if (typeof entry === 'string') {
      return parseChoice(entry);
    }
    if (!entry.provider || !entry.model) {
      throw new ConfigurationError('Each fallback choice needs a provider and a model.');
    }
    return Object.freeze({
      provider: entry.provider.toLowerCase(),
      model: entry.model,
      ...(entry.options ? { options: Object.freeze({ ...entry.options }) } : {}),
    });
  });

  if (chain.length === 0) {
    throw new ConfigurationError('Fallback chain must contain at least one choice.');
  }

  return Object.freeze({
    chain: Object.freeze(chain),
    retry: resolveRetryPolicy(input.retry),
    allowMidStreamSwitch: input.allowMidStreamSwitch ?? false,
  });
}
