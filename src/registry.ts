/**
 * Provider registry for relay-llm.
 *
 * Handles provider lookup, instantiation and model-string resolution.
 */

import type { BaseProvider, ProviderConstructor } from './providers/base.js';
import type { LLMProviderType, ParsedModel, ProviderConfig } from './types.js';
import { ConfigurationError, UnsupportedProviderError } from './errors.js';
import { getLogger, type Logger } from './logger.js';

/**
 * Registry of provider constructors.
 */
const providerRegistry = new Map<string, ProviderConstructor>();

/**
 * Model-name prefixes that identify a provider.
 */
const MODEL_PREFIXES: ReadonlyArray<readonly [RegExp, LLMProviderType]> = [
  [/^claude/, 'anthropic'],
  [/^gemini/, 'gemini'],
  [/^(gpt|o1|o3|o4|chatgpt)/, 'openai'],
  [/^deepseek/, 'deepseek'],
  [/^grok/, 'xai'],
];

/**
 * Register a provider.
 *
 * @param name - Provider identifier
 * @param constructor - Provider constructor
 */
export function registerProvider(name: string, constructor: ProviderConstructor): void {
  providerRegistry.set(name.toLowerCase(), constructor);
}

/**
 * Get a registered provider constructor.
 */
export function getProviderConstructor(name: string): ProviderConstructor | undefined {
  return providerRegistry.get(name.toLowerCase());
}

/**
 * Check if a provider is registered.
 */
export function hasProvider(name: string): boolean {
  return providerRegistry.has(name.toLowerCase());
}

/**
 * Get all registered provider names.
 */
export function getRegisteredProviders(): string[] {
  return Array.from(providerRegistry.keys());
}

/**
 * Create a provider instance.
 *
 * @param name - Provider identifier
 * @param config - Provider configuration
 * @throws UnsupportedProviderError if provider is not registered
 */
export function createProvider(name: string, config: ProviderConfig = {}): BaseProvider {
  const Constructor = providerRegistry.get(name.toLowerCase());
  if (!Constructor) {
    throw new UnsupportedProviderError(name, getRegisteredProviders());
  }
  return new Constructor(config);
}

/**
 * Parse a "provider:model" string. The first colon separates the two, so model
 * ids may contain colons. Returns null unless the prefix is a registered
 * provider.
 */
export function parseModelString(model: string): ParsedModel | null {
  const colonIndex = model.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }
  const provider = model.substring(0, colonIndex).trim().toLowerCase();
  const modelId = model.substring(colonIndex + 1).trim();
  if (!provider || !modelId || !hasProvider(provider)) {
    return null;
  }
  return { provider, model: modelId };
}

/**
 * Guess the provider from a bare model name. Unknown names go to OpenAI, with a
 * warning.
 */
export function inferProvider(model: string, logger: Logger = getLogger()): string {
  const name = model.trim().toLowerCase();
  for (const [pattern, provider] of MODEL_PREFIXES) {
    if (pattern.test(name)) {
      return provider;
    }
  }
  logger.warn({ model }, 'Unknown model prefix, defaulting to openai');
  return 'openai';
}

/**
 * Resolve provider and model from request parameters.
 *
 * An explicit provider wins; then a "provider:model" prefix; then inference
 * from the model name.
 */
export function resolveProviderAndModel(
  model: string,
  provider?: LLMProviderType | string,
  logger?: Logger,
): ParsedModel {
  const trimmed = model.trim();
  if (!trimmed) {
    throw new ConfigurationError('Model name is empty.');
  }

  if (provider) {
    return {
      provider: provider.toLowerCase(),
      model: trimmed,
    };
  }

  const parsed = parseModelString(trimmed);
  if (parsed) {
    return parsed;
  }

  return { provider: inferProvider(trimmed, logger), model: trimmed };
}
