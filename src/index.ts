/**
 * relay-llm - one interface over many LLM providers, with retries and fallback
 *
 * Calls go through an ordered chain of provider choices. Each choice is retried
 * on transient failures with capped exponential backoff; the chain advances on
 * failures a retry cannot fix. Streams commit to a provider on its first event.
 *
 * @example
 * ```typescript
 * import { generate, chat, RelayLLM } from 'relay-llm';
 *
 * // Direct function API (stateless)
 * const response = await generate('Hello!', {
 *   fallback: ['openai:gpt-4o', 'anthropic:claude-sonnet-4'],
 * });
 *
 * // Streaming
 * const stream = chat([{ role: 'user', content: 'Hello!' }], { stream: true });
 * for await (const event of stream) {
 *   if (event.type === 'text') process.stdout.write(event.text);
 * }
 * const final = await stream.finalize();
 *
 * // Class API (reuses provider instances)
 * const llm = RelayLLM.create({ providers: { openai: { apiKey: 'test-secret' } } });
 * await llm.generate('Hello!', { model: 'gpt-4o' });
 * ```
 *
 * @module relay-llm
 * @packageDocumentation
 */

// =============================================================================
// Package Info
// =============================================================================

/** Package version */
export const VERSION = '0.1.0';

/** Package name */
export const PACKAGE_NAME = 'relay-llm';

// =============================================================================
// Main API
// =============================================================================

export {
  // Direct function API
  generate,
  chat,
  getSupportedProviders,
  resolveChain,

  // Class-based API
  RelayLLM,
  type CallOptions,
  type GenerateOptions,
  type ChatOptions,
  type RelayLLMOptions,
  type ResolvedChain,
} from './api.js';

export { ResponseStream, type StreamFrame, type StreamSource, type ResponseStreamOptions } from './stream.js';

export {
  FallbackEngine,
  isEventSequence,
  type AttemptFn,
  type AttemptContext,
  type AttemptResult,
  type FallbackEngineOptions,
  type RunOptions,
} from './fallback.js';

// =============================================================================
// Types
// =============================================================================

export type {
  // Provider types
  LLMProviderType,
  FetchLike,
  ProviderConfig,
  ProviderMetadata,

  // Message types
  MessageRole,
  Message,
  TextInputPart,
  ImageInputPart,
  InputPart,
  GenerationOptions,
  ProviderRequest,

  // Response types
  TextEvent,
  ImageEvent,
  ContentEvent,
  MetadataEvent,
  ProviderEvent,
  ResponsePart,
  CompletionUsage,
  LLMResponse,

  // Fallback types
  ProviderChoice,
  RetryPolicy,
  FallbackConfig,
  FailureKind,
  FailureClassification,
  ChoiceFailure,

  // Utility types
  ParsedModel,
} from './types.js';

export { RelayError, RelayErrorCode } from './types.js';

// =============================================================================
// Errors
// =============================================================================

export {
  MissingApiKeyError,
  UnsupportedProviderError,
  ConfigurationError,
  CancelledError,
  InvalidRequestError,
  AuthenticationError,
  ProviderRequestError,
  RateLimitError,
  ProviderUnavailableError,
  TimeoutError,
  FallbackExhaustedError,
  StreamInterruptedError,
  EmptyStreamError,
  StreamClosedError,
  isRelayError,
  isRateLimitError,
  classifyError,
  redactSecrets,
  wrapError,
} from './errors.js';

// =============================================================================
// Configuration, retry and usage helpers
// =============================================================================

export {
  FALLBACK_ENV_VAR,
  DEFAULT_MODEL_ENV_VAR,
  DEFAULT_MODEL,
  DEFAULT_RETRY_POLICY,
  parseChoice,
  parseFallbackChain,
  fallbackChainFromEnv,
  defaultModelFromEnv,
  resolveRetryPolicy,
  resolveFallbackConfig,
  type FallbackConfigInput,
} from './config.js';

export { computeBackoff, retryDelay, sleep, withTimeout } from './retry.js';
export { createLogger, getLogger, type Logger } from './logger.js';
export { createResponse, tagResponse, type ResponseInit } from './response.js';
export {
  normalizeUsage,
  estimateUsage,
  estimateCost,
  getModelPricing,
  type ModelPricing,
  type CostEstimate,
} from './usage.js';

// =============================================================================
// Registry (for advanced usage)
// =============================================================================

export {
  registerProvider,
  getProviderConstructor,
  hasProvider,
  getRegisteredProviders,
  createProvider,
  parseModelString,
  resolveProviderAndModel,
  inferProvider,
} from './registry.js';

// =============================================================================
// Providers (for advanced usage)
// =============================================================================

export {
  BaseProvider,
  type ProviderConstructor,
  type SendOptions,
  OpenAIProvider,
  DeepSeekProvider,
  TogetherProvider,
  XAIProvider,
  GroqProvider,
  OpenAICompatibleProvider,
  AnthropicProvider,
  GeminiProvider,
} from './providers/index.js';
