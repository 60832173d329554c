/**
 * Main API for relay-llm.
 *
 * Provides both function-based and class-based interfaces. Every call runs
 * through a FallbackEngine over a chain of provider choices, even when the
 * chain has a single entry.
 */

import {
  registerProvider,
  createProvider,
  getRegisteredProviders,
  hasProvider,
  resolveProviderAndModel,
} from './registry.js';
import type { BaseProvider } from './providers/base.js';
import { AnthropicProvider } from './providers/anthropic.js';
import { GeminiProvider } from './providers/gemini.js';
import {
  DeepSeekProvider,
  GroqProvider,
  OpenAICompatibleProvider,
  OpenAIProvider,
  TogetherProvider,
  XAIProvider,
} from './providers/openai.js';
import { defaultModelFromEnv, fallbackChainFromEnv, parseChoice, resolveFallbackConfig } from './config.js';
import { InvalidRequestError, UnsupportedProviderError } from './errors.js';
import { FallbackEngine, type AttemptFn } from './fallback.js';
import { getLogger, type Logger } from './logger.js';
import { estimatePromptChars } from './response.js';
import type { ResponseStream } from './stream.js';
import type {
  FetchLike,
  GenerationOptions,
  ImageInputPart,
  InputPart,
  LLMProviderType,
  LLMResponse,
  Message,
  ProviderChoice,
  ProviderConfig,
  ProviderRequest,
  RetryPolicy,
} from './types.js';

// =============================================================================
// Provider Registration
// =============================================================================

// Register built-in providers
registerProvider('openai', OpenAIProvider);
registerProvider('anthropic', AnthropicProvider);
registerProvider('gemini', GeminiProvider);
registerProvider('deepseek', DeepSeekProvider);
registerProvider('together', TogetherProvider);
registerProvider('xai', XAIProvider);
registerProvider('groq', GroqProvider);
registerProvider('openai-compatible', OpenAICompatibleProvider);

// =============================================================================
// Options
// =============================================================================

/**
 * Options shared by `generate` and `chat`.
 */
export interface CallOptions {
  /** Model id, optionally as "provider:model" */
  model?: string;
  /** Provider for `model`; inferred from the name when omitted */
  provider?: LLMProviderType | string;
  /** Ordered chain of choices; takes precedence over `model` */
  fallback?: ReadonlyArray<ProviderChoice | string>;
  retry?: Partial<RetryPolicy>;
  allowMidStreamSwitch?: boolean;
  /** Generation options; a choice's own options override these */
  options?: GenerationOptions;
  system?: string;
  /** Key for the single provider named by `model` */
  apiKey?: string;
  /** Endpoint for the single provider named by `model` */
  baseUrl?: string;
  signal?: AbortSignal;
  logger?: Logger;
  fetch?: FetchLike;
  stream?: boolean;
}

export interface GenerateOptions extends CallOptions {
  images?: ImageInputPart[];
}

export type ChatOptions = CallOptions;

export interface RelayLLMOptions {
  /** Per-provider configuration (keys, base URLs, extra settings) */
  providers?: Record<string, ProviderConfig>;
  fetch?: FetchLike;
  retry?: Partial<RetryPolicy>;
  /** Client-wide default chain, used when a call names neither fallback nor model */
  fallback?: ReadonlyArray<ProviderChoice | string>;
  allowMidStreamSwitch?: boolean;
  logger?: Logger;
  /** Source of randomness for backoff jitter */
  random?: () => number;
}

type Env = Record<string, string | undefined>;

export interface ResolvedChain {
  chain: ProviderChoice[];
  /** True when the chain came from `model` or the default model */
  single: boolean;
}

/**
 * Pick the chain for a call: explicit fallback, then explicit model, then the
 * client default chain, then RELAY_LLM_FALLBACK, then the default model.
 */
export function resolveChain(
  options: Pick<CallOptions, 'fallback' | 'model' | 'provider' | 'baseUrl'>,
  clientFallback?: ReadonlyArray<ProviderChoice | string>,
  logger?: Logger,
  env: Env = process.env,
): ResolvedChain {
  const normalize = (entries: ReadonlyArray<ProviderChoice | string>): ProviderChoice[] =>
    entries.map(entry => (typeof entry === 'string' ? parseChoice(entry) : entry));

  if (options.fallback && options.fallback.length > 0) {
    return { chain: normalize(options.fallback), single: false };
  }

  const single = (model: string): ResolvedChain => {
    const provider = options.provider ?? (options.baseUrl && !model.includes(':') ? 'openai-compatible' : undefined);
    const resolved = resolveProviderAndModel(model, provider, logger);
    return { chain: [{ provider: resolved.provider, model: resolved.model }], single: true };
  };

  if (options.model) {
    return single(options.model);
  }
  if (clientFallback && clientFallback.length > 0) {
    return { chain: normalize(clientFallback), single: false };
  }
  const fromEnv = fallbackChainFromEnv(env);
  if (fromEnv) {
    return { chain: fromEnv, single: false };
  }
  return single(defaultModelFromEnv(env));
}

function mergeRetry(base: Partial<RetryPolicy> = {}, override: Partial<RetryPolicy> = {}): Partial<RetryPolicy> {
  return {
    maxAttempts: override.maxAttempts ?? base.maxAttempts,
    initialBackoffMs: override.initialBackoffMs ?? base.initialBackoffMs,
    maxBackoffMs: override.maxBackoffMs ?? base.maxBackoffMs,
    timeoutMs: override.timeoutMs ?? base.timeoutMs,
    jitter: override.jitter ?? base.jitter,
  };
}

function validateMessages(messages: readonly Message[]): void {
  if (messages.length === 0) {
    throw new InvalidRequestError('At least one message is required.');
  }
  for (const message of messages) {
    if (message.role !== 'system' && message.role !== 'user' && message.role !== 'assistant') {
      throw new InvalidRequestError(`Unknown message role '${String(message.role)}'.`);
    }
  }
}

// =============================================================================
// Class-based API
// =============================================================================

/**
 * RelayLLM client.
 *
 * Holds provider instances and defaults so they are reused across calls.
 * Concurrent calls share only these read-only handles.
 *
 * @example
 * ```typescript
 * const llm = RelayLLM.create({
 *   providers: { openai: { apiKey: 'test-secret' } },
 *   fallback: ['openai:gpt-4o', 'anthropic:claude-sonnet-4'],
 * });
 *
 * const response = await llm.generate('Hello!');
 * ```
 */
export class RelayLLM {
  private readonly options: RelayLLMOptions;
  private readonly providers = new Map<string, BaseProvider>();
  private readonly log: Logger;

  private constructor(options: RelayLLMOptions) {
    this.options = options;
    this.log = options.logger ?? getLogger();
  }

  /**
   * Create a client.
   */
  static create(options: RelayLLMOptions = {}): RelayLLM {
    return new RelayLLM(options);
  }

  /**
   * Get list of supported providers.
   */
  static getSupportedProviders(): string[] {
    return getRegisteredProviders();
  }

  /**
   * Single-turn generation from a prompt and optional images.
   */
  generate(prompt: string, options: GenerateOptions & { stream: true }): ResponseStream;
  generate(prompt: string, options?: GenerateOptions & { stream?: false }): Promise<LLMResponse>;
  generate(prompt: string, options?: GenerateOptions): Promise<LLMResponse> | ResponseStream;
  generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResponse> | ResponseStream {
    const images = options.images ?? [];
    const content: string | InputPart[] = images.length > 0
      ? [...(prompt ? [{ type: 'text' as const, text: prompt }] : []), ...images]
      : prompt;
    if (typeof content === 'string' && content.trim() === '') {
      return this.fail(new InvalidRequestError('Prompt is empty.'), options.stream);
    }
    return this.chat([{ role: 'user', content }], options);
  }

  /**
   * Multi-turn chat.
   */
  chat(messages: Message[], options: ChatOptions & { stream: true }): ResponseStream;
  chat(messages: Message[], options?: ChatOptions & { stream?: false }): Promise<LLMResponse>;
  chat(messages: Message[], options?: ChatOptions): Promise<LLMResponse> | ResponseStream;
  chat(messages: Message[], options: ChatOptions = {}): Promise<LLMResponse> | ResponseStream {
    let engine: FallbackEngine;
    let attempt: AttemptFn;
    try {
      validateMessages(messages);
      ({ engine, attempt } = this.prepare(messages, options));
    } catch (error) {
      return this.fail(error, options.stream);
    }

    const runOptions = {
      signal: options.signal,
      promptChars: estimatePromptChars(messages, options.system),
    };
    return options.stream ? engine.stream(attempt, runOptions) : engine.run(attempt, runOptions);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Setup errors surface as a thrown error for streams and a rejection otherwise.
   */
  private fail(error: unknown, stream: boolean | undefined): Promise<LLMResponse> {
    if (stream) {
      throw error;
    }
    return Promise.reject(error);
  }

  private prepare(messages: Message[], options: ChatOptions): { engine: FallbackEngine; attempt: AttemptFn } {
    const log = options.logger ?? this.log;
    const { chain, single } = resolveChain(options, this.options.fallback, log);
    const config = resolveFallbackConfig({
      chain,
      retry: mergeRetry(this.options.retry, options.retry),
      allowMidStreamSwitch: options.allowMidStreamSwitch ?? this.options.allowMidStreamSwitch,
    });

    for (const choice of config.chain) {
      if (!hasProvider(choice.provider)) {
        throw new UnsupportedProviderError(choice.provider, getRegisteredProviders());
      }
    }

    const overrides: ProviderConfig = {};
    if (single && options.apiKey) overrides.apiKey = options.apiKey;
    if (single && options.baseUrl) overrides.baseUrl = options.baseUrl;
    if (!single && (options.apiKey || options.baseUrl)) {
      log.debug('apiKey and baseUrl apply to single-model calls only; using provider configuration');
    }
    const fetchImpl = options.fetch;

    const attempt: AttemptFn = (choice, context) => {
      const provider = this.providerFor(choice.provider, overrides, fetchImpl);
      const request: ProviderRequest = {
        model: choice.model,
        messages,
        ...(options.system ? { system: options.system } : {}),
        options: { ...options.options, ...choice.options },
      };
      return provider.send(request, { stream: context.stream, signal: context.signal });
    };

    const engine = new FallbackEngine(config, { logger: log, random: this.options.random });
    return { engine, attempt };
  }

  /**
   * Provider instance for a name. Calls without per-call overrides share one
   * instance per provider.
   */
  private providerFor(name: string, overrides: ProviderConfig, fetchImpl: FetchLike | undefined): BaseProvider {
    const shared = Object.keys(overrides).length === 0 && !fetchImpl;
    if (shared) {
      const cached = this.providers.get(name);
      if (cached) return cached;
    }

    const config: ProviderConfig = {
      ...this.options.providers?.[name],
      ...overrides,
    };
    const handle = fetchImpl ?? this.options.fetch;
    if (handle) {
      config.fetch = handle;
    }

    const provider = createProvider(name, config);
    if (shared) {
      this.providers.set(name, provider);
    }
    return provider;
  }
}

// =============================================================================
// Direct API Functions
// =============================================================================

/**
 * Generate a response from a single prompt.
 *
 * A new client is created for each call (stateless).
 *
 * @example
 * ```typescript
 * const response = await generate('Say hello', { model: 'anthropic:claude-sonnet-4' });
 *
 * const stream = generate('Tell me a story', { stream: true });
 * for await (const event of stream) {
 *   if (event.type === 'text') process.stdout.write(event.text);
 * }
 * ```
 */
export function generate(prompt: string, options: GenerateOptions & { stream: true }): ResponseStream;
export function generate(prompt: string, options?: GenerateOptions & { stream?: false }): Promise<LLMResponse>;
export function generate(prompt: string, options?: GenerateOptions): Promise<LLMResponse> | ResponseStream;
export function generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResponse> | ResponseStream {
  return RelayLLM.create({ logger: options.logger }).generate(prompt, options);
}

/**
 * Run a multi-turn conversation.
 *
 * @example
 * ```typescript
 * const response = await chat(
 *   [{ role: 'user', content: 'Hello!' }],
 *   { fallback: ['openai:gpt-4o', 'gemini:gemini-2.5-flash'] },
 * );
 * ```
 */
export function chat(messages: Message[], options: ChatOptions & { stream: true }): ResponseStream;
export function chat(messages: Message[], options?: ChatOptions & { stream?: false }): Promise<LLMResponse>;
export function chat(messages: Message[], options?: ChatOptions): Promise<LLMResponse> | ResponseStream;
export function chat(messages: Message[], options: ChatOptions = {}): Promise<LLMResponse> | ResponseStream {
  return RelayLLM.create({ logger: options.logger }).chat(messages, options);
}

/**
 * Get list of supported provider names.
 */
export function getSupportedProviders(): string[] {
  return getRegisteredProviders();
}
