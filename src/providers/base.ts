/**
 * Base provider for relay-llm.
 *
 * A provider translates a ProviderRequest into one vendor's wire format and back.
 * The fallback engine only sees `send()`, which returns a complete response or a
 * lazy event sequence.
 */

import {
  AuthenticationError,
  MissingApiKeyError,
  ProviderRequestError,
  RateLimitError,
  redactSecrets,
  wrapError,
} from '../errors.js';
import { RelayError } from '../types.js';
import type {
  FetchLike,
  LLMResponse,
  ProviderConfig,
  ProviderEvent,
  ProviderMetadata,
  ProviderRequest,
} from '../types.js';

export interface SendOptions {
  stream?: boolean;
  signal?: AbortSignal;
}

/**
 * Parse JSON from the wire, or undefined when it is not valid JSON.
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Seconds to wait from a Retry-After header (delta-seconds or HTTP date).
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? seconds : undefined;
  }
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, Math.ceil((date - now) / 1000));
}

function errorMessageOf(body: unknown): string | undefined {
  if (body === null || typeof body !== 'object') return undefined;
  if ('error' in body) {
    const error = body.error;
    if (typeof error === 'string') return error;
    if (error !== null && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }
  if ('message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return undefined;
}

/**
 * Abstract base class for LLM providers.
 *
 * Implementations should:
 * - Override the metadata properties
 * - Implement `complete()` and `stream()`
 */
export abstract class BaseProvider {
  // =========================================================================
  // Provider Metadata (override in subclasses)
  // =========================================================================

  /** Provider identifier (e.g., 'openai', 'anthropic') */
  abstract readonly PROVIDER_NAME: string;

  /** Environment variable name for the API key */
  abstract readonly ENV_API_KEY_NAME: string;

  /** URL to provider documentation */
  abstract readonly PROVIDER_DOCUMENTATION_URL: string;

  /** Default API base URL */
  abstract readonly API_BASE: string;

  // =========================================================================
  // Feature Flags (override in subclasses)
  // =========================================================================

  /** Whether provider accepts image inputs */
  readonly SUPPORTS_VISION: boolean = false;

  /** Whether provider can return images */
  readonly SUPPORTS_IMAGE_OUTPUT: boolean = false;

  // =========================================================================
  // Instance Properties
  // =========================================================================

  protected readonly config: ProviderConfig;

  /** HTTP handle shared by every request of this instance */
  protected readonly fetchImpl: FetchLike;

  constructor(config: ProviderConfig = {}) {
    this.config = config;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Base URL for API requests. Resolved on use so subclasses can override
   * API_BASE as a plain field.
   */
  protected get baseUrl(): string {
    return (this.config.baseUrl || this.API_BASE).replace(/\/+$/, '');
  }

  /**
   * API key from config, else from the environment.
   */
  protected get apiKey(): string | undefined {
    if (this.config.apiKey) {
      return this.config.apiKey;
    }
    return process.env[this.ENV_API_KEY_NAME] || undefined;
  }

  /**
   * Whether requests must carry an API key. Override for endpoints that don't.
   */
  protected requiresApiKey(): boolean {
    return true;
  }

  /**
   * The API key, or MissingApiKeyError when one is required and absent.
   */
  protected requireApiKey(): string | undefined {
    const key = this.apiKey;
    if (!key && this.requiresApiKey()) {
      throw new MissingApiKeyError(this.PROVIDER_NAME, this.ENV_API_KEY_NAME);
    }
    return key;
  }

  // =========================================================================
  // Metadata
  // =========================================================================

  getMetadata(): ProviderMetadata {
    return {
      name: this.PROVIDER_NAME,
      envKey: this.ENV_API_KEY_NAME,
      docUrl: this.PROVIDER_DOCUMENTATION_URL,
      streaming: true,
      image: this.SUPPORTS_VISION,
      imageOutput: this.SUPPORTS_IMAGE_OUTPUT,
    };
  }

  // =========================================================================
  // Request Entry Point
  // =========================================================================

  /**
   * Send a request: a complete response, or a lazy event sequence when
   * `stream` is set.
   */
  send(request: ProviderRequest, options: SendOptions & { stream: true }): AsyncIterable<ProviderEvent>;
  send(request: ProviderRequest, options?: SendOptions): Promise<LLMResponse> | AsyncIterable<ProviderEvent>;
  send(request: ProviderRequest, options: SendOptions = {}): Promise<LLMResponse> | AsyncIterable<ProviderEvent> {
    return options.stream
      ? this.stream(request, options.signal)
      : this.complete(request, options.signal);
  }

  // =========================================================================
  // Abstract Methods (must be implemented by subclasses)
  // =========================================================================

  /**
   * Create a complete response.
   */
  abstract complete(request: ProviderRequest, signal?: AbortSignal): Promise<LLMResponse>;

  /**
   * Stream a response as events.
   */
  abstract stream(request: ProviderRequest, signal?: AbortSignal): AsyncIterable<ProviderEvent>;

  // =========================================================================
  // HTTP Helpers
  // =========================================================================

  /**
   * POST a JSON body and return the response, mapping HTTP failures to errors.
   */
  protected async postJson(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throw wrapError(error, this.PROVIDER_NAME);
    }

    if (!response.ok) {
      await this.handleErrorResponse(response);
    }
    return response;
  }

  /**
   * Read a JSON response body.
   */
  protected async readJson(response: Response): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw wrapError(error, this.PROVIDER_NAME);
    }
    const data = parseJson(text);
    if (data === undefined) {
      throw new ProviderRequestError(this.PROVIDER_NAME, 'Response body is not valid JSON');
    }
    return data;
  }

  /**
   * Run a conversion of provider output. A body of the wrong shape surfaces as
   * a ProviderRequestError for this provider.
   */
  protected decode<T>(convert: () => T): T {
    try {
      return convert();
    } catch (error) {
      if (error instanceof RelayError) {
        throw error;
      }
      throw new ProviderRequestError(
        this.PROVIDER_NAME,
        'Malformed response',
        undefined,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Map an error response to the matching error class.
   */
  protected async handleErrorResponse(response: Response): Promise<never> {
    const body = await response.text().catch(() => '');
    const message = redactSecrets(errorMessageOf(parseJson(body)) ?? `HTTP ${response.status}`);

    if (response.status === 429) {
      throw new RateLimitError(this.PROVIDER_NAME, parseRetryAfter(response.headers.get('retry-after')));
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(this.PROVIDER_NAME, response.status, message);
    }

    throw new ProviderRequestError(this.PROVIDER_NAME, message, response.status);
  }

  /**
   * Yield the `data:` payloads of a server-sent event stream. Stops at `[DONE]`.
   */
  protected async *readSse(response: Response): AsyncGenerator<string> {
    if (!response.body) {
      throw new ProviderRequestError(this.PROVIDER_NAME, 'No response body for streaming');
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        let chunk: ReadableStreamReadResult<Uint8Array>;
        try {
          chunk = await reader.read();
        } catch (error) {
          throw wrapError(error, this.PROVIDER_NAME);
        }
        if (chunk.done) break;

        buffer += decoder.decode(chunk.value, { stream: true });

        // Process SSE lines
        const lines = buffer.split('\n');
        buffer = lines.pop() || '';

        for (const rawLine of lines) {
          const line = rawLine.replace(/\r$/, '');
          if (!line.startsWith('data:')) continue;
          const data = line.slice(5).trimStart();
          if (data === '[DONE]') {
            return;
          }
          if (data) {
            yield data;
          }
        }
      }

      const tail = buffer.replace(/\r$/, '');
      if (tail.startsWith('data:')) {
        const data = tail.slice(5).trimStart();
        if (data && data !== '[DONE]') {
          yield data;
        }
      }
    } finally {
      await reader.cancel().catch(() => undefined);
      reader.releaseLock();
    }
  }
}

/**
 * Type for a provider constructor.
 */
export type ProviderConstructor = new (config?: ProviderConfig) => BaseProvider;
