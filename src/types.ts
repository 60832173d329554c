/**
 * Core types for relay-llm.
 *
 * Request-side types describe provider-agnostic input (messages made of text and
 * image parts). Response-side types describe the normalized result every provider
 * is folded into, and the events a streaming call emits.
 */

// =============================================================================
// Provider Types
// =============================================================================

/**
 * Built-in providers.
 */
export type LLMProviderType =
  | 'openai'
  | 'anthropic'
  | 'gemini'
  | 'deepseek'
  | 'together'
  | 'xai'
  | 'groq'
  | 'openai-compatible';

/**
 * Fetch implementation used for HTTP. Injected so callers and tests control the
 * connection pool instead of relying on process-wide state.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Provider configuration.
 */
export interface ProviderConfig {
  /** API key for the provider */
  apiKey?: string;
  /** Base URL override for the provider's API */
  baseUrl?: string;
  /** HTTP handle; defaults to the global fetch */
  fetch?: FetchLike;
  /** Additional provider-specific options */
  [key: string]: unknown;
}

/**
 * Provider metadata describing capabilities.
 */
export interface ProviderMetadata {
  /** Provider identifier */
  name: string;
  /** Environment variable name for API key */
  envKey: string;
  /** Link to provider documentation */
  docUrl: string;
  /** Whether provider supports streaming */
  streaming: boolean;
  /** Whether provider accepts image inputs */
  image: boolean;
  /** Whether provider can return images */
  imageOutput: boolean;
}

// =============================================================================
// Message Types
// =============================================================================

export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Text content part of a message.
 */
export interface TextInputPart {
  type: 'text';
  text: string;
}

/**
 * Image content part of a message. Either a URL the provider can reach, or
 * base64-encoded bytes with their MIME type.
 */
export type ImageInputPart =
  | { type: 'image'; url: string; mime?: string; detail?: 'auto' | 'low' | 'high' }
  | { type: 'image'; data: string; mime: string; detail?: 'auto' | 'low' | 'high' };

export type InputPart = TextInputPart | ImageInputPart;

/**
 * A message in a conversation.
 */
export interface Message {
  role: MessageRole;
  content: string | InputPart[];
}

/**
 * Sampling options shared by every provider. Unknown keys are passed through to
 * the provider payload unchanged.
 */
export interface GenerationOptions {
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  stop?: string | string[];
  [key: string]: unknown;
}

/**
 * A fully resolved request for one provider.
 */
export interface ProviderRequest {
  model: string;
  messages: Message[];
  system?: string;
  options: GenerationOptions;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * A text fragment.
 */
export interface TextEvent {
  type: 'text';
  text: string;
}

/**
 * An image payload or reference. Carries `bytes`, `url`, or both.
 */
export type ImageEvent =
  | { type: 'image'; bytes: Uint8Array; url?: string; mime?: string }
  | { type: 'image'; url: string; bytes?: Uint8Array; mime?: string };

/**
 * One unit of output a caller can observe.
 */
export type ContentEvent = TextEvent | ImageEvent;

/**
 * Provider-side bookkeeping frame (usage, stop reason). Never yielded to callers.
 */
export interface MetadataEvent {
  type: 'metadata';
  usage?: CompletionUsage;
  finish_reason?: string;
  raw?: unknown;
}

/**
 * Anything a provider transport may emit while streaming.
 */
export type ProviderEvent = ContentEvent | MetadataEvent;

/**
 * Ordered content of a response, mirroring arrival order.
 */
export type ResponsePart = ContentEvent;

/**
 * Token usage statistics.
 */
export interface CompletionUsage {
  prompt_tokens: number | null;
  completion_tokens: number | null;
  total_tokens: number | null;
  /** True when counts were approximated from character lengths */
  estimated?: boolean;
}

/**
 * Normalized terminal result of a call. Read-only once created.
 */
export interface LLMResponse {
  readonly text: string;
  readonly parts: readonly ResponsePart[];
  readonly images: readonly ImageEvent[];
  readonly finish_reason: string | null;
  readonly usage: CompletionUsage | null;
  readonly raw: unknown;
  readonly provider: string;
  readonly model: string;
}

// =============================================================================
// Fallback Types
// =============================================================================

/**
 * One entry in a fallback chain.
 */
export interface ProviderChoice {
  readonly provider: string;
  readonly model: string;
  /** Overrides call-level generation options for this choice only */
  readonly options?: Readonly<GenerationOptions>;
}

/**
 * Retry policy applied to every choice of a chain.
 */
export interface RetryPolicy {
  /** Attempts per choice, including the first */
  readonly maxAttempts: number;
  readonly initialBackoffMs: number;
  readonly maxBackoffMs: number;
  /** Wall-clock bound on each network call */
  readonly timeoutMs: number;
  /** Full jitter over [0, base delay] */
  readonly jitter: boolean;
}

export interface FallbackConfig {
  readonly chain: readonly ProviderChoice[];
  readonly retry: RetryPolicy;
  readonly allowMidStreamSwitch: boolean;
}

/**
 * Outcome classes for a failed attempt.
 */
export type FailureKind =
  | 'non_retryable_client_error'
  | 'retryable_transient_error'
  | 'fatal_local_error';

export interface FailureClassification {
  kind: FailureKind;
  /** Human-readable reason with secrets redacted */
  reason: string;
  statusCode?: number;
}

/**
 * Last classified failure for one choice of a chain.
 */
export interface ChoiceFailure {
  provider: string;
  model: string;
  attempts: number;
  kind: FailureKind;
  reason: string;
  statusCode?: number;
}

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Parsed model string result.
 */
export interface ParsedModel {
  provider: string;
  model: string;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error codes for relay-llm errors.
 */
export enum RelayErrorCode {
  /** API key is missing */
  MissingApiKey = 'MISSING_API_KEY',
  /** Provider is not supported */
  UnsupportedProvider = 'UNSUPPORTED_PROVIDER',
  /** Chain, policy or client options are invalid */
  InvalidConfiguration = 'INVALID_CONFIGURATION',
  /** Caller cancelled the call */
  Cancelled = 'CANCELLED',
  /** Request failed */
  RequestFailed = 'REQUEST_FAILED',
  /** Credentials rejected */
  AuthenticationFailed = 'AUTHENTICATION_FAILED',
  /** Rate limited */
  RateLimited = 'RATE_LIMITED',
  /** Invalid request */
  InvalidRequest = 'INVALID_REQUEST',
  /** Provider unavailable */
  ProviderUnavailable = 'PROVIDER_UNAVAILABLE',
  /** Timeout */
  Timeout = 'TIMEOUT',
  /** Every choice of a chain failed */
  FallbackExhausted = 'FALLBACK_EXHAUSTED',
  /** A committed stream failed part-way */
  StreamInterrupted = 'STREAM_INTERRUPTED',
  /** Finalize found no events */
  EmptyStream = 'EMPTY_STREAM',
  /** Stream was closed by its consumer */
  StreamClosed = 'STREAM_CLOSED',
}

/**
 * Custom error class for relay-llm errors.
 */
export class RelayError extends Error {
  constructor(
    message: string,
    public readonly code: RelayErrorCode,
    public readonly provider?: string,
    public readonly statusCode?: number,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'RelayError';
  }
}
