/**
 * Error types for relay-llm.
 *
 * Provides structured errors for provider failures, plus the classifier that
 * tells the fallback engine whether to retry, move on, or stop.
 */

import { RelayError, RelayErrorCode } from './types.js';
import type { ChoiceFailure, FailureClassification } from './types.js';

// =============================================================================
// Error Type Guards
// =============================================================================

/**
 * Check if an error carries an HTTP status, as SDK and fetch wrapper errors do.
 */
export function isHttpStatusError(error: unknown): error is { status: number; message: string } {
  return (
    error !== null &&
    typeof error === 'object' &&
    'status' in error &&
    typeof error.status === 'number' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Check if an error is a connection-level failure (refused, reset, dropped).
 */
export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  if (['ECONNREFUSED', 'ECONNRESET', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR_SOCKET'].includes(code)) {
    return true;
  }
  const message = error.message.toLowerCase();
  return (
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('fetch failed') ||
    message.includes('socket hang up') ||
    message.includes('terminated') ||
    message.includes('network') ||
    message.includes('connection')
  );
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Error thrown when an API key is missing.
 */
export class MissingApiKeyError extends RelayError {
  constructor(provider: string, envKey: string) {
    super(
      `API key not found for provider '${provider}'. ` +
      `Please set the ${envKey} environment variable or pass apiKey in the provider config.`,
      RelayErrorCode.MissingApiKey,
      provider,
    );
    this.name = 'MissingApiKeyError';
  }
}

/**
 * Error thrown when a provider is not supported.
 */
export class UnsupportedProviderError extends RelayError {
  constructor(provider: string, supported: string[]) {
    super(
      `Provider '${provider}' is not supported. ` +
      `Supported providers: ${supported.join(', ')}`,
      RelayErrorCode.UnsupportedProvider,
    );
    this.name = 'UnsupportedProviderError';
  }
}

/**
 * Error thrown for an invalid chain, retry policy or client option.
 */
export class ConfigurationError extends RelayError {
  constructor(message: string) {
    super(message, RelayErrorCode.InvalidConfiguration);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the caller aborts a call or closes a stream.
 */
export class CancelledError extends RelayError {
  constructor(message = 'Operation cancelled') {
    super(message, RelayErrorCode.Cancelled);
    this.name = 'CancelledError';
  }
}

/**
 * Error thrown when a request is malformed before it reaches the network.
 */
export class InvalidRequestError extends RelayError {
  constructor(message: string, provider?: string) {
    super(message, RelayErrorCode.InvalidRequest, provider);
    this.name = 'InvalidRequestError';
  }
}

/**
 * Error thrown when a provider rejects the credentials (401/403).
 */
export class AuthenticationError extends RelayError {
  constructor(provider: string, statusCode: number, message?: string) {
    super(
      message
        ? `Authentication with ${provider} failed: ${message}`
        : `Authentication with ${provider} failed (HTTP ${statusCode})`,
      RelayErrorCode.AuthenticationFailed,
      provider,
      statusCode,
    );
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when a request to a provider fails.
 */
export class ProviderRequestError extends RelayError {
  constructor(
    provider: string,
    message: string,
    statusCode?: number,
    cause?: Error,
  ) {
    super(
      `Request to ${provider} failed: ${message}`,
      RelayErrorCode.RequestFailed,
      provider,
      statusCode,
      cause,
    );
    this.name = 'ProviderRequestError';
  }
}

/**
 * Error thrown when a provider is rate limited.
 */
export class RateLimitError extends RelayError {
  constructor(
    provider: string,
    public readonly retryAfter?: number,
  ) {
    const message = retryAfter
      ? `Rate limited by ${provider}. Retry after ${retryAfter} seconds.`
      : `Rate limited by ${provider}.`;
    super(message, RelayErrorCode.RateLimited, provider, 429);
    this.name = 'RateLimitError';
  }
}

/**
 * Error thrown when a provider cannot be reached.
 */
export class ProviderUnavailableError extends RelayError {
  constructor(provider: string, reason?: string, cause?: Error) {
    super(
      reason
        ? `Provider '${provider}' is unavailable: ${reason}`
        : `Provider '${provider}' is unavailable`,
      RelayErrorCode.ProviderUnavailable,
      provider,
      undefined,
      cause,
    );
    this.name = 'ProviderUnavailableError';
  }
}

/**
 * Error thrown when a request times out.
 */
export class TimeoutError extends RelayError {
  constructor(provider: string, timeoutMs: number) {
    super(
      `Request to ${provider} timed out after ${timeoutMs}ms`,
      RelayErrorCode.Timeout,
      provider,
    );
    this.name = 'TimeoutError';
  }
}

function describeFailures(failures: readonly ChoiceFailure[]): string {
  return failures
    .map(f => `${f.provider}:${f.model} (${f.attempts} attempt${f.attempts === 1 ? '' : 's'}, ${f.kind}): ${f.reason}`)
    .join('; ');
}

/**
 * Error thrown when every choice of a fallback chain failed.
 * Lists the last classified failure of each choice, in chain order.
 */
export class FallbackExhaustedError extends RelayError {
  constructor(public readonly failures: readonly ChoiceFailure[]) {
    super(
      `All ${failures.length} provider choices failed: ${describeFailures(failures)}`,
      RelayErrorCode.FallbackExhausted,
    );
    this.name = 'FallbackExhaustedError';
  }
}

/**
 * Error thrown when a committed stream fails and no switch is made.
 */
export class StreamInterruptedError extends RelayError {
  constructor(
    provider: string,
    public readonly model: string,
    public readonly failures: readonly ChoiceFailure[],
    cause?: Error,
  ) {
    const last = failures[failures.length - 1];
    super(
      `Stream from ${provider}:${model} was interrupted` + (last ? `: ${last.reason}` : ''),
      RelayErrorCode.StreamInterrupted,
      provider,
      last?.statusCode,
      cause,
    );
    this.name = 'StreamInterruptedError';
  }
}

/**
 * Error thrown when finalize() is called on a stream that produced no events.
 */
export class EmptyStreamError extends RelayError {
  constructor(cause?: Error) {
    super(
      cause
        ? `Stream produced no events: ${cause.message}`
        : 'Stream produced no events',
      RelayErrorCode.EmptyStream,
      undefined,
      undefined,
      cause,
    );
    this.name = 'EmptyStreamError';
  }
}

/**
 * Error thrown when iterating a stream its consumer already closed.
 */
export class StreamClosedError extends RelayError {
  constructor() {
    super('Stream is closed', RelayErrorCode.StreamClosed);
    this.name = 'StreamClosedError';
  }
}

/**
 * Check if an error is a relay-llm error.
 */
export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

/**
 * Check if an error indicates rate limiting.
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

// =============================================================================
// Redaction
// =============================================================================

const SECRET_PATTERNS: Array<[RegExp, string]> = [
  [/(bearer\s+)[^\s"',;]+/gi, '$1[REDACTED]'],
  [/((?:x-api-key|x-goog-api-key|api[_-]?key|authorization)["']?\s*[:=]\s*["']?)[^\s"',;&]+/gi, '$1[REDACTED]'],
  [/([?&]key=)[^&\s"']+/gi, '$1[REDACTED]'],
  [/\b(sk|xai|gsk)-[A-Za-z0-9_-]{6,}/g, '$1-[REDACTED]'],
  [/\bAIza[0-9A-Za-z_-]{10,}/g, '[REDACTED]'],
];

/**
 * Mask API keys and auth header values in free text.
 */
export function redactSecrets(text: string): string {
  return SECRET_PATTERNS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text);
}

// =============================================================================
// Wrapping and Classification
// =============================================================================

/**
 * Wrap an unknown error into a RelayError.
 */
export function wrapError(error: unknown, provider: string): RelayError {
  if (error instanceof RelayError) {
    return error;
  }

  if (isHttpStatusError(error)) {
    const { status, message } = error;

    if (status === 429) {
      return new RateLimitError(provider);
    }

    if (status === 401 || status === 403) {
      return new AuthenticationError(provider, status, message);
    }

    return new ProviderRequestError(provider, message, status);
  }

  if (isConnectionError(error)) {
    return new ProviderUnavailableError(
      provider,
      `Cannot connect to ${provider}`,
      error instanceof Error ? error : undefined,
    );
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('rate limit') || message.includes('too many requests')) {
      return new RateLimitError(provider);
    }

    if (message.includes('timeout') || message.includes('timed out') || error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new TimeoutError(provider, 0);
    }

    return new ProviderRequestError(provider, error.message, undefined, error);
  }

  return new ProviderRequestError(
    provider,
    String(error),
  );
}

const NON_RETRYABLE_STATUS = new Set([400, 401, 403, 404, 422]);

function classifyStatus(status: number): FailureClassification['kind'] {
  if (status === 408 || status === 429 || status >= 500) {
    return 'retryable_transient_error';
  }
  if (NON_RETRYABLE_STATUS.has(status) || (status >= 400 && status < 500)) {
    return 'non_retryable_client_error';
  }
  return 'retryable_transient_error';
}

function isProgrammingError(error: Error): boolean {
  if (error instanceof TypeError && error.message.toLowerCase().includes('fetch failed')) {
    return false;
  }
  return error instanceof TypeError || error instanceof RangeError || error instanceof ReferenceError;
}

function reasonOf(error: unknown): string {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  return redactSecrets(message);
}

/**
 * Classify a failed attempt.
 *
 * - fatal_local_error: configuration or programming errors, and caller
 *   cancellation. The whole call stops.
 * - non_retryable_client_error: the provider rejected this request (400, 401,
 *   403, 404, 422, other 4xx) or it was malformed locally. Move to the next choice.
 * - retryable_transient_error: 408, 429, 5xx, timeouts and dropped connections.
 *   Retry the same choice while attempts remain.
 */
export function classifyError(error: unknown): FailureClassification {
  const reason = reasonOf(error);

  if (error instanceof RelayError) {
    switch (error.code) {
      case RelayErrorCode.MissingApiKey:
      case RelayErrorCode.UnsupportedProvider:
      case RelayErrorCode.InvalidConfiguration:
      case RelayErrorCode.Cancelled:
        return { kind: 'fatal_local_error', reason };
      case RelayErrorCode.InvalidRequest:
      case RelayErrorCode.AuthenticationFailed:
        return { kind: 'non_retryable_client_error', reason, statusCode: error.statusCode };
      case RelayErrorCode.RateLimited:
      case RelayErrorCode.ProviderUnavailable:
      case RelayErrorCode.Timeout:
        return { kind: 'retryable_transient_error', reason, statusCode: error.statusCode };
      default:
        break;
    }
    if (error.statusCode !== undefined) {
      return { kind: classifyStatus(error.statusCode), reason, statusCode: error.statusCode };
    }
    if (error.cause && (isConnectionError(error.cause) || error.cause.name === 'AbortError')) {
      return { kind: 'retryable_transient_error', reason };
    }
    return { kind: 'non_retryable_client_error', reason };
  }

  if (isHttpStatusError(error)) {
    return { kind: classifyStatus(error.status), reason, statusCode: error.status };
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError' || isConnectionError(error)) {
      return { kind: 'retryable_transient_error', reason };
    }
    if (isProgrammingError(error)) {
      return { kind: 'fatal_local_error', reason };
    }
  }

  return { kind: 'non_retryable_client_error', reason };
}
