/**
 * Tests for error handling and error classes.
 */

import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  CancelledError,
  ConfigurationError,
  EmptyStreamError,
  FallbackExhaustedError,
  InvalidRequestError,
  MissingApiKeyError,
  UnsupportedProviderError,
  ProviderRequestError,
  RateLimitError,
  ProviderUnavailableError,
  StreamInterruptedError,
  TimeoutError,
  classifyError,
  isConnectionError,
  isRelayError,
  isRateLimitError,
  redactSecrets,
  wrapError,
} from '../errors.js';
import { RelayError, RelayErrorCode } from '../types.js';

describe('Error Classes', () => {
  describe('MissingApiKeyError', () => {
    it('should create error with correct message', () => {
      const error = new MissingApiKeyError('openai', 'OPENAI_API_KEY');

      expect(error).toBeInstanceOf(RelayError);
      expect(error.name).toBe('MissingApiKeyError');
      expect(error.code).toBe(RelayErrorCode.MissingApiKey);
      expect(error.provider).toBe('openai');
      expect(error.message).toContain('OPENAI_API_KEY');
    });
  });

  describe('UnsupportedProviderError', () => {
    it('should list supported providers', () => {
      const error = new UnsupportedProviderError('invalid', ['openai', 'anthropic']);

      expect(error.code).toBe(RelayErrorCode.UnsupportedProvider);
      expect(error.message).toBe("Provider 'invalid' is not supported. Supported providers: openai, anthropic");
    });
  });

  describe('RateLimitError', () => {
    it('should carry the retry-after hint', () => {
      const error = new RateLimitError('anthropic', 30);

      expect(error.statusCode).toBe(429);
      expect(error.retryAfter).toBe(30);
      expect(error.message).toBe('Rate limited by anthropic. Retry after 30 seconds.');
      expect(isRateLimitError(error)).toBe(true);
    });
  });

  describe('TimeoutError', () => {
    it('should include the timeout', () => {
      const error = new TimeoutError('gemini', 1500);

      expect(error.code).toBe(RelayErrorCode.Timeout);
      expect(error.message).toBe('Request to gemini timed out after 1500ms');
    });
  });

  describe('FallbackExhaustedError', () => {
    it('should summarize every failed choice in order', () => {
      const error = new FallbackExhaustedError([
        { provider: 'openai', model: 'gpt-4o', attempts: 3, kind: 'retryable_transient_error', reason: 'ProviderRequestError: boom', statusCode: 503 },
        { provider: 'anthropic', model: 'claude-sonnet-4', attempts: 1, kind: 'non_retryable_client_error', reason: 'AuthenticationError: nope' },
      ]);

      expect(error.code).toBe(RelayErrorCode.FallbackExhausted);
      expect(error.failures).toHaveLength(2);
      expect(error.message).toBe(
        'All 2 provider choices failed: ' +
        'openai:gpt-4o (3 attempts, retryable_transient_error): ProviderRequestError: boom; ' +
        'anthropic:claude-sonnet-4 (1 attempt, non_retryable_client_error): AuthenticationError: nope',
      );
    });
  });

  describe('StreamInterruptedError', () => {
    it('should report the last failure reason', () => {
      const cause = new Error('reset');
      const error = new StreamInterruptedError('openai', 'gpt-4o', [
        { provider: 'openai', model: 'gpt-4o', attempts: 1, kind: 'retryable_transient_error', reason: 'Error: reset' },
      ], cause);

      expect(error.message).toBe('Stream from openai:gpt-4o was interrupted: Error: reset');
      expect(error.provider).toBe('openai');
      expect(error.model).toBe('gpt-4o');
      expect(error.cause).toBe(cause);
    });
  });

  describe('EmptyStreamError', () => {
    it('should mention the cause when there is one', () => {
      expect(new EmptyStreamError().message).toBe('Stream produced no events');
      expect(new EmptyStreamError(new Error('all failed')).message).toBe('Stream produced no events: all failed');
    });
  });
});

describe('Type Guards', () => {
  it('isRelayError should recognize library errors only', () => {
    expect(isRelayError(new ConfigurationError('bad'))).toBe(true);
    expect(isRelayError(new Error('plain'))).toBe(false);
  });

  it('isConnectionError should match error codes and messages', () => {
    const refused = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });

    expect(isConnectionError(refused)).toBe(true);
    expect(isConnectionError(new TypeError('fetch failed'))).toBe(true);
    expect(isConnectionError(new Error('socket hang up'))).toBe(true);
    expect(isConnectionError(new Error('bad input'))).toBe(false);
    expect(isConnectionError('ECONNRESET')).toBe(false);
  });
});

describe('wrapError', () => {
  it('should pass library errors through', () => {
    const error = new RateLimitError('openai');
    expect(wrapError(error, 'openai')).toBe(error);
  });

  it('should map HTTP status errors', () => {
    expect(wrapError({ status: 429, message: 'slow down' }, 'openai')).toBeInstanceOf(RateLimitError);
    expect(wrapError({ status: 401, message: 'bad key' }, 'openai')).toBeInstanceOf(AuthenticationError);

    const server = wrapError({ status: 502, message: 'bad gateway' }, 'openai');
    expect(server).toBeInstanceOf(ProviderRequestError);
    expect(server.statusCode).toBe(502);
  });

  it('should map connection failures to ProviderUnavailableError', () => {
    const wrapped = wrapError(new TypeError('fetch failed'), 'groq');

    expect(wrapped).toBeInstanceOf(ProviderUnavailableError);
    expect(wrapped.message).toBe("Provider 'groq' is unavailable: Cannot connect to groq");
  });

  it('should map aborts to TimeoutError', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';

    expect(wrapError(abort, 'xai')).toBeInstanceOf(TimeoutError);
  });

  it('should wrap anything else as ProviderRequestError', () => {
    const wrapped = wrapError('weird', 'together');

    expect(wrapped).toBeInstanceOf(ProviderRequestError);
    expect(wrapped.message).toBe('Request to together failed: weird');
  });
});

describe('classifyError', () => {
  it.each([400, 401, 403, 404, 422])('should treat HTTP %i as non-retryable', (status) => {
    expect(classifyError(new ProviderRequestError('openai', 'rejected', status)).kind).toBe('non_retryable_client_error');
  });

  it.each([408, 429, 500, 502, 503, 529])('should treat HTTP %i as transient', (status) => {
    expect(classifyError(new ProviderRequestError('openai', 'failed', status)).kind).toBe('retryable_transient_error');
  });

  it('should classify status-bearing objects from other clients', () => {
    const result = classifyError({ status: 503, message: 'unavailable' });

    expect(result.kind).toBe('retryable_transient_error');
    expect(result.statusCode).toBe(503);
  });

  it('should treat rate limits, timeouts and dropped connections as transient', () => {
    expect(classifyError(new RateLimitError('openai')).kind).toBe('retryable_transient_error');
    expect(classifyError(new TimeoutError('openai', 10)).kind).toBe('retryable_transient_error');
    expect(classifyError(new ProviderUnavailableError('openai')).kind).toBe('retryable_transient_error');
    expect(classifyError(Object.assign(new Error('reset'), { code: 'ECONNRESET' })).kind).toBe('retryable_transient_error');
  });

  it('should treat rejected credentials and malformed requests as non-retryable', () => {
    expect(classifyError(new AuthenticationError('openai', 401)).kind).toBe('non_retryable_client_error');
    expect(classifyError(new InvalidRequestError('no mime type')).kind).toBe('non_retryable_client_error');
  });

  it('should treat configuration problems and cancellation as fatal', () => {
    expect(classifyError(new MissingApiKeyError('openai', 'OPENAI_API_KEY')).kind).toBe('fatal_local_error');
    expect(classifyError(new UnsupportedProviderError('nope', [])).kind).toBe('fatal_local_error');
    expect(classifyError(new ConfigurationError('bad chain')).kind).toBe('fatal_local_error');
    expect(classifyError(new CancelledError()).kind).toBe('fatal_local_error');
  });

  it('should treat programming errors as fatal', () => {
    expect(classifyError(new TypeError('x is not a function')).kind).toBe('fatal_local_error');
    expect(classifyError(new RangeError('out of range')).kind).toBe('fatal_local_error');
  });

  it('should treat unknown failures as non-retryable', () => {
    expect(classifyError(new Error('something odd')).kind).toBe('non_retryable_client_error');
    expect(classifyError('odd').kind).toBe('non_retryable_client_error');
  });

  it('should never expose secrets in the reason', () => {
    const result = classifyError(new ProviderRequestError('openai', 'invalid token Bearer test-secret', 400));

    expect(result.reason).toBe('ProviderRequestError: Request to openai failed: invalid token Bearer [REDACTED]');
  });
});

describe('redactSecrets', () => {
  it('should mask bearer tokens', () => {
    expect(redactSecrets('sent Bearer test-secret')).toBe('sent Bearer [REDACTED]');
  });

  it('should mask key headers and parameters', () => {
    expect(redactSecrets('x-api-key: test-secret')).toBe('x-api-key: [REDACTED]');
    expect(redactSecrets('api_key=test-secret&x=1')).toBe('api_key=[REDACTED]&x=1');
    expect(redactSecrets('https://host.test/v1?key=test-secret')).toBe('https://host.test/v1?key=[REDACTED]');
  });

  it('should mask key-shaped strings', () => {
    expect(redactSecrets('used sk-testsecret123')).toBe('used sk-[REDACTED]');
  });

  it('should leave ordinary text alone', () => {
    expect(redactSecrets('model not found')).toBe('model not found');
  });
});
