/**
 * Fallback engine.
 *
 * Walks an ordered chain of provider choices, retrying each with backoff, and
 * returns the first success. Streaming calls commit to a choice as soon as its
 * first event arrives; after that the engine only switches choices when
 * `allowMidStreamSwitch` is set.
 *
 * The engine never looks at provider identity. It drives an AttemptFn, which the
 * provider layer supplies.
 */

import { classifyError, FallbackExhaustedError, StreamInterruptedError } from './errors.js';
import { getLogger, type Logger } from './logger.js';
import { tagResponse } from './response.js';
import { linkSignal, retryDelay, sleep, withTimeout } from './retry.js';
import { ResponseStream, type StreamFrame } from './stream.js';
import type {
  ChoiceFailure,
  FailureClassification,
  FallbackConfig,
  LLMResponse,
  ProviderChoice,
  ProviderEvent,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A complete response or a lazy sequence of events.
 */
export type AttemptResult = LLMResponse | AsyncIterable<ProviderEvent>;

export interface AttemptContext {
  /** Whether the caller wants a stream */
  stream: boolean;
  /** Aborts when this attempt times out or the call is cancelled */
  signal: AbortSignal;
  /** 1-based attempt number within the current choice */
  attempt: number;
}

/**
 * Performs one request against one choice.
 */
export type AttemptFn = (choice: ProviderChoice, context: AttemptContext) => Promise<AttemptResult> | AttemptResult;

export interface FallbackEngineOptions {
  logger?: Logger;
  /** Source of randomness for jitter, in [0, 1) */
  random?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Prompt size, for usage estimates when a provider reports none */
  promptChars?: number;
}

export function isEventSequence(value: unknown): value is AsyncIterable<ProviderEvent> {
  return value !== null && typeof value === 'object' && Symbol.asyncIterator in value;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function* replay(choice: ProviderChoice, events: readonly ProviderEvent[]): AsyncGenerator<StreamFrame> {
  if (events.length === 0) return;
  yield { type: 'commit', provider: choice.provider, model: choice.model };
  for (const event of events) {
    yield { type: 'event', event };
  }
}

function choiceLabel(choice: ProviderChoice): string {
  return `${choice.provider}:${choice.model}`;
}

function toFailure(choice: ProviderChoice, attempts: number, classification: FailureClassification): ChoiceFailure {
  return {
    provider: choice.provider,
    model: choice.model,
    attempts,
    kind: classification.kind,
    reason: classification.reason,
    ...(classification.statusCode !== undefined ? { statusCode: classification.statusCode } : {}),
  };
}

// =============================================================================
// FallbackEngine
// =============================================================================

/**
 * Executes one call against a fallback chain.
 *
 * ```ts
 * const engine = new FallbackEngine(resolveFallbackConfig({
 *   chain: [{ provider: 'openai', model: 'gpt-4o' }, { provider: 'anthropic', model: 'claude-sonnet-4' }],
 * }));
 * const response = await engine.run((choice, ctx) => provider.send(request, ctx));
 * ```
 *
 * An engine holds no per-call state, so one instance may serve concurrent calls.
 */
export class FallbackEngine {
  private readonly config: FallbackConfig;
  private readonly log: Logger;
  private readonly random: () => number;

  constructor(config: FallbackConfig, options: FallbackEngineOptions = {}) {
    this.config = config;
    this.log = options.logger ?? getLogger();
    this.random = options.random ?? Math.random;
  }

  /**
   * Run the chain and resolve with the first successful response.
   *
   * @throws FallbackExhaustedError when every choice failed
   * @throws the original error for fatal local errors (missing key, bad config,
   *   cancellation)
   */
  async run(attempt: AttemptFn, options: RunOptions = {}): Promise<LLMResponse> {
    const { retry, chain } = this.config;
    const signal = options.signal;
    const failures: ChoiceFailure[] = [];

    for (let index = 0; index < chain.length; index++) {
      const choice = chain[index];
      const label = choiceLabel(choice);
      let attempts = 0;
      let lastError: unknown;
      let last: FailureClassification | undefined;

      while (attempts < retry.maxAttempts) {
        if (attempts > 0) {
          await this.backoff(attempts - 1, lastError, label, signal);
        }
        attempts += 1;

        const controller = linkSignal(signal);
        try {
          this.log.debug({ choice: label, attempt: attempts }, 'Attempt started');
          const result = await withTimeout(
            Promise.resolve().then(() => attempt(choice, { stream: false, signal: controller.signal, attempt: attempts })),
            retry.timeoutMs,
            label,
            signal,
            () => controller.abort(),
          );

          const response = isEventSequence(result)
            ? await this.collect(result, choice, controller, options)
            : tagResponse(result, choice.provider, choice.model);

          this.log.info({ choice: label, attempt: attempts }, 'Provider succeeded');
          return response;
        } catch (error) {
          const classification = classifyError(error);
          if (classification.kind === 'fatal_local_error') {
            this.log.error({ choice: label, reason: classification.reason }, 'Fatal error, aborting call');
            throw error;
          }

          last = classification;
          lastError = error;
          this.log.warn(
            { choice: label, attempt: attempts, kind: classification.kind, statusCode: classification.statusCode, reason: classification.reason },
            'Attempt failed',
          );

          if (classification.kind === 'non_retryable_client_error') {
            break;
          }
        } finally {
          controller.abort();
        }
      }

      if (last) {
        failures.push(toFailure(choice, attempts, last));
      }
      this.logAdvance(index, last);
    }

    throw new FallbackExhaustedError(failures);
  }

  /**
   * Open a lazy stream over the chain. Nothing is sent until the stream is
   * iterated or finalized.
   */
  stream(attempt: AttemptFn, options: RunOptions = {}): ResponseStream {
    return new ResponseStream(signal => this.drive(attempt, signal), {
      promptChars: options.promptChars,
      signal: options.signal,
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async backoff(retryIndex: number, error: unknown, label: string, signal?: AbortSignal): Promise<void> {
    const delayMs = retryDelay(retryIndex, this.config.retry, error, this.random);
    this.log.debug({ choice: label, delayMs }, 'Backing off before retry');
    await sleep(delayMs, signal);
  }

  private logAdvance(index: number, last: FailureClassification | undefined): void {
    const next = this.config.chain[index + 1];
    if (next) {
      this.log.warn(
        { from: choiceLabel(this.config.chain[index]), to: choiceLabel(next), reason: last?.reason },
        'Falling back to next choice',
      );
    }
  }

  /**
   * Fold an event sequence returned to a blocking call into one response.
   * A failure while reading fails the attempt.
   */
  private async collect(
    source: AsyncIterable<ProviderEvent>,
    choice: ProviderChoice,
    controller: AbortController,
    options: RunOptions,
  ): Promise<LLMResponse> {
    const events: ProviderEvent[] = [];
    const iterator = source[Symbol.asyncIterator]();
    for (;;) {
      const next = await withTimeout(
        iterator.next(),
        this.config.retry.timeoutMs,
        choiceLabel(choice),
        options.signal,
        () => controller.abort(),
      );
      if (next.done) break;
      events.push(next.value);
    }

    const stream = new ResponseStream(() => replay(choice, events), { promptChars: options.promptChars });
    return stream.finalize();
  }

  /**
   * The streaming state machine. Yields a commit frame when a choice produces
   * its first event, then that choice's events.
   */
  private async *drive(attempt: AttemptFn, signal: AbortSignal): AsyncGenerator<StreamFrame> {
    const { retry, chain, allowMidStreamSwitch } = this.config;
    const failures: ChoiceFailure[] = [];
    let committed: ProviderChoice | undefined;

    for (let index = 0; index < chain.length; index++) {
      const choice = chain[index];
      const label = choiceLabel(choice);
      let attempts = 0;
      let lastError: unknown;
      let last: FailureClassification | undefined;
      let switched = false;

      while (attempts < retry.maxAttempts) {
        if (attempts > 0) {
          await this.backoff(attempts - 1, lastError, label, signal);
        }
        attempts += 1;

        const controller = linkSignal(signal);
        let iterator: AsyncIterator<ProviderEvent> | undefined;
        let reading = false;
        let committedHere = false;

        try {
          this.log.debug({ choice: label, attempt: attempts, stream: true }, 'Attempt started');
          const result = await withTimeout(
            Promise.resolve().then(() => attempt(choice, { stream: true, signal: controller.signal, attempt: attempts })),
            retry.timeoutMs,
            label,
            signal,
            () => controller.abort(),
          );

          if (!isEventSequence(result)) {
            committed = choice;
            yield { type: 'commit', provider: choice.provider, model: choice.model };
            for (const part of result.parts) {
              yield { type: 'event', event: part };
            }
            yield {
              type: 'event',
              event: {
                type: 'metadata',
                usage: result.usage ?? undefined,
                finish_reason: result.finish_reason ?? undefined,
                raw: result.raw,
              },
            };
            this.log.info({ choice: label, attempt: attempts }, 'Provider succeeded');
            return;
          }

          iterator = result[Symbol.asyncIterator]();
          for (;;) {
            reading = true;
            const next = await withTimeout(iterator.next(), retry.timeoutMs, label, signal, () => controller.abort());
            reading = false;
            if (next.done) {
              this.log.info({ choice: label, attempt: attempts }, 'Stream completed');
              return;
            }
            if (!committedHere) {
              committedHere = true;
              if (committed && committed !== choice) {
                this.log.warn({ from: choiceLabel(committed), to: label }, 'Stream switched provider mid-stream');
              }
              committed = choice;
              this.log.debug({ choice: label }, 'Stream committed');
              yield { type: 'commit', provider: choice.provider, model: choice.model };
            }
            yield { type: 'event', event: next.value };
          }
        } catch (error) {
          const classification = classifyError(error);
          if (classification.kind === 'fatal_local_error') {
            this.log.debug({ choice: label, reason: classification.reason }, 'Stream stopped');
            throw error;
          }

          last = classification;
          lastError = error;
          this.log.warn(
            { choice: label, attempt: attempts, kind: classification.kind, committed: committedHere, reason: classification.reason },
            'Stream attempt failed',
          );

          if (committedHere) {
            failures.push(toFailure(choice, attempts, classification));
            if (!allowMidStreamSwitch) {
              throw new StreamInterruptedError(choice.provider, choice.model, failures, asError(error));
            }
            switched = true;
            break;
          }

          if (classification.kind === 'non_retryable_client_error') {
            break;
          }
        } finally {
          controller.abort();
          if (iterator?.return && !reading) {
            try {
              await iterator.return();
            } catch (error) {
              this.log.debug({ choice: label, error: classifyError(error).reason }, 'Transport close failed');
            }
          }
        }
      }

      if (!switched && last) {
        failures.push(toFailure(choice, attempts, last));
      }
      this.logAdvance(index, last);
    }

    if (committed) {
      throw new StreamInterruptedError(committed.provider, committed.model, failures);
    }
    throw new FallbackExhaustedError(failures);
  }
}

