/**
 * ResponseStream: a lazy, single-consumer sequence of content events backed by
 * the fallback engine, plus `finalize()` to fold it into one LLMResponse.
 */

import { EmptyStreamError, StreamClosedError, CancelledError } from './errors.js';
import { createResponse } from './response.js';
import { linkSignal } from './retry.js';
import { estimateUsage } from './usage.js';
import type {
  CompletionUsage,
  ContentEvent,
  LLMResponse,
  ProviderEvent,
  ResponsePart,
} from './types.js';

/**
 * What the engine feeds a stream: a commitment to a choice, or an event from
 * the committed transport.
 */
export type StreamFrame =
  | { type: 'commit'; provider: string; model: string }
  | { type: 'event'; event: ProviderEvent };

/**
 * Opens the frame source. Called once, on the first pull. The signal aborts when
 * the stream is closed.
 */
export type StreamSource = (signal: AbortSignal) => AsyncIterator<StreamFrame>;

export interface ResponseStreamOptions {
  /** Prompt size, used when the provider reports no usage */
  promptChars?: number;
  /** External cancellation (e.g. a caller timeout) */
  signal?: AbortSignal;
}

type StreamState = 'idle' | 'active' | 'done' | 'failed' | 'closed';

function mergeUsage(previous: CompletionUsage | null, next: CompletionUsage): CompletionUsage {
  const prompt = next.prompt_tokens ?? previous?.prompt_tokens ?? null;
  const completion = next.completion_tokens ?? previous?.completion_tokens ?? null;
  const total = next.total_tokens
    ?? (prompt !== null && completion !== null ? prompt + completion : previous?.total_tokens ?? null);
  return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: total };
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Streaming result of a call.
 *
 * Iterate it with `for await` to receive text and image events in the order the
 * provider produced them. Breaking out of the loop, or calling `close()`,
 * releases the connection. `finalize()` may be called at any time and always
 * resolves to the same response.
 *
 * @example
 * ```typescript
 * const stream = chat(messages, { stream: true });
 * for await (const event of stream) {
 *   if (event.type === 'text') process.stdout.write(event.text);
 * }
 * const response = await stream.finalize();
 * ```
 */
export class ResponseStream implements AsyncIterable<ContentEvent> {
  private readonly controller: AbortController;
  private readonly promptChars?: number;
  private readonly open: StreamSource;
  private source?: AsyncIterator<StreamFrame>;
  private state: StreamState = 'idle';
  private error?: Error;
  private errorSurfaced = false;
  private closedByConsumer = false;

  private readonly parts: ResponsePart[] = [];
  private eventCount = 0;
  private reportedUsage: CompletionUsage | null = null;
  private finishReason: string | null = null;
  private lastRaw: unknown = undefined;
  private choice?: { provider: string; model: string };

  private lock: Promise<void> = Promise.resolve();
  private finalized?: Promise<LLMResponse>;

  constructor(open: StreamSource, options: ResponseStreamOptions = {}) {
    this.open = open;
    this.promptChars = options.promptChars;
    this.controller = linkSignal(options.signal);
  }

  /** True once any event has arrived from a provider. */
  get committed(): boolean {
    return this.choice !== undefined;
  }

  /** Provider of the currently committed choice. */
  get provider(): string | undefined {
    return this.choice?.provider;
  }

  /** Model of the currently committed choice. */
  get model(): string | undefined {
    return this.choice?.model;
  }

  /** Usage reported so far, if any. */
  get usage(): CompletionUsage | null {
    return this.reportedUsage;
  }

  /** True when the stream can yield no further events. */
  get ended(): boolean {
    return this.state === 'done' || this.state === 'failed' || this.state === 'closed';
  }

  [Symbol.asyncIterator](): AsyncIterator<ContentEvent> {
    return {
      next: () => this.next(),
      return: async (): Promise<IteratorResult<ContentEvent, undefined>> => {
        await this.close();
        return { done: true, value: undefined };
      },
    };
  }

  /**
   * Pull the next content event.
   *
   * Throws StreamClosedError after `close()`. A transport failure is thrown
   * once; later calls report the end of the stream.
   */
  async next(): Promise<IteratorResult<ContentEvent, undefined>> {
    return this.exclusive<IteratorResult<ContentEvent, undefined>>(async () => {
      if (this.state === 'closed') {
        throw new StreamClosedError();
      }
      if (this.finalized || this.state === 'done') {
        return { done: true, value: undefined };
      }
      if (this.state === 'failed') {
        return this.surfaceFailure();
      }

      const event = await this.advance();
      if (event === null) {
        if (this.state === 'closed') {
          throw new StreamClosedError();
        }
        return this.state === 'failed' ? this.surfaceFailure() : { done: true, value: undefined };
      }
      return { done: false, value: event };
    });
  }

  /**
   * Stop the stream and release its connection. Safe to call repeatedly.
   */
  async close(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }
    if (this.state === 'done' || this.state === 'failed') {
      return;
    }

    const source = this.source;
    this.closedByConsumer = true;
    this.state = 'closed';
    this.controller.abort(new CancelledError('Stream closed'));

    if (source?.return) {
      try {
        await source.return(undefined);
      } catch (error) {
        this.error ??= asError(error);
      }
    }
  }

  /**
   * Materialize the response from every event seen, draining whatever the
   * stream has not delivered yet.
   *
   * Rejects with EmptyStreamError when no provider event ever arrived.
   */
  finalize(): Promise<LLMResponse> {
    this.finalized ??= this.materialize();
    return this.finalized;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async materialize(): Promise<LLMResponse> {
    await this.exclusive(async () => {
      while (this.state === 'idle' || this.state === 'active') {
        const event = await this.advance();
        if (event === null) break;
      }
    });

    if (this.eventCount === 0 || !this.choice) {
      throw new EmptyStreamError(this.error);
    }

    const completionChars = this.parts.reduce(
      (sum, part) => sum + (part.type === 'text' ? part.text.length : 0),
      0,
    );

    return createResponse({
      parts: this.parts,
      provider: this.choice.provider,
      model: this.choice.model,
      finish_reason: this.resolveFinishReason(),
      usage: this.reportedUsage ?? estimateUsage(this.promptChars, completionChars),
      raw: this.lastRaw ?? {
        provider: this.choice.provider,
        model: this.choice.model,
        events: this.eventCount,
        synthesized: true,
      },
    });
  }

  private resolveFinishReason(): string {
    switch (this.state) {
      case 'failed':
        return this.error instanceof CancelledError ? 'incomplete' : 'error';
      case 'closed':
        return 'incomplete';
      default:
        return this.finishReason ?? 'stop';
    }
  }

  private surfaceFailure(): IteratorResult<ContentEvent, undefined> {
    if (!this.errorSurfaced && this.error) {
      this.errorSurfaced = true;
      throw this.error;
    }
    return { done: true, value: undefined };
  }

  /**
   * Pull frames until a content event arrives or the source ends. Returns null
   * at the end; failures move the stream to "failed" (or "closed").
   */
  private async advance(): Promise<ContentEvent | null> {
    if (this.state === 'idle') {
      this.source = this.open(this.controller.signal);
      this.state = 'active';
    }
    const source = this.source;
    if (!source || this.state !== 'active') {
      return null;
    }

    try {
      for (;;) {
        const result = await source.next();
        if (this.closedByConsumer) {
          return null;
        }
        if (result.done) {
          this.settle('done');
          return null;
        }

        const frame = result.value;
        if (frame.type === 'commit') {
          this.commit(frame.provider, frame.model);
          continue;
        }

        const event = frame.event;
        this.eventCount += 1;
        if (event.type === 'metadata') {
          if (event.usage) this.reportedUsage = mergeUsage(this.reportedUsage, event.usage);
          if (event.finish_reason) this.finishReason = event.finish_reason;
          if (event.raw !== undefined) this.lastRaw = event.raw;
          continue;
        }

        this.parts.push(event);
        return event;
      }
    } catch (error) {
      if (this.closedByConsumer) {
        return null;
      }
      this.error = asError(error);
      this.settle('failed');
      return null;
    }
  }

  /**
   * Enter a terminal state. Aborting the own controller detaches it from the
   * caller's signal.
   */
  private settle(state: 'done' | 'failed'): void {
    this.state = state;
    this.controller.abort();
  }

  private commit(provider: string, model: string): void {
    const previous = this.choice;
    if (previous && (previous.provider !== provider || previous.model !== model)) {
      // Usage and stop reason belong to the newly committed choice.
      this.reportedUsage = null;
      this.finishReason = null;
    }
    this.choice = { provider, model };
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
