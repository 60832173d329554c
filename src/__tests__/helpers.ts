/**
 * In-process HTTP stand-ins for provider tests.
 */

import { pino } from 'pino';
import type { FetchLike, ProviderEvent } from '../types.js';

export const silentLogger = pino({ level: 'silent' });

export interface RecordedRequest {
  url: string;
  method: string | undefined;
  headers: Headers;
  body: unknown;
}

type Reply = Response | Error | ((request: RecordedRequest) => Response | Error);

/**
 * A fetch that answers from a script, one reply per call. The last reply
 * repeats once the script runs out.
 */
export function fakeFetch(...replies: Reply[]): { fetch: FetchLike; calls: RecordedRequest[] } {
  const calls: RecordedRequest[] = [];
  const fetch: FetchLike = async (input, init) => {
    const request: RecordedRequest = {
      url: input,
      method: init?.method,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    calls.push(request);
    const reply = replies[Math.min(calls.length - 1, replies.length - 1)];
    const result = typeof reply === 'function' ? reply(request) : reply;
    if (result instanceof Error) {
      throw result;
    }
    return result;
  };
  return { fetch, calls };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function sseLine(payload: unknown): string {
  return `data: ${typeof payload === 'string' ? payload : JSON.stringify(payload)}\n\n`;
}

/**
 * A complete server-sent event stream.
 */
export function sseResponse(payloads: unknown[], options: { done?: boolean } = {}): Response {
  const body = payloads.map(sseLine).join('') + (options.done ? 'data: [DONE]\n\n' : '');
  return new Response(body, {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

/**
 * A server-sent event stream whose connection fails after `payloads`.
 */
export function brokenSseResponse(payloads: unknown[], error: Error): Response {
  const encoder = new TextEncoder();
  const chunks = payloads.map(payload => encoder.encode(sseLine(payload)));
  let index = 0;
  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[index];
      index += 1;
      if (chunk) {
        controller.enqueue(chunk);
      } else {
        controller.error(error);
      }
    },
  });
  return new Response(stream, {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Event sequence that yields `events` and then fails with `error`, if given.
 */
export async function* scripted(events: ProviderEvent[], error?: Error): AsyncGenerator<ProviderEvent> {
  for (const event of events) {
    yield event;
  }
  if (error) {
    throw error;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
