/**
 * Construction of normalized responses.
 */

import type {
  CompletionUsage,
  ImageEvent,
  LLMResponse,
  Message,
  ResponsePart,
} from './types.js';

export interface ResponseInit {
  parts: readonly ResponsePart[];
  provider: string;
  model: string;
  finish_reason?: string | null;
  usage?: CompletionUsage | null;
  raw?: unknown;
}

function isImage(part: ResponsePart): part is ImageEvent {
  return part.type === 'image';
}

/**
 * Build a frozen LLMResponse. `text` and `images` are derived from `parts`.
 */
export function createResponse(init: ResponseInit): LLMResponse {
  const copies: ResponsePart[] = init.parts.map(part => ({ ...part }));
  copies.forEach(part => Object.freeze(part));
  const parts = Object.freeze(copies);
  const text = parts.map(part => (part.type === 'text' ? part.text : '')).join('');
  const usage = init.usage ? Object.freeze({ ...init.usage }) : null;

  return Object.freeze({
    text,
    parts,
    images: Object.freeze(parts.filter(isImage)),
    finish_reason: init.finish_reason ?? null,
    usage,
    raw: init.raw ?? null,
    provider: init.provider,
    model: init.model,
  });
}

/**
 * Copy of `response` attributed to another provider/model.
 */
export function tagResponse(response: LLMResponse, provider: string, model: string): LLMResponse {
  if (response.provider === provider && response.model === model) {
    return response;
  }
  return createResponse({ ...response, provider, model });
}

/**
 * Number of text characters a request sends, used for usage estimates.
 */
export function estimatePromptChars(messages: readonly Message[], system?: string): number {
  let chars = system?.length ?? 0;
  for (const message of messages) {
    if (typeof message.content === 'string') {
      chars += message.content.length;
      continue;
    }
    for (const part of message.content) {
      if (part.type === 'text') {
        chars += part.text.length;
      }
    }
  }
  return chars;
}
