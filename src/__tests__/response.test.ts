/**
 * Tests for response construction.
 */

import { describe, it, expect } from 'vitest';
import { createResponse, estimatePromptChars, tagResponse } from '../response.js';

describe('createResponse', () => {
  const bytes = new Uint8Array([137, 80, 78, 71]);

  it('should derive text and images from parts in order', () => {
    const response = createResponse({
      parts: [
        { type: 'text', text: 'Here is ' },
        { type: 'image', bytes, mime: 'image/png' },
        { type: 'text', text: 'your cat.' },
        { type: 'image', url: 'https://example.test/cat.png' },
      ],
      provider: 'gemini',
      model: 'gemini-2.5-flash',
      finish_reason: 'stop',
    });

    expect(response.text).toBe('Here is your cat.');
    expect(response.parts.map(part => part.type)).toEqual(['text', 'image', 'text', 'image']);
    expect(response.images).toEqual([
      { type: 'image', bytes, mime: 'image/png' },
      { type: 'image', url: 'https://example.test/cat.png' },
    ]);
    expect(response.finish_reason).toBe('stop');
    expect(response.usage).toBeNull();
    expect(response.raw).toBeNull();
  });

  it('should be read-only', () => {
    const parts = [{ type: 'text' as const, text: 'hi' }];
    const response = createResponse({ parts, provider: 'openai', model: 'gpt-4o' });

    parts.push({ type: 'text', text: ' there' });

    expect(response.text).toBe('hi');
    expect(response.parts).toHaveLength(1);
    expect(Object.isFrozen(response)).toBe(true);
    expect(Object.isFrozen(response.parts)).toBe(true);
    expect(Object.isFrozen(response.parts[0])).toBe(true);
  });
});

describe('tagResponse', () => {
  it('should reattribute a response', () => {
    const response = createResponse({
      parts: [{ type: 'text', text: 'ok' }],
      provider: 'openai',
      model: 'gpt-4o-2024-08-06',
      usage: { prompt_tokens: 1, completion_tokens: 1, total_tokens: 2 },
    });
    const tagged = tagResponse(response, 'openai', 'gpt-4o');

    expect(tagged.model).toBe('gpt-4o');
    expect(tagged.text).toBe('ok');
    expect(tagged.usage).toEqual({ prompt_tokens: 1, completion_tokens: 1, total_tokens: 2 });
  });

  it('should return the same response when nothing changes', () => {
    const response = createResponse({ parts: [], provider: 'groq', model: 'llama-3-8b-8k' });

    expect(tagResponse(response, 'groq', 'llama-3-8b-8k')).toBe(response);
  });
});

describe('estimatePromptChars', () => {
  it('should count system and text content only', () => {
    const chars = estimatePromptChars(
      [
        { role: 'user', content: 'Hello' },
        {
          role: 'user',
          content: [
            { type: 'text', text: 'What is this?' },
            { type: 'image', data: 'aGVsbG8=', mime: 'image/png' },
          ],
        },
      ],
      'Be brief',
    );

    expect(chars).toBe(8 + 5 + 13);
  });
});
