/**
 * Tests for usage normalization, estimation and cost.
 */

import { describe, it, expect } from 'vitest';
import { estimateCost, estimateUsage, getModelPricing, normalizeUsage } from '../usage.js';

describe('normalizeUsage', () => {
  it('should read OpenAI usage', () => {
    expect(normalizeUsage({ prompt_tokens: 12, completion_tokens: 8, total_tokens: 20 })).toEqual({
      prompt_tokens: 12,
      completion_tokens: 8,
      total_tokens: 20,
    });
  });

  it('should read Anthropic usage and derive the total', () => {
    expect(normalizeUsage({ input_tokens: 30, output_tokens: 5 })).toEqual({
      prompt_tokens: 30,
      completion_tokens: 5,
      total_tokens: 35,
    });
  });

  it('should keep partial Anthropic usage partial', () => {
    expect(normalizeUsage({ output_tokens: 5 })).toEqual({
      prompt_tokens: null,
      completion_tokens: 5,
      total_tokens: null,
    });
  });

  it('should read Gemini usage metadata', () => {
    expect(normalizeUsage({ promptTokenCount: 4, candidatesTokenCount: 6, totalTokenCount: 10 })).toEqual({
      prompt_tokens: 4,
      completion_tokens: 6,
      total_tokens: 10,
    });
  });

  it('should return null for anything else', () => {
    expect(normalizeUsage(undefined)).toBeNull();
    expect(normalizeUsage({ tokens: 3 })).toBeNull();
    expect(normalizeUsage('12')).toBeNull();
  });
});

describe('estimateUsage', () => {
  it('should approximate four characters per token', () => {
    expect(estimateUsage(10, 9)).toEqual({
      prompt_tokens: 3,
      completion_tokens: 3,
      total_tokens: 6,
      estimated: true,
    });
  });

  it('should leave the prompt unknown when its size is', () => {
    expect(estimateUsage(undefined, 4)).toEqual({
      prompt_tokens: null,
      completion_tokens: 1,
      total_tokens: null,
      estimated: true,
    });
  });
});

describe('getModelPricing', () => {
  it('should match exact ids and the last path segment', () => {
    expect(getModelPricing('gpt-5-mini')).toEqual({ input: 0.25, output: 2.0 });
    expect(getModelPricing('deepseek-ai/deepseek-r1')).toEqual({ input: 3.0, output: 7.0 });
    expect(getModelPricing('unknown-model')).toBeNull();
    expect(getModelPricing(undefined)).toBeNull();
  });
});

describe('estimateCost', () => {
  it('should price reported usage', () => {
    const cost = estimateCost({
      provider: 'openai',
      model: 'gpt-5',
      usage: { prompt_tokens: 1_000_000, completion_tokens: 500_000, total_tokens: 1_500_000 },
    });

    expect(cost.pricing_source).toBe('known');
    expect(cost.input.cost).toBe(1.25);
    expect(cost.output.cost).toBe(5);
    expect(cost.total).toBe(6.25);
  });

  it('should mark estimated usage as approximate', () => {
    const cost = estimateCost({
      provider: 'anthropic',
      model: 'claude-sonnet-4',
      usage: { prompt_tokens: 1000, completion_tokens: 1000, total_tokens: 2000, estimated: true },
    });

    expect(cost.pricing_source).toBe('approximate');
    expect(cost.total).toBe(0.018);
  });

  it('should price a bare total when input and output cost the same', () => {
    const cost = estimateCost({
      provider: 'together',
      model: 'llama-3.1-405b-instruct-turbo',
      usage: { prompt_tokens: null, completion_tokens: null, total_tokens: 2_000_000 },
    });

    expect(cost.total).toBe(7);
  });

  it('should report unknown models without a price', () => {
    const cost = estimateCost({ provider: 'groq', model: 'mystery', usage: null });

    expect(cost.pricing_source).toBe('unknown');
    expect(cost.total).toBeNull();
    expect(cost.input.unit_price_per_million).toBeNull();
  });
});
