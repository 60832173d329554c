/**
 * Token usage normalization and cost estimation.
 */

import type { CompletionUsage, LLMResponse } from './types.js';

// =============================================================================
// Usage
// =============================================================================

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Normalize a provider usage block into CompletionUsage.
 *
 * Understands OpenAI-style (`prompt_tokens`), Anthropic-style (`input_tokens`)
 * and Gemini `usageMetadata` (`promptTokenCount`). Returns null for anything else.
 */
export function normalizeUsage(raw: unknown): CompletionUsage | null {
  if (!isRecord(raw)) return null;

  if ('prompt_tokens' in raw || 'completion_tokens' in raw || 'total_tokens' in raw) {
    return {
      prompt_tokens: numberOrNull(raw.prompt_tokens),
      completion_tokens: numberOrNull(raw.completion_tokens),
      total_tokens: numberOrNull(raw.total_tokens),
    };
  }

  if ('input_tokens' in raw || 'output_tokens' in raw) {
    const prompt = numberOrNull(raw.input_tokens);
    const completion = numberOrNull(raw.output_tokens);
    return {
      prompt_tokens: prompt,
      completion_tokens: completion,
      total_tokens: prompt !== null && completion !== null ? prompt + completion : numberOrNull(raw.total_tokens),
    };
  }

  if ('promptTokenCount' in raw || 'candidatesTokenCount' in raw || 'totalTokenCount' in raw) {
    return {
      prompt_tokens: numberOrNull(raw.promptTokenCount),
      completion_tokens: numberOrNull(raw.candidatesTokenCount),
      total_tokens: numberOrNull(raw.totalTokenCount),
    };
  }

  return null;
}

/**
 * Rough token count: one token per four characters, rounded up.
 */
export function approxTokensFromChars(chars: number): number {
  return Math.ceil(chars / 4);
}

/**
 * Usage approximated from character counts. An approximation, not a tokenizer.
 */
export function estimateUsage(promptChars: number | undefined, completionChars: number): CompletionUsage {
  const prompt = promptChars === undefined ? null : approxTokensFromChars(promptChars);
  const completion = approxTokensFromChars(completionChars);
  return {
    prompt_tokens: prompt,
    completion_tokens: completion,
    total_tokens: prompt === null ? null : prompt + completion,
    estimated: true,
  };
}

// =============================================================================
// Pricing
// =============================================================================

/** USD per million tokens */
export interface ModelPricing {
  input: number;
  output: number;
}

const PRICING: Record<string, ModelPricing> = {
  'gemini-2.5-pro': { input: 1.25, output: 10.0 },
  'gemini-2.5-flash': { input: 0.3, output: 2.5 },
  'gemini-2.5-flash-lite': { input: 0.1, output: 0.4 },
  'claude-opus-4.1': { input: 15.0, output: 75.0 },
  'claude-sonnet-4': { input: 3.0, output: 15.0 },
  'claude-haiku-3.5': { input: 0.8, output: 4.0 },
  'llama-3.1-405b-instruct-turbo': { input: 3.5, output: 3.5 },
  'deepseek-r1': { input: 3.0, output: 7.0 },
  'qwen3-coder-480b-a35b-instruct': { input: 2.0, output: 2.0 },
  'llama-4-maverick': { input: 0.2, output: 0.6 },
  'moonshotai/kimi-k2-instruct-0905': { input: 1.0, output: 3.0 },
  'llama-3-8b-8k': { input: 0.05, output: 0.08 },
  'gpt-5': { input: 1.25, output: 10.0 },
  'gpt-5-mini': { input: 0.25, output: 2.0 },
  'gpt-5-nano': { input: 0.05, output: 0.4 },
  'deepseek-chat': { input: 0.56, output: 1.68 },
  'deepseek-reasoner': { input: 3.0, output: 7.0 },
};

/**
 * Look up pricing by exact model id, then by the segment after the last "/".
 */
export function getModelPricing(modelId: string | undefined): ModelPricing | null {
  if (!modelId) return null;
  const direct = PRICING[modelId];
  if (direct) return direct;
  const simple = modelId.split('/').pop();
  return (simple && PRICING[simple]) || null;
}

export interface CostEstimate {
  currency: 'USD';
  model: string;
  provider: string;
  pricing_source: 'known' | 'approximate' | 'unknown';
  input: { tokens: number | null; unit_price_per_million: number | null; cost: number | null };
  output: { tokens: number | null; unit_price_per_million: number | null; cost: number | null };
  total: number | null;
}

function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Estimate the USD cost of a response from its usage and the pricing table.
 */
export function estimateCost(response: Pick<LLMResponse, 'model' | 'provider' | 'usage'>): CostEstimate {
  const pricing = getModelPricing(response.model);
  const usage = response.usage;
  const inTokens = usage?.prompt_tokens ?? null;
  const outTokens = usage?.completion_tokens ?? null;

  const result: CostEstimate = {
    currency: 'USD',
    model: response.model,
    provider: response.provider,
    pricing_source: !pricing ? 'unknown' : usage?.estimated ? 'approximate' : 'known',
    input: { tokens: inTokens, unit_price_per_million: pricing?.input ?? null, cost: null },
    output: { tokens: outTokens, unit_price_per_million: pricing?.output ?? null, cost: null },
    total: null,
  };

  if (!pricing) {
    return result;
  }

  const inCost = inTokens === null ? null : (inTokens / 1_000_000) * pricing.input;
  const outCost = outTokens === null ? null : (outTokens / 1_000_000) * pricing.output;
  result.input.cost = inCost === null ? null : round6(inCost);
  result.output.cost = outCost === null ? null : round6(outCost);

  if (inCost !== null && outCost !== null) {
    result.total = round6(inCost + outCost);
  } else if (usage?.total_tokens != null && pricing.input === pricing.output) {
    result.total = round6((usage.total_tokens / 1_000_000) * pricing.input);
  }

  return result;
}
