/**
 * OpenAI LLM Provider for relay-llm.
 *
 * Uses the Chat Completions API. DeepSeek, Together, X.ai, Groq and any
 * OpenAI-compatible endpoint speak the same wire format and extend this class.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */

import { BaseProvider, parseJson } from './base.js';
import { ConfigurationError } from '../errors.js';
import { createResponse } from '../response.js';
import { normalizeUsage } from '../usage.js';
import type {
  ContentEvent,
  GenerationOptions,
  InputPart,
  LLMResponse,
  ProviderEvent,
  ProviderRequest,
} from '../types.js';

// =============================================================================
// OpenAI API Types
// =============================================================================

type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string; detail?: string } };

interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string | OpenAIContentPart[];
}

interface OpenAIChatRequest {
  model: string;
  messages: OpenAIMessage[];
  stream: boolean;
  stream_options?: { include_usage: boolean };
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  max_completion_tokens?: number;
  stop?: string | string[];
  [key: string]: unknown;
}

interface OpenAIUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

interface OpenAIChatResponse {
  id?: string;
  model?: string;
  choices?: Array<{
    index: number;
    message?: { role: string; content?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: OpenAIUsage | null;
}

interface OpenAIStreamChunk {
  id?: string;
  model?: string;
  choices?: Array<{
    index: number;
    delta?: { role?: string; content?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: OpenAIUsage | null;
}

/** Models that take `max_completion_tokens` instead of `max_tokens`. */
const COMPLETION_TOKENS_MODELS = /^(o1|o3|o4|gpt-5)/;

// =============================================================================
// OpenAI Provider Implementation
// =============================================================================

export class OpenAIProvider extends BaseProvider {
  readonly PROVIDER_NAME: string = 'openai';
  readonly ENV_API_KEY_NAME: string = 'OPENAI_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL: string = 'https://platform.openai.com/docs';
  readonly API_BASE: string = 'https://api.openai.com/v1';

  readonly SUPPORTS_VISION: boolean = true;

  /**
   * Request headers. Authorization is omitted when no key is configured.
   */
  protected headers(apiKey: string | undefined): Record<string, string> {
    return apiKey ? { Authorization: `Bearer ${apiKey}` } : {};
  }

  /**
   * Convert one message content part to OpenAI format.
   */
  private convertPart(part: InputPart): OpenAIContentPart {
    if (part.type === 'text') {
      return { type: 'text', text: part.text };
    }
    const url = 'url' in part ? part.url : `data:${part.mime};base64,${part.data}`;
    return {
      type: 'image_url',
      image_url: part.detail ? { url, detail: part.detail } : { url },
    };
  }

  /**
   * Convert messages to OpenAI format. The system prompt goes first.
   */
  protected convertMessages(request: ProviderRequest): OpenAIMessage[] {
    const messages: OpenAIMessage[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    for (const msg of request.messages) {
      messages.push({
        role: msg.role,
        content: typeof msg.content === 'string' ? msg.content : msg.content.map(part => this.convertPart(part)),
      });
    }
    return messages;
  }

  /**
   * Build the request body. Options we don't recognize pass through unchanged.
   */
  protected buildRequest(request: ProviderRequest, stream: boolean): OpenAIChatRequest {
    const { max_tokens, ...rest }: GenerationOptions = request.options;
    const body: OpenAIChatRequest = {
      ...rest,
      model: request.model,
      messages: this.convertMessages(request),
      stream,
    };

    if (max_tokens !== undefined) {
      if (COMPLETION_TOKENS_MODELS.test(request.model)) {
        body.max_completion_tokens = max_tokens;
      } else {
        body.max_tokens = max_tokens;
      }
    }

    if (stream) {
      body.stream_options = { include_usage: true };
    }
    return body;
  }

  /**
   * Convert OpenAI response to our format.
   */
  protected convertResponse(data: OpenAIChatResponse, request: ProviderRequest): LLMResponse {
    const choice = data.choices?.[0];
    const content = choice?.message?.content;
    const parts: ContentEvent[] = typeof content === 'string' && content.length > 0
      ? [{ type: 'text', text: content }]
      : [];

    return createResponse({
      parts,
      provider: this.PROVIDER_NAME,
      model: data.model ?? request.model,
      finish_reason: choice?.finish_reason ?? null,
      usage: normalizeUsage(data.usage),
      raw: data,
    });
  }

  /**
   * Create a chat completion.
   */
  async complete(request: ProviderRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const apiKey = this.requireApiKey();
    const response = await this.postJson(
      `${this.baseUrl}/chat/completions`,
      this.buildRequest(request, false),
      this.headers(apiKey),
      signal,
    );
    const data = await this.readJson(response) as OpenAIChatResponse;
    return this.decode(() => this.convertResponse(data, request));
  }

  /**
   * Stream a chat completion.
   */
  async *stream(request: ProviderRequest, signal?: AbortSignal): AsyncIterable<ProviderEvent> {
    const apiKey = this.requireApiKey();
    const response = await this.postJson(
      `${this.baseUrl}/chat/completions`,
      this.buildRequest(request, true),
      this.headers(apiKey),
      signal,
    );

    for await (const data of this.readSse(response)) {
      yield* this.decode(() => this.convertChunk(data));
    }
  }

  /**
   * Events carried by one stream chunk.
   */
  private convertChunk(data: string): ProviderEvent[] {
    const chunk = parseJson(data) as OpenAIStreamChunk | undefined;
    if (!chunk) {
      // Skip invalid JSON
      return [];
    }

    const events: ProviderEvent[] = [];
    const choice = chunk.choices?.[0];
    const content = choice?.delta?.content;
    if (typeof content === 'string' && content.length > 0) {
      events.push({ type: 'text', text: content });
    }

    const usage = normalizeUsage(chunk.usage);
    const finishReason = choice?.finish_reason ?? undefined;
    if (usage || finishReason) {
      events.push({
        type: 'metadata',
        ...(usage ? { usage } : {}),
        ...(finishReason ? { finish_reason: finishReason } : {}),
        raw: chunk,
      });
    }
    return events;
  }
}

// =============================================================================
// OpenAI-Compatible Providers
// =============================================================================

export class DeepSeekProvider extends OpenAIProvider {
  readonly PROVIDER_NAME: string = 'deepseek';
  readonly ENV_API_KEY_NAME: string = 'DEEPSEEK_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL: string = 'https://api-docs.deepseek.com';
  readonly API_BASE: string = 'https://api.deepseek.com/v1';
  readonly SUPPORTS_VISION: boolean = false;
}

export class TogetherProvider extends OpenAIProvider {
  readonly PROVIDER_NAME: string = 'together';
  readonly ENV_API_KEY_NAME: string = 'TOGETHER_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL: string = 'https://docs.together.ai';
  readonly API_BASE: string = 'https://api.together.xyz/v1';
}

export class XAIProvider extends OpenAIProvider {
  readonly PROVIDER_NAME: string = 'xai';
  readonly ENV_API_KEY_NAME: string = 'XAI_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL: string = 'https://docs.x.ai';
  readonly API_BASE: string = 'https://api.x.ai/v1';
}

export class GroqProvider extends OpenAIProvider {
  readonly PROVIDER_NAME: string = 'groq';
  readonly ENV_API_KEY_NAME: string = 'GROQ_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL: string = 'https://console.groq.com/docs';
  readonly API_BASE: string = 'https://api.groq.com/openai/v1';
}

/**
 * Any server that speaks the Chat Completions protocol. Needs `baseUrl`; the
 * key is optional since self-hosted servers often run without one.
 */
export class OpenAICompatibleProvider extends OpenAIProvider {
  readonly PROVIDER_NAME: string = 'openai-compatible';
  readonly ENV_API_KEY_NAME: string = 'OPENAI_COMPATIBLE_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL: string = 'https://platform.openai.com/docs/api-reference/chat';
  readonly API_BASE: string = '';

  protected override get baseUrl(): string {
    if (!this.config.baseUrl) {
      throw new ConfigurationError(`Provider '${this.PROVIDER_NAME}' needs a baseUrl.`);
    }
    return this.config.baseUrl.replace(/\/+$/, '');
  }

  protected override requiresApiKey(): boolean {
    return false;
  }
}
