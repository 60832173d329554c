/**
 * Anthropic LLM Provider for relay-llm.
 *
 * Uses the Anthropic Messages API.
 *
 * @see https://docs.anthropic.com/en/api/messages
 */

import { BaseProvider, parseJson } from './base.js';
import { ProviderRequestError } from '../errors.js';
import { createResponse } from '../response.js';
import { normalizeUsage } from '../usage.js';
import type {
  ContentEvent,
  InputPart,
  LLMResponse,
  ProviderEvent,
  ProviderRequest,
} from '../types.js';

// =============================================================================
// Anthropic API Types
// =============================================================================

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string | AnthropicContent[];
}

type AnthropicContent =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'base64'; media_type: string; data: string } | { type: 'url'; url: string } };

interface AnthropicRequest {
  model: string;
  messages: AnthropicMessage[];
  system?: string;
  max_tokens: number;
  temperature?: number;
  top_p?: number;
  stop_sequences?: string[];
  stream: boolean;
  [key: string]: unknown;
}

interface AnthropicUsage {
  input_tokens?: number;
  output_tokens?: number;
}

interface AnthropicResponse {
  id?: string;
  type?: 'message';
  model?: string;
  content?: Array<{ type: string; text?: string }>;
  stop_reason?: string | null;
  usage?: AnthropicUsage;
}

interface AnthropicStreamEvent {
  type: string;
  message?: AnthropicResponse;
  index?: number;
  delta?: {
    type?: string;
    text?: string;
    stop_reason?: string | null;
  };
  usage?: AnthropicUsage;
  error?: {
    type: string;
    message: string;
  };
}

/** Anthropic requires max_tokens on every request. */
const DEFAULT_MAX_TOKENS = 4096;

const DEFAULT_ANTHROPIC_VERSION = '2023-06-01';

/**
 * Map Anthropic stop reasons onto the OpenAI vocabulary.
 */
export function mapStopReason(reason: string | null | undefined): string | null {
  switch (reason) {
    case null:
    case undefined:
      return null;
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'max_tokens':
      return 'length';
    case 'tool_use':
      return 'tool_calls';
    case 'refusal':
      return 'content_filter';
    default:
      return reason;
  }
}

// =============================================================================
// Anthropic Provider Implementation
// =============================================================================

export class AnthropicProvider extends BaseProvider {
  readonly PROVIDER_NAME = 'anthropic';
  readonly ENV_API_KEY_NAME = 'ANTHROPIC_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://docs.anthropic.com';
  readonly API_BASE = 'https://api.anthropic.com/v1';

  readonly SUPPORTS_VISION = true;

  private get anthropicVersion(): string {
    const version = this.config.anthropicVersion;
    return typeof version === 'string' ? version : DEFAULT_ANTHROPIC_VERSION;
  }

  private headers(apiKey: string | undefined): Record<string, string> {
    return {
      ...(apiKey ? { 'x-api-key': apiKey } : {}),
      'anthropic-version': this.anthropicVersion,
    };
  }

  private convertPart(part: InputPart): AnthropicContent {
    if (part.type === 'text') {
      return { type: 'text', text: part.text };
    }
    if ('url' in part) {
      return { type: 'image', source: { type: 'url', url: part.url } };
    }
    return { type: 'image', source: { type: 'base64', media_type: part.mime, data: part.data } };
  }

  /**
   * Build the request body. System messages are folded into the top-level
   * `system` field, which is the only place Anthropic accepts them.
   */
  protected buildRequest(request: ProviderRequest, stream: boolean): AnthropicRequest {
    const systemParts: string[] = request.system ? [request.system] : [];
    const messages: AnthropicMessage[] = [];

    for (const msg of request.messages) {
      if (msg.role === 'system') {
        const text = typeof msg.content === 'string'
          ? msg.content
          : msg.content.map(part => (part.type === 'text' ? part.text : '')).join('');
        if (text) systemParts.push(text);
        continue;
      }
      messages.push({
        role: msg.role,
        content: typeof msg.content === 'string' ? msg.content : msg.content.map(part => this.convertPart(part)),
      });
    }

    const { max_tokens, stop, ...rest } = request.options;
    const body: AnthropicRequest = {
      ...rest,
      model: request.model,
      messages,
      max_tokens: max_tokens ?? DEFAULT_MAX_TOKENS,
      stream,
    };
    if (systemParts.length > 0) {
      body.system = systemParts.join('\n\n');
    }
    if (stop !== undefined) {
      body.stop_sequences = Array.isArray(stop) ? stop : [stop];
    }
    return body;
  }

  /**
   * Convert Anthropic response to our format.
   */
  private convertResponse(data: AnthropicResponse, request: ProviderRequest): LLMResponse {
    const parts: ContentEvent[] = [];
    for (const block of data.content ?? []) {
      if (block.type === 'text' && block.text) {
        parts.push({ type: 'text', text: block.text });
      }
    }

    return createResponse({
      parts,
      provider: this.PROVIDER_NAME,
      model: data.model ?? request.model,
      finish_reason: mapStopReason(data.stop_reason),
      usage: normalizeUsage(data.usage),
      raw: data,
    });
  }

  /**
   * Create a message.
   */
  async complete(request: ProviderRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const apiKey = this.requireApiKey();
    const response = await this.postJson(
      `${this.baseUrl}/messages`,
      this.buildRequest(request, false),
      this.headers(apiKey),
      signal,
    );
    const data = await this.readJson(response) as AnthropicResponse;
    return this.decode(() => this.convertResponse(data, request));
  }

  /**
   * Stream a message.
   */
  async *stream(request: ProviderRequest, signal?: AbortSignal): AsyncIterable<ProviderEvent> {
    const apiKey = this.requireApiKey();
    const response = await this.postJson(
      `${this.baseUrl}/messages`,
      this.buildRequest(request, true),
      this.headers(apiKey),
      signal,
    );

    for await (const data of this.readSse(response)) {
      yield* this.decode(() => this.convertEvent(data));
    }
  }

  /**
   * Events carried by one server-sent event.
   */
  private convertEvent(data: string): ProviderEvent[] {
    const event = parseJson(data) as AnthropicStreamEvent | undefined;
    if (!event) {
      return [];
    }

    switch (event.type) {
      case 'message_start': {
        const usage = normalizeUsage(event.message?.usage);
        return usage ? [{ type: 'metadata', usage, raw: event }] : [];
      }
      case 'content_block_delta':
        if (event.delta?.type === 'text_delta' && event.delta.text) {
          return [{ type: 'text', text: event.delta.text }];
        }
        return [];
      case 'message_delta': {
        const usage = normalizeUsage(event.usage);
        const finishReason = mapStopReason(event.delta?.stop_reason);
        return [{
          type: 'metadata',
          ...(usage ? { usage } : {}),
          ...(finishReason ? { finish_reason: finishReason } : {}),
          raw: event,
        }];
      }
      case 'error': {
        // Overloaded is Anthropic's 529; everything else is a server fault
        const status = event.error?.type === 'overloaded_error' ? 529 : 500;
        throw new ProviderRequestError(this.PROVIDER_NAME, event.error?.message ?? 'Stream error', status);
      }
      default:
        return [];
    }
  }
}
