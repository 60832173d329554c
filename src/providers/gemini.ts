/**
 * Google Gemini LLM Provider for relay-llm.
 *
 * Uses the Generative Language API (`generateContent` and
 * `streamGenerateContent`). Gemini can return images as inline data, which are
 * decoded into `image` events.
 *
 * @see https://ai.google.dev/api/generate-content
 */

import { BaseProvider, parseJson } from './base.js';
import { InvalidRequestError } from '../errors.js';
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
// Gemini API Types
// =============================================================================

type GeminiPart =
  | { text: string }
  | { inline_data: { mime_type: string; data: string } }
  | { file_data: { mime_type: string; file_uri: string } };

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

interface GeminiRequest {
  contents: GeminiContent[];
  system_instruction?: { parts: Array<{ text: string }> };
  generationConfig?: {
    temperature?: number;
    topP?: number;
    maxOutputTokens?: number;
    stopSequences?: string[];
  };
  [key: string]: unknown;
}

interface GeminiResponsePart {
  text?: string;
  thought?: boolean;
  inlineData?: { mimeType?: string; data?: string };
}

interface GeminiResponse {
  candidates?: Array<{
    content?: { role?: string; parts?: GeminiResponsePart[] };
    finishReason?: string;
  }>;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
  modelVersion?: string;
}

/**
 * Map Gemini finish reasons onto the OpenAI vocabulary.
 */
export function mapFinishReason(reason: string | undefined): string | null {
  switch (reason) {
    case undefined:
    case 'FINISH_REASON_UNSPECIFIED':
      return null;
    case 'STOP':
      return 'stop';
    case 'MAX_TOKENS':
      return 'length';
    case 'SAFETY':
    case 'RECITATION':
    case 'BLOCKLIST':
    case 'PROHIBITED_CONTENT':
    case 'SPII':
      return 'content_filter';
    default:
      return reason.toLowerCase();
  }
}

// =============================================================================
// Gemini Provider Implementation
// =============================================================================

export class GeminiProvider extends BaseProvider {
  readonly PROVIDER_NAME = 'gemini';
  readonly ENV_API_KEY_NAME = 'GEMINI_API_KEY';
  readonly PROVIDER_DOCUMENTATION_URL = 'https://ai.google.dev/gemini-api/docs';
  readonly API_BASE = 'https://generativelanguage.googleapis.com/v1beta';

  readonly SUPPORTS_VISION = true;
  readonly SUPPORTS_IMAGE_OUTPUT = true;

  private headers(apiKey: string | undefined): Record<string, string> {
    return apiKey ? { 'x-goog-api-key': apiKey } : {};
  }

  private convertPart(part: InputPart): GeminiPart {
    if (part.type === 'text') {
      return { text: part.text };
    }
    if ('url' in part) {
      if (!part.mime) {
        throw new InvalidRequestError('Gemini needs a MIME type for image URLs', this.PROVIDER_NAME);
      }
      return { file_data: { mime_type: part.mime, file_uri: part.url } };
    }
    return { inline_data: { mime_type: part.mime, data: part.data } };
  }

  /**
   * Build the request body. Sampling options go into `generationConfig`; any
   * other option is passed through at the top level.
   */
  protected buildRequest(request: ProviderRequest): GeminiRequest {
    const systemParts: Array<{ text: string }> = request.system ? [{ text: request.system }] : [];
    const contents: GeminiContent[] = [];

    for (const msg of request.messages) {
      if (msg.role === 'system') {
        if (typeof msg.content === 'string') {
          systemParts.push({ text: msg.content });
        } else {
          for (const part of msg.content) {
            if (part.type === 'text') systemParts.push({ text: part.text });
          }
        }
        continue;
      }
      contents.push({
        role: msg.role === 'assistant' ? 'model' : 'user',
        parts: typeof msg.content === 'string'
          ? [{ text: msg.content }]
          : msg.content.map(part => this.convertPart(part)),
      });
    }

    const { temperature, top_p, max_tokens, stop, ...rest } = request.options;
    const generationConfig: NonNullable<GeminiRequest['generationConfig']> = {};
    if (temperature !== undefined) generationConfig.temperature = temperature;
    if (top_p !== undefined) generationConfig.topP = top_p;
    if (max_tokens !== undefined) generationConfig.maxOutputTokens = max_tokens;
    if (stop !== undefined) generationConfig.stopSequences = Array.isArray(stop) ? stop : [stop];

    const body: GeminiRequest = { ...rest, contents };
    if (systemParts.length > 0) {
      body.system_instruction = { parts: systemParts };
    }
    if (Object.keys(generationConfig).length > 0) {
      body.generationConfig = generationConfig;
    }
    return body;
  }

  /**
   * Content events from one response or stream chunk, in order. Thought parts
   * are skipped.
   */
  private convertParts(data: GeminiResponse): ContentEvent[] {
    const events: ContentEvent[] = [];
    for (const part of data.candidates?.[0]?.content?.parts ?? []) {
      if (part.thought) continue;
      if (typeof part.text === 'string' && part.text.length > 0) {
        events.push({ type: 'text', text: part.text });
      } else if (part.inlineData?.data) {
        events.push({
          type: 'image',
          bytes: Buffer.from(part.inlineData.data, 'base64'),
          ...(part.inlineData.mimeType ? { mime: part.inlineData.mimeType } : {}),
        });
      }
    }
    return events;
  }

  private modelPath(model: string): string {
    return `${this.baseUrl}/models/${encodeURIComponent(model)}`;
  }

  /**
   * Generate content.
   */
  async complete(request: ProviderRequest, signal?: AbortSignal): Promise<LLMResponse> {
    const apiKey = this.requireApiKey();
    const response = await this.postJson(
      `${this.modelPath(request.model)}:generateContent`,
      this.buildRequest(request),
      this.headers(apiKey),
      signal,
    );
    const data = await this.readJson(response) as GeminiResponse;

    return this.decode(() => createResponse({
      parts: this.convertParts(data),
      provider: this.PROVIDER_NAME,
      model: data.modelVersion ?? request.model,
      finish_reason: mapFinishReason(data.candidates?.[0]?.finishReason),
      usage: normalizeUsage(data.usageMetadata),
      raw: data,
    }));
  }

  /**
   * Stream generated content over SSE.
   */
  async *stream(request: ProviderRequest, signal?: AbortSignal): AsyncIterable<ProviderEvent> {
    const apiKey = this.requireApiKey();
    const response = await this.postJson(
      `${this.modelPath(request.model)}:streamGenerateContent?alt=sse`,
      this.buildRequest(request),
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
    const chunk = parseJson(data) as GeminiResponse | undefined;
    if (!chunk) {
      return [];
    }

    const events: ProviderEvent[] = this.convertParts(chunk);
    const usage = normalizeUsage(chunk.usageMetadata);
    const finishReason = mapFinishReason(chunk.candidates?.[0]?.finishReason);
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
