/**
 * Provider exports for relay-llm.
 */

export { BaseProvider, parseJson, parseRetryAfter, type ProviderConstructor, type SendOptions } from './base.js';
export {
  OpenAIProvider,
  DeepSeekProvider,
  TogetherProvider,
  XAIProvider,
  GroqProvider,
  OpenAICompatibleProvider,
} from './openai.js';
export { AnthropicProvider, mapStopReason } from './anthropic.js';
export { GeminiProvider, mapFinishReason } from './gemini.js';
