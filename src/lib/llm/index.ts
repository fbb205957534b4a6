/**
 * LLM module exports.
 */

export { BaseLLMAdapter } from './adapter';
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMMessageRequest,
  LLMMessageResponse,
  LLMCompletionOptions,
  ContentBlock,
  ResponseBlock,
  StopReason,
  TextBlock,
  ToolSchema,
  ToolUseBlock,
  ToolResultBlock,
} from './adapter';

export { AnthropicAdapter } from './anthropic-adapter';
export { OpenAIAdapter } from './openai-adapter';

export {
  createLLMAdapter,
  createLLMAdapterFromConfig,
  getSupportedProviders,
  registerLLMAdapter,
  isProviderSupported,
} from './factory';

export {
  buildSystemPrompt,
  buildQueryPrompt,
  COURSE_SYSTEM_PROMPT,
  FALLBACK_ANSWER,
} from './prompts';
