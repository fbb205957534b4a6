/**
 * Base LLM adapter class.
 *
 * Provides the interface that all LLM provider adapters must implement.
 * Enables easy switching between Anthropic, OpenAI, etc.
 */

import type {
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
} from '@/types/llm';
import { DEFAULT_RAG_MAX_TOKENS, DEFAULT_RAG_TEMPERATURE, LLM_TIMEOUT_MS } from '@/lib/rag/config';

/**
 * Abstract base class for LLM adapters.
 *
 * Subclasses must implement createMessage() and translate the
 * content-block protocol to and from their provider's wire format.
 */
export abstract class BaseLLMAdapter implements LLMAdapter {
  abstract readonly provider: string;

  protected apiKey: string;
  protected defaultModel: string;
  protected baseUrl?: string;
  protected timeoutMs: number;

  constructor(config: LLMAdapterConfig) {
    this.apiKey = config.apiKey;
    this.defaultModel = config.defaultModel ?? 'claude-sonnet-4-20250514';
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs ?? LLM_TIMEOUT_MS;
  }

  /**
   * Send one request/response round to the model.
   */
  abstract createMessage(request: LLMMessageRequest): Promise<LLMMessageResponse>;

  /**
   * Resolve per-call options against adapter defaults.
   */
  protected resolveOptions(options: LLMCompletionOptions): Required<LLMCompletionOptions> {
    return {
      model: options.model ?? this.defaultModel,
      temperature: options.temperature ?? DEFAULT_RAG_TEMPERATURE,
      maxTokens: options.maxTokens ?? DEFAULT_RAG_MAX_TOKENS,
    };
  }
}

// Re-export types for convenience
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
};
