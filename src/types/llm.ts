/**
 * LLM adapter interface types.
 *
 * These types define the contract for LLM provider adapters,
 * enabling easy switching between Anthropic, OpenAI, etc.
 *
 * The message shape follows a content-block protocol: a turn is either
 * plain text or a list of text / tool_use / tool_result blocks.
 */

// =============================================================================
// Tool Schemas
// =============================================================================

/**
 * JSON-schema description of a single tool parameter.
 */
export type ToolParameter = {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
};

/**
 * JSON-schema object describing a tool's arguments.
 */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, ToolParameter>;
  required: string[];
};

/**
 * Schema a tool advertises to the model.
 */
export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

// =============================================================================
// Content Blocks
// =============================================================================

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content: string;
}

/** Blocks the model can produce. */
export type ResponseBlock = TextBlock | ToolUseBlock;

/** Blocks a conversation turn can carry. */
export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

/**
 * Message in a chat conversation. The system prompt travels separately.
 */
export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

// =============================================================================
// Requests and Responses
// =============================================================================

/**
 * Why the model stopped generating.
 */
export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens';

/**
 * Options for a single model call.
 */
export interface LLMCompletionOptions {
  model?: string;           // Override default model
  temperature?: number;     // 0.0 - 1.0 (lower = more deterministic)
  maxTokens?: number;       // Max response tokens
}

export interface LLMMessageRequest extends LLMCompletionOptions {
  system: string;
  messages: LLMMessage[];
  /** Omitted when the model must answer without tools */
  tools?: ToolSchema[];
}

export interface LLMMessageResponse {
  stopReason: StopReason;
  content: ResponseBlock[];
  usage: TokenUsage;
}

/**
 * Token usage statistics.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Core LLM adapter interface.
 *
 * All provider adapters must implement this interface.
 */
export interface LLMAdapter {
  /** Provider name (e.g., 'anthropic', 'openai') */
  readonly provider: string;

  /**
   * Send one request/response round to the model.
   */
  createMessage(request: LLMMessageRequest): Promise<LLMMessageResponse>;
}

/**
 * Configuration for creating an LLM adapter.
 */
export interface LLMAdapterConfig {
  apiKey: string;
  defaultModel?: string;
  baseUrl?: string;  // For custom endpoints
  timeoutMs?: number;
}

export type LLMProvider = 'anthropic' | 'openai';
