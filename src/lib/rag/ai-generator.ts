/**
 * AI Generator
 *
 * Runs one question through the model with at most one round of tool use:
 *
 *   first call (with tools) ─┬─ text ───────────────────────────► answer
 *                            └─ tool_use ─► execute tools ─► second call (no tools) ─► answer
 *
 * Tool calls requested during the second call are not executed; the text
 * blocks of that response (or the fallback answer) are returned instead.
 */

import type { Source } from '@/types/course';
import type {
  LLMAdapter,
  LLMMessage,
  LLMMessageRequest,
  LLMMessageResponse,
  ResponseBlock,
  TextBlock,
  ToolResultBlock,
  ToolSchema,
  ToolUseBlock,
} from '@/types/llm';
import { logger, logExternalCall, logRagStep, errorMessage } from '@/lib/logger';
import { buildQueryPrompt, buildSystemPrompt, FALLBACK_ANSWER } from '@/lib/llm/prompts';
import { DEFAULT_RAG_MAX_TOKENS, DEFAULT_RAG_TEMPERATURE } from './config';
import type { ToolManager } from './search-tools';

// =============================================================================
// Types
// =============================================================================

export interface GenerateRequest {
  query: string;
  conversationHistory?: string | null;
  tools?: ToolSchema[];
  toolManager?: ToolManager;
}

export interface GenerateResult {
  answer: string;
  /** Sources produced by tools during this call only */
  sources: Source[];
  toolCalls: number;
}

export interface AIGeneratorOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

// =============================================================================
// Helpers
// =============================================================================

function extractText(blocks: ResponseBlock[]): string {
  return blocks
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('')
    .trim();
}

function toolUses(blocks: ResponseBlock[]): ToolUseBlock[] {
  return blocks.filter((block): block is ToolUseBlock => block.type === 'tool_use');
}

function externalService(provider: string): 'anthropic' | 'openai' | 'other' {
  return provider === 'anthropic' || provider === 'openai' ? provider : 'other';
}

// =============================================================================
// AI Generator
// =============================================================================

export class AIGenerator {
  private log = logger.child({ layer: 'rag', service: 'AIGenerator' });

  constructor(
    private readonly adapter: LLMAdapter,
    private readonly options: AIGeneratorOptions = {}
  ) {}

  async generateResponse({
    query,
    conversationHistory,
    tools,
    toolManager,
  }: GenerateRequest): Promise<GenerateResult> {
    const system = buildSystemPrompt(conversationHistory);
    const messages: LLMMessage[] = [{ role: 'user', content: buildQueryPrompt(query) }];
    const hasTools = Boolean(tools && tools.length > 0);

    const first = await this.call({
      system,
      messages,
      ...(hasTools ? { tools } : {}),
    });

    const requested = toolUses(first.content);
    if (first.stopReason !== 'tool_use' || requested.length === 0 || !toolManager) {
      return { answer: extractText(first.content) || FALLBACK_ANSWER, sources: [], toolCalls: 0 };
    }

    // Execute every requested tool, in order
    const results: ToolResultBlock[] = [];
    const sources: Source[] = [];
    for (const toolUse of requested) {
      const result = await toolManager.executeTool(toolUse.name, toolUse.input);
      results.push({ type: 'tool_result', toolUseId: toolUse.id, content: result.content });
      sources.push(...result.sources);
    }

    messages.push({ role: 'assistant', content: first.content });
    messages.push({ role: 'user', content: results });

    const second = await this.call({ system, messages });

    const ignored = toolUses(second.content);
    if (ignored.length > 0) {
      this.log.warn(
        { tools: ignored.map((t) => t.name) },
        'Model requested tools after tool results; not executing'
      );
    }

    return {
      answer: extractText(second.content) || FALLBACK_ANSWER,
      sources,
      toolCalls: requested.length,
    };
  }

  private async call(request: LLMMessageRequest): Promise<LLMMessageResponse> {
    const start = Date.now();
    const service = externalService(this.adapter.provider);

    try {
      const response = await this.adapter.createMessage({
        ...request,
        model: this.options.model,
        temperature: this.options.temperature ?? DEFAULT_RAG_TEMPERATURE,
        maxTokens: this.options.maxTokens ?? DEFAULT_RAG_MAX_TOKENS,
      });

      logExternalCall(this.log, service, 'messages', {
        duration_ms: Date.now() - start,
        tokens: response.usage.totalTokens,
        model: this.options.model,
      });
      logRagStep(this.log, 'generation', { duration_ms: Date.now() - start });

      return response;
    } catch (error) {
      logExternalCall(this.log, service, 'messages', {
        duration_ms: Date.now() - start,
        error: errorMessage(error),
      });
      throw error;
    }
  }
}
