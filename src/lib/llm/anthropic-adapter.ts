/**
 * Anthropic adapter implementation.
 *
 * Speaks the Messages API directly: content blocks, tool schemas and stop
 * reasons map one-to-one onto the adapter protocol.
 */

import Anthropic from '@anthropic-ai/sdk';
import {
  BaseLLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMMessageRequest,
  LLMMessageResponse,
  ResponseBlock,
  StopReason,
} from './adapter';

export class AnthropicAdapter extends BaseLLMAdapter {
  readonly provider = 'anthropic';
  private client: Anthropic;

  constructor(config: LLMAdapterConfig) {
    super({
      ...config,
      defaultModel: config.defaultModel ?? 'claude-sonnet-4-20250514',
    });

    this.client = new Anthropic({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
    });
  }

  async createMessage(request: LLMMessageRequest): Promise<LLMMessageResponse> {
    const { model, temperature, maxTokens } = this.resolveOptions(request);
    const hasTools = request.tools !== undefined && request.tools.length > 0;

    const response = await this.client.messages.create({
      model,
      temperature,
      max_tokens: maxTokens,
      system: request.system,
      messages: request.messages.map((message) => this.toMessageParam(message)),
      ...(hasTools
        ? {
            tools: request.tools?.map((tool) => ({
              name: tool.name,
              description: tool.description,
              input_schema: tool.inputSchema,
            })),
            tool_choice: { type: 'auto' as const },
          }
        : {}),
    });

    const content: ResponseBlock[] = [];
    for (const block of response.content) {
      if (block.type === 'text') {
        content.push({ type: 'text', text: block.text });
      } else if (block.type === 'tool_use') {
        content.push({
          type: 'tool_use',
          id: block.id,
          name: block.name,
          input: isRecord(block.input) ? block.input : {},
        });
      }
    }

    return {
      stopReason: this.mapStopReason(response.stop_reason),
      content,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
    };
  }

  /**
   * Convert an adapter message into the SDK's message param.
   */
  private toMessageParam(message: LLMMessage): Anthropic.MessageParam {
    if (typeof message.content === 'string') {
      return { role: message.role, content: message.content };
    }

    return {
      role: message.role,
      content: message.content.map((block): Anthropic.ContentBlockParam => {
        switch (block.type) {
          case 'text':
            return { type: 'text', text: block.text };
          case 'tool_use':
            return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
          case 'tool_result':
            return { type: 'tool_result', tool_use_id: block.toolUseId, content: block.content };
        }
      }),
    };
  }

  /**
   * Map Anthropic stop reason to our standard type.
   */
  private mapStopReason(reason: string | null): StopReason {
    switch (reason) {
      case 'tool_use':
        return 'tool_use';
      case 'max_tokens':
        return 'max_tokens';
      default:
        return 'end_turn';
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
