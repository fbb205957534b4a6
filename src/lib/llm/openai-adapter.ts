/**
 * OpenAI adapter implementation.
 *
 * Supports:
 * - GPT-4o-mini (default, cheapest), GPT-4o, GPT-4-turbo
 * - Function tools, translated to and from tool_use / tool_result blocks
 */

import OpenAI from 'openai';
import { logger, errorMessage } from '@/lib/logger';
import {
  BaseLLMAdapter,
  LLMAdapterConfig,
  LLMMessage,
  LLMMessageRequest,
  LLMMessageResponse,
  ResponseBlock,
  StopReason,
} from './adapter';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

const log = logger.child({ layer: 'external', service: 'OpenAIAdapter' });

export class OpenAIAdapter extends BaseLLMAdapter {
  readonly provider = 'openai';
  private client: OpenAI;

  constructor(config: LLMAdapterConfig) {
    super({
      ...config,
      defaultModel: config.defaultModel ?? 'gpt-4o-mini',
    });

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
    });
  }

  /**
   * Run one round through the Chat Completions API.
   */
  async createMessage(request: LLMMessageRequest): Promise<LLMMessageResponse> {
    const { model, temperature, maxTokens } = this.resolveOptions(request);
    const tools = request.tools ?? [];

    const response = await this.client.chat.completions.create({
      model,
      temperature,
      max_tokens: maxTokens,
      messages: [
        { role: 'system', content: request.system },
        ...request.messages.flatMap((message) => this.toChatMessages(message)),
      ],
      ...(tools.length > 0
        ? {
            tools: tools.map((tool) => ({
              type: 'function' as const,
              function: {
                name: tool.name,
                description: tool.description,
                parameters: tool.inputSchema,
              },
            })),
            tool_choice: 'auto' as const,
          }
        : {}),
    });

    const choice = response.choices[0];
    if (!choice) {
      throw new Error('OpenAI returned no choices');
    }

    const content: ResponseBlock[] = [];
    if (choice.message.content) {
      content.push({ type: 'text', text: choice.message.content });
    }
    for (const call of choice.message.tool_calls ?? []) {
      content.push({
        type: 'tool_use',
        id: call.id,
        name: call.function.name,
        input: parseArguments(call.function.name, call.function.arguments),
      });
    }

    return {
      stopReason: this.mapFinishReason(choice.finish_reason, content),
      content,
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }

  /**
   * Expand one adapter message into chat messages.
   * Tool results become `tool` messages, which must directly follow the
   * assistant turn that requested them.
   */
  private toChatMessages(message: LLMMessage): ChatMessage[] {
    if (typeof message.content === 'string') {
      return message.role === 'user'
        ? [{ role: 'user', content: message.content }]
        : [{ role: 'assistant', content: message.content }];
    }

    const text = message.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('\n');

    if (message.role === 'assistant') {
      const toolCalls = message.content.flatMap((block) =>
        block.type === 'tool_use'
          ? [
              {
                id: block.id,
                type: 'function' as const,
                function: { name: block.name, arguments: JSON.stringify(block.input) },
              },
            ]
          : []
      );

      return [
        {
          role: 'assistant',
          content: text || null,
          ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
        },
      ];
    }

    const toolMessages: ChatMessage[] = message.content.flatMap((block) =>
      block.type === 'tool_result'
        ? [{ role: 'tool' as const, tool_call_id: block.toolUseId, content: block.content }]
        : []
    );

    return text ? [...toolMessages, { role: 'user', content: text }] : toolMessages;
  }

  /**
   * Map OpenAI finish reason to our standard type.
   */
  private mapFinishReason(reason: string | null | undefined, content: ResponseBlock[]): StopReason {
    if (reason === 'tool_calls' || content.some((block) => block.type === 'tool_use')) {
      return 'tool_use';
    }
    if (reason === 'length') {
      return 'max_tokens';
    }
    return 'end_turn';
  }
}

/**
 * Decode function-call arguments. Malformed JSON yields no arguments.
 */
function parseArguments(toolName: string, raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    log.warn({ tool: toolName, error: errorMessage(error) }, 'Malformed tool arguments');
  }
  return {};
}
