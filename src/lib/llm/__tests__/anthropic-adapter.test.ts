/**
 * Tests for Anthropic Adapter
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockMessagesCreate = vi.fn();
const mockConstructorCalls: Array<{ apiKey: string; baseURL?: string; timeout?: number }> = [];

vi.mock('@anthropic-ai/sdk', () => {
  return {
    default: class MockAnthropic {
      messages = { create: mockMessagesCreate };
      constructor(config: { apiKey: string; baseURL?: string; timeout?: number }) {
        mockConstructorCalls.push(config);
      }
    },
  };
});

import { AnthropicAdapter } from '../anthropic-adapter';
import type { ToolSchema } from '@/types/llm';

// =============================================================================
// Test Setup
// =============================================================================

const outlineTool: ToolSchema = {
  name: 'get_course_outline',
  description: 'Get a course outline',
  inputSchema: {
    type: 'object',
    properties: { course_name: { type: 'string', description: 'Course title' } },
    required: ['course_name'],
  },
};

function message(content: unknown[], stopReason: string) {
  return {
    content,
    stop_reason: stopReason,
    usage: { input_tokens: 30, output_tokens: 10 },
  };
}

describe('AnthropicAdapter', () => {
  beforeEach(() => {
    mockMessagesCreate.mockReset();
    mockConstructorCalls.length = 0;
  });

  it('should pass key, base URL and timeout to the client', () => {
    const adapter = new AnthropicAdapter({ apiKey: 'test-key', timeoutMs: 1000 });

    expect(adapter.provider).toBe('anthropic');
    expect(mockConstructorCalls).toEqual([{ apiKey: 'test-key', baseURL: undefined, timeout: 1000 }]);
  });

  it('should send system, messages and defaults without tools', async () => {
    mockMessagesCreate.mockResolvedValue(message([{ type: 'text', text: 'Hello!' }], 'end_turn'));
    const adapter = new AnthropicAdapter({ apiKey: 'test-key' });

    const response = await adapter.createMessage({
      system: 'You are helpful.',
      messages: [{ role: 'user', content: 'Hi' }],
    });

    expect(mockMessagesCreate).toHaveBeenCalledWith({
      model: 'claude-sonnet-4-20250514',
      temperature: 0,
      max_tokens: 800,
      system: 'You are helpful.',
      messages: [{ role: 'user', content: 'Hi' }],
    });
    expect(response).toEqual({
      stopReason: 'end_turn',
      content: [{ type: 'text', text: 'Hello!' }],
      usage: { promptTokens: 30, completionTokens: 10, totalTokens: 40 },
    });
  });

  it('should send tools with automatic tool choice', async () => {
    mockMessagesCreate.mockResolvedValue(message([{ type: 'text', text: 'ok' }], 'end_turn'));
    const adapter = new AnthropicAdapter({ apiKey: 'test-key', defaultModel: 'claude-test' });

    await adapter.createMessage({
      system: 'sys',
      messages: [{ role: 'user', content: 'q' }],
      tools: [outlineTool],
      maxTokens: 100,
    });

    const params = mockMessagesCreate.mock.calls[0][0];
    expect(params.model).toBe('claude-test');
    expect(params.max_tokens).toBe(100);
    expect(params.tools).toEqual([
      {
        name: 'get_course_outline',
        description: 'Get a course outline',
        input_schema: outlineTool.inputSchema,
      },
    ]);
    expect(params.tool_choice).toEqual({ type: 'auto' });
  });

  it('should map tool_use blocks and stop reason', async () => {
    mockMessagesCreate.mockResolvedValue(
      message(
        [
          { type: 'text', text: 'Searching.' },
          { type: 'tool_use', id: 'toolu_1', name: 'get_course_outline', input: { course_name: 'MCP' } },
        ],
        'tool_use'
      )
    );
    const adapter = new AnthropicAdapter({ apiKey: 'test-key' });

    const response = await adapter.createMessage({ system: 'sys', messages: [{ role: 'user', content: 'q' }] });

    expect(response.stopReason).toBe('tool_use');
    expect(response.content).toEqual([
      { type: 'text', text: 'Searching.' },
      { type: 'tool_use', id: 'toolu_1', name: 'get_course_outline', input: { course_name: 'MCP' } },
    ]);
  });

  it('should map max_tokens and unknown stop reasons', async () => {
    const adapter = new AnthropicAdapter({ apiKey: 'test-key' });

    mockMessagesCreate.mockResolvedValueOnce(message([{ type: 'text', text: 'a' }], 'max_tokens'));
    expect((await adapter.createMessage({ system: 's', messages: [] })).stopReason).toBe('max_tokens');

    mockMessagesCreate.mockResolvedValueOnce(message([{ type: 'text', text: 'a' }], 'stop_sequence'));
    expect((await adapter.createMessage({ system: 's', messages: [] })).stopReason).toBe('end_turn');
  });

  it('should translate tool_result blocks', async () => {
    mockMessagesCreate.mockResolvedValue(message([{ type: 'text', text: 'Final' }], 'end_turn'));
    const adapter = new AnthropicAdapter({ apiKey: 'test-key' });

    await adapter.createMessage({
      system: 'sys',
      messages: [
        { role: 'assistant', content: [{ type: 'tool_use', id: 'toolu_1', name: 't', input: {} }] },
        { role: 'user', content: [{ type: 'tool_result', toolUseId: 'toolu_1', content: 'result' }] },
      ],
    });

    expect(mockMessagesCreate.mock.calls[0][0].messages).toEqual([
      { role: 'assistant', content: [{ type: 'tool_use', id: 'toolu_1', name: 't', input: {} }] },
      { role: 'user', content: [{ type: 'tool_result', tool_use_id: 'toolu_1', content: 'result' }] },
    ]);
  });
});
