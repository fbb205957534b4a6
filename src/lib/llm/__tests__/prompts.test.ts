/**
 * Tests for prompt builders
 */

import { describe, it, expect } from 'vitest';
import { buildQueryPrompt, buildSystemPrompt, COURSE_SYSTEM_PROMPT } from '../prompts';

describe('buildSystemPrompt', () => {
  it('should return the static prompt without history', () => {
    expect(buildSystemPrompt()).toBe(COURSE_SYSTEM_PROMPT);
    expect(buildSystemPrompt(null)).toBe(COURSE_SYSTEM_PROMPT);
  });

  it('should append previous conversation', () => {
    const prompt = buildSystemPrompt('User: Hi\nAssistant: Hello');
    expect(prompt).toBe(`${COURSE_SYSTEM_PROMPT}\n\nPrevious conversation:\nUser: Hi\nAssistant: Hello`);
  });

  it('should describe both tools', () => {
    expect(COURSE_SYSTEM_PROMPT).toContain('search_course_content');
    expect(COURSE_SYSTEM_PROMPT).toContain('get_course_outline');
  });
});

describe('buildQueryPrompt', () => {
  it('should wrap the raw question', () => {
    expect(buildQueryPrompt('What is RAG?')).toBe('Answer this question about course materials: What is RAG?');
  });
});
