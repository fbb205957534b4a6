/**
 * Vitest Setup File
 *
 * Global test setup and mocks.
 */

import { vi } from 'vitest';

// Placeholder credentials; no test reaches a real provider
process.env.ANTHROPIC_API_KEY = 'test-anthropic-key';
process.env.OPENAI_API_KEY = 'test-openai-key';
process.env.LOG_LEVEL = 'silent';

// Mock console.warn and console.log to keep test output clean
// Comment these out when debugging tests
vi.spyOn(console, 'warn').mockImplementation(() => {});
vi.spyOn(console, 'log').mockImplementation(() => {});
