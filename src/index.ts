/**
 * Course materials question answering.
 *
 * Typical wiring:
 *
 *   const service = createRAGService(loadConfig());
 *   await loadStartupDocuments(service, config.docsPath);
 *   const response = await routeRequest(service, request);
 */

export { loadConfig, DEFAULT_MODELS, type AppConfig } from './lib/config';
export { logger } from './lib/logger';
export * from './lib/rag';
export * from './lib/api';
export * from './lib/vector';
export {
  createLLMAdapter,
  createLLMAdapterFromConfig,
  registerLLMAdapter,
  AnthropicAdapter,
  OpenAIAdapter,
} from './lib/llm';
export type * from './types/course';
export type * from './types/api';
export type * from './types/llm';
