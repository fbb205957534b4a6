/**
 * LLM Adapter Factory.
 *
 * Creates LLM adapters based on provider configuration.
 * Enables easy switching between providers without code changes.
 */

import type { LLMAdapter, LLMAdapterConfig, LLMProvider } from '@/types/llm';
import { AnthropicAdapter } from './anthropic-adapter';
import { OpenAIAdapter } from './openai-adapter';

// =============================================================================
// Adapter Registry
// =============================================================================

type AdapterConstructor = new (config: LLMAdapterConfig) => LLMAdapter;

const adapterRegistry = new Map<LLMProvider, AdapterConstructor>([
  ['anthropic', AnthropicAdapter],
  ['openai', OpenAIAdapter],
]);

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an LLM adapter for a specific provider.
 *
 * @throws Error if provider is not supported
 *
 * @example
 * const adapter = createLLMAdapter('anthropic', {
 *   apiKey: process.env.ANTHROPIC_API_KEY ?? '',
 *   defaultModel: 'claude-sonnet-4-20250514',
 * });
 */
export function createLLMAdapter(
  provider: LLMProvider,
  config: LLMAdapterConfig
): LLMAdapter {
  const AdapterClass = adapterRegistry.get(provider);

  if (!AdapterClass) {
    throw new Error(
      `Unsupported LLM provider: ${provider}. ` +
      `Supported providers: ${getSupportedProviders().join(', ')}`
    );
  }

  return new AdapterClass(config);
}

/**
 * Create an LLM adapter, falling back to environment variables for the key.
 *
 * @throws Error if the provider is unknown or no API key is available
 */
export function createLLMAdapterFromConfig(
  llmProvider: string,
  apiKey?: string | null,
  defaultModel?: string
): LLMAdapter {
  if (!isProviderSupported(llmProvider)) {
    throw new Error(
      `Unsupported LLM provider: ${llmProvider}. ` +
      `Supported providers: ${getSupportedProviders().join(', ')}`
    );
  }

  const key = apiKey || getApiKeyForProvider(llmProvider);
  return createLLMAdapter(llmProvider, { apiKey: key, defaultModel });
}

/**
 * Get API key from environment for a provider.
 *
 * @throws Error if API key is not configured
 */
function getApiKeyForProvider(provider: LLMProvider): string {
  const keyMap: Record<LLMProvider, string | undefined> = {
    anthropic: process.env.ANTHROPIC_API_KEY,
    openai: process.env.OPENAI_API_KEY,
  };

  const key = keyMap[provider];

  if (!key) {
    throw new Error(
      `API key not found for provider: ${provider}. ` +
      `Set the appropriate environment variable.`
    );
  }

  return key;
}

// =============================================================================
// Registry Management
// =============================================================================

/**
 * Get list of supported LLM providers.
 */
export function getSupportedProviders(): LLMProvider[] {
  return Array.from(adapterRegistry.keys());
}

/**
 * Register a new LLM adapter.
 * Allows extending with custom providers.
 */
export function registerLLMAdapter(
  provider: LLMProvider,
  adapterClass: AdapterConstructor
): void {
  adapterRegistry.set(provider, adapterClass);
}

/**
 * Check if a provider is supported.
 */
export function isProviderSupported(provider: string): provider is LLMProvider {
  return getSupportedProviders().some((supported) => supported === provider);
}
