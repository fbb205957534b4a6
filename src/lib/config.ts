/**
 * Application Configuration
 *
 * Reads and validates environment variables once into a typed object.
 * Defaults mirror the values the pipeline was tuned with.
 */

import { z } from 'zod';
import type { LLMProvider } from '@/types/llm';
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MAX_HISTORY,
  DEFAULT_MAX_RESULTS,
} from '@/lib/rag/config';

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o-mini',
};

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

// =============================================================================
// Schema
// =============================================================================

const envSchema = z
  .object({
    LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
    LLM_MODEL: optionalString,
    ANTHROPIC_API_KEY: optionalString,
    OPENAI_API_KEY: optionalString,
    EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
    CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
    CHUNK_OVERLAP: nonNegativeInt(DEFAULT_CHUNK_OVERLAP),
    MAX_RESULTS: z.coerce.number().int().positive().default(DEFAULT_MAX_RESULTS),
    MAX_HISTORY: nonNegativeInt(DEFAULT_MAX_HISTORY),
    MAX_COURSE_DISTANCE: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.coerce.number().min(0).max(2).optional()
    ),
    VECTOR_STORE_PATH: z.string().default('./vector_db'),
    DATABASE_URL: optionalString,
    DOCS_PATH: z.string().default('../docs'),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

// =============================================================================
// Types
// =============================================================================

export interface AppConfig {
  llmProvider: LLMProvider;
  llmModel: string;
  anthropicApiKey?: string;
  openaiApiKey?: string;
  embeddingModel: string;
  embeddingDimensions: number;
  chunkSize: number;
  chunkOverlap: number;
  maxResults: number;
  /** Number of exchanges kept per session (messages = 2x) */
  maxHistory: number;
  /** Course names farther than this from every title do not resolve */
  maxCourseDistance?: number;
  vectorStorePath: string;
  databaseUrl?: string;
  docsPath: string;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Validate environment variables and build the application config.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;

  return {
    llmProvider: values.LLM_PROVIDER,
    llmModel: values.LLM_MODEL ?? DEFAULT_MODELS[values.LLM_PROVIDER],
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    openaiApiKey: values.OPENAI_API_KEY,
    embeddingModel: values.EMBEDDING_MODEL,
    embeddingDimensions: values.EMBEDDING_DIMENSIONS,
    chunkSize: values.CHUNK_SIZE,
    chunkOverlap: values.CHUNK_OVERLAP,
    maxResults: values.MAX_RESULTS,
    maxHistory: values.MAX_HISTORY,
    maxCourseDistance: values.MAX_COURSE_DISTANCE,
    vectorStorePath: values.VECTOR_STORE_PATH,
    databaseUrl: values.DATABASE_URL,
    docsPath: values.DOCS_PATH,
  };
}
