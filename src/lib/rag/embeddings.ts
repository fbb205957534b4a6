/**
 * Embedding Service
 *
 * Generates vector embeddings for course titles and chunks using OpenAI's API.
 */

import OpenAI from 'openai';
import { logger, logExternalCall, errorMessage } from '@/lib/logger';

// =============================================================================
// Types
// =============================================================================

export interface BatchEmbeddingResult {
  /** One vector per input text, in input order */
  embeddings: number[][];
  totalTokens: number;
}

/**
 * Anything that turns text into vectors. Vector engines depend on this,
 * not on a particular vendor.
 */
export interface EmbeddingProvider {
  embedBatch(texts: string[]): Promise<BatchEmbeddingResult>;
}

export interface EmbeddingConfig {
  model: string;
  dimensions: number;
  batchSize: number;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const EMBEDDING_DIMENSIONS = 1536;
const MAX_BATCH_SIZE = 100; // OpenAI limit

// =============================================================================
// Embedding Service Class
// =============================================================================

export class EmbeddingService implements EmbeddingProvider {
  private client: OpenAI;
  private model: string;
  private dimensions: number;
  private batchSize: number;
  private log = logger.child({ layer: 'external', service: 'EmbeddingService' });

  constructor(apiKey: string, config: Partial<EmbeddingConfig> = {}) {
    this.client = new OpenAI({ apiKey });
    this.model = config.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = config.dimensions ?? EMBEDDING_DIMENSIONS;
    this.batchSize = Math.min(config.batchSize ?? MAX_BATCH_SIZE, MAX_BATCH_SIZE);
  }

  /**
   * Generate embeddings for multiple texts in batches.
   * Empty texts are rejected so output stays aligned with input ids.
   */
  async embedBatch(texts: string[]): Promise<BatchEmbeddingResult> {
    if (texts.some((t) => !t.trim())) {
      throw new Error('Cannot generate embedding for empty text');
    }

    if (texts.length === 0) {
      return { embeddings: [], totalTokens: 0 };
    }

    const allEmbeddings: number[][] = [];
    let totalTokens = 0;
    const start = Date.now();

    try {
      for (let i = 0; i < texts.length; i += this.batchSize) {
        const batch = texts.slice(i, i + this.batchSize);

        const response = await this.client.embeddings.create({
          model: this.model,
          input: batch,
          dimensions: this.dimensions,
        });

        // Ensure embeddings are in the same order as input
        const sortedData = [...response.data].sort((a, b) => a.index - b.index);
        allEmbeddings.push(...sortedData.map((d) => d.embedding));
        totalTokens += response.usage.total_tokens;
      }
    } catch (error) {
      logExternalCall(this.log, 'openai', 'embeddings', {
        model: this.model,
        duration_ms: Date.now() - start,
        error: errorMessage(error),
      });
      throw error;
    }

    logExternalCall(this.log, 'openai', 'embeddings', {
      model: this.model,
      duration_ms: Date.now() - start,
      tokens: totalTokens,
    });

    return { embeddings: allEmbeddings, totalTokens };
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create an EmbeddingService.
 * Falls back to OPENAI_API_KEY environment variable.
 */
export function createEmbeddingService(
  apiKey?: string | null,
  config?: Partial<EmbeddingConfig>
): EmbeddingService {
  const key = apiKey ?? process.env.OPENAI_API_KEY;

  if (!key) {
    throw new Error('No OpenAI API key provided and OPENAI_API_KEY not set');
  }

  return new EmbeddingService(key, config);
}
