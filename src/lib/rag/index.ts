/**
 * RAG Module Exports
 *
 * Provides the course-materials pipeline:
 * - Document parsing and chunking
 * - Embedding generation
 * - Semantic index and course resolution
 * - Retrieval tools and dispatch
 * - Session history
 * - Complete RAG service
 */

// Chunker
export {
  chunkText,
  splitSentences,
  normalizeWhitespace,
  estimateTokens,
  type ChunkOptions,
} from './chunker';

// Document processing
export { DocumentProcessor, type ProcessedDocument } from './document-processor';

// Embeddings
export {
  EmbeddingService,
  createEmbeddingService,
  DEFAULT_EMBEDDING_MODEL,
  EMBEDDING_DIMENSIONS,
  type EmbeddingProvider,
  type BatchEmbeddingResult,
  type EmbeddingConfig,
} from './embeddings';

// Semantic index
export {
  VectorStore,
  contentId,
  parseLessons,
  type SearchParams,
  type VectorStoreOptions,
} from './vector-store';
export {
  emptySearchResults,
  isEmptySearchResults,
  type SearchResults,
  type ContentMetadata,
} from './search-results';
export { CourseResolver, type CourseResolverOptions } from './course-resolver';

// Tools
export {
  CourseSearchTool,
  CourseOutlineTool,
  ToolManager,
  type Tool,
  type ToolResult,
} from './search-tools';

// Sessions
export { SessionManager, type Message, type MessageRole } from './session-manager';

// Generation
export {
  AIGenerator,
  type AIGeneratorOptions,
  type GenerateRequest,
  type GenerateResult,
} from './ai-generator';

// Service
export {
  RAGService,
  createRAGService,
  type RAGServiceDeps,
  type DocumentIngestResult,
  type FolderIngestResult,
  type FolderIngestOptions,
  type QueryResult,
} from './service';

// Config
export * from './config';
