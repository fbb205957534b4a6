/**
 * RAG Configuration Constants
 *
 * Centralized configuration for RAG pipeline parameters.
 * These values are used as defaults when the environment does not override them.
 */

// =============================================================================
// Chunking Configuration
// =============================================================================

/**
 * Default chunk size in characters for document splitting.
 */
export const DEFAULT_CHUNK_SIZE = 800;

/**
 * Default overlap between chunks in characters.
 * Helps maintain context across chunk boundaries.
 */
export const DEFAULT_CHUNK_OVERLAP = 100;

// =============================================================================
// Retrieval Configuration
// =============================================================================

/**
 * Default number of chunks returned by a content search.
 */
export const DEFAULT_MAX_RESULTS = 5;

/**
 * Logical collection holding one entry per course, embedded on its title.
 */
export const CATALOG_COLLECTION = 'course_catalog';

/**
 * Logical collection holding one entry per chunk.
 */
export const CONTENT_COLLECTION = 'course_content';

// =============================================================================
// Session Configuration
// =============================================================================

/**
 * Number of exchanges (user + assistant pairs) kept per session.
 */
export const DEFAULT_MAX_HISTORY = 2;

/**
 * Sessions held in memory before the least recently used one is evicted.
 */
export const DEFAULT_MAX_SESSIONS = 1000;

// =============================================================================
// LLM Configuration
// =============================================================================

/**
 * Temperature for answer generation. Zero keeps tool selection deterministic.
 */
export const DEFAULT_RAG_TEMPERATURE = 0;

/**
 * Max tokens for answer generation.
 */
export const DEFAULT_RAG_MAX_TOKENS = 800;

/**
 * Timeout applied to outbound model calls.
 */
export const LLM_TIMEOUT_MS = 60_000;
