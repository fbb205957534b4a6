/**
 * Document Chunker
 *
 * Splits text into overlapping chunks for retrieval.
 * Chunk boundaries always fall between sentences; a sentence is never cut.
 */

import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from './config';

// =============================================================================
// Types
// =============================================================================

export interface ChunkOptions {
  /** Target maximum chunk length in characters */
  chunkSize: number;
  /** Characters of the previous chunk repeated at the start of the next one */
  chunkOverlap: number;
}

const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  chunkOverlap: DEFAULT_CHUNK_OVERLAP,
};

// =============================================================================
// Sentence Splitting
// =============================================================================

/**
 * Capitalized abbreviations that end in a period but do not end a sentence.
 * Single capital letters (initials) are matched separately.
 */
const ABBREVIATIONS = new Set([
  'Dr', 'Mr', 'Mrs', 'Ms', 'Prof', 'Sr', 'Jr', 'St', 'Mt',
  'Gen', 'Capt', 'Lt', 'Col', 'Rev', 'Hon', 'Fig', 'No', 'Vol',
]);

const SENTENCE_BOUNDARY = /[.!?]\s+(?=[A-Z])/g;
const TRAILING_TOKEN = /(?:^|\s)([A-Z][a-z]*)\.$/;
// "e.g.", "i.e.", "U.S."
const DOTTED_TOKEN = /\w\.\w\.$/;

function endsWithAbbreviation(segment: string): boolean {
  if (DOTTED_TOKEN.test(segment)) return true;
  const match = TRAILING_TOKEN.exec(segment);
  if (!match) return false;
  const token = match[1];
  return token.length === 1 || ABBREVIATIONS.has(token);
}

/**
 * Collapse whitespace runs to single spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Split text into sentences on terminal punctuation followed by a capital.
 * "Dr. Smith", "J. Doe" and "e.g. Python" stay inside one sentence.
 */
export function splitSentences(text: string): string[] {
  const normalized = normalizeWhitespace(text);
  if (!normalized) return [];

  const sentences: string[] = [];
  const boundary = new RegExp(SENTENCE_BOUNDARY.source, 'g');
  let start = 0;
  let match: RegExpExecArray | null;

  while ((match = boundary.exec(normalized)) !== null) {
    const end = match.index + 1;
    if (match[0].startsWith('.') && endsWithAbbreviation(normalized.slice(start, end))) {
      continue;
    }
    sentences.push(normalized.slice(start, end));
    start = match.index + match[0].length;
  }

  const rest = normalized.slice(start);
  if (rest) sentences.push(rest);

  return sentences;
}

// =============================================================================
// Chunking
// =============================================================================

/**
 * Word-aligned tail of a chunk that fits in `overlap` characters
 * together with the joining space.
 */
function overlapTail(chunk: string, overlap: number): string {
  const limit = overlap - 1;
  if (limit <= 0) return '';

  const words = chunk.split(' ');
  let tail = '';
  for (let i = words.length - 1; i >= 0; i--) {
    const next = tail ? `${words[i]} ${tail}` : words[i];
    if (next.length > limit) break;
    tail = next;
  }
  return tail;
}

/**
 * Split text into sentence-packed chunks.
 *
 * Sentences are packed greedily until the next one would exceed `chunkSize`.
 * A single sentence longer than `chunkSize` becomes its own chunk.
 * Every chunk after the first starts with the overlap tail of its predecessor,
 * so chunk length stays within `chunkSize + chunkOverlap`.
 */
export function chunkText(text: string, options: Partial<ChunkOptions> = {}): string[] {
  const { chunkSize, chunkOverlap } = { ...DEFAULT_CHUNK_OPTIONS, ...options };

  const packed: string[] = [];
  let current = '';

  for (const sentence of splitSentences(text)) {
    const candidate = current ? `${current} ${sentence}` : sentence;
    if (current && candidate.length > chunkSize) {
      packed.push(current);
      current = sentence;
    } else {
      current = candidate;
    }
  }
  if (current) packed.push(current);

  if (chunkOverlap <= 0) return packed;

  return packed.map((chunk, index) => {
    if (index === 0) return chunk;
    const tail = overlapTail(packed[index - 1], chunkOverlap);
    return tail ? `${tail} ${chunk}` : chunk;
  });
}

/**
 * Rough token estimate (~4 characters per token for English).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
