/**
 * File Parser Utility
 *
 * Extracts text content from the accepted course document formats:
 * - Plain text (.txt)
 * - PDF (.pdf)
 * - Word documents (.docx)
 */

import { readFile } from 'fs/promises';
import mammoth from 'mammoth';
import { logger, errorMessage } from '@/lib/logger';

const log = logger.child({ layer: 'ingestion', service: 'FileParser' });

// pdf-parse v2.x has a class-based API
// Use dynamic import to avoid type definition issues
interface PDFParserInstance {
  getText(): Promise<unknown>;
  destroy(): Promise<void> | void;
}

interface PDFParseConstructor {
  new (options: { data: Buffer }): PDFParserInstance;
}

let PDFParseClass: PDFParseConstructor | null = null;

async function getPDFParser(): Promise<PDFParseConstructor> {
  if (!PDFParseClass) {
    const mod = await import('pdf-parse');
    // Cast through unknown to avoid private property type conflicts
    PDFParseClass = (mod as unknown as { PDFParse: PDFParseConstructor }).PDFParse;
  }
  return PDFParseClass;
}

// =============================================================================
// Types
// =============================================================================

export interface ParseResult {
  content: string;
  metadata: {
    wordCount: number;
    charCount: number;
    /** True when undecodable bytes were replaced */
    lossy: boolean;
  };
}

export const SUPPORTED_EXTENSIONS = ['.txt', '.pdf', '.docx'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

// =============================================================================
// File Type Detection
// =============================================================================

/**
 * Get file extension from filename.
 */
export function getFileExtension(filename: string): string {
  const lastDot = filename.lastIndexOf('.');
  if (lastDot === -1) return '';
  return filename.slice(lastDot).toLowerCase();
}

/**
 * Check if file type is supported.
 */
export function isSupportedFileType(filename: string): boolean {
  const ext = getFileExtension(filename);
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode UTF-8 text. Invalid byte sequences get one retry with a lenient
 * decoder that substitutes U+FFFD instead of failing.
 */
export function decodeText(buffer: Uint8Array): { text: string; lossy: boolean } {
  try {
    return { text: new TextDecoder('utf-8', { fatal: true }).decode(buffer), lossy: false };
  } catch (error) {
    log.warn({ error: errorMessage(error) }, 'Invalid UTF-8, retrying with replacement decoding');
    return { text: new TextDecoder('utf-8').decode(buffer), lossy: true };
  }
}

function buildResult(content: string, lossy = false): ParseResult {
  return {
    content,
    metadata: {
      wordCount: content.split(/\s+/).filter(Boolean).length,
      charCount: content.length,
      lossy,
    },
  };
}

// =============================================================================
// Parsers
// =============================================================================

/**
 * Parse PDF file and extract text.
 */
async function parsePDF(buffer: Buffer): Promise<ParseResult> {
  const PDFParse = await getPDFParser();
  const parser = new PDFParse({ data: buffer });

  try {
    const result = await parser.getText();

    // getText() returns { pages, text, total }
    const rawText =
      typeof result === 'string'
        ? result
        : typeof result === 'object' && result !== null && 'text' in result && typeof result.text === 'string'
          ? result.text
          : '';

    const content = rawText
      .replace(/\r\n/g, '\n')
      .replace(/-- \d+ of \d+ --/g, '') // Remove page markers
      .replace(/\n{3,}/g, '\n\n')
      .trim();

    return buildResult(content);
  } finally {
    await parser.destroy();
  }
}

/**
 * Parse plain text file. Line structure is kept for the header grammar.
 */
function parseText(buffer: Buffer): ParseResult {
  const { text, lossy } = decodeText(buffer);
  return buildResult(text.replace(/\r\n/g, '\n'), lossy);
}

/**
 * Parse DOCX file and extract text.
 */
async function parseDOCX(buffer: Buffer): Promise<ParseResult> {
  const result = await mammoth.extractRawText({ buffer });

  const content = result.value
    .replace(/\r\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  return buildResult(content);
}

// =============================================================================
// Main Parser
// =============================================================================

/**
 * Parse a file buffer and extract text content.
 *
 * @param buffer - File contents as Buffer
 * @param filename - Original filename (for type detection)
 * @throws Error if file type is not supported
 */
export async function parseFile(buffer: Buffer, filename: string): Promise<ParseResult> {
  const ext = getFileExtension(filename);

  switch (ext) {
    case '.txt':
      return parseText(buffer);
    case '.pdf':
      return parsePDF(buffer);
    case '.docx':
      return parseDOCX(buffer);
    default:
      throw new Error(
        `Unsupported file type: ${ext || '(none)'}. Supported types: ${SUPPORTED_EXTENSIONS.join(', ')}`
      );
  }
}

/**
 * Read a course document from disk and extract its text.
 */
export async function readDocumentFile(filePath: string): Promise<ParseResult> {
  const buffer = await readFile(filePath);
  return parseFile(buffer, filePath);
}
