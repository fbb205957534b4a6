/**
 * RAG Service
 *
 * Orchestrates the course-materials pipeline:
 * 1. Ingest documents into the catalog and content collections
 * 2. Answer questions through the AI generator and its tools
 * 3. Keep per-session conversation history
 */

import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import type { AppConfig } from '@/lib/config';
import type { Course, CourseAnalytics, Source } from '@/types/course';
import { createLLMAdapterFromConfig } from '@/lib/llm';
import { logger, logRagStep, errorMessage, Timer } from '@/lib/logger';
import { isSupportedFileType } from '@/lib/parsers';
import { createVectorClient } from '@/lib/vector';
import { AIGenerator } from './ai-generator';
import { DocumentProcessor } from './document-processor';
import { createEmbeddingService } from './embeddings';
import { CourseOutlineTool, CourseSearchTool, ToolManager } from './search-tools';
import { SessionManager } from './session-manager';
import { VectorStore } from './vector-store';

// Create a child logger for RAG service
const log = logger.child({ layer: 'rag', service: 'RAGService' });

// =============================================================================
// Types
// =============================================================================

export interface RAGServiceDeps {
  vectorStore: VectorStore;
  documentProcessor: DocumentProcessor;
  aiGenerator: AIGenerator;
  sessionManager: SessionManager;
  toolManager: ToolManager;
}

export interface DocumentIngestResult {
  course: Course | null;
  chunkCount: number;
}

export interface FolderIngestResult {
  courses: number;
  chunks: number;
}

export interface FolderIngestOptions {
  /** Drop every existing course before ingesting */
  clearExisting?: boolean;
}

export interface QueryResult {
  answer: string;
  sources: Source[];
}

// =============================================================================
// RAG Service Class
// =============================================================================

export class RAGService {
  readonly vectorStore: VectorStore;
  readonly sessionManager: SessionManager;
  readonly toolManager: ToolManager;
  private documentProcessor: DocumentProcessor;
  private aiGenerator: AIGenerator;

  constructor(deps: RAGServiceDeps) {
    this.vectorStore = deps.vectorStore;
    this.documentProcessor = deps.documentProcessor;
    this.aiGenerator = deps.aiGenerator;
    this.sessionManager = deps.sessionManager;
    this.toolManager = deps.toolManager;
  }

  // ===========================================================================
  // Ingestion
  // ===========================================================================

  /**
   * Ingest one document. Failures are logged and reported as no course.
   */
  async addCourseDocument(filePath: string): Promise<DocumentIngestResult> {
    const timer = new Timer();
    try {
      const { course, chunks } = await this.documentProcessor.processCourseDocument(filePath);
      await this.vectorStore.addCourseMetadata(course);
      await this.vectorStore.addCourseContent(chunks);

      logRagStep(log, 'ingestion', {
        course: course.title,
        chunks: chunks.length,
        duration_ms: timer.elapsed(),
      });
      return { course, chunkCount: chunks.length };
    } catch (error) {
      logRagStep(log, 'ingestion', { error: errorMessage(error), duration_ms: timer.elapsed() });
      return { course: null, chunkCount: 0 };
    }
  }

  /**
   * Ingest every supported file in a folder. Courses whose title is already
   * indexed are skipped; a failing file does not stop the others.
   */
  async addCourseFolder(folderPath: string, options: FolderIngestOptions = {}): Promise<FolderIngestResult> {
    const totals: FolderIngestResult = { courses: 0, chunks: 0 };

    if (!(await this.isDirectory(folderPath))) {
      log.warn({ folderPath }, 'Course folder does not exist');
      return totals;
    }

    if (options.clearExisting) {
      await this.vectorStore.clearAllData();
    }

    const existingTitles = new Set(await this.vectorStore.getExistingCourseTitles());
    const fileNames = (await readdir(folderPath)).filter(isSupportedFileType).sort();

    for (const fileName of fileNames) {
      const filePath = join(folderPath, fileName);
      if (!(await this.isFile(filePath))) continue;

      try {
        const { course, chunks } = await this.documentProcessor.processCourseDocument(filePath);

        if (existingTitles.has(course.title)) {
          log.info({ course: course.title, file: fileName }, 'Course already indexed, skipping');
          continue;
        }

        await this.vectorStore.addCourseMetadata(course);
        await this.vectorStore.addCourseContent(chunks);
        existingTitles.add(course.title);

        totals.courses += 1;
        totals.chunks += chunks.length;
        log.info({ course: course.title, chunks: chunks.length }, 'Course ingested');
      } catch (error) {
        log.error({ file: fileName, error: errorMessage(error) }, 'Failed to ingest course file');
      }
    }

    return totals;
  }

  // ===========================================================================
  // Query
  // ===========================================================================

  /**
   * Answer a question. With a session id, history is read before and the
   * exchange recorded after, one query per session at a time.
   */
  async query(query: string, sessionId?: string | null): Promise<QueryResult> {
    if (!sessionId) {
      return this.answer(query, null);
    }
    return this.sessionManager.runExclusive(sessionId, () => this.answer(query, sessionId));
  }

  async getCourseAnalytics(): Promise<CourseAnalytics> {
    const courseTitles = await this.vectorStore.getExistingCourseTitles();
    return { totalCourses: courseTitles.length, courseTitles };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async answer(query: string, sessionId: string | null): Promise<QueryResult> {
    const timer = new Timer();
    const conversationHistory = this.sessionManager.getConversationHistory(sessionId);

    const result = await this.aiGenerator.generateResponse({
      query,
      conversationHistory,
      tools: this.toolManager.getToolDefinitions(),
      toolManager: this.toolManager,
    });

    this.toolManager.resetSources();

    if (sessionId) {
      this.sessionManager.addExchange(sessionId, query, result.answer);
    }

    log.info(
      {
        sessionId,
        toolCalls: result.toolCalls,
        sources: result.sources.length,
        total_ms: timer.elapsed(),
      },
      'Query answered'
    );

    return { answer: result.answer, sources: result.sources };
  }

  private async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch (error) {
      log.debug({ path, error: errorMessage(error) }, 'Path not accessible');
      return false;
    }
  }

  private async isFile(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isFile();
    } catch (error) {
      log.debug({ path, error: errorMessage(error) }, 'Path not accessible');
      return false;
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Wire a RAGService from application config.
 *
 * @throws Error if a required API key is missing
 */
export function createRAGService(config: AppConfig): RAGService {
  const embedder = createEmbeddingService(config.openaiApiKey, {
    model: config.embeddingModel,
    dimensions: config.embeddingDimensions,
  });

  const vectorStore = new VectorStore(createVectorClient(config, embedder), {
    maxResults: config.maxResults,
    maxCourseDistance: config.maxCourseDistance,
  });

  const apiKey = config.llmProvider === 'anthropic' ? config.anthropicApiKey : config.openaiApiKey;
  const adapter = createLLMAdapterFromConfig(config.llmProvider, apiKey, config.llmModel);

  const toolManager = new ToolManager();
  toolManager.register(new CourseSearchTool(vectorStore));
  toolManager.register(new CourseOutlineTool(vectorStore));

  return new RAGService({
    vectorStore,
    documentProcessor: new DocumentProcessor({
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
    }),
    aiGenerator: new AIGenerator(adapter, { model: config.llmModel }),
    sessionManager: new SessionManager(config.maxHistory),
    toolManager,
  });
}
