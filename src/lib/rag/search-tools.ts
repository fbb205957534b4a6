/**
 * Retrieval tools exposed to the model, and the registry that dispatches them.
 *
 * Each execution returns its own sources so concurrent queries never share
 * attribution state. The registry additionally remembers the most recent
 * sources per tool for callers that read them after the fact.
 */

import { z } from 'zod';
import type { Source } from '@/types/course';
import type { ToolSchema } from '@/types/llm';
import { logger, logRagStep, errorMessage } from '@/lib/logger';
import { isEmptySearchResults, type SearchResults } from './search-results';
import type { VectorStore } from './vector-store';

// =============================================================================
// Types
// =============================================================================

export interface ToolResult {
  /** Text handed back to the model */
  content: string;
  sources: Source[];
}

export interface Tool {
  schema(): ToolSchema;
  execute(args: Record<string, unknown>): Promise<ToolResult>;
}

function invalidArguments(toolName: string, error: z.ZodError): ToolResult {
  const detail = error.errors.map((e) => `${e.path.join('.') || 'input'}: ${e.message}`).join('; ');
  return { content: `Invalid arguments for tool '${toolName}': ${detail}`, sources: [] };
}

// =============================================================================
// Course Search Tool
// =============================================================================

const searchArgsSchema = z.object({
  query: z.string().min(1),
  course_name: z.string().nullish(),
  lesson_number: z
    .union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)])
    .nullish(),
});

export class CourseSearchTool implements Tool {
  static readonly NAME = 'search_course_content';

  constructor(private readonly store: VectorStore) {}

  schema(): ToolSchema {
    return {
      name: CourseSearchTool.NAME,
      description: 'Search course materials with smart course name matching and lesson filtering',
      inputSchema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'What to search for in the course content',
          },
          course_name: {
            type: 'string',
            description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          },
          lesson_number: {
            type: 'integer',
            description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
          },
        },
        required: ['query'],
      },
    };
  }

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = searchArgsSchema.safeParse(args);
    if (!parsed.success) {
      return invalidArguments(CourseSearchTool.NAME, parsed.error);
    }

    const { query } = parsed.data;
    const courseName = parsed.data.course_name ?? undefined;
    const lessonNumber = parsed.data.lesson_number ?? undefined;
    const results = await this.store.search({ query, courseName, lessonNumber });

    if (results.error) {
      return { content: results.error, sources: [] };
    }

    if (isEmptySearchResults(results)) {
      let message = 'No relevant content found';
      if (courseName) message += ` in course '${courseName}'`;
      if (lessonNumber !== undefined) message += ` in lesson ${lessonNumber}`;
      return { content: `${message}.`, sources: [] };
    }

    return this.formatResults(results);
  }

  private async formatResults(results: SearchResults): Promise<ToolResult> {
    const blocks: string[] = [];
    const sources: Source[] = [];
    const seen = new Set<string>();

    for (let i = 0; i < results.documents.length; i++) {
      const { courseTitle, lessonNumber } = results.metadata[i];
      const label = lessonNumber === null ? courseTitle : `${courseTitle} - Lesson ${lessonNumber}`;

      blocks.push(`[${label}]\n${results.documents[i]}`);

      if (seen.has(label)) continue;
      seen.add(label);

      const lessonLink = lessonNumber === null
        ? null
        : await this.store.getLessonLink(courseTitle, lessonNumber);
      const url = lessonLink ?? (await this.store.getCourseLink(courseTitle));
      sources.push({ text: label, url });
    }

    return { content: blocks.join('\n\n'), sources };
  }
}

// =============================================================================
// Course Outline Tool
// =============================================================================

const outlineArgsSchema = z.object({
  course_name: z.string().min(1),
});

export class CourseOutlineTool implements Tool {
  static readonly NAME = 'get_course_outline';

  constructor(private readonly store: VectorStore) {}

  schema(): ToolSchema {
    return {
      name: CourseOutlineTool.NAME,
      description: 'Get the outline of a course: its title, link and complete lesson list',
      inputSchema: {
        type: 'object',
        properties: {
          course_name: {
            type: 'string',
            description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          },
        },
        required: ['course_name'],
      },
    };
  }

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = outlineArgsSchema.safeParse(args);
    if (!parsed.success) {
      return invalidArguments(CourseOutlineTool.NAME, parsed.error);
    }

    const courseName = parsed.data.course_name;
    const title = await this.store.resolveCourseName(courseName);
    const course = title ? await this.store.getCourseMetadata(title) : null;
    if (!course) {
      return { content: `No course found matching '${courseName}'`, sources: [] };
    }

    const lines = [`Course: ${course.title}`];
    if (course.courseLink) lines.push(`Course Link: ${course.courseLink}`);
    if (course.instructor) lines.push(`Instructor: ${course.instructor}`);
    lines.push(`Lessons (${course.lessons.length}):`);
    for (const lesson of course.lessons) {
      lines.push(`Lesson ${lesson.lesson_number}: ${lesson.lesson_title}`);
    }

    return {
      content: lines.join('\n'),
      sources: [{ text: course.title, url: course.courseLink }],
    };
  }
}

// =============================================================================
// Tool Manager
// =============================================================================

export class ToolManager {
  private tools = new Map<string, Tool>();
  private lastSources = new Map<string, Source[]>();
  private log = logger.child({ layer: 'rag', service: 'ToolManager' });

  /**
   * Register a tool under its schema name.
   * @throws Error if the schema has no name
   */
  register(tool: Tool): void {
    const { name } = tool.schema();
    if (!name) {
      throw new Error('Tool must have a name');
    }
    this.tools.set(name, tool);
  }

  getToolDefinitions(): ToolSchema[] {
    return [...this.tools.values()].map((tool) => tool.schema());
  }

  /**
   * Run a tool by name. Unknown tools and tool failures come back as text.
   */
  async executeTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      this.log.warn({ tool: name }, 'Unknown tool requested');
      return { content: `Tool '${name}' not found`, sources: [] };
    }

    const start = Date.now();
    try {
      const result = await tool.execute(args);
      this.lastSources.set(name, result.sources);
      logRagStep(this.log, 'tool_call', { tool: name, duration_ms: Date.now() - start });
      return result;
    } catch (error) {
      const message = errorMessage(error);
      logRagStep(this.log, 'tool_call', { tool: name, duration_ms: Date.now() - start, error: message });
      return { content: `Tool '${name}' failed: ${message}`, sources: [] };
    }
  }

  /**
   * Sources from the first registered tool whose last run produced any.
   */
  getLastSources(): Source[] {
    for (const name of this.tools.keys()) {
      const sources = this.lastSources.get(name);
      if (sources && sources.length > 0) return sources;
    }
    return [];
  }

  resetSources(): void {
    this.lastSources.clear();
  }
}
