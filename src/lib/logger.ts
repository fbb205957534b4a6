/**
 * Structured Logging
 *
 * One pino root logger; services take `logger.child({ layer, service })`,
 * HTTP handlers take a layer logger bound to a per-request trace id.
 * Anything derived from a thrown value goes through `errorMessage` so
 * credentials never reach the log stream.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { randomUUID } from 'crypto';

// =============================================================================
// Configuration
// =============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const STRUCTURED = process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test';

const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  ...(STRUCTURED
    ? {
        formatters: { level: (label) => ({ level: label }) },
        timestamp: pino.stdTimeFunctions.isoTime,
      }
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname' },
        },
      }),
};

export const logger: Logger = pino(pinoOptions);

// =============================================================================
// Request Context
// =============================================================================

export type LogLayer = 'api' | 'rag' | 'ingestion' | 'session' | 'db' | 'external';

export interface RequestContext {
  traceId: string;
  path?: string;
  method?: string;
  sessionId?: string;
}

export function createRequestContext(fields: Omit<RequestContext, 'traceId'> = {}): RequestContext {
  return { traceId: randomUUID(), ...fields };
}

/**
 * Child logger for a layer, bound to the request's trace fields when given.
 */
export function createLayerLogger(layer: LogLayer, ctx?: RequestContext): Logger {
  if (!ctx) {
    return logger.child({ layer });
  }
  return logger.child({
    layer,
    traceId: ctx.traceId,
    ...(ctx.path && { path: ctx.path }),
    ...(ctx.method && { method: ctx.method }),
    ...(ctx.sessionId && { session: ctx.sessionId }),
  });
}

// =============================================================================
// Redaction
// =============================================================================

const MAX_TEXT_LENGTH = 200;

const SECRET_PATTERNS = [
  /sk-ant-[a-zA-Z0-9_-]{20,}/g,
  /sk-[a-zA-Z0-9]{20,}/g,
  /postgres(?:ql)?:\/\/[^@\s]+@/g,
  /Bearer [a-zA-Z0-9._-]+/g,
  /api[_-]?key[=:]\s*["']?[^"'\s]+/gi,
];

/**
 * Replace API keys, bearer tokens and database credentials with `[REDACTED]`.
 */
export function sanitizeString(value: string): string {
  return SECRET_PATTERNS.reduce((text, pattern) => text.replace(pattern, '[REDACTED]'), value);
}

/**
 * Shorten user text (queries, chunks) before it is logged.
 */
export function truncateText(text: string, maxLength = MAX_TEXT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}... (${text.length} chars total)`;
}

export function errorMessage(error: unknown): string {
  return sanitizeString(error instanceof Error ? error.message : String(error));
}

// =============================================================================
// Timing
// =============================================================================

/**
 * Wall-clock timer with named phases.
 */
export class Timer {
  private readonly startedAt = Date.now();
  private marks = new Map<string, number>();

  mark(phase: string): void {
    this.marks.set(phase, Date.now());
  }

  /**
   * Milliseconds since `mark(phase)`, or 0 when the phase was never marked.
   */
  measure(phase: string): number {
    const markedAt = this.marks.get(phase);
    return markedAt === undefined ? 0 : Date.now() - markedAt;
  }

  elapsed(): number {
    return Date.now() - this.startedAt;
  }
}

// =============================================================================
// Event Helpers
// =============================================================================

/**
 * Successful events go to debug, failures to error with the message appended.
 */
function logOutcome(log: Logger, fields: Record<string, unknown>, label: string, error?: string): void {
  if (error) {
    log.error(fields, `${label} failed: ${error}`);
  } else {
    log.debug(fields, `${label} completed`);
  }
}

/**
 * Statement against a vector collection.
 */
export function logDbOperation(
  log: Logger,
  operation: string,
  details: { collection?: string; rows?: number; duration_ms: number; error?: string }
): void {
  logOutcome(log, { event: 'db_operation', operation, ...details }, `Database ${operation}`, details.error);
}

/**
 * Call to a model or embedding provider.
 */
export function logExternalCall(
  log: Logger,
  service: 'anthropic' | 'openai' | 'other',
  operation: string,
  details: { duration_ms?: number; error?: string; tokens?: number; model?: string }
): void {
  logOutcome(log, { event: 'external_call', service, operation, ...details }, `${service} ${operation}`, details.error);
}

/**
 * One stage of the question-answering pipeline.
 */
export function logRagStep(
  log: Logger,
  step: 'ingestion' | 'retrieval' | 'tool_call' | 'generation',
  details: { duration_ms?: number; chunks?: number; tool?: string; course?: string; error?: string }
): void {
  logOutcome(log, { event: `rag_${step}`, ...details }, `RAG ${step}`, details.error);
}

export type { Logger } from 'pino';
