/**
 * API Handlers
 *
 * POST /api/query   - answer a question within a session
 * GET  /api/courses - catalog statistics
 *
 * Handlers take a Fetch API Request and return a Response, so any server
 * that speaks the Fetch API can mount them.
 */

import { z } from 'zod';
import type { CourseStatsResponse, ErrorResponse, QueryResponse } from '@/types/api';
import {
  createRequestContext,
  createLayerLogger,
  errorMessage,
  Timer,
  truncateText,
} from '@/lib/logger';
import type { RAGService } from '@/lib/rag/service';

// =============================================================================
// Request Validation
// =============================================================================

const MAX_QUERY_LENGTH = 4000;

const queryRequestSchema = z.object({
  query: z.string().max(MAX_QUERY_LENGTH),
  // An empty session id means "start a new session"
  session_id: z.string().nullish(),
});

// =============================================================================
// Response Helpers
// =============================================================================

function errorResponse(status: number, detail: string, traceId: string): Response {
  const body: ErrorResponse = { detail, traceId };
  return Response.json(body, { status, headers: { 'X-Trace-Id': traceId } });
}

function validationDetail(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

// =============================================================================
// Handlers
// =============================================================================

export async function handleQueryRequest(service: RAGService, request: Request): Promise<Response> {
  const ctx = createRequestContext({ path: '/api/query', method: 'POST' });
  const log = createLayerLogger('api', ctx);
  const timer = new Timer();

  log.info({ event: 'request_start' }, 'Query request received');

  let json: unknown;
  try {
    json = await request.json();
  } catch (error) {
    log.warn({ event: 'validation_error', error: errorMessage(error) }, 'Request body is not JSON');
    return errorResponse(422, 'Request body must be valid JSON', ctx.traceId);
  }

  const parsed = queryRequestSchema.safeParse(json);
  if (!parsed.success) {
    const detail = validationDetail(parsed.error);
    log.warn({ event: 'validation_error', error: detail }, 'Invalid request body');
    return errorResponse(422, detail, ctx.traceId);
  }

  const { query } = parsed.data;

  try {
    const sessionId = parsed.data.session_id || service.sessionManager.createSession();
    log.info({ event: 'request_parsed', sessionId, query: truncateText(query) }, 'Processing query');

    timer.mark('query');
    const result = await service.query(query, sessionId);
    const queryMs = timer.measure('query');

    const body: QueryResponse = {
      answer: result.answer,
      sources: result.sources,
      session_id: sessionId,
    };

    log.info(
      {
        event: 'request_complete',
        sessionId,
        sources: result.sources.length,
        query_ms: queryMs,
        total_ms: timer.elapsed(),
      },
      'Query request completed'
    );

    return Response.json(body, { headers: { 'X-Trace-Id': ctx.traceId } });
  } catch (error) {
    const message = errorMessage(error);
    log.error({ event: 'request_error', error: message, total_ms: timer.elapsed() }, 'Query request failed');
    return errorResponse(500, message, ctx.traceId);
  }
}

export async function handleCoursesRequest(service: RAGService): Promise<Response> {
  const ctx = createRequestContext({ path: '/api/courses', method: 'GET' });
  const log = createLayerLogger('api', ctx);

  try {
    const analytics = await service.getCourseAnalytics();
    const body: CourseStatsResponse = {
      total_courses: analytics.totalCourses,
      course_titles: analytics.courseTitles,
    };
    return Response.json(body, { headers: { 'X-Trace-Id': ctx.traceId } });
  } catch (error) {
    const message = errorMessage(error);
    log.error({ event: 'request_error', error: message }, 'Courses request failed');
    return errorResponse(500, message, ctx.traceId);
  }
}

// =============================================================================
// Router
// =============================================================================

/**
 * Route a request to its handler. Unknown paths get 404, wrong methods 405.
 */
export async function routeRequest(service: RAGService, request: Request): Promise<Response> {
  const { pathname } = new URL(request.url);

  const routes: Record<string, { method: string; handle: () => Promise<Response> }> = {
    '/api/query': { method: 'POST', handle: () => handleQueryRequest(service, request) },
    '/api/courses': { method: 'GET', handle: () => handleCoursesRequest(service) },
  };

  const route = routes[pathname];
  if (!route) {
    return Response.json({ detail: 'Not Found' }, { status: 404 });
  }
  if (request.method !== route.method) {
    return Response.json({ detail: 'Method Not Allowed' }, { status: 405, headers: { Allow: route.method } });
  }
  return route.handle();
}
