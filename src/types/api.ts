/**
 * API request and response types.
 */

// =============================================================================
// Query API
// =============================================================================

/**
 * Request body for POST /api/query
 */
export interface QueryRequest {
  query: string;
  /** Omit to start a new session */
  session_id?: string | null;
}

export interface SourceResponse {
  text: string;
  url: string | null;
}

/**
 * Response from POST /api/query
 */
export interface QueryResponse {
  answer: string;
  sources: SourceResponse[];
  session_id: string;
}

// =============================================================================
// Courses API
// =============================================================================

/**
 * Response from GET /api/courses
 */
export interface CourseStatsResponse {
  total_courses: number;
  course_titles: string[];
}

// =============================================================================
// Errors
// =============================================================================

export interface ErrorResponse {
  detail: string;
  traceId?: string;
}
