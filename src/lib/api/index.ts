/**
 * API module exports.
 */

export { handleQueryRequest, handleCoursesRequest, routeRequest } from './handlers';
export { loadStartupDocuments } from './startup';
