/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError, handleNotFound } from "./error-handler.js";
export { requestIdMiddleware, resolveRequestId, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, levelForStatus } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { issuePath, validateBody } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
