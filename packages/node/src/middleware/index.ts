/**
 * Middleware barrel — re-exports all middleware modules.
 */

export { handleError, statusOf } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { adminAuthMiddleware, API_KEY_HEADER } from "./auth.js";
export { parseBody, parseQuery, InvalidJsonError } from "./validate.js";
