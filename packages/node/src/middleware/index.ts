/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { principalMiddleware, requirePrincipal, PRINCIPAL_HEADER } from "./principal.js";
export { validateBody, bodyOf, parseQuery } from "./validate.js";
