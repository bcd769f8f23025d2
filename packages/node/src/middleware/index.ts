/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler, getStatusCode } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, walletFromPath } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, parseInput, formatZodErrors } from "./validate.js";
