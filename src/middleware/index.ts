export { pipeline } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { createErrorHandler, errorHandler, errorResponse } from './error-handler.js';
export { validateBody, parseJsonObject, isRecord } from './validate-body.js';
export { createLoggingMiddleware } from './logging.js';
