/**
 * Middleware exports
 */
export { corsMiddleware, preflightHandler } from "./cors.js";
export { requestLogger } from "./requestLogger.js";
export { clientDisconnect } from "./clientDisconnect.js";
export { errorHandler } from "./errorHandler.js";
export { notFoundHandler } from "./notFound.js";
