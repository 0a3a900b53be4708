// src/middleware/index.ts
export { asyncHandler } from "./asyncHandler";
export { botAuthMiddleware, extractBearerToken } from "./auth";
export { errorHandler, notFoundHandler } from "./errorHandler";
export { validateEnvironment, parseEnvironment, resetEnvironmentCache, type Env } from "./validateEnv";
export {
  sendSuccess,
  sendError,
  sendNotFound,
  sendUnauthorized,
  sendValidationError,
  sendUnavailable,
  type ApiResponse,
} from "./responseHelper";
