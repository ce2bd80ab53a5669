/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
export {
  identityMiddleware,
  requireCaller,
  API_KEY_HEADER,
  OWNER_ID_HEADER,
} from "./auth.js";
export type { AuthConfig, CallerEnv } from "./auth.js";
