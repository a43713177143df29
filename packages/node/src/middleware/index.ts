/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery } from "./validate.js";
export type { ValidatedEnv, ValidatedQueryEnv } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
export {
  authMiddleware,
  accountHeaderMiddleware,
  API_KEY_HEADER,
  ACCOUNT_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
