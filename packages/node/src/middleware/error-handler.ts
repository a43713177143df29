/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (RedPacketError, LedgerError, etc.)
 * to appropriate HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Packet errors
  NOT_FOUND: 404,
  BAD_ORIGIN: 401,
  NOT_OWNER: 403,
  ALREADY_CLAIMED: 409,
  ALREADY_DISTRIBUTED: 409,
  EXPIRED: 422,
  UNAVAILABLE: 422,
  CAN_NOT_BE_DISTRIBUTED: 422,
  INSUFFICIENT_BALANCE: 422,
  GREATER_THAN_ZERO: 400,
  INVALID_ARGUMENT: 400,

  // Ledger errors
  INSUFFICIENT_FUNDS: 422,
  KEEP_ALIVE: 422,
  EXISTENTIAL_DEPOSIT: 422,
  ACCOUNT_FROZEN: 422,
  OVERFLOW: 422,
  INVALID_AMOUNT: 400,
  INVALID_ACCOUNT: 400,

  // Event store errors
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  INVALID_VERSION: 400,

  // HTTP layer
  UNAUTHORIZED: 401,
  VALIDATION_ERROR: 400,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = errorCode(err);
  const status = code !== undefined ? STATUS_MAP[code] : undefined;

  // Don't leak internal details
  if (code === undefined || status === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), status);
}
