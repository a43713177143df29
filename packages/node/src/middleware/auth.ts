/**
 * Authentication middleware.
 *
 * Resolves the caller of a request into a packet-module Origin:
 * - Secured mode: X-Api-Key header → looked up in the configured key registry
 * - Unsecured mode (tests, dev): X-Account-Id header, or no origin at all
 *
 * On success, sets `c.set("origin", origin)`.
 */

import type { MiddlewareHandler } from "hono";
import { NONE_ORIGIN, signed } from "@redpacket/packets";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACCOUNT_HEADER = "X-Account-Id";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Require a valid API key. Returns 401 if it is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("origin", signed(record.account));
    return next();
  };
}

/**
 * Trust the X-Account-Id header. Requests without it carry no origin,
 * so packet operations fail BAD_ORIGIN while reads still work.
 */
export function accountHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const account = c.req.header(ACCOUNT_HEADER);
    c.set("origin", account === undefined ? NONE_ORIGIN : signed(account));
    return next();
  };
}
