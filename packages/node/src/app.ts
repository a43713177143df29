/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { RedPacketService } from "./services/redpacket-service.js";
import type { RedPacketServiceConfig } from "./services/redpacket-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { accountHeaderMiddleware, authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPacketRoutes } from "./routes/packets.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: RedPacketServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  readonly idempotencyTtlMs?: number;
  /** Auth configuration. When provided, every /api request needs an API key. */
  readonly auth?: AuthConfig;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: RedPacketService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new RedPacketService(options.serviceConfig);
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Account-Id header
    app.use("/api/*", accountHeaderMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Idempotency for POST /api/* requests
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  // Mount v1 API routes
  app.route("/api/v1/packets", createPacketRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service, idempotencyStore };
}
