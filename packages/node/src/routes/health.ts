/**
 * Health check routes.
 *
 * GET /health  Liveness check (200 while the server is up)
 * GET /ready   Readiness check (event store hash chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { RedPacketService } from "../services/redpacket-service.js";

export function createHealthRoutes(service: RedPacketService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      blockNumber: service.blockNumber(),
      nextPacketId: service.nextPacketId(),
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      eventStore: {
        valid: integrity.valid,
        lastVerifiedPosition: integrity.lastVerifiedPosition,
        errors: integrity.errors.length,
      },
      timestamp: new Date().toISOString(),
    };
    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
