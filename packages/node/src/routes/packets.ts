/**
 * Packet routes.
 *
 * POST /api/v1/packets                  Create a packet
 * GET  /api/v1/packets/:id              Packet, claims and status
 * POST /api/v1/packets/:id/claim        Claim one quota
 * POST /api/v1/packets/:id/distribute   Pay out a full or expired packet
 * GET  /api/v1/packets/:id/events       The packet's event stream by version
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { parseBalance } from "@redpacket/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { CreatePacketSchema, PacketEventsQuerySchema, PacketIdParamSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { pageOf } from "../types/pagination.js";
import { toEventJson, toPacketViewJson } from "../types/views.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export function createPacketRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreatePacketSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const event = service.createPacket(
      c.get("origin"),
      parseBalance(body.quota),
      body.count,
      body.expires,
    );
    return c.json({ data: toEventJson(event) }, 201);
  });

  routes.get("/:id", (c) => {
    const id = parsePacketId(c.req.param("id"));
    if (id === undefined) {
      return invalidId(c);
    }
    return c.json({ data: toPacketViewJson(c.get("service").getPacket(id)) });
  });

  routes.post("/:id/claim", (c) => {
    const id = parsePacketId(c.req.param("id"));
    if (id === undefined) {
      return invalidId(c);
    }
    const event = c.get("service").claim(c.get("origin"), id);
    return c.json({ data: toEventJson(event) });
  });

  routes.post("/:id/distribute", (c) => {
    const id = parsePacketId(c.req.param("id"));
    if (id === undefined) {
      return invalidId(c);
    }
    const event = c.get("service").distribute(c.get("origin"), id);
    return c.json({ data: toEventJson(event) });
  });

  routes.get("/:id/events", validateQuery(PacketEventsQuerySchema), (c) => {
    const id = parsePacketId(c.req.param("id"));
    if (id === undefined) {
      return invalidId(c);
    }
    const { afterVersion, cursor, limit } = c.get("validatedQuery");
    const events = c
      .get("service")
      .packetEvents(id, afterVersion === undefined ? undefined : { fromVersion: afterVersion + 1 });

    return c.json(pageOf(events, "version", (e) => e.version, { cursor, limit }));
  });

  return routes;
}

function parsePacketId(param: string): number | undefined {
  const result = PacketIdParamSchema.safeParse(param);
  return result.success ? result.data : undefined;
}

function invalidId(c: Context): Response {
  return c.json(
    createErrorEnvelope("VALIDATION_ERROR", "Packet id must be a non-negative integer"),
    400,
  );
}
