/**
 * Global event log.
 *
 * GET /api/v1/events   Every stored event in append order
 *
 * One packet's stream is served under /api/v1/packets/:id/events.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { pageOf } from "../types/pagination.js";
import { validateQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ListEventsQuerySchema), (c) => {
    const { afterPosition, cursor, limit } = c.get("validatedQuery");
    const events = c
      .get("service")
      .readAllEvents(afterPosition === undefined ? undefined : { fromPosition: afterPosition + 1 });

    return c.json(pageOf(events, "globalPosition", (e) => e.globalPosition, { cursor, limit }));
  });

  return routes;
}
