/**
 * Account routes.
 *
 * GET /api/v1/accounts/:account  Free and reserved balance
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toAccountJson } from "../types/views.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:account", (c) => {
    const view = c.get("service").getAccount(c.req.param("account"));
    return c.json({ data: toAccountJson(view) });
  });

  return routes;
}
