/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Origin } from "@redpacket/packets";
import type { RedPacketService } from "../services/redpacket-service.js";

/**
 * Hono environment type for the red packet node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    service: RedPacketService;

    /** Caller of the current request (set by auth middleware) */
    origin: Origin;
  };
}
