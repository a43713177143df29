/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createPacketRoutes } from "./packets.js";
export { createAccountRoutes } from "./accounts.js";
export { createEventRoutes } from "./events.js";
