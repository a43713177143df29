/**
 * @redpacket/node: HTTP node for the red packet module.
 *
 * Public API for embedding the node; main.ts starts a server.
 */

export { RedPacketService } from "./services/redpacket-service.js";
export type {
  RedPacketServiceConfig,
  PacketView,
  AccountView,
} from "./services/redpacket-service.js";
export { IntervalClock } from "./clock.js";
export type { IntervalClockOptions } from "./clock.js";
export {
  loadConfig,
  parseApiKeys,
  parseGenesisBalances,
  ConfigSchema,
} from "./config.js";
export type { AppConfig, ParsedApiKey, GenesisBalance } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
