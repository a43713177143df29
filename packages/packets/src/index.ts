/**
 * @redpacket/packets: Red packet (airdrop envelope) module.
 *
 * Provides:
 * - RedPacketModule with create / claim / distribute
 * - Packet storage with staged writes and snapshots
 * - Block clocks and origin authentication
 *
 * @packageDocumentation
 */

// Module
export {
  RedPacketModule,
  quotaOf,
  isFinished,
  isExpired,
  packetStatus,
} from "./redpacket.js";

// Types
export type {
  RedPacketErrorCode,
  PacketStatus,
  PacketCreatedEvent,
  PacketClaimedEvent,
  PacketDistributedEvent,
  RedPacketEvent,
  UnknownPacketPolicy,
  RedPacketModuleOptions,
} from "./types.js";
export { RedPacketError } from "./types.js";

// Storage
export {
  PacketStorage,
  PacketStore,
  ClaimLedger,
  IdAllocator,
  StorageTransaction,
  StorageError,
  defaultPacket,
} from "./storage.js";
export type {
  StorageErrorCode,
  PacketSnapshot,
  ClaimsSnapshot,
  PacketStorageSnapshot,
} from "./storage.js";

// Clock
export type { BlockClock, ClockErrorCode } from "./clock.js";
export { ManualClock, ClockError } from "./clock.js";

// Origin
export type { Origin } from "./origin.js";
export { ensureSigned, signed, ROOT_ORIGIN, NONE_ORIGIN } from "./origin.js";
