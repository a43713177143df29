/**
 * @redpacket/types: Shared domain types for the red packet stack.
 *
 * These types are used across all packages:
 * - Ledger primitives (accounts, balances, block heights)
 * - The packet record
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Ledger primitives
export type {
  AccountId,
  Balance,
  BlockNumber,
  PacketId,
  Packet,
} from "./primitives.js";
export { ZERO_ACCOUNT } from "./primitives.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  MAX_PACKET_COUNT,
  isAccountId,
  isBalance,
  isBlockNumber,
  isDecimalAmount,
  isPacket,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
