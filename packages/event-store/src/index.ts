/**
 * @redpacket/event-store: Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog for payload validation
 * - Red packet domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError, isHashedEvent } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Red packet domain events
export {
  REDPACKET_EVENTS,
  createRedPacketCatalog,
  packetStreamId,
} from "./redpacket-events.js";
export type {
  RedPacketEventType,
  PacketCreatedPayload,
  PacketClaimedPayload,
  PacketDistributedPayload,
} from "./redpacket-events.js";
