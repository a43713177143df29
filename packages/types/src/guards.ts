/**
 * Runtime Type Guards
 *
 * Narrowing functions for the shared domain types.
 * Used at system boundaries (request bodies, restored snapshots,
 * events read back from a store).
 */

import type { AccountId, Packet } from "./primitives.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Primitive guards
// =============================================================================

/** Largest count a packet accepts (u32). */
export const MAX_PACKET_COUNT = 0xffff_ffff;

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.length > 0;
}

export function isBalance(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

export function isBlockNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/** Matches a non-negative integer amount written in base 10. */
export function isDecimalAmount(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

export function isPacket(value: unknown): value is Packet {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isBlockNumber(v.id) &&
    isBalance(v.total) &&
    isBalance(v.unclaimed) &&
    typeof v.count === "number" &&
    Number.isInteger(v.count) &&
    v.count >= 0 &&
    v.count <= MAX_PACKET_COUNT &&
    isBlockNumber(v.expiresAt) &&
    typeof v.owner === "string" &&
    typeof v.distributed === "boolean"
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["redpacket", "ledger", "node"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source) &&
    (v.blockNumber === undefined || isBlockNumber(v.blockNumber))
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
