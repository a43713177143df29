/**
 * Red packet module types: errors, events, status and options.
 */

import type { Logger } from "pino";
import type { EventCatalog, EventStore } from "@redpacket/event-store";
import type { ReservableCurrency } from "@redpacket/ledger";
import type { AccountId, Balance, BlockNumber, PacketId } from "@redpacket/types";
import type { BlockClock } from "./clock.js";
import type { PacketStorage } from "./storage.js";

// =============================================================================
// Errors
// =============================================================================

export type RedPacketErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "GREATER_THAN_ZERO"
  | "EXPIRED"
  | "UNAVAILABLE"
  | "ALREADY_CLAIMED"
  | "NOT_OWNER"
  | "ALREADY_DISTRIBUTED"
  | "CAN_NOT_BE_DISTRIBUTED"
  | "NOT_FOUND"
  | "BAD_ORIGIN"
  | "INVALID_ARGUMENT"
  | "ID_EXHAUSTED";

export class RedPacketError extends Error {
  public readonly code: RedPacketErrorCode;
  constructor(code: RedPacketErrorCode, message: string) {
    super(message);
    this.name = "RedPacketError";
    this.code = code;
  }
}

// =============================================================================
// Status
// =============================================================================

/**
 * Derived lifecycle state of a packet.
 * Distributed wins over Full, Full over Expired.
 */
export type PacketStatus = "open" | "full" | "expired" | "distributed";

// =============================================================================
// Events
// =============================================================================

export interface PacketCreatedEvent {
  readonly type: "redpacket.packet.created";
  readonly packetId: PacketId;
  readonly owner: AccountId;
  readonly total: Balance;
  readonly count: number;
  readonly blockNumber: BlockNumber;
}

export interface PacketClaimedEvent {
  readonly type: "redpacket.packet.claimed";
  readonly packetId: PacketId;
  readonly claimant: AccountId;
  readonly quota: Balance;
  readonly blockNumber: BlockNumber;
}

export interface PacketDistributedEvent {
  readonly type: "redpacket.packet.distributed";
  readonly packetId: PacketId;
  readonly owner: AccountId;
  /** quota × number of claimants paid */
  readonly totalTransferred: Balance;
  readonly blockNumber: BlockNumber;
}

export type RedPacketEvent =
  | PacketCreatedEvent
  | PacketClaimedEvent
  | PacketDistributedEvent;

// =============================================================================
// Options
// =============================================================================

/**
 * How claim and distribute treat an id that was never created.
 *
 * - reject: fail with NOT_FOUND
 * - default: read a zero-valued packet owned by the zero account
 */
export type UnknownPacketPolicy = "reject" | "default";

export interface RedPacketModuleOptions {
  readonly currency: ReservableCurrency;
  readonly clock: BlockClock;

  /** Defaults to empty storage */
  readonly storage?: PacketStorage;

  /** Receives every emitted event. Defaults to an InMemoryEventStore. */
  readonly eventStore?: EventStore;

  /** Validates payloads before append. Defaults to the red packet catalog. */
  readonly catalog?: EventCatalog;

  /** Defaults to a silent logger */
  readonly logger?: Logger;

  readonly unknownPacket?: UnknownPacketPolicy;
}
