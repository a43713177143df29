/**
 * @redpacket/event-store: Red packet domain event definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`.
 * Amounts are base-10 strings so payloads stay JSON.
 */

import { isAccountId, isBlockNumber, isDecimalAmount } from "@redpacket/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Payloads
// =============================================================================

export interface PacketCreatedPayload {
  readonly packetId: number;
  readonly owner: string;
  readonly total: string;
  readonly count: number;
}

export interface PacketClaimedPayload {
  readonly packetId: number;
  readonly claimant: string;
  readonly quota: string;
}

export interface PacketDistributedPayload {
  readonly packetId: number;
  readonly owner: string;
  readonly totalTransferred: string;
}

/**
 * All red packet event types as constants.
 */
export const REDPACKET_EVENTS = {
  PACKET_CREATED: "redpacket.packet.created",
  PACKET_CLAIMED: "redpacket.packet.claimed",
  PACKET_DISTRIBUTED: "redpacket.packet.distributed",
} as const;

export type RedPacketEventType =
  (typeof REDPACKET_EVENTS)[keyof typeof REDPACKET_EVENTS];

/**
 * Stream holding every event of one packet.
 */
export function packetStreamId(packetId: number): string {
  return `packet-${packetId}`;
}

// =============================================================================
// Schemas
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

const REDPACKET_SCHEMAS: readonly EventSchema[] = [
  {
    type: REDPACKET_EVENTS.PACKET_CREATED,
    version: 1,
    description: "A packet was created and its total reserved on the owner",
    source: "redpacket",
    validate: (p): p is PacketCreatedPayload =>
      isObject(p) &&
      isBlockNumber(p.packetId) &&
      isAccountId(p.owner) &&
      isDecimalAmount(p.total) &&
      typeof p.count === "number" &&
      Number.isInteger(p.count) &&
      p.count > 0,
  },
  {
    type: REDPACKET_EVENTS.PACKET_CLAIMED,
    version: 1,
    description: "An account claimed one quota of a packet",
    source: "redpacket",
    validate: (p): p is PacketClaimedPayload =>
      isObject(p) &&
      isBlockNumber(p.packetId) &&
      isAccountId(p.claimant) &&
      isDecimalAmount(p.quota),
  },
  {
    type: REDPACKET_EVENTS.PACKET_DISTRIBUTED,
    version: 1,
    description: "A packet was distributed to its claimants",
    source: "redpacket",
    validate: (p): p is PacketDistributedPayload =>
      isObject(p) &&
      isBlockNumber(p.packetId) &&
      isAccountId(p.owner) &&
      isDecimalAmount(p.totalTransferred),
  },
];

/**
 * Create an EventCatalog holding the red packet events.
 */
export function createRedPacketCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of REDPACKET_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
