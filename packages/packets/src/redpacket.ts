/**
 * Red packet module: airdrop envelopes over a reservable currency.
 *
 * Lifecycle:
 *   create     → owner reserves quota × count
 *   claim      → up to count distinct accounts register for one quota each
 *   distribute → once full or expired, the owner pays every claimant but itself
 *
 * Rules:
 * - Every operation authenticates first and reads the clock once
 * - Failed validation writes nothing
 * - distribute commits its latch before any transfer, so a failed
 *   transfer leaves a partially distributed packet that cannot be retried
 * - Amounts are bigint via @redpacket/ledger balance math
 */

import { randomUUID } from "node:crypto";
import { pino } from "pino";
import type { Logger } from "pino";
import type { EventCatalog, EventStore } from "@redpacket/event-store";
import {
  createRedPacketCatalog,
  InMemoryEventStore,
  packetStreamId,
  REDPACKET_EVENTS,
} from "@redpacket/event-store";
import type {
  PacketClaimedPayload,
  PacketCreatedPayload,
  PacketDistributedPayload,
} from "@redpacket/event-store";
import type { ReservableCurrency } from "@redpacket/ledger";
import { formatBalance, MAX_BALANCE, saturatingMul } from "@redpacket/ledger";
import type {
  AccountId,
  Balance,
  BlockNumber,
  DomainEvent,
  Packet,
  PacketId,
} from "@redpacket/types";
import { MAX_PACKET_COUNT } from "@redpacket/types";
import type { BlockClock } from "./clock.js";
import type { Origin } from "./origin.js";
import { ensureSigned } from "./origin.js";
import { PacketStorage } from "./storage.js";
import type { StorageTransaction } from "./storage.js";
import type {
  PacketClaimedEvent,
  PacketCreatedEvent,
  PacketDistributedEvent,
  PacketStatus,
  RedPacketModuleOptions,
  UnknownPacketPolicy,
} from "./types.js";
import { RedPacketError } from "./types.js";

// =============================================================================
// Packet helpers
// =============================================================================

/**
 * The amount each claimant receives. Zero for a zero-count packet.
 */
export function quotaOf(packet: Packet): Balance {
  return packet.count === 0 ? 0n : packet.total / BigInt(packet.count);
}

/**
 * True once no further claim fits.
 *
 * Equivalent to `unclaimed = 0` unless the total was clamped at
 * MAX_BALANCE, where a remainder below one quota is left over.
 */
export function isFinished(packet: Packet): boolean {
  return packet.unclaimed === 0n || packet.unclaimed < quotaOf(packet);
}

export function isExpired(packet: Packet, now: BlockNumber): boolean {
  return now > packet.expiresAt;
}

export function packetStatus(packet: Packet, now: BlockNumber): PacketStatus {
  if (packet.distributed) return "distributed";
  if (isFinished(packet)) return "full";
  if (isExpired(packet, now)) return "expired";
  return "open";
}

// =============================================================================
// Module
// =============================================================================

export class RedPacketModule {
  private readonly currency: ReservableCurrency;
  private readonly clock: BlockClock;
  private readonly storage: PacketStorage;
  private readonly eventStore: EventStore;
  private readonly catalog: EventCatalog;
  private readonly logger: Logger;
  private readonly unknownPacket: UnknownPacketPolicy;

  constructor(options: RedPacketModuleOptions) {
    this.currency = options.currency;
    this.clock = options.clock;
    this.storage = options.storage ?? new PacketStorage();
    this.eventStore = options.eventStore ?? new InMemoryEventStore();
    this.catalog = options.catalog ?? createRedPacketCatalog();
    this.logger = options.logger ?? pino({ level: "silent" });
    this.unknownPacket = options.unknownPacket ?? "reject";
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create a packet of `count` shares of `quota`, claimable for
   * `expires` blocks from now. Reserves quota × count on the caller.
   */
  create(origin: Origin, quota: Balance, count: number, expires: number): PacketCreatedEvent {
    const owner = ensureSigned(origin);

    if (quota <= 0n || count <= 0 || expires <= 0) {
      throw new RedPacketError("GREATER_THAN_ZERO", "quota, count and expires must be greater than zero");
    }
    if (quota > MAX_BALANCE) {
      throw new RedPacketError("INVALID_ARGUMENT", `quota exceeds ${formatBalance(MAX_BALANCE)}`);
    }
    if (!Number.isInteger(count) || count > MAX_PACKET_COUNT) {
      throw new RedPacketError("INVALID_ARGUMENT", `count must be an integer up to ${MAX_PACKET_COUNT}, got ${count}`);
    }
    if (!Number.isSafeInteger(expires)) {
      throw new RedPacketError("INVALID_ARGUMENT", `expires must be a safe integer, got ${expires}`);
    }

    const now = this.clock.blockNumber();
    const total = saturatingMul(quota, BigInt(count));

    const free = this.currency.freeBalance(owner);
    if (free < total) {
      throw new RedPacketError(
        "INSUFFICIENT_BALANCE",
        `Free balance ${formatBalance(free)} of "${owner}" is below ${formatBalance(total)}`,
      );
    }

    const tx = this.storage.begin();
    const id = tx.allocateId();
    const packet: Packet = {
      id,
      total,
      unclaimed: total,
      count,
      expiresAt: Math.min(now + expires, Number.MAX_SAFE_INTEGER),
      owner,
      distributed: false,
    };
    const event = this.domainEvent(REDPACKET_EVENTS.PACKET_CREATED, owner, id, now, {
      packetId: id,
      owner,
      total: formatBalance(total),
      count,
    } satisfies PacketCreatedPayload);

    this.currency.reserve(owner, total);

    tx.setPacket(packet);
    tx.initClaims(id);
    tx.commit();
    this.emit(id, event);

    this.logger.debug({ packetId: id, owner, total: formatBalance(total), count, expiresAt: packet.expiresAt }, "packet created");

    return { type: REDPACKET_EVENTS.PACKET_CREATED, packetId: id, owner, total, count, blockNumber: now };
  }

  /**
   * Register the caller for one quota of packet `id`.
   */
  claim(origin: Origin, id: PacketId): PacketClaimedEvent {
    const claimant = ensureSigned(origin);
    const now = this.clock.blockNumber();
    const tx = this.storage.begin();
    const packet = this.load(tx, id);

    if (isExpired(packet, now)) {
      throw new RedPacketError("EXPIRED", `Packet ${id} expired at block ${packet.expiresAt}`);
    }
    if (isFinished(packet)) {
      throw new RedPacketError("UNAVAILABLE", `Packet ${id} has no unclaimed quota`);
    }
    if (tx.hasClaimed(id, claimant)) {
      throw new RedPacketError("ALREADY_CLAIMED", `"${claimant}" already claimed packet ${id}`);
    }

    const quota = quotaOf(packet);
    const event = this.domainEvent(REDPACKET_EVENTS.PACKET_CLAIMED, claimant, id, now, {
      packetId: id,
      claimant,
      quota: formatBalance(quota),
    } satisfies PacketClaimedPayload);

    tx.setPacket({ ...packet, unclaimed: packet.unclaimed - quota });
    tx.appendClaim(id, claimant);
    tx.commit();
    this.emit(id, event);

    this.logger.debug({ packetId: id, claimant, quota: formatBalance(quota) }, "packet claimed");

    return { type: REDPACKET_EVENTS.PACKET_CLAIMED, packetId: id, claimant, quota, blockNumber: now };
  }

  /**
   * Release the owner's reservation and pay one quota to every
   * claimant other than the owner.
   *
   * @throws the currency's error when a transfer fails; the packet
   * stays distributed and earlier transfers stand
   */
  distribute(origin: Origin, id: PacketId): PacketDistributedEvent {
    const caller = ensureSigned(origin);
    const now = this.clock.blockNumber();
    const tx = this.storage.begin();
    const packet = this.load(tx, id);

    if (packet.owner !== caller) {
      throw new RedPacketError("NOT_OWNER", `"${caller}" does not own packet ${id}`);
    }
    if (packet.distributed) {
      throw new RedPacketError("ALREADY_DISTRIBUTED", `Packet ${id} was already distributed`);
    }
    if (!isExpired(packet, now) && !isFinished(packet)) {
      throw new RedPacketError(
        "CAN_NOT_BE_DISTRIBUTED",
        `Packet ${id} is neither full nor expired (expires at block ${packet.expiresAt})`,
      );
    }

    const shortfall = this.currency.unreserve(packet.owner, packet.total);
    if (shortfall > 0n) {
      this.logger.warn({ packetId: id, owner: packet.owner, shortfall: formatBalance(shortfall) }, "reservation smaller than packet total");
    }

    tx.setPacket({ ...packet, distributed: true });
    tx.commit();

    const quota = quotaOf(packet);
    const recipients = this.storage.claims.get(id).filter((account) => account !== packet.owner);
    let paid = 0;
    for (const recipient of recipients) {
      try {
        this.currency.transfer(packet.owner, recipient, quota, "keep-alive");
      } catch (err) {
        this.logger.warn(
          { packetId: id, paid, of: recipients.length, recipient, err },
          "packet partially distributed",
        );
        throw err;
      }
      paid += 1;
    }

    const totalTransferred = quota * BigInt(paid);
    this.emit(
      id,
      this.domainEvent(REDPACKET_EVENTS.PACKET_DISTRIBUTED, caller, id, now, {
        packetId: id,
        owner: packet.owner,
        totalTransferred: formatBalance(totalTransferred),
      } satisfies PacketDistributedPayload),
    );

    this.logger.debug({ packetId: id, paid, totalTransferred: formatBalance(totalTransferred) }, "packet distributed");

    return {
      type: REDPACKET_EVENTS.PACKET_DISTRIBUTED,
      packetId: id,
      owner: packet.owner,
      totalTransferred,
      blockNumber: now,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  packet(id: PacketId): Packet | undefined {
    return this.storage.packets.get(id);
  }

  packetOrDefault(id: PacketId): Packet {
    return this.storage.packets.getOrDefault(id);
  }

  claimsOf(id: PacketId): readonly AccountId[] {
    return this.storage.claims.get(id);
  }

  nextPacketId(): PacketId {
    return this.storage.ids.peek();
  }

  quotaOf(packet: Packet): Balance {
    return quotaOf(packet);
  }

  /**
   * Status at the current block, or undefined for an unknown id.
   */
  status(id: PacketId): PacketStatus | undefined {
    const packet = this.storage.packets.get(id);
    return packet === undefined ? undefined : packetStatus(packet, this.clock.blockNumber());
  }

  blockNumber(): BlockNumber {
    return this.clock.blockNumber();
  }

  get events(): EventStore {
    return this.eventStore;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private load(tx: StorageTransaction, id: PacketId): Packet {
    if (!Number.isSafeInteger(id) || id < 0) {
      throw new RedPacketError("INVALID_ARGUMENT", `Packet id must be a non-negative integer, got ${id}`);
    }
    const packet = tx.getPacket(id);
    if (packet !== undefined) {
      return packet;
    }
    if (this.unknownPacket === "default") {
      return tx.getPacketOrDefault(id);
    }
    throw new RedPacketError("NOT_FOUND", `Packet ${id} not found`);
  }

  private domainEvent(
    type: string,
    actor: AccountId,
    packetId: PacketId,
    blockNumber: BlockNumber,
    payload: DomainEvent["payload"],
  ): DomainEvent {
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date().toISOString(),
        actor,
        correlationId: packetStreamId(packetId),
        source: "redpacket",
        blockNumber,
      },
      payload,
    };
    this.catalog.assertValid(event);
    return event;
  }

  private emit(packetId: PacketId, event: DomainEvent): void {
    this.eventStore.append(packetStreamId(packetId), [event]);
  }
}
