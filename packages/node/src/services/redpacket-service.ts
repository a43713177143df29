/**
 * RedPacketService: Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One service holds one ledger, one packet module
 * and the event store they write to.
 */

import type { Logger } from "pino";
import { InMemoryEventStore, packetStreamId } from "@redpacket/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@redpacket/event-store";
import { InMemoryBalances } from "@redpacket/ledger";
import {
  PacketStorage,
  RedPacketError,
  RedPacketModule,
  packetStatus,
} from "@redpacket/packets";
import type {
  BlockClock,
  Origin,
  PacketClaimedEvent,
  PacketCreatedEvent,
  PacketDistributedEvent,
  PacketStatus,
  UnknownPacketPolicy,
} from "@redpacket/packets";
import type { AccountId, Balance, BlockNumber, Packet, PacketId } from "@redpacket/types";
import type { GenesisBalance } from "../config.js";

// =============================================================================
// Configuration
// =============================================================================

export interface RedPacketServiceConfig {
  readonly clock: BlockClock;
  readonly existentialDeposit?: Balance;
  readonly genesisBalances?: readonly GenesisBalance[];
  readonly unknownPacket?: UnknownPacketPolicy;
  readonly logger?: Logger;
}

export interface PacketView {
  readonly packet: Packet;
  readonly quota: Balance;
  readonly claims: readonly AccountId[];
  readonly status: PacketStatus;
}

export interface AccountView {
  readonly account: AccountId;
  readonly free: Balance;
  readonly reserved: Balance;
}

// =============================================================================
// Service
// =============================================================================

export class RedPacketService {
  readonly balances: InMemoryBalances;
  readonly eventStore: InMemoryEventStore;
  readonly storage: PacketStorage;
  readonly packets: RedPacketModule;

  private readonly clock: BlockClock;

  constructor(config: RedPacketServiceConfig) {
    this.clock = config.clock;
    this.balances = new InMemoryBalances({ existentialDeposit: config.existentialDeposit });
    for (const { account, amount } of config.genesisBalances ?? []) {
      this.balances.deposit(account, amount);
    }

    this.eventStore = new InMemoryEventStore({ logger: config.logger });
    this.storage = new PacketStorage();
    this.packets = new RedPacketModule({
      currency: this.balances,
      clock: config.clock,
      storage: this.storage,
      eventStore: this.eventStore,
      logger: config.logger,
      unknownPacket: config.unknownPacket,
    });
  }

  // ─── Operations ────────────────────────────────────────────────────

  createPacket(origin: Origin, quota: Balance, count: number, expires: number): PacketCreatedEvent {
    return this.packets.create(origin, quota, count, expires);
  }

  claim(origin: Origin, id: PacketId): PacketClaimedEvent {
    return this.packets.claim(origin, id);
  }

  distribute(origin: Origin, id: PacketId): PacketDistributedEvent {
    return this.packets.distribute(origin, id);
  }

  // ─── Queries ───────────────────────────────────────────────────────

  /**
   * @throws RedPacketError NOT_FOUND for an id that was never created
   */
  getPacket(id: PacketId): PacketView {
    const packet = this.packets.packet(id);
    if (packet === undefined) {
      throw new RedPacketError("NOT_FOUND", `Packet ${id} not found`);
    }
    return {
      packet,
      quota: this.packets.quotaOf(packet),
      claims: this.packets.claimsOf(id),
      status: packetStatus(packet, this.clock.blockNumber()),
    };
  }

  getAccount(account: AccountId): AccountView {
    return {
      account,
      free: this.balances.freeBalance(account),
      reserved: this.balances.reservedBalance(account),
    };
  }

  blockNumber(): BlockNumber {
    return this.clock.blockNumber();
  }

  nextPacketId(): PacketId {
    return this.packets.nextPacketId();
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  /**
   * Events of one packet's stream, oldest first.
   *
   * @throws RedPacketError NOT_FOUND for an id that was never created
   */
  packetEvents(id: PacketId, options?: ReadOptions): readonly StoredEvent[] {
    if (this.packets.packet(id) === undefined) {
      throw new RedPacketError("NOT_FOUND", `Packet ${id} not found`);
    }
    return this.eventStore.read(packetStreamId(id), options);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
