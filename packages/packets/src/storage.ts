/**
 * Packet storage.
 *
 * Three logical keys:
 * - Packets: id → Packet
 * - Claims: id → claimant accounts in acceptance order
 * - NextPacketId: the id allocator
 *
 * Operations stage their writes in a StorageTransaction and apply them
 * together on commit.
 */

import { formatBalance, MAX_BALANCE } from "@redpacket/ledger";
import type { AccountId, Balance, Packet, PacketId } from "@redpacket/types";
import { isAccountId, isDecimalAmount, isPacket, ZERO_ACCOUNT } from "@redpacket/types";
import { RedPacketError } from "./types.js";

export type StorageErrorCode = "TRANSACTION_CLOSED" | "INVALID_SNAPSHOT";

export class StorageError extends Error {
  public readonly code: StorageErrorCode;
  constructor(code: StorageErrorCode, message: string) {
    super(message);
    this.name = "StorageError";
    this.code = code;
  }
}

/**
 * The zero-valued packet read for an id that was never created.
 */
export function defaultPacket(id: PacketId): Packet {
  return {
    id,
    total: 0n,
    unclaimed: 0n,
    count: 0,
    expiresAt: 0,
    owner: ZERO_ACCOUNT,
    distributed: false,
  };
}

// =============================================================================
// Stores
// =============================================================================

export class PacketStore {
  private readonly _packets = new Map<PacketId, Packet>();

  get(id: PacketId): Packet | undefined {
    return this._packets.get(id);
  }

  getOrDefault(id: PacketId): Packet {
    return this._packets.get(id) ?? defaultPacket(id);
  }

  has(id: PacketId): boolean {
    return this._packets.has(id);
  }

  set(packet: Packet): void {
    this._packets.set(packet.id, packet);
  }

  /** Packets in id order. */
  values(): readonly Packet[] {
    return [...this._packets.values()].sort((a, b) => a.id - b.id);
  }

  get size(): number {
    return this._packets.size;
  }
}

export class ClaimLedger {
  private readonly _claims = new Map<PacketId, AccountId[]>();

  /** Start an empty claim list, replacing any existing one. */
  init(id: PacketId): void {
    this._claims.set(id, []);
  }

  append(id: PacketId, account: AccountId): void {
    const list = this._claims.get(id);
    if (list === undefined) {
      this._claims.set(id, [account]);
    } else {
      list.push(account);
    }
  }

  contains(id: PacketId, account: AccountId): boolean {
    return this._claims.get(id)?.includes(account) ?? false;
  }

  get(id: PacketId): readonly AccountId[] {
    return [...(this._claims.get(id) ?? [])];
  }

  ids(): readonly PacketId[] {
    return [...this._claims.keys()].sort((a, b) => a - b);
  }
}

export class IdAllocator {
  private _next: PacketId;

  constructor(next: PacketId = 0) {
    this._next = next;
  }

  peek(): PacketId {
    return this._next;
  }

  /**
   * Return the next id and advance.
   *
   * @throws RedPacketError ID_EXHAUSTED once ids reach MAX_SAFE_INTEGER
   */
  allocate(): PacketId {
    const id = this._next;
    assertIdAvailable(id);
    this._next = id + 1;
    return id;
  }
}

function assertIdAvailable(id: PacketId): void {
  if (id >= Number.MAX_SAFE_INTEGER) {
    throw new RedPacketError("ID_EXHAUSTED", "Packet ids are exhausted");
  }
}

// =============================================================================
// Snapshot
// =============================================================================

export interface PacketSnapshot {
  readonly id: PacketId;
  readonly total: string;
  readonly unclaimed: string;
  readonly count: number;
  readonly expiresAt: number;
  readonly owner: AccountId;
  readonly distributed: boolean;
}

export interface ClaimsSnapshot {
  readonly packetId: PacketId;
  readonly accounts: readonly AccountId[];
}

export interface PacketStorageSnapshot {
  readonly version: 1;
  readonly nextPacketId: PacketId;
  readonly packets: readonly PacketSnapshot[];
  readonly claims: readonly ClaimsSnapshot[];
  readonly createdAt: string;
}

// =============================================================================
// Storage
// =============================================================================

export class PacketStorage {
  readonly packets: PacketStore;
  readonly claims: ClaimLedger;
  readonly ids: IdAllocator;

  constructor(nextPacketId: PacketId = 0) {
    this.packets = new PacketStore();
    this.claims = new ClaimLedger();
    this.ids = new IdAllocator(nextPacketId);
  }

  begin(): StorageTransaction {
    return new StorageTransaction(this);
  }

  snapshot(): PacketStorageSnapshot {
    return {
      version: 1,
      nextPacketId: this.ids.peek(),
      packets: this.packets.values().map((p) => ({
        id: p.id,
        total: formatBalance(p.total),
        unclaimed: formatBalance(p.unclaimed),
        count: p.count,
        expiresAt: p.expiresAt,
        owner: p.owner,
        distributed: p.distributed,
      })),
      claims: this.claims.ids().map((packetId) => ({
        packetId,
        accounts: this.claims.get(packetId),
      })),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore storage from a snapshot.
   *
   * Every packet must pass isPacket with a count of at least one, and its
   * unclaimed amount must equal total minus one quota per recorded claim.
   * Claim lists must name distinct accounts, hold at most `count` of them,
   * and belong to a restored packet.
   *
   * @throws StorageError INVALID_SNAPSHOT on anything else
   */
  static fromSnapshot(snapshot: PacketStorageSnapshot): PacketStorage {
    if (snapshot.version !== 1) {
      throw invalid(`Unsupported packet snapshot version: ${String(snapshot.version)}`);
    }
    if (!Number.isSafeInteger(snapshot.nextPacketId) || snapshot.nextPacketId < 0) {
      throw invalid(`Invalid nextPacketId: ${String(snapshot.nextPacketId)}`);
    }

    const storage = new PacketStorage(snapshot.nextPacketId);

    for (const p of snapshot.packets) {
      const packet = {
        id: p.id,
        total: restoreAmount(p.total, p.id, "total"),
        unclaimed: restoreAmount(p.unclaimed, p.id, "unclaimed"),
        count: p.count,
        expiresAt: p.expiresAt,
        owner: p.owner,
        distributed: p.distributed,
      };
      if (!isPacket(packet) || packet.count < 1 || !isAccountId(packet.owner)) {
        throw invalid(`Packet ${String(p.id)} is not a well-formed packet`);
      }
      assertAllocated(packet.id, snapshot.nextPacketId);
      if (storage.packets.has(packet.id)) {
        throw invalid(`Packet ${packet.id} appears more than once`);
      }
      storage.packets.set(packet);
    }

    const claimed = new Set<PacketId>();
    for (const entry of snapshot.claims) {
      const packet = storage.packets.get(entry.packetId);
      if (packet === undefined) {
        throw invalid(`Claims recorded for packet ${String(entry.packetId)}, which is not in the snapshot`);
      }
      if (claimed.has(packet.id)) {
        throw invalid(`Claims for packet ${packet.id} appear more than once`);
      }
      claimed.add(packet.id);
      if (entry.accounts.length > packet.count) {
        throw invalid(
          `Packet ${packet.id} records ${entry.accounts.length} claims for a count of ${packet.count}`,
        );
      }
      const seen = new Set<AccountId>();
      for (const account of entry.accounts) {
        if (!isAccountId(account) || seen.has(account)) {
          throw invalid(`Packet ${packet.id} records an invalid or repeated claimant "${String(account)}"`);
        }
        seen.add(account);
      }
      storage.claims.init(packet.id);
      for (const account of entry.accounts) {
        storage.claims.append(packet.id, account);
      }
    }

    for (const packet of storage.packets.values()) {
      const claims = BigInt(storage.claims.get(packet.id).length);
      const expected = packet.total - claims * (packet.total / BigInt(packet.count));
      if (packet.unclaimed !== expected) {
        throw invalid(
          `Packet ${packet.id} has unclaimed ${formatBalance(packet.unclaimed)}, expected ${formatBalance(expected)}`,
        );
      }
    }

    return storage;
  }
}

function invalid(message: string): StorageError {
  return new StorageError("INVALID_SNAPSHOT", message);
}

function restoreAmount(value: string, id: PacketId, field: string): Balance {
  if (!isDecimalAmount(value)) {
    throw invalid(`Packet ${String(id)} has a malformed amount in ${field}: ${String(value)}`);
  }
  const amount = BigInt(value);
  if (amount > MAX_BALANCE) {
    throw invalid(`Packet ${String(id)} has an amount beyond the balance range in ${field}`);
  }
  return amount;
}

function assertAllocated(id: PacketId, nextPacketId: PacketId): void {
  if (id >= nextPacketId) {
    throw invalid(`Packet id ${id} was never allocated (nextPacketId ${nextPacketId})`);
  }
}

// =============================================================================
// Transaction
// =============================================================================

/**
 * Staged writes against a PacketStorage.
 *
 * Reads see staged values first. Nothing reaches the storage until
 * commit(); a transaction that is dropped leaves it untouched.
 */
export class StorageTransaction {
  private readonly _storage: PacketStorage;
  private readonly _packets = new Map<PacketId, Packet>();
  private readonly _newClaimLists = new Set<PacketId>();
  private readonly _claimAppends = new Map<PacketId, AccountId[]>();
  private _allocated = 0;
  private _closed = false;

  constructor(storage: PacketStorage) {
    this._storage = storage;
  }

  getPacket(id: PacketId): Packet | undefined {
    return this._packets.get(id) ?? this._storage.packets.get(id);
  }

  getPacketOrDefault(id: PacketId): Packet {
    return this.getPacket(id) ?? defaultPacket(id);
  }

  setPacket(packet: Packet): void {
    this._assertOpen();
    this._packets.set(packet.id, packet);
  }

  claimsOf(id: PacketId): readonly AccountId[] {
    const base = this._newClaimLists.has(id) ? [] : this._storage.claims.get(id);
    return [...base, ...(this._claimAppends.get(id) ?? [])];
  }

  hasClaimed(id: PacketId, account: AccountId): boolean {
    return this.claimsOf(id).includes(account);
  }

  initClaims(id: PacketId): void {
    this._assertOpen();
    this._newClaimLists.add(id);
    this._claimAppends.delete(id);
  }

  appendClaim(id: PacketId, account: AccountId): void {
    this._assertOpen();
    const staged = this._claimAppends.get(id);
    if (staged === undefined) {
      this._claimAppends.set(id, [account]);
    } else {
      staged.push(account);
    }
  }

  peekId(): PacketId {
    return this._storage.ids.peek() + this._allocated;
  }

  /**
   * @throws RedPacketError ID_EXHAUSTED
   */
  allocateId(): PacketId {
    this._assertOpen();
    const id = this.peekId();
    assertIdAvailable(id);
    this._allocated += 1;
    return id;
  }

  /**
   * Apply every staged write. The transaction cannot be used afterwards.
   */
  commit(): void {
    this._assertOpen();
    this._closed = true;

    for (let i = 0; i < this._allocated; i++) {
      this._storage.ids.allocate();
    }
    for (const packet of this._packets.values()) {
      this._storage.packets.set(packet);
    }
    for (const id of this._newClaimLists) {
      this._storage.claims.init(id);
    }
    for (const [id, accounts] of this._claimAppends) {
      for (const account of accounts) {
        this._storage.claims.append(id, account);
      }
    }
  }

  get committed(): boolean {
    return this._closed;
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new StorageError("TRANSACTION_CLOSED", "Transaction already committed");
    }
  }
}
