/**
 * Ledger Primitives
 *
 * Scalar types shared by the balances ledger and the packet module.
 *
 * Rules:
 * - Amounts are bigint, never floating point
 * - Block heights and packet ids are safe integers
 * - Account identities are opaque strings compared by equality
 */

/**
 * An opaque account identity.
 * The empty string is the zero identity and never authenticates.
 */
export type AccountId = string;

/** A non-negative monetary amount in the ledger's smallest unit. */
export type Balance = bigint;

/** An absolute block height. Monotonically non-decreasing. */
export type BlockNumber = number;

/** Identifier of a red packet, assigned from 0 upward. */
export type PacketId = number;

/** The zero identity, owner of every default-valued packet. */
export const ZERO_ACCOUNT: AccountId = "";

/**
 * A red packet (airdrop envelope) record.
 *
 * `total` is reserved on `owner` until the packet is distributed.
 * `unclaimed` always equals `total - claims * (total / count)`.
 */
export interface Packet {
  readonly id: PacketId;

  /** The reserved aggregate, quota × count at creation */
  readonly total: Balance;

  /** Amount not yet claimed */
  readonly unclaimed: Balance;

  /** Intended number of claimants */
  readonly count: number;

  /** Last block height at which a claim is accepted */
  readonly expiresAt: BlockNumber;

  readonly owner: AccountId;

  /** One-way latch, set when distribution starts */
  readonly distributed: boolean;
}
