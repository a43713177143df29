/**
 * @redpacket/ledger: Types for the reservable-currency ledger.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint in the ledger's smallest unit
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { AccountId, Balance } from "@redpacket/types";

// ─── Account Types ───────────────────────────────────────────────────────

/**
 * Balances held by one account.
 * The account's total is `free + reserved`.
 */
export interface AccountData {
  /** Spendable balance */
  readonly free: Balance;
  /** Locked balance; only unreserve moves it back to free */
  readonly reserved: Balance;
}

/**
 * Whether a transfer may reduce the sender below the existential deposit.
 *
 * - "keep-alive": fail rather than let the sender's free balance drop
 *   below the existential deposit
 * - "allow-death": permit it
 */
export type ExistenceRequirement = "keep-alive" | "allow-death";

// ─── Capability ──────────────────────────────────────────────────────────

/**
 * The host ledger capability consumed by the packet module.
 *
 * Every method is synchronous and atomic: it either applies fully
 * or throws a LedgerError and changes nothing.
 */
export interface ReservableCurrency {
  /** Spendable balance of an account; 0 for unknown accounts. */
  freeBalance(account: AccountId): Balance;

  /** Reserved balance of an account; 0 for unknown accounts. */
  reservedBalance(account: AccountId): Balance;

  /**
   * Move `amount` from free to reserved.
   * Throws INSUFFICIENT_FUNDS if the free balance is too low.
   */
  reserve(account: AccountId, amount: Balance): void;

  /**
   * Move up to `amount` from reserved back to free.
   * Stops at the reserved balance, and at what free can still hold below
   * MAX_BALANCE. Never throws for a valid amount.
   *
   * @returns The part of `amount` that could not be unreserved
   */
  unreserve(account: AccountId, amount: Balance): Balance;

  /**
   * Move `amount` from the free balance of `from` to the free balance of `to`.
   */
  transfer(
    from: AccountId,
    to: AccountId,
    amount: Balance,
    existence: ExistenceRequirement,
  ): void;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_FUNDS"
  | "KEEP_ALIVE"
  | "EXISTENTIAL_DEPOSIT"
  | "ACCOUNT_FROZEN"
  | "OVERFLOW"
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Options ─────────────────────────────────────────────────────────────

export interface BalancesOptions {
  /**
   * Minimum total balance of a live account.
   * Default: 0n (every account stays alive).
   */
  readonly existentialDeposit?: Balance | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/** One account in a snapshot. Amounts are decimal strings. */
export interface AccountSnapshot {
  readonly account: AccountId;
  readonly free: string;
  readonly reserved: string;
  readonly frozen: boolean;
}

/**
 * Serializable snapshot of all balances.
 * Used for persistence and rehydration.
 */
export interface BalancesSnapshot {
  readonly version: 1;
  readonly existentialDeposit: string;
  readonly accounts: readonly AccountSnapshot[];
  readonly createdAt: string;
}
