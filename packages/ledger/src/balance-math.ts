/**
 * @redpacket/ledger: Deterministic balance arithmetic.
 *
 * All amounts are non-negative bigints bounded by MAX_BALANCE (u128).
 * Saturating operations clamp at the bounds instead of wrapping.
 *
 * Rules:
 * - No floating-point operations
 * - No negative balances
 * - Zero runtime dependencies
 */

import type { Balance } from "@redpacket/types";
import { LedgerError } from "./types.js";

/** Largest representable balance: 2^128 - 1. */
export const MAX_BALANCE: Balance = (1n << 128n) - 1n;

/**
 * Assert a value is a bigint in [0, MAX_BALANCE].
 * Throws LedgerError INVALID_AMOUNT otherwise.
 */
export function assertBalance(amount: Balance, label = "amount"): void {
  if (typeof amount !== "bigint") {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be a bigint, got ${typeof amount}`);
  }
  if (amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must not be negative, got ${amount.toString()}`);
  }
  if (amount > MAX_BALANCE) {
    throw new LedgerError("INVALID_AMOUNT", `${label} exceeds the maximum balance: ${amount.toString()}`);
  }
}

/** a + b, clamped at MAX_BALANCE. */
export function saturatingAdd(a: Balance, b: Balance): Balance {
  const sum = a + b;
  return sum > MAX_BALANCE ? MAX_BALANCE : sum;
}

/** a - b, clamped at zero. */
export function saturatingSub(a: Balance, b: Balance): Balance {
  return a > b ? a - b : 0n;
}

/** a × b, clamped at MAX_BALANCE. */
export function saturatingMul(a: Balance, b: Balance): Balance {
  const product = a * b;
  return product > MAX_BALANCE ? MAX_BALANCE : product;
}

/**
 * a + b, throwing OVERFLOW past MAX_BALANCE.
 */
export function checkedAdd(a: Balance, b: Balance): Balance {
  const sum = a + b;
  if (sum > MAX_BALANCE) {
    throw new LedgerError(
      "OVERFLOW",
      `Balance overflow: ${a.toString()} + ${b.toString()} exceeds the maximum balance`,
    );
  }
  return sum;
}

/**
 * Parse a base-10 integer string into a balance.
 *
 * "100" → 100n
 * "007" → 7n
 */
export function parseBalance(amount: string): Balance {
  const trimmed = amount.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid balance format: "${amount}"`);
  }
  const value = BigInt(trimmed);
  assertBalance(value);
  return value;
}

/** Convert a balance back to its base-10 string. */
export function formatBalance(amount: Balance): string {
  return amount.toString();
}
