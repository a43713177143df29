/**
 * @redpacket/ledger: Reservable balances.
 *
 * The currency capability the packet module depends on, and an
 * in-memory implementation of it:
 * - Free and reserved balance per account
 * - Reserve / unreserve / transfer with an existential deposit
 * - All arithmetic is bigint, bounded by MAX_BALANCE (u128)
 *
 * Design rules:
 * - All exported types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Zero runtime dependencies
 */

// Core implementation
export { InMemoryBalances } from "./balances.js";

// Balance arithmetic
export {
  MAX_BALANCE,
  assertBalance,
  saturatingAdd,
  saturatingSub,
  saturatingMul,
  checkedAdd,
  parseBalance,
  formatBalance,
} from "./balance-math.js";

// Types
export type {
  AccountData,
  ExistenceRequirement,
  ReservableCurrency,
  LedgerErrorCode,
  BalancesOptions,
  AccountSnapshot,
  BalancesSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
