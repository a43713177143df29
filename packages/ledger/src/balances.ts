/**
 * @redpacket/ledger: In-memory reservable balances.
 *
 * Tracks a free and a reserved balance per account and implements the
 * ReservableCurrency capability on top of them.
 *
 * API surface:
 * - deposit(): Credit an account (genesis, faucet)
 * - freeBalance() / reservedBalance(): Read balances
 * - reserve() / unreserve(): Move between free and reserved
 * - transfer(): Move free balance between accounts
 * - freeze() / thaw(): Block an account's movements
 * - snapshot() / fromSnapshot(): Persistence
 */

import type { AccountId, Balance } from "@redpacket/types";
import {
  assertBalance,
  checkedAdd,
  formatBalance,
  MAX_BALANCE,
  parseBalance,
} from "./balance-math.js";
import type {
  AccountData,
  AccountSnapshot,
  BalancesOptions,
  BalancesSnapshot,
  ExistenceRequirement,
  ReservableCurrency,
} from "./types.js";
import { LedgerError } from "./types.js";

interface MutableAccount {
  free: Balance;
  reserved: Balance;
}

/**
 * Reservable balances held in memory.
 *
 * Each method validates everything before it writes, so a thrown
 * LedgerError always leaves the balances untouched.
 */
export class InMemoryBalances implements ReservableCurrency {
  private readonly _accounts = new Map<AccountId, MutableAccount>();
  private readonly _frozen = new Set<AccountId>();
  private readonly _existentialDeposit: Balance;

  constructor(options?: BalancesOptions) {
    const ed = options?.existentialDeposit ?? 0n;
    assertBalance(ed, "existentialDeposit");
    this._existentialDeposit = ed;
  }

  get existentialDeposit(): Balance {
    return this._existentialDeposit;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  freeBalance(account: AccountId): Balance {
    return this._accounts.get(account)?.free ?? 0n;
  }

  reservedBalance(account: AccountId): Balance {
    return this._accounts.get(account)?.reserved ?? 0n;
  }

  /**
   * Get both balances of an account.
   */
  getAccount(account: AccountId): AccountData {
    return {
      free: this.freeBalance(account),
      reserved: this.reservedBalance(account),
    };
  }

  /**
   * Sum of every free and reserved balance.
   */
  totalIssuance(): Balance {
    let total = 0n;
    for (const data of this._accounts.values()) {
      total += data.free + data.reserved;
    }
    return total;
  }

  /**
   * All live accounts, sorted by id.
   */
  accounts(): readonly AccountId[] {
    return [...this._accounts.keys()].sort();
  }

  isFrozen(account: AccountId): boolean {
    return this._frozen.has(account);
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Credit `amount` to the free balance of `account`.
   */
  deposit(account: AccountId, amount: Balance): void {
    this._assertAccount(account);
    assertBalance(amount);

    const current = this._accounts.get(account);
    if (current === undefined && amount < this._existentialDeposit) {
      throw new LedgerError(
        "EXISTENTIAL_DEPOSIT",
        `Deposit of ${amount.toString()} to new account "${account}" is below the existential deposit`,
      );
    }

    const free = checkedAdd(current?.free ?? 0n, amount);
    this._write(account, free, current?.reserved ?? 0n);
  }

  reserve(account: AccountId, amount: Balance): void {
    this._assertAccount(account);
    assertBalance(amount);
    this._assertNotFrozen(account);

    const free = this.freeBalance(account);
    if (free < amount) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `Cannot reserve ${amount.toString()} on "${account}": free balance is ${free.toString()}`,
      );
    }

    const reserved = checkedAdd(this.reservedBalance(account), amount);
    this._write(account, free - amount, reserved);
  }

  unreserve(account: AccountId, amount: Balance): Balance {
    assertBalance(amount);

    const current = this._accounts.get(account);
    if (current === undefined) {
      return amount;
    }

    // Whatever would push free past MAX_BALANCE stays reserved.
    const room = MAX_BALANCE - current.free;
    let actual = amount < current.reserved ? amount : current.reserved;
    if (actual > room) {
      actual = room;
    }
    this._write(account, current.free + actual, current.reserved - actual);
    return amount - actual;
  }

  transfer(
    from: AccountId,
    to: AccountId,
    amount: Balance,
    existence: ExistenceRequirement,
  ): void {
    this._assertAccount(from);
    this._assertAccount(to);
    assertBalance(amount);

    if (amount === 0n || from === to) {
      return;
    }

    this._assertNotFrozen(from);
    this._assertNotFrozen(to);

    const fromFree = this.freeBalance(from);
    if (fromFree < amount) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `Cannot transfer ${amount.toString()} from "${from}": free balance is ${fromFree.toString()}`,
      );
    }

    const remaining = fromFree - amount;
    if (existence === "keep-alive" && remaining < this._existentialDeposit) {
      throw new LedgerError(
        "KEEP_ALIVE",
        `Transfer would leave "${from}" with ${remaining.toString()}, below the existential deposit`,
      );
    }

    const recipient = this._accounts.get(to);
    if (recipient === undefined && amount < this._existentialDeposit) {
      throw new LedgerError(
        "EXISTENTIAL_DEPOSIT",
        `Transfer of ${amount.toString()} would create "${to}" below the existential deposit`,
      );
    }

    const toFree = checkedAdd(recipient?.free ?? 0n, amount);

    this._write(from, remaining, this.reservedBalance(from));
    this._write(to, toFree, recipient?.reserved ?? 0n);
  }

  /**
   * Block every movement out of or into `account` until thawed.
   */
  freeze(account: AccountId): void {
    this._assertAccount(account);
    this._frozen.add(account);
  }

  thaw(account: AccountId): void {
    this._frozen.delete(account);
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of every account.
   */
  snapshot(): BalancesSnapshot {
    const accounts: AccountSnapshot[] = this.accounts().map((account) => ({
      account,
      free: formatBalance(this.freeBalance(account)),
      reserved: formatBalance(this.reservedBalance(account)),
      frozen: this._frozen.has(account),
    }));

    return {
      version: 1,
      existentialDeposit: formatBalance(this._existentialDeposit),
      accounts,
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore balances from a snapshot.
   */
  static fromSnapshot(snapshot: BalancesSnapshot): InMemoryBalances {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported balances snapshot version: ${String(snapshot.version)}`,
      );
    }

    const balances = new InMemoryBalances({
      existentialDeposit: parseBalance(snapshot.existentialDeposit),
    });

    for (const entry of snapshot.accounts) {
      balances._assertAccount(entry.account);
      if (balances._accounts.has(entry.account)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Duplicate account in snapshot: "${entry.account}"`,
        );
      }
      balances._write(entry.account, parseBalance(entry.free), parseBalance(entry.reserved));
      if (entry.frozen) {
        balances._frozen.add(entry.account);
      }
    }

    return balances;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Store new balances, reaping the account once it holds nothing.
   */
  private _write(account: AccountId, free: Balance, reserved: Balance): void {
    if (free === 0n && reserved === 0n) {
      this._accounts.delete(account);
      return;
    }
    this._accounts.set(account, { free, reserved });
  }

  private _assertAccount(account: AccountId): void {
    if (typeof account !== "string" || account.length === 0) {
      throw new LedgerError("INVALID_ACCOUNT", "Account id must be a non-empty string");
    }
  }

  private _assertNotFrozen(account: AccountId): void {
    if (this._frozen.has(account)) {
      throw new LedgerError("ACCOUNT_FROZEN", `Account "${account}" is frozen`);
    }
  }
}
