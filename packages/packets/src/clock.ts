/**
 * Block height sources.
 */

import type { BlockNumber } from "@redpacket/types";

/**
 * Supplies the current block height. Never decreases.
 */
export interface BlockClock {
  blockNumber(): BlockNumber;
}

export type ClockErrorCode = "NON_MONOTONIC" | "INVALID_BLOCK";

export class ClockError extends Error {
  public readonly code: ClockErrorCode;
  constructor(code: ClockErrorCode, message: string) {
    super(message);
    this.name = "ClockError";
    this.code = code;
  }
}

/**
 * A clock moved by hand. Used by tests and embedders that drive
 * block production themselves.
 */
export class ManualClock implements BlockClock {
  private _current: BlockNumber;

  constructor(initial: BlockNumber = 0) {
    assertBlockNumber(initial);
    this._current = initial;
  }

  blockNumber(): BlockNumber {
    return this._current;
  }

  setBlockNumber(block: BlockNumber): void {
    assertBlockNumber(block);
    if (block < this._current) {
      throw new ClockError(
        "NON_MONOTONIC",
        `Cannot move clock back from ${this._current} to ${block}`,
      );
    }
    this._current = block;
  }

  advance(by = 1): BlockNumber {
    this.setBlockNumber(this._current + by);
    return this._current;
  }
}

function assertBlockNumber(block: number): void {
  if (!Number.isSafeInteger(block) || block < 0) {
    throw new ClockError("INVALID_BLOCK", `Block number must be a non-negative safe integer, got ${block}`);
  }
}
