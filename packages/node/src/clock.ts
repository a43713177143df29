/**
 * Wall-clock driven block height.
 *
 * Block n spans [genesis + n × blockTimeMs, genesis + (n + 1) × blockTimeMs).
 * Times before genesis read as block 0, and a wall clock that steps
 * backwards never lowers the height already reported.
 */

import type { BlockClock } from "@redpacket/packets";
import type { BlockNumber } from "@redpacket/types";

export interface IntervalClockOptions {
  /** Epoch milliseconds of block 0 */
  readonly genesis: number;
  readonly blockTimeMs: number;
  /** Time source. Defaults to Date.now */
  readonly now?: () => number;
}

export class IntervalClock implements BlockClock {
  private readonly genesis: number;
  private readonly blockTimeMs: number;
  private readonly now: () => number;
  private highest = 0;

  constructor(options: IntervalClockOptions) {
    if (!Number.isInteger(options.blockTimeMs) || options.blockTimeMs <= 0) {
      throw new Error(`blockTimeMs must be a positive integer, got ${options.blockTimeMs}`);
    }
    this.genesis = options.genesis;
    this.blockTimeMs = options.blockTimeMs;
    this.now = options.now ?? Date.now;
  }

  blockNumber(): BlockNumber {
    const elapsed = this.now() - this.genesis;
    const block = elapsed <= 0 ? 0 : Math.floor(elapsed / this.blockTimeMs);
    this.highest = Math.max(this.highest, block);
    return this.highest;
  }
}
