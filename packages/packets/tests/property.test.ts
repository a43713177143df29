/**
 * Property-Based Tests for RedPacketModule
 *
 * Runs random operation sequences and checks after every step:
 *
 * 1. unclaimed = total − |claims| × quota
 * 2. Claim lists have no duplicates and never exceed count
 * 3. nextPacketId moves only on successful create
 * 4. A distributed packet never changes again
 * 5. Until distributed, each owner holds the sum of its packets reserved
 * 6. Total issuance is conserved
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Packet } from "@redpacket/types";
import { signed } from "../src/origin.js";
import { quotaOf } from "../src/redpacket.js";
import { RedPacketError } from "../src/types.js";
import { createTestModule, GENESIS } from "./setup.js";
import type { TestModule } from "./setup.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ACCOUNTS = GENESIS.map(([account]) => account);
const arbAccount = fc.constantFrom(...ACCOUNTS);
const arbId = fc.nat(4);

type Op =
  | {
      readonly kind: "create";
      readonly account: string;
      readonly quota: bigint;
      readonly count: number;
      readonly expires: number;
    }
  | { readonly kind: "claim"; readonly account: string; readonly id: number }
  | { readonly kind: "distribute"; readonly account: string; readonly id: number }
  | { readonly kind: "advance"; readonly blocks: number };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({
    kind: fc.constant("create" as const),
    account: arbAccount,
    quota: fc.bigInt({ min: 0n, max: 40n }),
    count: fc.nat(5),
    expires: fc.nat(10),
  }),
  fc.record({ kind: fc.constant("claim" as const), account: arbAccount, id: arbId }),
  fc.record({ kind: fc.constant("distribute" as const), account: arbAccount, id: arbId }),
  fc.record({ kind: fc.constant("advance" as const), blocks: fc.integer({ min: 1, max: 5 }) }),
);

function apply(t: TestModule, op: Op): void {
  switch (op.kind) {
    case "create":
      t.module.create(signed(op.account), op.quota, op.count, op.expires);
      return;
    case "claim":
      t.module.claim(signed(op.account), op.id);
      return;
    case "distribute":
      t.module.distribute(signed(op.account), op.id);
      return;
    case "advance":
      t.clock.advance(op.blocks);
      return;
  }
}

function allPackets(t: TestModule): Packet[] {
  const packets: Packet[] = [];
  for (let id = 0; id < t.module.nextPacketId(); id++) {
    const packet = t.module.packet(id);
    if (packet !== undefined) packets.push(packet);
  }
  return packets;
}

const ISSUANCE = GENESIS.reduce((sum, [, amount]) => sum + amount, 0n);

// =============================================================================
// Properties
// =============================================================================

describe("red packet invariants", () => {
  it("hold after every operation", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const t = createTestModule();
        const frozen = new Map<number, { packet: Packet; claims: readonly string[] }>();

        for (const op of ops) {
          const nextBefore = t.module.nextPacketId();
          let failed = false;
          try {
            apply(t, op);
          } catch (err) {
            expect(err).toBeInstanceOf(RedPacketError);
            failed = true;
          }

          if (op.kind === "create") {
            expect(t.module.nextPacketId()).toBe(failed ? nextBefore : nextBefore + 1);
          }

          const reservedByOwner = new Map<string, bigint>();
          for (const packet of allPackets(t)) {
            const claims = t.module.claimsOf(packet.id);
            const quota = quotaOf(packet);

            expect(packet.unclaimed).toBe(packet.total - BigInt(claims.length) * quota);
            expect(new Set(claims).size).toBe(claims.length);
            expect(claims.length).toBeLessThanOrEqual(packet.count);

            const before = frozen.get(packet.id);
            if (before !== undefined) {
              expect(packet).toEqual(before.packet);
              expect(claims).toEqual(before.claims);
            } else if (packet.distributed) {
              frozen.set(packet.id, { packet, claims });
            } else {
              reservedByOwner.set(
                packet.owner,
                (reservedByOwner.get(packet.owner) ?? 0n) + packet.total,
              );
            }
          }

          for (const account of ACCOUNTS) {
            expect(t.balances.reservedBalance(account)).toBe(reservedByOwner.get(account) ?? 0n);
          }
          expect(t.balances.totalIssuance()).toBe(ISSUANCE);
        }
      }),
      { numRuns: 100 },
    );
  });

  it("records quota × count as the total", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 20n }),
        fc.integer({ min: 1, max: 5 }),
        (quota, count) => {
          const t = createTestModule();
          const event = t.module.create(signed("A4"), quota, count, 10);
          expect(event.total).toBe(quota * BigInt(count));
          expect(t.module.packet(event.packetId)?.unclaimed).toBe(quota * BigInt(count));
        },
      ),
    );
  });
});
