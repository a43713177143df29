/**
 * Runtime type guard tests for @redpacket/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  MAX_PACKET_COUNT,
  isAccountId,
  isBalance,
  isBlockNumber,
  isDecimalAmount,
  isPacket,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

// =============================================================================
// Primitive guards
// =============================================================================

describe("isAccountId", () => {
  it("accepts a non-empty string", () => {
    expect(isAccountId("alice")).toBe(true);
  });

  it("rejects the zero identity", () => {
    expect(isAccountId("")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAccountId(1)).toBe(false);
    expect(isAccountId(null)).toBe(false);
  });
});

describe("isBalance", () => {
  it("accepts zero and positive bigints", () => {
    expect(isBalance(0n)).toBe(true);
    expect(isBalance(10n ** 30n)).toBe(true);
  });

  it("rejects negative bigints and numbers", () => {
    expect(isBalance(-1n)).toBe(false);
    expect(isBalance(5)).toBe(false);
  });
});

describe("isBlockNumber", () => {
  it("accepts non-negative safe integers", () => {
    expect(isBlockNumber(0)).toBe(true);
    expect(isBlockNumber(Number.MAX_SAFE_INTEGER)).toBe(true);
  });

  it("rejects fractions, negatives and unsafe integers", () => {
    expect(isBlockNumber(1.5)).toBe(false);
    expect(isBlockNumber(-1)).toBe(false);
    expect(isBlockNumber(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
  });
});

describe("isDecimalAmount", () => {
  it("accepts digit strings", () => {
    expect(isDecimalAmount("0")).toBe(true);
    expect(isDecimalAmount("340282366920938463463374607431768211455")).toBe(true);
  });

  it("rejects signs, fractions and empty strings", () => {
    expect(isDecimalAmount("-1")).toBe(false);
    expect(isDecimalAmount("1.5")).toBe(false);
    expect(isDecimalAmount("")).toBe(false);
    expect(isDecimalAmount(1)).toBe(false);
  });
});

describe("isPacket", () => {
  const valid = {
    id: 0,
    total: 2n,
    unclaimed: 2n,
    count: 2,
    expiresAt: 100,
    owner: "alice",
    distributed: false,
  };

  it("accepts a well-formed packet", () => {
    expect(isPacket(valid)).toBe(true);
  });

  it("accepts the zero-valued default packet", () => {
    expect(
      isPacket({ ...valid, total: 0n, unclaimed: 0n, count: 0, expiresAt: 0, owner: "" }),
    ).toBe(true);
  });

  it("rejects string amounts", () => {
    expect(isPacket({ ...valid, total: "2" })).toBe(false);
  });

  it("rejects counts above u32", () => {
    expect(isPacket({ ...valid, count: MAX_PACKET_COUNT + 1 })).toBe(false);
  });

  it("rejects missing latch", () => {
    const { distributed: _distributed, ...rest } = valid;
    expect(isPacket(rest)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isEventMetadata", () => {
  const metadata = {
    eventId: "evt-1",
    timestamp: "2024-01-15T10:00:00.000Z",
    actor: "alice",
    correlationId: "packet-0",
    source: "redpacket",
  };

  it("accepts metadata with and without a block number", () => {
    expect(isEventMetadata(metadata)).toBe(true);
    expect(isEventMetadata({ ...metadata, blockNumber: 12 })).toBe(true);
  });

  it("rejects unknown sources", () => {
    expect(isEventMetadata({ ...metadata, source: "vault" })).toBe(false);
  });

  it("rejects a fractional block number", () => {
    expect(isEventMetadata({ ...metadata, blockNumber: 1.5 })).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a complete event", () => {
    expect(
      isDomainEvent({
        type: "redpacket.packet.created",
        metadata: {
          eventId: "evt-1",
          timestamp: "2024-01-15T10:00:00.000Z",
          actor: "alice",
          correlationId: "packet-0",
          source: "redpacket",
        },
        payload: { packetId: 0 },
      }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(
      isDomainEvent({
        type: "x",
        metadata: {
          eventId: "e",
          timestamp: "t",
          actor: "a",
          correlationId: "c",
          source: "node",
        },
        payload: null,
      }),
    ).toBe(false);
  });
});
