/**
 * Tests for packet routes: create, read, claim, distribute over HTTP.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { asAccount, createTestApp, jsonRequest } from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";

const CREATE = { quota: "1", count: 2, expires: 100 };

async function expectError(res: Response, status: number, code: string): Promise<void> {
  expect(res.status).toBe(status);
  const body = (await res.json()) as ErrorBody;
  expect(body.error.code).toBe(code);
}

describe("packet routes", () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
  });

  // ─── Happy path ────────────────────────────────────────────────────

  it("creates, claims and distributes a packet", async () => {
    const created = await t.app.request(asAccount("A1", "/api/v1/packets", "POST", CREATE));
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({
      data: {
        type: "redpacket.packet.created",
        packetId: 0,
        owner: "A1",
        total: "2",
        count: 2,
        blockNumber: 0,
      },
    });

    const claimed = await t.app.request(asAccount("A2", "/api/v1/packets/0/claim"));
    expect(claimed.status).toBe(200);
    expect(await claimed.json()).toEqual({
      data: {
        type: "redpacket.packet.claimed",
        packetId: 0,
        claimant: "A2",
        quota: "1",
        blockNumber: 0,
      },
    });
    await t.app.request(asAccount("A3", "/api/v1/packets/0/claim"));

    const view = await t.app.request(jsonRequest("/api/v1/packets/0"));
    expect(await view.json()).toEqual({
      data: {
        packet: {
          id: 0,
          total: "2",
          unclaimed: "0",
          quota: "1",
          count: 2,
          expiresAt: 100,
          owner: "A1",
          distributed: false,
        },
        claims: ["A2", "A3"],
        status: "full",
      },
    });

    const distributed = await t.app.request(asAccount("A1", "/api/v1/packets/0/distribute"));
    expect(distributed.status).toBe(200);
    expect(await distributed.json()).toEqual({
      data: {
        type: "redpacket.packet.distributed",
        packetId: 0,
        owner: "A1",
        totalTransferred: "2",
        blockNumber: 0,
      },
    });

    const a1 = await t.app.request(jsonRequest("/api/v1/accounts/A1"));
    expect(await a1.json()).toEqual({ data: { account: "A1", free: "98", reserved: "0" } });
    const a3 = await t.app.request(jsonRequest("/api/v1/accounts/A3"));
    expect(await a3.json()).toEqual({ data: { account: "A3", free: "301", reserved: "0" } });
  });

  // ─── Create errors ─────────────────────────────────────────────────

  describe("create", () => {
    it("returns 401 BAD_ORIGIN without a caller", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/packets", "POST", CREATE));
      await expectError(res, 401, "BAD_ORIGIN");
    });

    it("returns 422 when the creator cannot cover the total", async () => {
      const res = await t.app.request(
        asAccount("A5", "/api/v1/packets", "POST", { quota: "1", count: 5, expires: 100 }),
      );
      await expectError(res, 422, "INSUFFICIENT_BALANCE");
      expect(t.service.nextPacketId()).toBe(0);
    });

    it("returns 400 GREATER_THAN_ZERO for a zero quota", async () => {
      const res = await t.app.request(
        asAccount("A1", "/api/v1/packets", "POST", { ...CREATE, quota: "0" }),
      );
      await expectError(res, 400, "GREATER_THAN_ZERO");
    });

    it("returns 400 INVALID_ARGUMENT for a count beyond 2^32 - 1", async () => {
      const res = await t.app.request(
        asAccount("A1", "/api/v1/packets", "POST", { ...CREATE, count: 2 ** 32 }),
      );
      await expectError(res, 400, "INVALID_ARGUMENT");
    });

    it("returns 400 INVALID_AMOUNT for a quota beyond the balance range", async () => {
      const res = await t.app.request(
        asAccount("A1", "/api/v1/packets", "POST", {
          ...CREATE,
          quota: "340282366920938463463374607431768211456",
        }),
      );
      await expectError(res, 400, "INVALID_AMOUNT");
    });

    it("returns 400 VALIDATION_ERROR for a numeric quota", async () => {
      const res = await t.app.request(
        asAccount("A1", "/api/v1/packets", "POST", { ...CREATE, quota: 1 }),
      );
      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("VALIDATION_ERROR");
      expect(body.error.details).toEqual({
        issues: [{ path: "quota", message: "Expected string, received number" }],
      });
    });

    it("returns 400 VALIDATION_ERROR for malformed JSON", async () => {
      const res = await t.app.request(
        new Request("http://localhost/api/v1/packets", {
          method: "POST",
          headers: { "Content-Type": "application/json", "X-Account-Id": "A1" },
          body: "{not json",
        }),
      );
      await expectError(res, 400, "VALIDATION_ERROR");
    });
  });

  // ─── Read errors ───────────────────────────────────────────────────

  describe("read", () => {
    it("returns 404 for an unknown packet", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/packets/7"));
      await expectError(res, 404, "NOT_FOUND");
    });

    it("returns 400 for a non-numeric id", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/packets/abc"));
      await expectError(res, 400, "VALIDATION_ERROR");
    });
  });

  // ─── Claim / distribute errors ─────────────────────────────────────

  describe("claim and distribute", () => {
    beforeEach(async () => {
      await t.app.request(asAccount("A1", "/api/v1/packets", "POST", CREATE));
    });

    it("returns 409 for a repeated claim", async () => {
      await t.app.request(asAccount("A2", "/api/v1/packets/0/claim"));
      const res = await t.app.request(asAccount("A2", "/api/v1/packets/0/claim"));
      await expectError(res, 409, "ALREADY_CLAIMED");
    });

    it("returns 422 EXPIRED after the deadline", async () => {
      t.clock.setBlockNumber(101);
      const res = await t.app.request(asAccount("A2", "/api/v1/packets/0/claim"));
      await expectError(res, 422, "EXPIRED");
    });

    it("returns 422 UNAVAILABLE once full", async () => {
      await t.app.request(asAccount("A2", "/api/v1/packets/0/claim"));
      await t.app.request(asAccount("A3", "/api/v1/packets/0/claim"));
      const res = await t.app.request(asAccount("A4", "/api/v1/packets/0/claim"));
      await expectError(res, 422, "UNAVAILABLE");
    });

    it("returns 404 when claiming an unknown packet", async () => {
      const res = await t.app.request(asAccount("A2", "/api/v1/packets/9/claim"));
      await expectError(res, 404, "NOT_FOUND");
    });

    it("returns 422 when distributing too early", async () => {
      await t.app.request(asAccount("A2", "/api/v1/packets/0/claim"));
      const res = await t.app.request(asAccount("A1", "/api/v1/packets/0/distribute"));
      await expectError(res, 422, "CAN_NOT_BE_DISTRIBUTED");
    });

    it("returns 403 when a non-owner distributes", async () => {
      await t.app.request(asAccount("A2", "/api/v1/packets/0/claim"));
      await t.app.request(asAccount("A3", "/api/v1/packets/0/claim"));
      const res = await t.app.request(asAccount("A4", "/api/v1/packets/0/distribute"));
      await expectError(res, 403, "NOT_OWNER");
    });

    it("returns 409 on a second distribution", async () => {
      await t.app.request(asAccount("A2", "/api/v1/packets/0/claim"));
      await t.app.request(asAccount("A3", "/api/v1/packets/0/claim"));
      await t.app.request(asAccount("A1", "/api/v1/packets/0/distribute"));

      const res = await t.app.request(asAccount("A1", "/api/v1/packets/0/distribute"));
      await expectError(res, 409, "ALREADY_DISTRIBUTED");
      expect(t.service.getAccount("A2").free).toBe(201n);
    });

    it("returns 422 ACCOUNT_FROZEN and keeps the packet distributed", async () => {
      await t.app.request(asAccount("A2", "/api/v1/packets/0/claim"));
      await t.app.request(asAccount("A3", "/api/v1/packets/0/claim"));
      t.service.balances.freeze("A3");

      const res = await t.app.request(asAccount("A1", "/api/v1/packets/0/distribute"));
      await expectError(res, 422, "ACCOUNT_FROZEN");

      const view = t.service.getPacket(0);
      expect(view.packet.distributed).toBe(true);
      expect(view.status).toBe("distributed");
    });
  });
});

describe("unknown packet policy", () => {
  it("treats an unknown id as the zero packet under the default policy", async () => {
    const t = createTestApp({}, { unknownPacket: "default" });

    const claim = await t.app.request(asAccount("A2", "/api/v1/packets/3/claim"));
    await expectError(claim, 422, "UNAVAILABLE");

    const distribute = await t.app.request(asAccount("A1", "/api/v1/packets/3/distribute"));
    await expectError(distribute, 403, "NOT_OWNER");
  });

  it("still reports unknown packets as 404 on read", async () => {
    const t = createTestApp({}, { unknownPacket: "default" });
    const res = await t.app.request(jsonRequest("/api/v1/packets/3"));
    await expectError(res, 404, "NOT_FOUND");
  });
});
