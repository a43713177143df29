/**
 * Tests for health and readiness routes.
 */

import { describe, it, expect } from "vitest";
import { asAccount, createTestApp, jsonRequest } from "./setup.js";

interface HealthBody {
  status: string;
  blockNumber: number;
  nextPacketId: number;
  timestamp: string;
}

interface ReadyBody {
  status: string;
  eventStore: { valid: boolean; lastVerifiedPosition: number; errors: number };
}

describe("health routes", () => {
  it("GET /health reports the block height and next packet id", async () => {
    const t = createTestApp();
    t.clock.setBlockNumber(12);
    await t.app.request(
      asAccount("A1", "/api/v1/packets", "POST", { quota: "1", count: 1, expires: 5 }),
    );

    const res = await t.app.request(jsonRequest("/health"));

    expect(res.status).toBe(200);
    const body = (await res.json()) as HealthBody;
    expect(body.status).toBe("ok");
    expect(body.blockNumber).toBe(12);
    expect(body.nextPacketId).toBe(1);
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it("GET /health needs no credentials in secured mode", async () => {
    const t = createTestApp({ auth: { apiKeys: new Map() } });

    const res = await t.app.request(jsonRequest("/health"));

    expect(res.status).toBe(200);
  });

  it("GET /ready is 200 while the event chain verifies", async () => {
    const t = createTestApp();
    await t.app.request(
      asAccount("A1", "/api/v1/packets", "POST", { quota: "1", count: 1, expires: 5 }),
    );
    await t.app.request(asAccount("A2", "/api/v1/packets/0/claim"));

    const res = await t.app.request(jsonRequest("/ready"));

    expect(res.status).toBe(200);
    const body = (await res.json()) as ReadyBody;
    expect(body.status).toBe("ready");
    expect(body.eventStore).toEqual({ valid: true, lastVerifiedPosition: 2, errors: 0 });
  });
});
