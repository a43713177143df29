/**
 * Tests for Idempotency-Key handling.
 */

import { describe, it, expect } from "vitest";
import { InMemoryIdempotencyStore } from "../../src/middleware/idempotency.js";
import { createTestApp, jsonRequest } from "../setup.js";

const CREATE = { quota: "1", count: 1, expires: 10 };

function createRequest(account: string, key: string): Request {
  return jsonRequest("/api/v1/packets", "POST", CREATE, {
    "X-Account-Id": account,
    "Idempotency-Key": key,
  });
}

describe("idempotencyMiddleware", () => {
  it("replays the first response for a repeated key", async () => {
    const { app, service } = createTestApp();

    const first = await app.request(createRequest("A1", "create-1"));
    const second = await app.request(createRequest("A1", "create-1"));

    expect(second.status).toBe(201);
    expect(second.headers.get("X-Idempotent-Replay")).toBe("true");
    expect(await second.json()).toEqual(await first.json());
    expect(service.nextPacketId()).toBe(1);
    expect(service.getAccount("A1").reserved).toBe(1n);
  });

  it("scopes keys to the caller", async () => {
    const { app, service } = createTestApp();

    await app.request(createRequest("A1", "create-1"));
    const other = await app.request(createRequest("A2", "create-1"));

    expect(other.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(service.nextPacketId()).toBe(2);
  });

  it("does not cache failures", async () => {
    const { app, idempotencyStore } = createTestApp();

    const res = await app.request(createRequest("nobody", "too-big"));

    expect(res.status).toBe(422);
    expect(idempotencyStore.size).toBe(0);
  });

  it("runs the handler every time without a key", async () => {
    const { app, service } = createTestApp();

    await app.request(jsonRequest("/api/v1/packets", "POST", CREATE, { "X-Account-Id": "A1" }));
    await app.request(jsonRequest("/api/v1/packets", "POST", CREATE, { "X-Account-Id": "A1" }));

    expect(service.nextPacketId()).toBe(2);
  });
});

describe("InMemoryIdempotencyStore", () => {
  it("drops entries older than the TTL", () => {
    const store = new InMemoryIdempotencyStore(1000);
    store.set("k", { status: 201, body: "{}", headers: {}, cachedAt: Date.now() - 5000 });

    expect(store.get("k")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("returns fresh entries", () => {
    const store = new InMemoryIdempotencyStore(60_000);
    const entry = { status: 200, body: "{}", headers: {}, cachedAt: Date.now() };
    store.set("k", entry);

    expect(store.get("k")).toEqual(entry);
  });
});
