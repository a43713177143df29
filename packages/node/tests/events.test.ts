/**
 * Tests for event query routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { asAccount, createTestApp, jsonRequest } from "./setup.js";
import type { ErrorBody, TestApp } from "./setup.js";

interface EventPage {
  data: {
    streamId: string;
    version: number;
    globalPosition: number;
    event: { type: string; payload: Record<string, unknown> };
  }[];
  pagination: { cursor: string | null; hasMore: boolean };
}

describe("event routes", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = createTestApp();
    await t.app.request(
      asAccount("A1", "/api/v1/packets", "POST", { quota: "5", count: 2, expires: 10 }),
    );
    await t.app.request(
      asAccount("A2", "/api/v1/packets", "POST", { quota: "3", count: 1, expires: 10 }),
    );
    await t.app.request(asAccount("A3", "/api/v1/packets/0/claim"));
  });

  it("lists every event in global order", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/events"));

    expect(res.status).toBe(200);
    const page = (await res.json()) as EventPage;
    expect(page.data.map((e) => [e.globalPosition, e.streamId, e.event.type])).toEqual([
      [1, "packet-0", "redpacket.packet.created"],
      [2, "packet-1", "redpacket.packet.created"],
      [3, "packet-0", "redpacket.packet.claimed"],
    ]);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("stores amounts in payloads as strings", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/events"));
    const page = (await res.json()) as EventPage;

    expect(page.data[0]?.event.payload).toEqual({
      packetId: 0,
      owner: "A1",
      total: "10",
      count: 2,
    });
  });

  it("pages with a cursor", async () => {
    const first = (await (
      await t.app.request(jsonRequest("/api/v1/events?limit=2"))
    ).json()) as EventPage;

    expect(first.data.map((e) => e.globalPosition)).toEqual([1, 2]);
    expect(first.pagination.hasMore).toBe(true);
    expect(first.pagination.cursor).not.toBeNull();

    const second = (await (
      await t.app.request(
        jsonRequest(`/api/v1/events?limit=2&cursor=${first.pagination.cursor ?? ""}`),
      )
    ).json()) as EventPage;

    expect(second.data.map((e) => e.globalPosition)).toEqual([3]);
    expect(second.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("starts after a given position", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/events?afterPosition=2"));
    const page = (await res.json()) as EventPage;

    expect(page.data.map((e) => e.globalPosition)).toEqual([3]);
  });

  it("rejects an out-of-range limit", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/events?limit=500"));

    expect(res.status).toBe(400);
  });

  it("rejects a cursor it did not issue", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/events?cursor=bm90LWEtY3Vyc29y"));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Invalid query parameters",
        details: { issues: [{ path: "cursor", message: "is not a page cursor" }] },
      },
    });
  });

  describe("packet streams", () => {
    it("lists one packet's stream by version", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/packets/0/events"));
      const page = (await res.json()) as EventPage;

      expect(page.data.map((e) => [e.streamId, e.version, e.event.type])).toEqual([
        ["packet-0", 1, "redpacket.packet.created"],
        ["packet-0", 2, "redpacket.packet.claimed"],
      ]);
      expect(page.pagination).toEqual({ cursor: null, hasMore: false });
    });

    it("starts after a given version", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/packets/0/events?afterVersion=1"));
      const page = (await res.json()) as EventPage;

      expect(page.data.map((e) => e.version)).toEqual([2]);
    });

    it("pages by version", async () => {
      const first = (await (
        await t.app.request(jsonRequest("/api/v1/packets/0/events?limit=1"))
      ).json()) as EventPage;
      expect(first.data.map((e) => e.version)).toEqual([1]);
      expect(first.pagination.hasMore).toBe(true);

      const second = (await (
        await t.app.request(
          jsonRequest(`/api/v1/packets/0/events?limit=1&cursor=${first.pagination.cursor ?? ""}`),
        )
      ).json()) as EventPage;
      expect(second.data.map((e) => e.version)).toEqual([2]);
      expect(second.pagination).toEqual({ cursor: null, hasMore: false });
    });

    it("returns 404 for a packet that was never created", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/packets/9/events"));

      expect(res.status).toBe(404);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("NOT_FOUND");
    });

    it("returns 400 for a non-numeric id", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/packets/abc/events"));

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("VALIDATION_ERROR");
    });
  });
});
