/**
 * API Handler Tests
 *
 * KV is replaced by an in-memory map; handlers run against in-process
 * request and response objects.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const store = vi.hoisted(() => ({
  values: new Map<string, unknown>(),
  ping: vi.fn(async () => "PONG"),
}));

vi.mock("../src/lib/kv.js", () => ({
  getJSON: async (key: string) => store.values.get(key) ?? null,
  kv: { getClient: async () => ({ ping: store.ping }) },
  prefixKey: (key: string) => `arena-test:${key}`,
  pipeline: async () => [],
  isKvEnabled: () => true,
}));

import epochHandler from "../src/api/epoch.js";
import positionsHandler from "../src/api/positions.js";
import healthHandler from "../src/api/health.js";
import metricsHandler from "../src/api/metrics.js";
import { toArenaSnapshot } from "../src/lib/snapshot.js";
import { recordBattle, resetMetrics } from "../src/lib/metrics.js";
import { ALICE, CAROL, createArenaFixture, stake, units, vote } from "./helpers/fakes.js";
import { createRequest, createResponse } from "./helpers/http.js";

function publishFixture() {
  const f = createArenaFixture();
  const s1 = stake(f, ALICE, 1);
  vote(f, CAROL, s1, units(500n));
  const snapshot = toArenaSnapshot(f.arena, new Date("2026-01-01T00:00:00.000Z"));
  store.values.set("epoch:current:json", snapshot.epoch);
  store.values.set("epoch:1:json", snapshot.epoch);
  store.values.set("staker:1:json", snapshot.stakers[0]);
  store.values.set("voting:1:json", snapshot.votings[0]);
  return snapshot;
}

describe("API handlers", () => {
  beforeEach(() => {
    store.values.clear();
    store.ping.mockClear();
    resetMetrics();
  });

  describe("GET /api/epoch", () => {
    it("should return the current epoch summary", async () => {
      const snapshot = publishFixture();
      const out = createResponse();

      await epochHandler(createRequest("GET"), out.res);

      expect(out.status()).toBe(200);
      expect(out.body()).toEqual(snapshot.epoch);
      expect(out.header("Cache-Control")).toBe("s-maxage=30, stale-while-revalidate=60");
    });

    it("should answer 304 for a matching ETag", async () => {
      publishFixture();
      const first = createResponse();
      await epochHandler(createRequest("GET"), first.res);
      const etag = first.header("ETag");
      expect(String(etag)).toMatch(/^W\/"[0-9a-f]{16}"$/);

      const second = createResponse();
      await epochHandler(createRequest("GET", {}, { "if-none-match": String(etag) }), second.res);
      expect(second.status()).toBe(304);
      expect(second.body()).toBeUndefined();
    });

    it("should return 404 for an epoch never published", async () => {
      publishFixture();
      const out = createResponse();
      await epochHandler(createRequest("GET", { epoch: "9" }), out.res);
      expect(out.status()).toBe(404);
      expect(out.body()).toEqual({ error: "Epoch not found" });
    });

    it("should reject an invalid epoch", async () => {
      const out = createResponse();
      await epochHandler(createRequest("GET", { epoch: "zero" }), out.res);
      expect(out.status()).toBe(400);
    });

    it("should only accept GET", async () => {
      const out = createResponse();
      await epochHandler(createRequest("POST"), out.res);
      expect(out.status()).toBe(405);
      expect(out.body()).toEqual({ error: "Method not allowed" });
    });
  });

  describe("GET /api/positions", () => {
    it("should return a voting position", async () => {
      const snapshot = publishFixture();
      const out = createResponse();

      await positionsHandler(createRequest("GET", { kind: "voting", id: "1" }), out.res);

      expect(out.status()).toBe(200);
      expect(out.body()).toEqual({ kind: "voting", position: snapshot.votings[0] });
    });

    it("should return a staker position", async () => {
      const snapshot = publishFixture();
      const out = createResponse();

      await positionsHandler(createRequest("GET", { kind: "staking", id: "1" }), out.res);

      expect(out.body()).toEqual({ kind: "staking", position: snapshot.stakers[0] });
    });

    it("should return 404 for unknown positions", async () => {
      publishFixture();
      const out = createResponse();
      await positionsHandler(createRequest("GET", { kind: "staking", id: "2" }), out.res);
      expect(out.status()).toBe(404);
      expect(out.body()).toEqual({ error: "Position not found", details: { kind: "staking", id: 2 } });
    });

    it("should reject an unknown kind", async () => {
      const out = createResponse();
      await positionsHandler(createRequest("GET", { kind: "pairs", id: "1" }), out.res);
      expect(out.status()).toBe(400);
    });
  });

  describe("GET /api/health", () => {
    it("should be healthy with KV reachable and a snapshot published", async () => {
      publishFixture();
      const out = createResponse();

      await healthHandler(createRequest("GET"), out.res);

      expect(out.status()).toBe(200);
      expect(out.body()).toMatchObject({
        ok: true,
        services: { kv: true, snapshot: true },
        details: { epoch: 1, snapshotUpdatedAt: "2026-01-01T00:00:00.000Z" },
      });
    });

    it("should report 503 without a snapshot", async () => {
      const out = createResponse();
      await healthHandler(createRequest("GET"), out.res);
      expect(out.status()).toBe(503);
      expect(out.body()).toMatchObject({
        ok: false,
        services: { kv: true, snapshot: false },
        details: { snapshotError: "No arena snapshot published" },
      });
    });

    it("should report 503 when KV is down", async () => {
      store.ping.mockRejectedValueOnce(new Error("connection refused"));
      const out = createResponse();
      await healthHandler(createRequest("GET"), out.res);
      expect(out.status()).toBe(503);
      expect(out.body()).toMatchObject({
        services: { kv: false, snapshot: false },
        details: { kvError: "connection refused" },
      });
    });
  });

  describe("GET /api/metrics", () => {
    it("should report battles and requests", async () => {
      recordBattle(true, 5n);
      publishFixture();
      await epochHandler(createRequest("GET"), createResponse().res);
      const out = createResponse();

      await metricsHandler(createRequest("GET"), out.res);

      expect(out.status()).toBe(200);
      expect(out.body()).toMatchObject({
        battles: { decided: 1, arenaPairs: 1, treasuryShares: "5" },
        requests: { "/api/epoch": { count: 1, errors: 0 } },
        alerts: { highRejectionRate: false, highRequestErrorRate: false },
      });
    });
  });
});
