// ---------------------------------------------------------------------------
// Integration tests for the app shell: index, readiness, metrics and
// correlation ids.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { createTestApplication } from "../../support/app.js";
import type { TestApplication } from "../../support/app.js";

describe("app shell", () => {
  let t: TestApplication;

  beforeEach(async () => {
    t = await createTestApplication({ APP_VERSION: "2.4.0" });
  });

  afterEach(async () => {
    await t.shutdown();
  });

  // ── GET / ─────────────────────────────────────────────────────────────

  it("describes the service and counts index requests", async () => {
    const first = await t.app.request("/");
    expect(first.status).toBe(200);
    expect(await first.json()).toMatchObject({
      service: "resilient-core",
      version: "2.4.0",
      environment: "staging",
      status: "operational",
      requestCount: 1,
    });

    const second = await t.app.request("/");
    expect(await second.json()).toMatchObject({ requestCount: 2 });
  });

  // ── GET /ready ────────────────────────────────────────────────────────

  it("reports ready even with both dependencies down", async () => {
    t.store.failure = new Error("down");
    t.cache.getFailure = new Error("down");
    const pings = t.store.pingCalls;

    const res = await t.app.request("/ready");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ready" });
    expect(t.store.pingCalls).toBe(pings);
  });

  // ── Correlation ids ───────────────────────────────────────────────────

  it("echoes a well-formed correlation id", async () => {
    const res = await t.app.request("/ready", {
      headers: { "X-Correlation-ID": "req-42.abc" },
    });
    expect(res.headers.get("x-correlation-id")).toBe("req-42.abc");
  });

  it("accepts X-Request-ID as the correlation id", async () => {
    const res = await t.app.request("/ready", { headers: { "X-Request-ID": "upstream_7" } });
    expect(res.headers.get("x-correlation-id")).toBe("upstream_7");
  });

  it("replaces a malformed correlation id with a UUID", async () => {
    const res = await t.app.request("/ready", {
      headers: { "X-Correlation-ID": "bad id with spaces" },
    });
    expect(res.headers.get("x-correlation-id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  // ── GET /metrics ──────────────────────────────────────────────────────

  it("exposes breaker states and call outcomes", async () => {
    t.store.failure = new Error("down");
    await t.app.request("/health");
    await t.app.request("/health");

    const res = await t.app.request("/metrics");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      breakers: {
        store: { state: "open", ordinal: 1 },
        cache: { state: "closed", ordinal: 0 },
      },
      calls: {
        store: { totalCalls: 2, failureCount: 2 },
        cache: { totalCalls: 2, successCount: 2 },
      },
      health: { store: 0, cache: 1 },
      requests: { "GET health": { totalRequests: 2, byStatus: { "503": 2 } } },
    });
  });

  // ── Shutdown ──────────────────────────────────────────────────────────

  it("connects the cache before serving", () => {
    expect(t.cache.connected).toBe(true);
  });

  it("closes both clients on shutdown", async () => {
    await t.shutdown();
    expect(t.store.closed).toBe(true);
    expect(t.cache.closed).toBe(true);
  });
});

describe("app shell with metrics disabled", () => {
  let t: TestApplication;

  beforeEach(async () => {
    t = await createTestApplication({ METRICS_ENABLED: "false" });
  });

  afterEach(async () => {
    await t.shutdown();
  });

  it("returns 404 from /metrics", async () => {
    const res = await t.app.request("/metrics");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Metrics are disabled", type: "metrics_disabled" });
  });
});
