/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reports persistence, providers and event chain integrity
 * - GET /ready answers 503 when a hash chain is broken
 * - Unknown routes get the error envelope
 */

import { describe, it, expect, vi } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(body.timestamp).toBeDefined();
  });

  it("includes X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toBe("req-1");
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "test-req-123",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces a malformed X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "bad id with spaces",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("req-1");
  });
});

describe("GET /ready", () => {
  it("returns 200 ready on a fresh engine", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);

    const body = (await res.json()) as {
      status: string;
      persistence: string;
      providers: string[];
      ledgerRows: number;
      subsystems: Record<string, { valid: boolean; errors: number }>;
    };
    expect(body.status).toBe("ready");
    expect(body.persistence).toBe("memory");
    expect(body.providers).toEqual(["card"]);
    expect(body.ledgerRows).toBe(0);
    expect(body.subsystems).toEqual({
      events: { valid: true, errors: 0 },
      config: { valid: true, errors: 0 },
    });
  });

  it("returns 503 when an event chain fails verification", async () => {
    const { app, engine } = createTestApp();
    vi.spyOn(engine.eventStore, "verifyIntegrity").mockReturnValue({
      valid: false,
      lastVerifiedPosition: 2,
      errors: [{ position: 3, reason: "hash mismatch" }],
    });

    const res = await app.request("/ready");
    expect(res.status).toBe(503);

    const body = (await res.json()) as {
      status: string;
      subsystems: Record<string, { valid: boolean; errors: number }>;
    };
    expect(body.status).toBe("not_ready");
    expect(body.subsystems["events"]).toEqual({ valid: false, errors: 1 });
  });
});

describe("error handling", () => {
  it("returns error envelope for unknown routes", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nonexistent");

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "NOT_FOUND",
      message: "No route for GET /api/v1/nonexistent",
    });
  });
});
