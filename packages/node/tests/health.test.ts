/**
 * Tests for the health endpoint and request ids.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - X-Request-Id is generated, propagated, or replaced when malformed
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ok",
      ratioLevel: "basic",
      uptimeMs: expect.any(Number),
      timestamp: expect.any(String),
    });
  });

  it("reports the configured ratio level", async () => {
    const { app } = createTestApp({ settings: { ratioLevel: "advanced" } });
    const res = await app.request("/health");

    expect(await res.json()).toMatchObject({ ratioLevel: "advanced" });
  });
});

describe("X-Request-Id", () => {
  it("generates a UUID when none is sent", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(UUID);
  });

  it("preserves a well-formed incoming id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces a malformed incoming id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "bad id <script>" }),
    );

    expect(res.headers.get("X-Request-Id")).toMatch(UUID);
  });
});
