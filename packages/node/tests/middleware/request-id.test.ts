/**
 * Tests for request id propagation.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "../setup.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("requestIdMiddleware", () => {
  it("generates an id when none is sent", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(UUID_PATTERN);
  });

  it("keeps a well-formed incoming id", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-42.a_b" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("req-42.a_b");
  });

  it("replaces a malformed incoming id", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "bad id;drop" }),
    );

    expect(res.headers.get("X-Request-Id")).toMatch(UUID_PATTERN);
  });

  it("is set on error responses", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/actions/7");

    expect(res.status).toBe(404);
    expect(res.headers.get("X-Request-Id")).toMatch(UUID_PATTERN);
  });
});
