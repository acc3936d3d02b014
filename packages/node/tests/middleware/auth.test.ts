/**
 * Tests for caller identification.
 */

import { describe, it, expect } from "vitest";
import { asCaller, createTestApp, jsonRequest } from "../setup.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";

interface ErrorBody {
  error: { code: string; message: string };
}

function createSecuredApp() {
  const apiKeys = new Map<string, ApiKeyRecord>([
    ["test-key-alice", { key: "test-key-alice", address: "alice" }],
    ["test-key-carol", { key: "test-key-carol", address: "carol" }],
  ]);
  return createTestApp({ auth: { apiKeys } });
}

// =============================================================================
// API key mode
// =============================================================================

describe("API key auth", () => {
  it("returns 401 without a key", async () => {
    const { app } = createSecuredApp();

    const res = await app.request("/api/v1/board");

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });
  });

  it("returns 401 for an unknown key", async () => {
    const { app } = createSecuredApp();

    const res = await app.request(
      jsonRequest("/api/v1/board", "GET", undefined, { "X-Api-Key": "wrong-key" }),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid API key");
  });

  it("acts as the key's address", async () => {
    const { app, service } = createSecuredApp();

    const res = await app.request(
      jsonRequest(
        "/api/v1/actions",
        "POST",
        { type: "add_proposer", address: "dave" },
        { "X-Api-Key": "test-key-alice" },
      ),
    );

    expect(res.status).toBe(201);
    expect(service.getAction(1)?.proposer).toBe("alice");
    expect(service.getAction(1)?.signers).toEqual(["alice"]);
  });

  it("ignores X-Caller when a key is presented", async () => {
    const { app, service } = createSecuredApp();

    await app.request(
      jsonRequest(
        "/api/v1/actions",
        "POST",
        { type: "add_proposer", address: "dave" },
        { "X-Api-Key": "test-key-carol", "X-Caller": "alice" },
      ),
    );

    expect(service.getAction(1)?.proposer).toBe("carol");
    expect(service.getAction(1)?.signers).toEqual([]);
  });
});

// =============================================================================
// Caller header mode
// =============================================================================

describe("X-Caller header", () => {
  it("is required on mutating requests", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/actions/1/sign", "POST"));

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("X-Caller header required");
  });

  it("is optional on reads", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/board");
    expect(res.status).toBe(200);
  });

  it("rejects a malformed address", async () => {
    const { app } = createTestApp();

    const res = await app.request(asCaller("b@d", "/api/v1/actions/1/sign"));

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid X-Caller header");
  });
});
