/**
 * Caller identity middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. X-Caller header naming the address (unsecured mode: tests, dev)
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401. Role checks happen in the engine.
 */

import type { MiddlewareHandler } from "hono";
import { isAddress } from "@consortium/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

// =============================================================================
// API Key
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Require a known X-Api-Key on every request.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", { type: "api-key", address: record.address });
    return next();
  };
}

// =============================================================================
// Caller Header
// =============================================================================

/**
 * Take the caller address from X-Caller. Reads may omit it;
 * every other method must name a caller.
 */
export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const caller = c.req.header(CALLER_HEADER);

    if (caller === undefined) {
      if (c.req.method !== "GET") {
        return c.json(
          createErrorEnvelope("UNAUTHORIZED", `${CALLER_HEADER} header required`),
          401,
        );
      }
      return next();
    }

    if (!isAddress(caller)) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Invalid ${CALLER_HEADER} header`),
        401,
      );
    }

    c.set("auth", { type: "caller-header", address: caller });
    return next();
  };
}
