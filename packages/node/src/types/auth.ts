/**
 * Caller identity types.
 *
 * Two ways to establish who is calling:
 * 1. API key via X-Api-Key header, mapped to a configured address
 * 2. X-Caller header naming the address directly (unsecured mode only)
 *
 * What the caller may do is decided by the engine's role checks,
 * not here.
 */

import type { Address } from "@consortium/types";

export type AuthMethod = "api-key" | "caller-header";

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: AuthMethod;
  readonly address: Address;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly address: Address;
}
