/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { MultisigService } from "../services/multisig-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The engine service (set for every /api request) */
    service: MultisigService;

    /** Caller identity. Always set on mutating /api requests. */
    auth: AuthContext;
  };
}
