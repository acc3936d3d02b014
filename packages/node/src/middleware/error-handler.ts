/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps engine rejections (MultisigError) to HTTP status codes.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { isMultisigError, type MultisigErrorCode } from "@consortium/multisig";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Record<MultisigErrorCode, ContentfulStatusCode> = {
  // Access
  UNAUTHORIZED: 403,

  // Lookup
  NOT_FOUND: 404,
  UNKNOWN_CALLBACK: 404,

  // Lifecycle conflicts
  QUORUM_NOT_MET: 409,
  QUORUM_ALREADY_REACHED: 409,
  DUPLICATE_BOARD_MEMBER: 409,

  // Preconditions checked at perform time
  INVALID_QUORUM: 422,
  QUORUM_WOULD_BE_UNREACHABLE: 422,
  NOTHING_TO_REMOVE: 422,
  ACTION_HAS_NO_EFFECT: 422,
  INVALID_ACTION: 422,

  // Malformed input
  INVALID_ARGUMENT: 400,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (isMultisigError(err)) {
    return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
