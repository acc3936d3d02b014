/**
 * Runtime Type Guards
 *
 * Narrowing functions for multisig domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, restored snapshots, external integrations).
 */

import type { Address, HexBytes } from "./address.js";
import type { UserRole } from "./role.js";
import type { Action, ActionType, CallActionData, CodeMetadata } from "./action.js";

// =============================================================================
// Primitive guards
// =============================================================================

const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/;
const ADDRESS_PATTERN = /^[A-Za-z0-9:_.-]{1,128}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isHexBytes(value: unknown): value is HexBytes {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

export function isAmount(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

// =============================================================================
// Role guards
// =============================================================================

const ROLES = new Set<string>(["none", "proposer", "board_member"]);

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === "string" && ROLES.has(value);
}

// =============================================================================
// Action guards
// =============================================================================

const ACTION_TYPES = new Set<string>([
  "add_board_member",
  "add_proposer",
  "remove_user",
  "change_quorum",
  "send_transfer_execute",
  "send_async_call",
  "sc_deploy_from_source",
  "sc_upgrade_from_source",
]);

export function isActionType(value: unknown): value is ActionType {
  return typeof value === "string" && ACTION_TYPES.has(value);
}

export function isCodeMetadata(value: unknown): value is CodeMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.upgradeable === "boolean" &&
    typeof v.readable === "boolean" &&
    typeof v.payable === "boolean" &&
    typeof v.payableBySc === "boolean"
  );
}

function isArgList(value: unknown): value is readonly HexBytes[] {
  return Array.isArray(value) && value.every(isHexBytes);
}

export function isCallActionData(value: unknown): value is CallActionData {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAddress(v.to) &&
    isAmount(v.amount) &&
    (v.endpoint === undefined || typeof v.endpoint === "string") &&
    isArgList(v.args)
  );
}

export function isAction(value: unknown): value is Action {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  switch (v.type) {
    case "add_board_member":
    case "add_proposer":
    case "remove_user":
      return isAddress(v.address);
    case "change_quorum":
      return typeof v.quorum === "number" && Number.isInteger(v.quorum) && v.quorum >= 0;
    case "send_transfer_execute":
    case "send_async_call":
      return isCallActionData(v.call);
    case "sc_deploy_from_source":
      return (
        isAmount(v.amount) &&
        isAddress(v.source) &&
        isCodeMetadata(v.codeMetadata) &&
        isArgList(v.args)
      );
    case "sc_upgrade_from_source":
      return (
        isAddress(v.target) &&
        isAmount(v.amount) &&
        isAddress(v.source) &&
        isCodeMetadata(v.codeMetadata) &&
        isArgList(v.args)
      );
    default:
      return false;
  }
}
