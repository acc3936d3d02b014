/**
 * Snapshot serialization.
 *
 * A snapshot is plain JSON: amounts become decimal strings. Its digest
 * is the SHA-256 of the RFC 8785 (JCS) canonical form of every field
 * except the digest itself, so the same state always yields the same digest.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  Action,
  AddBoardMemberAction,
  AddProposerAction,
  Address,
  ChangeQuorumAction,
  DeployFromSourceAction,
  HexBytes,
  RemoveUserAction,
  UpgradeFromSourceAction,
} from "@consortium/types";
import { isAction } from "@consortium/types";
import type { InFlightCall } from "./dispatcher.js";
import { MultisigError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export interface SerializedCallData {
  readonly to: Address;
  /** Decimal string */
  readonly amount: string;
  readonly endpoint?: string;
  readonly args: readonly HexBytes[];
}

export type SerializedAction =
  | AddBoardMemberAction
  | AddProposerAction
  | RemoveUserAction
  | ChangeQuorumAction
  | { readonly type: "send_transfer_execute"; readonly call: SerializedCallData }
  | { readonly type: "send_async_call"; readonly call: SerializedCallData }
  | (Omit<DeployFromSourceAction, "amount"> & { readonly amount: string })
  | (Omit<UpgradeFromSourceAction, "amount"> & { readonly amount: string });

export interface SnapshotAction {
  readonly id: number;
  readonly proposer: Address;
  readonly proposedAt: string;
  readonly action: SerializedAction;
  /** Signing order preserved, stale signers included */
  readonly signers: readonly Address[];
}

export interface MultisigSnapshot {
  readonly version: 1;
  readonly account: Address;
  readonly quorum: number;
  readonly boardMembers: readonly Address[];
  readonly proposers: readonly Address[];
  readonly lastActionId: number;
  readonly actions: readonly SnapshotAction[];
  readonly inFlightCalls: readonly InFlightCall[];

  /** SHA-256 (hex) of the canonical form of all other fields */
  readonly digest: string;
}

export type UnsignedSnapshot = Omit<MultisigSnapshot, "digest">;

// =============================================================================
// Digest
// =============================================================================

export function computeSnapshotDigest(snapshot: UnsignedSnapshot): string {
  return createHash("sha256").update(canonicalize(snapshot)).digest("hex");
}

// =============================================================================
// Action conversion
// =============================================================================

export function serializeAction(action: Action): SerializedAction {
  switch (action.type) {
    case "add_board_member":
    case "add_proposer":
    case "remove_user":
    case "change_quorum":
      return action;
    case "send_transfer_execute":
      return { type: action.type, call: { ...action.call, amount: action.call.amount.toString() } };
    case "send_async_call":
      return { type: action.type, call: { ...action.call, amount: action.call.amount.toString() } };
    case "sc_deploy_from_source":
      return { ...action, amount: action.amount.toString() };
    case "sc_upgrade_from_source":
      return { ...action, amount: action.amount.toString() };
  }
}

/**
 * @throws MultisigError INVALID_ARGUMENT for malformed amounts or actions
 */
export function deserializeAction(raw: SerializedAction): Action {
  const action = toAction(raw);
  if (!isAction(action)) {
    throw new MultisigError("INVALID_ARGUMENT", `Malformed ${raw.type} action in snapshot`);
  }
  return action;
}

function toAction(raw: SerializedAction): Action {
  switch (raw.type) {
    case "add_board_member":
    case "add_proposer":
    case "remove_user":
    case "change_quorum":
      return raw;
    case "send_transfer_execute":
      return { type: raw.type, call: { ...raw.call, amount: parseAmount(raw.call.amount) } };
    case "send_async_call":
      return { type: raw.type, call: { ...raw.call, amount: parseAmount(raw.call.amount) } };
    case "sc_deploy_from_source":
      return { ...raw, amount: parseAmount(raw.amount) };
    case "sc_upgrade_from_source":
      return { ...raw, amount: parseAmount(raw.amount) };
  }
}

/**
 * Parse a non-negative decimal integer string.
 *
 * @throws MultisigError INVALID_ARGUMENT
 */
export function parseAmount(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new MultisigError("INVALID_ARGUMENT", `Invalid amount '${value}'`);
  }
  return BigInt(value);
}
