/**
 * Action Types
 *
 * An action is a typed intent awaiting board endorsement.
 * The union is closed: every consumer matches on `type` exhaustively.
 */

import type { Address, Amount, HexBytes } from "./address.js";

/**
 * Flags attached to deployed contract code.
 */
export interface CodeMetadata {
  readonly upgradeable: boolean;
  readonly readable: boolean;
  readonly payable: boolean;
  readonly payableBySc: boolean;
}

/**
 * Destination, value and optional endpoint invocation of an outgoing call.
 */
export interface CallActionData {
  readonly to: Address;
  readonly amount: Amount;
  /** Endpoint to invoke on `to`. Absent for a plain value transfer. */
  readonly endpoint?: string;
  readonly args: readonly HexBytes[];
}

export type ActionType = Action["type"];

export type Action =
  | AddBoardMemberAction
  | AddProposerAction
  | RemoveUserAction
  | ChangeQuorumAction
  | SendTransferExecuteAction
  | SendAsyncCallAction
  | DeployFromSourceAction
  | UpgradeFromSourceAction;

export interface AddBoardMemberAction {
  readonly type: "add_board_member";
  readonly address: Address;
}

export interface AddProposerAction {
  readonly type: "add_proposer";
  readonly address: Address;
}

export interface RemoveUserAction {
  readonly type: "remove_user";
  readonly address: Address;
}

export interface ChangeQuorumAction {
  readonly type: "change_quorum";
  readonly quorum: number;
}

export interface SendTransferExecuteAction {
  readonly type: "send_transfer_execute";
  readonly call: CallActionData;
}

export interface SendAsyncCallAction {
  readonly type: "send_async_call";
  readonly call: CallActionData;
}

export interface DeployFromSourceAction {
  readonly type: "sc_deploy_from_source";
  readonly amount: Amount;
  readonly source: Address;
  readonly codeMetadata: CodeMetadata;
  readonly args: readonly HexBytes[];
}

export interface UpgradeFromSourceAction {
  readonly type: "sc_upgrade_from_source";
  readonly target: Address;
  readonly amount: Amount;
  readonly source: Address;
  readonly codeMetadata: CodeMetadata;
  readonly args: readonly HexBytes[];
}

/**
 * An action as held in the action store.
 */
export interface PendingAction {
  /** Positive, strictly increasing, never reused */
  readonly id: number;

  readonly action: Action;

  /** Who proposed this action */
  readonly proposer: Address;

  /** ISO 8601 timestamp of the proposal */
  readonly proposedAt: string;
}

/**
 * A pending action together with its current signers.
 */
export interface PendingActionInfo extends PendingAction {
  /** Signers in signing order, including stale ones */
  readonly signers: readonly Address[];
}
