/**
 * @consortium/multisig: Governance engine for a shared account.
 *
 * Subsystems:
 * - Roles: address → none | proposer | board_member
 * - Quorum: required signatures, bounded by the board size
 * - Actions: pending proposals with strictly increasing ids
 * - Signatures: per-action signer sets, counted against live roles
 * - Dispatch: exhaustive execution per action kind
 * - Access: role checks before any mutation
 *
 * Design rules:
 * - Check-then-act: a rejected operation changes nothing
 * - Quorum is derived on every read, never cached
 * - External effects are one-shot and never re-queued
 */

// Engine
export { Multisig } from "./multisig.js";
export type { MultisigConfig, MultisigDeps, DeployProposal, UpgradeProposal } from "./multisig.js";

// Components
export { RoleRegistry } from "./role-registry.js";
export type { RoleChange } from "./role-registry.js";
export { QuorumConfig } from "./quorum-config.js";
export { ActionStore } from "./action-store.js";
export { SignatureLedger } from "./signature-ledger.js";
export { AccessGuard, OPERATION_ROLES } from "./access-guard.js";
export type { GuardedOperation } from "./access-guard.js";
export { ActionDispatcher } from "./dispatcher.js";
export type {
  PerformOutcome,
  RoleOutcome,
  QuorumOutcome,
  TransferOutcome,
  AsyncCallOutcome,
  DeployOutcome,
  UpgradeOutcome,
  InFlightCall,
  CallbackOutcome,
} from "./dispatcher.js";

// Errors
export { MultisigError, isMultisigError } from "./errors.js";
export type { MultisigErrorCode } from "./errors.js";

// Host
export { ASYNC_CALLBACK_NAME } from "./host.js";
export type {
  ExecutionHost,
  CallbackReceiver,
  CallRequest,
  AsyncCallRequest,
  DeployRequest,
  UpgradeRequest,
  CallResult,
  DeployResult,
  UpgradeResult,
} from "./host.js";
export { InMemoryHost, DEFAULT_CODE_METADATA } from "./in-memory-host.js";
export type {
  EndpointCall,
  EndpointHandler,
  ContractCode,
  ContractAccount,
  CallbackDelivery,
} from "./in-memory-host.js";

// Events
export { InMemoryEventLog, NULL_EVENT_SINK, isEventOfType } from "./events.js";
export type {
  MultisigEvent,
  MultisigEventType,
  EventSink,
  EventHandler,
  LoggedEvent,
  Subscription,
} from "./events.js";

// Snapshot
export {
  computeSnapshotDigest,
  serializeAction,
  deserializeAction,
  parseAmount,
} from "./snapshot.js";
export type {
  MultisigSnapshot,
  UnsignedSnapshot,
  SnapshotAction,
  SerializedAction,
  SerializedCallData,
} from "./snapshot.js";
