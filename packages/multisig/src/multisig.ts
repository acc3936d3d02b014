/**
 * Multisig: governance engine for a shared account.
 *
 * Proposers submit actions, board members sign them, and a board
 * member performs an action once enough current board members have
 * signed. Every public operation runs to completion before the next
 * one starts; checks run before any mutation.
 *
 * Lifecycle per action:
 *   pending ──(valid signatures >= quorum)──▶ ready ──perform──▶ executed
 *   pending ──discard──▶ discarded
 *
 * "ready" is derived on every read from live roles and quorum.
 * Executed and discarded actions are removed; their ids are never reused.
 */

import type {
  Action,
  Address,
  CallActionData,
  CodeMetadata,
  HexBytes,
  PendingActionInfo,
  UserRole,
} from "@consortium/types";
import { isAction, isAddress } from "@consortium/types";
import { AccessGuard } from "./access-guard.js";
import { ActionStore } from "./action-store.js";
import {
  ActionDispatcher,
  type CallbackOutcome,
  type InFlightCall,
  type PerformOutcome,
} from "./dispatcher.js";
import { MultisigError } from "./errors.js";
import { NULL_EVENT_SINK, type EventSink } from "./events.js";
import type { CallbackReceiver, CallResult, ExecutionHost } from "./host.js";
import { QuorumConfig } from "./quorum-config.js";
import { RoleRegistry } from "./role-registry.js";
import { SignatureLedger } from "./signature-ledger.js";
import {
  computeSnapshotDigest,
  deserializeAction,
  serializeAction,
  type MultisigSnapshot,
  type UnsignedSnapshot,
} from "./snapshot.js";

// =============================================================================
// Config
// =============================================================================

export interface MultisigDeps {
  readonly host: ExecutionHost;
  readonly events?: EventSink;
  /** Clock for proposal and event timestamps (ISO 8601) */
  readonly now?: () => string;
}

export interface MultisigConfig extends MultisigDeps {
  /** The shared account's own address */
  readonly account: Address;
  readonly boardMembers: readonly Address[];
  readonly quorum: number;
  readonly proposers?: readonly Address[];
}

export interface DeployProposal {
  readonly amount: bigint;
  readonly source: Address;
  readonly codeMetadata: CodeMetadata;
  readonly args: readonly HexBytes[];
}

export interface UpgradeProposal extends DeployProposal {
  readonly target: Address;
}

// =============================================================================
// Engine
// =============================================================================

export class Multisig implements CallbackReceiver {
  readonly account: Address;

  private readonly roles: RoleRegistry;
  private readonly quorumConfig: QuorumConfig;
  private readonly store: ActionStore;
  private readonly ledger: SignatureLedger;
  private readonly guard: AccessGuard;
  private readonly dispatcher: ActionDispatcher;
  private readonly events: EventSink;
  private readonly now: () => string;

  /**
   * @throws MultisigError INVALID_ARGUMENT, DUPLICATE_BOARD_MEMBER or INVALID_QUORUM
   */
  constructor(config: MultisigConfig) {
    if (!isAddress(config.account)) {
      throw new MultisigError("INVALID_ARGUMENT", `Invalid account address '${config.account}'`);
    }
    this.account = config.account;
    this.events = config.events ?? NULL_EVENT_SINK;
    this.now = config.now ?? (() => new Date().toISOString());

    this.roles = new RoleRegistry();
    for (const member of config.boardMembers) {
      assertAddress(member);
      if (this.roles.isBoardMember(member)) {
        throw new MultisigError("DUPLICATE_BOARD_MEMBER", `Duplicate board member ${member}`);
      }
      this.roles.setRole(member, "board_member");
    }
    for (const proposer of config.proposers ?? []) {
      assertAddress(proposer);
      if (this.roles.roleOf(proposer) !== "none") {
        throw new MultisigError(
          "INVALID_ARGUMENT",
          `Address ${proposer} is listed more than once`,
        );
      }
      this.roles.setRole(proposer, "proposer");
    }

    this.quorumConfig = new QuorumConfig(this.roles, config.quorum);
    this.store = new ActionStore();
    this.ledger = new SignatureLedger(this.roles, this.quorumConfig);
    this.guard = new AccessGuard(this.roles);
    this.dispatcher = new ActionDispatcher({
      account: this.account,
      roles: this.roles,
      quorum: this.quorumConfig,
      host: config.host,
      events: this.events,
      now: this.now,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Proposals
  // ───────────────────────────────────────────────────────────────────────

  proposeAddBoardMember(address: Address, caller: Address): number {
    return this.propose({ type: "add_board_member", address }, caller);
  }

  proposeAddProposer(address: Address, caller: Address): number {
    return this.propose({ type: "add_proposer", address }, caller);
  }

  proposeRemoveUser(address: Address, caller: Address): number {
    return this.propose({ type: "remove_user", address }, caller);
  }

  proposeChangeQuorum(quorum: number, caller: Address): number {
    return this.propose({ type: "change_quorum", quorum }, caller);
  }

  proposeTransferExecute(call: CallActionData, caller: Address): number {
    return this.propose({ type: "send_transfer_execute", call }, caller);
  }

  proposeAsyncCall(call: CallActionData, caller: Address): number {
    return this.propose({ type: "send_async_call", call }, caller);
  }

  proposeScDeployFromSource(proposal: DeployProposal, caller: Address): number {
    return this.propose(
      {
        type: "sc_deploy_from_source",
        amount: proposal.amount,
        source: proposal.source,
        codeMetadata: proposal.codeMetadata,
        args: proposal.args,
      },
      caller,
    );
  }

  proposeScUpgradeFromSource(proposal: UpgradeProposal, caller: Address): number {
    return this.propose(
      {
        type: "sc_upgrade_from_source",
        target: proposal.target,
        amount: proposal.amount,
        source: proposal.source,
        codeMetadata: proposal.codeMetadata,
        args: proposal.args,
      },
      caller,
    );
  }

  /**
   * Store an action and return its id. A board member proposing an
   * action also signs it.
   *
   * Only the shape of the action is checked here; whether it can take
   * effect is decided when it is performed.
   *
   * @throws MultisigError UNAUTHORIZED or INVALID_ARGUMENT
   */
  propose(action: Action, caller: Address): number {
    const role = this.guard.require("propose", caller);
    if (!isAction(action)) {
      throw new MultisigError("INVALID_ARGUMENT", "Malformed action");
    }

    const pending = this.store.add(action, caller, this.now());
    this.events.emit({
      type: "action_proposed",
      actionId: pending.id,
      actionType: action.type,
      proposer: caller,
      timestamp: pending.proposedAt,
    });

    if (role === "board_member") {
      this.ledger.sign(pending.id, caller);
      this.events.emit({
        type: "action_signed",
        actionId: pending.id,
        signer: caller,
        timestamp: pending.proposedAt,
      });
    }

    return pending.id;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Signatures
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Endorse an action. Signing twice has no further effect.
   *
   * @throws MultisigError UNAUTHORIZED or NOT_FOUND
   */
  sign(actionId: number, caller: Address): void {
    this.guard.require("sign", caller);
    this.store.require(actionId);

    if (this.ledger.sign(actionId, caller)) {
      this.events.emit({
        type: "action_signed",
        actionId,
        signer: caller,
        timestamp: this.now(),
      });
    }
  }

  /**
   * Withdraw an endorsement. No-op when the caller had not signed.
   *
   * @throws MultisigError UNAUTHORIZED or NOT_FOUND
   */
  unsign(actionId: number, caller: Address): void {
    this.guard.require("unsign", caller);
    this.store.require(actionId);

    if (this.ledger.unsign(actionId, caller)) {
      this.events.emit({
        type: "action_unsigned",
        actionId,
        signer: caller,
        timestamp: this.now(),
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Terminal transitions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Remove an action that has not reached quorum.
   *
   * @throws MultisigError NOT_FOUND, UNAUTHORIZED or QUORUM_ALREADY_REACHED
   */
  discard(actionId: number, caller: Address): void {
    const pending = this.store.require(actionId);
    this.guard.requireDiscard(caller, pending);

    if (this.ledger.quorumReached(actionId)) {
      throw new MultisigError(
        "QUORUM_ALREADY_REACHED",
        `Action ${actionId} has reached quorum and can only be performed`,
      );
    }

    this.store.remove(actionId);
    this.ledger.clear(actionId);
    this.events.emit({
      type: "action_discarded",
      actionId,
      caller,
      timestamp: this.now(),
    });
  }

  /**
   * Execute a ready action and remove it.
   *
   * The action is removed before its effect is handed to the host, so
   * the same id can never be performed twice. A failed transfer, call,
   * deploy or upgrade is reported in the outcome and does not restore
   * the action.
   *
   * @throws MultisigError UNAUTHORIZED, NOT_FOUND, QUORUM_NOT_MET or
   *   any precondition error of the action kind
   */
  perform(actionId: number, caller: Address): PerformOutcome {
    this.guard.require("perform", caller);
    const pending = this.store.require(actionId);

    const valid = this.ledger.validSignerCount(actionId);
    const required = this.quorumConfig.quorum();
    if (valid < required) {
      throw new MultisigError(
        "QUORUM_NOT_MET",
        `Action ${actionId} has ${valid} of ${required} required signatures`,
      );
    }

    const effect = this.dispatcher.prepare(pending);

    this.store.remove(actionId);
    this.ledger.clear(actionId);
    this.events.emit({
      type: "action_performed",
      actionId,
      actionType: pending.action.type,
      caller,
      timestamp: this.now(),
    });

    return effect();
  }

  /**
   * Callback entry point for async calls started by perform.
   *
   * @throws MultisigError UNKNOWN_CALLBACK
   */
  handleCallback(name: string, callId: string, result: CallResult): CallbackOutcome {
    return this.dispatcher.handleCallback(name, callId, result);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  roleOf(address: Address): UserRole {
    return this.roles.roleOf(address);
  }

  quorum(): number {
    return this.quorumConfig.quorum();
  }

  boardMemberCount(): number {
    return this.roles.boardMemberCount();
  }

  proposerCount(): number {
    return this.roles.proposerCount();
  }

  getAllBoardMembers(): readonly Address[] {
    return this.roles.listBoardMembers();
  }

  getAllProposers(): readonly Address[] {
    return this.roles.listProposers();
  }

  /**
   * Highest id ever allocated (0 before the first proposal).
   */
  getActionLastIndex(): number {
    return this.store.lastActionId();
  }

  getAction(actionId: number): PendingActionInfo | undefined {
    const pending = this.store.get(actionId);
    if (!pending) {
      return undefined;
    }
    return { ...pending, signers: this.ledger.signers(actionId) };
  }

  /**
   * The stored record, frozen.
   *
   * @throws MultisigError NOT_FOUND
   */
  getActionData(actionId: number): Action {
    return this.store.require(actionId).action;
  }

  /**
   * @throws MultisigError NOT_FOUND
   */
  getActionSigners(actionId: number): readonly Address[] {
    this.store.require(actionId);
    return this.ledger.signers(actionId);
  }

  /**
   * Recorded signatures, including those of demoted members.
   *
   * @throws MultisigError NOT_FOUND
   */
  getActionSignerCount(actionId: number): number {
    this.store.require(actionId);
    return this.ledger.signerCount(actionId);
  }

  /**
   * Signatures from current board members only.
   *
   * @throws MultisigError NOT_FOUND
   */
  getActionValidSignerCount(actionId: number): number {
    this.store.require(actionId);
    return this.ledger.validSignerCount(actionId);
  }

  /**
   * @throws MultisigError NOT_FOUND
   */
  quorumReached(actionId: number): boolean {
    this.store.require(actionId);
    return this.ledger.quorumReached(actionId);
  }

  signed(address: Address, actionId: number): boolean {
    return this.ledger.hasSigned(actionId, address);
  }

  getPendingActionFullInfo(): readonly PendingActionInfo[] {
    return this.store
      .list()
      .map((pending) => ({ ...pending, signers: this.ledger.signers(pending.id) }));
  }

  listInFlightCalls(): readonly InFlightCall[] {
    return this.dispatcher.listInFlight();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Export the full engine state as a JSON-safe snapshot.
   */
  exportSnapshot(): MultisigSnapshot {
    const unsigned: UnsignedSnapshot = {
      version: 1,
      account: this.account,
      quorum: this.quorumConfig.quorum(),
      boardMembers: [...this.roles.listBoardMembers()],
      proposers: [...this.roles.listProposers()],
      lastActionId: this.store.lastActionId(),
      actions: this.store.list().map((pending) => ({
        id: pending.id,
        proposer: pending.proposer,
        proposedAt: pending.proposedAt,
        action: serializeAction(pending.action),
        signers: [...this.ledger.signers(pending.id)],
      })),
      inFlightCalls: [...this.dispatcher.listInFlight()],
    };
    return { ...unsigned, digest: computeSnapshotDigest(unsigned) };
  }

  /**
   * Rebuild an engine from a snapshot. Later proposals continue from
   * the snapshot's last action id.
   *
   * @throws MultisigError INVALID_ARGUMENT on a digest mismatch or a
   *   malformed action, or any initialization error
   */
  static restore(snapshot: MultisigSnapshot, deps: MultisigDeps): Multisig {
    const { digest, ...unsigned } = snapshot;
    const expected = computeSnapshotDigest(unsigned);
    if (digest !== expected) {
      throw new MultisigError(
        "INVALID_ARGUMENT",
        `Snapshot digest mismatch: expected ${expected}, got ${digest}`,
      );
    }

    const engine = new Multisig({
      ...deps,
      account: snapshot.account,
      boardMembers: snapshot.boardMembers,
      proposers: snapshot.proposers,
      quorum: snapshot.quorum,
    });

    engine.store.restoreFrom(
      snapshot.lastActionId,
      snapshot.actions.map((entry) => ({
        id: entry.id,
        proposer: entry.proposer,
        proposedAt: entry.proposedAt,
        action: deserializeAction(entry.action),
      })),
    );
    for (const entry of snapshot.actions) {
      engine.ledger.importSigners(entry.id, entry.signers);
    }
    engine.dispatcher.importInFlight(snapshot.inFlightCalls);

    return engine;
  }
}

function assertAddress(address: Address): void {
  if (!isAddress(address)) {
    throw new MultisigError("INVALID_ARGUMENT", `Invalid address '${address}'`);
  }
}
