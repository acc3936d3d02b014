/**
 * MultisigService: Composition root for the engine.
 *
 * Route handlers delegate to this service; they never touch the engine,
 * the host or the event log directly. The service owns one shared
 * account: one engine, its in-process execution host and its event log.
 */

import {
  InMemoryEventLog,
  InMemoryHost,
  Multisig,
  parseAmount,
  serializeAction,
} from "@consortium/multisig";
import type {
  CallbackDelivery,
  EventHandler,
  LoggedEvent,
  MultisigSnapshot,
  PerformOutcome,
  SerializedAction,
  Subscription,
} from "@consortium/multisig";
import type {
  Action,
  Address,
  CallActionData,
  PendingActionInfo,
  UserRole,
} from "@consortium/types";
import type { CallDataDto, CreateActionDto } from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface MultisigServiceConfig {
  readonly account: Address;
  readonly boardMembers: readonly Address[];
  readonly quorum: number;
  readonly proposers?: readonly Address[] | undefined;
  /** Native balance credited to the account on start */
  readonly initialBalance?: bigint | undefined;
  readonly now?: (() => string) | undefined;
}

// =============================================================================
// Views
// =============================================================================

export interface ActionView {
  readonly id: number;
  readonly proposer: Address;
  readonly proposedAt: string;
  readonly action: SerializedAction;
  readonly signers: readonly Address[];
  readonly validSignerCount: number;
  readonly quorumReached: boolean;
}

export interface BoardView {
  readonly account: Address;
  readonly quorum: number;
  readonly boardMemberCount: number;
  readonly proposerCount: number;
  readonly boardMembers: readonly Address[];
  readonly proposers: readonly Address[];
  /** Native balance of the account, decimal string */
  readonly balance: string;
  readonly lastActionId: number;
}

export interface PerformResult {
  readonly outcome: PerformOutcome;
  /** Async call results delivered after the perform completed */
  readonly callbacks: readonly CallbackDelivery[];
}

// =============================================================================
// Service
// =============================================================================

export class MultisigService {
  readonly multisig: Multisig;
  readonly host: InMemoryHost;
  readonly events: InMemoryEventLog;

  constructor(config: MultisigServiceConfig) {
    this.host = new InMemoryHost();
    this.events = new InMemoryEventLog();
    this.multisig = new Multisig({
      account: config.account,
      boardMembers: config.boardMembers,
      quorum: config.quorum,
      host: this.host,
      events: this.events,
      ...(config.proposers !== undefined ? { proposers: config.proposers } : {}),
      ...(config.now !== undefined ? { now: config.now } : {}),
    });

    if (config.initialBalance !== undefined && config.initialBalance > 0n) {
      this.host.fund(config.account, config.initialBalance);
    }
  }

  // ─── Commands ────────────────────────────────────────────────────

  propose(dto: CreateActionDto, caller: Address): number {
    return this.multisig.propose(toAction(dto), caller);
  }

  sign(actionId: number, caller: Address): void {
    this.multisig.sign(actionId, caller);
  }

  unsign(actionId: number, caller: Address): void {
    this.multisig.unsign(actionId, caller);
  }

  discard(actionId: number, caller: Address): void {
    this.multisig.discard(actionId, caller);
  }

  /**
   * Perform an action, then let the host settle any async calls it
   * queued. Callbacks therefore arrive after the perform has completed.
   */
  perform(actionId: number, caller: Address): PerformResult {
    const outcome = this.multisig.perform(actionId, caller);
    const callbacks = this.host.settle(this.multisig);
    return { outcome, callbacks };
  }

  // ─── Queries ─────────────────────────────────────────────────────

  getAction(actionId: number): ActionView | undefined {
    const info = this.multisig.getAction(actionId);
    return info === undefined ? undefined : this.toView(info);
  }

  listActions(): readonly ActionView[] {
    return this.multisig.getPendingActionFullInfo().map((info) => this.toView(info));
  }

  board(): BoardView {
    return {
      account: this.multisig.account,
      quorum: this.multisig.quorum(),
      boardMemberCount: this.multisig.boardMemberCount(),
      proposerCount: this.multisig.proposerCount(),
      boardMembers: this.multisig.getAllBoardMembers(),
      proposers: this.multisig.getAllProposers(),
      balance: this.host.balanceOf(this.multisig.account).toString(),
      lastActionId: this.multisig.getActionLastIndex(),
    };
  }

  roleOf(address: Address): UserRole {
    return this.multisig.roleOf(address);
  }

  readEvents(fromSequence?: number): readonly LoggedEvent[] {
    return this.events.list(fromSequence);
  }

  onEvent(handler: EventHandler): Subscription {
    return this.events.subscribe(handler);
  }

  snapshot(): MultisigSnapshot {
    return this.multisig.exportSnapshot();
  }

  private toView(info: PendingActionInfo): ActionView {
    return {
      id: info.id,
      proposer: info.proposer,
      proposedAt: info.proposedAt,
      action: serializeAction(info.action),
      signers: info.signers,
      validSignerCount: this.multisig.getActionValidSignerCount(info.id),
      quorumReached: this.multisig.quorumReached(info.id),
    };
  }
}

// =============================================================================
// DTO conversion
// =============================================================================

/**
 * Convert a validated request body into an engine action.
 */
export function toAction(dto: CreateActionDto): Action {
  switch (dto.type) {
    case "add_board_member":
    case "add_proposer":
    case "remove_user":
      return { type: dto.type, address: dto.address };
    case "change_quorum":
      return { type: dto.type, quorum: dto.quorum };
    case "send_transfer_execute":
    case "send_async_call":
      return { type: dto.type, call: toCallData(dto.call) };
    case "sc_deploy_from_source":
      return {
        type: dto.type,
        amount: parseAmount(dto.amount),
        source: dto.source,
        codeMetadata: dto.codeMetadata,
        args: dto.args,
      };
    case "sc_upgrade_from_source":
      return {
        type: dto.type,
        target: dto.target,
        amount: parseAmount(dto.amount),
        source: dto.source,
        codeMetadata: dto.codeMetadata,
        args: dto.args,
      };
  }
}

function toCallData(call: CallDataDto): CallActionData {
  return {
    to: call.to,
    amount: parseAmount(call.amount),
    ...(call.endpoint !== undefined ? { endpoint: call.endpoint } : {}),
    args: call.args,
  };
}
