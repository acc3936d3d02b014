/**
 * Action Dispatcher: executes a ready action's effect.
 *
 * Two phases, so a rejected perform changes nothing:
 * 1. prepare(): every precondition of the action kind is checked
 * 2. the returned effect applies the change or hands it to the host
 *
 * The engine removes the action between the two phases. Once the
 * effect runs the action is executed, whatever the host answers.
 */

import type {
  Action,
  Address,
  CallActionData,
  PendingAction,
  UserRole,
} from "@consortium/types";
import { MultisigError } from "./errors.js";
import type { EventSink } from "./events.js";
import {
  ASYNC_CALLBACK_NAME,
  type CallRequest,
  type CallResult,
  type DeployResult,
  type ExecutionHost,
  type UpgradeResult,
} from "./host.js";
import type { QuorumConfig } from "./quorum-config.js";
import type { RoleChange, RoleRegistry } from "./role-registry.js";

// =============================================================================
// Outcomes
// =============================================================================

export type PerformOutcome =
  | RoleOutcome
  | QuorumOutcome
  | TransferOutcome
  | AsyncCallOutcome
  | DeployOutcome
  | UpgradeOutcome;

export interface RoleOutcome {
  readonly type: "add_board_member" | "add_proposer" | "remove_user";
  readonly actionId: number;
  readonly change: RoleChange;
}

export interface QuorumOutcome {
  readonly type: "change_quorum";
  readonly actionId: number;
  readonly previousQuorum: number;
  readonly newQuorum: number;
}

export interface TransferOutcome {
  readonly type: "send_transfer_execute";
  readonly actionId: number;
  readonly result: CallResult;
}

export interface AsyncCallOutcome {
  readonly type: "send_async_call";
  readonly actionId: number;
  readonly callId: string;
}

export interface DeployOutcome {
  readonly type: "sc_deploy_from_source";
  readonly actionId: number;
  readonly result: DeployResult;
}

export interface UpgradeOutcome {
  readonly type: "sc_upgrade_from_source";
  readonly actionId: number;
  readonly result: UpgradeResult;
}

export type PreparedEffect = () => PerformOutcome;

/**
 * An async call started by perform whose callback has not arrived yet.
 */
export interface InFlightCall {
  readonly callId: string;
  readonly actionId: number;
  readonly to: Address;
  readonly endpoint?: string;
}

export interface CallbackOutcome {
  readonly callId: string;
  readonly actionId: number;
  readonly result: CallResult;
}

// =============================================================================
// Dispatcher
// =============================================================================

export interface DispatcherDeps {
  /** The shared account's own address */
  readonly account: Address;
  readonly roles: RoleRegistry;
  readonly quorum: QuorumConfig;
  readonly host: ExecutionHost;
  readonly events: EventSink;
  readonly now: () => string;
}

export class ActionDispatcher {
  private readonly deps: DispatcherDeps;
  private readonly inFlight: Map<string, InFlightCall> = new Map();

  constructor(deps: DispatcherDeps) {
    this.deps = deps;
  }

  /**
   * Check every precondition of the action and return its effect.
   *
   * @throws MultisigError QUORUM_WOULD_BE_UNREACHABLE, NOTHING_TO_REMOVE,
   *   INVALID_QUORUM, ACTION_HAS_NO_EFFECT or INVALID_ACTION
   */
  prepare(pending: PendingAction): PreparedEffect {
    const { id } = pending;
    const action: Action = pending.action;

    switch (action.type) {
      case "add_board_member":
        return () => this.changeRole(id, action.type, action.address, "board_member");

      case "add_proposer":
        if (this.deps.roles.roleOf(action.address) === "board_member") {
          this.assertBoardCanShrink(action.address);
        }
        return () => this.changeRole(id, action.type, action.address, "proposer");

      case "remove_user": {
        const current = this.deps.roles.roleOf(action.address);
        if (current === "none") {
          throw new MultisigError(
            "NOTHING_TO_REMOVE",
            `Address ${action.address} holds no role`,
          );
        }
        if (current === "board_member") {
          this.assertBoardCanShrink(action.address);
        }
        return () => this.changeRole(id, action.type, action.address, "none");
      }

      case "change_quorum": {
        const newQuorum = action.quorum;
        this.deps.quorum.assertValid(newQuorum);
        return () => this.changeQuorum(id, newQuorum);
      }

      case "send_transfer_execute": {
        const request = this.buildCallRequest(id, action.call);
        return () => this.transferExecute(id, request);
      }

      case "send_async_call": {
        const request = this.buildCallRequest(id, action.call);
        return () => this.asyncCall(id, request);
      }

      case "sc_deploy_from_source":
        return () => {
          const result = this.deps.host.deployFromSource({
            from: this.deps.account,
            source: action.source,
            amount: action.amount,
            codeMetadata: action.codeMetadata,
            args: action.args,
          });
          this.deps.events.emit({
            type: "sc_deploy",
            actionId: id,
            source: action.source,
            amount: action.amount.toString(),
            ...(result.ok
              ? { status: "ok" as const, address: result.address }
              : { status: "failed" as const, reason: result.reason }),
            timestamp: this.deps.now(),
          });
          return { type: action.type, actionId: id, result };
        };

      case "sc_upgrade_from_source":
        return () => {
          const result = this.deps.host.upgradeFromSource({
            from: this.deps.account,
            target: action.target,
            source: action.source,
            amount: action.amount,
            codeMetadata: action.codeMetadata,
            args: action.args,
          });
          this.deps.events.emit({
            type: "sc_upgrade",
            actionId: id,
            target: action.target,
            source: action.source,
            amount: action.amount.toString(),
            ...(result.ok
              ? { status: "ok" as const }
              : { status: "failed" as const, reason: result.reason }),
            timestamp: this.deps.now(),
          });
          return { type: action.type, actionId: id, result };
        };

      default:
        return assertNever(action);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Async callback entry point
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Resolve an in-flight async call. Each call resolves exactly once,
   * in whatever order the host delivers them.
   *
   * @throws MultisigError UNKNOWN_CALLBACK
   */
  handleCallback(name: string, callId: string, result: CallResult): CallbackOutcome {
    if (name !== ASYNC_CALLBACK_NAME) {
      throw new MultisigError("UNKNOWN_CALLBACK", `Unknown callback entry point '${name}'`);
    }
    const call = this.inFlight.get(callId);
    if (!call) {
      throw new MultisigError("UNKNOWN_CALLBACK", `No async call in flight with id '${callId}'`);
    }
    this.inFlight.delete(callId);

    if (result.ok) {
      this.deps.events.emit({
        type: "async_call_success",
        actionId: call.actionId,
        callId,
        returnData: result.returnData,
        timestamp: this.deps.now(),
      });
    } else {
      this.deps.events.emit({
        type: "async_call_error",
        actionId: call.actionId,
        callId,
        reason: result.reason,
        timestamp: this.deps.now(),
      });
    }

    return { callId, actionId: call.actionId, result };
  }

  listInFlight(): readonly InFlightCall[] {
    return [...this.inFlight.values()];
  }

  importInFlight(calls: readonly InFlightCall[]): void {
    for (const call of calls) {
      this.inFlight.set(call.callId, call);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private assertBoardCanShrink(address: Address): void {
    if (!this.deps.quorum.allowsBoardShrink()) {
      throw new MultisigError(
        "QUORUM_WOULD_BE_UNREACHABLE",
        `Demoting ${address} would leave ${this.deps.roles.boardMemberCount() - 1} ` +
          `board members for a quorum of ${this.deps.quorum.quorum()}`,
      );
    }
  }

  private buildCallRequest(actionId: number, call: CallActionData): CallRequest {
    const endpoint = call.endpoint === undefined || call.endpoint === "" ? undefined : call.endpoint;

    if (endpoint === undefined && call.amount === 0n) {
      throw new MultisigError(
        "ACTION_HAS_NO_EFFECT",
        `Action ${actionId} transfers nothing and calls no endpoint`,
      );
    }
    if (endpoint === undefined && call.args.length > 0) {
      throw new MultisigError(
        "INVALID_ACTION",
        `Action ${actionId} passes arguments without an endpoint`,
      );
    }

    return {
      from: this.deps.account,
      to: call.to,
      amount: call.amount,
      ...(endpoint !== undefined ? { endpoint } : {}),
      args: call.args,
    };
  }

  private changeRole(
    actionId: number,
    type: RoleOutcome["type"],
    address: Address,
    role: UserRole,
  ): RoleOutcome {
    const change = this.deps.roles.setRole(address, role);
    if (change.previousRole !== change.newRole) {
      this.deps.events.emit({
        type: "user_role_changed",
        actionId,
        address,
        previousRole: change.previousRole,
        newRole: change.newRole,
        timestamp: this.deps.now(),
      });
    }
    return { type, actionId, change };
  }

  private changeQuorum(actionId: number, newQuorum: number): QuorumOutcome {
    const previousQuorum = this.deps.quorum.setQuorum(newQuorum);
    this.deps.events.emit({
      type: "quorum_changed",
      actionId,
      previousQuorum,
      newQuorum,
      timestamp: this.deps.now(),
    });
    return { type: "change_quorum", actionId, previousQuorum, newQuorum };
  }

  private transferExecute(actionId: number, request: CallRequest): TransferOutcome {
    const result = this.deps.host.transferExecute(request);
    this.deps.events.emit({
      type: "transfer_execute",
      actionId,
      to: request.to,
      amount: request.amount.toString(),
      ...(request.endpoint !== undefined ? { endpoint: request.endpoint } : {}),
      ...(result.ok
        ? { status: "ok" as const }
        : { status: "failed" as const, reason: result.reason }),
      timestamp: this.deps.now(),
    });
    return { type: "send_transfer_execute", actionId, result };
  }

  private asyncCall(actionId: number, request: CallRequest): AsyncCallOutcome {
    const callId = `async-${actionId}`;
    this.inFlight.set(callId, {
      callId,
      actionId,
      to: request.to,
      ...(request.endpoint !== undefined ? { endpoint: request.endpoint } : {}),
    });
    this.deps.events.emit({
      type: "async_call",
      actionId,
      callId,
      to: request.to,
      amount: request.amount.toString(),
      ...(request.endpoint !== undefined ? { endpoint: request.endpoint } : {}),
      timestamp: this.deps.now(),
    });
    this.deps.host.asyncCall({ ...request, callId, callback: ASYNC_CALLBACK_NAME });
    return { type: "send_async_call", actionId, callId };
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled action: ${String(value)}`);
}
