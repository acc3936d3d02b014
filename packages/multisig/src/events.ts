/**
 * Multisig events.
 *
 * Fire-and-forget notifications keyed by event type. Emission has no
 * effect on engine state; sinks receive events after the state change
 * they describe has been applied.
 *
 * Amounts are carried as decimal strings so events stay JSON-safe.
 */

import type { ActionType, Address, HexBytes, UserRole } from "@consortium/types";

// =============================================================================
// Event Types
// =============================================================================

export type MultisigEvent =
  | ActionProposedEvent
  | ActionSignedEvent
  | ActionUnsignedEvent
  | ActionDiscardedEvent
  | ActionPerformedEvent
  | UserRoleChangedEvent
  | QuorumChangedEvent
  | TransferExecuteEvent
  | AsyncCallEvent
  | AsyncCallSuccessEvent
  | AsyncCallErrorEvent
  | ScDeployEvent
  | ScUpgradeEvent;

export type MultisigEventType = MultisigEvent["type"];

export interface ActionProposedEvent {
  readonly type: "action_proposed";
  readonly actionId: number;
  readonly actionType: ActionType;
  readonly proposer: Address;
  readonly timestamp: string;
}

export interface ActionSignedEvent {
  readonly type: "action_signed";
  readonly actionId: number;
  readonly signer: Address;
  readonly timestamp: string;
}

export interface ActionUnsignedEvent {
  readonly type: "action_unsigned";
  readonly actionId: number;
  readonly signer: Address;
  readonly timestamp: string;
}

export interface ActionDiscardedEvent {
  readonly type: "action_discarded";
  readonly actionId: number;
  readonly caller: Address;
  readonly timestamp: string;
}

export interface ActionPerformedEvent {
  readonly type: "action_performed";
  readonly actionId: number;
  readonly actionType: ActionType;
  readonly caller: Address;
  readonly timestamp: string;
}

export interface UserRoleChangedEvent {
  readonly type: "user_role_changed";
  readonly actionId: number;
  readonly address: Address;
  readonly previousRole: UserRole;
  readonly newRole: UserRole;
  readonly timestamp: string;
}

export interface QuorumChangedEvent {
  readonly type: "quorum_changed";
  readonly actionId: number;
  readonly previousQuorum: number;
  readonly newQuorum: number;
  readonly timestamp: string;
}

export interface TransferExecuteEvent {
  readonly type: "transfer_execute";
  readonly actionId: number;
  readonly to: Address;
  readonly amount: string;
  readonly endpoint?: string;
  readonly status: "ok" | "failed";
  readonly reason?: string;
  readonly timestamp: string;
}

export interface AsyncCallEvent {
  readonly type: "async_call";
  readonly actionId: number;
  readonly callId: string;
  readonly to: Address;
  readonly amount: string;
  readonly endpoint?: string;
  readonly timestamp: string;
}

export interface AsyncCallSuccessEvent {
  readonly type: "async_call_success";
  readonly actionId: number;
  readonly callId: string;
  readonly returnData: readonly HexBytes[];
  readonly timestamp: string;
}

export interface AsyncCallErrorEvent {
  readonly type: "async_call_error";
  readonly actionId: number;
  readonly callId: string;
  readonly reason: string;
  readonly timestamp: string;
}

export interface ScDeployEvent {
  readonly type: "sc_deploy";
  readonly actionId: number;
  readonly source: Address;
  readonly amount: string;
  readonly status: "ok" | "failed";
  readonly address?: Address;
  readonly reason?: string;
  readonly timestamp: string;
}

export interface ScUpgradeEvent {
  readonly type: "sc_upgrade";
  readonly actionId: number;
  readonly target: Address;
  readonly source: Address;
  readonly amount: string;
  readonly status: "ok" | "failed";
  readonly reason?: string;
  readonly timestamp: string;
}

// =============================================================================
// Sink
// =============================================================================

export interface EventSink {
  emit(event: MultisigEvent): void;
}

/** Sink that drops everything */
export const NULL_EVENT_SINK: EventSink = {
  emit: () => undefined,
};

// =============================================================================
// In-Memory Event Log
// =============================================================================

export interface LoggedEvent {
  /** Position in the log (1-based, monotonically increasing) */
  readonly sequence: number;
  readonly event: MultisigEvent;
}

export type EventHandler = (entry: LoggedEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

/**
 * Append-only in-memory event log.
 *
 * Subscriptions are dispatched synchronously on emit.
 */
export class InMemoryEventLog implements EventSink {
  private readonly entries: LoggedEvent[] = [];
  private readonly subscribers = new Set<EventHandler>();

  emit(event: MultisigEvent): void {
    const entry: LoggedEvent = { sequence: this.entries.length + 1, event };
    this.entries.push(entry);
    for (const handler of this.subscribers) {
      handler(entry);
    }
  }

  /**
   * Read events starting at a sequence number (inclusive, default 1).
   */
  list(fromSequence = 1): readonly LoggedEvent[] {
    return this.entries.slice(Math.max(fromSequence, 1) - 1);
  }

  /**
   * All events of a given type, in emission order.
   */
  ofType<T extends MultisigEventType>(
    type: T,
  ): readonly Extract<MultisigEvent, { type: T }>[] {
    const out: Extract<MultisigEvent, { type: T }>[] = [];
    for (const { event } of this.entries) {
      if (isEventOfType(event, type)) {
        out.push(event);
      }
    }
    return out;
  }

  subscribe(handler: EventHandler): Subscription {
    this.subscribers.add(handler);
    return {
      unsubscribe: () => {
        this.subscribers.delete(handler);
      },
    };
  }

  get count(): number {
    return this.entries.length;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isEventOfType<T extends MultisigEventType>(
  event: MultisigEvent,
  type: T,
): event is Extract<MultisigEvent, { type: T }> {
  return event.type === type;
}
