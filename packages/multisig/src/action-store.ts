/**
 * Action Store: pending actions keyed by id.
 *
 * Rules:
 * - Ids start at 1 and only ever increase; removal never frees an id
 * - Stored actions are never mutated in place: the store keeps its own
 *   frozen copy, detached from the object the proposer passed in
 * - The store owns the records; other components look up by id
 */

import type { Action, Address, PendingAction } from "@consortium/types";
import { MultisigError } from "./errors.js";

export class ActionStore {
  private readonly actions: Map<number, PendingAction> = new Map();
  private lastId = 0;

  /**
   * Store a new action under the next id.
   */
  add(action: Action, proposer: Address, proposedAt: string): PendingAction {
    const id = this.lastId + 1;
    const pending: PendingAction = Object.freeze({
      id,
      action: ownCopy(action),
      proposer,
      proposedAt,
    });
    this.actions.set(id, pending);
    this.lastId = id;
    return pending;
  }

  get(id: number): PendingAction | undefined {
    return this.actions.get(id);
  }

  /**
   * @throws MultisigError NOT_FOUND for unknown, performed or discarded ids
   */
  require(id: number): PendingAction {
    const pending = this.actions.get(id);
    if (!pending) {
      throw new MultisigError("NOT_FOUND", `Action ${id} does not exist`);
    }
    return pending;
  }

  remove(id: number): boolean {
    return this.actions.delete(id);
  }

  /**
   * Highest id ever allocated (0 before the first proposal).
   */
  lastActionId(): number {
    return this.lastId;
  }

  list(): readonly PendingAction[] {
    return [...this.actions.values()];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Restore the id counter and the pending actions from a snapshot.
   * Every restored id must lie in 1..lastId.
   */
  restoreFrom(lastId: number, actions: readonly PendingAction[]): void {
    if (!Number.isInteger(lastId) || lastId < this.lastId) {
      throw new MultisigError(
        "INVALID_ARGUMENT",
        `Cannot move the action counter from ${this.lastId} to ${lastId}`,
      );
    }
    this.lastId = lastId;

    for (const pending of actions) {
      if (pending.id < 1 || pending.id > lastId) {
        throw new MultisigError(
          "INVALID_ARGUMENT",
          `Action id ${pending.id} is outside 1..${lastId}`,
        );
      }
      if (this.actions.has(pending.id)) {
        throw new MultisigError("INVALID_ARGUMENT", `Duplicate action id ${pending.id}`);
      }
      this.actions.set(pending.id, Object.freeze({ ...pending, action: ownCopy(pending.action) }));
    }
  }
}

function ownCopy(action: Action): Action {
  return deepFreeze(structuredClone(action));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
