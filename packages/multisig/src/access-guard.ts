/**
 * Access Guard: role checks in front of every mutating operation.
 *
 * Checks run before any state is touched; a rejected call changes nothing.
 *
 * | Operation        | Minimum role                        |
 * |------------------|-------------------------------------|
 * | propose          | proposer                            |
 * | sign / unsign    | board_member                        |
 * | perform          | board_member                        |
 * | discard          | board_member or the action proposer |
 */

import type { Address, PendingAction, UserRole } from "@consortium/types";
import { MultisigError } from "./errors.js";
import type { RoleRegistry } from "./role-registry.js";

export type GuardedOperation = "propose" | "sign" | "unsign" | "perform" | "discard";

/** Roles allowed to run each operation regardless of action ownership */
export const OPERATION_ROLES: Record<GuardedOperation, readonly UserRole[]> = {
  propose: ["proposer", "board_member"],
  sign: ["board_member"],
  unsign: ["board_member"],
  perform: ["board_member"],
  discard: ["board_member"],
};

export class AccessGuard {
  private readonly roles: RoleRegistry;

  constructor(roles: RoleRegistry) {
    this.roles = roles;
  }

  isAllowed(operation: GuardedOperation, caller: Address): boolean {
    return OPERATION_ROLES[operation].includes(this.roles.roleOf(caller));
  }

  /**
   * @throws MultisigError UNAUTHORIZED
   */
  require(operation: GuardedOperation, caller: Address): UserRole {
    const role = this.roles.roleOf(caller);
    if (!OPERATION_ROLES[operation].includes(role)) {
      throw new MultisigError(
        "UNAUTHORIZED",
        `Caller ${caller} with role '${role}' may not ${operation}`,
      );
    }
    return role;
  }

  /**
   * Discard is also open to the original proposer, whatever their role now.
   */
  requireDiscard(caller: Address, pending: PendingAction): void {
    if (pending.proposer === caller) {
      return;
    }
    this.require("discard", caller);
  }
}
