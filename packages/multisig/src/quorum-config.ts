/**
 * Quorum Config: the required signature count.
 *
 * Invariant: 1 <= quorum <= board member count after every
 * successful mutation. Changes are validated against the board
 * size at the moment of the change.
 */

import { MultisigError } from "./errors.js";
import type { RoleRegistry } from "./role-registry.js";

export class QuorumConfig {
  private required: number;
  private readonly roles: RoleRegistry;

  constructor(roles: RoleRegistry, quorum: number) {
    this.roles = roles;
    this.assertValid(quorum);
    this.required = quorum;
  }

  quorum(): number {
    return this.required;
  }

  /**
   * @throws MultisigError INVALID_QUORUM if n is 0 or above the board size
   */
  setQuorum(n: number): number {
    this.assertValid(n);
    const previous = this.required;
    this.required = n;
    return previous;
  }

  assertValid(n: number): void {
    if (!Number.isInteger(n) || n < 1) {
      throw new MultisigError("INVALID_QUORUM", `Quorum must be >= 1, got ${n}`);
    }
    const boardSize = this.roles.boardMemberCount();
    if (n > boardSize) {
      throw new MultisigError(
        "INVALID_QUORUM",
        `Quorum (${n}) cannot exceed board member count (${boardSize})`,
      );
    }
  }

  /**
   * Whether the board can shrink by one member and still reach quorum.
   */
  allowsBoardShrink(): boolean {
    return this.roles.boardMemberCount() - 1 >= this.required;
  }
}
