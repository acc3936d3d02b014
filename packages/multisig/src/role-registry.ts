/**
 * Role Registry: address → role mapping.
 *
 * Rules:
 * - Unknown addresses hold "none"
 * - Reassignment replaces the previous role, never stacks
 * - Board member and proposer counts are maintained on every transition
 * - Listing order is the order in which members obtained their role
 */

import type { Address, UserRole } from "@consortium/types";

export interface RoleChange {
  readonly address: Address;
  readonly previousRole: UserRole;
  readonly newRole: UserRole;
}

export class RoleRegistry {
  private readonly boardMembers = new Set<Address>();
  private readonly proposers = new Set<Address>();

  /**
   * Overwrite the role of an address.
   *
   * Not reachable from the public surface on its own: only executed
   * role actions and initialization call it.
   */
  setRole(address: Address, role: UserRole): RoleChange {
    const previousRole = this.roleOf(address);
    if (previousRole === role) {
      return { address, previousRole, newRole: role };
    }

    this.boardMembers.delete(address);
    this.proposers.delete(address);

    if (role === "board_member") {
      this.boardMembers.add(address);
    } else if (role === "proposer") {
      this.proposers.add(address);
    }

    return { address, previousRole, newRole: role };
  }

  roleOf(address: Address): UserRole {
    if (this.boardMembers.has(address)) return "board_member";
    if (this.proposers.has(address)) return "proposer";
    return "none";
  }

  isBoardMember(address: Address): boolean {
    return this.boardMembers.has(address);
  }

  boardMemberCount(): number {
    return this.boardMembers.size;
  }

  proposerCount(): number {
    return this.proposers.size;
  }

  listBoardMembers(): readonly Address[] {
    return [...this.boardMembers];
  }

  listProposers(): readonly Address[] {
    return [...this.proposers];
  }
}
