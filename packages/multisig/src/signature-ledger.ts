/**
 * Signature Ledger: per-action signer sets.
 *
 * Signatures from members who later lost the board member role are
 * kept but excluded from the valid count. The quorum predicate is
 * derived on every read from the live registry and quorum, never cached.
 */

import type { Address } from "@consortium/types";
import type { RoleRegistry } from "./role-registry.js";
import type { QuorumConfig } from "./quorum-config.js";

export class SignatureLedger {
  private readonly signatures: Map<number, Set<Address>> = new Map();
  private readonly roles: RoleRegistry;
  private readonly quorumConfig: QuorumConfig;

  constructor(roles: RoleRegistry, quorumConfig: QuorumConfig) {
    this.roles = roles;
    this.quorumConfig = quorumConfig;
  }

  /**
   * Add a signer. Returns false when the signer had already signed.
   */
  sign(actionId: number, signer: Address): boolean {
    let signers = this.signatures.get(actionId);
    if (!signers) {
      signers = new Set();
      this.signatures.set(actionId, signers);
    }
    if (signers.has(signer)) {
      return false;
    }
    signers.add(signer);
    return true;
  }

  /**
   * Remove a signer. Returns false when the signer had not signed.
   */
  unsign(actionId: number, signer: Address): boolean {
    const signers = this.signatures.get(actionId);
    if (!signers) {
      return false;
    }
    const removed = signers.delete(signer);
    if (signers.size === 0) {
      this.signatures.delete(actionId);
    }
    return removed;
  }

  hasSigned(actionId: number, signer: Address): boolean {
    return this.signatures.get(actionId)?.has(signer) === true;
  }

  /**
   * All recorded signers in signing order, stale ones included.
   */
  signers(actionId: number): readonly Address[] {
    return [...(this.signatures.get(actionId) ?? [])];
  }

  signerCount(actionId: number): number {
    return this.signatures.get(actionId)?.size ?? 0;
  }

  /**
   * Signers that currently hold the board member role.
   */
  validSignerCount(actionId: number): number {
    let count = 0;
    for (const signer of this.signatures.get(actionId) ?? []) {
      if (this.roles.isBoardMember(signer)) {
        count++;
      }
    }
    return count;
  }

  quorumReached(actionId: number): boolean {
    return this.validSignerCount(actionId) >= this.quorumConfig.quorum();
  }

  clear(actionId: number): void {
    this.signatures.delete(actionId);
  }

  /**
   * Restore a signer set. Order is preserved.
   */
  importSigners(actionId: number, signers: readonly Address[]): void {
    if (signers.length === 0) {
      this.signatures.delete(actionId);
      return;
    }
    this.signatures.set(actionId, new Set(signers));
  }
}
