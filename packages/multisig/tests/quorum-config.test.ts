/**
 * Tests for QuorumConfig.
 */

import { describe, it, expect } from "vitest";
import { QuorumConfig } from "../src/quorum-config.js";
import { RoleRegistry } from "../src/role-registry.js";
import { captureError } from "./helpers.js";

function boardOf(size: number): RoleRegistry {
  const roles = new RoleRegistry();
  for (let i = 1; i <= size; i++) {
    roles.setRole(`b${i}`, "board_member");
  }
  return roles;
}

describe("QuorumConfig", () => {
  it("holds the initial quorum", () => {
    const config = new QuorumConfig(boardOf(3), 2);
    expect(config.quorum()).toBe(2);
  });

  it("rejects a zero quorum", () => {
    expect(captureError(() => new QuorumConfig(boardOf(2), 0)).code).toBe("INVALID_QUORUM");
  });

  it("rejects a quorum above the board size", () => {
    const config = new QuorumConfig(boardOf(2), 1);
    expect(captureError(() => config.setQuorum(3)).code).toBe("INVALID_QUORUM");
    expect(config.quorum()).toBe(1);
  });

  it("rejects a non-integer quorum", () => {
    const config = new QuorumConfig(boardOf(2), 1);
    expect(() => config.setQuorum(1.5)).toThrow("Quorum must be >= 1");
  });

  it("returns the previous quorum on change", () => {
    const config = new QuorumConfig(boardOf(3), 1);
    expect(config.setQuorum(3)).toBe(1);
    expect(config.quorum()).toBe(3);
  });

  it("validates against the live board size", () => {
    const roles = boardOf(1);
    const config = new QuorumConfig(roles, 1);
    expect(captureError(() => config.setQuorum(2)).code).toBe("INVALID_QUORUM");

    roles.setRole("b2", "board_member");
    config.setQuorum(2);
    expect(config.quorum()).toBe(2);
  });

  it("allows shrinking the board only while quorum stays reachable", () => {
    const roles = boardOf(2);
    const config = new QuorumConfig(roles, 1);
    expect(config.allowsBoardShrink()).toBe(true);

    config.setQuorum(2);
    expect(config.allowsBoardShrink()).toBe(false);
  });
});
