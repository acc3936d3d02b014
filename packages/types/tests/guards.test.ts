/**
 * Runtime type guard tests for @consortium/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isHexBytes,
  isAmount,
  isUserRole,
  isActionType,
  isCodeMetadata,
  isCallActionData,
  isAction,
} from "../src/guards.js";

const METADATA = { upgradeable: true, readable: true, payable: false, payableBySc: false };

// =============================================================================
// Primitive guards
// =============================================================================

describe("isAddress", () => {
  it("accepts plain and hex addresses", () => {
    expect(isAddress("board-1")).toBe(true);
    expect(isAddress("a".repeat(64))).toBe(true);
    expect(isAddress("sc:vault")).toBe(true);
  });

  it("rejects empty strings and whitespace", () => {
    expect(isAddress("")).toBe(false);
    expect(isAddress("board 1")).toBe(false);
  });

  it("rejects overlong values", () => {
    expect(isAddress("a".repeat(129))).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAddress(42)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("isHexBytes", () => {
  it("accepts lowercase even-length hex, including empty", () => {
    expect(isHexBytes("")).toBe(true);
    expect(isHexBytes("00ff")).toBe(true);
  });

  it("rejects odd length, uppercase and prefixes", () => {
    expect(isHexBytes("abc")).toBe(false);
    expect(isHexBytes("ABCD")).toBe(false);
    expect(isHexBytes("0x00")).toBe(false);
  });
});

describe("isAmount", () => {
  it("accepts non-negative bigints", () => {
    expect(isAmount(0n)).toBe(true);
    expect(isAmount(10n ** 24n)).toBe(true);
  });

  it("rejects negative bigints and numbers", () => {
    expect(isAmount(-1n)).toBe(false);
    expect(isAmount(5)).toBe(false);
  });
});

// =============================================================================
// Role guards
// =============================================================================

describe("isUserRole", () => {
  it("accepts the three roles", () => {
    expect(isUserRole("none")).toBe(true);
    expect(isUserRole("proposer")).toBe(true);
    expect(isUserRole("board_member")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isUserRole("admin")).toBe(false);
    expect(isUserRole(undefined)).toBe(false);
  });
});

// =============================================================================
// Action guards
// =============================================================================

describe("isActionType", () => {
  it("accepts known action types", () => {
    expect(isActionType("change_quorum")).toBe(true);
    expect(isActionType("sc_upgrade_from_source")).toBe(true);
  });

  it("rejects unknown types", () => {
    expect(isActionType("nothing")).toBe(false);
  });
});

describe("isCodeMetadata", () => {
  it("accepts a full flag set", () => {
    expect(isCodeMetadata(METADATA)).toBe(true);
  });

  it("rejects missing flags", () => {
    expect(isCodeMetadata({ upgradeable: true })).toBe(false);
  });
});

describe("isCallActionData", () => {
  it("accepts a call with and without endpoint", () => {
    expect(isCallActionData({ to: "user-1", amount: 5n, args: [] })).toBe(true);
    expect(
      isCallActionData({ to: "sc-1", amount: 0n, endpoint: "add", args: ["07"] }),
    ).toBe(true);
  });

  it("rejects non-hex arguments", () => {
    expect(isCallActionData({ to: "sc-1", amount: 0n, endpoint: "add", args: ["zz"] })).toBe(
      false,
    );
  });

  it("rejects a numeric amount", () => {
    expect(isCallActionData({ to: "user-1", amount: 5, args: [] })).toBe(false);
  });
});

describe("isAction", () => {
  it("accepts role actions", () => {
    expect(isAction({ type: "add_board_member", address: "x" })).toBe(true);
    expect(isAction({ type: "remove_user", address: "p" })).toBe(true);
  });

  it("accepts change_quorum with a non-negative integer", () => {
    expect(isAction({ type: "change_quorum", quorum: 0 })).toBe(true);
    expect(isAction({ type: "change_quorum", quorum: 1.5 })).toBe(false);
    expect(isAction({ type: "change_quorum", quorum: -1 })).toBe(false);
  });

  it("accepts deploy and upgrade actions", () => {
    expect(
      isAction({
        type: "sc_deploy_from_source",
        amount: 0n,
        source: "sc-source",
        codeMetadata: METADATA,
        args: [],
      }),
    ).toBe(true);
    expect(
      isAction({
        type: "sc_upgrade_from_source",
        target: "sc-target",
        amount: 0n,
        source: "sc-source",
        codeMetadata: METADATA,
        args: ["01"],
      }),
    ).toBe(true);
  });

  it("rejects an upgrade without target", () => {
    expect(
      isAction({
        type: "sc_upgrade_from_source",
        amount: 0n,
        source: "sc-source",
        codeMetadata: METADATA,
        args: [],
      }),
    ).toBe(false);
  });

  it("rejects unknown types and non-objects", () => {
    expect(isAction({ type: "nothing" })).toBe(false);
    expect(isAction("add_board_member")).toBe(false);
    expect(isAction(null)).toBe(false);
  });
});
