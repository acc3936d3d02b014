/**
 * Tests for external effects: transfers, deployments and upgrades.
 */

import { createHash } from "node:crypto";
import { describe, it, expect, beforeEach } from "vitest";
import type { CodeMetadata } from "@consortium/types";
import { DEFAULT_CODE_METADATA, type ContractCode } from "../src/in-memory-host.js";
import { ACCOUNT, BOARD, FIXED_TIME, PROPOSER, captureError, makeEngine, type TestEngine } from "./helpers.js";

const ECHO: ContractCode = {
  endpoints: {
    echo: ({ args }) => ({ ok: true, returnData: args }),
    fail: () => ({ ok: false, reason: "rejected by contract" }),
  },
};

const LOCKED: CodeMetadata = { ...DEFAULT_CODE_METADATA, upgradeable: false };

function firstDeployAddress(): string {
  return createHash("sha256").update(`${ACCOUNT}:0`).digest("hex");
}

describe("ActionDispatcher", () => {
  let engine: TestEngine;

  beforeEach(() => {
    engine = makeEngine();
    engine.host.fund(ACCOUNT, 1_000n);
  });

  // ───────────────────────────────────────────────────────────────────────
  // Transfer & execute
  // ───────────────────────────────────────────────────────────────────────

  describe("send_transfer_execute", () => {
    it("moves value to a plain address", () => {
      const { multisig, host, events } = engine;
      const id = multisig.proposeTransferExecute({ to: "alice", amount: 250n, args: [] }, BOARD);

      const outcome = multisig.perform(id, BOARD);

      expect(outcome).toEqual({
        type: "send_transfer_execute",
        actionId: 1,
        result: { ok: true, returnData: [] },
      });
      expect(host.balanceOf("alice")).toBe(250n);
      expect(host.balanceOf(ACCOUNT)).toBe(750n);
      expect(events.ofType("transfer_execute")).toEqual([
        {
          type: "transfer_execute",
          actionId: 1,
          to: "alice",
          amount: "250",
          status: "ok",
          timestamp: FIXED_TIME,
        },
      ]);
    });

    it("invokes an endpoint and returns its data", () => {
      const { multisig, host } = engine;
      host.registerContract("echo-sc", ECHO);
      const id = multisig.proposeTransferExecute(
        { to: "echo-sc", amount: 0n, endpoint: "echo", args: ["0a", "ff"] },
        BOARD,
      );

      expect(multisig.perform(id, BOARD)).toEqual({
        type: "send_transfer_execute",
        actionId: 1,
        result: { ok: true, returnData: ["0a", "ff"] },
      });
    });

    it("reports a failed transfer and still removes the action", () => {
      const { multisig, host, events } = engine;
      const id = multisig.proposeTransferExecute({ to: "alice", amount: 5_000n, args: [] }, BOARD);

      const outcome = multisig.perform(id, BOARD);

      expect(outcome).toEqual({
        type: "send_transfer_execute",
        actionId: 1,
        result: { ok: false, reason: "insufficient funds" },
      });
      expect(multisig.getAction(id)).toBeUndefined();
      expect(host.balanceOf(ACCOUNT)).toBe(1_000n);
      expect(events.ofType("transfer_execute")[0]?.reason).toBe("insufficient funds");
    });

    it("refunds value when the endpoint fails", () => {
      const { multisig, host } = engine;
      host.registerContract("echo-sc", ECHO);
      const id = multisig.proposeTransferExecute(
        { to: "echo-sc", amount: 100n, endpoint: "fail", args: [] },
        BOARD,
      );

      const outcome = multisig.perform(id, BOARD);

      expect(outcome.type === "send_transfer_execute" && outcome.result).toEqual({
        ok: false,
        reason: "rejected by contract",
      });
      expect(host.balanceOf(ACCOUNT)).toBe(1_000n);
      expect(host.balanceOf("echo-sc")).toBe(0n);
    });

    it.each(["__proto__", "toString", "constructor"])(
      "reports inherited member '%s' as an unknown endpoint",
      (endpoint) => {
        const { multisig, host } = engine;
        host.registerContract("echo-sc", ECHO);
        const id = multisig.proposeTransferExecute(
          { to: "echo-sc", amount: 100n, endpoint, args: [] },
          BOARD,
        );

        const outcome = multisig.perform(id, BOARD);

        expect(outcome).toEqual({
          type: "send_transfer_execute",
          actionId: 1,
          result: { ok: false, reason: `function not found: ${endpoint}` },
        });
        expect(host.balanceOf(ACCOUNT)).toBe(1_000n);
      },
    );

    it("reports a throwing endpoint as a failed call and refunds value", () => {
      const { multisig, host, events } = engine;
      host.registerContract("trap-sc", {
        endpoints: {
          explode: () => {
            throw new Error("contract trapped");
          },
        },
      });
      const id = multisig.proposeTransferExecute(
        { to: "trap-sc", amount: 100n, endpoint: "explode", args: [] },
        BOARD,
      );

      const outcome = multisig.perform(id, BOARD);

      expect(outcome).toEqual({
        type: "send_transfer_execute",
        actionId: 1,
        result: { ok: false, reason: "contract trapped" },
      });
      expect(multisig.getAction(id)).toBeUndefined();
      expect(host.balanceOf(ACCOUNT)).toBe(1_000n);
      expect(host.balanceOf("trap-sc")).toBe(0n);
      expect(events.ofType("transfer_execute")[0]?.reason).toBe("contract trapped");
    });

    it("rejects a call with no value and no endpoint", () => {
      const { multisig } = engine;
      const id = multisig.proposeTransferExecute({ to: "alice", amount: 0n, args: [] }, BOARD);

      const err = captureError(() => multisig.perform(id, BOARD));

      expect(err.code).toBe("ACTION_HAS_NO_EFFECT");
      expect(multisig.getAction(id)).toBeDefined();
    });

    it("treats an empty endpoint name as absent", () => {
      const { multisig } = engine;
      const id = multisig.proposeTransferExecute(
        { to: "alice", amount: 0n, endpoint: "", args: [] },
        BOARD,
      );
      expect(captureError(() => multisig.perform(id, BOARD)).code).toBe("ACTION_HAS_NO_EFFECT");
    });

    it("rejects arguments without an endpoint", () => {
      const { multisig } = engine;
      const id = multisig.proposeTransferExecute({ to: "alice", amount: 1n, args: ["01"] }, BOARD);
      expect(captureError(() => multisig.perform(id, BOARD)).code).toBe("INVALID_ACTION");
    });

    it("lets a proposer queue a transfer for the board", () => {
      const { multisig } = engine;
      const id = multisig.proposeTransferExecute({ to: "alice", amount: 1n, args: [] }, PROPOSER);
      expect(multisig.quorumReached(id)).toBe(false);
    });
  });

  // ───────────────────────────────────────────────────────────────────────
  // Deploy & upgrade
  // ───────────────────────────────────────────────────────────────────────

  describe("sc_deploy_from_source", () => {
    it("deploys a copy of the source owned by the account", () => {
      const { multisig, host, events } = engine;
      host.registerContract("template", ECHO);
      const id = multisig.proposeScDeployFromSource(
        { amount: 10n, source: "template", codeMetadata: DEFAULT_CODE_METADATA, args: [] },
        BOARD,
      );

      const outcome = multisig.perform(id, BOARD);
      const address = firstDeployAddress();

      expect(outcome).toEqual({
        type: "sc_deploy_from_source",
        actionId: 1,
        result: { ok: true, address },
      });
      expect(host.getContract(address)?.owner).toBe(ACCOUNT);
      expect(host.balanceOf(address)).toBe(10n);
      expect(events.ofType("sc_deploy")).toEqual([
        {
          type: "sc_deploy",
          actionId: 1,
          source: "template",
          amount: "10",
          status: "ok",
          address,
          timestamp: FIXED_TIME,
        },
      ]);
    });

    it("reports a missing source", () => {
      const { multisig } = engine;
      const id = multisig.proposeScDeployFromSource(
        { amount: 0n, source: "nowhere", codeMetadata: DEFAULT_CODE_METADATA, args: [] },
        BOARD,
      );

      expect(multisig.perform(id, BOARD)).toEqual({
        type: "sc_deploy_from_source",
        actionId: 1,
        result: { ok: false, reason: "No contract code at source nowhere" },
      });
    });

    it("rolls back when init fails", () => {
      const { multisig, host } = engine;
      host.registerContract("bad-template", {
        endpoints: { init: () => ({ ok: false, reason: "init refused" }) },
      });
      const id = multisig.proposeScDeployFromSource(
        { amount: 10n, source: "bad-template", codeMetadata: DEFAULT_CODE_METADATA, args: [] },
        BOARD,
      );

      multisig.perform(id, BOARD);

      expect(host.getContract(firstDeployAddress())).toBeUndefined();
      expect(host.balanceOf(ACCOUNT)).toBe(1_000n);
    });

    it("rolls back when init throws", () => {
      const { multisig, host } = engine;
      host.registerContract("trap-template", {
        endpoints: {
          init: () => {
            throw new Error("init trapped");
          },
        },
      });
      const id = multisig.proposeScDeployFromSource(
        { amount: 10n, source: "trap-template", codeMetadata: DEFAULT_CODE_METADATA, args: [] },
        BOARD,
      );

      const outcome = multisig.perform(id, BOARD);

      expect(outcome).toEqual({
        type: "sc_deploy_from_source",
        actionId: 1,
        result: { ok: false, reason: "init trapped" },
      });
      expect(host.getContract(firstDeployAddress())).toBeUndefined();
      expect(host.balanceOf(ACCOUNT)).toBe(1_000n);
    });
  });

  describe("sc_upgrade_from_source", () => {
    function deploy(codeMetadata: CodeMetadata): string {
      const { multisig, host } = engine;
      host.registerContract("template", ECHO);
      const id = multisig.proposeScDeployFromSource(
        { amount: 0n, source: "template", codeMetadata, args: [] },
        BOARD,
      );
      multisig.perform(id, BOARD);
      return firstDeployAddress();
    }

    it("replaces the code of an owned contract", () => {
      const { multisig, host } = engine;
      const target = deploy(DEFAULT_CODE_METADATA);
      const v2: ContractCode = { endpoints: { version: () => ({ ok: true, returnData: ["02"] }) } };
      host.registerContract("template-v2", v2);

      const id = multisig.proposeScUpgradeFromSource(
        { target, amount: 0n, source: "template-v2", codeMetadata: DEFAULT_CODE_METADATA, args: [] },
        BOARD,
      );

      expect(multisig.perform(id, BOARD)).toEqual({
        type: "sc_upgrade_from_source",
        actionId: 2,
        result: { ok: true },
      });
      expect(host.getContract(target)?.code).toBe(v2);
    });

    it("refuses to upgrade non-upgradeable code", () => {
      const { multisig, host } = engine;
      const target = deploy(LOCKED);
      host.registerContract("template-v2", ECHO);

      const id = multisig.proposeScUpgradeFromSource(
        { target, amount: 0n, source: "template-v2", codeMetadata: DEFAULT_CODE_METADATA, args: [] },
        BOARD,
      );

      expect(multisig.perform(id, BOARD)).toEqual({
        type: "sc_upgrade_from_source",
        actionId: 2,
        result: { ok: false, reason: `${target} is not upgradeable` },
      });
      expect(engine.events.ofType("sc_upgrade")[0]?.status).toBe("failed");
    });

    it("refuses to upgrade a contract the account does not own", () => {
      const { multisig, host } = engine;
      host.registerContract("foreign", ECHO);
      host.registerContract("template-v2", ECHO);

      const id = multisig.proposeScUpgradeFromSource(
        { target: "foreign", amount: 0n, source: "template-v2", codeMetadata: DEFAULT_CODE_METADATA, args: [] },
        BOARD,
      );
      const outcome = multisig.perform(id, BOARD);

      expect(outcome.type === "sc_upgrade_from_source" && outcome.result).toEqual({
        ok: false,
        reason: `${ACCOUNT} does not own foreign`,
      });
    });
  });
});
