/**
 * In-memory execution host.
 *
 * An in-process stand-in for the ledger the shared account lives on:
 * native balances, contracts with endpoint handlers, deployment from a
 * source contract, upgrade, and async calls held in a queue until the
 * host settles them.
 *
 * A failed call leaves balances as they were before the call.
 */

import { createHash } from "node:crypto";
import type { Address, CodeMetadata, HexBytes } from "@consortium/types";
import type {
  AsyncCallRequest,
  CallbackReceiver,
  CallRequest,
  CallResult,
  DeployRequest,
  DeployResult,
  ExecutionHost,
  UpgradeRequest,
  UpgradeResult,
} from "./host.js";

// =============================================================================
// Types
// =============================================================================

export interface EndpointCall {
  readonly caller: Address;
  readonly amount: bigint;
  readonly args: readonly HexBytes[];
}

export type EndpointHandler = (call: EndpointCall) => CallResult;

/**
 * Contract code: named endpoints. "init" runs on deploy and
 * "upgrade" runs on upgrade when present.
 */
export interface ContractCode {
  readonly endpoints: Readonly<Record<string, EndpointHandler>>;
}

export interface ContractAccount {
  readonly code: ContractCode;
  readonly owner: Address;
  readonly codeMetadata: CodeMetadata;
}

export interface CallbackDelivery {
  readonly callId: string;
  readonly result: CallResult;
}

export const DEFAULT_CODE_METADATA: CodeMetadata = {
  upgradeable: true,
  readable: true,
  payable: false,
  payableBySc: false,
};

// =============================================================================
// Host
// =============================================================================

export class InMemoryHost implements ExecutionHost {
  private readonly balances: Map<Address, bigint> = new Map();
  private readonly contracts: Map<Address, ContractAccount> = new Map();
  private readonly deployNonces: Map<Address, number> = new Map();
  private readonly queue: AsyncCallRequest[] = [];

  // ───────────────────────────────────────────────────────────────────────
  // Accounts
  // ───────────────────────────────────────────────────────────────────────

  fund(address: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`Cannot fund a negative amount: ${amount}`);
    }
    this.balances.set(address, this.balanceOf(address) + amount);
  }

  balanceOf(address: Address): bigint {
    return this.balances.get(address) ?? 0n;
  }

  registerContract(
    address: Address,
    code: ContractCode,
    options: { owner?: Address; codeMetadata?: CodeMetadata } = {},
  ): void {
    if (this.contracts.has(address)) {
      throw new Error(`Contract already registered at ${address}`);
    }
    this.contracts.set(address, {
      code,
      owner: options.owner ?? address,
      codeMetadata: options.codeMetadata ?? DEFAULT_CODE_METADATA,
    });
  }

  getContract(address: Address): ContractAccount | undefined {
    return this.contracts.get(address);
  }

  // ───────────────────────────────────────────────────────────────────────
  // ExecutionHost
  // ───────────────────────────────────────────────────────────────────────

  transferExecute(request: CallRequest): CallResult {
    return this.execute(request);
  }

  asyncCall(request: AsyncCallRequest): void {
    this.queue.push(request);
  }

  deployFromSource(request: DeployRequest): DeployResult {
    const source = this.contracts.get(request.source);
    if (!source) {
      return { ok: false, reason: `No contract code at source ${request.source}` };
    }
    if (this.balanceOf(request.from) < request.amount) {
      return { ok: false, reason: "insufficient funds" };
    }

    const nonce = this.deployNonces.get(request.from) ?? 0;
    const address = createHash("sha256")
      .update(`${request.from}:${nonce}`)
      .digest("hex");

    this.contracts.set(address, {
      code: source.code,
      owner: request.from,
      codeMetadata: request.codeMetadata,
    });
    this.move(request.from, address, request.amount);

    const init = findEndpoint(source.code, "init");
    if (init) {
      const result = invoke(init, { caller: request.from, amount: request.amount, args: request.args });
      if (!result.ok) {
        this.move(address, request.from, request.amount);
        this.contracts.delete(address);
        return { ok: false, reason: result.reason };
      }
    }

    this.deployNonces.set(request.from, nonce + 1);
    return { ok: true, address };
  }

  upgradeFromSource(request: UpgradeRequest): UpgradeResult {
    const target = this.contracts.get(request.target);
    if (!target) {
      return { ok: false, reason: `No contract at ${request.target}` };
    }
    if (target.owner !== request.from) {
      return { ok: false, reason: `${request.from} does not own ${request.target}` };
    }
    if (!target.codeMetadata.upgradeable) {
      return { ok: false, reason: `${request.target} is not upgradeable` };
    }
    const source = this.contracts.get(request.source);
    if (!source) {
      return { ok: false, reason: `No contract code at source ${request.source}` };
    }
    if (this.balanceOf(request.from) < request.amount) {
      return { ok: false, reason: "insufficient funds" };
    }

    this.contracts.set(request.target, {
      code: source.code,
      owner: target.owner,
      codeMetadata: request.codeMetadata,
    });
    this.move(request.from, request.target, request.amount);

    const upgrade = findEndpoint(source.code, "upgrade");
    if (upgrade) {
      const result = invoke(upgrade, { caller: request.from, amount: request.amount, args: request.args });
      if (!result.ok) {
        this.move(request.target, request.from, request.amount);
        this.contracts.set(request.target, target);
        return { ok: false, reason: result.reason };
      }
    }

    return { ok: true };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Async settlement
  // ───────────────────────────────────────────────────────────────────────

  pendingAsyncCalls(): readonly AsyncCallRequest[] {
    return [...this.queue];
  }

  /**
   * Execute queued async calls and deliver each result to the receiver's
   * callback entry point. `order` lists call ids to settle first, in that
   * order; the remaining calls follow in queue order.
   */
  settle(receiver: CallbackReceiver, order: readonly string[] = []): readonly CallbackDelivery[] {
    const byId = new Map(this.queue.map((request) => [request.callId, request]));
    const sequence: AsyncCallRequest[] = [];
    for (const callId of order) {
      const request = byId.get(callId);
      if (request) {
        sequence.push(request);
        byId.delete(callId);
      }
    }
    sequence.push(...byId.values());
    this.queue.length = 0;

    const deliveries: CallbackDelivery[] = [];
    for (const request of sequence) {
      const result = this.execute(request);
      receiver.handleCallback(request.callback, request.callId, result);
      deliveries.push({ callId: request.callId, result });
    }
    return deliveries;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private execute(request: CallRequest): CallResult {
    if (this.balanceOf(request.from) < request.amount) {
      return { ok: false, reason: "insufficient funds" };
    }

    if (request.endpoint === undefined) {
      this.move(request.from, request.to, request.amount);
      return { ok: true, returnData: [] };
    }

    const contract = this.contracts.get(request.to);
    if (!contract) {
      return { ok: false, reason: `${request.to} is not a contract` };
    }
    const handler = findEndpoint(contract.code, request.endpoint);
    if (!handler) {
      return { ok: false, reason: `function not found: ${request.endpoint}` };
    }

    this.move(request.from, request.to, request.amount);
    const result = invoke(handler, { caller: request.from, amount: request.amount, args: request.args });
    if (!result.ok) {
      this.move(request.to, request.from, request.amount);
    }
    return result;
  }

  private move(from: Address, to: Address, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }
}

// =============================================================================
// Endpoint dispatch
// =============================================================================

/** Only the contract's own endpoints; inherited object members are not endpoints. */
function findEndpoint(code: ContractCode, name: string): EndpointHandler | undefined {
  return Object.hasOwn(code.endpoints, name) ? code.endpoints[name] : undefined;
}

/**
 * A throwing handler fails the call like a handler returning `ok: false`.
 */
function invoke(handler: EndpointHandler, call: EndpointCall): CallResult {
  try {
    return handler(call);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}
