/**
 * Execution host: collaborator interfaces consumed by the engine.
 *
 * The host moves value, runs other accounts' code and deploys contracts.
 * The engine only decides what is authorized and when; it hands the
 * effect to the host and reports what the host answered.
 *
 * All calls are one-shot: the engine never re-queues a failed effect.
 */

import type { Address, Amount, CodeMetadata, HexBytes } from "@consortium/types";

/** Entry point the host calls once an async call has completed */
export const ASYNC_CALLBACK_NAME = "performAsyncCallCallback";

// =============================================================================
// Requests
// =============================================================================

export interface CallRequest {
  /** The shared account sending the call */
  readonly from: Address;
  readonly to: Address;
  readonly amount: Amount;
  readonly endpoint?: string;
  readonly args: readonly HexBytes[];
}

export interface AsyncCallRequest extends CallRequest {
  /** Identifies the in-flight call when the callback arrives */
  readonly callId: string;

  /** Entry point name on the sender to invoke with the result */
  readonly callback: string;
}

export interface DeployRequest {
  readonly from: Address;
  readonly source: Address;
  readonly amount: Amount;
  readonly codeMetadata: CodeMetadata;
  readonly args: readonly HexBytes[];
}

export interface UpgradeRequest extends DeployRequest {
  readonly target: Address;
}

// =============================================================================
// Results
// =============================================================================

export type CallResult =
  | { readonly ok: true; readonly returnData: readonly HexBytes[] }
  | { readonly ok: false; readonly reason: string };

export type DeployResult =
  | { readonly ok: true; readonly address: Address }
  | { readonly ok: false; readonly reason: string };

export type UpgradeResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

// =============================================================================
// Interfaces
// =============================================================================

export interface ExecutionHost {
  /** Synchronous transfer, optionally invoking an endpoint on the receiver */
  transferExecute(request: CallRequest): CallResult;

  /** Start an async call; the result arrives later through the callback entry point */
  asyncCall(request: AsyncCallRequest): void;

  deployFromSource(request: DeployRequest): DeployResult;

  upgradeFromSource(request: UpgradeRequest): UpgradeResult;
}

/**
 * The account side of the async protocol: the host delivers results here.
 */
export interface CallbackReceiver {
  handleCallback(name: string, callId: string, result: CallResult): unknown;
}
