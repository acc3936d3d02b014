/**
 * Test helpers for @consortium/multisig.
 */

import { InMemoryEventLog } from "../src/events.js";
import { InMemoryHost } from "../src/in-memory-host.js";
import { Multisig } from "../src/multisig.js";
import { MultisigError } from "../src/errors.js";

export const ACCOUNT = "sc-multisig";
export const BOARD = "board-member";
export const PROPOSER = "proposer";
export const FIXED_TIME = "2025-01-01T00:00:00.000Z";

export interface TestEngine {
  readonly multisig: Multisig;
  readonly host: InMemoryHost;
  readonly events: InMemoryEventLog;
}

/**
 * Board = {board-member}, quorum = 1, proposers = {proposer}.
 */
export function makeEngine(
  options: { boardMembers?: readonly string[]; quorum?: number; proposers?: readonly string[] } = {},
): TestEngine {
  const host = new InMemoryHost();
  const events = new InMemoryEventLog();
  const multisig = new Multisig({
    account: ACCOUNT,
    boardMembers: options.boardMembers ?? [BOARD],
    quorum: options.quorum ?? 1,
    proposers: options.proposers ?? [PROPOSER],
    host,
    events,
    now: () => FIXED_TIME,
  });
  return { multisig, host, events };
}

/**
 * Run fn and return the MultisigError it throws.
 */
export function captureError(fn: () => unknown): MultisigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MultisigError) return err;
    throw err;
  }
  throw new Error("Expected a MultisigError to be thrown");
}
