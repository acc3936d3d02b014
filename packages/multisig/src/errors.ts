/**
 * Multisig errors.
 *
 * Every rejection is a normal, reportable outcome: the operation
 * left all state untouched and the caller may resubmit.
 */

export type MultisigErrorCode =
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "QUORUM_NOT_MET"
  | "INVALID_QUORUM"
  | "QUORUM_WOULD_BE_UNREACHABLE"
  | "NOTHING_TO_REMOVE"
  | "ACTION_HAS_NO_EFFECT"
  | "INVALID_ACTION"
  | "INVALID_ARGUMENT"
  | "DUPLICATE_BOARD_MEMBER"
  | "QUORUM_ALREADY_REACHED"
  | "UNKNOWN_CALLBACK";

export class MultisigError extends Error {
  public readonly code: MultisigErrorCode;
  constructor(code: MultisigErrorCode, message: string) {
    super(message);
    this.name = "MultisigError";
    this.code = code;
  }
}

export function isMultisigError(err: unknown): err is MultisigError {
  return err instanceof MultisigError;
}
