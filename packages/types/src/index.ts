/**
 * @consortium/types: Shared domain types for the multisig stack.
 *
 * These types are used across all packages:
 * - Addresses, amounts and argument buffers
 * - User roles
 * - The closed action union and stored action records
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types: meaning lives in consuming code
 */

// Address types
export type { Address, Amount, HexBytes } from "./address.js";

// Roles
export type { UserRole } from "./role.js";

// Actions
export type {
  Action,
  ActionType,
  CallActionData,
  CodeMetadata,
  AddBoardMemberAction,
  AddProposerAction,
  RemoveUserAction,
  ChangeQuorumAction,
  SendTransferExecuteAction,
  SendAsyncCallAction,
  DeployFromSourceAction,
  UpgradeFromSourceAction,
  PendingAction,
  PendingActionInfo,
} from "./action.js";

// Runtime type guards
export {
  isAddress,
  isHexBytes,
  isAmount,
  isUserRole,
  isActionType,
  isCodeMetadata,
  isCallActionData,
  isAction,
} from "./guards.js";
