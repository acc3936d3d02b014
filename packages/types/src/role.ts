/**
 * User Roles
 *
 * Every address holds exactly one role. Unknown addresses hold "none".
 *
 * - none: no privilege
 * - proposer: may create actions, may not sign or perform them
 * - board_member: may propose, sign, unsign, discard and perform
 */

export type UserRole = "none" | "proposer" | "board_member";
