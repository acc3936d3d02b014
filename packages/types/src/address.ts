/**
 * Address Types
 *
 * Identities on the host ledger. An address is opaque to the engine:
 * two addresses are the same identity only if they are byte-identical.
 */

/**
 * Account or contract address (e.g., "erd1qqq...", or a 64-char hex id).
 */
export type Address = string;

/**
 * Native token amount in the smallest denomination.
 */
export type Amount = bigint;

/**
 * Hex-encoded byte string (lowercase, even length, no 0x prefix).
 * Used for call and constructor arguments.
 */
export type HexBytes = string;
