/**
 * @consortium/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAddress, type Address } from "@consortium/types";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Shared account
  ACCOUNT_ADDRESS: z.string().min(1).default("multisig"),
  BOARD_MEMBERS: z.string().min(1),
  QUORUM: z.coerce.number().int().min(1),
  PROPOSERS: z.string().default(""),
  INITIAL_BALANCE: z
    .string()
    .regex(/^\d+$/, "INITIAL_BALANCE must be a non-negative integer")
    .default("0"),

  // Auth
  API_KEYS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// List Parsing
// =============================================================================

/**
 * Parse a comma-separated address list.
 *
 * Format: "addr1,addr2,addr3"
 */
export function parseAddressList(raw: string): readonly Address[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const address = entry.trim();
    if (address === "") {
      throw new Error(`Empty entry in address list "${raw}"`);
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${address}"`);
    }
    return address;
  });
}

export interface ParsedApiKey {
  readonly key: string;
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into key → caller address records.
 *
 * Format: "key1:address1,key2:address2". The address may itself
 * contain ":"; the key ends at the first one.
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    const separator = trimmed.indexOf(":");
    if (separator === -1) {
      throw new Error(
        `Invalid API_KEYS entry: "${trimmed}". Expected format: key:address`,
      );
    }

    const key = trimmed.slice(0, separator);
    const address = trimmed.slice(separator + 1);

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key "${key}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, address });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
