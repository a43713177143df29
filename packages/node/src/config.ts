/**
 * @redpacket/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { parseBalance } from "@redpacket/ledger";
import type { AccountId, Balance } from "@redpacket/types";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Chain
  BLOCK_TIME_MS: z.coerce.number().int().min(1).default(6000),
  GENESIS_TIME: z.string().datetime({ offset: true }).optional(),
  EXISTENTIAL_DEPOSIT: z.string().regex(/^\d+$/, "must be a decimal integer").default("0"),
  GENESIS_BALANCES: z.string().default(""),

  // Packets
  UNKNOWN_PACKET_POLICY: z.enum(["reject", "default"]).default("reject"),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly account: AccountId;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:account1,key2:account2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  return parsePairs(raw, "API_KEYS", "key:account").map(([key, account]) => {
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (account === "") {
      throw new Error("Account cannot be empty in API_KEYS");
    }
    return { key, account };
  });
}

// =============================================================================
// Genesis Balances
// =============================================================================

export interface GenesisBalance {
  readonly account: AccountId;
  readonly amount: Balance;
}

/**
 * Parse the GENESIS_BALANCES env var.
 *
 * Format: "alice:1000,bob:250"
 */
export function parseGenesisBalances(raw: string): readonly GenesisBalance[] {
  return parsePairs(raw, "GENESIS_BALANCES", "account:amount").map(([account, amount]) => {
    if (account === "") {
      throw new Error("Account cannot be empty in GENESIS_BALANCES");
    }
    if (!/^\d+$/.test(amount)) {
      throw new Error(`Invalid amount "${amount}" for "${account}" in GENESIS_BALANCES`);
    }
    return { account, amount: parseBalance(amount) };
  });
}

function parsePairs(raw: string, name: string, format: string): [string, string][] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const parts = entry.trim().split(":");
    const [first, second] = parts;
    if (parts.length !== 2 || first === undefined || second === undefined) {
      throw new Error(
        `Invalid ${name} entry: "${entry.trim()}". Expected format: ${format}`,
      );
    }
    return [first, second];
  });
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
