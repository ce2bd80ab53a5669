/**
 * @concord/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

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

  // Wallet
  WALLET_OWNERS: z.string().default(""),
  WALLET_ADDRESS: z.string().min(1).default("wallet"),
  WALLET_CURRENCY: z.string().min(1).default("USDC"),
  WALLET_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),
  WALLET_INITIAL_BALANCE: z.string().regex(/^\d+(\.\d+)?$/).default("0"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Owner Parsing
// =============================================================================

/**
 * Parse the WALLET_OWNERS env var into owner identities.
 *
 * Format: "alice,bob,carol,dave". Count and uniqueness are enforced by the
 * ledger itself.
 */
export function parseOwners(raw: string): readonly string[] {
  if (raw.trim() === "") {
    throw new Error("WALLET_OWNERS is required: a comma-separated list of owner identities");
  }

  return raw.split(",").map((entry, position) => {
    const owner = entry.trim();
    if (owner === "") {
      throw new Error(`Empty owner identity at position ${position + 1} in WALLET_OWNERS`);
    }
    return owner;
  });
}

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly ownerId: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:owner1,key2:owner2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length !== 2) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:ownerId`,
      );
    }

    const [key = "", ownerId = ""] = parts;

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (ownerId === "") {
      throw new Error("Owner ID cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error(`API key "${key}" is listed more than once`);
    }

    seen.add(key);
    keys.push({ key, ownerId });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
