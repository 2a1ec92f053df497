/**
 * @cashout/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Hex } from "viem";

// =============================================================================
// Schema
// =============================================================================

const PrivateKeySchema = z.custom<Hex>(
  (value) => typeof value === "string" && /^0x[0-9a-fA-F]{64}$/.test(value),
  { message: "PRIVATE_KEY must be 0x followed by 64 hex characters" },
);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Ledger
  RPC_URL: z.string().url(),
  CHAIN_ID: z.coerce.number().int().positive().default(1),
  PRIVATE_KEY: PrivateKeySchema,
  RPC_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  /** 0 waits for a receipt indefinitely */
  RECEIPT_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),

  // Persistence
  STATE_FILE: z.string().min(1).default("./data/state.jsonl"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

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
