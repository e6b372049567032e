/**
 * @rebasekit/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { LedgerServiceOptions } from "./services/ledger-service.js";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Rounding strategies
  SUPPLY_CHANGE_STRATEGY: z.enum(["derived", "trusted"]).default("derived"),
  TRANSFER_ROUNDING: z.enum(["derived", "independent"]).default("derived"),
  BURN_POLICY: z.enum(["strict", "naive"]).default("strict"),
  ROUNDING_ERROR_TRACKING: booleanFlag.default("false"),

  // Ledger
  INITIAL_CREDITS_PER_TOKEN: z
    .string()
    .regex(/^[1-9]\d*$/, "Must be a positive base-10 integer")
    .transform((v) => BigInt(v))
    .default("1000000000000000000"),

  // Persistence
  JOURNAL_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

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

/**
 * Ledger construction options derived from config.
 * The journal and logger are wired separately by the entry point.
 */
export function ledgerServiceOptions(
  config: AppConfig,
): Pick<LedgerServiceOptions, "ledger" | "trackRoundingErrors"> {
  return {
    ledger: {
      strategies: {
        supplyChange: config.SUPPLY_CHANGE_STRATEGY,
        transferRounding: config.TRANSFER_ROUNDING,
        burnPolicy: config.BURN_POLICY,
      },
      initialCreditsPerToken: config.INITIAL_CREDITS_PER_TOKEN,
    },
    trackRoundingErrors: config.ROUNDING_ERROR_TRACKING,
  };
}
