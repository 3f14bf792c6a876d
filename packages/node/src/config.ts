/**
 * @socai/node - Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { COST_METHODS } from "@socai/ledger";

// =============================================================================
// Schema
// =============================================================================

/** Letters, digits, "_" and "-"; also the X-Company-Code header format. */
export const COMPANY_CODE_PATTERN = /^[A-Za-z0-9_-]{1,32}$/;

/** Environment flags arrive as strings; only "true" and "1" switch them on. */
const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Companies
  DEFAULT_COMPANY_CODE: z.string().regex(COMPANY_CODE_PATTERN).default("DEFAULT"),
  // Further companies served besides the default, comma-separated
  COMPANY_CODES: z
    .string()
    .transform((v) => v.split(",").map((code) => code.trim()).filter((code) => code !== ""))
    .pipe(z.array(z.string().regex(COMPANY_CODE_PATTERN)))
    .default(""),
  SEED_CHART_OF_ACCOUNTS: booleanFlag.default("true"),

  // Document numbering: PREFIX/YYYYMMDD/NNN
  VOUCHER_PREFIX: z.string().regex(/^[A-Z0-9]{1,8}$/).default("CT"),
  ENTRY_PREFIX: z.string().regex(/^[A-Z0-9]{1,8}$/).default("BT"),

  // Inventory
  DEFAULT_COST_METHOD: z.enum(COST_METHODS).default("FIFO"),
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
