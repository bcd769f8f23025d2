/**
 * @stellar-compass/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * main.ts loads `.env` through dotenv before calling loadConfig().
 */

import { z } from "zod";
import { parsePriceOverrides } from "@stellar-compass/horizon";

// =============================================================================
// Schema
// =============================================================================

/** Empty strings count as unset, the way an empty line in .env reads. */
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Horizon
  STELLAR_NETWORK: z.enum(["mainnet", "testnet"]).default("mainnet"),
  HORIZON_URL: optionalString,
  HORIZON_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),

  // Analysis
  IDLE_THRESHOLD_DAYS: z.coerce.number().int().min(1).default(30),
  DEFAULT_RISK_TOLERANCE: z
    .enum(["conservative", "moderate", "aggressive"])
    .default("moderate"),
  PRICE_OVERRIDES: z.string().default(""),

  // Email (SMTP)
  SMTP_HOST: z.string().default("smtp.gmail.com"),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  EMAIL_ADDRESS: optionalString,
  EMAIL_PASSWORD: optionalString,
  USER_EMAIL: optionalString,

  // SMS (Twilio)
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,
  USER_PHONE: optionalString,

  // Agents
  AGENT_INTERVAL_MS: z.coerce.number().int().min(1000).default(300000),

  // HTTP
  CORS_ORIGINS: z.string().default("*"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// CORS Origins
// =============================================================================

/**
 * Parse CORS_ORIGINS ("*" or "https://a.example,https://b.example").
 */
export function parseCorsOrigins(raw: string): string | string[] {
  const origins = raw
    .split(",")
    .map((o) => o.trim())
    .filter((o) => o !== "");

  if (origins.length === 0 || origins.includes("*")) {
    return "*";
  }
  return origins;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 * @throws {Error} if PRICE_OVERRIDES is malformed
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const config = ConfigSchema.parse(env);
  parsePriceOverrides(config.PRICE_OVERRIDES);
  return config;
}
