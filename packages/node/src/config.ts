/**
 * @ledgerlens/node — Configuration.
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

  // Analysis defaults
  RATIO_LEVEL: z.string().trim().min(1).default("basic"),
  RATIO_DECIMALS: z.coerce.number().int().min(0).max(10).default(2),

  // Request limits
  MAX_ENTRIES: z.coerce.number().int().min(1).default(100_000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * The part of the configuration the routes read.
 */
export interface AnalysisSettings {
  readonly ratioLevel: string;
  readonly ratioDecimals: number;
  readonly maxEntries: number;
}

export const DEFAULT_SETTINGS: AnalysisSettings = {
  ratioLevel: "basic",
  ratioDecimals: 2,
  maxEntries: 100_000,
};

export function settingsFromConfig(config: AppConfig): AnalysisSettings {
  return {
    ratioLevel: config.RATIO_LEVEL,
    ratioDecimals: config.RATIO_DECIMALS,
    maxEntries: config.MAX_ENTRIES,
  };
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
