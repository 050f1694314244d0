/**
 * @peerpay/demo — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Walkthrough pacing
  DEMO_STEP_DELAY_MS: z.coerce.number().int().min(0).default(0),

  // Terminal output
  DEMO_COLOR: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("true"),
});

export type DemoConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): DemoConfig {
  return ConfigSchema.parse(env);
}
