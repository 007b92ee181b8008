/**
 * @consolidator/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * and turns the report settings into engine options.
 */

import { z } from "zod";
import { DEFAULT_MAX_PERIODS } from "@consolidator/report";
import type { ReportOptions } from "@consolidator/report";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

/** Comma-separated list; blank entries dropped */
const labelList = z
  .string()
  .transform((v) =>
    v
      .split(",")
      .map((label) => label.trim())
      .filter((label) => label !== ""),
  );

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Storage: JSON state file; in-memory when unset
  DATA_FILE: z.string().min(1).optional(),

  // Reports
  PL_BUDGET_PARALLEL: booleanFlag.default("false"),
  PL_RUNNING_TOTALS: booleanFlag.default("false"),
  GROSS_PROFIT_AFTER: z.string().trim().min(1).optional(),
  SUB_CATEGORY_ORDER: labelList.optional(),
  MAX_REPORT_PERIODS: z.coerce.number().int().min(1).default(DEFAULT_MAX_PERIODS),
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
 * Engine options from configuration. GROSS_PROFIT_AFTER names the
 * expense sub-category, compared case-insensitively.
 */
export function reportOptionsFromConfig(
  config: AppConfig,
): Omit<ReportOptions, "includeDebugInfo"> {
  const grossProfitLabel = config.GROSS_PROFIT_AFTER?.toUpperCase();
  return {
    dualStream: config.PL_BUDGET_PARALLEL,
    runningTotals: config.PL_RUNNING_TOTALS,
    maxPeriods: config.MAX_REPORT_PERIODS,
    ...(config.SUB_CATEGORY_ORDER !== undefined && config.SUB_CATEGORY_ORDER.length > 0
      ? { subCategoryOrder: config.SUB_CATEGORY_ORDER }
      : {}),
    ...(grossProfitLabel !== undefined
      ? {
          grossProfitAfter: (subCategory: string) =>
            subCategory.trim().toUpperCase() === grossProfitLabel,
        }
      : {}),
  };
}
