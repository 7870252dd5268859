import os from "os";
import path from "path";
import { z } from "zod";
import { DEFAULT_MAX_DURATION_MINUTES, DEFAULT_MIN_DURATION_MINUTES } from "./trip-filters";
import { defaultCleanedDataDir, defaultRawDataDir } from "./utils";

// =============================================================================
// Cities
// =============================================================================

export const DEFAULT_CITIES = ["NYC", "Chicago", "Boston", "Capital"] as const;

export const DEFAULT_MONTH = "202409";

// =============================================================================
// Environment
// =============================================================================

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  BIKESHARE_RAW_DATA_DIR: z.string().min(1).default(defaultRawDataDir),
  BIKESHARE_CLEANED_DATA_DIR: z.string().min(1).default(defaultCleanedDataDir),
  BIKESHARE_MONTH: z
    .string()
    .regex(/^\d{4}(0[1-9]|1[0-2])$/, "must be YYYYMM")
    .default(DEFAULT_MONTH),
  BIKESHARE_CITIES: z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((city) => city.trim())
        .filter((city) => city.length > 0)
    )
    .pipe(z.array(z.string()).min(1, "must name at least one city"))
    .default(DEFAULT_CITIES.join(",")),
  BIKESHARE_MIN_TRIP_MINUTES: z.coerce.number().nonnegative().default(DEFAULT_MIN_DURATION_MINUTES),
  BIKESHARE_MAX_TRIP_MINUTES: z.coerce.number().positive().default(DEFAULT_MAX_DURATION_MINUTES),
  BIKESHARE_STRICT_VALIDATION: booleanFlag.default("false"),
  BIKESHARE_CONCURRENCY: z.coerce.number().int().positive().default(os.cpus().length),
});

export type PipelineConfig = {
  rawDataDir: string;
  cleanedDataDir: string;
  month: string;
  cities: string[];
  minDurationMinutes: number;
  maxDurationMinutes: number;
  strictValidation: boolean;
  concurrency: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
  }

  const parsed = result.data;
  if (parsed.BIKESHARE_MIN_TRIP_MINUTES > parsed.BIKESHARE_MAX_TRIP_MINUTES) {
    throw new Error(
      `Invalid configuration:\n  - BIKESHARE_MIN_TRIP_MINUTES (${parsed.BIKESHARE_MIN_TRIP_MINUTES}) exceeds BIKESHARE_MAX_TRIP_MINUTES (${parsed.BIKESHARE_MAX_TRIP_MINUTES})`
    );
  }

  return {
    rawDataDir: path.resolve(parsed.BIKESHARE_RAW_DATA_DIR),
    cleanedDataDir: path.resolve(parsed.BIKESHARE_CLEANED_DATA_DIR),
    month: parsed.BIKESHARE_MONTH,
    cities: parsed.BIKESHARE_CITIES,
    minDurationMinutes: parsed.BIKESHARE_MIN_TRIP_MINUTES,
    maxDurationMinutes: parsed.BIKESHARE_MAX_TRIP_MINUTES,
    strictValidation: parsed.BIKESHARE_STRICT_VALIDATION,
    concurrency: parsed.BIKESHARE_CONCURRENCY,
  };
}
