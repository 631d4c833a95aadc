import { z } from "zod";
import type { LogLevel } from "./logging/logger.js";

const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const satisfies ReadonlyArray<LogLevel>;

const booleanText = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  JSON_MUTATOR_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  JSON_MUTATOR_RULES_PATH: z.string().min(1).optional(),
  JSON_MUTATOR_ALLOW_BARE_PATHS: booleanText.default("true"),
});

export interface EngineConfig {
  logLevel: LogLevel;
  /** rule file to load on startup, if any */
  rulesPath?: string;
  allowBarePaths: boolean;
}

/**
 * Read engine settings from environment variables. Throws with every
 * offending variable listed when a value is invalid.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const c = parsed.data;
  return {
    logLevel: c.JSON_MUTATOR_LOG_LEVEL,
    rulesPath: c.JSON_MUTATOR_RULES_PATH,
    allowBarePaths: c.JSON_MUTATOR_ALLOW_BARE_PATHS,
  };
}
