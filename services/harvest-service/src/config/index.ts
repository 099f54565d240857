import fs from "fs";
import { z } from "zod";
import { logger } from "../logger";

// -------------------------------------------------
// Environment schema
// -------------------------------------------------
const booleanFlag = z
  .enum(["true", "false"])
  .default("true")
  .transform((value) => value === "true");

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),

  VALKEY_HOST: z.string().min(1).default("127.0.0.1"),
  VALKEY_PORT: z.coerce.number().int().positive().default(6379),
  VALKEY_PASSWORD: z.string().optional(),
  VALKEY_PASSWORD_FILE: z.string().optional(),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),

  KEYWORDS_FILE: z.string().min(1).default("config/keywords.json"),
  KEYWORD_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(5 * 60_000),

  RECENCY_WINDOW_DAYS: z.coerce.number().int().min(1).max(30).default(2),
  KEYWORD_DELAY_MS: z.coerce.number().int().nonnegative().default(5_000),
  WRITE_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  RELEVANCE_FILTER_ENABLED: booleanFlag,

  HARVEST_INTERVAL_MINUTES: z.coerce.number().positive().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

/**
 * Reads a secret given either literally or as a Docker secrets path.
 * Returns undefined when the variable is unset.
 */
export function resolveSecret(value: string | undefined): string | undefined {
  if (!value) return undefined;

  if (value.startsWith("/run/secrets/")) {
    return fs.readFileSync(value, "utf8").trim();
  }
  return value.trim() || undefined;
}

export function resolveValkeyPassword(env: Env): string | undefined {
  if (env.VALKEY_PASSWORD) {
    return env.VALKEY_PASSWORD;
  }

  if (env.VALKEY_PASSWORD_FILE) {
    try {
      return fs.readFileSync(env.VALKEY_PASSWORD_FILE, "utf8").trim();
    } catch (err) {
      logger.warn({ err }, "Failed to read Valkey password from secret file");
    }
  }
  return undefined;
}
