import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  // Defaults applied when a caller does not pass its own values
  KEYWORDS_MAX_SIZE: z.string().optional(),
  KEYWORDS_LIMIT: z.string().optional(),
  KEYWORDS_INCLUDE_TARGET: z.string().optional(),
  KEYWORDS_WINDOWING: z.enum(["chunk", "fixed", "flexible"]).default("chunk"),
  // Path to a JSON array or newline-separated word list
  KEYWORDS_STOPWORDS_FILE: z.string().optional(),
  MAX_BODY_SIZE: z.string().optional(),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment variables: ${parsed.error.message}`);
}

const env = parsed.data;

function toPort(val: string | undefined, fallback: number): number {
  const parsedPort = parseInt(val ?? "", 10);
  return Number.isFinite(parsedPort) ? parsedPort : fallback;
}

function toFlag(val: string | undefined): boolean {
  return ["1", "true", "yes"].includes((val ?? "").toLowerCase());
}

export const KEYWORD_BOUNDS = {
  MAX_SIZE_MIN: 1,
  MAX_SIZE_MAX: 10,
  LIMIT_MIN: 1,
  LIMIT_MAX: 100,
} as const;

function parseBoundedInt(
  val: string | undefined,
  {
    defaultValue,
    min,
    max,
    name,
  }: { defaultValue: number; min: number; max: number; name: string }
): number {
  const raw = parseInt(val ?? "", 10);
  if (!Number.isFinite(raw)) return defaultValue;
  if (raw < min) {
    console.warn(`${name} too low (${raw}). Clamping to minimum ${min}.`);
    return min;
  }
  if (raw > max) {
    console.warn(`${name} too high (${raw}). Clamping to maximum ${max}.`);
    return max;
  }
  return raw;
}

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === "development",
  port: toPort(env.PORT, 5000),
  logLevel: env.LOG_LEVEL ?? "info",
  keywords: {
    maxKeywordSize: parseBoundedInt(env.KEYWORDS_MAX_SIZE, {
      defaultValue: 3,
      min: KEYWORD_BOUNDS.MAX_SIZE_MIN,
      max: KEYWORD_BOUNDS.MAX_SIZE_MAX,
      name: "KEYWORDS_MAX_SIZE",
    }),
    limit: parseBoundedInt(env.KEYWORDS_LIMIT, {
      defaultValue: 10,
      min: KEYWORD_BOUNDS.LIMIT_MIN,
      max: KEYWORD_BOUNDS.LIMIT_MAX,
      name: "KEYWORDS_LIMIT",
    }),
    includeTarget: toFlag(env.KEYWORDS_INCLUDE_TARGET),
    windowing: env.KEYWORDS_WINDOWING,
    stopwordsFile: env.KEYWORDS_STOPWORDS_FILE,
  },
  maxBodySize: env.MAX_BODY_SIZE ?? "1mb",
} as const;
