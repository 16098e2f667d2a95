import { z } from "zod";

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  APP_ORIGIN: z.string().url().optional(),

  // Persistence
  JOURNAL_DIR: z.string().min(1).default("./data"),
  STATS_FILE: z.string().min(1).default("./data/emotional_stats.json"),
  JOURNAL_TZ: z.string().min(1).default("UTC"),

  // Trade-data provider
  HYPERLIQUID_API_URL: z.string().url().default("https://api.hyperliquid.xyz"),
  PROVIDER_TIMEOUT_MS: z.coerce.number().min(500).max(60000).default(10000),
  PROVIDER_REQUEST_GAP_MS: z.coerce.number().min(0).max(5000).default(500),
  FILL_LIMIT: z.coerce.number().int().min(1).max(2000).default(10),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment variables: ${details}`);
  }

  return result.data;
}
