import { config as loadDotenv } from "dotenv";
import { z } from "zod";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const positiveInt = (fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => {
      const n = parseInt(v, 10);
      return Number.isFinite(n) && n > 0 ? n : fallback;
    });

const schema = z.object({
  PROFILE_URL: z.string().url(),
  SITE_ORIGIN: z.string().url().optional(),
  NOTIFY_ENDPOINT: z.string().url().default("https://api.line.me/v2/bot/message/push"),
  NOTIFY_CHANNEL_TOKEN: optionalString,
  NOTIFY_RECIPIENT_ID: optionalString,
  NOTIFY_HEADER: z.string().default("New post"),
  CURSOR_PATH: z.string().default("./data/last_post_id.txt"),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  FETCH_TIMEOUT_MS: positiveInt(15000),
  SEND_TIMEOUT_MS: positiveInt(20000),
  CRON_SCHEDULE: optionalString,
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type AppConfig = Omit<z.infer<typeof schema>, "SITE_ORIGIN"> & { SITE_ORIGIN: string };

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join(", ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    // Keys and messages only, never values
    throw new ConfigError(parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`));
  }
  const data = parsed.data;
  return { ...data, SITE_ORIGIN: new URL(data.SITE_ORIGIN ?? data.PROFILE_URL).origin };
}

/** Reads `.env` into `process.env` (existing variables win) and validates it. */
export function loadConfigFromEnvironment(): AppConfig {
  loadDotenv();
  return loadConfig(process.env);
}
