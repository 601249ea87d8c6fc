import "dotenv/config";
import { z } from "zod";
import { LOG_LEVELS, setLogLevel } from "./logger.js";

const booleanFlag = z
  .string()
  .default("false")
  .transform((v) => ["true", "1", "yes"].includes(v.toLowerCase()));

/** Validate & normalize environment variables */
const EnvSchema = z.object({
  ALPHA_VANTAGE_KEY: z.string().optional(),
  OPENWEATHER_KEY: z.string().optional(),
  LLM_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default("https://api.groq.com/openai/v1"),
  GATE_MODEL: z.string().default("llama-3.3-70b-versatile"),
  ANALYST_MODEL: z.string().default("openai/gpt-oss-120b"),
  LLM_MIN_INTERVAL_MS: z.coerce.number().int().min(0).default(2500),
  MARKET_MIN_INTERVAL_MS: z.coerce.number().int().min(0).default(12000),
  NEWS_MAX_RESULTS: z.coerce.number().int().positive().default(10),
  DISCORD_BOT_TOKEN: z.string().optional(),
  DISCORD_CHANNEL_ID: z.string().optional(),
  DB_PATH: z.string().default("./data/risk.db"),
  COMPANIES_PATH: z.string().default("./config/companies.json"),
  STATUS_PATH: z.string().default("./data/monitor_status.json"),
  MONITOR_INTERVAL_MINUTES: z.coerce.number().positive().default(60),
  DEDUP_WINDOW_HOURS: z.coerce.number().positive().default(24),
  DRY_RUN: booleanFlag,
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
});

export type Config = z.infer<typeof EnvSchema>;

/** Parse an environment map; empty strings count as unset. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Config {
  const cleaned: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") cleaned[k] = v.trim();
  }
  return EnvSchema.parse(cleaned);
}

export const cfg: Config = loadConfig();
setLogLevel(cfg.LOG_LEVEL);
