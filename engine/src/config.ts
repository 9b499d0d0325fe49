// engine/src/config.ts
import dotenv from "dotenv";

export type ProfileStoreKind = "file" | "pg";

export interface Config {
  botToken: string;
  openaiApiKey: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  questionMaxOutputTokens: number;
  generationTimeoutMs: number;
  generationAttempts: number;
  retryDelayMs: number;
  rateLimitWindowSec: number;
  profileStore: ProfileStoreKind;
  dataDir: string;
  databaseUrl: string | null;
  port: number;
  webhookUrl: string | null;
  webhookPath: string;
  /** Sent by Telegram in X-Telegram-Bot-Api-Secret-Token on every webhook call. */
  webhookSecret: string | null;
  nodeEnv: "development" | "production" | "test";
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  const v = raw != null && raw.trim() !== "" ? Number(raw) : NaN;
  if (!Number.isFinite(v)) return fallback;
  return Math.max(min, Math.min(max, Math.trunc(v)));
}

function readFloat(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  const v = raw != null && raw.trim() !== "" ? Number(raw) : NaN;
  if (!Number.isFinite(v)) return fallback;
  return Math.max(min, Math.min(max, v));
}

function readNodeEnv(raw: string | undefined): Config["nodeEnv"] {
  if (raw === "production" || raw === "test") return raw;
  return "development";
}

export function validateEnv(env: Env): Config {
  const required = ["BOT_TOKEN", "OPENAI_API_KEY"];
  const profileStore: ProfileStoreKind = env.PROFILE_STORE === "pg" ? "pg" : "file";
  if (profileStore === "pg") required.push("DATABASE_URL");

  const missing = required.filter((key) => !env[key]);
  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(", ")}`);
  }

  const webhookPath = (env.WEBHOOK_PATH || "/telegram/webhook").trim();
  const webhookSecret = (env.WEBHOOK_SECRET || "").trim() || null;
  if (webhookSecret && !/^[A-Za-z0-9_-]{1,256}$/.test(webhookSecret)) {
    throw new Error("WEBHOOK_SECRET must be 1-256 characters of A-Z, a-z, 0-9, _ and -");
  }

  return {
    botToken: String(env.BOT_TOKEN),
    openaiApiKey: String(env.OPENAI_API_KEY),
    model: (env.OPENAI_MODEL || "gpt-4o-mini").trim(),
    temperature: readFloat(env, "OPENAI_TEMPERATURE", 0.2, 0, 2),
    maxOutputTokens: readInt(env, "OPENAI_MAX_TOKENS", 2000, 64, 16_000),
    questionMaxOutputTokens: readInt(env, "QUESTION_MAX_TOKENS", 900, 64, 16_000),
    generationTimeoutMs: readInt(env, "GENERATION_TIMEOUT_MS", 60_000, 1_000, 600_000),
    generationAttempts: readInt(env, "GENERATION_RETRIES", 2, 1, 5),
    retryDelayMs: readInt(env, "GENERATION_RETRY_DELAY_MS", 2_000, 0, 60_000),
    rateLimitWindowSec: readInt(env, "RATE_LIMIT_WINDOW_SEC", 30, 0, 24 * 3600),
    profileStore,
    dataDir: env.DATA_DIR || "data/users",
    databaseUrl: env.DATABASE_URL || null,
    port: readInt(env, "PORT", 8080, 0, 65_535),
    webhookUrl: env.WEBHOOK_URL ? env.WEBHOOK_URL.replace(/\/+$/, "") : null,
    webhookPath: webhookPath.startsWith("/") ? webhookPath : `/${webhookPath}`,
    webhookSecret,
    nodeEnv: readNodeEnv(env.NODE_ENV),
  };
}

/** Reads `.env` into process.env and validates it. */
export function loadConfig(): Config {
  dotenv.config();
  return validateEnv(process.env);
}
