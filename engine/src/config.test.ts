import { validateEnv } from "./config.js";

const base = { BOT_TOKEN: "test-token", OPENAI_API_KEY: "test-secret" };

describe("validateEnv", () => {
  it("names every missing variable", () => {
    expect(() => validateEnv({})).toThrow("Missing required environment variables: BOT_TOKEN, OPENAI_API_KEY");
    expect(() => validateEnv({ ...base, PROFILE_STORE: "pg" })).toThrow(
      "Missing required environment variables: DATABASE_URL"
    );
  });

  it("fills defaults", () => {
    expect(validateEnv(base)).toEqual({
      botToken: "test-token",
      openaiApiKey: "test-secret",
      model: "gpt-4o-mini",
      temperature: 0.2,
      maxOutputTokens: 2000,
      questionMaxOutputTokens: 900,
      generationTimeoutMs: 60_000,
      generationAttempts: 2,
      retryDelayMs: 2_000,
      rateLimitWindowSec: 30,
      profileStore: "file",
      dataDir: "data/users",
      databaseUrl: null,
      port: 8080,
      webhookUrl: null,
      webhookPath: "/telegram/webhook",
      webhookSecret: null,
      nodeEnv: "development",
    });
  });

  it("clamps numbers and ignores garbage", () => {
    const c = validateEnv({ ...base, GENERATION_RETRIES: "9", RATE_LIMIT_WINDOW_SEC: "abc", OPENAI_TEMPERATURE: "-1" });
    expect(c.generationAttempts).toBe(5);
    expect(c.rateLimitWindowSec).toBe(30);
    expect(c.temperature).toBe(0);
  });

  it("normalizes webhook settings", () => {
    const c = validateEnv({ ...base, WEBHOOK_URL: "https://bot.example.com/", WEBHOOK_PATH: "hook" });
    expect(c.webhookUrl).toBe("https://bot.example.com");
    expect(c.webhookPath).toBe("/hook");
  });

  it("reads the webhook secret token", () => {
    expect(validateEnv({ ...base, WEBHOOK_SECRET: " test-secret " }).webhookSecret).toBe("test-secret");
    expect(validateEnv({ ...base, WEBHOOK_SECRET: "" }).webhookSecret).toBeNull();
    expect(() => validateEnv({ ...base, WEBHOOK_SECRET: "not allowed!" })).toThrow(
      "WEBHOOK_SECRET must be 1-256 characters of A-Z, a-z, 0-9, _ and -"
    );
  });

  it("selects the postgres store", () => {
    const c = validateEnv({ ...base, PROFILE_STORE: "pg", DATABASE_URL: "postgres://localhost/test", NODE_ENV: "test" });
    expect(c).toMatchObject({ profileStore: "pg", databaseUrl: "postgres://localhost/test", nodeEnv: "test" });
  });
});
