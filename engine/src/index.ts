// engine/src/index.ts
// Wires configuration into a ready-to-use conversation engine.

import type { Config } from "./config.js";
import { ConversationEngine } from "./conversationEngine.js";
import { createPgPool } from "./db.js";
import {
  RetryingGenerationClient,
  createOpenAITransport,
  type CompletionTransport,
} from "./generationClient.js";
import { PgProfileStore } from "./pgProfileStore.js";
import { FileProfileStore, type ProfileStore } from "./profileStore.js";
import { PromptBuilder } from "./promptBuilder.js";
import { RateLimiter } from "./rateLimiter.js";
import type { OutboundMessage } from "./types.js";

export type EngineHandle = {
  engine: ConversationEngine;
  store: ProfileStore;
  close: () => Promise<void>;
};

/** Longest time one generate() call can take, retries and backoff included. */
export function generationBudgetMs(config: Pick<Config, "generationTimeoutMs" | "generationAttempts" | "retryDelayMs">) {
  const n = config.generationAttempts;
  return config.generationTimeoutMs * n + (config.retryDelayMs * n * (n - 1)) / 2;
}

export async function createEngine(
  config: Config,
  opts?: { notify?: (message: OutboundMessage) => Promise<void>; transport?: CompletionTransport }
): Promise<EngineHandle> {
  let store: ProfileStore;
  let close = async () => {};

  if (config.profileStore === "pg" && config.databaseUrl) {
    const pg = createPgPool(config.databaseUrl, { nodeEnv: config.nodeEnv });
    const pgStore = new PgProfileStore({ db: pg.client });
    await pgStore.ensureSchema();
    store = pgStore;
    close = pg.close;
  } else {
    store = new FileProfileStore({ dir: config.dataDir });
  }
  console.log(`[Engine] profile store: ${config.profileStore}${config.profileStore === "file" ? ` (${config.dataDir})` : ""}`);

  const transport = opts?.transport ?? createOpenAITransport({ apiKey: config.openaiApiKey, model: config.model });
  const client = new RetryingGenerationClient(transport, {
    attempts: config.generationAttempts,
    retryDelayMs: config.retryDelayMs,
  });

  const engine = new ConversationEngine({
    store,
    rateLimiter: new RateLimiter({ windowSec: config.rateLimitWindowSec, store }),
    promptBuilder: new PromptBuilder({
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
      questionMaxOutputTokens: config.questionMaxOutputTokens,
    }),
    client,
    timeoutMs: config.generationTimeoutMs,
    staleAfterMs: generationBudgetMs(config) + 30_000,
    notify: opts?.notify,
  });

  return { engine, store, close };
}
