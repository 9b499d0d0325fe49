// bot/index.ts
import type { Server } from "node:http";
import { Telegraf } from "telegraf";
import { callbackQuery, message } from "telegraf/filters";
import { loadConfig } from "../engine/src/config.js";
import { formatError } from "../engine/src/errors.js";
import { createEngine } from "../engine/src/index.js";
import { shortId } from "../engine/src/log.js";
import { createHttpApp } from "../engine/src/server.js";
import type { InboundEvent } from "../engine/src/types.js";
import { callbackChatId, deliver, selectionEvent, textEvent } from "./telegram.js";

async function main() {
  const config = loadConfig();
  const bot = new Telegraf(config.botToken);

  const handle = await createEngine(config, {
    notify: async (msg) => {
      await deliver(bot.telegram, msg);
      await bot.telegram.sendChatAction(msg.userId, "typing");
    },
  });

  // engine calls may wait on the model for a minute; updates are not held up by them
  const dispatchEvent = (event: InboundEvent) => {
    handle.engine
      .handle(event)
      .then(async (out) => {
        for (const msg of out) await deliver(bot.telegram, msg);
      })
      .catch((err: unknown) => console.error(`[Bot] event for ${shortId(event.userId)} failed:`, formatError(err)));
  };

  bot.on(message("text"), (ctx) => {
    dispatchEvent(textEvent(String(ctx.message.chat.id), ctx.message.text));
  });

  bot.on(callbackQuery("data"), async (ctx) => {
    await ctx.answerCbQuery().catch((err: unknown) => console.warn("[Bot] answerCbQuery failed:", formatError(err)));
    dispatchEvent(selectionEvent(callbackChatId(ctx.callbackQuery), ctx.callbackQuery.data));
  });

  bot.catch((err, ctx) => {
    console.error(`[Bot] update ${ctx.update.update_id} failed:`, formatError(err));
  });

  let server: Server;
  const polling = !config.webhookUrl;
  if (config.webhookUrl) {
    const secret = config.webhookSecret ?? undefined;
    const app = createHttpApp({
      webhook: { path: config.webhookPath, handler: bot.webhookCallback(config.webhookPath, { secretToken: secret }) },
    });
    server = app.listen(config.port, () => console.log(`[Bot] webhook server on :${config.port}${config.webhookPath}`));
    if (!secret) console.warn("[Bot] WEBHOOK_SECRET is not set; webhook requests are not authenticated");
    await bot.telegram.setWebhook(`${config.webhookUrl}${config.webhookPath}`, { secret_token: secret });
  } else {
    server = createHttpApp().listen(config.port, () => console.log(`[Bot] health server on :${config.port}`));
    await bot.telegram.deleteWebhook();
    bot
      .launch(() => console.log("[Bot] long polling started"))
      .catch((err: unknown) => {
        console.error("[Bot] polling stopped with error:", formatError(err));
        process.exitCode = 1;
      });
  }

  const shutdown = (signal: string) => {
    console.log(`[Bot] ${signal} received, stopping`);
    if (polling) bot.stop(signal);
    server.close();
    handle.close().catch((err: unknown) => console.error("[Bot] close failed:", formatError(err)));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("[Bot] failed to start:", formatError(err));
  process.exit(1);
});
