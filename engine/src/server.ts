// engine/src/server.ts
import express from "express";
import type { NextFunction, Request, Response } from "express";
import { asyncHandler, errorHandler } from "./middleware/errorHandler.js";

export type WebhookHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Health probe plus, in webhook mode, the chat platform's update callback. */
export function createHttpApp(opts?: { webhook?: { path: string; handler: WebhookHandler } }) {
  const app = express();

  app.use(express.json({ limit: "2mb" }));

  // fast health/ping, touches no storage
  app.get("/health", (_req, res) => res.json({ ok: true }));

  const webhook = opts?.webhook;
  if (webhook) {
    app.post(
      webhook.path,
      asyncHandler(async (req, res, next) => {
        await webhook.handler(req, res, next);
      })
    );
  }

  // error handler
  app.use(errorHandler);
  return app;
}
