// bot/telegram.ts
// Mapping between Telegram updates and engine events/messages.

import { Markup, TelegramError } from "telegraf";
import type { InlineKeyboardMarkup } from "telegraf/types";
import { formatError } from "../engine/src/errors.js";
import { shortId } from "../engine/src/log.js";
import type { InboundEvent, MenuOption, OutboundMessage } from "../engine/src/types.js";

export const TELEGRAM_TEXT_LIMIT = 4096;

export type SendExtra = { parse_mode?: "Markdown"; reply_markup?: InlineKeyboardMarkup };

/** The slice of the Telegram API the adapter needs; bot.telegram satisfies it. */
export interface MessageSender {
  sendMessage(chatId: string, text: string, extra?: SendExtra): Promise<unknown>;
}

export function textEvent(userId: string, text: string): InboundEvent {
  const t = text.trim();
  if (t.startsWith("/")) return { userId, kind: "command", payload: t.slice(1) };
  return { userId, kind: "text", payload: t };
}

/**
 * Profiles are keyed by chat id, the same key text messages use: a button press
 * counts for the chat the button was posted in, not for the user who pressed it.
 */
export function callbackChatId(query: { from: { id: number }; message?: { chat: { id: number } } }): string {
  return String(query.message?.chat.id ?? query.from.id);
}

export function selectionEvent(userId: string, data: string): InboundEvent {
  return { userId, kind: "menu_selection", payload: data };
}

export function inlineKeyboard(options: MenuOption[]): InlineKeyboardMarkup {
  return Markup.inlineKeyboard(options.map((o) => [Markup.button.callback(o.label, o.id)])).reply_markup;
}

/** Splits on line boundaries; a single over-long line is cut hard. */
export function splitMessage(text: string, limit = TELEGRAM_TEXT_LIMIT): string[] {
  if (text.length <= limit) return [text];
  const chunks: string[] = [];
  let current = "";
  for (const line of text.split("\n")) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }
    if (current) chunks.push(current);
    let rest = line;
    while (rest.length > limit) {
      chunks.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    current = rest;
  }
  if (current) chunks.push(current);
  return chunks;
}

function isMarkdownRejected(err: unknown): boolean {
  return err instanceof TelegramError && err.code === 400 && /parse entities|can't find end/i.test(err.description);
}

/** Sends one engine message; the keyboard goes on the last chunk. */
export async function deliver(sender: MessageSender, message: OutboundMessage): Promise<void> {
  const chunks = splitMessage(message.text);
  for (let i = 0; i < chunks.length; i++) {
    const isLast = i === chunks.length - 1;
    const reply_markup = isLast && message.options?.length ? inlineKeyboard(message.options) : undefined;
    if (!message.markdown) {
      await sender.sendMessage(message.userId, chunks[i], { reply_markup });
      continue;
    }
    try {
      await sender.sendMessage(message.userId, chunks[i], { parse_mode: "Markdown", reply_markup });
    } catch (err) {
      if (!isMarkdownRejected(err)) throw err;
      console.warn(`[Bot] Markdown rejected for ${shortId(message.userId)}, sending plain text:`, formatError(err));
      await sender.sendMessage(message.userId, chunks[i], { reply_markup });
    }
  }
}
