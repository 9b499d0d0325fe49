// engine/src/generationClient.ts
// Single remote call with timeout, bounded retry and failure classification.

import OpenAI from "openai";
import { formatError } from "./errors.js";
import { debugLog } from "./log.js";
import { AppError } from "./middleware/errorHandler.js";
import type { Prompt } from "./promptBuilder.js";

export type GenerationErrorKind = "Timeout" | "AuthFailure" | "TransientError" | "MalformedResponse";

export type GenerationResult =
  | { ok: true; text: string; attempts: number }
  | { ok: false; kind: GenerationErrorKind; attempts: number; message: string };

export interface GenerationClient {
  generate(prompt: Prompt, opts: { timeoutMs: number }): Promise<GenerationResult>;
}

/** Raw completion call; returns the text or null when the model returned nothing usable. */
export type CompletionTransport = (prompt: Prompt, signal: AbortSignal) => Promise<string | null>;

export class GenerationTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super(`Generation timed out after ${timeoutMs}ms`, 504, { code: "generation_timeout" });
  }
}

// network-level failures worth another attempt
const TRANSIENT_PATTERNS = ["econnreset", "econnrefused", "socket hang up", "overloaded", "too many requests", "fetch failed"];

function statusOf(err: unknown): number | null {
  if (err instanceof OpenAI.APIError) return typeof err.status === "number" ? err.status : null;
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") return err.status;
  return null;
}

export function classifyGenerationError(err: unknown): { kind: GenerationErrorKind; retryable: boolean } {
  if (err instanceof GenerationTimeoutError || err instanceof OpenAI.APIConnectionTimeoutError) {
    return { kind: "Timeout", retryable: false };
  }
  if (err instanceof OpenAI.AuthenticationError || err instanceof OpenAI.PermissionDeniedError) {
    return { kind: "AuthFailure", retryable: false };
  }
  if (err instanceof OpenAI.APIConnectionError) return { kind: "TransientError", retryable: true };

  const status = statusOf(err);
  if (status === 401 || status === 403) return { kind: "AuthFailure", retryable: false };
  if (status != null) {
    const retryable = status === 408 || status === 409 || status === 429 || status >= 500;
    return { kind: "TransientError", retryable };
  }

  const msg = formatError(err).toLowerCase();
  if (msg.includes("etimedout") || msg.includes("timed out")) return { kind: "Timeout", retryable: false };
  return { kind: "TransientError", retryable: TRANSIENT_PATTERNS.some((p) => msg.includes(p)) };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RetryingGenerationClient implements GenerationClient {
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly transport: CompletionTransport,
    opts: { attempts: number; retryDelayMs: number; sleep?: (ms: number) => Promise<void> }
  ) {
    this.attempts = Math.max(1, Math.trunc(opts.attempts));
    this.retryDelayMs = Math.max(0, opts.retryDelayMs);
    this.sleep = opts.sleep ?? sleep;
  }

  async generate(prompt: Prompt, opts: { timeoutMs: number }): Promise<GenerationResult> {
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      const t0 = Date.now();
      try {
        const text = (await this.callWithTimeout(prompt, opts.timeoutMs))?.trim() ?? "";
        if (!text) {
          console.warn(`[Generation] empty completion on attempt ${attempt}`);
          return { ok: false, kind: "MalformedResponse", attempts: attempt, message: "empty completion" };
        }
        debugLog("Generation", `ok in ${Date.now() - t0}ms, attempt ${attempt}, ${text.length} chars`);
        return { ok: true, text, attempts: attempt };
      } catch (err) {
        const { kind, retryable } = classifyGenerationError(err);
        const message = formatError(err);
        if (kind === "AuthFailure") {
          console.error("[ALERT][Generation] model credentials rejected, check OPENAI_API_KEY:", message);
        } else {
          console.warn(`[Generation] attempt ${attempt}/${this.attempts} failed (${kind}) after ${Date.now() - t0}ms:`, message);
        }
        if (!retryable || attempt === this.attempts) {
          return { ok: false, kind, attempts: attempt, message };
        }
        await this.sleep(this.retryDelayMs * attempt);
      }
    }
    return { ok: false, kind: "TransientError", attempts: this.attempts, message: "no attempts made" };
  }

  private async callWithTimeout(prompt: Prompt, timeoutMs: number): Promise<string | null> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new GenerationTimeoutError(timeoutMs));
      }, timeoutMs);
    });
    try {
      return await Promise.race([this.transport(prompt, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function getErrorText(err: unknown): string {
  return formatError(err).toLowerCase();
}

function isUnsupportedTemperatureError(err: unknown): boolean {
  const msg = getErrorText(err);
  // some models reject the parameter or only allow the default value
  return (
    statusOf(err) === 400 &&
    msg.includes("temperature") &&
    (msg.includes("unsupported parameter") || msg.includes("unsupported value") || msg.includes("only the default"))
  );
}

/** The part of `openai.chat.completions` the transport calls. */
export interface ChatCompletions {
  create(
    params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; maxRetries?: number }
  ): Promise<OpenAI.Chat.ChatCompletion>;
}

/** Chat Completions transport; the SDK's own retries are off, RetryingGenerationClient owns them. */
export function createOpenAITransport(opts: {
  completions?: ChatCompletions;
  apiKey: string;
  model: string;
}): CompletionTransport {
  const completions = opts.completions ?? new OpenAI({ apiKey: opts.apiKey, maxRetries: 0 }).chat.completions;
  const model = opts.model;

  return async (prompt, signal) => {
    const params = (withTemperature: boolean): OpenAI.Chat.ChatCompletionCreateParamsNonStreaming => ({
      model,
      ...(withTemperature ? { temperature: prompt.temperature } : {}),
      max_tokens: prompt.maxOutputTokens,
      messages: [
        { role: "system", content: prompt.instructions },
        { role: "user", content: prompt.input },
      ],
    });

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await completions.create(params(true), { signal, maxRetries: 0 });
    } catch (err) {
      if (!isUnsupportedTemperatureError(err)) throw err;
      debugLog("Generation", `model ${model} rejected temperature, retrying without it`);
      completion = await completions.create(params(false), { signal, maxRetries: 0 });
    }
    debugLog(
      "Generation",
      `model=${model} prompt=${completion.usage?.prompt_tokens ?? "?"} completion=${completion.usage?.completion_tokens ?? "?"}`
    );
    const content = completion.choices[0]?.message?.content;
    return typeof content === "string" ? content : null;
  };
}
