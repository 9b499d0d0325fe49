// engine/src/conversationEngine.ts
// Per-user conversation state machine and the generation pipeline.

import { randomUUID } from "node:crypto";
import { CorruptProfileError, ValidationError, formatError } from "./errors.js";
import type { GenerationClient, GenerationErrorKind, GenerationResult } from "./generationClient.js";
import { KeyedMutex } from "./keyedMutex.js";
import { debugLog, shortId } from "./log.js";
import { AppError } from "./middleware/errorHandler.js";
import { sanitizeGeneratedText, withNamePrefix } from "./programText.js";
import { STYLE_CHOICES, type BuiltPrompt, type PromptBuilder, type PromptRequest } from "./promptBuilder.js";
import {
  applyParam,
  assertUserId,
  renderProgramHistory,
  resetQuestionnaire,
  type ProfileStore,
} from "./profileStore.js";
import {
  EDITABLE_FIELD_HINT,
  FIELD_DEFS,
  GOAL_CHOICES,
  MUSCLE_FOCUS_CHOICES,
  choiceOptions,
  formatFieldValue,
  matchChoice,
  nextStage,
  parseFieldAnswer,
  resolveFieldAlias,
} from "./questionnaire.js";
import type { RateLimiter } from "./rateLimiter.js";
import {
  type ActiveSession,
  type GeneratedProgram,
  type GenerationKind,
  type InboundEvent,
  type MenuOption,
  type MuscleFocus,
  type OutboundMessage,
  type ProfileParams,
  type QuestionnaireField,
  type SessionState,
  type UserProfile,
} from "./types.js";
import { annotateWithWeights } from "./weights.js";

// ----------------------------------------------------------------------------
// Menus
// ----------------------------------------------------------------------------

export const MAIN_MENU: MenuOption[] = [
  { id: "menu:program", label: "🏋️ Новая программа" },
  { id: "menu:question", label: "❓ Задать вопрос" },
  { id: "menu:profile", label: "👤 Мой профиль" },
  { id: "menu:history", label: "🗂 Мои программы" },
  { id: "menu:edit", label: "✏️ Изменить параметры" },
  { id: "menu:goal", label: "🎯 Сменить цель" },
  { id: "menu:restart", label: "🔄 Начать заново" },
];

const BACK_OPTION: MenuOption = { id: "menu:main", label: "↩️ Назад в меню" };

const FOCUS_OPTIONS: MenuOption[] = [...choiceOptions("focus", MUSCLE_FOCUS_CHOICES), BACK_OPTION];
const STYLE_OPTIONS: MenuOption[] = [...choiceOptions("style", STYLE_CHOICES), BACK_OPTION];
const GOAL_OPTIONS: MenuOption[] = [...choiceOptions("goal", GOAL_CHOICES), BACK_OPTION];

const HISTORY_LIMIT = 5;

const FAILURE_TEXT: Record<GenerationErrorKind, string> = {
  Timeout: "⌛ Сервис генерации не ответил вовремя. Попробуй ещё раз через минуту.",
  AuthFailure: "🔧 Сервис генерации сейчас недоступен. Мы уже разбираемся, попробуй позже.",
  TransientError: "⚠️ Не удалось связаться с сервисом генерации. Попробуй ещё раз чуть позже.",
  MalformedResponse: "🤔 Сервис вернул пустой ответ. Попробуй ещё раз или переформулируй запрос.",
};

const STORAGE_APOLOGY = "😔 Что-то пошло не так при сохранении данных. Попробуй ещё раз чуть позже.";

// ----------------------------------------------------------------------------
// Transition table
// ----------------------------------------------------------------------------

export type EngineAction =
  | { type: "restart"; purge: boolean }
  | { type: "show_menu" }
  | { type: "reprompt"; notice?: string }
  | { type: "answer"; field: QuestionnaireField; input: string }
  | { type: "begin_program" }
  | { type: "select_focus"; input: string }
  | { type: "select_style"; muscleFocus: MuscleFocus; input: string }
  | { type: "begin_question" }
  | { type: "ask"; question: string }
  | { type: "show_profile" }
  | { type: "show_history" }
  | { type: "show_program"; index: number }
  | { type: "edit_hint" }
  | { type: "set_param"; args: string }
  | { type: "goal_menu" }
  | { type: "set_goal"; input: string }
  | { type: "unknown_command"; name: string };

export function sessionStateOf(profile: UserProfile): SessionState {
  if (profile.questionnaireStage !== "complete") return { kind: "onboarding", stage: profile.questionnaireStage };
  return profile.session;
}

/** "/set weight 80" or "set@bot weight 80" → { name: "set", args: "weight 80" } */
export function parseCommand(payload: string): { name: string; args: string } {
  const m = payload.trim().replace(/^\//, "").match(/^(\S*)\s*([\s\S]*)$/);
  const head = m ? m[1] : "";
  return { name: head.split("@")[0].toLowerCase(), args: m ? m[2].trim() : "" };
}

const FINISH_CURRENT_STEP = "Сначала заверши текущий шаг или нажми /cancel.";

function resolveCommand(state: SessionState, name: string, args: string): EngineAction {
  switch (name) {
    case "restart":
      return { type: "restart", purge: args.toLowerCase() === "purge" };
    case "start":
    case "menu":
    case "cancel":
      return state.kind === "onboarding" ? { type: "reprompt" } : { type: "show_menu" };
    case "profile":
      return { type: "show_profile" };
    case "history":
      return { type: "show_history" };
    case "set":
      if (state.kind === "onboarding") return { type: "reprompt", notice: "Сначала заполни анкету до конца." };
      if (state.kind !== "ready") return { type: "reprompt", notice: FINISH_CURRENT_STEP };
      return args ? { type: "set_param", args } : { type: "edit_hint" };
    case "goal":
      if (state.kind === "onboarding") return { type: "reprompt", notice: "Сначала заполни анкету до конца." };
      if (state.kind !== "ready") return { type: "reprompt", notice: FINISH_CURRENT_STEP };
      return args ? { type: "set_goal", input: args } : { type: "goal_menu" };
    default:
      return { type: "unknown_command", name };
  }
}

function resolveReadySelection(id: string): EngineAction {
  switch (id) {
    case "menu:program":
      return { type: "begin_program" };
    case "menu:question":
      return { type: "begin_question" };
    case "menu:profile":
      return { type: "show_profile" };
    case "menu:history":
      return { type: "show_history" };
    case "menu:edit":
      return { type: "edit_hint" };
    case "menu:goal":
      return { type: "goal_menu" };
  }
  if (id.startsWith("goal:")) return { type: "set_goal", input: id };
  const program = id.match(/^program:(\d+)$/);
  if (program) return { type: "show_program", index: Number(program[1]) };
  // buttons from an older keyboard
  return { type: "show_menu" };
}

/**
 * Explicit transition table: which action an event triggers in a given state.
 * Pure; all effects live in the action handlers.
 */
export function resolveAction(state: SessionState, event: InboundEvent): EngineAction {
  const payload = event.payload.trim();

  if (event.kind === "command") {
    const { name, args } = parseCommand(payload);
    return resolveCommand(state, name, args);
  }
  if (event.kind === "menu_selection" && payload === "menu:restart") return { type: "restart", purge: false };
  if (event.kind === "menu_selection" && payload === "menu:main") {
    return state.kind === "onboarding" ? { type: "reprompt" } : { type: "show_menu" };
  }

  switch (state.kind) {
    case "onboarding":
      if (event.kind === "text") return { type: "answer", field: state.stage, input: payload };
      return payload.startsWith(`${state.stage}:`)
        ? { type: "answer", field: state.stage, input: payload }
        : { type: "reprompt" };
    case "ready":
      if (event.kind === "menu_selection") return resolveReadySelection(payload);
      return payload ? { type: "ask", question: payload } : { type: "show_menu" };
    case "awaiting_muscle_focus":
      if (event.kind === "text" || payload.startsWith("focus:")) return { type: "select_focus", input: payload };
      return { type: "reprompt" };
    case "awaiting_style":
      if (event.kind === "text" || payload.startsWith("style:")) {
        return { type: "select_style", muscleFocus: state.muscleFocus, input: payload };
      }
      return { type: "reprompt" };
    case "awaiting_question":
      if (event.kind === "text" && payload) return { type: "ask", question: payload };
      return { type: "reprompt" };
  }
}

// ----------------------------------------------------------------------------
// Engine
// ----------------------------------------------------------------------------

type GenerationJob = {
  id: string;
  userId: string;
  kind: GenerationKind;
  built: BuiltPrompt;
};

type StepResult = { messages: OutboundMessage[]; job?: GenerationJob };

export type ConversationEngineOptions = {
  store: ProfileStore;
  rateLimiter: RateLimiter;
  promptBuilder: PromptBuilder;
  client: GenerationClient;
  /** Per-call timeout handed to the generation client. */
  timeoutMs: number;
  /** Age after which a pending generation marker is treated as abandoned. */
  staleAfterMs?: number;
  now?: () => Date;
  newId?: () => string;
  /** Delivers interim messages ("working on it") while the remote call runs. */
  notify?: (message: OutboundMessage) => Promise<void>;
};

export class ConversationEngine {
  private readonly store: ProfileStore;
  private readonly rateLimiter: RateLimiter;
  private readonly promptBuilder: PromptBuilder;
  private readonly client: GenerationClient;
  private readonly timeoutMs: number;
  private readonly staleAfterMs: number;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly notify: ((message: OutboundMessage) => Promise<void>) | null;
  private readonly mutex = new KeyedMutex();

  constructor(opts: ConversationEngineOptions) {
    this.store = opts.store;
    this.rateLimiter = opts.rateLimiter;
    this.promptBuilder = opts.promptBuilder;
    this.client = opts.client;
    this.timeoutMs = opts.timeoutMs;
    this.staleAfterMs = opts.staleAfterMs ?? opts.timeoutMs + 30_000;
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;
    this.notify = opts.notify ?? null;
  }

  /** Processes one inbound event; the returned messages are delivered in order. */
  async handle(event: InboundEvent): Promise<OutboundMessage[]> {
    const { userId } = event;
    try {
      assertUserId(userId);
    } catch (err) {
      console.warn("[Engine] dropped event with invalid user id:", formatError(err));
      return [];
    }

    let step: StepResult;
    try {
      step = await this.mutex.runExclusive(userId, () => this.step(event));
    } catch (err) {
      return this.failed(userId, "event", err);
    }
    if (!step.job) return step.messages;

    const job = step.job;
    const messages = [...step.messages];
    const working: OutboundMessage = {
      userId,
      text: job.kind === "program" ? "⏳ Составляю программу, это может занять до минуты…" : "⏳ Думаю над ответом…",
    };
    if (this.notify) {
      await this.notify(working).catch((err: unknown) =>
        console.warn(`[Engine] interim message for ${shortId(userId)} failed:`, formatError(err))
      );
    } else {
      messages.push(working);
    }

    const result = await this.callClient(job);
    try {
      messages.push(...(await this.mutex.runExclusive(userId, () => this.complete(job, result))));
    } catch (err) {
      messages.push(...this.failed(userId, "generation result", err));
    }
    return messages;
  }

  private failed(userId: string, what: string, err: unknown): OutboundMessage[] {
    const code = err instanceof AppError ? err.code : null;
    console.error(`[Engine] ${what} for ${shortId(userId)} failed${code ? ` (${code})` : ""}:`, formatError(err));
    return [{ userId, text: STORAGE_APOLOGY }];
  }

  private async loadOrRecover(userId: string): Promise<{ profile: UserProfile; warning: OutboundMessage | null }> {
    try {
      return { profile: await this.store.load(userId), warning: null };
    } catch (err) {
      if (!(err instanceof CorruptProfileError)) throw err;
      console.warn(`[Engine] corrupt profile for ${shortId(userId)}, resetting:`, formatError(err));
      const profile = await this.store.recoverCorrupt(userId);
      return {
        profile,
        warning: {
          userId,
          text: "⚠️ Твои сохранённые данные оказались повреждены, поэтому профиль пришлось создать заново.",
        },
      };
    }
  }

  private async step(event: InboundEvent): Promise<StepResult> {
    const { profile, warning } = await this.loadOrRecover(event.userId);
    if (warning) {
      return { messages: [warning, this.promptFor(profile)] };
    }
    const state = sessionStateOf(profile);
    const action = resolveAction(state, event);
    debugLog("Engine", `${shortId(event.userId)} ${state.kind} + ${event.kind} → ${action.type}`);
    return this.apply(profile, state, action);
  }

  private async apply(profile: UserProfile, state: SessionState, action: EngineAction): Promise<StepResult> {
    const userId = profile.userId;
    const reply = (text: string, options?: MenuOption[]): StepResult => ({ messages: [{ userId, text, options }] });

    switch (action.type) {
      case "restart": {
        const next = resetQuestionnaire(profile, { purgeHistory: action.purge });
        if (profile.pendingGeneration) {
          debugLog("Engine", `${shortId(userId)} restart with generation ${profile.pendingGeneration.id} in flight`);
        }
        await this.store.save(userId, next);
        const note = action.purge ? "История программ удалена." : "История программ сохранена.";
        return { messages: [{ userId, text: `🔄 Начинаем заново. ${note}` }, this.promptFor(next)] };
      }

      case "show_menu": {
        const next = await this.withSession(profile, { kind: "ready" });
        return { messages: [this.promptFor(next)] };
      }

      case "reprompt": {
        const prompt = this.promptFor(profile);
        return {
          messages: [action.notice ? { ...prompt, text: `${action.notice}\n\n${prompt.text}` } : prompt],
        };
      }

      case "answer":
        return this.answer(profile, action.field, action.input);

      case "begin_program": {
        const next = await this.withSession(profile, { kind: "awaiting_muscle_focus" });
        return { messages: [this.promptFor(next)] };
      }

      case "select_focus": {
        const focus = matchChoice("focus", MUSCLE_FOCUS_CHOICES, action.input);
        if (!focus) {
          return reply("Не понял, на какие мышцы сделать акцент. Выбери вариант кнопкой ниже.", FOCUS_OPTIONS);
        }
        const next = await this.withSession(profile, { kind: "awaiting_style", muscleFocus: focus });
        return { messages: [this.promptFor(next)] };
      }

      case "select_style": {
        const style = matchChoice("style", STYLE_CHOICES, action.input);
        if (!style) return reply("Не понял стиль. Выбери вариант кнопкой ниже.", STYLE_OPTIONS);
        return this.dispatch(profile, { kind: "program", muscleFocus: action.muscleFocus, style });
      }

      case "begin_question": {
        const next = await this.withSession(profile, { kind: "awaiting_question" });
        return { messages: [this.promptFor(next)] };
      }

      case "ask":
        return this.dispatch(profile, { kind: "question", question: action.question.slice(0, 2000) });

      case "show_profile": {
        const text = await this.store.profileText(userId);
        return reply(text, state.kind === "ready" ? MAIN_MENU : undefined);
      }

      case "show_history": {
        const count = Math.min(HISTORY_LIMIT, profile.programs.length);
        const options = Array.from({ length: count }, (_, i) => ({
          id: `program:${i + 1}`,
          label: `📄 Программа ${i + 1}`,
        }));
        const text = renderProgramHistory(profile, HISTORY_LIMIT);
        return reply(text, state.kind === "ready" ? [...options, BACK_OPTION] : undefined);
      }

      case "show_program": {
        const program = profile.programs[action.index - 1];
        if (!program) return reply("Такой программы нет в истории.", MAIN_MENU);
        return { messages: [{ userId, text: program.text, markdown: true, options: MAIN_MENU }] };
      }

      case "edit_hint":
        return reply(
          `Чтобы изменить параметр, отправь команду /set <параметр> <значение>.\nПараметры: ${EDITABLE_FIELD_HINT}`,
          MAIN_MENU
        );

      case "set_param":
        return this.setParam(profile, action.args);

      case "goal_menu":
        return reply("Выбери новую цель:", GOAL_OPTIONS);

      case "set_goal": {
        const goal = matchChoice("goal", GOAL_CHOICES, action.input);
        if (!goal) return reply("Не понял цель. Выбери вариант кнопкой ниже.", GOAL_OPTIONS);
        await this.store.setGoal(userId, goal);
        return reply(
          `🎯 Цель обновлена: ${formatFieldValue("goal", goal)}. Новые программы будут учитывать её.`,
          MAIN_MENU
        );
      }

      case "unknown_command": {
        const prompt = this.promptFor(profile);
        const help = "Не знаю такой команды. Доступно: /menu, /profile, /history, /set, /goal, /cancel, /restart.";
        return { messages: [{ ...prompt, text: `${help}\n\n${prompt.text}` }] };
      }
    }
  }

  private async withSession(profile: UserProfile, session: ActiveSession): Promise<UserProfile> {
    const next = { ...profile, session };
    await this.store.save(profile.userId, next);
    return next;
  }

  /** Prompt for the state the profile is in: next question, sub-menu or main menu. */
  private promptFor(profile: UserProfile): OutboundMessage {
    const userId = profile.userId;
    const state = sessionStateOf(profile);
    switch (state.kind) {
      case "onboarding": {
        const def = FIELD_DEFS[state.stage];
        return { userId, text: def.question(profile), options: def.options };
      }
      case "ready":
        return { userId, text: "Главное меню. Что делаем дальше?", options: MAIN_MENU };
      case "awaiting_muscle_focus":
        return { userId, text: "На какую группу мышц сделать акцент в этой программе? ⬇️", options: FOCUS_OPTIONS };
      case "awaiting_style":
        return { userId, text: "Выбери стиль программы ⬇️", options: STYLE_OPTIONS };
      case "awaiting_question":
        return { userId, text: "Напиши свой вопрос о тренировках или питании одним сообщением.", options: [BACK_OPTION] };
    }
  }

  private async answer(profile: UserProfile, field: QuestionnaireField, input: string): Promise<StepResult> {
    const userId = profile.userId;
    let next: UserProfile;
    try {
      next = this.applyAnswer(profile, field, input);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      const prompt = this.promptFor(profile);
      return { messages: [{ ...prompt, text: `${err.message}\n\n${prompt.text}` }] };
    }

    await this.store.save(userId, next);
    if (next.questionnaireStage !== "complete") return { messages: [this.promptFor(next)] };

    console.log(`[Engine] questionnaire completed for ${shortId(userId)}`);
    return {
      messages: [
        {
          userId,
          text: `Анкета заполнена ✅ Спасибо${next.name ? `, ${next.name}` : ""}! Теперь можно составить программу или задать вопрос.`,
          options: MAIN_MENU,
        },
      ],
    };
  }

  private applyAnswer<K extends QuestionnaireField>(profile: UserProfile, field: K, input: string): UserProfile {
    const value: ProfileParams[K] = parseFieldAnswer(field, input);
    return { ...applyParam(profile, field, value), questionnaireStage: nextStage(field), session: { kind: "ready" } };
  }

  private async setParam(profile: UserProfile, args: string): Promise<StepResult> {
    const userId = profile.userId;
    const m = args.match(/^(\S+)\s*([\s\S]*)$/);
    const field = m ? resolveFieldAlias(m[1]) : null;
    const raw = m ? m[2].trim() : "";
    if (!field || !raw) {
      return {
        messages: [{ userId, text: `Формат: /set <параметр> <значение>\nПараметры: ${EDITABLE_FIELD_HINT}`, options: MAIN_MENU }],
      };
    }
    try {
      const updated = await this.updateField(userId, field, raw);
      const title = FIELD_DEFS[field].title;
      return {
        messages: [
          {
            userId,
            text: `✅ ${title}: ${updated}. Новые программы будут учитывать это изменение.`,
            options: MAIN_MENU,
          },
        ],
      };
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      return { messages: [{ userId, text: err.message, options: MAIN_MENU }] };
    }
  }

  private async updateField<K extends QuestionnaireField>(userId: string, field: K, raw: string): Promise<string> {
    const value = parseFieldAnswer(field, raw);
    await this.store.updateParam(userId, field, value);
    return formatFieldValue(field, value);
  }

  // --------------------------------------------------------------------------
  // Generation pipeline
  // --------------------------------------------------------------------------

  private isPendingActive(profile: UserProfile, now: Date): boolean {
    const pending = profile.pendingGeneration;
    if (!pending) return false;
    return now.getTime() - Date.parse(pending.startedAt) < this.staleAfterMs;
  }

  private async dispatch(profile: UserProfile, request: PromptRequest): Promise<StepResult> {
    const userId = profile.userId;
    const now = this.now();
    const ready: UserProfile = { ...profile, session: { kind: "ready" } };

    if (this.isPendingActive(profile, now)) {
      await this.store.save(userId, ready);
      return {
        messages: [{ userId, text: "⏳ Я ещё работаю над предыдущим запросом. Дождись ответа, пожалуйста.", options: MAIN_MENU }],
      };
    }

    const decision = await this.rateLimiter.check(userId, now);
    if (!decision.allowed) {
      await this.store.save(userId, ready);
      debugLog("Engine", `${shortId(userId)} rate limited for ${decision.waitSeconds}s`);
      return {
        messages: [
          {
            userId,
            text: `⏱ Слишком часто. Подожди ещё ${decision.waitSeconds} сек. перед следующим запросом.`,
            options: MAIN_MENU,
          },
        ],
      };
    }

    const built = this.promptBuilder.build(profile, request);
    const id = this.newId();
    // the window is consumed at dispatch, whatever the outcome of the call
    await this.store.save(userId, {
      ...ready,
      lastGenerationAt: now.toISOString(),
      pendingGeneration: { id, kind: request.kind, startedAt: now.toISOString(), discarded: false },
    });
    console.log(`[Engine] ${request.kind} generation ${id} dispatched for ${shortId(userId)}`);
    return { messages: [], job: { id, userId, kind: request.kind, built } };
  }

  private async callClient(job: GenerationJob): Promise<GenerationResult> {
    try {
      return await this.client.generate(job.built.prompt, { timeoutMs: this.timeoutMs });
    } catch (err) {
      console.error(`[Engine] generation client threw for ${job.id}:`, formatError(err));
      return { ok: false, kind: "TransientError", attempts: 1, message: formatError(err) };
    }
  }

  private async complete(job: GenerationJob, result: GenerationResult): Promise<OutboundMessage[]> {
    const { userId } = job;
    const { profile, warning } = await this.loadOrRecover(userId);
    if (warning) return [warning, this.promptFor(profile)];

    if (profile.pendingGeneration?.id !== job.id) {
      console.log(`[Engine] result of ${job.id} discarded for ${shortId(userId)}: marker replaced`);
      return [];
    }

    const cleared: UserProfile = { ...profile, pendingGeneration: null };
    if (profile.pendingGeneration.discarded) {
      await this.store.save(userId, cleared);
      console.log(`[Engine] result of ${job.id} discarded for ${shortId(userId)}: session was reset`);
      return [];
    }
    // text that is empty after cleanup counts as a malformed response
    const body = result.ok ? sanitizeGeneratedText(result.text) : "";
    if (!body) {
      await this.store.save(userId, cleared);
      const kind = result.ok ? "MalformedResponse" : result.kind;
      return [{ userId, text: FAILURE_TEXT[kind], options: MAIN_MENU }];
    }

    if (job.built.kind === "question") {
      await this.store.save(userId, cleared);
      return [{ userId, text: body, markdown: true, options: MAIN_MENU }];
    }

    const entry: GeneratedProgram = {
      createdAt: this.now().toISOString(),
      muscleFocus: job.built.muscleFocus,
      requestedStyle: job.built.requestedStyle,
      style: job.built.style,
      text: annotateWithWeights(body, profile),
    };
    await this.store.save(userId, { ...cleared, programs: [entry, ...profile.programs] });
    console.log(`[Engine] program ${job.id} saved for ${shortId(userId)} (${entry.style})`);
    return [{ userId, text: withNamePrefix(profile.name, entry.text), markdown: true, options: MAIN_MENU }];
  }
}
