import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  ConversationEngine,
  MAIN_MENU,
  parseCommand,
  resolveAction,
  sessionStateOf,
} from "./conversationEngine.js";
import type { GenerationClient, GenerationResult } from "./generationClient.js";
import { AppError } from "./middleware/errorHandler.js";
import { FileProfileStore } from "./profileStore.js";
import { PromptBuilder, type Prompt } from "./promptBuilder.js";
import { RateLimiter } from "./rateLimiter.js";
import type { InboundEvent, OutboundMessage, UserProfile } from "./types.js";

const USER = "u1";

const text = (payload: string): InboundEvent => ({ userId: USER, kind: "text", payload });
const cmd = (payload: string): InboundEvent => ({ userId: USER, kind: "command", payload });
const pick = (payload: string): InboundEvent => ({ userId: USER, kind: "menu_selection", payload });

const ANSWERS: InboundEvent[] = [
  text("Иван"),
  pick("goal:build_muscle"),
  pick("sex:male"),
  text("30"),
  text("180"),
  text("80"),
  text("85"),
  text("нет"),
  text("3"),
  pick("experience:intermediate"),
  pick("muscleEmphasis:full_body"),
];

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve: (value: T) => resolve(value) };
}

class FakeClient implements GenerationClient {
  calls: Prompt[] = [];
  private queue: Array<GenerationResult | Promise<GenerationResult>> = [];
  private waiters: Array<() => void> = [];

  push(result: GenerationResult | Promise<GenerationResult>) {
    this.queue.push(result);
  }

  /** Resolves once generate() has been called `n` times. */
  calledTimes(n: number): Promise<void> {
    if (this.calls.length >= n) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push(() => this.calls.length >= n && resolve()));
  }

  async generate(prompt: Prompt): Promise<GenerationResult> {
    this.calls.push(prompt);
    this.waiters.forEach((w) => w());
    const next = this.queue.shift();
    if (next === undefined) throw new Error("no fake result queued");
    return next;
  }
}

const ok = (t: string): GenerationResult => ({ ok: true, text: t, attempts: 1 });

let dir: string;
let clock: Date;
const advance = (ms: number) => {
  clock = new Date(clock.getTime() + ms);
};

function setup(opts?: { notify?: (m: OutboundMessage) => Promise<void>; store?: FileProfileStore }) {
  const store = opts?.store ?? new FileProfileStore({ dir, now: () => clock });
  const client = new FakeClient();
  let n = 0;
  const engine = new ConversationEngine({
    store,
    rateLimiter: new RateLimiter({ windowSec: 30, store }),
    promptBuilder: new PromptBuilder({
      temperature: 0.2,
      maxOutputTokens: 2000,
      questionMaxOutputTokens: 900,
      random: () => 0,
    }),
    client,
    timeoutMs: 1_000,
    now: () => clock,
    newId: () => `gen-${++n}`,
    notify: opts?.notify,
  });
  return { store, client, engine };
}

async function onboard(engine: ConversationEngine): Promise<OutboundMessage[]> {
  let last: OutboundMessage[] = [];
  for (const e of ANSWERS) last = await engine.handle(e);
  return last;
}

async function requestProgram(engine: ConversationEngine, focus: string, style: string) {
  await engine.handle(pick("menu:program"));
  await engine.handle(pick(`focus:${focus}`));
  return engine.handle(pick(`style:${style}`));
}

const lastOf = (out: OutboundMessage[]) => out[out.length - 1];

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "engine-"));
  clock = new Date("2025-01-10T10:00:00.000Z");
  jest.spyOn(console, "log").mockImplementation(() => {});
  jest.spyOn(console, "warn").mockImplementation(() => {});
  jest.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  jest.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe("onboarding", () => {
  it("/start from a new user asks for the name and stores nothing", async () => {
    const { engine } = setup();
    const out = await engine.handle(cmd("start"));
    expect(out).toEqual([
      { userId: USER, text: "Привет! Я твой персональный фитнес-тренер 💪 Как тебя зовут?", options: undefined },
    ]);
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  it("reaches Ready after exactly 11 valid answers", async () => {
    const { engine, store } = setup();
    for (let i = 0; i < ANSWERS.length; i++) {
      const out = await engine.handle(ANSWERS[i]);
      const profile = await store.load(USER);
      if (i < ANSWERS.length - 1) {
        expect(profile.questionnaireStage).not.toBe("complete");
        expect(sessionStateOf(profile).kind).toBe("onboarding");
      } else {
        expect(profile.questionnaireStage).toBe("complete");
        expect(sessionStateOf(profile)).toEqual({ kind: "ready" });
        expect(out[0].text).toBe(
          "Анкета заполнена ✅ Спасибо, Иван! Теперь можно составить программу или задать вопрос."
        );
        expect(out[0].options).toEqual(MAIN_MENU);
      }
    }
    const profile = await store.load(USER);
    expect(profile).toMatchObject({
      name: "Иван",
      goal: "build_muscle",
      sex: "male",
      age: 30,
      height: 180,
      weight: 80,
      targetWeight: 85,
      restrictions: "нет",
      frequency: 3,
      experience: "intermediate",
      muscleEmphasis: "full_body",
    });
  });

  it("asks the goal with the user's name and offers goal buttons", async () => {
    const { engine } = setup();
    const out = await engine.handle(text("Иван"));
    expect(out[0].text).toBe("Иван, выбери свою цель тренировок ⬇️");
    expect(out[0].options?.map((o) => o.id)).toEqual(["goal:lose_weight", "goal:build_muscle", "goal:maintain"]);
  });

  test.each([
    [3, text("сто"), "Возраст укажи целым числом от 10 до 100."],
    [2, text("не скажу"), "Пожалуйста, выбери пол кнопкой ниже."],
    [8, text("8"), "Укажи целое число от 1 до 7."],
  ])("invalid answer at step %i leaves the profile unchanged", async (answered, bad, error) => {
    const { engine, store } = setup();
    for (const e of ANSWERS.slice(0, answered)) await engine.handle(e);
    const before = await store.load(USER);

    const out = await engine.handle(bad);

    expect(out).toHaveLength(1);
    expect(out[0].text.startsWith(`${error}\n\n`)).toBe(true);
    expect(await store.load(USER)).toEqual(before);
  });

  it("/set during the questionnaire leaves the profile unchanged", async () => {
    const { engine, store } = setup();
    await engine.handle(text("Иван"));
    const out = await engine.handle(cmd("set вес 80"));
    expect(out[0].text).toBe("Сначала заполни анкету до конца.\n\nИван, выбери свою цель тренировок ⬇️");
    expect((await store.load(USER)).weight).toBeNull();
  });
});

describe("generation pipeline", () => {
  it("legs + strength → one history entry with the generated text", async () => {
    const { engine, store, client } = setup();
    await onboard(engine);
    client.push(ok("Program X"));

    const out = await requestProgram(engine, "legs", "strength");

    expect(out).toHaveLength(2);
    expect(out[0].text).toBe("⏳ Составляю программу, это может занять до минуты…");
    expect(out[1]).toEqual({
      userId: USER,
      text: "Иван, обработал твой запрос — вот что получилось ⬇️\n\nProgram X",
      markdown: true,
      options: MAIN_MENU,
    });

    const profile = await store.load(USER);
    expect(profile.programs).toHaveLength(1);
    expect(profile.programs[0]).toMatchObject({
      muscleFocus: "legs",
      style: "strength",
      requestedStyle: "strength",
      text: "Program X",
    });
    expect(sessionStateOf(profile)).toEqual({ kind: "ready" });
    expect(profile.pendingGeneration).toBeNull();
    expect(profile.lastGenerationAt).toBe("2025-01-10T10:00:00.000Z");
    expect(client.calls[0].instructions).toContain("• Акцент этой программы: Ноги и ягодицы.");
  });

  it("random style is resolved before the call and recorded", async () => {
    const { engine, store, client } = setup();
    await onboard(engine);
    client.push(ok("Program R"));
    await requestProgram(engine, "back", "random");
    const [entry] = (await store.load(USER)).programs;
    expect(entry.requestedStyle).toBe("random");
    expect(entry.style).toBe("basic");
  });

  it("a failed call still consumes the rate-limit window", async () => {
    const { engine, store, client } = setup();
    await onboard(engine);
    client.push({ ok: false, kind: "TransientError", attempts: 2, message: "503" });

    const failed = await requestProgram(engine, "legs", "strength");
    expect(lastOf(failed).text).toBe("⚠️ Не удалось связаться с сервисом генерации. Попробуй ещё раз чуть позже.");
    const profile = await store.load(USER);
    expect(profile.programs).toEqual([]);
    expect(profile.lastGenerationAt).toBe("2025-01-10T10:00:00.000Z");

    const retry = await requestProgram(engine, "legs", "strength");
    expect(retry).toEqual([
      {
        userId: USER,
        text: "⏱ Слишком часто. Подожди ещё 30 сек. перед следующим запросом.",
        options: MAIN_MENU,
      },
    ]);
    expect(client.calls).toHaveLength(1);
    expect(sessionStateOf(await store.load(USER))).toEqual({ kind: "ready" });
  });

  it("a second request 5s after a success waits 25s and makes no call", async () => {
    const { engine, store, client } = setup();
    await onboard(engine);
    client.push(ok("Program X"));
    await requestProgram(engine, "legs", "strength");
    const before = await store.load(USER);

    advance(5_000);
    await engine.handle(pick("menu:question"));
    const out = await engine.handle(text("Как восстановиться?"));

    expect(out).toEqual([
      {
        userId: USER,
        text: "⏱ Слишком часто. Подожди ещё 25 сек. перед следующим запросом.",
        options: MAIN_MENU,
      },
    ]);
    expect(client.calls).toHaveLength(1);
    const after = await store.load(USER);
    expect(after.programs).toEqual(before.programs);
    expect(after.lastGenerationAt).toBe(before.lastGenerationAt);
  });

  it("history is append-only, most recent first", async () => {
    const { engine, store, client } = setup();
    await onboard(engine);

    const snapshots: string[] = [];
    for (let i = 1; i <= 3; i++) {
      advance(31_000);
      client.push(ok(`Program ${i}`));
      await requestProgram(engine, "chest", "basic");
      snapshots.push(JSON.stringify((await store.load(USER)).programs[0]));
    }

    const { programs } = await store.load(USER);
    expect(programs.map((p) => p.text)).toEqual(["Program 3", "Program 2", "Program 1"]);
    expect(programs.map((p) => JSON.stringify(p))).toEqual([...snapshots].reverse());
  });

  test.each([
    ["Timeout", "⌛ Сервис генерации не ответил вовремя. Попробуй ещё раз через минуту."],
    ["AuthFailure", "🔧 Сервис генерации сейчас недоступен. Мы уже разбираемся, попробуй позже."],
    ["MalformedResponse", "🤔 Сервис вернул пустой ответ. Попробуй ещё раз или переформулируй запрос."],
  ] as const)("%s gets its own message", async (kind, message) => {
    const { engine, client, store } = setup();
    await onboard(engine);
    client.push({ ok: false, kind, attempts: 1, message: kind });
    const out = await requestProgram(engine, "arms", "isolation");
    expect(lastOf(out).text).toBe(message);
    expect((await store.load(USER)).pendingGeneration).toBeNull();
  });

  it("a client that throws is reported as a transient failure", async () => {
    const { engine, client } = setup();
    await onboard(engine);
    const out = await requestProgram(engine, "arms", "isolation");
    expect(client.calls).toHaveLength(1);
    expect(lastOf(out).text).toBe("⚠️ Не удалось связаться с сервисом генерации. Попробуй ещё раз чуть позже.");
  });

  it("a reply that is empty after cleanup is not saved", async () => {
    const { engine, client, store } = setup();
    await onboard(engine);
    client.push(ok("(RPE 8)"));
    const out = await requestProgram(engine, "arms", "isolation");
    expect(lastOf(out).text).toBe("🤔 Сервис вернул пустой ответ. Попробуй ещё раз или переформулируй запрос.");
    expect((await store.load(USER)).programs).toEqual([]);
  });

  it("free text in Ready is answered as a question and not saved to history", async () => {
    const { engine, store, client } = setup();
    await onboard(engine);
    client.push(ok("Пей 2 литра в день."));

    const out = await engine.handle(text("Сколько пить воды?"));

    expect(out[0].text).toBe("⏳ Думаю над ответом…");
    expect(out[1]).toEqual({ userId: USER, text: "Пей 2 литра в день.", markdown: true, options: MAIN_MENU });
    expect(client.calls[0].input.endsWith("Вопрос:\nСколько пить воды?")).toBe(true);
    expect(client.calls[0].maxOutputTokens).toBe(900);
    expect((await store.load(USER)).programs).toEqual([]);
  });

  it("interim messages go through notify when it is set", async () => {
    const notified: OutboundMessage[] = [];
    const { engine, client } = setup({
      notify: async (m) => {
        notified.push(m);
      },
    });
    await onboard(engine);
    client.push(ok("Program X"));
    const out = await requestProgram(engine, "core", "endurance");
    expect(notified.map((m) => m.text)).toEqual(["⏳ Составляю программу, это может занять до минуты…"]);
    expect(out).toHaveLength(1);
  });
});

describe("in-flight generation", () => {
  it("restart while a call is in flight discards the late result", async () => {
    const { engine, store, client } = setup();
    await onboard(engine);
    const late = deferred<GenerationResult>();
    client.push(late.promise);

    await engine.handle(pick("menu:program"));
    await engine.handle(pick("focus:legs"));
    const pending = engine.handle(pick("style:strength"));
    await client.calledTimes(1);
    expect((await store.load(USER)).pendingGeneration?.id).toBe("gen-1");

    const restart = await engine.handle(cmd("restart"));
    expect(restart.map((m) => m.text)).toEqual([
      "🔄 Начинаем заново. История программ сохранена.",
      "Привет! Я твой персональный фитнес-тренер 💪 Как тебя зовут?",
    ]);
    expect((await store.load(USER)).pendingGeneration).toMatchObject({ id: "gen-1", discarded: true });

    late.resolve(ok("Late program"));
    const out = await pending;
    expect(out.map((m) => m.text)).toEqual(["⏳ Составляю программу, это может занять до минуты…"]);

    const profile = await store.load(USER);
    expect(profile.programs).toEqual([]);
    expect(profile.questionnaireStage).toBe("name");
    expect(profile.pendingGeneration).toBeNull();
  });

  it("a call started before restart still blocks a new one after onboarding again", async () => {
    const { engine, store, client } = setup();
    await onboard(engine);
    const late = deferred<GenerationResult>();
    client.push(late.promise);
    const pending = requestProgram(engine, "legs", "strength");
    await client.calledTimes(1);

    await engine.handle(cmd("restart"));
    await onboard(engine);
    advance(30_500);
    const refused = await requestProgram(engine, "back", "basic");
    expect(refused.map((m) => m.text)).toEqual([
      "⏳ Я ещё работаю над предыдущим запросом. Дождись ответа, пожалуйста.",
    ]);
    expect(client.calls).toHaveLength(1);

    late.resolve(ok("Late program"));
    await pending;
    const profile = await store.load(USER);
    expect(profile.pendingGeneration).toBeNull();
    expect(profile.programs).toEqual([]);
  });

  it("refuses a second generation while the first is pending", async () => {
    const { engine, client } = setup();
    await onboard(engine);
    const slow = deferred<GenerationResult>();
    client.push(slow.promise);

    const first = requestProgram(engine, "legs", "strength");
    await client.calledTimes(1);
    await engine.handle(pick("menu:question"));
    const second = await engine.handle(text("Что съесть после тренировки?"));
    expect(second[0].text).toBe("⏳ Я ещё работаю над предыдущим запросом. Дождись ответа, пожалуйста.");

    slow.resolve(ok("Program X"));
    await first;
    expect(client.calls).toHaveLength(1);
  });

  it("an abandoned pending marker does not block new requests", async () => {
    const { engine, store, client } = setup();
    await onboard(engine);
    const profile = await store.load(USER);
    await store.save(USER, {
      ...profile,
      pendingGeneration: { id: "old", kind: "program", startedAt: "2025-01-10T09:00:00.000Z", discarded: false },
    });
    client.push(ok("Program X"));
    const out = await requestProgram(engine, "legs", "basic");
    expect(lastOf(out).markdown).toBe(true);
    expect((await store.load(USER)).programs).toHaveLength(1);
  });
});

describe("restart and edits", () => {
  async function withOneProgram() {
    const ctx = setup();
    await onboard(ctx.engine);
    ctx.client.push(ok("Program X"));
    await requestProgram(ctx.engine, "legs", "strength");
    return ctx;
  }

  it("restart clears answers and goal but keeps history", async () => {
    const { engine, store } = await withOneProgram();
    await engine.handle(pick("menu:restart"));
    const profile: UserProfile = await store.load(USER);
    expect(profile.questionnaireStage).toBe("name");
    expect(profile.name).toBeNull();
    expect(profile.goal).toBeNull();
    expect(profile.weight).toBeNull();
    expect(profile.programs.map((p) => p.text)).toEqual(["Program X"]);
  });

  it("/restart purge also clears history", async () => {
    const { engine, store } = await withOneProgram();
    const out = await engine.handle(cmd("restart purge"));
    expect(out[0].text).toBe("🔄 Начинаем заново. История программ удалена.");
    expect((await store.load(USER)).programs).toEqual([]);
  });

  it("/set changes one parameter and leaves history as it was", async () => {
    const { engine, store } = await withOneProgram();
    const before = await store.load(USER);
    const out = await engine.handle(cmd("set вес 82,5"));
    expect(out[0].text).toBe("✅ Текущий вес: 82.5 кг. Новые программы будут учитывать это изменение.");
    const after = await store.load(USER);
    expect(after.weight).toBe(82.5);
    expect(after.programs).toEqual(before.programs);
    expect(sessionStateOf(after)).toEqual({ kind: "ready" });
  });

  it("/set with an out-of-range value reports the error", async () => {
    const { engine, store } = await withOneProgram();
    const out = await engine.handle(cmd("set вес 500"));
    expect(out[0].text).toBe("Вес укажи числом от 30 до 300 кг.");
    expect((await store.load(USER)).weight).toBe(80);
  });

  it("/goal and the goal menu update the goal", async () => {
    const { engine, store } = await withOneProgram();
    const out = await engine.handle(cmd("goal похудеть"));
    expect(out[0].text).toBe("🎯 Цель обновлена: 🏃‍♂️ Похудеть. Новые программы будут учитывать её.");
    expect((await store.load(USER)).goal).toBe("lose_weight");

    await engine.handle(pick("menu:goal"));
    await engine.handle(pick("goal:maintain"));
    expect((await store.load(USER)).goal).toBe("maintain");
  });

  it("history lists saved programs and opens one of them", async () => {
    const { engine } = await withOneProgram();
    const list = await engine.handle(pick("menu:history"));
    expect(list[0].text).toBe("🗂 Последние программы (1 из 1):\n1. 10.01.2025 — Ноги и ягодицы, 🏋️ Силовая");
    expect(list[0].options?.map((o) => o.id)).toEqual(["program:1", "menu:main"]);

    const shown = await engine.handle(pick("program:1"));
    expect(shown[0]).toEqual({ userId: USER, text: "Program X", markdown: true, options: MAIN_MENU });
  });

  it("/cancel leaves a transient state", async () => {
    const { engine, store } = await withOneProgram();
    await engine.handle(pick("menu:program"));
    expect(sessionStateOf(await store.load(USER))).toEqual({ kind: "awaiting_muscle_focus" });
    const out = await engine.handle(cmd("cancel"));
    expect(out[0].text).toBe("Главное меню. Что делаем дальше?");
    expect(sessionStateOf(await store.load(USER))).toEqual({ kind: "ready" });
  });
});

describe("storage failures", () => {
  it("a corrupt profile is moved aside and the user is warned", async () => {
    const { engine, store } = setup();
    await fs.writeFile(path.join(dir, `${USER}.json`), "{broken", "utf8");

    const out = await engine.handle(text("привет"));

    expect(out.map((m) => m.text)).toEqual([
      "⚠️ Твои сохранённые данные оказались повреждены, поэтому профиль пришлось создать заново.",
      "Привет! Я твой персональный фитнес-тренер 💪 Как тебя зовут?",
    ]);
    const files = await fs.readdir(dir);
    expect(files).toContain(`${USER}.json.corrupt-${clock.getTime()}`);
    expect((await store.load(USER)).questionnaireStage).toBe("name");
  });

  it("a failing save produces an apology", async () => {
    class BrokenStore extends FileProfileStore {
      async save(): Promise<void> {
        throw new AppError("Profile storage failed", 500, { code: "storage_error" });
      }
    }
    const { engine } = setup({ store: new BrokenStore({ dir, now: () => clock }) });
    const out = await engine.handle(text("Иван"));
    expect(out).toEqual([
      { userId: USER, text: "😔 Что-то пошло не так при сохранении данных. Попробуй ещё раз чуть позже." },
    ]);
  });

  it("events with an invalid user id are dropped", async () => {
    const { engine } = setup();
    await expect(engine.handle({ userId: "../etc", kind: "text", payload: "hi" })).resolves.toEqual([]);
  });
});

describe("resolveAction", () => {
  const ev = (kind: InboundEvent["kind"], payload: string): InboundEvent => ({ userId: USER, kind, payload });

  test.each([
    [{ kind: "onboarding", stage: "age" }, ev("text", "30"), { type: "answer", field: "age", input: "30" }],
    [{ kind: "onboarding", stage: "sex" }, ev("menu_selection", "goal:maintain"), { type: "reprompt" }],
    [{ kind: "onboarding", stage: "sex" }, ev("command", "restart"), { type: "restart", purge: false }],
    [{ kind: "ready" }, ev("menu_selection", "menu:program"), { type: "begin_program" }],
    [{ kind: "ready" }, ev("text", "как качать пресс?"), { type: "ask", question: "как качать пресс?" }],
    [{ kind: "ready" }, ev("command", "goal"), { type: "goal_menu" }],
    [{ kind: "awaiting_muscle_focus" }, ev("menu_selection", "focus:back"), { type: "select_focus", input: "focus:back" }],
    [{ kind: "awaiting_muscle_focus" }, ev("command", "set вес 80"), { type: "reprompt", notice: "Сначала заверши текущий шаг или нажми /cancel." }],
    [
      { kind: "awaiting_style", muscleFocus: "legs" },
      ev("menu_selection", "style:random"),
      { type: "select_style", muscleFocus: "legs", input: "style:random" },
    ],
    [{ kind: "awaiting_question" }, ev("menu_selection", "menu:main"), { type: "show_menu" }],
    [{ kind: "awaiting_question" }, ev("command", "foo"), { type: "unknown_command", name: "foo" }],
  ] as const)("%j + %j", (state, event, action) => {
    expect(resolveAction(state, event)).toEqual(action);
  });

  it("parses commands with a bot mention", () => {
    expect(parseCommand("/Set@gym_bot вес  80")).toEqual({ name: "set", args: "вес  80" });
    expect(parseCommand("")).toEqual({ name: "", args: "" });
  });
});
