// engine/src/promptBuilder.ts
// Turns a profile plus request options into model instructions.

import { MUSCLE_FOCUS_CHOICES, type Choice } from "./questionnaire.js";
import {
  CONCRETE_STYLES,
  type ConcreteStyle,
  type ExperienceLevel,
  type Goal,
  type MuscleFocus,
  type ProgramStyle,
  type Sex,
  type UserProfile,
} from "./types.js";

export type Prompt = {
  instructions: string;
  input: string;
  temperature: number;
  maxOutputTokens: number;
};

export type PromptRequest =
  | { kind: "program"; muscleFocus: MuscleFocus; style: ProgramStyle }
  | { kind: "question"; question: string };

export type BuiltPrompt =
  | { kind: "program"; prompt: Prompt; muscleFocus: MuscleFocus; requestedStyle: ProgramStyle; style: ConcreteStyle }
  | { kind: "question"; prompt: Prompt };

export const STYLE_CHOICES: Choice<ProgramStyle>[] = [
  { value: "basic", label: "🏗 Базовая", keywords: ["баз", "basic"] },
  { value: "isolation", label: "🎯 Изоляция", keywords: ["изол", "isolation"] },
  { value: "strength", label: "🏋️ Силовая", keywords: ["сил", "strength"] },
  { value: "endurance", label: "🔁 Выносливость", keywords: ["вынос", "endurance"] },
  { value: "random", label: "🎲 Случайный стиль", keywords: ["случ", "любой", "random"] },
];

const STYLE_RULES: Record<ConcreteStyle, string> = {
  basic: "базовые многосуставные упражнения, 3–4 подхода по 8–12 повторений, отдых 90–120 сек.",
  isolation: "упор на изолирующие односуставные упражнения, 3 подхода по 12–15 повторений, отдых 60–90 сек.",
  strength: "тяжёлые базовые движения, 4–5 подходов по 3–6 повторений, отдых 2–3 мин.",
  endurance: "круговой формат и суперсеты, 2–3 подхода по 15–20 повторений, отдых 30–45 сек.",
};

const GOAL_TEXT: Record<Goal, string> = {
  lose_weight: "похудение",
  build_muscle: "набор мышечной массы",
  maintain: "поддержание формы",
};

const SEX_TEXT: Record<Sex, string> = { female: "женский", male: "мужской" };

const LEVEL_TEXT: Record<ExperienceLevel, string> = {
  beginner: "начинающий",
  intermediate: "средний",
  advanced: "опытный",
};

const NOT_SET = "не указано";

function focusLabel(focus: MuscleFocus | null): string {
  if (!focus) return NOT_SET;
  return MUSCLE_FOCUS_CHOICES.find((c) => c.value === focus)?.label ?? focus;
}

function styleLabel(style: ProgramStyle): string {
  return STYLE_CHOICES.find((c) => c.value === style)?.label ?? style;
}

function num(v: number | null, unit: string): string {
  return v == null ? NOT_SET : `${v} ${unit}`;
}

/** "random" becomes one concrete style, drawn uniformly. */
export function resolveStyle(style: ProgramStyle, random: () => number): ConcreteStyle {
  if (style !== "random") return style;
  const idx = Math.min(CONCRETE_STYLES.length - 1, Math.max(0, Math.floor(random() * CONCRETE_STYLES.length)));
  return CONCRETE_STYLES[idx];
}

export function formatProfileForPrompt(p: UserProfile): string {
  return [
    `Цель: ${p.goal ? GOAL_TEXT[p.goal] : NOT_SET}`,
    `Пол: ${p.sex ? SEX_TEXT[p.sex] : NOT_SET}`,
    `Возраст: ${num(p.age, "лет")}`,
    `Рост: ${num(p.height, "см")}`,
    `Текущий вес: ${num(p.weight, "кг")}`,
    `Желаемый вес: ${num(p.targetWeight, "кг")}`,
    `Ограничения: ${p.restrictions ?? "нет"}`,
    `Частота тренировок: ${p.frequency != null ? `${p.frequency} в неделю` : NOT_SET}`,
    `Уровень подготовки: ${p.experience ? LEVEL_TEXT[p.experience] : NOT_SET}`,
    `Общий акцент на мышцы: ${focusLabel(p.muscleEmphasis)}`,
  ].join("\n");
}

const PROGRAM_SYSTEM = [
  "Ты — опытный персональный тренер по силовым тренировкам и бодибилдингу (опыт более 8 лет).",
  "Твоя задача — создавать детальные, безопасные и эффективные тренировочные программы для зала с учётом целей, пола, возраста, веса, уровня подготовки, частоты тренировок и ограничений пользователя.",
  "",
  "### Общие правила:",
  "• Всегда отвечай в формате **Markdown**.",
  "• Не используй приветствий, лишних объяснений или заключений — только готовый план.",
  "• Строй программу **без уточняющих вопросов** — используй данные анкеты полностью.",
  "• Не используй RPE/RIR и слова «до отказа».",
  "• Избегай сложных и травмоопасных движений, если пользователь новичок.",
  "",
  "### Формат плана:",
  "• Заголовок дня: **День N — часть тела/тип тренировки**, дни разделяй пустой строкой.",
  "• В начале дня — разминка 5–7 минут, в конце — заминка 3–5 минут.",
  "• Каждое упражнение оформляй так: «- Название — 3×12, отдых 90 сек., рекомендуемый вес: ~40 кг».",
  "• Если упражнение с собственным весом — так и указывай («работа с собственным весом»).",
  "• В конце добавь раздел **Заметки по прогрессии**: как увеличивать вес, как снижать нагрузку при утомлении, советы по безопасности.",
  "",
  "### Подбор упражнений:",
  "• При 2–3 тренировках в неделю — full body или upper/lower.",
  "• При 4 тренировках — upper/lower split или push/pull/legs.",
  "• При 5+ тренировках — сплит по мышечным группам.",
  "• Если есть ограничения — адаптируй упражнения под них.",
].join("\n");

const QUESTION_SYSTEM = [
  "Ты — персональный фитнес-тренер высокого уровня (опыт более 8 лет): силовые тренировки, функциональный тренинг, кардио, похудение, набор массы, питание и восстановление.",
  "",
  "### Как отвечать:",
  "• По делу, без лишней воды, но информативно.",
  "• Используй **Markdown** для списков и акцентов.",
  "• Без приветствий и прощаний.",
  "• Учитывай цель, уровень и ограничения пользователя из контекста.",
  "• Не используй RPE/RIR и слова «до отказа» — описывай усилие словами («легко», «умеренно», «тяжело»).",
  "• Безопасность прежде всего: подсказывай технику и как избегать травм.",
].join("\n");

export class PromptBuilder {
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private readonly questionMaxOutputTokens: number;
  private readonly random: () => number;

  constructor(opts: {
    temperature: number;
    maxOutputTokens: number;
    questionMaxOutputTokens: number;
    random?: () => number;
  }) {
    this.temperature = opts.temperature;
    this.maxOutputTokens = opts.maxOutputTokens;
    this.questionMaxOutputTokens = opts.questionMaxOutputTokens;
    this.random = opts.random ?? Math.random;
  }

  build(profile: UserProfile, request: PromptRequest): BuiltPrompt {
    if (request.kind === "question") {
      return { kind: "question", prompt: this.questionPrompt(profile, request.question) };
    }
    const style = resolveStyle(request.style, this.random);
    return {
      kind: "program",
      prompt: this.programPrompt(profile, request.muscleFocus, style),
      muscleFocus: request.muscleFocus,
      requestedStyle: request.style,
      style,
    };
  }

  private programPrompt(profile: UserProfile, focus: MuscleFocus, style: ConcreteStyle): Prompt {
    const perDay = profile.experience === "beginner" || profile.experience == null ? "4–5" : "5–7";
    const strict: string[] = [];
    if (profile.frequency != null) {
      strict.push(`• Сделай РОВНО ${profile.frequency} тренировочных дней в неделю.`);
    }
    strict.push(
      `• В каждом дне перечисли ${perDay} силовых упражнений (не считая разминку и заминку).`,
      `• Акцент этой программы: ${focusLabel(focus)}.`,
      `• Стиль программы: ${styleLabel(style)} — ${STYLE_RULES[style]}`,
      "• Не используй HTML-теги (<br>, <p>) — только Markdown и обычные переносы строк."
    );

    return {
      instructions: `${PROGRAM_SYSTEM}\n\n### Требования к этой программе:\n${strict.join("\n")}`,
      input: formatProfileForPrompt(profile),
      temperature: this.temperature,
      maxOutputTokens: this.maxOutputTokens,
    };
  }

  private questionPrompt(profile: UserProfile, question: string): Prompt {
    const context = [
      `Цель: ${profile.goal ? GOAL_TEXT[profile.goal] : NOT_SET}`,
      `Пол: ${profile.sex ? SEX_TEXT[profile.sex] : NOT_SET}`,
      `Возраст: ${num(profile.age, "лет")}`,
      `Текущий вес: ${num(profile.weight, "кг")}`,
      `Уровень подготовки: ${profile.experience ? LEVEL_TEXT[profile.experience] : NOT_SET}`,
      `Частота тренировок: ${profile.frequency != null ? `${profile.frequency} в неделю` : NOT_SET}`,
      `Ограничения: ${profile.restrictions ?? "нет"}`,
    ].join("\n");

    return {
      instructions: QUESTION_SYSTEM,
      input: `Контекст пользователя:\n${context}\n\nВопрос:\n${question.trim()}`,
      temperature: Math.min(0.45, this.temperature),
      maxOutputTokens: this.questionMaxOutputTokens,
    };
  }
}
