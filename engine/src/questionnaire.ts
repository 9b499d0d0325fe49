// engine/src/questionnaire.ts
// Ordered onboarding fields: prompts, menu options and answer parsing.

import { ValidationError } from "./errors.js";
import {
  QUESTIONNAIRE_FIELDS,
  type ExperienceLevel,
  type Goal,
  type MenuOption,
  type MuscleFocus,
  type ProfileParams,
  type QuestionnaireField,
  type QuestionnaireStage,
  type Sex,
  type UserProfile,
} from "./types.js";
import { ProfileParamSchemas, validate } from "./validation.js";

export type Choice<V extends string> = { value: V; label: string; keywords: string[] };

export const GOAL_CHOICES: Choice<Goal>[] = [
  { value: "lose_weight", label: "🏃‍♂️ Похудеть", keywords: ["похуд", "сброс", "lose"] },
  { value: "build_muscle", label: "🏋️‍♂️ Набрать массу", keywords: ["мас", "набр", "muscle"] },
  { value: "maintain", label: "🧘 Поддерживать форму", keywords: ["форм", "поддерж", "maintain"] },
];

// female goes first: "male" is a substring of "female"
export const SEX_CHOICES: Choice<Sex>[] = [
  { value: "female", label: "👩 Женский", keywords: ["жен", "👩", "female"] },
  { value: "male", label: "👨 Мужской", keywords: ["муж", "👨", "male"] },
];

export const EXPERIENCE_CHOICES: Choice<ExperienceLevel>[] = [
  { value: "beginner", label: "🚀 Начинающий", keywords: ["начина", "нович", "beginner"] },
  { value: "intermediate", label: "💪 Средний", keywords: ["сред", "intermediate"] },
  { value: "advanced", label: "🔥 Опытный", keywords: ["опыт", "продвин", "advanced"] },
];

export const MUSCLE_FOCUS_CHOICES: Choice<MuscleFocus>[] = [
  { value: "full_body", label: "Всё тело", keywords: ["всё тело", "все тело", "full"] },
  { value: "chest", label: "Грудь", keywords: ["груд", "chest"] },
  { value: "back", label: "Спина", keywords: ["спин", "back"] },
  { value: "legs", label: "Ноги и ягодицы", keywords: ["ног", "ягод", "legs"] },
  { value: "shoulders", label: "Плечи", keywords: ["плеч", "shoulders"] },
  { value: "arms", label: "Руки", keywords: ["рук", "бицепс", "трицепс", "arms"] },
  { value: "core", label: "Пресс и кор", keywords: ["пресс", "кор", "core"] },
];

type FieldDef<K extends QuestionnaireField> = {
  /** Human name used in the profile card and /set hints. */
  title: string;
  question: (profile: UserProfile) => string;
  options?: MenuOption[];
  parse: (input: string) => ProfileParams[K];
  format: (value: ProfileParams[K]) => string;
};

function normalizeText(s: string): string {
  return s.toLowerCase().replace(/ё/g, "е").replace(/\s+/g, " ").trim();
}

/** Menu options with ids of the form `<prefix>:<value>`. */
export function choiceOptions<V extends string>(prefix: string, choices: Choice<V>[]): MenuOption[] {
  return choices.map((c) => ({ id: `${prefix}:${c.value}`, label: c.label }));
}

/** Option id (with or without prefix), exact label, or a keyword found in free text. */
export function matchChoice<V extends string>(prefix: string, choices: Choice<V>[], input: string): V | null {
  const raw = input.trim();
  const byId = raw.startsWith(`${prefix}:`) ? raw.slice(prefix.length + 1) : raw;
  const exact = choices.find((c) => c.value === byId || c.label === raw);
  if (exact) return exact.value;
  const text = normalizeText(raw);
  if (!text) return null;
  for (const c of choices) {
    if (c.keywords.some((k) => text.includes(normalizeText(k)))) return c.value;
  }
  return null;
}

function choiceField<V extends string>(
  field: QuestionnaireField,
  choices: Choice<V>[],
  title: string,
  question: (profile: UserProfile) => string,
  errorText: string
) {
  return {
    title,
    question,
    options: choiceOptions(field, choices),
    parse: (input: string): V => {
      const v = matchChoice(field, choices, input);
      if (v == null) throw new ValidationError(field, errorText);
      return v;
    },
    format: (value: V) => choices.find((c) => c.value === value)?.label ?? value,
  };
}

/** First number in the text; accepts "82,5 кг" and "180см". */
export function extractNumber(input: string): number | null {
  const m = input.match(/-?\d+(?:[.,]\d+)?/);
  if (!m) return null;
  const v = Number(m[0].replace(",", "."));
  return Number.isFinite(v) ? v : null;
}

function numberField(
  field: "age" | "height" | "weight" | "targetWeight" | "frequency",
  title: string,
  question: string,
  errorText: string,
  unit: string
) {
  return {
    title,
    question: () => question,
    parse: (input: string): number => {
      const r = validate(ProfileParamSchemas[field], extractNumber(input));
      if (!r.success) throw new ValidationError(field, errorText);
      return r.data;
    },
    format: (value: number) => (unit ? `${value} ${unit}` : String(value)),
  };
}

export const FIELD_DEFS: { [K in QuestionnaireField]: FieldDef<K> } = {
  name: {
    title: "Имя",
    question: () => "Привет! Я твой персональный фитнес-тренер 💪 Как тебя зовут?",
    parse: (input) => {
      const r = validate(ProfileParamSchemas.name, input.trim().slice(0, 80));
      if (!r.success) throw new ValidationError("name", "Пожалуйста, напиши своё имя одним сообщением.");
      return r.data;
    },
    format: (value) => value,
  },
  goal: choiceField(
    "goal",
    GOAL_CHOICES,
    "Цель",
    (p) => (p.name ? `${p.name}, выбери свою цель тренировок ⬇️` : "Выбери свою цель тренировок ⬇️"),
    "Пожалуйста, выбери цель кнопкой ниже."
  ),
  sex: choiceField("sex", SEX_CHOICES, "Пол", () => "Укажи свой пол:", "Пожалуйста, выбери пол кнопкой ниже."),
  age: numberField("age", "Возраст", "Сколько тебе лет?", "Возраст укажи целым числом от 10 до 100.", "лет"),
  height: numberField("height", "Рост", "Твой рост в сантиметрах?", "Рост укажи числом от 100 до 250 см.", "см"),
  weight: numberField(
    "weight",
    "Текущий вес",
    "Твой текущий вес в килограммах?",
    "Вес укажи числом от 30 до 300 кг.",
    "кг"
  ),
  targetWeight: numberField(
    "targetWeight",
    "Желаемый вес",
    "Желаемый вес в килограммах?",
    "Желаемый вес укажи числом от 30 до 300 кг.",
    "кг"
  ),
  restrictions: {
    title: "Ограничения",
    question: () =>
      "Есть ли ограничения по здоровью, травмы или ограничения по инвентарю? Если нет, так и напиши.",
    parse: (input) => {
      const r = validate(ProfileParamSchemas.restrictions, input);
      if (!r.success) {
        throw new ValidationError("restrictions", "Опиши ограничения короче (до 500 символов) или напиши «нет».");
      }
      return r.data;
    },
    format: (value) => value,
  },
  frequency: numberField(
    "frequency",
    "Тренировок в неделю",
    "Сколько раз в неделю можешь посещать тренажёрный зал? (от 1 до 7)",
    "Укажи целое число от 1 до 7.",
    ""
  ),
  experience: choiceField(
    "experience",
    EXPERIENCE_CHOICES,
    "Уровень подготовки",
    () => "Выбери свой уровень подготовки:",
    "Пожалуйста, выбери уровень кнопкой ниже."
  ),
  muscleEmphasis: choiceField(
    "muscleEmphasis",
    MUSCLE_FOCUS_CHOICES,
    "Акцент на мышцы",
    () => "На какие мышцы сделать акцент в программах?",
    "Пожалуйста, выбери группу мышц кнопкой ниже."
  ),
};

/** Parses and validates one answer; throws ValidationError with a user-facing message. */
export function parseFieldAnswer<K extends QuestionnaireField>(field: K, input: string): ProfileParams[K] {
  const def: FieldDef<K> = FIELD_DEFS[field];
  return def.parse(input);
}

export function formatFieldValue<K extends QuestionnaireField>(field: K, value: ProfileParams[K]): string {
  const def: FieldDef<K> = FIELD_DEFS[field];
  return def.format(value);
}

export function nextStage(stage: QuestionnaireField): QuestionnaireStage {
  const idx = QUESTIONNAIRE_FIELDS.indexOf(stage);
  return QUESTIONNAIRE_FIELDS[idx + 1] ?? "complete";
}

const FIELD_ALIASES: Record<string, QuestionnaireField> = {
  name: "name",
  имя: "name",
  goal: "goal",
  цель: "goal",
  sex: "sex",
  пол: "sex",
  age: "age",
  возраст: "age",
  height: "height",
  рост: "height",
  weight: "weight",
  вес: "weight",
  target: "targetWeight",
  targetweight: "targetWeight",
  желаемый: "targetWeight",
  restrictions: "restrictions",
  ограничения: "restrictions",
  frequency: "frequency",
  частота: "frequency",
  level: "experience",
  experience: "experience",
  уровень: "experience",
  emphasis: "muscleEmphasis",
  акцент: "muscleEmphasis",
};

export function resolveFieldAlias(raw: string): QuestionnaireField | null {
  const key = normalizeText(raw);
  return Object.hasOwn(FIELD_ALIASES, key) ? FIELD_ALIASES[key] : null;
}

export const EDITABLE_FIELD_HINT = [
  "имя, пол, возраст, рост, вес, желаемый, ограничения, частота, уровень, акцент",
  "Пример: /set вес 82",
].join("\n");
