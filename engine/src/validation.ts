// Валидация с использованием zod
import { z } from "zod";
import {
  CONCRETE_STYLES,
  EXPERIENCE_LEVELS,
  GOALS,
  MUSCLE_FOCUSES,
  PROGRAM_STYLES,
  QUESTIONNAIRE_STAGES,
  SEXES,
} from "./types.js";

// Ranges for the questionnaire answers
export const ProfileParamSchemas = {
  name: z.string().trim().min(1).max(80),
  goal: z.enum(GOALS),
  sex: z.enum(SEXES),
  age: z.number().int().min(10).max(100),
  height: z.number().min(100).max(250),
  weight: z.number().min(30).max(300),
  targetWeight: z.number().min(30).max(300),
  restrictions: z.string().trim().min(1).max(500),
  frequency: z.number().int().min(1).max(7),
  experience: z.enum(EXPERIENCE_LEVELS),
  muscleEmphasis: z.enum(MUSCLE_FOCUSES),
} as const;

const isoDate = z.string().refine((s) => !Number.isNaN(Date.parse(s)), "invalid date");

const GeneratedProgramSchema = z.object({
  createdAt: isoDate,
  muscleFocus: z.enum(MUSCLE_FOCUSES),
  requestedStyle: z.enum(PROGRAM_STYLES),
  style: z.enum(CONCRETE_STYLES),
  text: z.string(),
});

const ActiveSessionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("ready") }),
  z.object({ kind: z.literal("awaiting_muscle_focus") }),
  z.object({ kind: z.literal("awaiting_style"), muscleFocus: z.enum(MUSCLE_FOCUSES) }),
  z.object({ kind: z.literal("awaiting_question") }),
]);

const PendingGenerationSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(["program", "question"]),
  startedAt: isoDate,
  discarded: z.boolean().catch(false),
});

/**
 * Persisted profile document. Every field falls back to its default when it is
 * missing or malformed, so older and newer records both load.
 */
export const StoredProfileSchema = z.object({
  schemaVersion: z.literal(1).catch(1),
  userId: z.string().catch(""),
  name: z.string().nullable().catch(null),
  sex: z.enum(SEXES).nullable().catch(null),
  age: z.number().finite().nullable().catch(null),
  height: z.number().finite().nullable().catch(null),
  weight: z.number().finite().nullable().catch(null),
  targetWeight: z.number().finite().nullable().catch(null),
  restrictions: z.string().nullable().catch(null),
  frequency: z.number().int().min(1).max(7).nullable().catch(null),
  experience: z.enum(EXPERIENCE_LEVELS).nullable().catch(null),
  muscleEmphasis: z.enum(MUSCLE_FOCUSES).nullable().catch(null),
  goal: z.enum(GOALS).nullable().catch(null),
  questionnaireStage: z.enum(QUESTIONNAIRE_STAGES).catch("name"),
  session: ActiveSessionSchema.catch({ kind: "ready" }),
  // entries are checked one by one so a single bad entry does not drop the rest
  programs: z.array(z.unknown()).catch([]),
  programsUnparsed: z.array(z.unknown()).catch([]),
  lastGenerationAt: isoDate.nullable().catch(null),
  pendingGeneration: PendingGenerationSchema.nullable().catch(null),
  createdAt: isoDate.nullable().catch(null),
});

export function parseProgramEntries(raw: unknown[]) {
  const programs: z.infer<typeof GeneratedProgramSchema>[] = [];
  const unparsed: unknown[] = [];
  for (const entry of raw) {
    const r = GeneratedProgramSchema.safeParse(entry);
    if (r.success) programs.push(r.data);
    else unparsed.push(entry);
  }
  return { programs, unparsed };
}

// Функция для валидации
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; error: string } {
  const r = schema.safeParse(data);
  if (r.success) return { success: true, data: r.data };
  return {
    success: false,
    error: r.error.errors.map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message)).join("; "),
  };
}
