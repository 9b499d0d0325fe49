// engine/src/types.ts
// Shared domain types: profile record, session states, transport events.

export const GOALS = ["lose_weight", "build_muscle", "maintain"] as const;
export type Goal = (typeof GOALS)[number];

export const SEXES = ["female", "male"] as const;
export type Sex = (typeof SEXES)[number];

export const EXPERIENCE_LEVELS = ["beginner", "intermediate", "advanced"] as const;
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export const MUSCLE_FOCUSES = ["full_body", "chest", "back", "legs", "shoulders", "arms", "core"] as const;
export type MuscleFocus = (typeof MUSCLE_FOCUSES)[number];

export const CONCRETE_STYLES = ["basic", "isolation", "strength", "endurance"] as const;
export type ConcreteStyle = (typeof CONCRETE_STYLES)[number];

export const PROGRAM_STYLES = [...CONCRETE_STYLES, "random"] as const;
export type ProgramStyle = (typeof PROGRAM_STYLES)[number];

/** Questionnaire fields in the order they are asked. */
export const QUESTIONNAIRE_FIELDS = [
  "name",
  "goal",
  "sex",
  "age",
  "height",
  "weight",
  "targetWeight",
  "restrictions",
  "frequency",
  "experience",
  "muscleEmphasis",
] as const;
export type QuestionnaireField = (typeof QUESTIONNAIRE_FIELDS)[number];
export const QUESTIONNAIRE_STAGES = [...QUESTIONNAIRE_FIELDS, "complete"] as const;
export type QuestionnaireStage = (typeof QUESTIONNAIRE_STAGES)[number];

/** Typed value of every questionnaire field, as stored on the profile. */
export type ProfileParams = {
  name: string;
  goal: Goal;
  sex: Sex;
  age: number;
  height: number;
  weight: number;
  targetWeight: number;
  restrictions: string;
  frequency: number;
  experience: ExperienceLevel;
  muscleEmphasis: MuscleFocus;
};

export type GeneratedProgram = {
  createdAt: string;
  muscleFocus: MuscleFocus;
  /** What the user picked; "random" when the style was drawn. */
  requestedStyle: ProgramStyle;
  /** Style actually sent to the model. */
  style: ConcreteStyle;
  text: string;
};

export type GenerationKind = "program" | "question";

export type PendingGeneration = {
  id: string;
  kind: GenerationKind;
  startedAt: string;
  /** Set by restart: the call still counts as running, its result is dropped. */
  discarded: boolean;
};

/** Persisted part of the session; onboarding is derived from questionnaireStage. */
export type ActiveSession =
  | { kind: "ready" }
  | { kind: "awaiting_muscle_focus" }
  | { kind: "awaiting_style"; muscleFocus: MuscleFocus }
  | { kind: "awaiting_question" };

export type SessionState = { kind: "onboarding"; stage: QuestionnaireField } | ActiveSession;

export type UserProfile = {
  schemaVersion: 1;
  userId: string;
  name: string | null;
  sex: Sex | null;
  age: number | null;
  height: number | null;
  weight: number | null;
  targetWeight: number | null;
  restrictions: string | null;
  frequency: number | null;
  experience: ExperienceLevel | null;
  muscleEmphasis: MuscleFocus | null;
  goal: Goal | null;
  questionnaireStage: QuestionnaireStage;
  session: ActiveSession;
  /** Most recent first. */
  programs: GeneratedProgram[];
  /** Stored history entries this build cannot read, written back as they were. */
  programsUnparsed: unknown[];
  lastGenerationAt: string | null;
  pendingGeneration: PendingGeneration | null;
  createdAt: string;
};

export type EventKind = "text" | "command" | "menu_selection";

export type InboundEvent = {
  userId: string;
  kind: EventKind;
  /** Raw text, command line without the slash ("set weight 80"), or option id. */
  payload: string;
};

export type MenuOption = {
  id: string;
  label: string;
};

export type OutboundMessage = {
  userId: string;
  text: string;
  options?: MenuOption[];
  /** Generated text may carry Markdown; engine-authored text is plain. */
  markdown?: boolean;
};
