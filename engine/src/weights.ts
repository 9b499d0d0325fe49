// engine/src/weights.ts
// Starting-weight estimates from body weight, appended to exercise lines of a program.

import type { UserProfile } from "./types.js";

export type LiftKey =
  | "squat"
  | "deadlift"
  | "bench"
  | "ohp"
  | "row"
  | "lat_pulldown"
  | "leg_curl"
  | "leg_press";

/** Share of body weight: [novice, experienced]. */
export const BODYWEIGHT_COEFFS: Record<LiftKey, [number, number]> = {
  squat: [0.55, 0.75],
  deadlift: [0.65, 0.9],
  bench: [0.4, 0.65],
  ohp: [0.25, 0.4],
  row: [0.35, 0.55],
  lat_pulldown: [0.25, 0.4],
  leg_curl: [0.2, 0.3],
  leg_press: [0.9, 1.3],
};

type LiftRule = { key: LiftKey; re: RegExp };

const RX = (s: string, flags = "i") => new RegExp(s, flags);

// order matters: "жим ногами" before the generic presses
export const LIFT_RULES: LiftRule[] = [
  { key: "leg_press", re: RX("(жим ногами|leg press)") },
  { key: "squat", re: RX("(присед|squat)") },
  { key: "deadlift", re: RX("(станов|deadlift)") },
  { key: "bench", re: RX("(жим (штанги )?лежа|bench)") },
  { key: "ohp", re: RX("(жим стоя|жим гантелей стоя|армейский|overhead press)") },
  { key: "row", re: RX("(тяга штанги|в наклоне?|barbell row)") },
  { key: "lat_pulldown", re: RX("(верхн|широким хватом|pulldown)") },
  { key: "leg_curl", re: RX("(сгибани|leg curl)") },
];

type EquipmentRule = { id: string; re: RegExp; step: number };

export const EQUIPMENT_RULES: EquipmentRule[] = [
  { id: "dumbbell", re: RX("(гантел|dumbbell)"), step: 1 },
  { id: "machine", re: RX("(блок|тренаж|кросс|machine|cable)"), step: 2.5 },
];

const PLATE_STEP = 2.5;

function normalizeName(name: string): string {
  return name.toLowerCase().replace(/ё/g, "е").replace(/\s+/g, " ").trim();
}

export function liftKey(exerciseName: string): LiftKey | null {
  const n = normalizeName(exerciseName);
  return LIFT_RULES.find((r) => r.re.test(n))?.key ?? null;
}

export function equipmentStep(exerciseName: string): number {
  const n = normalizeName(exerciseName);
  return EQUIPMENT_RULES.find((r) => r.re.test(n))?.step ?? PLATE_STEP;
}

export function roundToStep(x: number, step: number): number {
  if (step <= 0) return x;
  return Math.max(step, Math.round(x / step) * step);
}

function correction(profile: Pick<UserProfile, "sex" | "age" | "goal">): number {
  let k = 1;
  if (profile.sex === "female") k *= 0.8;
  if (profile.age != null && profile.age >= 60) k *= 0.9;
  else if (profile.age != null && profile.age >= 40) k *= 0.95;
  if (profile.goal === "lose_weight") k *= 0.95;
  if (profile.goal === "build_muscle") k *= 1.05;
  return k;
}

type WeightInputs = Pick<UserProfile, "sex" | "age" | "goal" | "weight" | "experience">;

/** Starting weight in kg, rounded to what the equipment allows. */
export function recommendStartWeight(exerciseName: string, profile: WeightInputs): number {
  const step = equipmentStep(exerciseName);
  const key = liftKey(exerciseName);
  const bw = profile.weight ?? 0;

  let w: number;
  if (key && bw > 0) {
    const [novice, experienced] = BODYWEIGHT_COEFFS[key];
    const experiencedLevel = profile.experience === "intermediate" || profile.experience === "advanced";
    w = bw * (experiencedLevel ? experienced : novice);
  } else {
    const dumbbell = /гантел|dumbbell/i.test(exerciseName);
    w = (bw > 0 ? bw : 60) * (dumbbell ? 0.25 : 0.4);
  }
  return roundToStep(w * correction(profile), step);
}

function formatKg(w: number): string {
  return Number.isInteger(w) ? String(w) : String(Math.round(w * 10) / 10);
}

const EXERCISE_LINE = /^\s*-\s*(.+?)\s+—\s+(\d+\s*×\s*\d+(?:–\d+)?)/;

/**
 * Appends ", рекомендация: ~N кг" to exercise lines ("- Name — 3×12 ...")
 * that do not already carry a weight recommendation.
 */
export function annotateWithWeights(text: string, profile: WeightInputs): string {
  return text
    .split("\n")
    .map((line) => {
      const m = line.match(EXERCISE_LINE);
      if (!m) return line;
      const lower = line.toLowerCase();
      if (lower.includes("рекомендац") || lower.includes("рекомендуемый")) return line;
      if (/собственн[а-я]* вес/.test(lower)) return line;
      const name = m[1].replace(/\*+/g, "").trim();
      return `${line}, рекомендация: ~${formatKg(recommendStartWeight(name, profile))} кг`;
    })
    .join("\n");
}
