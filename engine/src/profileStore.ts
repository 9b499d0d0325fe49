// engine/src/profileStore.ts
// Persistent per-user profile: normalization, targeted mutations, file backend.

import { promises as fs } from "node:fs";
import path from "node:path";
import { CorruptProfileError } from "./errors.js";
import { AppError } from "./middleware/errorHandler.js";
import { debugLog, shortId } from "./log.js";
import { FIELD_DEFS, MUSCLE_FOCUS_CHOICES, formatFieldValue } from "./questionnaire.js";
import { STYLE_CHOICES } from "./promptBuilder.js";
import {
  QUESTIONNAIRE_FIELDS,
  type Goal,
  type ProfileParams,
  type QuestionnaireField,
  type QuestionnaireStage,
  type UserProfile,
} from "./types.js";
import { StoredProfileSchema, parseProgramEntries } from "./validation.js";

const USER_ID_RE = /^[A-Za-z0-9_-]{1,64}$/;

export function assertUserId(userId: string): void {
  if (!USER_ID_RE.test(userId)) {
    throw new AppError("Invalid user id", 400, { code: "invalid_user_id" });
  }
}

export function emptyProfile(userId: string, now: Date): UserProfile {
  return {
    schemaVersion: 1,
    userId,
    name: null,
    sex: null,
    age: null,
    height: null,
    weight: null,
    targetWeight: null,
    restrictions: null,
    frequency: null,
    experience: null,
    muscleEmphasis: null,
    goal: null,
    questionnaireStage: "name",
    session: { kind: "ready" },
    programs: [],
    programsUnparsed: [],
    lastGenerationAt: null,
    pendingGeneration: null,
    createdAt: now.toISOString(),
  };
}

// ----------------------------------------------------------------------------
// Legacy records (flat `physical_data` document written by the first bot version)
// ----------------------------------------------------------------------------

type LegacyDoc = Record<string, unknown>;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function legacyNumber(v: unknown): number | null {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v !== "string") return null;
  const m = v.match(/-?\d+(?:[.,]\d+)?/);
  return m ? Number(m[0].replace(",", ".")) : null;
}

function legacyText(v: unknown): string | null {
  return typeof v === "string" && v.trim() ? v.trim() : null;
}

function legacyMap<V extends string>(v: unknown, table: Array<[string, V]>): V | null {
  const s = typeof v === "string" ? v.toLowerCase() : "";
  if (!s) return null;
  for (const [needle, value] of table) if (s.includes(needle)) return value;
  return null;
}

function migrateLegacy(doc: LegacyDoc, now: Date): LegacyDoc {
  const pd = isRecord(doc.physical_data) ? doc.physical_data : {};
  const rawPrograms = Array.isArray(doc.programs) ? doc.programs : [];
  // the old format kept bare strings, oldest first
  const programs = rawPrograms
    .filter((p): p is string => typeof p === "string" && p.trim() !== "")
    .reverse()
    .map((text) => ({
      createdAt: now.toISOString(),
      muscleFocus: "full_body",
      requestedStyle: "basic",
      style: "basic",
      text,
    }));
  const age = legacyNumber(pd.age);
  const frequency = legacyNumber(pd.schedule ?? doc.schedule);
  return {
    name: legacyText(pd.name),
    sex: legacyMap(pd.gender, [
      ["жен", "female"],
      ["муж", "male"],
    ]),
    age: age != null ? Math.round(age) : null,
    height: legacyNumber(pd.height),
    weight: legacyNumber(pd.weight),
    targetWeight: legacyNumber(pd.goal),
    restrictions: legacyText(pd.restrictions),
    frequency: frequency != null ? Math.round(frequency) : null,
    experience: legacyMap(pd.level ?? doc.level, [
      ["начина", "beginner"],
      ["опыт", "intermediate"],
    ]),
    goal: legacyMap(pd.target ?? doc.target, [
      ["похуд", "lose_weight"],
      ["мас", "build_muscle"],
      ["форм", "maintain"],
    ]),
    // the real stage is re-derived from the first unanswered field
    questionnaireStage: "complete",
    programs,
    programsUnparsed: rawPrograms.filter((p) => typeof p !== "string"),
  };
}

function firstMissingField(p: UserProfile): QuestionnaireField | null {
  for (const field of QUESTIONNAIRE_FIELDS) {
    if (p[field] == null) return field;
  }
  return null;
}

/** Stage can never point past an unanswered field. */
function consistentStage(p: UserProfile): QuestionnaireStage {
  const missing = firstMissingField(p);
  if (missing == null) return p.questionnaireStage;
  if (p.questionnaireStage === "complete") return missing;
  const storedIdx = QUESTIONNAIRE_FIELDS.indexOf(p.questionnaireStage);
  const missingIdx = QUESTIONNAIRE_FIELDS.indexOf(missing);
  return missingIdx < storedIdx ? missing : p.questionnaireStage;
}

/**
 * Turns any parsed JSON document into a well-formed profile with a fixed key order,
 * so that load → save reproduces the stored bytes.
 */
export function normalizeProfile(userId: string, raw: unknown, now: Date): UserProfile {
  if (!isRecord(raw)) throw new CorruptProfileError(userId, new Error("profile document is not an object"));
  const doc = "physical_data" in raw && !("questionnaireStage" in raw) ? migrateLegacy(raw, now) : raw;
  const parsed = StoredProfileSchema.parse(doc);
  const history = parseProgramEntries(parsed.programs);
  if (history.unparsed.length) {
    console.warn(
      `[ProfileStore] ${history.unparsed.length} unreadable history entries for ${shortId(userId)} kept as stored`
    );
  }
  const profile: UserProfile = {
    schemaVersion: 1,
    userId,
    name: parsed.name,
    sex: parsed.sex,
    age: parsed.age,
    height: parsed.height,
    weight: parsed.weight,
    targetWeight: parsed.targetWeight,
    restrictions: parsed.restrictions,
    frequency: parsed.frequency,
    experience: parsed.experience,
    muscleEmphasis: parsed.muscleEmphasis,
    goal: parsed.goal,
    questionnaireStage: parsed.questionnaireStage,
    session: parsed.session,
    programs: history.programs,
    programsUnparsed: [...parsed.programsUnparsed, ...history.unparsed],
    lastGenerationAt: parsed.lastGenerationAt,
    pendingGeneration: parsed.pendingGeneration,
    createdAt: parsed.createdAt ?? now.toISOString(),
  };
  profile.questionnaireStage = consistentStage(profile);
  if (profile.questionnaireStage !== "complete") profile.session = { kind: "ready" };
  return profile;
}

export function serializeProfile(profile: UserProfile): string {
  return JSON.stringify(normalizeProfile(profile.userId, profile, new Date(profile.createdAt)), null, 2) + "\n";
}

// ----------------------------------------------------------------------------
// Pure mutations
// ----------------------------------------------------------------------------

export function applyParam<K extends QuestionnaireField>(
  profile: UserProfile,
  field: K,
  value: ProfileParams[K]
): UserProfile {
  return { ...profile, [field]: value };
}

/**
 * Clears questionnaire answers and the goal; history survives unless purged.
 * A running generation stays marked so no second one starts before it settles.
 */
export function resetQuestionnaire(profile: UserProfile, opts?: { purgeHistory?: boolean }): UserProfile {
  return {
    ...profile,
    name: null,
    sex: null,
    age: null,
    height: null,
    weight: null,
    targetWeight: null,
    restrictions: null,
    frequency: null,
    experience: null,
    muscleEmphasis: null,
    goal: null,
    questionnaireStage: "name",
    session: { kind: "ready" },
    pendingGeneration: profile.pendingGeneration ? { ...profile.pendingGeneration, discarded: true } : null,
    programs: opts?.purgeHistory ? [] : profile.programs,
    programsUnparsed: opts?.purgeHistory ? [] : profile.programsUnparsed,
  };
}

// ----------------------------------------------------------------------------
// Rendering
// ----------------------------------------------------------------------------

function formatDate(iso: string): string {
  const d = new Date(iso);
  const dd = String(d.getUTCDate()).padStart(2, "0");
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  return `${dd}.${mm}.${d.getUTCFullYear()}`;
}

export function renderProfileText(profile: UserProfile): string {
  const lines = ["👤 Твой профиль"];
  for (const field of QUESTIONNAIRE_FIELDS) {
    const value = profile[field];
    const shown = value == null ? "не указано" : formatFieldValue(field, value);
    lines.push(`${FIELD_DEFS[field].title}: ${shown}`);
  }
  const stage = profile.questionnaireStage;
  lines.push(
    "",
    stage === "complete"
      ? "Анкета заполнена ✅"
      : `Анкета: шаг ${QUESTIONNAIRE_FIELDS.indexOf(stage) + 1} из ${QUESTIONNAIRE_FIELDS.length}`,
    `Сохранённых программ: ${profile.programs.length}`
  );
  return lines.join("\n");
}

export function renderProgramHistory(profile: UserProfile, limit = 5): string {
  if (!profile.programs.length) return "Пока нет сохранённых программ.";
  const lines = [`🗂 Последние программы (${Math.min(limit, profile.programs.length)} из ${profile.programs.length}):`];
  profile.programs.slice(0, limit).forEach((p, i) => {
    const focus = MUSCLE_FOCUS_CHOICES.find((c) => c.value === p.muscleFocus)?.label ?? p.muscleFocus;
    const style = STYLE_CHOICES.find((c) => c.value === p.style)?.label ?? p.style;
    const drawn = p.requestedStyle === "random" ? " (случайный)" : "";
    lines.push(`${i + 1}. ${formatDate(p.createdAt)} — ${focus}, ${style}${drawn}`);
  });
  return lines.join("\n");
}

// ----------------------------------------------------------------------------
// Store contract
// ----------------------------------------------------------------------------

export abstract class ProfileStore {
  protected readonly now: () => Date;

  constructor(opts?: { now?: () => Date }) {
    this.now = opts?.now ?? (() => new Date());
  }

  /** Existing profile or a fresh skeleton; throws CorruptProfileError for unreadable records. */
  abstract load(userId: string): Promise<UserProfile>;

  /** Atomic replace of the stored record. */
  abstract save(userId: string, profile: UserProfile): Promise<void>;

  /** Moves a corrupt record out of the way and stores a fresh profile. */
  abstract recoverCorrupt(userId: string): Promise<UserProfile>;

  async setGoal(userId: string, goal: Goal): Promise<UserProfile> {
    const profile = await this.load(userId);
    const next = { ...profile, goal };
    await this.save(userId, next);
    return next;
  }

  async updateParam<K extends QuestionnaireField>(
    userId: string,
    field: K,
    value: ProfileParams[K]
  ): Promise<UserProfile> {
    const profile = await this.load(userId);
    const next = applyParam(profile, field, value);
    await this.save(userId, next);
    return next;
  }

  async profileText(userId: string): Promise<string> {
    return renderProfileText(await this.load(userId));
  }
}

export class FileProfileStore extends ProfileStore {
  private readonly dir: string;

  constructor(opts: { dir: string; now?: () => Date }) {
    super(opts);
    this.dir = opts.dir;
  }

  private filePath(userId: string): string {
    assertUserId(userId);
    return path.join(this.dir, `${userId}.json`);
  }

  async load(userId: string): Promise<UserProfile> {
    const file = this.filePath(userId);
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (err) {
      if (isNotFound(err)) return emptyProfile(userId, this.now());
      throw new AppError("Profile storage failed", 500, { code: "storage_error", cause: err });
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new CorruptProfileError(userId, err);
    }
    return normalizeProfile(userId, raw, this.now());
  }

  async save(userId: string, profile: UserProfile): Promise<void> {
    const file = this.filePath(userId);
    const tmp = `${file}.tmp`;
    const body = serializeProfile({ ...profile, userId });
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(tmp, body, "utf8");
      await fs.rename(tmp, file);
      debugLog("ProfileStore", `saved ${shortId(userId)} (${body.length} bytes)`);
    } catch (err) {
      await fs.rm(tmp, { force: true }).catch((e: unknown) => console.warn("[ProfileStore] tmp cleanup failed:", e));
      throw new AppError("Profile storage failed", 500, { code: "storage_error", cause: err });
    }
  }

  async recoverCorrupt(userId: string): Promise<UserProfile> {
    const file = this.filePath(userId);
    const aside = `${file}.corrupt-${this.now().getTime()}`;
    try {
      await fs.rename(file, aside);
      console.warn(`[ProfileStore] corrupt profile ${shortId(userId)} moved to ${path.basename(aside)}`);
    } catch (err) {
      if (!isNotFound(err)) throw new AppError("Profile storage failed", 500, { code: "storage_error", cause: err });
    }
    const fresh = emptyProfile(userId, this.now());
    await this.save(userId, fresh);
    return fresh;
  }
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}
