// engine/src/pgProfileStore.ts
// Profile documents in Postgres: one JSONB row per user.

import type { SqlClient } from "./db.js";
import { CorruptProfileError } from "./errors.js";
import { debugLog, shortId } from "./log.js";
import { AppError } from "./middleware/errorHandler.js";
import {
  ProfileStore,
  assertUserId,
  emptyProfile,
  isRecord,
  normalizeProfile,
  serializeProfile,
} from "./profileStore.js";
import type { UserProfile } from "./types.js";

export class PgProfileStore extends ProfileStore {
  private readonly db: SqlClient;

  constructor(opts: { db: SqlClient; now?: () => Date }) {
    super(opts);
    this.db = opts.db;
  }

  /** SQL helper: logs in debug mode and wraps driver errors. */
  private async q(text: string, params: unknown[] = []): Promise<unknown[]> {
    const t0 = Date.now();
    try {
      const res = await this.db.query(text, params);
      debugLog("SQL", `ok (${Date.now() - t0}ms, rows=${res.rowCount ?? 0}) ::`, text);
      return res.rows;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error("DB ERROR:", message, { text });
      throw new AppError("Database operation failed", 500, { code: "db_error", cause: err });
    }
  }

  async ensureSchema(): Promise<void> {
    await this.q(`
      CREATE TABLE IF NOT EXISTS user_profiles (
        user_id text PRIMARY KEY,
        data jsonb NOT NULL,
        updated_at timestamptz NOT NULL DEFAULT now()
      );
    `);
    await this.q(`
      CREATE TABLE IF NOT EXISTS user_profiles_corrupt (
        user_id text NOT NULL,
        data text NOT NULL,
        moved_at timestamptz NOT NULL DEFAULT now()
      );
    `);
    console.log("[ProfileStore] user_profiles schema ensured");
  }

  async load(userId: string): Promise<UserProfile> {
    assertUserId(userId);
    const rows = await this.q(`SELECT data FROM user_profiles WHERE user_id = $1`, [userId]);
    const row = rows[0];
    if (row === undefined) return emptyProfile(userId, this.now());
    if (!isRecord(row)) throw new CorruptProfileError(userId, new Error("unexpected row shape"));

    let data: unknown = row.data;
    // a text column or a double-encoded document arrives as a string
    if (typeof data === "string") {
      try {
        data = JSON.parse(data);
      } catch (err) {
        throw new CorruptProfileError(userId, err);
      }
    }
    return normalizeProfile(userId, data, this.now());
  }

  async save(userId: string, profile: UserProfile): Promise<void> {
    assertUserId(userId);
    const body = serializeProfile({ ...profile, userId });
    await this.q(
      `INSERT INTO user_profiles (user_id, data, updated_at)
       VALUES ($1, $2::jsonb, now())
       ON CONFLICT (user_id) DO UPDATE SET data = EXCLUDED.data, updated_at = now()`,
      [userId, body]
    );
    debugLog("ProfileStore", `saved ${shortId(userId)} (${body.length} bytes)`);
  }

  async recoverCorrupt(userId: string): Promise<UserProfile> {
    assertUserId(userId);
    const moved = await this.q(
      `INSERT INTO user_profiles_corrupt (user_id, data, moved_at)
       SELECT user_id, data::text, now() FROM user_profiles WHERE user_id = $1
       RETURNING user_id`,
      [userId]
    );
    if (moved.length) console.warn(`[ProfileStore] corrupt profile ${shortId(userId)} copied to user_profiles_corrupt`);
    const fresh = emptyProfile(userId, this.now());
    await this.save(userId, fresh);
    return fresh;
  }
}
