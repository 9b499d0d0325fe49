// engine/src/db.ts
import pg from "pg";
import { parse as parsePg } from "pg-connection-string";

const { Pool } = pg;

/** The part of a pg pool the stores use; tests pass an in-memory stand-in. */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export type PgHandle = { client: SqlClient; close: () => Promise<void> };

export function createPgPool(databaseUrl: string, opts?: { nodeEnv?: string }): PgHandle {
  // parse DATABASE_URL ourselves so PG* env vars do not override it
  const cn = parsePg(databaseUrl);
  const resolvedHost = cn.host || "127.0.0.1";
  const isLocalHost = resolvedHost === "127.0.0.1" || resolvedHost === "localhost" || resolvedHost === "::1";

  const pool = new Pool({
    host: resolvedHost,
    port: cn.port ? Number(cn.port) : 5432,
    user: cn.user ?? undefined,
    password: cn.password ?? undefined,
    database: cn.database ?? undefined,
    // managed Postgres requires SSL; local dev Postgres often doesn't
    ssl: isLocalHost ? false : { rejectUnauthorized: false },
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on("connect", () => {
    if (opts?.nodeEnv !== "production") console.log("DB: connected");
  });
  pool.on("error", (err) => {
    console.error("DB: unexpected error", err);
  });

  return {
    client: {
      query: (text, params = []) => pool.query(text, params),
    },
    close: async () => {
      await pool.end();
      if (opts?.nodeEnv !== "production") console.log("DB: pool closed");
    },
  };
}
