import knex, { Knex } from "knex";
import * as feedCore from "../migrations/001_feed_core.js";

export type DbClient = Knex;

export type UserRow = {
  id: number;
  name: string;
  api_key: string;
};

export type TweetRow = {
  id: number;
  user_id: number;
  content: string;
  attachments: unknown;
};

export type MediaRow = {
  id: number;
  path_file: string;
  user_id: number;
};

export type LikeRow = {
  tweet_id: number;
  user_id: number;
};

export type FollowRow = {
  follower_id: number;
  followed_id: number;
};

type NamedMigration = { name: string; migration: Knex.Migration };

// Listed explicitly so the same set runs from sources, from dist and in tests.
const migrations: NamedMigration[] = [{ name: "001_feed_core", migration: feedCore }];

const migrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => migrations,
  getMigrationName: (entry) => entry.name,
  getMigration: async (entry) => entry.migration
};

export const createDb = (connection: string | Knex.Config) =>
  typeof connection === "string"
    ? knex({
        client: "pg",
        connection,
        pool: { min: 0, max: 10 }
      })
    : knex(connection);

export const runMigrations = async (db: DbClient) => {
  await db.migrate.latest({ migrationSource });
};

export const closeDb = async (db: DbClient) => {
  await db.destroy();
};

const UNIQUE_VIOLATION_CODES = new Set([
  // PostgreSQL unique_violation
  "23505",
  // better-sqlite3 / sqlite3
  "SQLITE_CONSTRAINT_PRIMARYKEY",
  "SQLITE_CONSTRAINT_UNIQUE"
]);

const getDriverErrorCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const maybeCode = (error as { code?: unknown }).code;
  return typeof maybeCode === "string" ? maybeCode : undefined;
};

/**
 * True when the store rejected a write because of a primary key or unique
 * constraint. Likes and follows are inserted without a prior existence check
 * and this is how "already exists" is detected.
 */
export const isUniqueViolation = (error: unknown) => {
  const code = getDriverErrorCode(error);
  return code !== undefined && UNIQUE_VIOLATION_CODES.has(code);
};
