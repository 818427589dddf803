import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createDb, closeDb, runMigrations, DbClient, UserRow } from "@chirp/db";
import { buildServer } from "../server.js";
import { createMediaStorage } from "../mediaStorage.js";

type SqliteConnection = { pragma: (source: string) => unknown };

export type SeedUser = Pick<UserRow, "name" | "api_key">;

const DEFAULT_USERS: SeedUser[] = [
  { name: "alice", api_key: "key-alice" },
  { name: "bob", api_key: "key-bob" },
  { name: "carol", api_key: "key-carol" }
];

/** In-memory sqlite with the production migrations and foreign keys on. */
export const createTestDb = async () => {
  const db = createDb({
    client: "better-sqlite3",
    connection: { filename: ":memory:" },
    useNullAsDefault: true,
    pool: {
      min: 1,
      max: 1,
      afterCreate: (connection: SqliteConnection, done: (error: Error | null, connection: SqliteConnection) => void) => {
        connection.pragma("foreign_keys = ON");
        done(null, connection);
      }
    }
  });
  await runMigrations(db);
  return db;
};

export const seedUsers = async (db: DbClient, users: SeedUser[] = DEFAULT_USERS) => {
  await db<UserRow>("users").insert(users);
};

/**
 * Server on a fresh database with alice (id 1), bob (id 2) and carol (id 3),
 * and a temporary media directory. `close` tears all of it down.
 */
export const createTestApp = async (
  options: { maxUploadBytes?: number; rateLimitMax?: number } = {}
) => {
  const db = await createTestDb();
  await seedUsers(db);
  const mediaRoot = await mkdtemp(path.join(os.tmpdir(), "feed-media-"));
  const storage = createMediaStorage({
    rootDir: mediaRoot,
    maxUploadBytes: options.maxUploadBytes ?? 1024
  });
  const app = buildServer({ db, storage, rateLimitMax: options.rateLimitMax });
  await app.ready();

  const close = async () => {
    await app.close();
    await closeDb(db);
    await rm(mediaRoot, { recursive: true, force: true });
  };

  return { app, db, mediaRoot, close };
};

export const multipartBody = (input: {
  filename?: string;
  content: string | Buffer;
  field?: string;
  contentType?: string;
}) => {
  const boundary = "----feedtestboundary";
  const disposition =
    input.filename === undefined
      ? `form-data; name="${input.field ?? "file"}"`
      : `form-data; name="${input.field ?? "file"}"; filename="${input.filename}"`;
  const head = Buffer.from(
    `--${boundary}\r\nContent-Disposition: ${disposition}\r\nContent-Type: ${input.contentType ?? "application/octet-stream"}\r\n\r\n`
  );
  const tail = Buffer.from(`\r\n--${boundary}--\r\n`);
  const content = typeof input.content === "string" ? Buffer.from(input.content) : input.content;
  return {
    payload: Buffer.concat([head, content, tail]),
    headers: { "content-type": `multipart/form-data; boundary=${boundary}` }
  };
};
