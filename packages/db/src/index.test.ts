import { test } from "node:test";
import assert from "node:assert/strict";
import { createDb, closeDb, isUniqueViolation, runMigrations } from "./index.js";

test("unique violation codes from both drivers are recognised", () => {
  assert.equal(isUniqueViolation({ code: "23505" }), true);
  assert.equal(isUniqueViolation({ code: "SQLITE_CONSTRAINT_PRIMARYKEY" }), true);
  assert.equal(isUniqueViolation({ code: "SQLITE_CONSTRAINT_UNIQUE" }), true);
});

test("other errors are not unique violations", () => {
  assert.equal(isUniqueViolation({ code: "23503" }), false);
  assert.equal(isUniqueViolation({ code: 23505 }), false);
  assert.equal(isUniqueViolation(new Error("boom")), false);
  assert.equal(isUniqueViolation(null), false);
  assert.equal(isUniqueViolation("23505"), false);
});

test("composite like key rejects a second insert", async () => {
  const db = createDb({
    client: "better-sqlite3",
    connection: { filename: ":memory:" },
    useNullAsDefault: true
  });
  try {
    await runMigrations(db);
    await db("users").insert({ name: "alice", api_key: "key-alice" });
    const [tweet] = await db("tweets")
      .insert({ user_id: 1, content: "hi", attachments: JSON.stringify([]) })
      .returning("id");
    assert.ok(tweet);
    await db("likes").insert({ tweet_id: 1, user_id: 1 });
    await assert.rejects(db("likes").insert({ tweet_id: 1, user_id: 1 }), (error: unknown) =>
      isUniqueViolation(error)
    );
  } finally {
    await closeDb(db);
  }
});
