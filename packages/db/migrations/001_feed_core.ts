import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  // ── Users (provisioned out of band) ─────────────────────────────────
  await knex.schema.createTable("users", (table) => {
    table.increments("id").primary();
    table.string("name", 50).notNullable().unique();
    table.text("api_key").notNullable().unique();
  });

  // ── Tweets ──────────────────────────────────────────────────────────
  await knex.schema.createTable("tweets", (table) => {
    table.increments("id").primary();
    table
      .integer("user_id")
      .notNullable()
      .references("id")
      .inTable("users")
      .onDelete("CASCADE")
      .index();
    table.string("content", 280).notNullable();
    // Snapshot of medias.path_file values, in the order they were referenced.
    table.jsonb("attachments").notNullable();
  });

  await knex.schema.createTable("medias", (table) => {
    table.increments("id").primary();
    table.text("path_file").notNullable();
    table.integer("user_id").notNullable().references("id").inTable("users").onDelete("CASCADE");
  });

  // ── Likes and follows: the composite keys double as duplicate guards ─
  await knex.schema.createTable("likes", (table) => {
    table.integer("tweet_id").notNullable().references("id").inTable("tweets").onDelete("CASCADE");
    table.integer("user_id").notNullable().references("id").inTable("users").onDelete("CASCADE");
    table.primary(["tweet_id", "user_id"]);
  });

  await knex.schema.createTable("follows", (table) => {
    table
      .integer("follower_id")
      .notNullable()
      .references("id")
      .inTable("users")
      .onDelete("CASCADE");
    table
      .integer("followed_id")
      .notNullable()
      .references("id")
      .inTable("users")
      .onDelete("CASCADE")
      .index();
    table.primary(["follower_id", "followed_id"]);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("follows");
  await knex.schema.dropTableIfExists("likes");
  await knex.schema.dropTableIfExists("medias");
  await knex.schema.dropTableIfExists("tweets");
  await knex.schema.dropTableIfExists("users");
}
