import dotenv from "dotenv";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createDb, closeDb, UserRow } from "../packages/db/src/index.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "..");

dotenv.config({ path: path.join(repoRoot, ".env") });

const seedFileSchema = z.object({
  users: z.array(
    z.object({
      name: z.string().trim().min(1).max(50),
      api_key: z.string().min(1)
    })
  )
});

const databaseUrl = process.env.DATABASE_URL;
if (!databaseUrl) {
  throw new Error("missing_required_envs:DATABASE_URL");
}

// Users are provisioned here; the service itself has no signup.
const run = async () => {
  const seedPath = process.argv[2] ?? path.join(__dirname, "seed-users.json");
  const seed = seedFileSchema.parse(JSON.parse(await readFile(seedPath, "utf8")));
  const db = createDb(databaseUrl);
  try {
    const inserted = await db<UserRow>("users")
      .insert(seed.users)
      .onConflict("name")
      .ignore()
      .returning("id");
    console.log(`seeded_users:${inserted.length}`);
  } finally {
    await closeDb(db);
  }
};

run().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
