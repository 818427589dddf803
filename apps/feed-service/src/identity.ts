import { DbClient, UserRow } from "@chirp/db";

export type FeedUser = Pick<UserRow, "id" | "name" | "api_key">;

// Keys are opaque bearer tokens: exact match, no signature, no expiry.
export const resolveUserByApiKey = async (
  db: DbClient,
  apiKey: string
): Promise<FeedUser | undefined> => {
  if (!apiKey) return undefined;
  return db<UserRow>("users").select("id", "name", "api_key").where({ api_key: apiKey }).first();
};

export const findUserById = async (db: DbClient, userId: number): Promise<FeedUser | undefined> =>
  db<UserRow>("users").select("id", "name", "api_key").where({ id: userId }).first();
