import { DbClient } from "@chirp/db";
import { err, ok, Result } from "@chirp/shared";
import { FeedUser, findUserById } from "../identity.js";
import { UserSummary } from "./tweets.js";

export type Profile = UserSummary & {
  followers: UserSummary[];
  following: UserSummary[];
};

export const createProfileService = (deps: { db: DbClient }) => {
  const { db } = deps;

  const followersOf = (userId: number) =>
    db("follows")
      .join("users", "users.id", "follows.follower_id")
      .where("follows.followed_id", userId)
      .select<UserSummary[]>("users.id", "users.name")
      .orderBy("users.id", "asc");

  const followingOf = (userId: number) =>
    db("follows")
      .join("users", "users.id", "follows.followed_id")
      .where("follows.follower_id", userId)
      .select<UserSummary[]>("users.id", "users.name")
      .orderBy("users.id", "asc");

  const describe = async (user: FeedUser): Promise<Profile> => {
    const [followers, following] = await Promise.all([followersOf(user.id), followingOf(user.id)]);
    return { id: user.id, name: user.name, followers, following };
  };

  const byId = async (userId: number): Promise<Result<Profile, "user_not_found">> => {
    const user = await findUserById(db, userId);
    if (!user) return err("user_not_found");
    return ok(await describe(user));
  };

  return { describe, byId };
};
