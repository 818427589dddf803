import { DbClient, FollowRow, isUniqueViolation } from "@chirp/db";
import { err, ok, Result } from "@chirp/shared";
import { FeedUser, findUserById } from "../identity.js";

export const createFollowService = (deps: { db: DbClient }) => {
  const { db } = deps;

  // Same constraint-as-conflict rule as likes, on (follower_id, followed_id).
  const follow = async (
    user: FeedUser,
    targetId: number
  ): Promise<Result<true, "self_follow" | "user_not_found" | "already_following">> => {
    if (targetId === user.id) return err("self_follow");
    const target = await findUserById(db, targetId);
    if (!target) return err("user_not_found");
    try {
      await db.transaction(async (trx) => {
        await trx<FollowRow>("follows").insert({ follower_id: user.id, followed_id: targetId });
      });
    } catch (error) {
      if (isUniqueViolation(error)) return err("already_following");
      throw error;
    }
    return ok(true);
  };

  const unfollow = async (
    user: FeedUser,
    targetId: number
  ): Promise<Result<true, "self_unfollow" | "follow_not_found">> => {
    if (targetId === user.id) return err("self_unfollow");
    const deleted = await db<FollowRow>("follows")
      .where({ follower_id: user.id, followed_id: targetId })
      .del();
    return deleted > 0 ? ok(true) : err("follow_not_found");
  };

  return { follow, unfollow };
};
