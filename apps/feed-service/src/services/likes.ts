import { DbClient, isUniqueViolation, LikeRow, TweetRow } from "@chirp/db";
import { err, ok, Result } from "@chirp/shared";
import { FeedUser } from "../identity.js";

export const createLikeService = (deps: { db: DbClient }) => {
  const { db } = deps;

  /**
   * No existence check before the insert: the (tweet_id, user_id) primary key
   * rejects a second like, the transaction rolls back, and that rejection is
   * reported as `already_liked`. Two racing requests get one success.
   */
  const like = async (
    user: FeedUser,
    tweetId: number
  ): Promise<Result<true, "tweet_not_found" | "already_liked">> => {
    const tweet = await db<TweetRow>("tweets").select("id").where({ id: tweetId }).first();
    if (!tweet) return err("tweet_not_found");
    try {
      await db.transaction(async (trx) => {
        await trx<LikeRow>("likes").insert({ tweet_id: tweetId, user_id: user.id });
      });
    } catch (error) {
      if (isUniqueViolation(error)) return err("already_liked");
      throw error;
    }
    return ok(true);
  };

  const unlike = async (user: FeedUser, tweetId: number): Promise<Result<true, "like_not_found">> => {
    const deleted = await db<LikeRow>("likes").where({ tweet_id: tweetId, user_id: user.id }).del();
    return deleted > 0 ? ok(true) : err("like_not_found");
  };

  return { like, unlike };
};
