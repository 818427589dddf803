import { z } from "zod";
import { DbClient, FollowRow, MediaRow, TweetRow, UserRow } from "@chirp/db";
import { err, ok, Result } from "@chirp/shared";
import { FeedUser } from "../identity.js";
import { buildRelevantUserSet, rankFeed } from "../feed/ranking.js";

export type UserSummary = { id: number; name: string };

export type FeedTweet = {
  id: number;
  content: string;
  attachments: string[];
  author: UserSummary;
  likes: Array<{ userId: number; name: string }>;
};

export type CreateTweetInput = {
  content: string;
  mediaIds: number[];
};

type TweetWithAuthor = {
  id: number;
  content: string;
  attachments: unknown;
  author_id: number;
  author_name: string;
};

type LikeWithUser = {
  tweet_id: number;
  user_id: number;
  name: string;
};

const attachmentsSchema = z.array(z.string());

// jsonb comes back parsed from pg and as text from sqlite.
const parseAttachments = (value: unknown) =>
  attachmentsSchema.parse(typeof value === "string" ? JSON.parse(value) : value);

export const createTweetService = (deps: { db: DbClient }) => {
  const { db } = deps;

  const loadTweets = async (): Promise<FeedTweet[]> => {
    const rows = await db("tweets")
      .join("users", "users.id", "tweets.user_id")
      .select<TweetWithAuthor[]>(
        "tweets.id",
        "tweets.content",
        "tweets.attachments",
        "users.id as author_id",
        "users.name as author_name"
      )
      .orderBy("tweets.id", "asc");
    if (rows.length === 0) return [];

    const likes = await db("likes")
      .join("users", "users.id", "likes.user_id")
      .select<LikeWithUser[]>("likes.tweet_id", "likes.user_id", "users.name")
      .orderBy([
        { column: "likes.tweet_id", order: "asc" },
        { column: "likes.user_id", order: "asc" }
      ]);
    const likesByTweet = new Map<number, FeedTweet["likes"]>();
    for (const like of likes) {
      const bucket = likesByTweet.get(like.tweet_id) ?? [];
      bucket.push({ userId: like.user_id, name: like.name });
      likesByTweet.set(like.tweet_id, bucket);
    }

    return rows.map((row) => ({
      id: row.id,
      content: row.content,
      attachments: parseAttachments(row.attachments),
      author: { id: row.author_id, name: row.author_name },
      likes: likesByTweet.get(row.id) ?? []
    }));
  };

  /** Every tweet in the system, ranked for the viewer. */
  const feed = async (viewer: FeedUser): Promise<FeedTweet[]> => {
    const followedIds = await db<FollowRow>("follows")
      .where({ follower_id: viewer.id })
      .pluck("followed_id");
    const tweets = await loadTweets();
    return rankFeed(tweets, buildRelevantUserSet(viewer.id, followedIds));
  };

  /**
   * Attachments are copied from the referenced media rows in the order given;
   * duplicates stay. One unknown id rejects the whole tweet.
   */
  const create = async (
    author: FeedUser,
    input: CreateTweetInput
  ): Promise<Result<{ tweetId: number }, "media_not_found">> => {
    const uniqueIds = Array.from(new Set(input.mediaIds));
    const medias: Array<Pick<MediaRow, "id" | "path_file">> = uniqueIds.length
      ? await db<MediaRow>("medias").select("id", "path_file").whereIn("id", uniqueIds)
      : [];
    const pathById = new Map<number, string>();
    for (const media of medias) {
      pathById.set(media.id, media.path_file);
    }
    const attachments: string[] = [];
    for (const mediaId of input.mediaIds) {
      const stored = pathById.get(mediaId);
      if (stored === undefined) return err("media_not_found");
      attachments.push(stored);
    }

    const [inserted] = await db<TweetRow>("tweets")
      .insert({
        user_id: author.id,
        content: input.content,
        attachments: JSON.stringify(attachments)
      })
      .returning("id");
    if (!inserted) {
      throw new Error("tweet_insert_returned_nothing");
    }
    return ok({ tweetId: Number(inserted.id) });
  };

  /** Ownership is decided by API key. Likes go with the tweet in one transaction. */
  const remove = async (
    caller: FeedUser,
    tweetId: number
  ): Promise<Result<true, "tweet_not_found" | "not_tweet_owner">> => {
    const tweet = await db<TweetRow>("tweets").select("id", "user_id").where({ id: tweetId }).first();
    if (!tweet) return err("tweet_not_found");
    const owner = await db<UserRow>("users").select("api_key").where({ id: tweet.user_id }).first();
    if (!owner || owner.api_key !== caller.api_key) return err("not_tweet_owner");

    await db.transaction(async (trx) => {
      await trx("likes").where({ tweet_id: tweetId }).del();
      await trx("tweets").where({ id: tweetId }).del();
    });
    return ok(true);
  };

  return { feed, create, remove };
};
