export type RankableLike = { userId: number };

export type RankableTweet = { likes: readonly RankableLike[] };

/** Viewer id plus every id the viewer follows. */
export const buildRelevantUserSet = (viewerId: number, followedIds: Iterable<number>) => {
  const relevant = new Set<number>(followedIds);
  relevant.add(viewerId);
  return relevant;
};

type RankKey = { boosted: boolean; likeCount: number };

const rankKey = (tweet: RankableTweet, relevantUserIds: ReadonlySet<number>): RankKey => ({
  boosted: tweet.likes.some((like) => relevantUserIds.has(like.userId)),
  likeCount: tweet.likes.length
});

/**
 * Orders tweets liked by the viewer or someone they follow first, then by total
 * like count, both descending. Ties keep the input order (Array#sort is
 * stable), and the input array is left untouched.
 */
export const rankFeed = <T extends RankableTweet>(
  tweets: readonly T[],
  relevantUserIds: ReadonlySet<number>
): T[] => {
  const keyed = tweets.map((tweet) => ({ tweet, key: rankKey(tweet, relevantUserIds) }));
  keyed.sort((a, b) => {
    if (a.key.boosted !== b.key.boosted) {
      return a.key.boosted ? -1 : 1;
    }
    return b.key.likeCount - a.key.likeCount;
  });
  return keyed.map((entry) => entry.tweet);
};
