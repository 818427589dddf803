import { FeedTweet } from "./services/tweets.js";
import { Profile } from "./services/profiles.js";

export type TweetView = {
  id: number;
  content: string;
  attachments: string[];
  author: { id: number; name: string };
  likes: Array<{ user_id: number; name: string }>;
};

const toTweetView = (tweet: FeedTweet): TweetView => ({
  id: tweet.id,
  content: tweet.content,
  attachments: [...tweet.attachments],
  author: { id: tweet.author.id, name: tweet.author.name },
  likes: tweet.likes.map((like) => ({ user_id: like.userId, name: like.name }))
});

export const feedBody = (tweets: FeedTweet[]) => ({
  result: true as const,
  tweets: tweets.map(toTweetView)
});

export const profileBody = (profile: Profile) => ({
  result: true as const,
  user: {
    id: profile.id,
    name: profile.name,
    followers: profile.followers.map(({ id, name }) => ({ id, name })),
    following: profile.following.map(({ id, name }) => ({ id, name }))
  }
});

export const successBody = () => ({ result: true as const });
