import { DbClient } from "@chirp/db";
import { MediaStorage } from "../mediaStorage.js";
import { createFollowService } from "./follows.js";
import { createLikeService } from "./likes.js";
import { createMediaService } from "./media.js";
import { createProfileService } from "./profiles.js";
import { createTweetService } from "./tweets.js";

export const createServices = (deps: { db: DbClient; storage: MediaStorage }) => ({
  tweets: createTweetService(deps),
  likes: createLikeService(deps),
  follows: createFollowService(deps),
  media: createMediaService(deps),
  profiles: createProfileService(deps)
});

export type FeedServices = ReturnType<typeof createServices>;
