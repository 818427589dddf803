import { createMetricsRegistry } from "@chirp/shared";

export const metrics = createMetricsRegistry({ service: "feed-service" });

export type FeedAction =
  | "tweet_create"
  | "tweet_delete"
  | "like"
  | "unlike"
  | "follow"
  | "unfollow"
  | "media_upload";

export const recordAction = (action: FeedAction, outcome: string) => {
  metrics.incCounter("feed_action_total", { action, outcome });
};

metrics.incCounter("feed_requests_total", {}, 0);
for (const action of [
  "tweet_create",
  "tweet_delete",
  "like",
  "unlike",
  "follow",
  "unfollow",
  "media_upload"
] satisfies FeedAction[]) {
  metrics.incCounter("feed_action_total", { action, outcome: "ok" }, 0);
}
