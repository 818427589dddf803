import { FastifyInstance } from "fastify";
import { z } from "zod";
import { DbClient } from "@chirp/db";
import { requireUser } from "../auth.js";
import { metrics, recordAction } from "../metrics.js";
import { feedBody, successBody } from "../projections.js";
import { FeedServices } from "../services/index.js";
import { idParamsSchema, rowIdSchema, tweetContentSchema } from "./params.js";
import { sendActionFailure } from "./respond.js";

const createTweetSchema = z.object({
  tweet_data: tweetContentSchema,
  tweet_media_ids: z
    .array(rowIdSchema)
    .nullish()
    .transform((value) => value ?? [])
});

export const registerTweetRoutes = (
  app: FastifyInstance,
  deps: { db: DbClient; services: FeedServices }
) => {
  const { db, services } = deps;

  app.get("/api/tweets", async (request, reply) => {
    const user = await requireUser(db, request, reply);
    if (!user) return;
    metrics.incCounter("feed_requests_total");
    const tweets = await services.tweets.feed(user);
    return reply.send(feedBody(tweets));
  });

  app.post("/api/tweets", async (request, reply) => {
    const user = await requireUser(db, request, reply);
    if (!user) return;
    const body = createTweetSchema.parse(request.body ?? {});
    const created = await services.tweets.create(user, {
      content: body.tweet_data,
      mediaIds: body.tweet_media_ids
    });
    if (!created.ok) return sendActionFailure(reply, "tweet_create", created.error);
    recordAction("tweet_create", "ok");
    return reply.code(201).send({ result: true, tweet_id: created.value.tweetId });
  });

  app.delete("/api/tweets/:id", async (request, reply) => {
    const user = await requireUser(db, request, reply);
    if (!user) return;
    const params = idParamsSchema.parse(request.params);
    const removed = await services.tweets.remove(user, params.id);
    if (!removed.ok) return sendActionFailure(reply, "tweet_delete", removed.error);
    recordAction("tweet_delete", "ok");
    return reply.send(successBody());
  });

  app.post("/api/tweets/:id/likes", async (request, reply) => {
    const user = await requireUser(db, request, reply);
    if (!user) return;
    const params = idParamsSchema.parse(request.params);
    const liked = await services.likes.like(user, params.id);
    if (!liked.ok) return sendActionFailure(reply, "like", liked.error);
    recordAction("like", "ok");
    return reply.code(201).send(successBody());
  });

  app.delete("/api/tweets/:id/likes", async (request, reply) => {
    const user = await requireUser(db, request, reply);
    if (!user) return;
    const params = idParamsSchema.parse(request.params);
    const unliked = await services.likes.unlike(user, params.id);
    if (!unliked.ok) return sendActionFailure(reply, "unlike", unliked.error);
    recordAction("unlike", "ok");
    return reply.send(successBody());
  });
};
