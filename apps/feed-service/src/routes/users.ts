import { FastifyInstance } from "fastify";
import { z } from "zod";
import { DbClient } from "@chirp/db";
import { requireUser } from "../auth.js";
import { recordAction } from "../metrics.js";
import { profileBody, successBody } from "../projections.js";
import { FeedServices } from "../services/index.js";
import { idParamsSchema } from "./params.js";
import { sendActionFailure, sendFailure } from "./respond.js";

export const registerUserRoutes = (
  app: FastifyInstance,
  deps: { db: DbClient; services: FeedServices }
) => {
  const { db, services } = deps;

  app.get("/api/users/me", async (request, reply) => {
    const user = await requireUser(db, request, reply);
    if (!user) return;
    const profile = await services.profiles.describe(user);
    return reply.send(profileBody(profile));
  });

  // Public: no api-key needed to read someone's profile.
  app.get("/api/users/:id", async (request, reply) => {
    const params = idParamsSchema.parse(request.params);
    const profile = await services.profiles.byId(params.id);
    if (!profile.ok) return sendFailure(reply, profile.error);
    return reply.send(profileBody(profile.value));
  });

  app.post("/api/users/:id/follow", async (request, reply) => {
    const user = await requireUser(db, request, reply);
    if (!user) return;
    const params = idParamsSchema.parse(request.params);
    const followed = await services.follows.follow(user, params.id);
    if (!followed.ok) return sendActionFailure(reply, "follow", followed.error);
    recordAction("follow", "ok");
    return reply.code(201).send(successBody());
  });

  app.delete("/api/users/:id/follow", async (request, reply) => {
    const user = await requireUser(db, request, reply);
    if (!user) return;
    const params = idParamsSchema.parse(request.params);
    const unfollowed = await services.follows.unfollow(user, params.id);
    if (!unfollowed.ok) return sendActionFailure(reply, "unfollow", unfollowed.error);
    recordAction("unfollow", "ok");
    return reply.send(successBody());
  });
};
