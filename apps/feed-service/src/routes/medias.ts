import { FastifyInstance } from "fastify";
import { DbClient } from "@chirp/db";
import { requireUser } from "../auth.js";
import { recordAction } from "../metrics.js";
import { FeedServices } from "../services/index.js";
import { sendActionFailure } from "./respond.js";

export const registerMediaRoutes = (
  app: FastifyInstance,
  deps: { db: DbClient; services: FeedServices }
) => {
  const { db, services } = deps;

  app.post("/api/medias", async (request, reply) => {
    const user = await requireUser(db, request, reply);
    if (!user) return;
    const part = await request.file();
    if (!part) return sendActionFailure(reply, "media_upload", "file_missing");
    const content = await part.toBuffer();
    const uploaded = await services.media.upload(user, {
      filename: part.filename,
      content,
      truncated: part.file.truncated
    });
    if (!uploaded.ok) return sendActionFailure(reply, "media_upload", uploaded.error);
    recordAction("media_upload", "ok");
    return reply.code(201).send({ result: true, media_id: uploaded.value.mediaId });
  });
};
