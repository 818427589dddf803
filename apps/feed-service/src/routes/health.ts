import { FastifyInstance } from "fastify";
import { DbClient } from "@chirp/db";
import { pingStore } from "../db.js";
import { metrics } from "../metrics.js";

export const registerHealthRoutes = (app: FastifyInstance, deps: { db: DbClient }) => {
  app.get("/healthz", async () => {
    const dbOk = await pingStore(deps.db);
    return { ok: dbOk, db: { ok: dbOk } };
  });

  app.get("/metrics", async (_request, reply) => {
    metrics.setGauge("db_up", {}, (await pingStore(deps.db)) ? 1 : 0);
    reply.header("content-type", "text/plain; version=0.0.4");
    return reply.send(metrics.render());
  });
};
