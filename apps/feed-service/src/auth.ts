import { FastifyReply, FastifyRequest } from "fastify";
import { DbClient } from "@chirp/db";
import { makeErrorResponse } from "@chirp/shared";
import { config } from "./config.js";
import { resolveUserByApiKey, FeedUser } from "./identity.js";

const API_KEY_HEADER = "api-key";

const extractApiKey = (request: FastifyRequest): string | undefined => {
  const raw = request.headers[API_KEY_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Resolves the caller from the `api-key` header. Sends 401 and returns
 * undefined when the key is missing or matches no user; callers check
 * `reply.sent` or the return value before continuing.
 */
export const requireUser = async (
  db: DbClient,
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FeedUser | undefined> => {
  const apiKey = extractApiKey(request);
  const user = apiKey ? await resolveUserByApiKey(db, apiKey) : undefined;
  if (!user) {
    await reply.code(401).send(makeErrorResponse("unauthorized", { devMode: config.DEV_MODE }));
    return undefined;
  }
  return user;
};
