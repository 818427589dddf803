import { FastifyReply } from "fastify";
import { errorStatus, FeedErrorCode, makeErrorResponse } from "@chirp/shared";
import { config } from "../config.js";
import { FeedAction, recordAction } from "../metrics.js";

/** The one place an error code turns into a status and a body. */
export const sendFailure = (reply: FastifyReply, code: FeedErrorCode, options: { message?: string } = {}) =>
  reply
    .code(errorStatus(code))
    .send(makeErrorResponse(code, { message: options.message, devMode: config.DEV_MODE }));

export const sendActionFailure = (reply: FastifyReply, action: FeedAction, code: FeedErrorCode) => {
  recordAction(action, code);
  return sendFailure(reply, code);
};
