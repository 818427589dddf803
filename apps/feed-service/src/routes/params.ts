import { z } from "zod";

const TWEET_MAX_CHARS = 280;

// Ids live in `integer` columns; anything larger never matches a row.
const MAX_ROW_ID = 2_147_483_647;

export const rowIdSchema = z.number().int().positive().max(MAX_ROW_ID);

export const idParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(MAX_ROW_ID)
});

/** Counts code points, so one emoji is one character. */
export const tweetContentSchema = z
  .string()
  .refine((value) => [...value].length <= TWEET_MAX_CHARS, {
    message: `Tweet must be at most ${TWEET_MAX_CHARS} characters`
  });
