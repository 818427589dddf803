import { DbClient, MediaRow } from "@chirp/db";
import { err, ok, Result } from "@chirp/shared";
import { FeedUser } from "../identity.js";
import { log } from "../log.js";
import { MediaStorage, sanitizeFilename } from "../mediaStorage.js";

export type MediaUpload = {
  filename: string | undefined;
  content: Buffer;
  /** Set when the multipart parser stopped reading at its size limit. */
  truncated: boolean;
};

export const createMediaService = (deps: { db: DbClient; storage: MediaStorage }) => {
  const { db, storage } = deps;

  /**
   * A missing filename reports `file_missing` (a not-found code). The file is
   * written before the row; a crash in between leaves an unreferenced file.
   */
  const upload = async (
    owner: FeedUser,
    input: MediaUpload
  ): Promise<Result<{ mediaId: number }, "file_missing" | "file_too_large">> => {
    const filename = sanitizeFilename(input.filename ?? "");
    if (!filename) return err("file_missing");
    if (input.truncated || input.content.length > storage.maxUploadBytes) {
      return err("file_too_large");
    }

    const storedPath = await storage.store({ ownerId: owner.id, filename, content: input.content });
    const [inserted] = await db<MediaRow>("medias")
      .insert({ path_file: storedPath, user_id: owner.id })
      .returning("id");
    if (!inserted) {
      throw new Error("media_insert_returned_nothing");
    }
    log.info("media.stored", { userId: owner.id, mediaId: inserted.id, bytes: input.content.length });
    return ok({ mediaId: Number(inserted.id) });
  };

  return { upload };
};
