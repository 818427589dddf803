import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

const MAX_NAME_ATTEMPTS = 10_000;

export type MediaStorage = {
  rootDir: string;
  maxUploadBytes: number;
  store: (input: { ownerId: number; filename: string; content: Buffer }) => Promise<string>;
};

const isAlreadyExists = (error: unknown) =>
  typeof error === "object" && error !== null && "code" in error && error.code === "EEXIST";

/** Drops any directory part a client put into the filename; "" when nothing usable is left. */
export const sanitizeFilename = (filename: string) => {
  const base = path.posix.basename(filename.replace(/\\/g, "/")).trim();
  return base === "." || base === ".." ? "" : base;
};

/** Appends without normalising, so `./images` stays `./images/...`. */
const childPath = (dir: string, name: string) => `${dir.replace(/[\\/]+$/, "")}/${name}`;

/** `pic.jpg` → `pic.jpg`, `pic_1.jpg`, `pic_2.jpg`, … */
export const candidateName = (filename: string, attempt: number) => {
  if (attempt === 0) return filename;
  const extension = path.extname(filename);
  const base = filename.slice(0, filename.length - extension.length);
  return `${base}_${attempt}${extension}`;
};

/**
 * Files live under `<rootDir>/<ownerId>/`. The returned path is the value the
 * media row and tweet attachments carry.
 */
export const createMediaStorage = (options: {
  rootDir: string;
  maxUploadBytes: number;
}): MediaStorage => {
  const store = async (input: { ownerId: number; filename: string; content: Buffer }) => {
    const ownerDir = childPath(options.rootDir, String(input.ownerId));
    await mkdir(ownerDir, { recursive: true });
    const filename = sanitizeFilename(input.filename);
    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt += 1) {
      const target = childPath(ownerDir, candidateName(filename, attempt));
      try {
        // "wx" fails on an existing file, so concurrent uploads never share a name.
        await writeFile(target, input.content, { flag: "wx" });
        return target;
      } catch (error) {
        if (isAlreadyExists(error)) continue;
        throw error;
      }
    }
    throw new Error(`media_name_exhausted:${filename}`);
  };

  return { rootDir: options.rootDir, maxUploadBytes: options.maxUploadBytes, store };
};
