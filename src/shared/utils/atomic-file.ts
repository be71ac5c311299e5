import { randomBytes } from "node:crypto";
import {
  chmodSync,
  closeSync,
  fsyncSync,
  mkdirSync,
  openSync,
  renameSync,
  unlinkSync,
  writeSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";

/** errno code of a thrown fs error ("ENOENT", "EEXIST", …), if any. */
export const errnoCode = (e: unknown): string | undefined =>
  e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined;

/**
 * Create `directory` (and parents) if missing. A directory created here gets
 * exactly `mode`, independent of the process umask; an existing one is left
 * as the operator set it up.
 */
export const ensureDirectorySync = (directory: string, mode: number): void => {
  const created = mkdirSync(directory, { recursive: true, mode });
  if (created !== undefined) {
    chmodSync(directory, mode);
  }
};

/** Flush a directory's entries to disk. */
export const fsyncDirectorySync = (directory: string): void => {
  const fd = openSync(directory, "r");
  try {
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
};

/**
 * Replace `path` with `content` so that readers see either the old or the new
 * file, never a torn one: write a sibling temp file, fsync it, rename over.
 * The parent directory is fsynced after the rename so the new entry survives
 * a crash. Throws the underlying fs error; the temp file is removed on failure.
 */
export const writeFileAtomicSync = (path: string, content: string, mode: number): void => {
  const tmp = join(dirname(path), `.${basename(path)}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`);
  const fd = openSync(tmp, "wx", mode);
  let renamed = false;
  try {
    try {
      writeSync(fd, content);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmp, path);
    renamed = true;
    fsyncDirectorySync(dirname(path));
  } finally {
    if (!renamed) {
      try {
        unlinkSync(tmp);
      } catch (e: unknown) {
        if (errnoCode(e) !== "ENOENT") throw e;
      }
    }
  }
};
