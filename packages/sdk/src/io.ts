/**
 * File I/O for the snapshot and crumb files
 *
 * Invariants:
 * - A reader sees either the old or the new content of a file, never a mix
 * - Temp files live beside their target and are removed when a write fails
 * - Reads are UTF-8; a missing file is FileNotFoundError
 * - Removing a missing file is not an error
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  FileNotFoundError,
  FileReadError,
  FileWriteError,
  FileRemoveError,
  DirectoryError,
  ListFilesError,
} from "./errors.js";
import { logger } from "./observability/logs.js";

/** fsync codes meaning "not supported here" rather than failure */
const UNSUPPORTED_SYNC = new Set(["ENOTSUP", "ENOSYS", "EINVAL", "EBADF"]);

/** rename codes Windows reports while another process briefly holds the file */
const TRANSIENT_RENAME = new Set(["EPERM", "EACCES", "EBUSY"]);

/**
 * Extract the errno code from an unknown thrown value
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Write content to a new file and flush it to disk
 */
async function writeDurably(filePath: string, content: string): Promise<void> {
  const handle = await fs.open(filePath, "wx", 0o600);

  try {
    await handle.writeFile(content, "utf-8");
    await handle.datasync().catch(async (err: unknown) => {
      if (!UNSUPPORTED_SYNC.has(errnoCode(err) ?? "")) {
        throw err;
      }
      await handle.sync();
    });
  } finally {
    await handle.close();
  }
}

async function renameInto(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (err) {
    if (process.platform !== "win32" || !TRANSIENT_RENAME.has(errnoCode(err) ?? "")) {
      throw err;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
    await fs.rename(from, to);
  }
}

/**
 * Replace filePath with content: write a temp file, flush it, rename it over
 * the target, then flush the directory entry
 * @throws {DirectoryError} If the parent directory cannot be created
 * @throws {FileWriteError} If any later step fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  try {
    await writeDurably(tmp, content);
    await renameInto(tmp, filePath);
  } catch (err) {
    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errnoCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.tmp_cleanup_failed", { path: tmp, message: String(unlinkErr) });
      }
    });
    throw new FileWriteError(filePath, { cause: err });
  }

  await syncDirectory(dir);
}

/**
 * Best-effort fsync of a directory so a rename or unlink inside it survives a crash
 */
export async function syncDirectory(dir: string): Promise<void> {
  let handle: fs.FileHandle | undefined;

  try {
    handle = await fs.open(dir, "r");
    await handle.sync();
  } catch (err) {
    if (!UNSUPPORTED_SYNC.has(errnoCode(err) ?? "")) {
      logger.debug("io.dir_fsync_failed", { path: dir, message: String(err) });
    }
  } finally {
    await handle?.close();
  }
}

/**
 * @throws {FileNotFoundError} If the file does not exist
 * @throws {FileReadError} For any other failure
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw errnoCode(err) === "ENOENT"
      ? new FileNotFoundError(filePath, { cause: err })
      : new FileReadError(filePath, { cause: err });
  }
}

export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      throw new FileRemoveError(filePath, { cause: err });
    }
  }
}

/**
 * Names of the regular files in a directory, sorted; a missing directory has none
 * @param extension - Keep only names ending in it (".json" or "json")
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true }).catch((err: unknown) => {
    if (errnoCode(err) === "ENOENT") {
      return [];
    }
    throw new ListFilesError(dirPath, { cause: err });
  });

  const suffix = extension && !extension.startsWith(".") ? `.${extension}` : extension;

  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => !suffix || name.endsWith(suffix))
    .sort();
}
