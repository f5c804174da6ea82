/**
 * Atomic file I/O for the local catalog document
 *
 * Invariants:
 * - Writes are atomic: readers see the old or the new file, never a partial one
 * - Temp files reside in the same directory as the target (same filesystem for rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; a missing file reads as null
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { UnavailableError } from "./errors.js";
import { logger } from "./observability/logger.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Extract a Node.js system error code from an unknown thrown value
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 * @throws UnavailableError if any step fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    await fs.mkdir(dir, { recursive: true });

    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync; some CIFS/FUSE mounts only support a full sync
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // Windows antivirus/indexers hold files briefly
      const code = errorCode(err);
      if ((code === "EPERM" || code === "EACCES" || code === "EBUSY") && process.platform === "win32") {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close_failed", { path: tmp, err_message: String(closeErr) });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.warn("io.temp_cleanup_failed", { path: tmp, err_message: String(unlinkErr) });
      }
    });

    throw new UnavailableError(filePath, "write", { cause: err });
  }
}

/**
 * Best-effort directory fsync so the rename itself is durable
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // EINVAL/ENOTSUP/EBADF: platform has no directory fsync
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("io.dir_fsync_failed", { path: dir, err_message: String(err) });
    }
  }
}

/**
 * Read a whole file as UTF-8
 * @returns File contents, or null if the file does not exist
 * @throws UnavailableError for any other read failure
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new UnavailableError(filePath, "read", { cause: err });
  }
}
