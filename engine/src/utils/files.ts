/**
 * Cursor Installer Engine — File Helpers
 *
 * Everything the installer writes lands through a temporary sibling and a
 * rename, so a reader never sees a half-written file.
 */

import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import type { Logger } from "./logger";
import { errorMessage } from "../errors";

/**
 * A unique sibling path for staging writes to `target`.
 */
export function tempSiblingPath(target: string): string {
  const suffix = crypto.randomBytes(6).toString("hex");
  return path.join(
    path.dirname(target),
    `.${path.basename(target)}.${suffix}.tmp`,
  );
}

export interface AtomicWriteOptions {
  /** File mode for the new file; defaults to the existing file's mode */
  mode?: number;
}

export async function writeFileAtomic(
  target: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const tmp = tempSiblingPath(target);
  let mode = options.mode;

  if (mode === undefined) {
    try {
      mode = (await fs.promises.stat(target)).mode & 0o777;
    } catch {
      mode = 0o644;
    }
  }

  try {
    await fs.promises.writeFile(tmp, content, { mode });
    await fs.promises.rename(tmp, target);
  } catch (err: unknown) {
    await fs.promises.rm(tmp, { force: true });
    throw err;
  }
}

/**
 * Delete a file if it exists. Failures are logged, not thrown: callers use
 * this on paths that are already failing.
 */
export async function removeFile(filePath: string, logger: Logger): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (err: unknown) {
    logger.warn(
      { path: filePath, error: errorMessage(err) },
      "Failed to remove temporary file",
    );
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
