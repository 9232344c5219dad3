/**
 * Cursor Installer Engine — GPU Compatibility Profile Line
 *
 * Appends `export LIBGL_ALWAYS_SOFTWARE=1` to the user's shell profile
 * once. Presence is an exact line match; existing lines are never touched.
 * Only new shell sessions pick the variable up. A symlinked profile is
 * written through to its target.
 */

import * as fs from "fs";
import * as path from "path";
import type { Logger } from "./utils/logger";
import { writeFileAtomic } from "./utils/files";

export type ProfileLineStatus = "added" | "present";

export function hasExactLine(content: string, line: string): boolean {
  return content.split(/\r?\n/).some((existing) => existing === line);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Follow symlinks so the atomic rename lands on the real file. A profile
 * that does not exist yet is created at the given path, or at the target
 * of a dangling link.
 */
export async function resolveProfilePath(profileFile: string): Promise<string> {
  try {
    return await fs.promises.realpath(profileFile);
  } catch (err: unknown) {
    if (!isMissing(err)) throw err;
  }

  // Missing file, or a link whose target does not exist yet
  let isLink = false;
  try {
    isLink = (await fs.promises.lstat(profileFile)).isSymbolicLink();
  } catch (err: unknown) {
    if (!isMissing(err)) throw err;
  }
  if (!isLink) return profileFile;
  return path.resolve(path.dirname(profileFile), await fs.promises.readlink(profileFile));
}

export async function ensureProfileLine(
  profileFile: string,
  line: string,
  comment: string,
  logger: Logger,
): Promise<ProfileLineStatus> {
  const target = await resolveProfilePath(profileFile);
  let content = "";
  try {
    content = await fs.promises.readFile(target, "utf-8");
  } catch (err: unknown) {
    if (!isMissing(err)) throw err;
  }

  if (hasExactLine(content, line)) {
    logger.info({ file: profileFile }, "GPU compatibility line already present");
    return "present";
  }

  const separator = content.length === 0 || content.endsWith("\n") ? "" : "\n";
  const appended = `${content}${separator}\n${comment}\n${line}\n`;

  await writeFileAtomic(target, appended);
  logger.info({ file: target, line }, "Added GPU compatibility line");
  return "added";
}
