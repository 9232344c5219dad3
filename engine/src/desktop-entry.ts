/**
 * Cursor Installer Engine — Desktop Entry
 *
 * The .desktop file is owned entirely by the installer: it is rendered
 * from scratch and replaces whatever was there.
 */

import * as fs from "fs";
import * as path from "path";
import type { Logger } from "./utils/logger";
import type { DesktopEntryMetadata, InstallLayout } from "./types";
import { runCommand, type CommandRunner } from "./utils/command";
import { writeFileAtomic } from "./utils/files";
import { InstallerError, errorMessage } from "./errors";

/** Characters that force an Exec argument into double quotes */
const EXEC_RESERVED = /[\s"'\\><~|&;$*?#()`]/;

/**
 * Quote one Exec argument. `%` is doubled so it is not read as a field
 * code. Inside quotes `"`, `` ` ``, `$` and `\` take a backslash, and the
 * key-file string escape then doubles every backslash.
 */
export function quoteExecArg(arg: string): string {
  const literal = arg.replace(/%/g, "%%");
  if (!EXEC_RESERVED.test(literal)) return literal;
  const quoted = `"${literal.replace(/(["`$\\])/g, "\\$1")}"`;
  return quoted.replace(/\\/g, "\\\\");
}

function joinList(values: string[]): string {
  return values.map((v) => `${v};`).join("");
}

export function renderDesktopEntry(
  layout: InstallLayout,
  meta: DesktopEntryMetadata,
): string {
  const exec = [quoteExecArg(layout.executablePath), ...meta.launchFlags].join(" ");

  return [
    "[Desktop Entry]",
    `Name=${meta.name}`,
    `Comment=${meta.comment}`,
    `Exec=${exec}`,
    `Icon=${layout.iconPath}`,
    "Type=Application",
    `Categories=${joinList(meta.categories)}`,
    `Keywords=${joinList(meta.keywords)}`,
    `StartupWMClass=${meta.wmClass}`,
    "Terminal=false",
    `MimeType=${joinList(meta.mimeTypes)}`,
    "",
  ].join("\n");
}

export interface WriteDesktopEntryOptions {
  layout: InstallLayout;
  meta: DesktopEntryMetadata;
  logger: Logger;
  runner?: CommandRunner;
}

export async function writeDesktopEntry(
  opts: WriteDesktopEntryOptions,
): Promise<void> {
  const { layout, logger } = opts;
  const dir = path.dirname(layout.desktopFile);

  try {
    fs.mkdirSync(dir, { recursive: true });
    await writeFileAtomic(
      layout.desktopFile,
      renderDesktopEntry(layout, opts.meta),
      { mode: 0o644 },
    );
  } catch (err: unknown) {
    throw new InstallerError(
      "FILESYSTEM_ERROR",
      `Failed to create desktop entry ${layout.desktopFile}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  logger.info({ path: layout.desktopFile }, "Desktop entry created");

  // Menus pick the entry up without this on most desktops
  const runner = opts.runner ?? runCommand;
  try {
    await runner("update-desktop-database", [dir]);
  } catch (err: unknown) {
    logger.debug(
      { dir, error: errorMessage(err) },
      "update-desktop-database unavailable or failed",
    );
  }
}
