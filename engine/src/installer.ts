/**
 * Cursor Installer Engine — Install Stage
 *
 * Moves a verified artifact into place and records its version, then
 * fetches the application icon. The version marker is only written once
 * the executable is final, so it never claims an install that did not
 * complete.
 */

import * as fs from "fs";
import type { Logger } from "./utils/logger";
import type { InstallLayout } from "./types";
import type { HttpTransport } from "./http";
import type { Sleep } from "./utils/retry";
import type { ModuleLoader } from "./dependencies";
import { downloadToStaging } from "./downloader";
import { removeFile, writeFileAtomic } from "./utils/files";
import { renderPlaceholderPng, type PngModule } from "./icon";
import { InstallerError, errorMessage } from "./errors";

export const INSTALL_DIR_MODE = 0o700;
export const EXECUTABLE_MODE = 0o755;

export async function installArtifact(
  tempPath: string,
  layout: InstallLayout,
  version: string,
  logger: Logger,
): Promise<void> {
  try {
    fs.mkdirSync(layout.installDir, { recursive: true, mode: INSTALL_DIR_MODE });
    await fs.promises.rename(tempPath, layout.executablePath);
    await fs.promises.chmod(layout.executablePath, EXECUTABLE_MODE);
  } catch (err: unknown) {
    await removeFile(tempPath, logger);
    throw new InstallerError(
      "FILESYSTEM_ERROR",
      `Failed to install AppImage to ${layout.executablePath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  try {
    await writeFileAtomic(layout.versionFile, version, { mode: 0o644 });
  } catch (err: unknown) {
    throw new InstallerError(
      "FILESYSTEM_ERROR",
      `Failed to write version marker ${layout.versionFile}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  logger.info(
    { path: layout.executablePath, version },
    "AppImage installed",
  );
}

export type IconSource = "remote" | "placeholder" | "empty";

export interface IconResult {
  source: IconSource;
  /** URL the icon came from, for remote icons */
  url?: string;
  warnings: string[];
}

export interface InstallIconOptions {
  layout: InstallLayout;
  iconUrls: string[];
  attempts: number;
  baseDelayMs: number;
  timeoutMs: number;
  userAgent: string;
  modules: ModuleLoader;
  logger: Logger;
  transport?: HttpTransport;
  sleep?: Sleep;
}

/**
 * Install the application icon. Never throws: every failure ends in a
 * warning and a fallback icon.
 */
export async function installIcon(opts: InstallIconOptions): Promise<IconResult> {
  const { layout, logger } = opts;
  const warnings: string[] = [];

  try {
    fs.mkdirSync(layout.installDir, { recursive: true, mode: INSTALL_DIR_MODE });
  } catch (err: unknown) {
    const message = `Cannot create ${layout.installDir} for the icon: ${errorMessage(err)}`;
    logger.warn({ error: errorMessage(err) }, message);
    return { source: "empty", warnings: [message] };
  }

  for (const url of opts.iconUrls) {
    let stagedPath: string | undefined;
    try {
      const staged = await downloadToStaging({
        url,
        stagingDir: layout.installDir,
        filePrefix: "icon",
        attempts: opts.attempts,
        baseDelayMs: opts.baseDelayMs,
        timeoutMs: opts.timeoutMs,
        userAgent: opts.userAgent,
        logger,
        transport: opts.transport,
        sleep: opts.sleep,
      });
      stagedPath = staged.tempPath;

      if (staged.bytes === 0) {
        await removeFile(staged.tempPath, logger);
        logger.warn({ url }, "Icon source returned an empty body");
        continue;
      }

      await fs.promises.rename(staged.tempPath, layout.iconPath);
      logger.info({ url, path: layout.iconPath }, "Icon saved");
      return { source: "remote", url, warnings };
    } catch (err: unknown) {
      logger.warn({ url, error: errorMessage(err) }, "Icon download failed");
      if (stagedPath) await removeFile(stagedPath, logger);
    }
  }

  warnings.push("All icon sources failed; falling back to a placeholder icon.");

  try {
    const pngjs = await opts.modules.load<PngModule>("pngjs");
    await writeFileAtomic(layout.iconPath, renderPlaceholderPng(pngjs), {
      mode: 0o644,
    });
    logger.info({ path: layout.iconPath }, "Placeholder icon created");
    return { source: "placeholder", warnings };
  } catch (err: unknown) {
    warnings.push(`Placeholder icon creation failed: ${errorMessage(err)}`);
    logger.warn({ error: errorMessage(err) }, "Placeholder icon creation failed");
  }

  try {
    await writeFileAtomic(layout.iconPath, "", { mode: 0o644 });
  } catch (err: unknown) {
    warnings.push(`Could not write an empty icon file: ${errorMessage(err)}`);
    logger.warn({ error: errorMessage(err) }, "Empty icon write failed");
  }
  return { source: "empty", warnings };
}
