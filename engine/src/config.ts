/**
 * Cursor Installer Engine — Configuration
 *
 * Fixed application metadata, install paths derived from the home
 * directory, and runtime settings with environment overrides.
 */

import * as path from "path";
import * as os from "os";
import type { DesktopEntryMetadata, InstallLayout } from "./types";
import { isLogLevel, type LogLevel } from "./utils/logger";

export const INSTALLER_VERSION = "1.5.0";

export const APP_ID = "cursor";
export const APP_NAME = "Cursor";

export const LAUNCH_FLAGS = ["--no-sandbox", "--disable-gpu"];

export const GPU_COMPAT_LINE = "export LIBGL_ALWAYS_SOFTWARE=1";
export const GPU_COMPAT_COMMENT = `# ${APP_NAME} GPU compatibility`;

export const DESKTOP_METADATA: DesktopEntryMetadata = {
  name: APP_NAME,
  comment: "AI-first code editor",
  categories: ["Development", "IDE", "TextEditor"],
  keywords: ["code", "editor", "IDE", "AI"],
  mimeTypes: ["text/plain", "inode/directory", "application/x-code-workspace"],
  wmClass: APP_ID,
  launchFlags: LAUNCH_FLAGS,
};

export const ICON_URLS = [
  "https://www.cursor.com/assets/images/logo.png",
  "https://www.cursor.com/favicon.png",
  "https://raw.githubusercontent.com/getcursor/cursor/main/resources/icon.png",
];

/** Modules loaded on demand rather than at startup */
export const OPTIONAL_MODULES = ["pngjs"];

/**
 * Paths the installer owns, all under the user's home directory.
 */
export function resolveLayout(homeDir: string = os.homedir()): InstallLayout {
  const stagingDir = path.join(homeDir, "Applications");
  const installDir = path.join(stagingDir, APP_ID);

  return {
    installDir,
    stagingDir,
    executablePath: path.join(installDir, `${APP_ID}.AppImage`),
    iconPath: path.join(installDir, `${APP_ID}.png`),
    versionFile: path.join(installDir, ".version"),
    desktopFile: path.join(
      homeDir,
      ".local",
      "share",
      "applications",
      `${APP_ID}.desktop`,
    ),
    profileFile: path.join(homeDir, ".profile"),
  };
}

export interface InstallerConfig {
  apiUrl: string;
  platform: string;
  releaseTrack: string;
  userAgent: string;
  /** Total attempts per request, including the first */
  retries: number;
  /** First backoff delay; doubles after each failed attempt */
  retryBaseDelayMs: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  iconUrls: string[];
  iconAttempts: number;
  minNodeVersion: [number, number];
  optionalModules: string[];
  /** npm --prefix used when an optional module has to be installed */
  modulePrefix: string;
  logLevel: LogLevel;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): InstallerConfig {
  const logLevel = env.CURSOR_INSTALLER_LOG_LEVEL;

  return {
    apiUrl: env.CURSOR_INSTALLER_API_URL || "https://www.cursor.com/api/download",
    platform: "linux-x64",
    releaseTrack: env.CURSOR_INSTALLER_TRACK || "stable",
    userAgent: `Cursor-Installer/${INSTALLER_VERSION}`,
    retries: parsePositiveInt(env.CURSOR_INSTALLER_RETRIES, 3),
    retryBaseDelayMs: 2000,
    requestTimeoutMs: 15_000,
    downloadTimeoutMs: 60_000,
    iconUrls: ICON_URLS,
    iconAttempts: 2,
    minNodeVersion: [20, 0],
    optionalModules: OPTIONAL_MODULES,
    modulePrefix: path.join(homeDir, ".local", "share", "cursor-installer"),
    logLevel: logLevel && isLogLevel(logLevel) ? logLevel : "silent",
  };
}
