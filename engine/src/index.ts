/**
 * Cursor Installer Engine — Public API
 *
 * The CLI imports from here, never from internal modules.
 */

// Main engine class
export { CursorInstaller } from "./engine";
export type { EngineOptions, RunOptions, RunSummary, AppLauncher } from "./engine";

// All types
export type {
  SystemProfile,
  ReleaseInfo,
  InstallLayout,
  DesktopEntryMetadata,
  UpdateReason,
  UpdateDecision,
  ExecutionState,
  ErrorCategory,
  ExecutionError,
  ExecutionResult,
  DownloadProgress,
  ProgressCallback,
  EngineEvent,
  EngineEventHandler,
} from "./types";

// Configuration
export {
  INSTALLER_VERSION,
  APP_NAME,
  LAUNCH_FLAGS,
  DESKTOP_METADATA,
  loadConfig,
  resolveLayout,
} from "./config";
export type { InstallerConfig } from "./config";

export { InstallerError, isInstallerError, errorMessage } from "./errors";
export { createLogger, isLogLevel } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";

// Stages (exposed for advanced use / testing)
export { checkEnvironment, currentSystemProfile } from "./environment";
export { ModuleLoader } from "./dependencies";
export { ensureProfileLine, hasExactLine } from "./gpu-profile";
export {
  fetchReleaseInfo,
  parseReleaseInfo,
  decideUpdate,
  readInstalledVersion,
} from "./resolver";
export { downloadToStaging } from "./downloader";
export { computeFileHash, parseSha256 } from "./verifier";
export { installArtifact, installIcon } from "./installer";
export { renderDesktopEntry, writeDesktopEntry } from "./desktop-entry";
export { terminateInstances, launchApp } from "./launcher";
export type { HttpTransport, HttpResponse, HttpRequestOptions } from "./http";
