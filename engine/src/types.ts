/**
 * Cursor Installer Engine — Core Type Definitions
 *
 * Value records handed from one pipeline stage to the next, plus the
 * result and event shapes the CLI consumes.
 */

// ─── System & Release ────────────────────────────────────────────

export interface SystemProfile {
  /** Node.js version, without the leading "v" */
  nodeVersion: string;
  /** process.platform, e.g. "linux" */
  platform: string;
  /** process.arch, e.g. "x64" */
  arch: string;
}

export interface ReleaseInfo {
  downloadUrl: string;
  version: string;
  commitSha: string;
  /** Reference SHA-256 of the artifact, when the API publishes one */
  sha256?: string;
}

export interface InstallLayout {
  /** ~/Applications/cursor */
  installDir: string;
  /** Parent of installDir; temporary downloads are staged here */
  stagingDir: string;
  executablePath: string;
  iconPath: string;
  /** Single-line marker holding the installed version */
  versionFile: string;
  desktopFile: string;
  profileFile: string;
}

export interface DesktopEntryMetadata {
  name: string;
  comment: string;
  categories: string[];
  keywords: string[];
  mimeTypes: string[];
  wmClass: string;
  launchFlags: string[];
}

// ─── Update Decision ─────────────────────────────────────────────

export type UpdateReason =
  | "not_installed"
  | "executable_missing"
  | "version_changed"
  | "forced";

export type UpdateDecision =
  | { needed: true; reason: UpdateReason; installedVersion: string | null }
  | {
      needed: false;
      reason: "same_version" | "checksum_match";
      installedVersion: string;
    };

// ─── Execution Lifecycle ─────────────────────────────────────────

export type ExecutionState =
  | "PENDING"
  | "CHECKING"
  | "DEPENDENCIES"
  | "CONFIGURING"
  | "RESOLVING"
  | "UP_TO_DATE"
  | "DOWNLOADING"
  | "VERIFYING"
  | "INSTALLING"
  | "REGISTERING"
  | "LAUNCHING"
  | "COMPLETED"
  | "FAILED";

export type ErrorCategory =
  | "ENVIRONMENT_ERROR"
  | "DEPENDENCY_ERROR"
  | "NETWORK_ERROR"
  | "PARSE_ERROR"
  | "DOWNLOAD_ERROR"
  | "INTEGRITY_ERROR"
  | "FILESYSTEM_ERROR";

export interface ExecutionError {
  category: ErrorCategory;
  message: string;
  state: ExecutionState;
}

export interface ExecutionResult {
  final_state: "COMPLETED" | "UP_TO_DATE" | "FAILED";
  started_at: string;
  finished_at: string;
  release?: ReleaseInfo;
  /** Version on disk when the run finished */
  installed_version: string | null;
  decision?: UpdateDecision;
  /** Non-fatal conditions: icon fallback, profile write, launch failure */
  warnings: string[];
  launched: boolean;
  error?: ExecutionError;
}

// ─── Progress ────────────────────────────────────────────────────

export interface DownloadProgress {
  bytes_downloaded: number;
  /** null when the response declares no content-length */
  bytes_total: number | null;
  percent: number | null;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

// ─── Engine Events ───────────────────────────────────────────────

export type EngineEvent =
  | {
      type: "state_change";
      timestamp: string;
      data: { state: ExecutionState; message?: string };
    }
  | {
      type: "progress";
      timestamp: string;
      data: DownloadProgress;
    }
  | {
      type: "warning";
      timestamp: string;
      data: { message: string };
    };

export type EngineEventHandler = (event: EngineEvent) => void;
