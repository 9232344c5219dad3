/**
 * Cursor Installer CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import Table from "cli-table3";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  version: chalk.cyan,
  muted: chalk.gray,
};

// ─── Symbols ────────────────────────────────────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Stage Output ───────────────────────────────────────────

/**
 *   ✔ Checked environment
 *   ✔ Downloaded AppImage
 */
export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageWarn(msg: string): void {
  console.log(`  ${symbols.warn}  ${msg}`);
}

export function printStageInfo(msg: string): void {
  console.log(`  ${symbols.info} ${colors.dim(msg)}`);
}

export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

/**
 * Two-column key/value table used for the run summary.
 */
export function printKeyValueTable(rows: [string, string][]): void {
  const table = new Table({
    style: { head: [], border: ["gray"] },
    wordWrap: false,
  });
  for (const [key, value] of rows) {
    table.push([chalk.bold.cyan(key), value]);
  }
  console.log(table.toString());
}

// ─── State Badge ────────────────────────────────────────────

const STATE_COLORS: Record<string, chalk.Chalk> = {
  PENDING: chalk.gray,
  CHECKING: chalk.cyan,
  DEPENDENCIES: chalk.cyan,
  CONFIGURING: chalk.cyan,
  RESOLVING: chalk.cyan,
  DOWNLOADING: chalk.blue,
  VERIFYING: chalk.blue,
  INSTALLING: chalk.yellow,
  REGISTERING: chalk.yellow,
  LAUNCHING: chalk.magenta,
  UP_TO_DATE: chalk.green,
  COMPLETED: chalk.green,
  FAILED: chalk.red,
};

/** Human-friendly state labels */
const STATE_LABELS: Record<string, string> = {
  PENDING: "Starting",
  CHECKING: "Checking environment",
  DEPENDENCIES: "Checking modules",
  CONFIGURING: "Configuring GPU compatibility",
  RESOLVING: "Resolving release",
  DOWNLOADING: "Downloading",
  VERIFYING: "Verifying",
  INSTALLING: "Installing",
  REGISTERING: "Registering desktop entry",
  LAUNCHING: "Launching",
  UP_TO_DATE: "Up to date",
  COMPLETED: "Done",
  FAILED: "Failed",
};

export function formatState(state: string): string {
  const colorFn = STATE_COLORS[state] || chalk.white;
  return colorFn(STATE_LABELS[state] || state);
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<string, string> = {
  ENVIRONMENT_ERROR: "Unsupported runtime environment",
  DEPENDENCY_ERROR: "Required module unavailable",
  NETWORK_ERROR: "Release API unreachable",
  PARSE_ERROR: "Unexpected release API response",
  DOWNLOAD_ERROR: "Download failed",
  INTEGRITY_ERROR: "File integrity check failed",
  FILESYSTEM_ERROR: "Could not write installation files",
};

export function formatErrorCategory(category: string): string {
  return ERROR_LABELS[category] || category;
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(
    Math.floor(Math.log(bytes) / Math.log(1024)),
    units.length - 1,
  );
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
