/**
 * Cursor Installer CLI — Install Command
 *
 * Installs or updates the Cursor AppImage for the current user. The
 * installer has no subcommands; these options and the action sit on the
 * root program.
 *
 * Usage:
 *   cursor-installer                     Install or update from the stable track
 *   cursor-installer --track latest      Use another release track
 *   cursor-installer --sha256 <hex>      Verify the download against a known digest
 *   cursor-installer --force             Reinstall even when up to date
 *   cursor-installer --no-launch         Do not start Cursor afterwards
 *
 * Output:
 *
 *   Cursor Installer v1.5.0
 *
 *     ✔ Checked environment
 *     ✔ Checked modules
 *     ✔ Configured GPU compatibility
 *     ✔ Resolved release
 *     ✔ Downloaded AppImage
 *     ✔ Checked download integrity
 *     ✔ Installed AppImage
 *     ✔ Registered desktop entry
 *
 *   ✔ Installed Cursor 1.4.5 in 12.3s
 */

import { Command } from "commander";
import {
  CursorInstaller,
  INSTALLER_VERSION,
  APP_NAME,
  loadConfig,
  resolveLayout,
  parseSha256,
  errorMessage,
  type EngineOptions,
  type EngineEvent,
  type ExecutionState,
  type RunSummary,
} from "../../../engine/src";
import {
  printSuccess,
  printError,
  printInfo,
  printHeader,
  printStageSuccess,
  printStageWarn,
  printDetail,
  printBlank,
  printDebug,
  printKeyValueTable,
  setDebugMode,
  isDebugMode,
  createSpinner,
  formatState,
  formatBytes,
  formatDuration,
  formatErrorCategory,
  colors,
} from "../output";

/** Stages the spinner cycles through */
const STAGE_MESSAGES: Partial<Record<ExecutionState, string>> = {
  CHECKING: "Checking environment...",
  DEPENDENCIES: "Checking modules...",
  CONFIGURING: "Configuring GPU compatibility...",
  RESOLVING: "Resolving latest release...",
  DOWNLOADING: "Downloading AppImage...",
  VERIFYING: "Verifying download...",
  INSTALLING: "Installing AppImage...",
  REGISTERING: "Registering desktop entry...",
  LAUNCHING: "Launching Cursor...",
};

/** After each stage completes, print a check-marked line */
const STAGE_DONE: Partial<Record<ExecutionState, string>> = {
  CHECKING: "Checked environment",
  DEPENDENCIES: "Checked modules",
  CONFIGURING: "Configured GPU compatibility",
  RESOLVING: "Resolved release",
  DOWNLOADING: "Downloaded AppImage",
  VERIFYING: "Checked download integrity",
  INSTALLING: "Installed AppImage",
  REGISTERING: "Registered desktop entry",
  LAUNCHING: "Launched Cursor",
};

export interface InstallCommandOptions {
  track?: string;
  sha256?: string;
  force: boolean;
  launch: boolean;
  debug: boolean;
}

/** Overrides for tests: environment, home directory and engine seams */
export interface InstallContext {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  engine?: Omit<Partial<EngineOptions>, "config" | "layout">;
}

/**
 * Run the installer and print its progress. Returns the process exit code.
 */
export async function runInstall(
  opts: InstallCommandOptions,
  context: InstallContext = {},
): Promise<number> {
  setDebugMode(opts.debug);

  let expectedSha256: string | undefined;
  if (opts.sha256 !== undefined) {
    try {
      expectedSha256 = parseSha256(opts.sha256);
    } catch (err: unknown) {
      printError(errorMessage(err));
      return 1;
    }
  }

  const config = loadConfig(context.env, context.homeDir);
  if (opts.track) config.releaseTrack = opts.track;
  if (opts.debug) config.logLevel = "debug";

  const layout = resolveLayout(context.homeDir);
  const engine = new CursorInstaller({ ...context.engine, config, layout });

  printHeader(`Cursor Installer v${INSTALLER_VERSION}`);

  // Wire up progress display
  const spinner = createSpinner("Starting...");
  let lastState: ExecutionState | "" = "";

  engine.on((event: EngineEvent) => {
    if (event.type === "state_change") {
      const { state, message } = event.data;

      // When entering a new stage, mark the previous one as done
      const done = lastState ? STAGE_DONE[lastState] : undefined;
      if (done && state !== "FAILED") {
        spinner.stop();
        printStageSuccess(done);
        spinner.start();
      }
      lastState = state;

      const stageMsg = STAGE_MESSAGES[state];
      if (stageMsg) spinner.text = stageMsg;

      if (message) printDebug(`${state}: ${message}`);
    }

    if (event.type === "progress") {
      const { percent, bytes_downloaded } = event.data;
      spinner.text =
        percent !== null
          ? `Downloading AppImage... ${percent}%`
          : `Downloading AppImage... ${formatBytes(bytes_downloaded)}`;
    }

    if (event.type === "warning") {
      spinner.stop();
      printStageWarn(event.data.message);
      spinner.start();
    }
  });

  spinner.start();
  const startTime = Date.now();

  let result: RunSummary;
  try {
    result = await engine.run({
      force: opts.force,
      // Launch only for interactive runs
      launch: opts.launch && Boolean(process.stdout.isTTY),
      expectedSha256,
    });
  } catch (err: unknown) {
    spinner.stop();
    printBlank();
    printError("Unexpected error during installation");
    if (isDebugMode()) {
      console.error(err);
    } else {
      printDetail("Message", errorMessage(err));
      printInfo(`Use ${colors.bold("--debug")} to see the full stack trace.`);
    }
    return 1;
  }

  spinner.stop();
  const elapsed = Date.now() - startTime;

  if (result.final_state === "UP_TO_DATE") {
    printBlank();
    printSuccess(
      `${colors.app(APP_NAME)} ${colors.version(result.installed_version ?? "")} is already up to date`,
    );
    return 0;
  }

  if (result.final_state === "FAILED") {
    printBlank();
    printError(`Failed to install ${colors.app(APP_NAME)}`);

    if (result.error) {
      printDetail("Reason", formatErrorCategory(result.error.category));
      printDetail("Details", result.error.message);
      printDetail("Stage", formatState(result.error.state));
    }

    if (result.installed_version) {
      printInfo(
        `The existing installation (${result.installed_version}) was left in place.`,
      );
    }
    return 1;
  }

  printBlank();
  printSummary(result, layout.executablePath, elapsed);

  if (result.profile_line === "added") {
    printInfo(
      "LIBGL_ALWAYS_SOFTWARE=1 was added to ~/.profile; log out and back in, or run `source ~/.profile`.",
    );
  }

  printBlank();
  printSuccess(
    `Installed ${colors.app(APP_NAME)} ${colors.version(result.installed_version ?? "")} in ${formatDuration(elapsed)}`,
  );
  return 0;
}

function printSummary(
  result: RunSummary,
  executablePath: string,
  elapsed: number,
): void {
  const rows: [string, string][] = [
    ["Version", result.installed_version ?? "unknown"],
    ["Location", executablePath],
    ["Launched", result.launched ? "yes" : "no"],
    ["Duration", formatDuration(elapsed)],
  ];
  if (result.release?.commitSha) {
    rows.splice(1, 0, ["Commit", result.release.commitSha]);
  }
  printKeyValueTable(rows);
}

export function registerInstallAction(program: Command): void {
  program
    .option("-t, --track <track>", "Release track to install from (default: stable)")
    .option("--sha256 <hash>", "Expected SHA-256 of the AppImage")
    .option("--force", "Reinstall even if the installed version is current", false)
    .option("--no-launch", "Do not start Cursor after installing")
    .option("--debug", "Show structured logs and stage details", false)
    .action(async (opts: InstallCommandOptions) => {
      const code = await runInstall(opts);
      if (code !== 0) process.exit(code);
    });
}
