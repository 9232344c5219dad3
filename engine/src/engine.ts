/**
 * Cursor Installer Engine — Main Engine Class
 *
 * Runs the install pipeline once:
 *
 *   PENDING → CHECKING → DEPENDENCIES → CONFIGURING → RESOLVING →
 *     UP_TO_DATE
 *   | DOWNLOADING → VERIFYING → INSTALLING → REGISTERING → [LAUNCHING] →
 *     COMPLETED
 *
 * Any fatal error moves straight to FAILED, tagged with the state that was
 * running. Nothing is rolled back; re-running converges because every
 * write replaces its target atomically.
 *
 * The engine has no UI logic. It reports through its return value and
 * event handlers.
 */

import type {
  EngineEvent,
  EngineEventHandler,
  ErrorCategory,
  ExecutionResult,
  ExecutionState,
  InstallLayout,
  ReleaseInfo,
  SystemProfile,
  UpdateDecision,
} from "./types";
import {
  APP_ID,
  DESKTOP_METADATA,
  GPU_COMPAT_COMMENT,
  GPU_COMPAT_LINE,
  LAUNCH_FLAGS,
  type InstallerConfig,
} from "./config";
import { createLogger, type Logger } from "./utils/logger";
import type { CommandRunner } from "./utils/command";
import type { Sleep } from "./utils/retry";
import type { HttpTransport } from "./http";
import { checkEnvironment, currentSystemProfile } from "./environment";
import { ModuleLoader } from "./dependencies";
import { ensureProfileLine, type ProfileLineStatus } from "./gpu-profile";
import { decideUpdate, fetchReleaseInfo, readInstalledVersion } from "./resolver";
import { downloadToStaging } from "./downloader";
import { installArtifact, installIcon } from "./installer";
import { writeDesktopEntry } from "./desktop-entry";
import { launchApp, terminateInstances, type Signaller } from "./launcher";
import { errorMessage, isInstallerError } from "./errors";

export type AppLauncher = (
  executablePath: string,
  flags: string[],
  logger: Logger,
) => Promise<number | undefined>;

export interface EngineOptions {
  config: InstallerConfig;
  layout: InstallLayout;
  logger?: Logger;
  transport?: HttpTransport;
  runner?: CommandRunner;
  sleep?: Sleep;
  modules?: ModuleLoader;
  systemProfile?: SystemProfile;
  launcher?: AppLauncher;
  signal?: Signaller;
}

export interface RunOptions {
  /** Download even when the installed version matches */
  force?: boolean;
  /** Close running instances and start the new install */
  launch?: boolean;
  /** Reference digest; takes precedence over one published by the API */
  expectedSha256?: string;
}

/** Category for errors that do not carry their own */
const STAGE_CATEGORY: Partial<Record<ExecutionState, ErrorCategory>> = {
  CHECKING: "ENVIRONMENT_ERROR",
  DEPENDENCIES: "DEPENDENCY_ERROR",
  RESOLVING: "NETWORK_ERROR",
  DOWNLOADING: "DOWNLOAD_ERROR",
  VERIFYING: "INTEGRITY_ERROR",
};

export interface RunSummary extends ExecutionResult {
  profile_line?: ProfileLineStatus | "failed";
}

export class CursorInstaller {
  private config: InstallerConfig;
  private layout: InstallLayout;
  private logger: Logger;
  private modules: ModuleLoader;
  private options: EngineOptions;
  private eventHandlers: EngineEventHandler[] = [];

  constructor(options: EngineOptions) {
    this.options = options;
    this.config = options.config;
    this.layout = options.layout;
    this.logger =
      options.logger ?? createLogger({ level: options.config.logLevel });
    this.modules =
      options.modules ??
      new ModuleLoader({
        prefix: options.config.modulePrefix,
        logger: this.logger,
        runner: options.runner,
      });
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this for progress display.
   */
  on(handler: EngineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.debug(
          { event: event.type, error: errorMessage(err) },
          "Event handler threw",
        );
      }
    }
  }

  // ─── Pipeline ────────────────────────────────────────────────

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const { config, layout, logger } = this;
    const startedAt = new Date().toISOString();
    const warnings: string[] = [];
    let state: ExecutionState = "PENDING";
    let release: ReleaseInfo | undefined;
    let decision: UpdateDecision | undefined;
    let installedVersion: string | null = null;
    let profileLine: RunSummary["profile_line"];
    let launched = false;

    const transition = (next: ExecutionState, message?: string) => {
      state = next;
      logger.debug({ state: next, message }, "State transition");
      this.emit({
        type: "state_change",
        timestamp: new Date().toISOString(),
        data: { state: next, message },
      });
    };

    const warn = (message: string) => {
      warnings.push(message);
      logger.warn(message);
      this.emit({
        type: "warning",
        timestamp: new Date().toISOString(),
        data: { message },
      });
    };

    const summary = (
      finalState: RunSummary["final_state"],
    ): RunSummary => ({
      final_state: finalState,
      started_at: startedAt,
      finished_at: new Date().toISOString(),
      release,
      installed_version: installedVersion,
      decision,
      warnings,
      launched,
      profile_line: profileLine,
    });

    transition("PENDING");

    try {
      // ─── CHECKING ───
      transition("CHECKING");
      const report = checkEnvironment(
        this.options.systemProfile ?? currentSystemProfile(),
        config.minNodeVersion,
      );
      report.warnings.forEach(warn);

      // ─── DEPENDENCIES ───
      transition("DEPENDENCIES");
      await this.modules.ensure(config.optionalModules);

      // ─── CONFIGURING ───
      transition("CONFIGURING");
      try {
        profileLine = await ensureProfileLine(
          layout.profileFile,
          GPU_COMPAT_LINE,
          GPU_COMPAT_COMMENT,
          logger,
        );
      } catch (err: unknown) {
        profileLine = "failed";
        warn(`Failed to update ${layout.profileFile}: ${errorMessage(err)}`);
      }

      // ─── RESOLVING ───
      transition("RESOLVING");
      installedVersion = await readInstalledVersion(layout.versionFile);
      release = await fetchReleaseInfo({
        apiUrl: config.apiUrl,
        platform: config.platform,
        releaseTrack: config.releaseTrack,
        userAgent: config.userAgent,
        attempts: config.retries,
        baseDelayMs: config.retryBaseDelayMs,
        timeoutMs: config.requestTimeoutMs,
        logger,
        transport: this.options.transport,
        sleep: this.options.sleep,
      });
      decision = await decideUpdate(layout, release, installedVersion, {
        force: options.force,
        logger,
      });

      if (!decision.needed) {
        installedVersion = decision.installedVersion;
        transition("UP_TO_DATE", `Already up to date (version ${release.version})`);
        return summary("UP_TO_DATE");
      }

      // ─── DOWNLOADING ───
      transition("DOWNLOADING", `Downloading version ${release.version}`);
      const staged = await downloadToStaging({
        url: release.downloadUrl,
        stagingDir: layout.stagingDir,
        filePrefix: APP_ID,
        expectedSha256: options.expectedSha256 ?? release.sha256,
        attempts: config.retries,
        baseDelayMs: config.retryBaseDelayMs,
        timeoutMs: config.downloadTimeoutMs,
        userAgent: config.userAgent,
        onProgress: (progress) => {
          this.emit({
            type: "progress",
            timestamp: new Date().toISOString(),
            data: progress,
          });
        },
        logger,
        transport: this.options.transport,
        sleep: this.options.sleep,
      });

      // ─── VERIFYING ───
      // The digest was compared while streaming; this records the outcome.
      transition(
        "VERIFYING",
        staged.verified
          ? `SHA-256 verified: ${staged.sha256}`
          : `No checksum provided; skipped verification (sha256 ${staged.sha256})`,
      );

      // ─── INSTALLING ───
      transition("INSTALLING");
      await installArtifact(staged.tempPath, layout, release.version, logger);
      installedVersion = release.version;

      const icon = await installIcon({
        layout,
        iconUrls: config.iconUrls,
        attempts: config.iconAttempts,
        baseDelayMs: config.retryBaseDelayMs,
        timeoutMs: config.requestTimeoutMs,
        userAgent: config.userAgent,
        modules: this.modules,
        logger,
        transport: this.options.transport,
        sleep: this.options.sleep,
      });
      icon.warnings.forEach(warn);

      // ─── REGISTERING ───
      transition("REGISTERING");
      await writeDesktopEntry({
        layout,
        meta: DESKTOP_METADATA,
        logger,
        runner: this.options.runner,
      });

      // ─── LAUNCHING ───
      if (options.launch) {
        transition("LAUNCHING");
        launched = await this.launch(warn);
      }

      transition("COMPLETED", `Installed version ${release.version}`);
      return summary("COMPLETED");
    } catch (err: unknown) {
      const category = isInstallerError(err)
        ? err.category
        : (STAGE_CATEGORY[state] ?? "FILESYSTEM_ERROR");
      const failedState = state;
      const message = errorMessage(err);

      logger.error({ state: failedState, category, error: message }, "Installation failed");
      transition("FAILED", message);

      return {
        ...summary("FAILED"),
        error: { category, message, state: failedState },
      };
    }
  }

  /**
   * Close old instances and start the new executable. Failures here are
   * warnings: the install itself already succeeded.
   */
  private async launch(warn: (message: string) => void): Promise<boolean> {
    const { layout, logger } = this;

    try {
      await terminateInstances({
        executablePath: layout.executablePath,
        logger,
        runner: this.options.runner,
        signal: this.options.signal,
        sleep: this.options.sleep,
      });
    } catch (err: unknown) {
      warn(`Failed to close running instances: ${errorMessage(err)}`);
    }

    const launcher = this.options.launcher ?? launchApp;
    try {
      await launcher(layout.executablePath, LAUNCH_FLAGS, logger);
      return true;
    } catch (err: unknown) {
      warn(`Failed to launch: ${errorMessage(err)}`);
      return false;
    }
  }
}
