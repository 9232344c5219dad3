/**
 * Cursor Installer Engine — Launcher
 *
 * Stops instances of the installed executable that belong to the current
 * user, waits for them to exit, then starts the new one detached from this
 * terminal. Processes of other users are never signalled.
 */

import { spawn } from "child_process";
import type { Logger } from "./utils/logger";
import { runCommand, type CommandRunner } from "./utils/command";
import { sleep, type Sleep } from "./utils/retry";
import { errorMessage } from "./errors";

export interface ProcessEntry {
  pid: number;
  uid: number;
  args: string;
}

/**
 * Parse `ps -eo pid=,uid=,args=` output.
 */
export function parseProcessList(output: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of output.split("\n")) {
    const match = line.trim().match(/^(\d+)\s+(\d+)\s+(.*)$/);
    if (!match) continue;
    entries.push({
      pid: parseInt(match[1], 10),
      uid: parseInt(match[2], 10),
      args: match[3],
    });
  }
  return entries;
}

export interface InstanceFilter {
  uid: number;
  executablePath: string;
  /** Our own pid, never matched */
  selfPid: number;
}

export function findRunningInstances(
  processes: ProcessEntry[],
  filter: InstanceFilter,
): number[] {
  return processes
    .filter(
      (p) =>
        p.uid === filter.uid &&
        p.pid !== filter.selfPid &&
        p.args.includes(filter.executablePath),
    )
    .map((p) => p.pid);
}

/** `process.kill` shape; signal 0 only probes whether the pid exists */
export type Signaller = (pid: number, signal: NodeJS.Signals | 0) => void;

export interface TerminateOptions {
  executablePath: string;
  logger: Logger;
  runner?: CommandRunner;
  signal?: Signaller;
  sleep?: Sleep;
  uid?: number;
  /** How long to wait for signalled instances to exit */
  exitTimeoutMs?: number;
  pollIntervalMs?: number;
}

export const DEFAULT_EXIT_TIMEOUT_MS = 5000;
export const DEFAULT_POLL_INTERVAL_MS = 250;

export function isRunning(pid: number, signal: Signaller): boolean {
  try {
    signal(pid, 0);
    return true;
  } catch (err: unknown) {
    // EPERM: the pid exists but belongs to someone else
    return err instanceof Error && "code" in err && err.code === "EPERM";
  }
}

export interface WaitForExitOptions {
  signal: Signaller;
  sleep: Sleep;
  timeoutMs: number;
  pollIntervalMs: number;
}

/**
 * Poll until every pid has exited or the timeout passes. Returns the pids
 * still running.
 */
export async function waitForExit(
  pids: number[],
  opts: WaitForExitOptions,
): Promise<number[]> {
  let remaining = pids.filter((pid) => isRunning(pid, opts.signal));
  let waited = 0;

  while (remaining.length > 0 && waited < opts.timeoutMs) {
    await opts.sleep(opts.pollIntervalMs);
    waited += opts.pollIntervalMs;
    remaining = remaining.filter((pid) => isRunning(pid, opts.signal));
  }
  return remaining;
}

function currentUid(): number {
  if (typeof process.getuid !== "function") {
    throw new Error("Cannot determine the current user id on this platform");
  }
  return process.getuid();
}

/**
 * SIGTERM every matching instance and wait for them to exit, so the new
 * launch does not hand off to a dying single-instance lock holder. Returns
 * the pids that were signalled. Finding nothing, or a process exiting
 * first, is not an error.
 */
export async function terminateInstances(opts: TerminateOptions): Promise<number[]> {
  const { logger } = opts;
  const runner = opts.runner ?? runCommand;
  const signal: Signaller =
    opts.signal ?? ((pid, sig) => void process.kill(pid, sig));

  const { stdout } = await runner("ps", ["-eo", "pid=,uid=,args="]);
  const pids = findRunningInstances(parseProcessList(stdout), {
    uid: opts.uid ?? currentUid(),
    executablePath: opts.executablePath,
    selfPid: process.pid,
  });

  const signalled: number[] = [];
  for (const pid of pids) {
    try {
      signal(pid, "SIGTERM");
      signalled.push(pid);
    } catch (err: unknown) {
      logger.debug({ pid, error: errorMessage(err) }, "Process already gone");
    }
  }

  const lingering = await waitForExit(signalled, {
    signal,
    sleep: opts.sleep ?? sleep,
    timeoutMs: opts.exitTimeoutMs ?? DEFAULT_EXIT_TIMEOUT_MS,
    pollIntervalMs: opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
  });
  if (lingering.length > 0) {
    logger.warn({ pids: lingering }, "Instances still running after SIGTERM");
  }

  logger.info({ count: signalled.length, pids: signalled }, "Closed running instances");
  return signalled;
}

/**
 * Start the executable detached with its launch flags. Resolves once the
 * process has spawned.
 */
export function launchApp(
  executablePath: string,
  flags: string[],
  logger: Logger,
): Promise<number | undefined> {
  return new Promise((resolve, reject) => {
    const child = spawn(executablePath, flags, {
      detached: true,
      stdio: "ignore",
    });

    child.once("error", (err) => {
      reject(new Error(`Failed to launch ${executablePath}: ${err.message}`));
    });

    child.once("spawn", () => {
      child.unref();
      logger.info({ pid: child.pid, path: executablePath }, "Application launched");
      resolve(child.pid);
    });
  });
}
