/**
 * Cursor Installer Engine — Launcher Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  findRunningInstances,
  isRunning,
  parseProcessList,
  terminateInstances,
  waitForExit,
  type Signaller,
} from "../src/launcher";
import { fakeRunner, noSleep, silentLogger } from "./helpers";

const EXE = "/home/dev/Applications/cursor/cursor.AppImage";

const PS_OUTPUT = [
  `  101  1000 ${EXE} --no-sandbox --disable-gpu`,
  `  102  1000 /tmp/.mount_cursorX/cursor ${EXE}`,
  `  103  1001 ${EXE} --no-sandbox`,
  "  104  1000 /usr/bin/bash",
  "garbage line",
  "",
].join("\n");

describe("parseProcessList", () => {
  it("parses pid, uid and args", () => {
    expect(parseProcessList(PS_OUTPUT)).toEqual([
      { pid: 101, uid: 1000, args: `${EXE} --no-sandbox --disable-gpu` },
      { pid: 102, uid: 1000, args: `/tmp/.mount_cursorX/cursor ${EXE}` },
      { pid: 103, uid: 1001, args: `${EXE} --no-sandbox` },
      { pid: 104, uid: 1000, args: "/usr/bin/bash" },
    ]);
  });
});

describe("findRunningInstances", () => {
  it("matches only the current user's processes that reference the executable", () => {
    const pids = findRunningInstances(parseProcessList(PS_OUTPUT), {
      uid: 1000,
      executablePath: EXE,
      selfPid: 1,
    });
    expect(pids).toEqual([101, 102]);
  });

  it("never matches its own process", () => {
    const pids = findRunningInstances(parseProcessList(PS_OUTPUT), {
      uid: 1000,
      executablePath: EXE,
      selfPid: 101,
    });
    expect(pids).toEqual([102]);
  });
});

/** In-memory process table: SIGTERM ends a process unless it is stubborn */
function fakeProcesses(running: number[], stubborn: number[] = []) {
  const alive = new Set(running);
  const sent: [number, NodeJS.Signals][] = [];
  const signal: Signaller = (pid, sig) => {
    if (!alive.has(pid)) {
      throw Object.assign(new Error(`kill ${pid} ESRCH`), { code: "ESRCH" });
    }
    if (sig === 0) return;
    sent.push([pid, sig]);
    if (!stubborn.includes(pid)) alive.delete(pid);
  };
  return { signal, sent, alive };
}

describe("isRunning", () => {
  it("is true while the pid answers signal 0", () => {
    expect(isRunning(7, fakeProcesses([7]).signal)).toBe(true);
    expect(isRunning(8, fakeProcesses([7]).signal)).toBe(false);
  });

  it("counts a pid owned by someone else as running", () => {
    const signal: Signaller = () => {
      throw Object.assign(new Error("kill EPERM"), { code: "EPERM" });
    };
    expect(isRunning(1, signal)).toBe(true);
  });
});

describe("terminateInstances", () => {
  function options(signal: Signaller, sleep = noSleep) {
    return {
      executablePath: EXE,
      logger: silentLogger,
      runner: fakeRunner({ ps: { stdout: PS_OUTPUT } }).runner,
      signal,
      sleep,
      uid: 1000,
    };
  }

  it("sends SIGTERM to each match", async () => {
    const { runner, commands } = fakeRunner({ ps: { stdout: PS_OUTPUT } });
    const procs = fakeProcesses([101, 102, 103, 104]);
    const sleep = vi.fn(noSleep);

    const signalled = await terminateInstances({ ...options(procs.signal, sleep), runner });

    expect(commands).toEqual([{ command: "ps", args: ["-eo", "pid=,uid=,args="] }]);
    expect(procs.sent).toEqual([
      [101, "SIGTERM"],
      [102, "SIGTERM"],
    ]);
    expect(signalled).toEqual([101, 102]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("skips processes that already exited", async () => {
    const procs = fakeProcesses([102]);

    expect(await terminateInstances(options(procs.signal))).toEqual([102]);
  });

  it("waits until signalled instances have exited", async () => {
    const procs = fakeProcesses([101, 102], [101]);
    const sleeps: number[] = [];
    const sleep = async (ms: number): Promise<void> => {
      sleeps.push(ms);
      if (sleeps.length === 2) procs.alive.delete(101);
    };

    await terminateInstances(options(procs.signal, sleep));

    expect(sleeps).toEqual([250, 250]);
    expect([...procs.alive]).toEqual([]);
  });

  it("gives up waiting after the exit timeout", async () => {
    const procs = fakeProcesses([101], [101]);
    const sleeps: number[] = [];

    const signalled = await terminateInstances({
      ...options(procs.signal, async (ms) => {
        sleeps.push(ms);
      }),
      exitTimeoutMs: 1000,
      pollIntervalMs: 250,
    });

    expect(signalled).toEqual([101]);
    expect(sleeps).toEqual([250, 250, 250, 250]);
  });

  it("does nothing when no instance runs", async () => {
    const { runner } = fakeRunner({ ps: { stdout: "  104  1000 /usr/bin/bash\n" } });
    const signal = vi.fn();

    expect(
      await terminateInstances({
        executablePath: EXE,
        logger: silentLogger,
        runner,
        signal,
        sleep: noSleep,
        uid: 1000,
      }),
    ).toEqual([]);
    expect(signal).not.toHaveBeenCalled();
  });
});

describe("waitForExit", () => {
  it("returns at once when nothing is running", async () => {
    const sleep = vi.fn(noSleep);
    const remaining = await waitForExit([5, 6], {
      signal: fakeProcesses([]).signal,
      sleep,
      timeoutMs: 1000,
      pollIntervalMs: 100,
    });
    expect(remaining).toEqual([]);
    expect(sleep).not.toHaveBeenCalled();
  });
});
