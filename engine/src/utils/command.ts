/**
 * Cursor Installer Engine — Subprocess Runner
 *
 * Stages that shell out (npm, ps, update-desktop-database) take a
 * CommandRunner so tests can substitute a fake.
 */

import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
) => Promise<CommandOutput>;

export const runCommand: CommandRunner = async (command, args) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    encoding: "utf8",
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};
