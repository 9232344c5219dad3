#!/usr/bin/env node

/**
 * Cursor Installer CLI — Entry Point
 *
 * Installs and updates the Cursor AppImage under ~/Applications/cursor,
 * with a desktop entry and a software-rendering GPU workaround.
 *
 *   cursor-installer [options]     Install or update, then launch
 */

import { Command } from "commander";
import { INSTALLER_VERSION } from "../../engine/src";
import { registerInstallAction } from "./commands/install";

const program = new Command();

program
  .name("cursor-installer")
  .description("Install and update the Cursor AppImage on Linux")
  .version(INSTALLER_VERSION);

registerInstallAction(program);

// Parse command line
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
