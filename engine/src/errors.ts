/**
 * Cursor Installer Engine — Errors
 *
 * Stage functions throw InstallerError; the engine turns it into a
 * FAILED result tagged with the stage that was running.
 */

import type { ErrorCategory } from "./types";

export class InstallerError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InstallerError";
    this.category = category;
  }
}

export function isInstallerError(err: unknown): err is InstallerError {
  return err instanceof InstallerError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
