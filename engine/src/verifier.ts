/**
 * Cursor Installer Engine — SHA-256 Checksums
 *
 * Digest helpers shared by the downloader (which hashes while streaming)
 * and the update check (which hashes an already installed executable).
 */

import * as fs from "fs";
import * as crypto from "crypto";
import { InstallerError } from "./errors";

const SHA256_PATTERN = /^[a-f0-9]{64}$/;

export function normalizeSha256(hash: string): string {
  return hash.toLowerCase().trim();
}

/**
 * Normalize a reference digest, rejecting anything that is not 64 hex chars.
 */
export function parseSha256(hash: string): string {
  const normalized = normalizeSha256(hash);
  if (!SHA256_PATTERN.test(normalized)) {
    throw new InstallerError(
      "INTEGRITY_ERROR",
      `Invalid SHA-256 hash format: "${hash}". Expected 64 hex characters.`,
    );
  }
  return normalized;
}

/**
 * Compute the SHA-256 of a file by streaming it.
 */
export async function computeFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(filePath);

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (err) =>
      reject(new Error(`Failed to read file for hashing: ${err.message}`)),
    );
  });
}
