/**
 * Cursor Installer Engine — Artifact Downloader
 *
 * Streams a file into the staging directory with progress reporting,
 * hashing the bytes as they pass through. HTTPS only.
 *
 * The staged file is never the final install path. Every failure path
 * removes it, and a digest mismatch is never retried.
 */

import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { Transform } from "stream";
import { pipeline } from "stream/promises";
import type { Logger } from "./utils/logger";
import type { ProgressCallback } from "./types";
import {
  headerValue,
  httpsTransport,
  isSuccessStatus,
  type HttpTransport,
} from "./http";
import { withRetry, type Sleep } from "./utils/retry";
import { removeFile } from "./utils/files";
import { parseSha256 } from "./verifier";
import { InstallerError, errorMessage, isInstallerError } from "./errors";

export interface DownloadOptions {
  url: string;
  /** Directory the temporary file is created in */
  stagingDir: string;
  /** Used to name the temporary file: .<prefix>-<random>.part */
  filePrefix: string;
  /** Reference digest; a mismatch is fatal */
  expectedSha256?: string;
  attempts: number;
  baseDelayMs: number;
  timeoutMs: number;
  userAgent: string;
  onProgress?: ProgressCallback;
  logger: Logger;
  transport?: HttpTransport;
  sleep?: Sleep;
}

export interface StagedDownload {
  tempPath: string;
  sha256: string;
  bytes: number;
  /** Whether sha256 was compared against a reference digest */
  verified: boolean;
  durationMs: number;
}

interface AttemptResult {
  sha256: string;
  bytes: number;
}

function parseContentLength(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

async function streamOnce(
  opts: DownloadOptions,
  tempPath: string,
  transport: HttpTransport,
): Promise<AttemptResult> {
  const response = await transport(opts.url, {
    headers: { "User-Agent": opts.userAgent },
    timeoutMs: opts.timeoutMs,
  });

  if (!isSuccessStatus(response.statusCode)) {
    response.body.resume();
    throw new Error(`HTTP ${response.statusCode} for ${opts.url}`);
  }

  const total = parseContentLength(
    headerValue(response.headers, "content-length"),
  );
  const hash = crypto.createHash("sha256");
  let received = 0;

  const tap = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      hash.update(chunk);
      received += chunk.length;
      opts.onProgress?.({
        bytes_downloaded: received,
        bytes_total: total,
        percent:
          total !== null ? Math.min(100, Math.floor((received * 100) / total)) : null,
      });
      callback(null, chunk);
    },
  });

  await pipeline(response.body, tap, fs.createWriteStream(tempPath));

  if (total !== null && received !== total) {
    throw new Error(
      `Incomplete download: received ${received} of ${total} bytes`,
    );
  }

  return { sha256: hash.digest("hex"), bytes: received };
}

export async function downloadToStaging(
  opts: DownloadOptions,
): Promise<StagedDownload> {
  if (!opts.url.startsWith("https://")) {
    throw new InstallerError(
      "DOWNLOAD_ERROR",
      `Download URL must be HTTPS. Got: ${opts.url}`,
    );
  }

  const expected =
    opts.expectedSha256 !== undefined
      ? parseSha256(opts.expectedSha256)
      : undefined;
  const transport = opts.transport ?? httpsTransport;
  const { logger } = opts;

  try {
    fs.mkdirSync(opts.stagingDir, { recursive: true });
  } catch (err: unknown) {
    throw new InstallerError(
      "FILESYSTEM_ERROR",
      `Cannot create staging directory ${opts.stagingDir}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  const suffix = crypto.randomBytes(6).toString("hex");
  const tempPath = path.join(opts.stagingDir, `.${opts.filePrefix}-${suffix}.part`);
  const startTime = Date.now();

  logger.info({ url: opts.url, dest: tempPath }, "Starting download");

  const outcome = await withRetry(
    () => streamOnce(opts, tempPath, transport),
    {
      attempts: opts.attempts,
      baseDelayMs: opts.baseDelayMs,
      label: `Download of ${opts.url}`,
      logger,
      isRetryable: (err) => !isInstallerError(err),
      sleep: opts.sleep,
    },
  );

  if (!outcome.ok) {
    await removeFile(tempPath, logger);
    if (isInstallerError(outcome.error)) {
      throw outcome.error;
    }
    throw new InstallerError(
      "DOWNLOAD_ERROR",
      `Failed to download ${opts.url} after ${outcome.attempts} attempt(s): ${errorMessage(outcome.error)}`,
      { cause: outcome.error },
    );
  }

  const { sha256, bytes } = outcome.value;

  if (expected !== undefined && sha256 !== expected) {
    await removeFile(tempPath, logger);
    throw new InstallerError(
      "INTEGRITY_ERROR",
      `Checksum mismatch for ${opts.url}: expected ${expected}, got ${sha256}`,
    );
  }

  const durationMs = Date.now() - startTime;
  logger.info(
    { dest: tempPath, bytes, sha256, verified: expected !== undefined, duration_ms: durationMs },
    "Download complete",
  );

  return {
    tempPath,
    sha256,
    bytes,
    verified: expected !== undefined,
    durationMs,
  };
}
