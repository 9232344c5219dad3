/**
 * Cursor Installer Engine — Version Resolver
 *
 * Asks the download API for the latest AppImage, reads the local version
 * marker, and decides whether a download is needed.
 */

import * as fs from "fs";
import { z } from "zod";
import type { Logger } from "./utils/logger";
import type { InstallLayout, ReleaseInfo, UpdateDecision } from "./types";
import {
  httpsTransport,
  isSuccessStatus,
  readBody,
  type HttpTransport,
} from "./http";
import { withRetry, type Sleep } from "./utils/retry";
import { computeFileHash, normalizeSha256 } from "./verifier";
import { fileExists, writeFileAtomic } from "./utils/files";
import { InstallerError, errorMessage, isInstallerError } from "./errors";

export const ReleaseInfoSchema = z.object({
  downloadUrl: z.string().url(),
  version: z.string().trim().min(1),
  commitSha: z.string().trim().min(1),
  sha256: z
    .string()
    .regex(/^[a-fA-F0-9]{64}$/)
    .optional(),
});

/**
 * Validate a decoded API body. Missing or mistyped fields are a PARSE_ERROR.
 */
export function parseReleaseInfo(data: unknown): ReleaseInfo {
  const parsed = ReleaseInfoSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InstallerError(
      "PARSE_ERROR",
      `Unexpected API response: ${issues}`,
    );
  }

  const { downloadUrl, version, commitSha, sha256 } = parsed.data;
  return {
    downloadUrl,
    version,
    commitSha,
    ...(sha256 ? { sha256: normalizeSha256(sha256) } : {}),
  };
}

export function buildApiUrl(
  apiUrl: string,
  platform: string,
  releaseTrack: string,
): string {
  const url = new URL(apiUrl);
  url.searchParams.set("platform", platform);
  url.searchParams.set("releaseTrack", releaseTrack);
  return url.toString();
}

export interface FetchReleaseOptions {
  apiUrl: string;
  platform: string;
  releaseTrack: string;
  userAgent: string;
  attempts: number;
  baseDelayMs: number;
  timeoutMs: number;
  logger: Logger;
  transport?: HttpTransport;
  sleep?: Sleep;
}

export async function fetchReleaseInfo(
  opts: FetchReleaseOptions,
): Promise<ReleaseInfo> {
  const transport = opts.transport ?? httpsTransport;
  const url = buildApiUrl(opts.apiUrl, opts.platform, opts.releaseTrack);

  opts.logger.info({ url }, "Fetching latest release info");

  const outcome = await withRetry(
    async () => {
      const response = await transport(url, {
        headers: {
          Accept: "application/json",
          "User-Agent": opts.userAgent,
        },
        timeoutMs: opts.timeoutMs,
      });

      if (!isSuccessStatus(response.statusCode)) {
        response.body.resume();
        throw new Error(`HTTP ${response.statusCode} from ${url}`);
      }

      const text = await readBody(response.body);
      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch (err: unknown) {
        throw new InstallerError(
          "PARSE_ERROR",
          `Invalid JSON response from API: ${errorMessage(err)}`,
        );
      }
      return parseReleaseInfo(data);
    },
    {
      attempts: opts.attempts,
      baseDelayMs: opts.baseDelayMs,
      label: "Release info request",
      logger: opts.logger,
      isRetryable: (err) => !isInstallerError(err),
      sleep: opts.sleep,
    },
  );

  if (!outcome.ok) {
    if (isInstallerError(outcome.error)) {
      throw outcome.error;
    }
    throw new InstallerError(
      "NETWORK_ERROR",
      `Failed to fetch release info after ${outcome.attempts} attempt(s): ${errorMessage(outcome.error)}`,
      { cause: outcome.error },
    );
  }

  opts.logger.info(
    { version: outcome.value.version, commit: outcome.value.commitSha },
    "Resolved latest release",
  );
  return outcome.value;
}

/**
 * Read the installed version marker. Absent marker means no prior install.
 */
export async function readInstalledVersion(
  versionFile: string,
): Promise<string | null> {
  try {
    const content = await fs.promises.readFile(versionFile, "utf-8");
    const version = content.trim();
    return version.length > 0 ? version : null;
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new InstallerError(
      "FILESYSTEM_ERROR",
      `Failed to read ${versionFile}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

export interface DecideUpdateOptions {
  force?: boolean;
  logger: Logger;
}

/**
 * Compare the installed marker with the release.
 *
 * A differing marker is not conclusive when the release publishes a digest:
 * if the executable on disk already hashes to it, the marker is rewritten
 * and nothing is downloaded.
 */
export async function decideUpdate(
  layout: InstallLayout,
  release: ReleaseInfo,
  installedVersion: string | null,
  opts: DecideUpdateOptions,
): Promise<UpdateDecision> {
  if (opts.force) {
    return { needed: true, reason: "forced", installedVersion };
  }

  if (!(await fileExists(layout.executablePath))) {
    return {
      needed: true,
      reason: installedVersion === null ? "not_installed" : "executable_missing",
      installedVersion,
    };
  }

  if (installedVersion === release.version) {
    opts.logger.info({ version: release.version }, "Already up to date");
    return { needed: false, reason: "same_version", installedVersion };
  }

  if (release.sha256) {
    let localHash: string;
    try {
      localHash = await computeFileHash(layout.executablePath);
    } catch (err: unknown) {
      throw new InstallerError("FILESYSTEM_ERROR", errorMessage(err), { cause: err });
    }
    if (localHash === release.sha256) {
      try {
        await writeFileAtomic(layout.versionFile, release.version);
      } catch (err: unknown) {
        throw new InstallerError(
          "FILESYSTEM_ERROR",
          `Failed to update ${layout.versionFile}: ${errorMessage(err)}`,
          { cause: err },
        );
      }
      opts.logger.info(
        { version: release.version, sha256: localHash },
        "Installed executable matches release checksum",
      );
      return {
        needed: false,
        reason: "checksum_match",
        installedVersion: release.version,
      };
    }
  }

  return {
    needed: true,
    reason: installedVersion === null ? "not_installed" : "version_changed",
    installedVersion,
  };
}
