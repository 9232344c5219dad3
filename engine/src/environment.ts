/**
 * Cursor Installer Engine — Environment Checks
 *
 * Only an outdated Node.js is fatal. A non-Linux platform or an
 * architecture other than x64 produces a warning and the run continues.
 */

import { InstallerError } from "./errors";
import type { SystemProfile } from "./types";

export const SUPPORTED_PLATFORM = "linux";
export const PRIMARY_ARCH = "x64";

export interface EnvironmentReport {
  profile: SystemProfile;
  warnings: string[];
}

export function currentSystemProfile(): SystemProfile {
  return {
    nodeVersion: process.versions.node,
    platform: process.platform,
    arch: process.arch,
  };
}

function parseMajorMinor(version: string): [number, number] | null {
  const match = version.trim().replace(/^v/, "").match(/^(\d+)\.(\d+)/);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10)];
}

export function checkEnvironment(
  profile: SystemProfile,
  minNodeVersion: [number, number],
): EnvironmentReport {
  const [minMajor, minMinor] = minNodeVersion;
  const parsed = parseMajorMinor(profile.nodeVersion);

  if (
    !parsed ||
    parsed[0] < minMajor ||
    (parsed[0] === minMajor && parsed[1] < minMinor)
  ) {
    throw new InstallerError(
      "ENVIRONMENT_ERROR",
      `Node.js ${minMajor}.${minMinor}+ required. Current version: ${profile.nodeVersion}`,
    );
  }

  const warnings: string[] = [];

  if (profile.platform !== SUPPORTED_PLATFORM) {
    warnings.push(
      `This installer targets Linux; detected platform "${profile.platform}". Proceeding anyway...`,
    );
  }

  if (profile.arch !== PRIMARY_ARCH) {
    warnings.push(
      `Architecture ${profile.arch} may not be supported. Proceeding anyway...`,
    );
  }

  return { profile, warnings };
}
