/**
 * Cursor Installer Engine — Environment Check Tests
 */

import { describe, it, expect } from "vitest";
import { checkEnvironment, currentSystemProfile } from "../src/environment";
import { InstallerError } from "../src/errors";

describe("checkEnvironment", () => {
  it("passes a supported Linux x64 host without warnings", () => {
    const report = checkEnvironment(
      { nodeVersion: "20.11.1", platform: "linux", arch: "x64" },
      [20, 0],
    );
    expect(report.warnings).toEqual([]);
  });

  it("accepts a v-prefixed version string", () => {
    const report = checkEnvironment(
      { nodeVersion: "v22.3.0", platform: "linux", arch: "x64" },
      [20, 0],
    );
    expect(report.warnings).toEqual([]);
  });

  it("fails on an older Node.js", () => {
    expect(() =>
      checkEnvironment(
        { nodeVersion: "18.19.0", platform: "linux", arch: "x64" },
        [20, 0],
      ),
    ).toThrow("Node.js 20.0+ required. Current version: 18.19.0");
  });

  it("compares the minor version within the same major", () => {
    expect(() =>
      checkEnvironment(
        { nodeVersion: "20.4.0", platform: "linux", arch: "x64" },
        [20, 6],
      ),
    ).toThrow("Node.js 20.6+ required. Current version: 20.4.0");
  });

  it("treats an unparseable version as too old", () => {
    try {
      checkEnvironment({ nodeVersion: "unknown", platform: "linux", arch: "x64" }, [20, 0]);
      expect.unreachable();
    } catch (err) {
      expect(err instanceof InstallerError && err.category).toBe("ENVIRONMENT_ERROR");
    }
  });

  it("warns on a non-x64 architecture", () => {
    const report = checkEnvironment(
      { nodeVersion: "20.11.1", platform: "linux", arch: "arm64" },
      [20, 0],
    );
    expect(report.warnings).toEqual([
      "Architecture arm64 may not be supported. Proceeding anyway...",
    ]);
  });

  it("warns on a non-Linux platform instead of failing", () => {
    const report = checkEnvironment(
      { nodeVersion: "20.11.1", platform: "darwin", arch: "x64" },
      [20, 0],
    );
    expect(report.warnings).toEqual([
      'This installer targets Linux; detected platform "darwin". Proceeding anyway...',
    ]);
  });
});

describe("currentSystemProfile", () => {
  it("reports the running process", () => {
    expect(currentSystemProfile()).toEqual({
      nodeVersion: process.versions.node,
      platform: process.platform,
      arch: process.arch,
    });
  });
});
