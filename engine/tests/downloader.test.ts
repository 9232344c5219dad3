/**
 * Cursor Installer Engine — Downloader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { downloadToStaging, type DownloadOptions } from "../src/downloader";
import type { DownloadProgress } from "../src/types";
import type { HttpTransport } from "../src/http";
import {
  fakeTransport,
  makeTempHome,
  noSleep,
  removeTempHome,
  sha256Of,
  silentLogger,
} from "./helpers";

const ARTIFACT_URL = "https://downloads.test/cursor.AppImage";
const CONTENT = "appimage-bytes-for-testing";

let staging: string;

beforeEach(() => {
  staging = path.join(makeTempHome(), "Applications");
});

afterEach(() => {
  removeTempHome(path.dirname(staging));
});

function options(transport: HttpTransport, overrides: Partial<DownloadOptions> = {}): DownloadOptions {
  return {
    url: ARTIFACT_URL,
    stagingDir: staging,
    filePrefix: "cursor",
    attempts: 3,
    baseDelayMs: 1,
    timeoutMs: 1000,
    userAgent: "Cursor-Installer/test",
    logger: silentLogger,
    transport,
    sleep: noSleep,
    ...overrides,
  };
}

describe("downloadToStaging", () => {
  it("streams into a hidden part file in the staging directory", async () => {
    const { transport } = fakeTransport({ [ARTIFACT_URL]: { body: CONTENT } });

    const staged = await downloadToStaging(options(transport));

    expect(path.dirname(staged.tempPath)).toBe(staging);
    expect(path.basename(staged.tempPath)).toMatch(/^\.cursor-[0-9a-f]{12}\.part$/);
    expect(fs.readFileSync(staged.tempPath, "utf-8")).toBe(CONTENT);
    expect(staged.sha256).toBe(sha256Of(CONTENT));
    expect(staged.bytes).toBe(CONTENT.length);
    expect(staged.verified).toBe(false);
  });

  it("verifies against an expected digest in any case", async () => {
    const { transport } = fakeTransport({ [ARTIFACT_URL]: { body: CONTENT } });

    const staged = await downloadToStaging(
      options(transport, { expectedSha256: sha256Of(CONTENT).toUpperCase() }),
    );

    expect(staged.verified).toBe(true);
  });

  it("deletes the file on a checksum mismatch and does not retry", async () => {
    const { transport, calls } = fakeTransport({ [ARTIFACT_URL]: { body: CONTENT } });
    const expected = "0".repeat(64);

    await expect(
      downloadToStaging(options(transport, { expectedSha256: expected })),
    ).rejects.toMatchObject({
      category: "INTEGRITY_ERROR",
      message: `Checksum mismatch for ${ARTIFACT_URL}: expected ${expected}, got ${sha256Of(CONTENT)}`,
    });
    expect(fs.readdirSync(staging)).toEqual([]);
    expect(calls).toHaveLength(1);
  });

  it("rejects a malformed expected digest before downloading", async () => {
    const { transport, calls } = fakeTransport({ [ARTIFACT_URL]: { body: CONTENT } });

    await expect(
      downloadToStaging(options(transport, { expectedSha256: "xyz" })),
    ).rejects.toMatchObject({ category: "INTEGRITY_ERROR" });
    expect(calls).toEqual([]);
  });

  it("refuses plain HTTP", async () => {
    const { transport } = fakeTransport({});

    await expect(
      downloadToStaging(options(transport, { url: "http://downloads.test/cursor.AppImage" })),
    ).rejects.toThrow("Download URL must be HTTPS. Got: http://downloads.test/cursor.AppImage");
  });

  it("reports progress percentages", async () => {
    const { transport } = fakeTransport({ [ARTIFACT_URL]: { body: "0123456789" } });
    const events: DownloadProgress[] = [];

    await downloadToStaging(options(transport, { onProgress: (p) => events.push(p) }));

    expect(events).toEqual([{ bytes_downloaded: 10, bytes_total: 10, percent: 100 }]);
  });

  it("reports null percentages without a content-length", async () => {
    const { transport } = fakeTransport({
      [ARTIFACT_URL]: { body: "0123456789", headers: { "content-length": undefined } },
    });
    const events: DownloadProgress[] = [];

    await downloadToStaging(options(transport, { onProgress: (p) => events.push(p) }));

    expect(events).toEqual([{ bytes_downloaded: 10, bytes_total: null, percent: null }]);
  });

  it("retries a truncated body and succeeds", async () => {
    const { transport, calls } = fakeTransport({
      [ARTIFACT_URL]: [
        { body: "01234", headers: { "content-length": "10" } },
        { body: "0123456789" },
      ],
    });

    const staged = await downloadToStaging(options(transport));

    expect(calls).toHaveLength(2);
    expect(fs.readFileSync(staged.tempPath, "utf-8")).toBe("0123456789");
  });

  it("fails with a DOWNLOAD_ERROR after exhausting attempts and cleans up", async () => {
    const { transport, calls } = fakeTransport({ [ARTIFACT_URL]: { status: 404 } });

    await expect(downloadToStaging(options(transport, { attempts: 2 }))).rejects.toMatchObject({
      category: "DOWNLOAD_ERROR",
      message: `Failed to download ${ARTIFACT_URL} after 2 attempt(s): HTTP 404 for ${ARTIFACT_URL}`,
    });
    expect(calls).toHaveLength(2);
    expect(fs.readdirSync(staging)).toEqual([]);
  });
});
