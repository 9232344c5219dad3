/**
 * Shared test fixtures: an in-memory HTTP transport, a recording command
 * runner and throwaway home directories.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as crypto from "crypto";
import { Readable } from "stream";
import type { HttpResponse, HttpTransport } from "../src/http";
import type { CommandOutput, CommandRunner } from "../src/utils/command";
import type { Sleep } from "../src/utils/retry";
import { createLogger } from "../src/utils/logger";

export const silentLogger = createLogger({ level: "silent" });

export const noSleep: Sleep = async () => {};

export interface FakeRoute {
  status?: number;
  body?: string | Buffer;
  headers?: Record<string, string | undefined>;
}

export type RouteEntry = FakeRoute | Error;

/**
 * Serve responses by URL prefix. An array entry is consumed one element
 * per request, repeating the last element.
 */
export function fakeTransport(routes: Record<string, RouteEntry | RouteEntry[]>) {
  const calls: string[] = [];
  const counts = new Map<string, number>();

  const transport: HttpTransport = async (url) => {
    calls.push(url);
    const key = Object.keys(routes).find((prefix) => url.startsWith(prefix));
    if (key === undefined) {
      throw new Error(`No route for ${url}`);
    }

    const entry = routes[key];
    const seen = counts.get(key) ?? 0;
    counts.set(key, seen + 1);
    const route = Array.isArray(entry)
      ? entry[Math.min(seen, entry.length - 1)]
      : entry;

    if (route instanceof Error) throw route;

    const body =
      typeof route.body === "string"
        ? Buffer.from(route.body)
        : (route.body ?? Buffer.alloc(0));

    const response: HttpResponse = {
      statusCode: route.status ?? 200,
      headers: { "content-length": String(body.length), ...route.headers },
      body: Readable.from(body.length > 0 ? [body] : []),
      url,
    };
    return response;
  };

  return { transport, calls };
}

export interface RecordedCommand {
  command: string;
  args: string[];
}

/**
 * Record every command; reply with `outputs[command]` or empty output.
 * A command mapped to an Error rejects with it.
 */
export function fakeRunner(outputs: Record<string, Partial<CommandOutput> | Error> = {}) {
  const commands: RecordedCommand[] = [];

  const runner: CommandRunner = async (command, args) => {
    commands.push({ command, args });
    const output = outputs[command];
    if (output instanceof Error) throw output;
    return { stdout: output?.stdout ?? "", stderr: output?.stderr ?? "" };
  };

  return { runner, commands };
}

export function makeTempHome(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "cursor-installer-test-"));
}

export function removeTempHome(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function sha256Of(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}
