/**
 * Cursor Installer Engine — HTTP Transport
 *
 * A single GET primitive over Node's https module. Redirects are followed
 * here (up to 5 hops); callers decide what a status code means. Stages
 * receive the transport as an option so tests can serve responses from
 * memory.
 */

import * as https from "https";
import type { Readable } from "stream";

export interface HttpRequestOptions {
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: Readable;
  /** Final URL after redirects */
  url: string;
}

export type HttpTransport = (
  url: string,
  options: HttpRequestOptions,
) => Promise<HttpResponse>;

const MAX_REDIRECTS = 5;

function get(
  url: string,
  options: HttpRequestOptions,
  redirectsLeft: number,
): Promise<HttpResponse> {
  return new Promise<HttpResponse>((resolve, reject) => {
    const request = https.get(url, { headers: options.headers }, (response) => {
      const status = response.statusCode ?? 0;
      const location = response.headers.location;

      if (status >= 300 && status < 400 && location) {
        response.resume();
        if (redirectsLeft <= 0) {
          reject(new Error(`Too many redirects fetching ${url}`));
          return;
        }
        const next = new URL(location, url).toString();
        get(next, options, redirectsLeft - 1).then(resolve, reject);
        return;
      }

      resolve({
        statusCode: status,
        headers: response.headers,
        body: response,
        url,
      });
    });

    request.on("error", (err) => {
      reject(new Error(`Request failed: ${err.message}`));
    });

    request.setTimeout(options.timeoutMs, () => {
      request.destroy(
        new Error(`Request timed out after ${options.timeoutMs}ms: ${url}`),
      );
    });
  });
}

export const httpsTransport: HttpTransport = (url, options) =>
  get(url, options, MAX_REDIRECTS);

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Read a response body fully into a string.
 */
export async function readBody(body: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

export function headerValue(
  headers: HttpResponse["headers"],
  name: string,
): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
