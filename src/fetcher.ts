/**
 * Fetcher: retrieves documents over http(s) and gemini
 *
 * One Fetcher is constructed per run and passed explicitly to every
 * component that needs network access.
 */

import { errorMessage, FetchError } from "./errors.js";
import { fetchGemini, type GeminiRequest } from "./gemini.js";
import type { FetchedDocument } from "./types.js";
import { guessMimeType, parseContentType } from "./utils.js";

export const DEFAULT_USER_AGENT = "gemfeed-to-epub/1.0";

/** Per-request timeout for both transports (ms) */
export const DEFAULT_TIMEOUT_MS = 30000;

const ACCEPT_HEADER =
  "text/gemini, text/html;q=0.9, application/atom+xml;q=0.9, application/rss+xml;q=0.9, text/plain;q=0.8, */*;q=0.1";

export interface Fetcher {
  /**
   * Retrieve a URL. Every call performs a new request.
   *
   * @throws {FetchError} On network failure, timeout, or non-success status
   */
  fetch(url: string): Promise<FetchedDocument>;
}

export interface FetcherOptions {
  userAgent?: string;
  timeoutMs?: number;
  /** Gemini transport override, used by tests */
  geminiRequest?: GeminiRequest;
}

/**
 * Fetch an http(s) URL with the global fetch API.
 * Redirects are followed; the returned URL is the final one.
 */
export async function fetchHttp(url: string, userAgent: string, timeoutMs: number): Promise<FetchedDocument> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { "User-Agent": userAgent, Accept: ACCEPT_HEADER },
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new FetchError(`Could not retrieve ${url}: ${errorMessage(error)}`, { url, cause: error });
  }

  if (!response.ok) {
    throw new FetchError(`HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""} for ${url}`, {
      url,
    });
  }

  const finalUrl = response.url || url;
  const { mimeType, charset } = parseContentType(response.headers.get("content-type") ?? "", guessMimeType(finalUrl));

  let body: Uint8Array;
  try {
    body = new Uint8Array(await response.arrayBuffer());
  } catch (error) {
    throw new FetchError(`Could not read response body of ${url}: ${errorMessage(error)}`, { url, cause: error });
  }

  return { url: finalUrl, mimeType, charset, body };
}

/**
 * Create a Fetcher that dispatches on the URL scheme.
 *
 * @example
 * const fetcher = createFetcher({ timeoutMs: 10000 });
 * const doc = await fetcher.fetch('gemini://example.org/gemlog/');
 */
export function createFetcher(options: FetcherOptions = {}): Fetcher {
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return {
    async fetch(url: string): Promise<FetchedDocument> {
      let protocol: string;
      try {
        protocol = new URL(url).protocol;
      } catch (error) {
        throw new FetchError(`Invalid URL: ${url}`, { url, cause: error });
      }

      switch (protocol) {
        case "http:":
        case "https:":
          return fetchHttp(url, userAgent, timeoutMs);
        case "gemini:":
          return fetchGemini(url, timeoutMs, options.geminiRequest);
        default:
          throw new FetchError(`Unsupported URL scheme "${protocol}" in ${url}`, { url });
      }
    },
  };
}

/**
 * Decode a fetched body using its declared charset.
 * Missing or unknown charset labels fall back to UTF-8; a byte order mark is dropped.
 */
export function decodeText(doc: FetchedDocument): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(doc.charset ?? "utf-8");
  } catch {
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(doc.body);
}

/** True for any text/* type and the XML/XHTML types feeds and pages use */
export function isTextual(mimeType: string): boolean {
  return (
    mimeType.startsWith("text/") ||
    mimeType === "application/xml" ||
    mimeType === "application/xhtml+xml" ||
    mimeType === "application/atom+xml" ||
    mimeType === "application/rss+xml"
  );
}
