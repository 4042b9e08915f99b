/**
 * In-memory Fetcher and fixtures shared by the tests
 */

import { FetchError } from "./errors.js";
import type { Fetcher } from "./fetcher.js";
import type { Logger, LogLevel } from "./logger.js";
import type { FetchedDocument } from "./types.js";
import { guessMimeType } from "./utils.js";

export interface MemoryPage {
  body: string | Uint8Array;
  mimeType?: string;
  charset?: string;
}

export interface MemoryFetcher extends Fetcher {
  /** URLs requested so far, in order */
  readonly requests: string[];
}

/**
 * Fetcher answering from a URL -> page table. Unknown URLs fail like an
 * unreachable host; a string page gets a type guessed from its URL.
 */
export function createMemoryFetcher(pages: Record<string, string | MemoryPage>): MemoryFetcher {
  const requests: string[] = [];

  return {
    requests,
    async fetch(url: string): Promise<FetchedDocument> {
      requests.push(url);
      const page = pages[url];
      if (page === undefined) {
        throw new FetchError(`Could not retrieve ${url}: connection refused`, { url });
      }

      const { body, mimeType, charset }: MemoryPage = typeof page === "string" ? { body: page } : page;
      return {
        url,
        mimeType: mimeType ?? guessMimeType(url),
        ...(charset ? { charset } : {}),
        body: typeof body === "string" ? new TextEncoder().encode(body) : body,
      };
    },
  };
}

/** Logger that records every line instead of printing */
export function createMemoryLogger(level: LogLevel = "verbose"): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    level,
    lines,
    info: (message) => lines.push(`info: ${message}`),
    debug: (message) => lines.push(`debug: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
    progress: (current, total, title) => lines.push(`progress: ${current}/${total} ${title}`),
  };
}
