/**
 * Orchestrator: feed → entries → chapters → book → file
 *
 * Runs strictly in sequence and stops at the first failure. Nothing is
 * written unless every chapter was extracted.
 */

import { assembleBook, bookIdentifier, writeEpub } from "./epub.js";
import {
  AssemblyError,
  errorMessage,
  ExtractError,
  FetchError,
  ParseError,
  PipelineError,
  WriteError,
} from "./errors.js";
import { type ExtractOptions, extractChapter } from "./extract.js";
import { filterEntries, parseFeed } from "./feed.js";
import { decodeText, type Fetcher, isTextual } from "./fetcher.js";
import type { Logger } from "./logger.js";
import type { Book, BookMetadata, Chapter, FeedEntry } from "./types.js";
import { delay } from "./utils.js";

/**
 * Pipeline states, in the order a successful run visits them.
 * 'fetching' and 'extracted' repeat once per chapter; 'failed' is
 * reachable from any state.
 */
export type PipelineState =
  | "start"
  | "feed-fetched"
  | "entries-parsed"
  | "fetching"
  | "extracted"
  | "assembled"
  | "written"
  | "done"
  | "failed";

export interface PipelineOptions {
  feedUrl: string;
  outputPath: string;
  /** Overrides the feed title */
  title?: string | null;
  /** Overrides the feed author */
  author?: string | null;
  language: string;
  /** Feed pages to read, following the "Older posts" link */
  maxPages: number;
  skipUrls: string[];
  urlPattern: string | null;
  /** Delay between chapter fetches (ms) */
  chapterDelay: number;
  extract: ExtractOptions;
  /** Clock used when the feed has no dates */
  now?: () => Date;
  onTransition?: (state: PipelineState, detail: string) => void;
}

export interface PipelineDeps {
  fetcher: Fetcher;
  logger: Logger;
}

export type PipelineResult =
  | { ok: true; book: Book; outputPath: string; bytes: number }
  | {
      ok: false;
      /** Last state reached before the failure */
      failedAt: PipelineState;
      /** Human-readable description of the failing step */
      step: string;
      error: PipelineError;
    };

/** Feed-level information gathered while reading feed pages */
export interface CollectedFeed {
  title?: string;
  author?: string;
  entries: FeedEntry[];
}

/**
 * Newest publication date among the entries, as an ISO timestamp.
 *
 * @example
 * latestPublished([{ ..., published: '2024-01-02' }, { ..., published: '2024-03-04' }])
 * // '2024-03-04T00:00:00.000Z'
 */
export function latestPublished(entries: readonly FeedEntry[]): string | undefined {
  let latest: number | undefined;
  for (const entry of entries) {
    if (!entry.published) continue;
    const time = new Date(entry.published).getTime();
    if (!isNaN(time) && (latest === undefined || time > latest)) {
      latest = time;
    }
  }
  return latest === undefined ? undefined : new Date(latest).toISOString();
}

/**
 * Build book metadata from CLI overrides and what the feed provides.
 * Title falls back to the feed URL's host; language is never guessed.
 */
export function buildMetadata(options: PipelineOptions, feed: CollectedFeed, entries: readonly FeedEntry[]): BookMetadata {
  const now = options.now ?? (() => new Date());
  const author = options.author || feed.author;

  return {
    title: options.title || feed.title || new URL(options.feedUrl).host,
    ...(author ? { author } : {}),
    language: options.language,
    identifier: bookIdentifier(options.feedUrl),
    modified: latestPublished(entries) ?? now().toISOString(),
  };
}

/**
 * Wrap an error that did not come from a pipeline component, using the
 * state the run was in to pick its category.
 */
export function toPipelineError(error: unknown, state: PipelineState): PipelineError {
  if (error instanceof PipelineError) return error;

  const message = errorMessage(error);
  switch (state) {
    case "start":
      return new FetchError(message, { cause: error });
    case "feed-fetched":
      return new ParseError(message, { cause: error });
    case "entries-parsed":
    case "fetching":
    case "extracted":
      return new ExtractError(message, { cause: error });
    case "assembled":
      return new WriteError(message, { cause: error });
    default:
      return new AssemblyError(message, { cause: error });
  }
}

/**
 * Run the whole conversion.
 * Never throws for pipeline failures; they come back as { ok: false }.
 */
export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineResult> {
  const { fetcher, logger } = deps;
  let state: PipelineState = "start";
  let step = `Fetching feed ${options.feedUrl}`;

  const transition = (next: PipelineState, detail: string) => {
    state = next;
    logger.debug(`${next}: ${detail}`);
    options.onTransition?.(next, detail);
  };

  transition("start", options.feedUrl);

  try {
    const feed = await collectFeed(options, fetcher, logger, (description) => {
      step = description;
    }, transition);

    const entries = filterEntries(feed.entries, options.skipUrls, options.urlPattern);
    if (entries.length !== feed.entries.length) {
      logger.info(`Filtered ${feed.entries.length - entries.length} entries (${feed.entries.length} → ${entries.length})`);
    }
    logger.info(`Found ${entries.length} entries. Fetching chapters...`);

    const chapters: Chapter[] = [];
    for (const [index, entry] of entries.entries()) {
      step = `Fetching chapter ${index + 1}/${entries.length} (${entry.url})`;
      transition("fetching", entry.url);

      const chapter = await extractChapter(entry, fetcher, options.extract);
      chapters.push(chapter);
      transition("extracted", chapter.title);
      logger.progress(index + 1, entries.length, chapter.title);

      if (options.chapterDelay > 0 && index < entries.length - 1) {
        await delay(options.chapterDelay);
      }
    }

    step = "Assembling book";
    const book = assembleBook(buildMetadata(options, feed, entries), chapters);
    transition("assembled", `${book.chapters.length} chapters`);

    step = `Writing ${options.outputPath}`;
    const bytes = await writeEpub(book, options.outputPath);
    transition("written", `${options.outputPath} (${bytes} bytes)`);

    transition("done", book.metadata.title);
    return { ok: true, book, outputPath: options.outputPath, bytes };
  } catch (error) {
    const failedAt: PipelineState = state;
    const pipelineError = toPipelineError(error, failedAt);
    transition("failed", pipelineError.message);
    return { ok: false, failedAt, step, error: pipelineError };
  }
}

/**
 * Fetch and parse feed pages, following "Older posts" links up to
 * options.maxPages. Only the first page supplies title and author.
 */
async function collectFeed(
  options: PipelineOptions,
  fetcher: Fetcher,
  logger: Logger,
  setStep: (description: string) => void,
  transition: (next: PipelineState, detail: string) => void,
): Promise<CollectedFeed> {
  const collected: CollectedFeed = { entries: [] };
  const visited = new Set<string>();
  let pageUrl: string | undefined = options.feedUrl;

  for (let page = 1; pageUrl !== undefined && page <= options.maxPages; page++) {
    visited.add(pageUrl);
    setStep(`Fetching feed ${pageUrl}`);
    logger.info(`Reading feed: ${pageUrl}`);

    const doc = await fetcher.fetch(pageUrl);
    transition("feed-fetched", doc.url);

    setStep(`Parsing feed ${doc.url}`);
    if (!isTextual(doc.mimeType)) {
      throw new ParseError(`Feed at ${doc.url} is not a text document (${doc.mimeType})`, { url: doc.url });
    }
    const parsed = await parseFeed(decodeText(doc), doc.url);

    if (page === 1) {
      collected.title = parsed.title;
      collected.author = parsed.author;
    }
    collected.entries.push(...parsed.entries);
    transition("entries-parsed", `${parsed.entries.length} entries on page ${page}`);

    const next = parsed.nextPageUrl;
    pageUrl = next !== undefined && !visited.has(next) ? next : undefined;
  }

  return collected;
}
