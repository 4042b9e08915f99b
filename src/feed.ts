/**
 * FeedParser: turns a feed document into ordered chapter entries
 *
 * Two formats are understood:
 * - Gemfeed: a gemtext page whose link lines start with a YYYY-MM-DD date
 *   (plain link lists without dates are accepted too)
 * - Atom and RSS, parsed with rss-parser
 */

import Parser from "rss-parser";
import { errorMessage, ParseError } from "./errors.js";
import { type GemtextLine, parseGemtext } from "./gemtext.js";
import type { FeedEntry, ParsedFeed } from "./types.js";
import { globToRegex, resolveUrl, SUPPORTED_PROTOCOLS } from "./utils.js";

/** Dated gemfeed label: '2024-01-31 Title', '2024-01-31 - Title', '2024-01-31: Title' */
const DATED_LABEL = /^(\d{4}-\d{2}-\d{2})(?=[\s:]|$)\s*(?:[-–—:]\s*)?(.*)$/;

/** Labels of the link to the next page of a paginated gemlog index */
const NEXT_PAGE_LABEL = /older posts|older entries|next page|more posts/i;

/** Extra fields read from XML feeds; values come straight from xml2js */
interface FeedFields {
  author?: unknown;
  managingEditor?: unknown;
}

interface ItemFields {
  author?: unknown;
}

const xmlFeedParser = new Parser<FeedFields, ItemFields>({
  customFields: {
    feed: ["author", "managingEditor"],
    item: ["author"],
  },
});

/**
 * Check that a YYYY-MM-DD string names a real calendar date.
 *
 * @example
 * isValidDate('2024-02-29') // true
 * isValidDate('2023-02-29') // false
 */
export function isValidDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`);
  return !isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

/**
 * Resolve an entry link, dropping links that are empty, malformed,
 * or use a scheme the fetcher cannot retrieve.
 */
function resolveEntryUrl(href: string, baseUrl: string): string | null {
  if (!href.trim()) return null;
  const resolved = resolveUrl(href.trim(), baseUrl);
  if (!resolved) return null;
  return SUPPORTED_PROTOCOLS.includes(new URL(resolved).protocol) ? resolved : null;
}

/**
 * Pull a display name out of an author value as xml2js produces it:
 * a string, { name: [...] }, { _: text }, or an array of those.
 */
export function authorName(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value.trim() || undefined;
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? authorName(value[0]) : undefined;
  }
  if (typeof value === "object" && value !== null) {
    if ("name" in value) return authorName(value.name);
    if ("_" in value) return authorName(value._);
  }
  return undefined;
}

/**
 * Parse a gemtext feed.
 *
 * @throws {ParseError} If the document is empty or has no heading and no links
 */
export function parseGemfeed(document: string, baseUrl: string): ParsedFeed {
  if (!document.trim()) {
    throw new ParseError("Feed document is empty", { url: baseUrl });
  }
  if (document.includes("\u0000")) {
    throw new ParseError("Feed document is binary, not gemtext", { url: baseUrl });
  }

  const lines = parseGemtext(document);
  const title = lines.find(
    (line): line is Extract<GemtextLine, { type: "heading" }> => line.type === "heading" && line.level === 1,
  );
  const links = lines.flatMap((line) => (line.type === "link" ? [line] : []));

  if (!title && links.length === 0) {
    throw new ParseError("Document is not a feed: no heading and no links found", { url: baseUrl });
  }

  const dated: Omit<FeedEntry, "order">[] = [];
  const undated: Omit<FeedEntry, "order">[] = [];
  let nextPageUrl: string | undefined;

  for (const link of links) {
    const url = resolveEntryUrl(link.url, baseUrl);
    if (!url) continue;

    if (NEXT_PAGE_LABEL.test(link.label)) {
      nextPageUrl ??= url;
      continue;
    }

    const match = DATED_LABEL.exec(link.label);
    if (match && isValidDate(match[1])) {
      dated.push({ title: match[2].trim() || match[1], url, published: match[1] });
    } else {
      undated.push({ title: link.label || link.url, url });
    }
  }

  // A gemfeed lists only dated links; navigation links are not chapters
  const chosen = dated.length > 0 ? dated : undated;

  return {
    title: title?.text || undefined,
    entries: chosen.map((entry, order) => ({ ...entry, order })),
    nextPageUrl,
  };
}

/**
 * Parse an Atom or RSS document.
 *
 * @throws {ParseError} If rss-parser does not recognize the document
 */
export async function parseXmlFeed(document: string, baseUrl: string): Promise<ParsedFeed> {
  let feed: Awaited<ReturnType<typeof xmlFeedParser.parseString>>;
  try {
    feed = await xmlFeedParser.parseString(document);
  } catch (error) {
    throw new ParseError(`Not an Atom or RSS feed: ${errorMessage(error)}`, { url: baseUrl, cause: error });
  }

  const entries: FeedEntry[] = [];
  for (const item of feed.items) {
    const url = item.link ? resolveEntryUrl(item.link, baseUrl) : null;
    if (!url) continue;

    const published = item.isoDate ?? item.pubDate;
    entries.push({
      title: item.title?.trim() || url,
      url,
      order: entries.length,
      ...(published ? { published } : {}),
    });
  }

  return {
    title: feed.title?.trim() || undefined,
    author: authorName(feed.author) ?? authorName(feed.managingEditor),
    entries,
  };
}

/**
 * Parse a feed document fetched from baseUrl.
 * Relative links are resolved against baseUrl; entries keep document order.
 *
 * @throws {ParseError} If the document as a whole is not feed content
 */
export async function parseFeed(document: string, baseUrl: string): Promise<ParsedFeed> {
  if (document.trimStart().startsWith("<")) {
    return parseXmlFeed(document, baseUrl);
  }
  return parseGemfeed(document, baseUrl);
}

/**
 * Give entries consecutive orders matching their array position.
 */
export function renumberEntries(entries: readonly FeedEntry[]): FeedEntry[] {
  return entries.map((entry, order) => ({ ...entry, order }));
}

/**
 * Filter entries based on skip URLs and URL pattern, then renumber.
 *
 * @param skipUrls - Entries whose URL contains any of these are dropped
 * @param urlPattern - Glob the URL must match, or null for no filter
 */
export function filterEntries(
  entries: readonly FeedEntry[],
  skipUrls: readonly string[],
  urlPattern: string | null,
): FeedEntry[] {
  let filtered = [...entries];

  if (skipUrls.length > 0) {
    filtered = filtered.filter((entry) => !skipUrls.some((skip) => entry.url.includes(skip)));
  }

  if (urlPattern) {
    const regex = globToRegex(urlPattern);
    filtered = filtered.filter((entry) => regex.test(entry.url));
  }

  return renumberEntries(filtered);
}
