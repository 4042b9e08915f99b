/**
 * ContentExtractor: fetches a chapter page and extracts its title and text
 *
 * HTML pages are stripped of navigation chrome with cheerio and converted
 * to plain text with turndown. Gemtext and plain text pages are rendered
 * line by line.
 */

import * as cheerio from "cheerio";
import TurndownService from "turndown";
import { ExtractError } from "./errors.js";
import { decodeText, type Fetcher, isTextual } from "./fetcher.js";
import { type GemtextLine, parseGemtext, renderPlainText } from "./gemtext.js";
import type { Chapter, FeedEntry } from "./types.js";

/** Elements that never hold the main text of a page */
const CHROME_SELECTORS = "script, style, noscript, iframe, nav, header, footer, aside, form, [role='navigation']";

/** Candidates for the main content container, most specific first */
const CONTENT_SELECTORS = ["article", "main", "body"];

export interface ExtractOptions {
  /** Drop this many lines from the top of gemtext pages (capsule header) */
  stripLines?: number;
  /** Cut gemtext pages at the first line equal to this marker (capsule footer) */
  footerMarker?: string | null;
}

/** Raw HTML bytes and the charset the server declared, if any */
export interface HtmlSource {
  body: Uint8Array;
  charset?: string;
}

/** Title and body found in a page, before fallbacks */
interface PageText {
  title: string;
  body: string;
}

const textConverter = new TurndownService({ headingStyle: "atx", codeBlockStyle: "fenced" });

// Output is plain text: keep the words, drop the markdown
textConverter.escape = (text: string) => text;
textConverter.remove(["script", "style", "noscript", "iframe", "img"]);
textConverter.addRule("plainHeading", {
  filter: ["h1", "h2", "h3", "h4", "h5", "h6"],
  replacement: (content) => `\n\n${content.trim()}\n\n`,
});
textConverter.addRule("plainInline", {
  filter: ["a", "em", "i", "strong", "b", "code", "span", "u", "s", "del"],
  replacement: (content) => content,
});
textConverter.addRule("plainBlockquote", {
  filter: "blockquote",
  replacement: (content) => `\n\n${content.trim()}\n\n`,
});
textConverter.addRule("plainPre", {
  filter: "pre",
  replacement: (_content, node) => `\n\n${node.textContent ?? ""}\n\n`,
});
textConverter.addRule("plainListItem", {
  filter: "li",
  replacement: (content) => `• ${content.trim().replace(/\n+/g, " ")}\n`,
});
textConverter.addRule("plainRule", {
  filter: "hr",
  replacement: () => "\n\n",
});
textConverter.addRule("plainBreak", {
  filter: "br",
  replacement: () => "\n",
});

/**
 * Normalize extracted text: trailing whitespace removed from every line,
 * runs of blank lines collapsed to one, outer blank lines trimmed.
 *
 * @example
 * normalizeBody('  One  \n\n\n\nTwo\n') // '  One\n\nTwo'
 */
export function normalizeBody(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .replace(/^\n+|\n+$/g, "");
}

/**
 * Drop a capsule's fixed header lines and everything from the footer marker on.
 */
export function trimPage(text: string, options: ExtractOptions = {}): string {
  let lines = text.split(/\r?\n/);

  if (options.stripLines && options.stripLines > 0) {
    lines = lines.slice(options.stripLines);
  }

  const marker = options.footerMarker;
  if (marker) {
    const footerIndex = lines.findIndex((line) => line.trim() === marker);
    if (footerIndex !== -1) {
      lines = lines.slice(0, footerIndex);
    }
  }

  return lines.join("\n");
}

/**
 * True if a document should be treated as HTML.
 */
export function isHtml(mimeType: string, text: string): boolean {
  return mimeType === "text/html" || mimeType === "application/xhtml+xml" || /^\s*<(!doctype html|html)/i.test(text);
}

/**
 * Parse an HTML page. Bytes are decoded the way browsers do: byte order
 * mark, then the server's charset, then <meta charset>, then UTF-8.
 */
function loadHtml(html: string | HtmlSource): cheerio.CheerioAPI {
  if (typeof html === "string") {
    return cheerio.load(html);
  }
  return cheerio.loadBuffer(Buffer.from(html.body), {
    encoding: { transportLayerEncodingLabel: html.charset, defaultEncoding: "utf-8" },
  });
}

/**
 * Extract title and main text from an HTML page.
 * Chrome is removed before the title is looked up. Title order: h1 in the
 * content container, any remaining h1, a lower heading in the container,
 * og:title, <title>.
 */
export function extractHtml(html: string | HtmlSource): PageText {
  const $ = loadHtml(html);

  $(CHROME_SELECTORS).remove();

  let container: ReturnType<typeof $> = $("body").first();
  for (const selector of CONTENT_SELECTORS) {
    const candidate = $(selector).first();
    if (candidate.length > 0) {
      container = candidate;
      break;
    }
  }

  const heading = [container.find("h1"), $("h1"), container.find("h2, h3, h4, h5, h6")]
    .map((headings) => headings.first())
    .find((candidate) => candidate.text().trim() !== "");

  let title: string;
  if (heading) {
    title = heading.text().trim();
    // Shown as the chapter heading; keep it out of the body
    heading.remove();
  } else {
    title = $('meta[property="og:title"]').attr("content")?.trim() || $("title").first().text().trim();
  }

  const contentHtml = container.html() ?? "";
  return { title, body: contentHtml.trim() ? textConverter.turndown(contentHtml) : "" };
}

/**
 * Extract title and text from a gemtext (or plain text) page.
 * The first level-1 heading becomes the title and is removed from the body.
 */
export function extractGemtext(text: string, options: ExtractOptions = {}): PageText {
  const lines = parseGemtext(trimPage(text, options));
  const headingIndex = lines.findIndex((line) => line.type === "heading" && line.level === 1);

  let title = "";
  let bodyLines: GemtextLine[] = lines;
  if (headingIndex !== -1) {
    const heading = lines[headingIndex];
    title = heading.type === "heading" ? heading.text : "";
    bodyLines = lines.filter((_line, index) => index !== headingIndex);
  }

  return { title, body: renderPlainText(bodyLines) };
}

/**
 * Fetch an entry's page and extract a chapter from it.
 * Every call performs a new request.
 *
 * @throws {FetchError} If the page cannot be retrieved
 * @throws {ExtractError} If the page has no usable text
 */
export async function extractChapter(entry: FeedEntry, fetcher: Fetcher, options: ExtractOptions = {}): Promise<Chapter> {
  const doc = await fetcher.fetch(entry.url);

  if (!isTextual(doc.mimeType)) {
    throw new ExtractError(`Unsupported content type "${doc.mimeType}" at ${entry.url}`, { url: entry.url });
  }

  const text = decodeText(doc);
  const page = isHtml(doc.mimeType, text) ? extractHtml(doc) : extractGemtext(text, options);
  const body = normalizeBody(page.body);

  if (!body) {
    throw new ExtractError(`No text content found at ${entry.url}`, { url: entry.url });
  }

  return { title: page.title || entry.title, body, url: entry.url };
}
