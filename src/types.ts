/**
 * Shared type definitions for the converter
 */

/** A single link discovered in the feed */
export interface FeedEntry {
  /** Entry title taken from the link label */
  readonly title: string;
  /** Absolute URL of the linked page */
  readonly url: string;
  /** Zero-based position in feed order */
  readonly order: number;
  /** Publication date (YYYY-MM-DD or ISO) when the feed gives one */
  readonly published?: string;
}

/** Extracted content of one linked page */
export interface Chapter {
  readonly title: string;
  /** Plain text, one paragraph per line */
  readonly body: string;
  /** Page the chapter was extracted from */
  readonly url: string;
}

/** Book-level metadata, constant for a run */
export interface BookMetadata {
  readonly title: string;
  readonly author?: string;
  /** BCP 47 language code (e.g., 'en') */
  readonly language: string;
  /** Stable identifier, e.g. 'urn:uuid:...' */
  readonly identifier: string;
  /** ISO timestamp used for dcterms:modified and archive entry dates */
  readonly modified: string;
}

/** The sole output artifact of a run */
export interface Book {
  readonly metadata: BookMetadata;
  readonly chapters: readonly Chapter[];
}

/** Raw response returned by a Fetcher */
export interface FetchedDocument {
  /** Final URL after redirects */
  readonly url: string;
  /** MIME type without parameters, lowercased (e.g., 'text/gemini') */
  readonly mimeType: string;
  /** Charset declared by the server, lowercased; absent when none was sent */
  readonly charset?: string;
  readonly body: Uint8Array;
}

/** Result of parsing one feed document */
export interface ParsedFeed {
  readonly title?: string;
  readonly author?: string;
  readonly entries: FeedEntry[];
  /** Absolute URL of the next ("Older posts") feed page, if linked */
  readonly nextPageUrl?: string;
}
