#!/usr/bin/env node
/**
 * Convert a Gemfeed (or Atom/RSS feed) into an EPUB book
 *
 * Usage: gemfeed-to-epub <feed-url> [options]
 * Example: gemfeed-to-epub gemini://example.org/gemlog/ -o gemlog.epub --author "Jane Doe"
 */

import { realpathSync } from "node:fs";
import * as fs from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { tempPathFor } from "./epub.js";
import { errorMessage } from "./errors.js";
import { createFetcher, type Fetcher } from "./fetcher.js";
import { createLogger, type LogLevel } from "./logger.js";
import { type PipelineResult, runPipeline } from "./pipeline.js";
import {
  formatDuration,
  getMultiStringArg,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  onInterrupt,
  setupSignalHandlers,
  validateUrl,
} from "./utils.js";

const DEFAULT_OUTPUT = "output.epub";
const DEFAULT_LANGUAGE = "en";

/** Configuration options for a conversion run */
export interface CliOptions {
  feedUrl: string;
  outputPath: string;
  title: string | null;
  author: string | null;
  language: string;
  maxPages: number;
  skipUrls: string[];
  urlPattern: string | null;
  chapterDelay: number;
  stripLines: number;
  footerMarker: string | null;
  logLevel: LogLevel;
  showHelp: boolean;
}

/** Flags that take values, used for positional argument detection */
const VALUE_FLAGS = [
  "--output",
  "-o",
  "--title",
  "--author",
  "--lang",
  "--pages",
  "--skip",
  "--url-pattern",
  "--delay",
  "--strip-lines",
  "--footer-marker",
];

/**
 * Print usage information.
 */
function showUsage(print: (line: string) => void = console.log): void {
  print("Usage: gemfeed-to-epub <feed-url> [options]");
  print("");
  print("Convert a Gemfeed (or Atom/RSS feed) and the pages it links to into an EPUB book.");
  print("Feed URLs may use gemini://, https:// or http://.");
  print("");
  print("Options:");
  print(`  -o, --output <path>      Output file (default: ${DEFAULT_OUTPUT})`);
  print("  --title <text>           Book title (default: feed title)");
  print("  --author <text>          Book author (default: feed author, if any)");
  print(`  --lang <code>            Book language (default: ${DEFAULT_LANGUAGE})`);
  print('  --pages <n>              Feed pages to read, following "Older posts" (default: 1)');
  print("  --skip <text>            Skip entries whose URL contains text (can be used multiple times)");
  print("  --url-pattern <glob>     Only include entry URLs matching glob pattern");
  print("  --delay <ms>             Delay between chapter fetches (default: 0)");
  print("  --strip-lines <n>        Drop the first n lines of each gemtext page (default: 0)");
  print("  --footer-marker <text>   Cut gemtext pages at the first line equal to text");
  print("  -v, --verbose            Show every step and URL");
  print("  -q, --quiet              Only show errors");
  print("  -h, --help               Show this help message");
  print("");
  print("Example:");
  print('  gemfeed-to-epub gemini://example.org/gemlog/ -o gemlog.epub --author "Jane Doe"');
}

/**
 * Parse command line arguments.
 *
 * @param args - Command line arguments (defaults to process.argv)
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  let logLevel: LogLevel = "normal";
  if (hasFlag(args, ["--verbose", "-v"])) logLevel = "verbose";
  if (hasFlag(args, ["--quiet", "-q"])) logLevel = "quiet";

  return {
    feedUrl: getPositionalArg(args, VALUE_FLAGS),
    outputPath: getStringArg(args, ["--output", "-o"], DEFAULT_OUTPUT),
    title: getNullableStringArg(args, "--title"),
    author: getNullableStringArg(args, "--author"),
    language: getStringArg(args, "--lang", DEFAULT_LANGUAGE),
    maxPages: Math.max(1, getNumberArg(args, "--pages", 1)),
    skipUrls: getMultiStringArg(args, "--skip"),
    urlPattern: getNullableStringArg(args, "--url-pattern"),
    chapterDelay: Math.max(0, getNumberArg(args, "--delay", 0)),
    stripLines: Math.max(0, getNumberArg(args, "--strip-lines", 0)),
    footerMarker: getNullableStringArg(args, "--footer-marker"),
    logLevel,
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Describe a failed run: failing step and cause, plus the underlying
 * error chain when verbose.
 */
export function formatFailure(result: Extract<PipelineResult, { ok: false }>, verbose: boolean): string[] {
  const lines = [`Error: ${result.step}: ${result.error.message}`];

  if (verbose) {
    let cause = result.error.cause;
    while (cause !== undefined) {
      lines.push(`  Caused by: ${errorMessage(cause)}`);
      cause = cause instanceof Error ? cause.cause : undefined;
    }
  }

  return lines;
}

/**
 * Main entry point.
 * Parses arguments, runs the pipeline, and reports the outcome.
 *
 * @param fetcher - Fetcher to use; a network fetcher is created when omitted
 * @returns Process exit code
 */
export async function main(args: string[] = process.argv.slice(2), fetcher?: Fetcher): Promise<number> {
  const options = parseArgs(args);

  if (options.showHelp) {
    showUsage();
    return 0;
  }

  if (!options.feedUrl) {
    showUsage(console.error);
    return 1;
  }

  // Validate URL format before attempting to fetch
  const urlValidation = validateUrl(options.feedUrl);
  if (!urlValidation.isValid) {
    console.error(`Error: ${urlValidation.error}`);
    return 1;
  }

  const logger = createLogger(options.logLevel);

  // Never leave a half-written file behind on Ctrl+C
  const removeCleanup = onInterrupt(() => fs.rm(tempPathFor(options.outputPath), { force: true }));

  const start = Date.now();
  let result: PipelineResult;
  try {
    result = await runPipeline(
      {
        feedUrl: options.feedUrl,
        outputPath: options.outputPath,
        title: options.title,
        author: options.author,
        language: options.language,
        maxPages: options.maxPages,
        skipUrls: options.skipUrls,
        urlPattern: options.urlPattern,
        chapterDelay: options.chapterDelay,
        extract: { stripLines: options.stripLines, footerMarker: options.footerMarker },
      },
      { fetcher: fetcher ?? createFetcher(), logger },
    );
  } finally {
    removeCleanup();
  }

  if (!result.ok) {
    for (const line of formatFailure(result, options.logLevel === "verbose")) {
      logger.error(line);
    }
    return 1;
  }

  const sizeKb = (result.bytes / 1024).toFixed(1);
  logger.info(`\nDone! "${result.book.metadata.title}" saved to ${result.outputPath} (${sizeKb} KB)`);
  logger.info(`  ${result.book.chapters.length} chapters in ${formatDuration(Date.now() - start)}`);
  return 0;
}

/**
 * True when this module is the script node was started with
 * (also through an npm bin symlink).
 */
function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

// Only run main when executed directly (not when imported for testing)
if (isEntryPoint()) {
  setupSignalHandlers("Conversion");
  main()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error("Error:", error);
      process.exit(1);
    });
}
