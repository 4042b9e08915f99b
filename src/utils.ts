/**
 * Utility functions for the converter
 * Extracted for testability
 */

import { errorMessage } from "./errors.js";

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/** URL schemes the fetcher knows how to retrieve */
export const SUPPORTED_PROTOCOLS = ["http:", "https:", "gemini:"];

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 * @returns Function that unregisters the callback
 */
export function onInterrupt(callback: CleanupCallback): () => void {
  cleanupCallbacks.push(callback);
  return () => {
    const index = cleanupCallbacks.indexOf(callback);
    if (index !== -1) cleanupCallbacks.splice(index, 1);
  };
}

/**
 * Run every registered cleanup callback in registration order.
 * A failing callback is reported and does not stop the others.
 */
export async function runCleanup(): Promise<void> {
  for (const callback of cleanupCallbacks) {
    try {
      await callback();
    } catch (error) {
      console.error(`Cleanup failed: ${errorMessage(error)}`);
    }
  }
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Conversion")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = async (signal: NodeJS.Signals) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);
    await runCleanup();

    // Exit with appropriate code (128 + signal number)
    // SIGINT = 2, SIGTERM = 15
    const exitCode = signal === "SIGINT" ? 130 : 143;
    process.exit(exitCode);
  };

  process.on("SIGINT", (signal) => void handler(signal));
  process.on("SIGTERM", (signal) => void handler(signal));
}

/**
 * Convert a simple glob pattern to a RegExp.
 * Supports: * (any chars except /), ** (any chars including /), ? (single char)
 *
 * @example
 * globToRegex('*.gmi').test('post.gmi') // true
 * globToRegex('**\/2024-*.gmi').test('gemini://example.org/posts/2024-01-01.gmi') // true
 */
export function globToRegex(pattern: string): RegExp {
  const escaped = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape regex special chars (except * and ?)
    .replace(/\*\*/g, "{{GLOBSTAR}}") // Temp placeholder for **
    .replace(/\*/g, "[^/]*") // * matches anything except /
    .replace(/\?/g, "[^/]") // ? matches single char except /
    .replace(/\{\{GLOBSTAR\}\}/g, ".*"); // ** matches anything including /
  return new RegExp(`^${escaped}$`);
}

/**
 * Resolve a possibly relative link against a base URL.
 * Works for non-special schemes such as gemini:// as well as http(s).
 *
 * @param href - Link target as written in the document
 * @param baseUrl - URL of the document containing the link
 * @returns Absolute URL, or null if it cannot be resolved to a host
 *
 * @example
 * resolveUrl('/p1.gmi', 'gemini://example.org/feed') // 'gemini://example.org/p1.gmi'
 * resolveUrl('../a', 'https://example.com/dir/sub/') // 'https://example.com/dir/a'
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    const resolved = new URL(href, baseUrl);
    // mailto:, urn: and similar links have no host to fetch from
    if (!resolved.host) return null;
    return resolved.href;
  } catch {
    return null;
  }
}

/**
 * Split a MIME header value (HTTP Content-Type or Gemini success meta)
 * into its lowercased type and charset.
 *
 * @param value - Header value, e.g. 'text/gemini; charset=UTF-8; lang=en'
 * @param fallbackType - Type to use when the value has none
 *
 * @example
 * parseContentType('text/html; charset=UTF-8', 'text/plain') // { mimeType: 'text/html', charset: 'utf-8' }
 * parseContentType('', 'text/gemini') // { mimeType: 'text/gemini' }
 */
export function parseContentType(value: string, fallbackType: string): { mimeType: string; charset?: string } {
  const [type = "", ...params] = value.split(";");
  const mimeType = type.trim().toLowerCase() || fallbackType;
  let charset: string | undefined;

  for (const param of params) {
    const separator = param.indexOf("=");
    if (separator === -1) continue;
    const key = param.slice(0, separator).trim().toLowerCase();
    const paramValue = param
      .slice(separator + 1)
      .trim()
      .replace(/^"|"$/g, "");
    if (key === "charset" && paramValue) {
      charset = paramValue.toLowerCase();
    }
  }

  return charset ? { mimeType, charset } : { mimeType };
}

/**
 * Guess a document type from its URL when the server sends none.
 *
 * @example
 * guessMimeType('https://example.org/feed.gmi') // 'text/gemini'
 * guessMimeType('https://example.org/atom.xml') // 'application/xml'
 */
export function guessMimeType(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return "text/plain";
  }

  if (pathname.endsWith(".gmi") || pathname.endsWith(".gemini")) return "text/gemini";
  if (pathname.endsWith(".xml") || pathname.endsWith(".atom") || pathname.endsWith(".rss")) return "application/xml";
  if (pathname.endsWith(".html") || pathname.endsWith(".htm")) return "text/html";
  return "text/plain";
}

/** Characters XML 1.0 does not allow anywhere in a document */
const XML_FORBIDDEN_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

/**
 * Escape text for inclusion in XML/XHTML content or attribute values.
 * Control characters XML cannot represent are dropped.
 *
 * @example
 * escapeXml('Tom & "Jerry" <3') // 'Tom &amp; &quot;Jerry&quot; &lt;3'
 */
export function escapeXml(text: string): string {
  return text
    .replace(XML_FORBIDDEN_CHARS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(65000) // '1m 5s'
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/** A flag name or its aliases (e.g., ['--output', '-o']) */
type FlagNames = string | readonly string[];

function matchesFlag(arg: string, flag: FlagNames): boolean {
  return typeof flag === "string" ? arg === flag : flag.includes(arg);
}

/** True if the token after a flag can be used as its value */
function isValue(next: string | undefined): next is string {
  return next !== undefined && next !== "" && !next.startsWith("--");
}

/**
 * Check if help flag is present in arguments.
 *
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return hasFlag(args, ["--help", "-h"]);
}

/**
 * Check if a boolean flag (or one of its aliases) is present.
 */
export function hasFlag(args: string[], flag: FlagNames): boolean {
  return args.some((arg) => matchesFlag(arg, flag));
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param flag - Flag to look for (e.g., '--title' or ['--output', '-o'])
 * @param defaultValue - Default value if flag not found
 */
export function getStringArg(args: string[], flag: FlagNames, defaultValue: string): string {
  return getNullableStringArg(args, flag) ?? defaultValue;
}

/**
 * Get a nullable string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: FlagNames): string | null {
  let result: string | null = null;
  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (matchesFlag(args[i], flag) && isValue(next)) {
      result = next;
    }
  }
  return result;
}

/**
 * Get a number argument value from command line arguments.
 * Non-numeric values are ignored.
 *
 * @param defaultValue - Default value if flag not found
 */
export function getNumberArg(args: string[], flag: FlagNames, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (matchesFlag(args[i], flag) && next !== undefined) {
      const parsed = parseInt(next, 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get all values for a repeatable string argument.
 *
 * @returns Array of all values for the flag
 */
export function getMultiStringArg(args: string[], flag: FlagNames): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (matchesFlag(args[i], flag) && isValue(next)) {
      values.push(next);
    }
  }
  return values;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--delay 1000', skips '1000').
 *
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], knownFlags: readonly string[] = []): string {
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      return arg;
    }
  }
  return "";
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a URL the converter can fetch.
 *
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateUrl('gemini://example.org/gemlog/') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http, https or gemini protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: "URL is required" };
  }

  try {
    const parsed = new URL(url);
    if (!SUPPORTED_PROTOCOLS.includes(parsed.protocol)) {
      return { isValid: false, error: "URL must use http, https or gemini protocol" };
    }
    if (!parsed.host) {
      return { isValid: false, error: "URL must include a host" };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: "Invalid URL format" };
  }
}
