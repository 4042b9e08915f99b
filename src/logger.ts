/**
 * Console output with verbosity levels
 */

export type LogLevel = "quiet" | "normal" | "verbose";

export interface Logger {
  readonly level: LogLevel;
  /** Regular progress messages (hidden in quiet mode) */
  info(message: string): void;
  /** Detailed tracing (verbose mode only) */
  debug(message: string): void;
  /** Always printed, to stderr */
  error(message: string): void;
  /** Per-chapter progress bar (hidden in quiet mode) */
  progress(current: number, total: number, title: string): void;
}

/**
 * Render a progress bar line.
 * Shows percentage, counts, and current item title.
 *
 * @param current - Current item number (1-based)
 * @param total - Total number of items
 * @param title - Title of the current item being processed (padded or truncated to 40 chars)
 */
export function formatProgressBar(current: number, total: number, title: string): string {
  const barWidth = 30;
  const percent = Math.round((current / total) * 100);
  const filled = Math.round((current / total) * barWidth);
  const empty = barWidth - filled;
  const bar = "=".repeat(filled) + " ".repeat(empty);

  // Truncate title to fit in terminal
  const maxTitleLen = 40;
  const shortTitle = title.length > maxTitleLen ? `${title.slice(0, maxTitleLen - 3)}...` : title.padEnd(maxTitleLen);

  return `[${bar}] ${percent.toString().padStart(3)}% (${current}/${total}) ${shortTitle}`;
}

/**
 * Display a progress bar in the terminal, redrawing the current line.
 */
export function progressBar(current: number, total: number, title: string): void {
  process.stdout.write(`\r${formatProgressBar(current, total, title)}`);

  if (current === total) {
    process.stdout.write("\n");
  }
}

/**
 * Create a console logger for the given verbosity.
 * In verbose mode every message gets its own line, so the progress bar
 * is printed as plain lines instead of being redrawn.
 */
export function createLogger(level: LogLevel = "normal"): Logger {
  return {
    level,
    info(message) {
      if (level !== "quiet") console.log(message);
    },
    debug(message) {
      if (level === "verbose") console.log(`  ${message}`);
    },
    error(message) {
      console.error(message);
    },
    progress(current, total, title) {
      if (level === "quiet") return;
      if (level === "verbose") {
        console.log(`  [${current}/${total}] ${title}`);
      } else {
        progressBar(current, total, title);
      }
    },
  };
}
