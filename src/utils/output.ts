import { DIM, GREEN, RED, YELLOW, colorize } from "./ansi.ts";

/**
 * Output options for controlling verbosity level.
 */
export interface OutputOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Log a message to stderr unless quiet mode is enabled.
 */
export function log(message: string, options: OutputOptions): void {
  const shouldLog = !options.quiet;
  if (shouldLog) {
    console.error(message);
  }
}

/**
 * Log a verbose message to stderr when verbose mode is enabled.
 */
export function verboseLog(message: string, options: OutputOptions): void {
  const shouldLog = options.verbose && !options.quiet;
  if (shouldLog) {
    console.error(`[verbose] ${message}`);
  }
}

/**
 * Log a success message to stderr with green color.
 */
export function successLog(message: string, options: OutputOptions): void {
  const shouldLog = !options.quiet;
  if (shouldLog) {
    console.error(colorize(GREEN, message));
  }
}

/**
 * Log an error message to stderr with red color.
 * Always outputs regardless of quiet mode, as errors should never be suppressed.
 */
export function errorLog(message: string, _options?: OutputOptions): void {
  console.error(colorize(RED, message));
}

/**
 * Log a warning message to stderr with yellow color.
 * Always outputs regardless of quiet mode.
 */
export function warnLog(message: string, _options?: OutputOptions): void {
  console.warn(colorize(YELLOW, message));
}

/**
 * Log a dry-run message to stderr with dim color.
 * Suppressed only in quiet mode.
 */
export function logDryRun(message: string, options: OutputOptions = {}): void {
  if (options.quiet) return;
  console.error(colorize(DIM, `[dry-run] ${message}`));
}

/**
 * Format a count with its noun, e.g. `1 static file` / `3 static files`.
 */
export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
