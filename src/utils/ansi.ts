export const RED = "\x1b[31m";
export const GREEN = "\x1b[32m";
export const YELLOW = "\x1b[33m";
export const BOLD = "\x1b[1m";
export const DIM = "\x1b[2m";
export const RESET = "\x1b[0m";

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;?]*[A-Za-z]/g;

let _colorEnabled: boolean | null = null;

function detectColorSupport(): boolean {
  const env = process.env;
  const forceColor = env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== "0";
  if (forceColor) return true;

  const noColor = env.NO_COLOR !== undefined || env.FORCE_COLOR === "0";
  if (noColor) return false;

  return process.stderr.isTTY ?? false;
}

export function isColorEnabled(): boolean {
  if (_colorEnabled === null) {
    _colorEnabled = detectColorSupport();
  }
  return _colorEnabled;
}

/** Reset cached color detection (for testing). */
export function resetColorDetection(): void {
  _colorEnabled = null;
}

/** Wrap message with ANSI color codes when color is enabled. */
export function colorize(color: string, message: string): string {
  const shouldColorize = isColorEnabled();
  if (!shouldColorize) return message;
  return `${color}${message}${RESET}`;
}

/** Remove ANSI escape sequences, e.g. to measure or compare rendered text. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}
