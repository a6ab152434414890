/**
 * Interactive prompt utilities
 */

import { type AppContext, getGlobalContext } from "../context/index.ts";

/**
 * Read a single line of input from the user
 * @returns The trimmed input line, or null if EOF is reached
 */
async function readLine(ctx: AppContext): Promise<string | null> {
  const buf = new Uint8Array(1024);
  const n = await ctx.runtime.io.stdin.read(buf);
  const isInputReceived = n !== null && n > 0;
  if (isInputReceived) {
    return new TextDecoder().decode(buf.subarray(0, n)).trim();
  }
  return null;
}

/**
 * Ask the user to type `yes` before a destructive operation.
 *
 * Set FASTCOLLECT_FORCE_INTERACTIVE=1 to prompt even when stdin is not
 * detected as a terminal (pseudo-terminals in end-to-end tests).
 *
 * @returns true only when the user typed `yes`
 */
export async function confirm(
  message: string,
  ctx: AppContext = getGlobalContext(),
): Promise<boolean> {
  const { runtime } = ctx;
  const encoder = new TextEncoder();

  const forceInteractive = runtime.env.get("FASTCOLLECT_FORCE_INTERACTIVE") === "1";
  const isInteractive = forceInteractive || runtime.io.stdin.isTerminal();

  if (!isInteractive) {
    console.error("Error: Cannot ask for confirmation in non-interactive mode. Use --no-input.");
    return false;
  }

  while (true) {
    // writeSync so the prompt shows before blocking on stdin
    runtime.io.stderr.writeSync(encoder.encode(`${message}\n\nType 'yes' to continue, or 'no' to cancel: `));
    const input = await readLine(ctx);

    if (input === null) {
      return false;
    }

    const answer = input.toLowerCase();
    if (answer === "yes") {
      return true;
    }
    if (answer === "no") {
      return false;
    }

    runtime.io.stderr.writeSync(encoder.encode("Please type 'yes' or 'no'.\n"));
  }
}
