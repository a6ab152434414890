/**
 * Node.js I/O implementation
 */

import { Buffer } from "node:buffer";
import type { RuntimeIO, StderrStream, StdinStream } from "../types.ts";

/**
 * Copy as much of `chunk` as fits into `target`, returning the byte count.
 */
function fillBuffer(chunk: Buffer | string, target: Uint8Array): number {
  const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
  const length = Math.min(bytes.length, target.length);
  target.set(bytes.subarray(0, length));
  return length;
}

const stdinStream: StdinStream = {
  read(buffer: Uint8Array): Promise<number | null> {
    const stdin = process.stdin;

    // Data already buffered by the stream
    const buffered: Buffer | string | null = stdin.read(buffer.length);
    if (buffered !== null) {
      return Promise.resolve(fillBuffer(buffered, buffer));
    }

    return new Promise((resolve, reject) => {
      const wasPaused = stdin.isPaused();
      if (wasPaused) {
        stdin.resume();
      }

      const cleanup = () => {
        stdin.off("data", onData);
        stdin.off("end", onEnd);
        stdin.off("error", onError);
        if (wasPaused) {
          stdin.pause();
        }
      };
      const onData = (chunk: Buffer | string) => {
        cleanup();
        resolve(fillBuffer(chunk, buffer));
      };
      const onEnd = () => {
        cleanup();
        resolve(null);
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };

      stdin.once("data", onData);
      stdin.once("end", onEnd);
      stdin.once("error", onError);
    });
  },

  isTerminal(): boolean {
    return process.stdin.isTTY ?? false;
  },
};

const stderrStream: StderrStream = {
  writeSync(data: Uint8Array): number {
    process.stderr.write(data);
    return data.length;
  },

  isTerminal(): boolean {
    return process.stderr.isTTY ?? false;
  },
};

export const nodeIO: RuntimeIO = {
  stdin: stdinStream,
  stderr: stderrStream,
};
