/**
 * Node.js environment implementation
 */

import type { RuntimeControl, RuntimeEnv, RuntimeSignals, Signal } from "../types.ts";

export const nodeEnv: RuntimeEnv = {
  get(key: string): string | undefined {
    return process.env[key];
  },

  set(key: string, value: string): void {
    process.env[key] = value;
  },
};

export const nodeControl: RuntimeControl = {
  exit(code: number): never {
    process.exit(code);
  },

  cwd(): string {
    return process.cwd();
  },

  get args(): readonly string[] {
    // Skip first two arguments (node and script path)
    return process.argv.slice(2);
  },
};

export const nodeSignals: RuntimeSignals = {
  addListener(signal: Signal, handler: () => void): void {
    process.on(signal, handler);
  },

  removeListener(signal: Signal, handler: () => void): void {
    process.off(signal, handler);
  },
};
