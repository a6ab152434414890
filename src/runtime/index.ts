/**
 * Runtime detection and initialization
 *
 * This module detects the current execution environment and lazily loads
 * the matching runtime implementation.
 */

import type { Runtime } from "./types.ts";

// Re-export types
export type * from "./types.ts";

/**
 * Detect the current runtime environment
 * @throws Error if not running under Node.js
 */
function detectRuntime(): "node" {
  if (typeof process !== "undefined" && process.versions?.node) {
    return "node";
  }

  throw new Error("Unsupported runtime: fastcollect requires Node.js 20+");
}

/**
 * Current runtime name
 */
export const RUNTIME_NAME = detectRuntime();

// Runtime instance cache
let runtimeInstance: Runtime | null = null;
let runtimeInitPromise: Promise<Runtime> | null = null;

/**
 * Get the runtime implementation for the current environment
 *
 * Concurrent callers share one in-flight initialization. A failed
 * initialization is not cached, so the next call retries.
 */
export async function getRuntime(): Promise<Runtime> {
  if (runtimeInstance) {
    return runtimeInstance;
  }

  if (runtimeInitPromise) {
    return runtimeInitPromise;
  }

  runtimeInitPromise = (async () => {
    try {
      const { nodeRuntime } = await import("./node/index.ts");
      runtimeInstance = nodeRuntime;
      return runtimeInstance;
    } finally {
      runtimeInitPromise = null;
    }
  })();

  return runtimeInitPromise;
}

/**
 * Get the runtime implementation synchronously (must be initialized first)
 *
 * @throws Error if runtime has not been initialized via getRuntime()
 */
export function getRuntimeSync(): Runtime {
  if (!runtimeInstance) {
    throw new Error(
      "Runtime not initialized. Call await getRuntime() first, or use initRuntime() at startup.",
    );
  }
  return runtimeInstance;
}

/**
 * Initialize the runtime (call at application startup)
 */
export async function initRuntime(): Promise<Runtime> {
  return await getRuntime();
}
