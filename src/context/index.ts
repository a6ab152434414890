/**
 * Application Context
 *
 * This module provides dependency injection for the fastcollect CLI.
 * Instead of reaching for the runtime singleton directly, functions accept
 * an AppContext parameter with a default value.
 */

import type { Runtime } from "../runtime/types.ts";
import type { CollectConfig } from "../types/config.ts";

/**
 * Application context containing all dependencies
 */
export interface AppContext {
  /** Runtime abstraction for file system, environment and I/O */
  readonly runtime: Runtime;
  /** Merged configuration from .fastcollect.toml (optional) */
  config?: CollectConfig;
}

// Global context instance
let globalContext: AppContext | null = null;

/**
 * Set the global application context
 *
 * Call this at application startup after initializing the runtime.
 */
export function setGlobalContext(ctx: AppContext): void {
  globalContext = ctx;
}

/**
 * Get the global application context
 *
 * @throws Error if context has not been initialized
 */
export function getGlobalContext(): AppContext {
  if (!globalContext) {
    throw new Error("AppContext not initialized. Call setGlobalContext() at application startup.");
  }
  return globalContext;
}

/**
 * Check if global context is initialized
 */
export function hasGlobalContext(): boolean {
  return globalContext !== null;
}

/**
 * Create an AppContext from a runtime instance
 */
export function createAppContext(runtime: Runtime): AppContext {
  return { runtime };
}

/**
 * Reset global context (for testing purposes)
 */
export function resetGlobalContext(): void {
  globalContext = null;
}
