/**
 * Testing utilities for AppContext
 *
 * This module provides mock factories for testing components
 * that depend on AppContext without requiring the full runtime.
 */

import { type AppContext, createAppContext, setGlobalContext } from "./index.ts";
import type {
  FileInfo,
  Runtime,
  RuntimeControl,
  RuntimeEnv,
  RuntimeErrors,
  RuntimeFS,
  RuntimeIO,
  RuntimeSignals,
} from "../runtime/types.ts";
import type { CollectConfig } from "../types/config.ts";
import { getRuntime } from "../runtime/index.ts";

/**
 * Options for creating a mock runtime
 */
export interface MockRuntimeOptions {
  fs?: Partial<RuntimeFS>;
  env?: Partial<RuntimeEnv>;
  control?: Partial<RuntimeControl>;
  io?: Partial<RuntimeIO>;
  errors?: Partial<RuntimeErrors>;
  signals?: Partial<RuntimeSignals>;
}

const MOCK_FILE_INFO: FileInfo = {
  isFile: true,
  isDirectory: false,
  isSymlink: false,
  size: 0,
  mtime: null,
  mode: null,
};

/**
 * Create a mock RuntimeFS
 */
function createMockFS(overrides: Partial<RuntimeFS> = {}): RuntimeFS {
  return {
    readFile: () => Promise.resolve(new Uint8Array()),
    readTextFile: () => Promise.resolve(""),
    writeFile: () => Promise.resolve(),
    mkdir: () => Promise.resolve(),
    remove: () => Promise.resolve(),
    stat: () => Promise.resolve({ ...MOCK_FILE_INFO }),
    lstat: () => Promise.resolve({ ...MOCK_FILE_INFO }),
    copyFile: () => Promise.resolve(),
    symlink: () => Promise.resolve(),
    rename: () => Promise.resolve(),
    exists: () => Promise.resolve(false),
    ...overrides,
  };
}

/**
 * Create a mock RuntimeEnv backed by an in-memory map
 */
function createMockEnv(overrides: Partial<RuntimeEnv> = {}): RuntimeEnv {
  const envMap = new Map<string, string>();
  return {
    get: (key) => envMap.get(key),
    set: (key, value) => {
      envMap.set(key, value);
    },
    ...overrides,
  };
}

/**
 * Create a mock RuntimeControl whose exit() throws instead of exiting
 */
function createMockControl(overrides: Partial<RuntimeControl> = {}): RuntimeControl {
  return {
    exit: (code: number): never => {
      throw new Error(`exit called with ${code}`);
    },
    cwd: () => "/mock/cwd",
    args: [],
    ...overrides,
  };
}

/**
 * Create a mock RuntimeIO
 */
function createMockIO(overrides: Partial<RuntimeIO> = {}): RuntimeIO {
  return {
    stdin: {
      read: () => Promise.resolve(null),
      isTerminal: () => false,
    },
    stderr: {
      writeSync: () => 0,
      isTerminal: () => false,
    },
    ...overrides,
  };
}

/**
 * Create a mock RuntimeErrors
 */
function createMockErrors(overrides: Partial<RuntimeErrors> = {}): RuntimeErrors {
  class MockNotFound extends Error {
    constructor(message?: string) {
      super(message ?? "Not found");
      this.name = "NotFound";
    }
  }

  return {
    NotFound: MockNotFound,
    isNotFound: (error) => error instanceof MockNotFound,
    ...overrides,
  };
}

/**
 * Create a mock RuntimeSignals
 */
function createMockSignals(overrides: Partial<RuntimeSignals> = {}): RuntimeSignals {
  return {
    addListener: () => {},
    removeListener: () => {},
    ...overrides,
  };
}

/**
 * Create a mock Runtime for testing
 */
export function createMockRuntime(options: MockRuntimeOptions = {}): Runtime {
  return {
    name: "node",
    fs: createMockFS(options.fs),
    env: createMockEnv(options.env),
    control: createMockControl(options.control),
    io: createMockIO(options.io),
    errors: createMockErrors(options.errors),
    signals: createMockSignals(options.signals),
  };
}

/**
 * Options for creating a mock AppContext
 */
export interface MockAppContextOptions extends MockRuntimeOptions {
  config?: CollectConfig;
}

/**
 * Create a mock AppContext for testing
 */
export function createMockContext(options: MockAppContextOptions = {}): AppContext {
  const { config, ...runtimeOptions } = options;
  return {
    runtime: createMockRuntime(runtimeOptions),
    config,
  };
}

/**
 * Install a mock AppContext as the global context
 */
export function setupTestContext(options: MockAppContextOptions = {}): AppContext {
  const ctx = createMockContext(options);
  setGlobalContext(ctx);
  return ctx;
}

/**
 * Install a context backed by the real Node.js runtime as the global context
 */
export async function setupRealTestContext(): Promise<AppContext> {
  const runtime = await getRuntime();
  const ctx = createAppContext(runtime);
  setGlobalContext(ctx);
  return ctx;
}
