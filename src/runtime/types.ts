/**
 * Runtime abstraction layer types
 *
 * This module defines the interfaces the collector uses for file system,
 * environment and I/O access, so that commands and storage backends can be
 * exercised against mock runtimes in tests.
 */

// ===== File System Types =====

/**
 * File information returned by stat operations
 */
export interface FileInfo {
  isFile: boolean;
  isDirectory: boolean;
  isSymlink: boolean;
  size: number;
  mtime: Date | null;
  mode: number | null;
}

/**
 * Options for mkdir operations
 */
export interface MkdirOptions {
  recursive?: boolean;
  mode?: number;
}

/**
 * Options for remove operations
 */
export interface RemoveOptions {
  recursive?: boolean;
}

/**
 * Runtime file system interface
 */
export interface RuntimeFS {
  /**
   * Read file contents as Uint8Array
   */
  readFile(path: string): Promise<Uint8Array>;

  /**
   * Read file contents as UTF-8 string
   */
  readTextFile(path: string): Promise<string>;

  /**
   * Write binary content to a file
   */
  writeFile(path: string, data: Uint8Array): Promise<void>;

  /**
   * Create a directory
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * Remove a file or directory
   */
  remove(path: string, options?: RemoveOptions): Promise<void>;

  /**
   * Get file/directory information, following symlinks
   */
  stat(path: string): Promise<FileInfo>;

  /**
   * Get file/directory information without following symlinks
   */
  lstat(path: string): Promise<FileInfo>;

  /**
   * Copy a file
   */
  copyFile(src: string, dest: string): Promise<void>;

  /**
   * Create a symbolic link at `path` pointing to `target`
   */
  symlink(target: string, path: string): Promise<void>;

  /**
   * Move `src` to `dest`, replacing `dest` if it exists
   */
  rename(src: string, dest: string): Promise<void>;

  /**
   * Check if a path exists
   */
  exists(path: string): Promise<boolean>;
}

// ===== Environment Types =====

/**
 * Runtime environment interface
 */
export interface RuntimeEnv {
  /**
   * Get an environment variable
   */
  get(key: string): string | undefined;

  /**
   * Set an environment variable
   */
  set(key: string, value: string): void;
}

// ===== Process Control Types =====

/**
 * Runtime process control interface
 */
export interface RuntimeControl {
  /**
   * Exit the process with the given code
   */
  exit(code: number): never;

  /**
   * Get the current working directory
   */
  cwd(): string;

  /**
   * Command-line arguments (excluding runtime and script name)
   */
  readonly args: readonly string[];
}

// ===== I/O Types =====

/**
 * Standard input stream
 */
export interface StdinStream {
  /**
   * Read bytes into buffer, returns number of bytes read or null if EOF
   */
  read(buffer: Uint8Array): Promise<number | null>;

  /**
   * Check if stdin is a terminal (TTY)
   */
  isTerminal(): boolean;
}

/**
 * Standard error stream
 */
export interface StderrStream {
  /**
   * Write bytes synchronously, returns number of bytes written
   */
  writeSync(data: Uint8Array): number;

  /**
   * Check if stderr is a terminal (TTY)
   */
  isTerminal(): boolean;
}

/**
 * Runtime I/O interface
 */
export interface RuntimeIO {
  readonly stdin: StdinStream;
  readonly stderr: StderrStream;
}

// ===== Error Types =====

/**
 * Runtime-specific error class constructors
 */
export interface RuntimeErrors {
  /**
   * File/directory not found
   */
  NotFound: new (message?: string) => Error;

  /**
   * Check if error is NotFound
   */
  isNotFound(error: unknown): boolean;
}

// ===== Signal Types =====

/**
 * Signal types for process signals
 */
export type Signal = "SIGINT" | "SIGTERM";

/**
 * Signal handler interface
 */
export interface RuntimeSignals {
  /**
   * Add a signal listener
   */
  addListener(signal: Signal, handler: () => void): void;

  /**
   * Remove a signal listener
   */
  removeListener(signal: Signal, handler: () => void): void;
}

// ===== Unified Runtime Interface =====

/**
 * Unified runtime interface providing platform-agnostic access to
 * file system, environment, and I/O operations.
 */
export interface Runtime {
  /** Runtime name identifier */
  readonly name: "node";

  /** File system operations */
  readonly fs: RuntimeFS;

  /** Environment variables */
  readonly env: RuntimeEnv;

  /** Process control (exit, cwd, args) */
  readonly control: RuntimeControl;

  /** Standard I/O streams */
  readonly io: RuntimeIO;

  /** Runtime-specific errors */
  readonly errors: RuntimeErrors;

  /** Signal handling */
  readonly signals: RuntimeSignals;
}
