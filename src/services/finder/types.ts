import type { SourceLocation } from "../storage/types.ts";

/**
 * A source directory to collect from
 */
export interface SourceDirectory {
  /** Absolute path of the directory */
  path: string;
  /** Destination sub-directory the files are collected into */
  prefix?: string;
}

/**
 * A file yielded by a Finder
 */
export interface FoundFile {
  /** Path within the source location */
  readonly sourcePath: string;
  /** POSIX path within the destination storage */
  readonly destinationPath: string;
  readonly source: SourceLocation;
}

/**
 * Lazily enumerates the files to collect, in a deterministic order.
 */
export interface Finder {
  list(ignorePatterns: string[]): AsyncIterable<FoundFile>;
}
