import type { SourceLocation } from "../storage/types.ts";
import type { Finder, FoundFile } from "./types.ts";

/**
 * Finder yielding a fixed list of files, for tests
 */
export class StaticFinder implements Finder {
  /** Ignore patterns of every list() call */
  readonly received: string[][] = [];

  constructor(private readonly files: readonly FoundFile[]) {}

  async *list(ignorePatterns: string[]): AsyncGenerator<FoundFile> {
    this.received.push(ignorePatterns);
    for (const file of this.files) {
      yield file;
    }
  }
}

/**
 * Shorthand for a found file whose source path is also its destination
 */
export function found(source: SourceLocation, sourcePath: string, destinationPath = sourcePath): FoundFile {
  return { sourcePath, destinationPath, source };
}
