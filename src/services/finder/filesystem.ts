import fg from "fast-glob";
import { posix } from "node:path";
import { type AppContext, getGlobalContext } from "../../context/index.ts";
import { warnLog, type OutputOptions } from "../../utils/output.ts";
import { FileSystemSource } from "../storage/filesystem.ts";
import type { Finder, FoundFile, SourceDirectory } from "./types.ts";

/** Ignored unless default ignore patterns are turned off */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = ["CVS", ".*", "*~"];

/**
 * Convert ignore patterns to fast-glob ignore globs.
 *
 * A pattern without `/` matches a file or directory name at any depth;
 * a pattern with `/` is matched against the path within the source.
 */
export function toIgnoreGlobs(patterns: readonly string[]): string[] {
  return patterns.flatMap((pattern) => {
    const trimmed = pattern.replace(/\/+$/, "");
    if (trimmed.includes("/")) {
      return [trimmed, `${trimmed}/**`];
    }
    return [`**/${trimmed}`, `**/${trimmed}/**`];
  });
}

/**
 * Join a destination prefix and a path within the source
 */
export function prefixedPath(prefix: string | undefined, path: string): string {
  return prefix ? posix.join(prefix, path) : path;
}

/**
 * Finds files in local source directories, one directory after another
 */
export class FileSystemFinder implements Finder {
  constructor(
    private readonly directories: readonly SourceDirectory[],
    private readonly output: OutputOptions = {},
    private readonly ctx: AppContext = getGlobalContext(),
  ) {}

  private async isDirectory(path: string): Promise<boolean> {
    try {
      const info = await this.ctx.runtime.fs.stat(path);
      return info.isDirectory;
    } catch (error) {
      if (this.ctx.runtime.errors.isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async *list(ignorePatterns: string[]): AsyncGenerator<FoundFile> {
    const ignore = toIgnoreGlobs(ignorePatterns);

    for (const directory of this.directories) {
      if (!(await this.isDirectory(directory.path))) {
        warnLog(`Warning: Skipping missing source directory: ${directory.path}`, this.output);
        continue;
      }

      const entries = await fg("**/*", {
        cwd: directory.path,
        onlyFiles: true,
        dot: true,
        ignore,
      });
      entries.sort();

      const source = new FileSystemSource(directory.path, this.ctx);
      for (const entry of entries) {
        yield {
          sourcePath: entry,
          destinationPath: prefixedPath(directory.prefix, entry),
          source,
        };
      }
    }
  }
}
