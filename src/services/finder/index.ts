export { DEFAULT_IGNORE_PATTERNS, FileSystemFinder, prefixedPath, toIgnoreGlobs } from "./filesystem.ts";
export type { Finder, FoundFile, SourceDirectory } from "./types.ts";
