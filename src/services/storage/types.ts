/**
 * Where a collected file comes from.
 *
 * A source may be a plain directory or any other storage that can hand out
 * file contents; link operations additionally need a local path.
 */
export interface SourceLocation {
  /** Human readable location, used in log lines */
  readonly location: string;

  /**
   * Local file system path of a file within this source
   */
  path(name: string): string;

  /**
   * Read the content of a file within this source
   */
  read(name: string): Promise<Uint8Array>;

  /**
   * Last modification time of a file, or null when unknown
   */
  modifiedTime(name: string): Promise<Date | null>;
}

/**
 * A collected file as recorded during discovery: its origin, kept so
 * post-processing never depends on a transfer still in flight.
 */
export interface ModifiedFileEntry {
  readonly source: SourceLocation;
  readonly sourcePath: string;
}

/**
 * Destination path → original source, in discovery order.
 */
export type ModifiedFileRecord = Map<string, ModifiedFileEntry>;

/**
 * Outcome of post-processing one file
 */
export type PostProcessResult =
  | { readonly kind: "processed"; readonly originalPath: string; readonly processedPath: string }
  | { readonly kind: "skipped"; readonly originalPath: string }
  | { readonly kind: "failed"; readonly originalPath: string; readonly error: unknown };

export interface PostProcessOptions {
  dryRun: boolean;
}

/**
 * Destination storage capabilities used by the collector.
 *
 * Implementations must tolerate concurrent calls: the worker pool invokes
 * `copy` and `link` from many workers at once.
 */
export interface StorageBackend {
  /** Human readable destination, used in the summary line */
  readonly location: string;

  exists(path: string): Promise<boolean>;

  /**
   * Last modification time of a stored file, or null when it does not exist
   */
  modifiedTime(path: string): Promise<Date | null>;

  /**
   * Whether the stored file is a symbolic link
   */
  isLink(path: string): Promise<boolean>;

  /**
   * Store a copy of `sourcePath` from `source` as `destinationPath`,
   * overwriting any existing file.
   */
  copy(sourcePath: string, destinationPath: string, source: SourceLocation): Promise<void>;

  /**
   * Store `destinationPath` as a symbolic link to `sourcePath` in `source`,
   * replacing any existing file.
   */
  link(sourcePath: string, destinationPath: string, source: SourceLocation): Promise<void>;

  /**
   * Delete a stored file. Deleting a missing file is not an error.
   */
  delete(path: string): Promise<void>;

  /**
   * Every stored file, as destination paths
   */
  listAll(): Promise<string[]>;

  /**
   * Optional post-processing over the files collected in this run
   */
  postProcess?(
    files: ModifiedFileRecord,
    options: PostProcessOptions,
  ): AsyncIterable<PostProcessResult>;
}
