import { z } from "zod";
import { type AppContext, getGlobalContext } from "../../context/index.ts";
import { calculateHashFromContent, hashedFileName } from "../../utils/hash.ts";
import { FileSystemStorage, type FileSystemStorageOptions } from "./filesystem.ts";
import type { ModifiedFileRecord, PostProcessOptions, PostProcessResult } from "./types.ts";

export const DEFAULT_MANIFEST_NAME = "staticfiles.json";
export const MANIFEST_VERSION = "1.0";

export interface ManifestStorageOptions extends FileSystemStorageOptions {
  manifestName?: string;
}

/**
 * Manifest file contents: original path → hashed path
 */
export const ManifestSchema = z.object({
  version: z.string(),
  paths: z.record(z.string()),
});

export type Manifest = z.infer<typeof ManifestSchema>;

/**
 * File system storage that stores a content-hashed copy of every collected
 * file and writes a manifest mapping original names to hashed ones.
 */
export class ManifestStorage extends FileSystemStorage {
  readonly manifestName: string;

  constructor(
    root: string,
    options: ManifestStorageOptions = {},
    ctx: AppContext = getGlobalContext(),
  ) {
    super(root, options, ctx);
    this.manifestName = options.manifestName ?? DEFAULT_MANIFEST_NAME;
  }

  /**
   * Hash every recorded file, in record order.
   *
   * Contents are read from the source location, never from the destination,
   * so a file whose transfer failed is still processed. Stops at the first
   * failure without writing the manifest.
   */
  async *postProcess(
    files: ModifiedFileRecord,
    options: PostProcessOptions,
  ): AsyncGenerator<PostProcessResult> {
    if (options.dryRun) {
      return;
    }

    const paths: Record<string, string> = {};

    for (const [originalPath, { source, sourcePath }] of files) {
      let result: PostProcessResult;
      try {
        const content = await source.read(sourcePath);
        const processedPath = hashedFileName(originalPath, calculateHashFromContent(content));
        paths[originalPath] = processedPath;

        if (await this.exists(processedPath)) {
          result = { kind: "skipped", originalPath };
        } else {
          await this.writeBytes(processedPath, content);
          result = { kind: "processed", originalPath, processedPath };
        }
      } catch (error) {
        yield { kind: "failed", originalPath, error };
        return;
      }
      yield result;
    }

    await this.writeManifest({ version: MANIFEST_VERSION, paths });
  }

  async readManifest(): Promise<Manifest | null> {
    try {
      const content = await this.ctx.runtime.fs.readTextFile(this.resolvePath(this.manifestName));
      const result = ManifestSchema.safeParse(JSON.parse(content));
      return result.success ? result.data : null;
    } catch (error) {
      if (this.ctx.runtime.errors.isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  private async writeManifest(manifest: Manifest): Promise<void> {
    const content = JSON.stringify(manifest, null, 2) + "\n";
    await this.writeBytes(this.manifestName, new TextEncoder().encode(content));
  }
}
