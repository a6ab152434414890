import fg from "fast-glob";
import { randomUUID } from "node:crypto";
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { type AppContext, getGlobalContext } from "../../context/index.ts";
import { FileSystemError } from "../../errors/index.ts";
import type { FileInfo } from "../../runtime/types.ts";
import type { SourceLocation, StorageBackend } from "./types.ts";

/**
 * A source directory on the local file system
 */
export class FileSystemSource implements SourceLocation {
  readonly location: string;

  constructor(root: string, private readonly ctx: AppContext = getGlobalContext()) {
    this.location = resolve(root);
  }

  path(name: string): string {
    return join(this.location, name);
  }

  read(name: string): Promise<Uint8Array> {
    return this.ctx.runtime.fs.readFile(this.path(name));
  }

  async modifiedTime(name: string): Promise<Date | null> {
    try {
      const info = await this.ctx.runtime.fs.stat(this.path(name));
      return info.mtime;
    } catch (error) {
      if (this.ctx.runtime.errors.isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }
}

export interface FileSystemStorageOptions {
  /** Create symlinks relative to the link's directory instead of absolute */
  relativeLinks?: boolean;
}

/**
 * Destination storage rooted at a local directory
 */
export class FileSystemStorage implements StorageBackend {
  readonly location: string;
  protected readonly relativeLinks: boolean;

  constructor(
    root: string,
    options: FileSystemStorageOptions = {},
    protected readonly ctx: AppContext = getGlobalContext(),
  ) {
    this.location = resolve(root);
    this.relativeLinks = options.relativeLinks ?? false;
  }

  /**
   * Absolute path of a stored file.
   *
   * @throws FileSystemError when the path escapes the storage root
   */
  protected resolvePath(path: string): string {
    const fullPath = resolve(this.location, path);
    const relativePath = relative(this.location, fullPath);
    const isOutsideRoot =
      relativePath === "" ||
      relativePath === ".." ||
      relativePath.startsWith(`..${sep}`) ||
      isAbsolute(relativePath);
    if (isOutsideRoot) {
      throw new FileSystemError("access", path, new Error(`outside of '${this.location}'`));
    }
    return fullPath;
  }

  private async lstatOrNull(path: string): Promise<FileInfo | null> {
    try {
      return await this.ctx.runtime.fs.lstat(this.resolvePath(path));
    } catch (error) {
      if (this.ctx.runtime.errors.isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async exists(path: string): Promise<boolean> {
    return (await this.lstatOrNull(path)) !== null;
  }

  async modifiedTime(path: string): Promise<Date | null> {
    const info = await this.lstatOrNull(path);
    return info?.mtime ?? null;
  }

  async isLink(path: string): Promise<boolean> {
    const info = await this.lstatOrNull(path);
    return info?.isSymlink ?? false;
  }

  async copy(sourcePath: string, destinationPath: string, source: SourceLocation): Promise<void> {
    const fullPath = this.resolvePath(destinationPath);
    await this.ctx.runtime.fs.mkdir(dirname(fullPath), { recursive: true });

    // Never write through a link left by an earlier --link run
    if (await this.isLink(destinationPath)) {
      await this.delete(destinationPath);
    }

    await this.ctx.runtime.fs.copyFile(source.path(sourcePath), fullPath);
  }

  async link(sourcePath: string, destinationPath: string, source: SourceLocation): Promise<void> {
    const fullPath = this.resolvePath(destinationPath);
    const absoluteTarget = source.path(sourcePath);
    const target = this.relativeLinks ? relative(dirname(fullPath), absoluteTarget) : absoluteTarget;

    await this.ctx.runtime.fs.mkdir(dirname(fullPath), { recursive: true });

    // Several workers may link the same destination at once
    const tempPath = join(dirname(fullPath), `.${basename(fullPath)}.${randomUUID()}.tmp`);
    await this.ctx.runtime.fs.symlink(target, tempPath);
    try {
      await this.ctx.runtime.fs.rename(tempPath, fullPath);
    } catch (error) {
      await this.ctx.runtime.fs.remove(tempPath);
      throw error;
    }
  }

  async delete(path: string): Promise<void> {
    try {
      await this.ctx.runtime.fs.remove(this.resolvePath(path));
    } catch (error) {
      if (!this.ctx.runtime.errors.isNotFound(error)) {
        throw error;
      }
    }
  }

  async listAll(): Promise<string[]> {
    const rootExists = await this.ctx.runtime.fs.exists(this.location);
    if (!rootExists) {
      return [];
    }

    const entries = await fg("**/*", {
      cwd: this.location,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
    });
    return entries.sort();
  }

  /**
   * Write raw bytes to a stored file, creating parent directories
   */
  protected async writeBytes(path: string, content: Uint8Array): Promise<void> {
    const fullPath = this.resolvePath(path);
    await this.ctx.runtime.fs.mkdir(dirname(fullPath), { recursive: true });
    await this.ctx.runtime.fs.writeFile(fullPath, content);
  }
}
