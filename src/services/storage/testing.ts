/**
 * In-memory sources and storage for tests
 *
 * These stand in for a local directory and a destination storage so the
 * transfer engine can be exercised without touching the file system.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { SourceLocation, StorageBackend } from "./types.ts";

const encoder = new TextEncoder();

function toBytes(content: string | Uint8Array): Uint8Array {
  return typeof content === "string" ? encoder.encode(content) : content;
}

export interface MemorySourceFile {
  content: string | Uint8Array;
  mtime?: Date;
}

/**
 * A source location holding a fixed set of files
 */
export class MemorySource implements SourceLocation {
  private readonly files = new Map<string, MemorySourceFile>();

  constructor(
    readonly location: string,
    files: Record<string, string | MemorySourceFile> = {},
  ) {
    for (const [name, file] of Object.entries(files)) {
      this.files.set(name, typeof file === "string" ? { content: file } : file);
    }
  }

  path(name: string): string {
    return `${this.location}/${name}`;
  }

  async read(name: string): Promise<Uint8Array> {
    const file = this.files.get(name);
    if (!file) {
      throw new Error(`No such file: ${this.path(name)}`);
    }
    return toBytes(file.content);
  }

  async modifiedTime(name: string): Promise<Date | null> {
    return this.files.get(name)?.mtime ?? null;
  }

  names(): string[] {
    return [...this.files.keys()];
  }
}

export type StorageOperation = "copy" | "link" | "delete";

export interface StoredFile {
  content: Uint8Array;
  /** Link target for files stored by `link` */
  linkTarget: string | null;
  mtime: Date;
}

export interface MemoryStorageCall {
  operation: StorageOperation;
  path: string;
}

export interface MemoryStorageOptions {
  location?: string;
  /** Return an error to make the given call fail */
  failWith?: (operation: StorageOperation, path: string) => Error | undefined;
  /** Milliseconds every copy and link waits before completing */
  latency?: number;
  postProcess?: StorageBackend["postProcess"];
  now?: () => Date;
}

/**
 * Destination storage kept in a Map, recording every call it receives
 */
export class MemoryStorage implements StorageBackend {
  readonly location: string;
  readonly files = new Map<string, StoredFile>();
  readonly calls: MemoryStorageCall[] = [];
  readonly postProcess?: StorageBackend["postProcess"];

  /** Highest number of copy/link calls in progress at once */
  maxInFlight = 0;
  private inFlight = 0;

  private readonly failWith?: MemoryStorageOptions["failWith"];
  private readonly latency: number;
  private readonly now: () => Date;

  constructor(options: MemoryStorageOptions = {}) {
    this.location = options.location ?? "memory://static";
    this.failWith = options.failWith;
    this.latency = options.latency ?? 0;
    this.postProcess = options.postProcess;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Seed a stored file
   */
  put(path: string, content: string | Uint8Array, options: { mtime?: Date; linkTarget?: string } = {}): void {
    this.files.set(path, {
      content: toBytes(content),
      linkTarget: options.linkTarget ?? null,
      mtime: options.mtime ?? this.now(),
    });
  }

  text(path: string): string | undefined {
    const file = this.files.get(path);
    return file ? new TextDecoder().decode(file.content) : undefined;
  }

  callsFor(operation: StorageOperation): string[] {
    return this.calls.filter((call) => call.operation === operation).map((call) => call.path);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async modifiedTime(path: string): Promise<Date | null> {
    return this.files.get(path)?.mtime ?? null;
  }

  async isLink(path: string): Promise<boolean> {
    return (this.files.get(path)?.linkTarget ?? null) !== null;
  }

  async copy(sourcePath: string, destinationPath: string, source: SourceLocation): Promise<void> {
    await this.transfer("copy", destinationPath, async () => {
      this.put(destinationPath, await source.read(sourcePath));
    });
  }

  async link(sourcePath: string, destinationPath: string, source: SourceLocation): Promise<void> {
    await this.transfer("link", destinationPath, async () => {
      this.put(destinationPath, await source.read(sourcePath), { linkTarget: source.path(sourcePath) });
    });
  }

  async delete(path: string): Promise<void> {
    this.record("delete", path);
    this.files.delete(path);
  }

  async listAll(): Promise<string[]> {
    return [...this.files.keys()].sort();
  }

  private record(operation: StorageOperation, path: string): void {
    this.calls.push({ operation, path });
    const error = this.failWith?.(operation, path);
    if (error) {
      throw error;
    }
  }

  private async transfer(operation: StorageOperation, path: string, write: () => Promise<void>): Promise<void> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      this.record(operation, path);
      if (this.latency > 0) {
        await sleep(this.latency);
      }
      await write();
    } finally {
      this.inFlight--;
    }
  }
}
