import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from "vitest";
import { lstat, mkdir, mkdtemp, readdir, readFile, readlink, rm, symlink, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { AppContext } from "../../context/index.ts";
import { setupRealTestContext } from "../../context/testing.ts";
import { FileSystemError } from "../../errors/index.ts";
import { found, StaticFinder } from "../finder/testing.ts";
import { CollectionCoordinator } from "../transfer/coordinator.ts";
import { FileSystemSource, FileSystemStorage } from "./filesystem.ts";

let ctx: AppContext;

beforeAll(async () => {
  ctx = await setupRealTestContext();
});

describe("FileSystemStorage", () => {
  let tempDir: string;
  let sourceDir: string;
  let staticDir: string;
  let source: FileSystemSource;

  async function createSourceFile(name: string, content: string): Promise<void> {
    const path = join(sourceDir, name);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "fastcollect-storage-"));
    sourceDir = join(tempDir, "src");
    staticDir = join(tempDir, "static");
    await mkdir(sourceDir);
    source = new FileSystemSource(sourceDir, ctx);
    await createSourceFile("css/app.css", "body {}");
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("copy", () => {
    it("creates parent directories and copies the content", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);

      await storage.copy("css/app.css", "css/app.css", source);

      expect(await readFile(join(staticDir, "css/app.css"), "utf-8")).toBe("body {}");
    });

    it("replaces a symlink instead of writing through it", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);
      const outside = join(tempDir, "outside.css");
      await writeFile(outside, "untouched");
      await mkdir(join(staticDir, "css"), { recursive: true });
      await symlink(outside, join(staticDir, "css/app.css"));

      await storage.copy("css/app.css", "css/app.css", source);

      const info = await lstat(join(staticDir, "css/app.css"));
      expect(info.isSymbolicLink()).toBe(false);
      expect(await readFile(join(staticDir, "css/app.css"), "utf-8")).toBe("body {}");
      expect(await readFile(outside, "utf-8")).toBe("untouched");
    });

    it("overwrites an existing file", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);
      await mkdir(join(staticDir, "css"), { recursive: true });
      await writeFile(join(staticDir, "css/app.css"), "stale");

      await storage.copy("css/app.css", "css/app.css", source);

      expect(await readFile(join(staticDir, "css/app.css"), "utf-8")).toBe("body {}");
    });
  });

  describe("link", () => {
    it("creates an absolute symlink by default", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);

      await storage.link("css/app.css", "css/app.css", source);

      expect(await readlink(join(staticDir, "css/app.css"))).toBe(join(sourceDir, "css/app.css"));
      expect(await storage.isLink("css/app.css")).toBe(true);
    });

    it("creates a relative symlink with relativeLinks", async () => {
      const storage = new FileSystemStorage(staticDir, { relativeLinks: true }, ctx);

      await storage.link("css/app.css", "css/app.css", source);

      expect(await readlink(join(staticDir, "css/app.css"))).toBe(join("..", "..", "src", "css", "app.css"));
      expect(await readFile(join(staticDir, "css/app.css"), "utf-8")).toBe("body {}");
    });

    it("replaces an existing file", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);
      await mkdir(join(staticDir, "css"), { recursive: true });
      await writeFile(join(staticDir, "css/app.css"), "copied earlier");

      await storage.link("css/app.css", "css/app.css", source);

      expect(await storage.isLink("css/app.css")).toBe(true);
    });

    it("lets parallel workers link the same destination from several sources", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const sources = await Promise.all(
        ["one", "two", "three", "four"].map(async (name) => {
          const dir = join(tempDir, name);
          await mkdir(dir);
          await writeFile(join(dir, "app.js"), name);
          return new FileSystemSource(dir, ctx);
        }),
      );
      const storage = new FileSystemStorage(staticDir, {}, ctx);
      const coordinator = new CollectionCoordinator(
        new StaticFinder(sources.map((each) => found(each, "app.js"))),
        storage,
        { mode: "parallel", operation: "link", workerCount: 4, postProcess: false },
      );

      const result = await coordinator.collect();
      vi.restoreAllMocks();

      expect(result.failures).toEqual([]);
      expect(await readdir(staticDir)).toEqual(["app.js"]);
      expect(await storage.isLink("app.js")).toBe(true);
      expect(sources.map((each) => each.path("app.js"))).toContain(await readlink(join(staticDir, "app.js")));
    });
  });

  describe("paths", () => {
    it("accepts names starting with two dots", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);

      await storage.copy("css/app.css", "..app.css", source);

      expect(await readFile(join(staticDir, "..app.css"), "utf-8")).toBe("body {}");
    });

    it.each(["..", "../app.css", "css/../../app.css", ""])("rejects '%s'", async (path) => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);

      await expect(storage.exists(path)).rejects.toThrow(FileSystemError);
    });
  });

  describe("queries", () => {
    it("reports a missing file", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);

      expect(await storage.exists("css/app.css")).toBe(false);
      expect(await storage.modifiedTime("css/app.css")).toBeNull();
      expect(await storage.isLink("css/app.css")).toBe(false);
    });

    it("reports a stored file and its modification time", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);
      await storage.copy("css/app.css", "css/app.css", source);
      const mtime = new Date("2024-01-02T03:04:05Z");
      await utimes(join(staticDir, "css/app.css"), mtime, mtime);

      expect(await storage.exists("css/app.css")).toBe(true);
      expect(await storage.isLink("css/app.css")).toBe(false);
      expect((await storage.modifiedTime("css/app.css"))?.getTime()).toBe(mtime.getTime());
    });

    it("rejects paths outside the storage root", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);

      await expect(storage.exists("../src/css/app.css")).rejects.toThrow(FileSystemError);
    });
  });

  describe("delete", () => {
    it("removes a stored file", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);
      await storage.copy("css/app.css", "css/app.css", source);

      await storage.delete("css/app.css");

      expect(await storage.exists("css/app.css")).toBe(false);
    });

    it("ignores a missing file", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);
      await mkdir(staticDir);

      await expect(storage.delete("missing.css")).resolves.toBeUndefined();
    });
  });

  describe("listAll", () => {
    it("lists nested files and dotfiles in sorted order", async () => {
      const storage = new FileSystemStorage(staticDir, {}, ctx);
      await mkdir(join(staticDir, "js/vendor"), { recursive: true });
      await writeFile(join(staticDir, "js/vendor/lib.js"), "");
      await writeFile(join(staticDir, "js/app.js"), "");
      await writeFile(join(staticDir, ".htaccess"), "");

      expect(await storage.listAll()).toEqual([".htaccess", "js/app.js", "js/vendor/lib.js"]);
    });

    it("returns nothing when the root does not exist", async () => {
      const storage = new FileSystemStorage(join(tempDir, "missing"), {}, ctx);

      expect(await storage.listAll()).toEqual([]);
    });
  });
});

describe("FileSystemSource", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "fastcollect-source-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("reads files and their modification time", async () => {
    await writeFile(join(tempDir, "robots.txt"), "User-agent: *");
    const mtime = new Date("2023-06-01T00:00:00Z");
    await utimes(join(tempDir, "robots.txt"), mtime, mtime);
    const source = new FileSystemSource(tempDir, ctx);

    expect(source.path("robots.txt")).toBe(join(tempDir, "robots.txt"));
    expect(new TextDecoder().decode(await source.read("robots.txt"))).toBe("User-agent: *");
    expect((await source.modifiedTime("robots.txt"))?.getTime()).toBe(mtime.getTime());
  });

  it("returns null as modification time of a missing file", async () => {
    const source = new FileSystemSource(tempDir, ctx);

    expect(await source.modifiedTime("missing.txt")).toBeNull();
  });
});
