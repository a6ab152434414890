import { describe, it, expect, vi, afterEach } from "vitest";
import { TransferError } from "../../errors/index.ts";
import { MemorySource, MemoryStorage } from "../storage/testing.ts";
import { TransferExecutor } from "./executor.ts";
import type { TransferTask } from "./types.ts";

const source = new MemorySource("/src/app", { "css/app.css": "body {}" });

function task(operation: "copy" | "link", path = "css/app.css"): TransferTask {
  return { operation, sourcePath: path, destinationPath: `static/${path}`, source };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("TransferExecutor", () => {
  it("copies through the storage backend", async () => {
    const storage = new MemoryStorage();
    const executor = new TransferExecutor(storage);

    const outcome = await executor.execute(task("copy"));

    expect(outcome).toEqual({ ok: true, task: task("copy") });
    expect(storage.callsFor("copy")).toEqual(["static/css/app.css"]);
    expect(storage.text("static/css/app.css")).toBe("body {}");
  });

  it("links through the storage backend", async () => {
    const storage = new MemoryStorage();
    const executor = new TransferExecutor(storage);

    await executor.execute(task("link"));

    expect(storage.callsFor("link")).toEqual(["static/css/app.css"]);
    expect(storage.files.get("static/css/app.css")?.linkTarget).toBe("/src/app/css/app.css");
  });

  it("returns a TransferError outcome instead of throwing", async () => {
    const storage = new MemoryStorage({ failWith: () => new Error("disk full") });
    const executor = new TransferExecutor(storage);

    const outcome = await executor.execute(task("copy"));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(TransferError);
      expect(outcome.error.message).toBe("Failed to copy 'static/css/app.css': disk full");
      expect(outcome.error.destinationPath).toBe("static/css/app.css");
    }
  });

  it("does not retry a failed transfer", async () => {
    const storage = new MemoryStorage({ failWith: () => new Error("timeout") });
    const executor = new TransferExecutor(storage);

    await executor.execute(task("copy"));

    expect(storage.calls).toHaveLength(1);
  });

  it("only logs in dry run mode", async () => {
    const messages: string[] = [];
    vi.spyOn(console, "error").mockImplementation((message: unknown) => {
      messages.push(String(message));
    });
    const storage = new MemoryStorage();
    const executor = new TransferExecutor(storage, { dryRun: true });

    const outcome = await executor.execute(task("link"));

    expect(outcome.ok).toBe(true);
    expect(storage.calls).toEqual([]);
    expect(messages).toHaveLength(1);
    expect(messages[0]).toContain("[dry-run] Pretending to link '/src/app/css/app.css'");
  });

  it("logs each transfer in verbose mode", async () => {
    const messages: string[] = [];
    vi.spyOn(console, "error").mockImplementation((message: unknown) => {
      messages.push(String(message));
    });
    const executor = new TransferExecutor(new MemoryStorage(), { output: { verbose: true } });

    await executor.execute(task("copy"));

    expect(messages).toEqual(["[verbose] Copying '/src/app/css/app.css'"]);
  });
});
