import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { configCommand } from "./config.ts";
import type { AppContext } from "../context/index.ts";
import { createMockContext } from "../context/testing.ts";

function contextWithFiles(files: Record<string, string>): AppContext {
  const ctx: AppContext = createMockContext({
    fs: {
      exists: (path) => Promise.resolve(path in files),
      readTextFile: (path) => {
        const content = files[path];
        if (content === undefined) {
          return Promise.reject(new ctx.runtime.errors.NotFound(path));
        }
        return Promise.resolve(content);
      },
    },
    control: { cwd: () => "/project" },
  });
  return ctx;
}

describe("configCommand", () => {
  let messages: string[];

  beforeEach(() => {
    messages = [];
    vi.spyOn(console, "error").mockImplementation((message: unknown) => {
      messages.push(String(message));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports missing config files and an empty configuration", async () => {
    await configCommand({}, contextWithFiles({}));

    expect(messages).toEqual([
      "Config file: /project/.fastcollect.toml (not found)",
      "Local config file: /project/.fastcollect.local.toml (not found)",
      "",
      "{}",
    ]);
  });

  it("prints the merged configuration", async () => {
    const ctx = contextWithFiles({
      "/project/.fastcollect.toml": 'destination = "static"\n\n[collect]\nworkers = 4',
      "/project/.fastcollect.local.toml": "[collect]\nfaster = true",
    });

    await configCommand({}, ctx);

    expect(messages).toEqual([
      "Config file: /project/.fastcollect.toml",
      "Local config file: /project/.fastcollect.local.toml",
      "",
      JSON.stringify({ destination: "static", collect: { workers: 4, faster: true } }, null, 2),
    ]);
  });

  it("resolves --config against the working directory", async () => {
    await configCommand({ config: "site" }, contextWithFiles({}));

    expect(messages[0]).toBe("Config file: /project/site/.fastcollect.toml (not found)");
  });

  it("prints nothing in quiet mode", async () => {
    await configCommand({ quiet: true }, contextWithFiles({}));

    expect(messages).toEqual([]);
  });
});
