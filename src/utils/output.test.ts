import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { resetColorDetection } from "./ansi.ts";
import {
  errorLog,
  log,
  logDryRun,
  type OutputOptions,
  pluralize,
  successLog,
  verboseLog,
  warnLog,
} from "./output.ts";

describe("output utilities", () => {
  let messages: string[];
  let originalError: typeof console.error;

  beforeEach(() => {
    messages = [];
    originalError = console.error;
    console.error = vi.fn((msg: string) => messages.push(msg));
    process.env.FORCE_COLOR = "1";
    resetColorDetection();
  });

  afterEach(() => {
    console.error = originalError;
    delete process.env.FORCE_COLOR;
    resetColorDetection();
  });

  describe("log", () => {
    it("outputs message when quiet is false", () => {
      const options: OutputOptions = { quiet: false };
      log("test message", options);
      expect(messages).toEqual(["test message"]);
    });

    it("suppresses message when quiet is true", () => {
      const options: OutputOptions = { quiet: true };
      log("test message", options);
      expect(messages).toEqual([]);
    });
  });

  describe("verboseLog", () => {
    it("outputs message when verbose is true", () => {
      verboseLog("Copying '/src/app.css'", { verbose: true });
      expect(messages).toEqual(["[verbose] Copying '/src/app.css'"]);
    });

    it("suppresses message when verbose is undefined", () => {
      verboseLog("test message", {});
      expect(messages).toEqual([]);
    });

    it("suppresses message when quiet is true even if verbose is true", () => {
      verboseLog("test message", { verbose: true, quiet: true });
      expect(messages).toEqual([]);
    });
  });

  describe("successLog", () => {
    it("outputs message with green color", () => {
      successLog("success message", {});
      expect(messages).toEqual(["\x1b[32msuccess message\x1b[0m"]);
    });

    it("suppresses message when quiet is true", () => {
      successLog("success message", { quiet: true });
      expect(messages).toEqual([]);
    });
  });

  describe("errorLog", () => {
    it("always outputs message with red color even when quiet is true", () => {
      errorLog("error message", { quiet: true });
      expect(messages).toEqual(["\x1b[31merror message\x1b[0m"]);
    });
  });

  describe("warnLog", () => {
    let warnMessages: string[];
    let originalWarn: typeof console.warn;

    beforeEach(() => {
      warnMessages = [];
      originalWarn = console.warn;
      console.warn = vi.fn((msg: string) => warnMessages.push(msg));
    });

    afterEach(() => {
      console.warn = originalWarn;
    });

    it("outputs message with yellow color even when quiet is true", () => {
      warnLog("warning message", { quiet: true });
      expect(warnMessages).toEqual(["\x1b[33mwarning message\x1b[0m"]);
    });
  });

  describe("logDryRun", () => {
    it("outputs message with dim color and dry-run prefix", () => {
      logDryRun("Pretending to copy '/src/app.css'");
      expect(messages).toEqual(["\x1b[2m[dry-run] Pretending to copy '/src/app.css'\x1b[0m"]);
    });

    it("is suppressed in quiet mode", () => {
      logDryRun("Pretending to copy '/src/app.css'", { quiet: true });
      expect(messages).toEqual([]);
    });
  });
});

describe("pluralize", () => {
  it("uses the singular for one", () => {
    expect(pluralize(1, "static file")).toBe("1 static file");
  });

  it("uses the default plural otherwise", () => {
    expect(pluralize(0, "static file")).toBe("0 static files");
    expect(pluralize(12, "static file")).toBe("12 static files");
  });

  it("accepts an explicit plural", () => {
    expect(pluralize(2, "entry", "entries")).toBe("2 entries");
  });
});
