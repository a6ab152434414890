import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { handleError, withErrorHandler } from "./handler.ts";
import {
  ArgumentError,
  CollectError,
  ConfigurationError,
  ErrorSeverity,
  TransferAggregateError,
  TransferError,
  UserCancelledError,
} from "./index.ts";
import { createMockContext } from "../context/testing.ts";
import { stripAnsi } from "../utils/ansi.ts";

describe("handleError", () => {
  let messages: string[];

  beforeEach(() => {
    messages = [];
    vi.spyOn(console, "error").mockImplementation((message: unknown) => {
      messages.push(stripAnsi(String(message)));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints a configuration error and returns its exit code", () => {
    const exitCode = handleError(new ConfigurationError("Invalid TOML: bad", "/project/.fastcollect.toml"));

    expect(exitCode).toBe(1);
    expect(messages).toEqual(["Error: /project/.fastcollect.toml: Invalid TOML: bad"]);
  });

  it("returns 2 for argument errors", () => {
    expect(handleError(new ArgumentError("Unknown command: nope"))).toBe(2);
  });

  it("stays silent for a plain cancellation", () => {
    expect(handleError(new UserCancelledError())).toBe(130);
    expect(messages).toEqual([]);
  });

  it("prints a cancellation with a custom message unless quiet", () => {
    handleError(new UserCancelledError("Collecting static files cancelled."));
    handleError(new UserCancelledError("Collecting static files cancelled."), { quiet: true });

    expect(messages).toEqual(["Collecting static files cancelled."]);
  });

  it("prints info-level errors without the error prefix", () => {
    class NothingToCollect extends CollectError {
      readonly severity = ErrorSeverity.Info;
      readonly exitCode = 0;
    }

    expect(handleError(new NothingToCollect("No source directories configured."))).toBe(0);
    expect(messages).toEqual(["No source directories configured."]);
  });

  it("prints unknown errors with exit code 1", () => {
    expect(handleError(new Error("boom"))).toBe(1);
    expect(handleError("plain string")).toBe(1);
    expect(messages).toEqual(["Error: boom", "Error: plain string"]);
  });

  it("summarises transfer failures", () => {
    const failure = new TransferError("copy", "css/app.css", new Error("disk full"));

    handleError(new TransferAggregateError([failure], 5));

    expect(messages).toEqual(["Error: 1 of 5 static files failed to transfer"]);
  });

  it("lists each transfer failure in verbose mode", () => {
    const failure = new TransferError("copy", "css/app.css", "disk full");

    handleError(new TransferAggregateError([failure], 5), { verbose: true });

    expect(messages[0]).toBe("Error: 1 of 5 static files failed to transfer");
    expect(messages[1]).toBe("  css/app.css: Failed to copy 'css/app.css': disk full");
    expect(messages[2]?.startsWith("\nStack trace:\n")).toBe(true);
  });
});

describe("withErrorHandler", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves when the command succeeds", async () => {
    const ctx = createMockContext();
    const command = withErrorHandler(async (_name: string) => {}, {}, ctx);

    await expect(command("collect")).resolves.toBeUndefined();
  });

  it("exits with the error's exit code", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const ctx = createMockContext();
    const command = withErrorHandler(async () => {
      throw new ArgumentError("Unknown command: nope");
    }, {}, ctx);

    await expect(command()).rejects.toThrow("exit called with 2");
  });
});
