// Progress display for the transfer and post-processing phases

import { type AppContext, getGlobalContext } from "../context/index.ts";
import type { Runtime } from "../runtime/types.ts";

export type PhaseState = "pending" | "running" | "completed" | "failed";

export interface ProgressPhase {
  id: string;
  label: string;
  state: PhaseState;
  total: number;
  done: number;
  failed: number;
}

// Simple writer interface so tests can capture output
interface Writer {
  writeSync(p: Uint8Array): number;
}

export interface ProgressOptions {
  enabled?: boolean;
  stream?: Writer;
  spinnerFrames?: string[];
  updateInterval?: number;
}

/**
 * ANSI escape code utilities
 */
class AnsiRenderer {
  static readonly CLEAR_LINE = "\x1b[2K";
  static readonly CURSOR_UP = (n: number) => `\x1b[${n}A`;
  static readonly CURSOR_COLUMN_0 = "\x1b[0G";
  static readonly HIDE_CURSOR = "\x1b[?25l";
  static readonly SHOW_CURSOR = "\x1b[?25h";

  static readonly BOLD = "\x1b[1m";
  static readonly DIM = "\x1b[2m";
  static readonly RED = "\x1b[31m";
  static readonly RESET = "\x1b[0m";

  static clearLastRender(lineCount: number): string {
    if (lineCount === 0) return "";

    const moves = AnsiRenderer.CURSOR_COLUMN_0 + AnsiRenderer.CURSOR_UP(lineCount);
    const clears = Array(lineCount).fill(AnsiRenderer.CLEAR_LINE + "\n").join("");
    return moves + clears + AnsiRenderer.CURSOR_UP(lineCount) + AnsiRenderer.CURSOR_COLUMN_0;
  }
}

const COMPLETED_SYMBOL = "✔";
const FAILED_SYMBOL = "✗";
const PENDING_SYMBOL = "☐";

/**
 * Render one phase as a single line of text, without colors.
 *
 * `Transferring files (12/40, 1 failed)`
 */
export function formatPhase(phase: ProgressPhase): string {
  const counts = [`${phase.done}/${phase.total}`];
  if (phase.failed > 0) {
    counts.push(`${phase.failed} failed`);
  }
  return `${phase.label} (${counts.join(", ")})`;
}

function phaseStyle(state: PhaseState): string {
  switch (state) {
    case "pending":
    case "completed":
      return AnsiRenderer.DIM;
    case "running":
      return AnsiRenderer.BOLD;
    case "failed":
      return AnsiRenderer.RED;
  }
}

function phaseSymbol(state: PhaseState, spinnerFrame: string): string {
  switch (state) {
    case "pending":
      return PENDING_SYMBOL;
    case "running":
      return spinnerFrame;
    case "completed":
      return COMPLETED_SYMBOL;
    case "failed":
      return FAILED_SYMBOL;
  }
}

/**
 * Spinner with per-phase counters, drawn on stderr while files transfer.
 *
 * Counters are always kept; drawing only happens when enabled, which
 * defaults to stderr being a terminal.
 */
export class ProgressTracker {
  private enabled: boolean;
  private stream: Writer;
  private spinnerFrames: string[];
  private updateInterval: number;

  private phases = new Map<string, ProgressPhase>();
  private nextId = 0;

  private lastRenderLineCount = 0;
  private spinnerInterval?: ReturnType<typeof setInterval>;
  private spinnerFrameIndex = 0;
  private started = false;
  private finished = false;

  private textEncoder = new TextEncoder();
  private cleanupHandler?: () => void;
  private runtime: Runtime;

  constructor(options: ProgressOptions = {}, ctx: AppContext = getGlobalContext()) {
    this.runtime = ctx.runtime;
    this.enabled = options.enabled ?? this.runtime.io.stderr.isTerminal();
    this.stream = options.stream ?? this.runtime.io.stderr;

    const spinnerFrames = options.spinnerFrames ?? ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
    if (spinnerFrames.length === 0) {
      throw new Error("spinnerFrames must contain at least one frame");
    }
    this.spinnerFrames = spinnerFrames;

    // 16ms (60fps) to 1000ms (1fps)
    const updateInterval = options.updateInterval ?? 80;
    if (updateInterval < 16 || updateInterval > 1000) {
      throw new Error("updateInterval must be between 16ms and 1000ms");
    }
    this.updateInterval = updateInterval;
  }

  private setupSignalHandlers(): void {
    this.cleanupHandler = () => {
      this.finish();
      this.runtime.control.exit(130);
    };
    this.runtime.signals.addListener("SIGINT", this.cleanupHandler);
    this.runtime.signals.addListener("SIGTERM", this.cleanupHandler);
  }

  private removeSignalHandlers(): void {
    if (!this.cleanupHandler) return;

    this.runtime.signals.removeListener("SIGINT", this.cleanupHandler);
    this.runtime.signals.removeListener("SIGTERM", this.cleanupHandler);
    this.cleanupHandler = undefined;
  }

  /**
   * Add a phase with the number of items it will process
   */
  addPhase(label: string, total = 0): string {
    const id = `phase-${this.nextId++}`;
    this.phases.set(id, { id, label, state: "pending", total, done: 0, failed: 0 });
    return id;
  }

  getPhase(phaseId: string): ProgressPhase {
    const phase = this.phases.get(phaseId);
    if (!phase) {
      throw new Error(`Phase not found: ${phaseId}`);
    }
    return phase;
  }

  setTotal(phaseId: string, total: number): void {
    this.getPhase(phaseId).total = total;
  }

  /**
   * Count one processed item, starting the phase if it was pending
   */
  advance(phaseId: string, options: { failed?: boolean } = {}): void {
    const phase = this.getPhase(phaseId);
    if (phase.state === "pending") {
      phase.state = "running";
    }
    phase.done++;
    if (options.failed) {
      phase.failed++;
    }
  }

  /**
   * Mark a phase finished. A phase with failed items ends as failed.
   */
  completePhase(phaseId: string): void {
    const phase = this.getPhase(phaseId);
    phase.state = phase.failed > 0 ? "failed" : "completed";
  }

  failPhase(phaseId: string): void {
    this.getPhase(phaseId).state = "failed";
  }

  /**
   * Start the spinner animation
   */
  start(): void {
    if (!this.enabled || this.started) return;
    this.started = true;

    this.setupSignalHandlers();
    this.write(AnsiRenderer.HIDE_CURSOR);
    if (!this.enabled) return;

    this.spinnerInterval = setInterval(() => {
      this.spinnerFrameIndex = (this.spinnerFrameIndex + 1) % this.spinnerFrames.length;
      this.render();
    }, this.updateInterval);

    this.render();
  }

  /**
   * Stop the animation, draw the final state and restore the cursor
   */
  finish(): void {
    if (!this.enabled || !this.started || this.finished) return;
    this.finished = true;

    if (this.spinnerInterval !== undefined) {
      clearInterval(this.spinnerInterval);
      this.spinnerInterval = undefined;
    }

    this.render();
    this.write(AnsiRenderer.SHOW_CURSOR);
    this.removeSignalHandlers();
  }

  private render(): void {
    if (this.lastRenderLineCount > 0) {
      this.write(AnsiRenderer.clearLastRender(this.lastRenderLineCount));
    }

    const spinnerFrame = this.spinnerFrames[this.spinnerFrameIndex] ?? PENDING_SYMBOL;
    const lines = [...this.phases.values()].map((phase) => {
      const symbol = phaseSymbol(phase.state, spinnerFrame);
      return `${phaseStyle(phase.state)}${symbol} ${formatPhase(phase)}${AnsiRenderer.RESET}`;
    });

    if (lines.length > 0) {
      this.write(lines.join("\n") + "\n");
    }
    this.lastRenderLineCount = lines.length;
  }

  private write(text: string): void {
    if (!this.enabled) return;
    try {
      this.stream.writeSync(this.textEncoder.encode(text));
    } catch (error) {
      // stderr is gone; stop drawing
      this.enabled = false;
      if (this.spinnerInterval !== undefined) {
        clearInterval(this.spinnerInterval);
        this.spinnerInterval = undefined;
      }
      this.removeSignalHandlers();
      console.error(`Progress display disabled: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}
