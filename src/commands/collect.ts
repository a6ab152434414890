import { resolve } from "node:path";
import { type AppContext, getGlobalContext } from "../context/index.ts";
import { TransferAggregateError, UserCancelledError } from "../errors/index.ts";
import { FileSystemFinder } from "../services/finder/index.ts";
import { FileSystemStorage, ManifestStorage, type StorageBackend } from "../services/storage/index.ts";
import {
  CollectionCoordinator,
  type CollectionResult,
  cooperativeBackend,
  resolveConcurrencyBackend,
} from "../services/transfer/index.ts";
import {
  type CollectCliOptions,
  resolveCollectOptions,
  type ResolvedCollectOptions,
} from "../utils/collect-options.ts";
import { loadCollectConfig } from "../utils/config.ts";
import { log, type OutputOptions, pluralize, verboseLog } from "../utils/output.ts";
import { ProgressTracker } from "../utils/progress.ts";
import { confirm } from "../utils/prompt.ts";

export interface CollectCommandOptions extends CollectCliOptions, OutputOptions {
  /** Project directory holding .fastcollect.toml */
  config?: string;
}

export function createStorage(options: ResolvedCollectOptions, ctx: AppContext): StorageBackend {
  const storageOptions = { relativeLinks: options.relativeLinks };
  if (options.storage === "manifest") {
    return new ManifestStorage(
      options.destination,
      { ...storageOptions, manifestName: options.manifestName },
      ctx,
    );
  }
  return new FileSystemStorage(options.destination, storageOptions, ctx);
}

function confirmationMessage(destination: string, clear: boolean): string {
  const warning = clear
    ? "This will DELETE ALL FILES in this location!"
    : "This will overwrite existing files!";
  return [
    "You have requested to collect static files at the destination",
    "location as specified in your settings:",
    "",
    `    ${destination}`,
    "",
    warning,
    "Are you sure you want to do this?",
  ].join("\n");
}

/**
 * Build the summary lines printed after a run
 */
export function formatSummary(result: CollectionResult, options: ResolvedCollectOptions): string[] {
  const action = options.operation === "link" ? "symlinked" : "copied";
  const collected = result.transferredCount - result.failures.length;

  let summary = `${pluralize(collected, "static file")} ${action} to '${options.destination}'`;
  if (result.failures.length > 0) {
    summary += `, ${result.failures.length} failed`;
  }
  if (result.unmodified.length > 0) {
    summary += `, ${result.unmodified.length} unmodified`;
  }
  if (result.postProcessed.length > 0) {
    summary += `, ${result.postProcessed.length} post-processed`;
  }

  const lines = [`${summary}.`];
  if (result.mode === "parallel") {
    const seconds = Math.floor(result.elapsedMs / 1000);
    lines.push(`${result.transferredCount} static files copied asynchronously in ${seconds}s.`);
  }
  return lines;
}

/**
 * Collect command - copies or links every static file into the destination
 *
 * @throws TransferAggregateError after the summary when parallel transfers failed
 */
export async function collectCommand(
  options: CollectCommandOptions = {},
  ctx: AppContext = getGlobalContext(),
): Promise<CollectionResult> {
  const { verbose = false, quiet = false } = options;
  const outputOpts: OutputOptions = { verbose, quiet };

  const projectDir = resolve(ctx.runtime.control.cwd(), options.config ?? ".");
  const config = await loadCollectConfig(projectDir, ctx);
  ctx.config = config;

  const resolved = resolveCollectOptions(options, config, projectDir, outputOpts, ctx);
  const backend =
    resolved.mode === "parallel"
      ? resolveConcurrencyBackend({ useMultiprocessing: resolved.useMultiprocessing }, outputOpts)
      : cooperativeBackend;

  verboseLog(`Project: ${projectDir}`, outputOpts);
  verboseLog(`Destination: ${resolved.destination}`, outputOpts);
  if (resolved.mode === "parallel") {
    verboseLog(`Workers: ${resolved.workerCount} (${backend.name})`, outputOpts);
  }

  if (resolved.interactive) {
    const confirmed = await confirm(confirmationMessage(resolved.destination, resolved.clear), ctx);
    if (!confirmed) {
      throw new UserCancelledError("Collecting static files cancelled.");
    }
  }

  const showProgress = !quiet && !verbose && !resolved.dryRun && ctx.runtime.io.stderr.isTerminal();
  const tracker = new ProgressTracker({ enabled: showProgress }, ctx);

  const coordinator = new CollectionCoordinator(
    new FileSystemFinder(resolved.sources, outputOpts, ctx),
    createStorage(resolved, ctx),
    {
      mode: resolved.mode,
      operation: resolved.operation,
      workerCount: resolved.workerCount,
      dryRun: resolved.dryRun,
      clear: resolved.clear,
      postProcess: resolved.postProcess,
      ignorePatterns: resolved.ignorePatterns,
      backend,
      output: outputOpts,
      tracker,
    },
  );

  const result = await coordinator.collect();

  for (const line of formatSummary(result, resolved)) {
    log(line, outputOpts);
  }

  if (result.failures.length > 0) {
    throw new TransferAggregateError(result.failures, result.transferredCount);
  }
  return result;
}
