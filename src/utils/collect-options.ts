import { resolve } from "node:path";
import { type AppContext, getGlobalContext } from "../context/index.ts";
import { ConfigurationError } from "../errors/index.ts";
import { DEFAULT_IGNORE_PATTERNS } from "../services/finder/filesystem.ts";
import type { SourceDirectory } from "../services/finder/types.ts";
import type { CollectionMode, TransferOperation } from "../services/transfer/types.ts";
import { DEFAULT_WORKER_COUNT } from "../services/transfer/worker-pool.ts";
import type { CollectConfig } from "../types/config.ts";
import { type OutputOptions, warnLog } from "./output.ts";

export const WORKERS_ENV = "FASTCOLLECT_WORKERS";

/**
 * Collect options as given on the command line
 */
export interface CollectCliOptions {
  faster?: boolean;
  workers?: string;
  useMultiprocessing?: boolean;
  dryRun?: boolean;
  link?: boolean;
  relative?: boolean;
  clear?: boolean;
  ignore?: string[];
  /** false with --no-default-ignore */
  defaultIgnore?: boolean;
  /** false with --no-post-process */
  postProcess?: boolean;
  /** false with --no-input */
  input?: boolean;
}

export type StorageBackendName = "filesystem" | "manifest";

export interface ResolvedCollectOptions {
  mode: CollectionMode;
  workerCount: number;
  useMultiprocessing: boolean;
  operation: TransferOperation;
  relativeLinks: boolean;
  dryRun: boolean;
  clear: boolean;
  postProcess: boolean;
  interactive: boolean;
  ignorePatterns: string[];
  destination: string;
  sources: SourceDirectory[];
  storage: StorageBackendName;
  manifestName?: string;
}

/**
 * Parse a worker count, or null when it is not a positive integer
 */
export function parseWorkerCount(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const parsed = parseInt(trimmed, 10);
  return parsed >= 1 ? parsed : null;
}

/**
 * Resolve the worker pool size.
 *
 * Priority order:
 * 1. `--workers` (invalid value is a ConfigurationError)
 * 2. Environment variable `FASTCOLLECT_WORKERS`
 * 3. Config file setting `collect.workers`
 * 4. Default value (20)
 *
 * If the environment variable is set but invalid, a warning is logged and
 * the default value is used (not the config value).
 */
export function resolveWorkerCount(
  cliValue: string | undefined,
  config: CollectConfig | undefined,
  ctx: AppContext = getGlobalContext(),
): number {
  if (cliValue !== undefined) {
    const parsed = parseWorkerCount(cliValue);
    if (parsed === null) {
      throw new ConfigurationError(
        `Invalid --workers value '${cliValue}'. Must be a positive integer.`,
      );
    }
    return parsed;
  }

  const envValue = ctx.runtime.env.get(WORKERS_ENV);
  if (envValue !== undefined) {
    const parsed = parseWorkerCount(envValue);
    if (parsed !== null) {
      return parsed;
    }
    warnLog(
      `Warning: Invalid ${WORKERS_ENV} value '${envValue}'. ` +
        `Must be a positive integer. Using default: ${DEFAULT_WORKER_COUNT}`,
    );
    return DEFAULT_WORKER_COUNT;
  }

  return config?.collect?.workers ?? DEFAULT_WORKER_COUNT;
}

/**
 * Ignore patterns in effect: defaults (unless disabled), config, command line
 */
export function resolveIgnorePatterns(
  cli: CollectCliOptions,
  config: CollectConfig | undefined,
): string[] {
  const useDefaults = cli.defaultIgnore ?? config?.collect?.use_default_ignore ?? true;
  return [
    ...(useDefaults ? DEFAULT_IGNORE_PATTERNS : []),
    ...(config?.ignore ?? []),
    ...(cli.ignore ?? []),
  ];
}

/**
 * Combine command line, environment and config into the options of a run.
 *
 * @throws ConfigurationError for missing or conflicting settings
 */
export function resolveCollectOptions(
  cli: CollectCliOptions,
  config: CollectConfig | undefined,
  projectDir: string,
  output: OutputOptions = {},
  ctx: AppContext = getGlobalContext(),
): ResolvedCollectOptions {
  const faster = cli.faster ?? config?.collect?.faster ?? false;
  const link = cli.link ?? config?.collect?.link ?? false;
  const relativeLinks = cli.relative ?? config?.collect?.relative ?? false;

  if (relativeLinks && !link) {
    throw new ConfigurationError("--relative requires --link");
  }
  if (!faster && cli.workers !== undefined) {
    warnLog("Warning: --workers has no effect without --faster", output);
  }
  if (!faster && cli.useMultiprocessing) {
    warnLog("Warning: --use-multiprocessing has no effect without --faster", output);
  }

  if (config?.destination === undefined) {
    throw new ConfigurationError(`No destination configured. Set 'destination' in .fastcollect.toml`);
  }
  const sourceConfigs = config.sources ?? [];
  if (sourceConfigs.length === 0) {
    throw new ConfigurationError(`No sources configured. Add [[sources]] to .fastcollect.toml`);
  }

  const destination = resolve(projectDir, config.destination);
  const sources = sourceConfigs.map(
    (source): SourceDirectory => ({ path: resolve(projectDir, source.path), prefix: source.prefix }),
  );
  for (const source of sources) {
    if (source.path === destination) {
      throw new ConfigurationError(`Source '${source.path}' is the destination directory`);
    }
  }

  return {
    mode: faster ? "parallel" : "sequential",
    workerCount: resolveWorkerCount(cli.workers, config, ctx),
    useMultiprocessing: cli.useMultiprocessing ?? false,
    operation: link ? "link" : "copy",
    relativeLinks,
    dryRun: cli.dryRun ?? false,
    clear: cli.clear ?? config.collect?.clear ?? false,
    postProcess: cli.postProcess ?? config.collect?.post_process ?? true,
    interactive: (cli.input ?? true) && !(cli.dryRun ?? false),
    ignorePatterns: resolveIgnorePatterns(cli, config),
    destination,
    sources,
    storage: config.storage?.backend ?? "filesystem",
    manifestName: config.storage?.manifest_name,
  };
}
