import { parse, TomlError } from "smol-toml";
import { join } from "node:path";
import { type AppContext, getGlobalContext } from "../context/index.ts";
import { ConfigurationError } from "../errors/index.ts";
import { type CollectConfig, parseCollectConfig } from "../types/config.ts";

export const CONFIG_FILE = ".fastcollect.toml";
export const LOCAL_CONFIG_FILE = ".fastcollect.local.toml";

export interface ConfigPaths {
  config: string;
  local: string;
}

export function getConfigPaths(projectDir: string): ConfigPaths {
  return {
    config: join(projectDir, CONFIG_FILE),
    local: join(projectDir, LOCAL_CONFIG_FILE),
  };
}

export function mergeArrayField(
  base: string[] | undefined,
  override: string[] | undefined,
  prepend: string[] | undefined,
  append: string[] | undefined,
): string[] | undefined {
  // Complete override if specified
  if (override !== undefined) {
    return override;
  }

  if (base === undefined) {
    if (prepend !== undefined || append !== undefined) {
      return [...(prepend ?? []), ...(append ?? [])];
    }
    return undefined;
  }

  return [...(prepend ?? []), ...base, ...(append ?? [])];
}

/**
 * Apply a config file's own `ignore_prepend` / `ignore_append` to its `ignore`
 */
export function foldIgnorePatterns(config: CollectConfig): CollectConfig {
  const { ignore_prepend, ignore_append, ...rest } = config;
  const ignore = mergeArrayField(config.ignore, undefined, ignore_prepend, ignore_append);
  return ignore === undefined ? rest : { ...rest, ignore };
}

/**
 * Merge the local config over the base config.
 *
 * Scalars and `sources` are replaced, `collect` and `storage` are merged key
 * by key, `ignore` honours `ignore_prepend` / `ignore_append`.
 */
export function mergeConfigs(baseConfig: CollectConfig, localConfig: CollectConfig): CollectConfig {
  const mergedConfig: CollectConfig = {};

  const destination = localConfig.destination ?? baseConfig.destination;
  if (destination !== undefined) {
    mergedConfig.destination = destination;
  }

  const sources = localConfig.sources ?? baseConfig.sources;
  if (sources !== undefined) {
    mergedConfig.sources = sources;
  }

  const mergedIgnore = mergeArrayField(
    baseConfig.ignore,
    localConfig.ignore,
    localConfig.ignore_prepend,
    localConfig.ignore_append,
  );
  if (mergedIgnore !== undefined) {
    mergedConfig.ignore = mergedIgnore;
  }

  if (baseConfig.collect !== undefined || localConfig.collect !== undefined) {
    mergedConfig.collect = { ...baseConfig.collect, ...localConfig.collect };
  }

  if (baseConfig.storage !== undefined || localConfig.storage !== undefined) {
    mergedConfig.storage = { ...baseConfig.storage, ...localConfig.storage };
  }

  return mergedConfig;
}

async function readConfigFile(path: string, ctx: AppContext): Promise<CollectConfig | undefined> {
  let content: string;
  try {
    content = await ctx.runtime.fs.readTextFile(path);
  } catch (error) {
    if (ctx.runtime.errors.isNotFound(error)) {
      return undefined;
    }
    throw error;
  }

  let data: unknown;
  try {
    data = parse(content);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new ConfigurationError(`Invalid TOML: ${error.message}`, path);
    }
    throw error;
  }

  return parseCollectConfig(data, path);
}

/**
 * Load `.fastcollect.toml` and merge `.fastcollect.local.toml` over it.
 *
 * @returns undefined when neither file exists
 * @throws ConfigurationError on invalid TOML or an invalid schema
 */
export async function loadCollectConfig(
  projectDir: string,
  ctx: AppContext = getGlobalContext(),
): Promise<CollectConfig | undefined> {
  const paths = getConfigPaths(projectDir);

  const config = await readConfigFile(paths.config, ctx);
  const localConfig = await readConfigFile(paths.local, ctx);

  if (localConfig === undefined) {
    return config === undefined ? undefined : foldIgnorePatterns(config);
  }
  if (config === undefined) {
    return foldIgnorePatterns(localConfig);
  }
  return mergeConfigs(foldIgnorePatterns(config), localConfig);
}
