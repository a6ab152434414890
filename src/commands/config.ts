import { resolve } from "node:path";
import { type AppContext, getGlobalContext } from "../context/index.ts";
import { getConfigPaths, loadCollectConfig } from "../utils/config.ts";
import { log, type OutputOptions } from "../utils/output.ts";

export interface ConfigCommandOptions extends OutputOptions {
  /** Project directory holding .fastcollect.toml */
  config?: string;
}

/**
 * Config command - shows the config files and the merged configuration
 */
export async function configCommand(
  options: ConfigCommandOptions = {},
  ctx: AppContext = getGlobalContext(),
): Promise<void> {
  const outputOpts: OutputOptions = { verbose: options.verbose, quiet: options.quiet };
  const projectDir = resolve(ctx.runtime.control.cwd(), options.config ?? ".");
  const paths = getConfigPaths(projectDir);

  const [configExists, localExists] = await Promise.all([
    ctx.runtime.fs.exists(paths.config),
    ctx.runtime.fs.exists(paths.local),
  ]);
  const config = await loadCollectConfig(projectDir, ctx);

  log(`Config file: ${paths.config}${configExists ? "" : " (not found)"}`, outputOpts);
  log(`Local config file: ${paths.local}${localExists ? "" : " (not found)"}`, outputOpts);
  log("", outputOpts);
  log(JSON.stringify(config ?? {}, null, 2), outputOpts);
}
