import minimist from "minimist";
import { collectCommand } from "./commands/collect.ts";
import { configCommand } from "./commands/config.ts";
import { type AppContext, getGlobalContext } from "./context/index.ts";
import { ArgumentError } from "./errors/index.ts";
import { withErrorHandler } from "./errors/handler.ts";
import { VERSION } from "./version.ts";

export const HELP_TEXT = `fastcollect - collect static files, optionally in parallel

Usage:
  fastcollect collect [options]   Copy or link static files into the destination
  fastcollect config [options]    Show config files and the merged configuration

Collect options:
  --faster                 Transfer files on a pool of concurrent workers
  --workers N              Number of workers with --faster (default: 20)
  --use-multiprocessing    Use OS processes as workers (falls back to cooperative)
  -n, --dry-run            Do everything except modify the destination
  -l, --link               Create symbolic links instead of copying
  -r, --relative           Create relative symbolic links (requires --link)
  -c, --clear              Delete existing destination files first
  -i, --ignore PATTERN     Ignore files or directories matching PATTERN (repeatable)
  --no-default-ignore      Do not ignore CVS, .* and *~
  --no-post-process        Skip post-processing
  --no-input               Do not ask for confirmation

Common options:
  --config DIR             Project directory with .fastcollect.toml (default: cwd)
  -v, --verbose            Show detailed output
  -q, --quiet              Suppress non-essential output
  -h, --help               Show this help message
  -V, --version            Show version information

Environment:
  FASTCOLLECT_WORKERS      Default number of workers (overridden by --workers)
`;

const BOOLEAN_FLAGS = [
  "help",
  "version",
  "verbose",
  "quiet",
  "faster",
  "use-multiprocessing",
  "dry-run",
  "link",
  "relative",
  "clear",
  "default-ignore",
  "post-process",
  "input",
];

export interface CliArgs {
  command: string | undefined;
  help: boolean;
  version: boolean;
  verbose: boolean;
  quiet: boolean;
  config?: string;
  faster?: boolean;
  workers?: string;
  useMultiprocessing?: boolean;
  dryRun?: boolean;
  link?: boolean;
  relative?: boolean;
  clear?: boolean;
  ignore: string[];
  defaultIgnore?: boolean;
  postProcess?: boolean;
  input?: boolean;
}

function stringList(value: unknown): string[] {
  const values = Array.isArray(value) ? value : [value];
  return values.filter((item): item is string => typeof item === "string" && item.length > 0);
}

function lastString(value: unknown): string | undefined {
  const values = Array.isArray(value) ? value : [value];
  const last: unknown = values[values.length - 1];
  return typeof last === "string" ? last : undefined;
}

/**
 * Parse command line arguments.
 *
 * Positive flags are undefined unless given, so config values apply;
 * negated flags (`--no-input`) are false only when given.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args = minimist([...argv], {
    boolean: BOOLEAN_FLAGS,
    string: ["workers", "ignore", "config"],
    alias: {
      h: "help",
      V: "version",
      v: "verbose",
      q: "quiet",
      n: "dry-run",
      l: "link",
      r: "relative",
      c: "clear",
      i: "ignore",
    },
    default: { "default-ignore": true, "post-process": true, input: true },
  });

  const given = (name: string): true | undefined => (args[name] === true ? true : undefined);
  const negated = (name: string): false | undefined => (args[name] === false ? false : undefined);
  const command: unknown = args._[0];

  return {
    command: command === undefined ? undefined : String(command),
    help: args.help === true,
    version: args.version === true,
    verbose: args.verbose === true,
    quiet: args.quiet === true,
    config: lastString(args.config),
    faster: given("faster"),
    workers: lastString(args.workers),
    useMultiprocessing: given("use-multiprocessing"),
    dryRun: given("dry-run"),
    link: given("link"),
    relative: given("relative"),
    clear: given("clear"),
    ignore: stringList(args.ignore),
    defaultIgnore: negated("default-ignore"),
    postProcess: negated("post-process"),
    input: negated("input"),
  };
}

async function dispatch(args: CliArgs, ctx: AppContext): Promise<void> {
  const { command, verbose, quiet } = args;

  switch (command) {
    case "collect":
      await collectCommand(args, ctx);
      break;
    case "config":
      await configCommand({ config: args.config, verbose, quiet }, ctx);
      break;
    default:
      throw new ArgumentError(`Unknown command: ${command}. Run 'fastcollect --help' for usage.`, command);
  }
}

/**
 * Run the CLI and resolve once the command has finished.
 * Exits the process with a non-zero status on error.
 */
export async function runCli(argv: readonly string[], ctx: AppContext = getGlobalContext()): Promise<void> {
  const args = parseCliArgs(argv);

  if (args.version) {
    console.log(`fastcollect ${VERSION}`);
    return;
  }

  const showHelp = args.help || args.command === undefined;
  if (showHelp) {
    console.log(HELP_TEXT);
    return;
  }

  const run = withErrorHandler(dispatch, { verbose: args.verbose, quiet: args.quiet }, ctx);
  await run(args, ctx);
}
