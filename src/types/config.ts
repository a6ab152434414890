import { z } from "zod";
import { ConfigurationError } from "../errors/index.ts";

/**
 * A directory whose files are collected.
 */
const SourceSchema = z.object({
  /** Directory to collect from, relative to the project directory */
  path: z.string().min(1),
  /** Sub-directory of the destination the files are collected into */
  prefix: z.string().min(1).optional(),
}).strict();

/**
 * Zod schema for CollectConfig validation.
 *
 * Defines the structure and constraints for .fastcollect.toml and
 * .fastcollect.local.toml files.
 */
export const CollectConfigSchema = z.object({
  /** Destination directory (static root), relative to the project directory */
  destination: z.string().min(1).optional(),
  sources: z.array(SourceSchema).optional(),
  /** Extra ignore patterns, added to the default ones */
  ignore: z.array(z.string()).optional(),
  /** Patterns to prepend to the base config's ignore array */
  ignore_prepend: z.array(z.string()).optional(),
  /** Patterns to append to the base config's ignore array */
  ignore_append: z.array(z.string()).optional(),
  collect: z.object({
    /** Transfer files on a worker pool instead of one by one */
    faster: z.boolean().optional(),
    /**
     * Size of the worker pool used with `faster`.
     * Can be overridden by FASTCOLLECT_WORKERS environment variable.
     * @minimum 1
     * @default 20
     */
    workers: z.number().int().min(1).optional(),
    /** Create symbolic links instead of copying */
    link: z.boolean().optional(),
    /** Create relative symbolic links (with `link`) */
    relative: z.boolean().optional(),
    /** Delete existing destination files before collecting */
    clear: z.boolean().optional(),
    post_process: z.boolean().optional(),
    /** Apply the default ignore patterns (CVS, .*, *~) */
    use_default_ignore: z.boolean().optional(),
  }).strict().optional(),
  storage: z.object({
    /** "manifest" adds content-hashed copies and a manifest file */
    backend: z.enum(["filesystem", "manifest"]).optional(),
    manifest_name: z.string().min(1).optional(),
  }).strict().optional(),
}).strict();

export type CollectConfig = z.infer<typeof CollectConfigSchema>;

export type SourceConfig = z.infer<typeof SourceSchema>;

/**
 * Validate and parse a CollectConfig from unknown data
 * @param data Unknown data to validate
 * @param filePath Path to the config file (for error messages)
 * @throws ConfigurationError if validation fails
 */
export function parseCollectConfig(data: unknown, filePath: string): CollectConfig {
  const result = CollectConfigSchema.safeParse(data);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigurationError(`Invalid configuration:\n${errors}`, filePath);
  }
  return result.data;
}
