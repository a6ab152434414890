import { TransferError } from "../../errors/index.ts";
import { logDryRun, type OutputOptions, verboseLog } from "../../utils/output.ts";
import type { StorageBackend } from "../storage/types.ts";
import type { TransferOutcome, TransferTask } from "./types.ts";

export interface TransferExecutorOptions {
  dryRun?: boolean;
  output?: OutputOptions;
}

/**
 * Applies a single TransferTask to the destination storage.
 *
 * Never retries and never throws: a failing storage call is returned as a
 * TransferError outcome so the caller decides whether it is fatal.
 */
export class TransferExecutor {
  private readonly dryRun: boolean;
  private readonly output: OutputOptions;

  constructor(private readonly storage: StorageBackend, options: TransferExecutorOptions = {}) {
    this.dryRun = options.dryRun ?? false;
    this.output = options.output ?? {};
  }

  async execute(task: TransferTask): Promise<TransferOutcome> {
    const { operation, sourcePath, destinationPath, source } = task;

    try {
      const sourceFile = source.path(sourcePath);

      if (this.dryRun) {
        logDryRun(`Pretending to ${operation} '${sourceFile}'`, this.output);
        return { ok: true, task };
      }

      if (operation === "link") {
        verboseLog(`Linking '${sourceFile}'`, this.output);
        await this.storage.link(sourcePath, destinationPath, source);
      } else {
        verboseLog(`Copying '${sourceFile}'`, this.output);
        await this.storage.copy(sourcePath, destinationPath, source);
      }

      return { ok: true, task };
    } catch (error) {
      return { ok: false, task, error: new TransferError(operation, destinationPath, error) };
    }
  }
}
