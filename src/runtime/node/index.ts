/**
 * Node.js runtime implementation
 *
 * This module provides the Node.js-specific implementation of the Runtime interface.
 */

import type { Runtime } from "../types.ts";
import { nodeControl, nodeEnv, nodeSignals } from "./env.ts";
import { nodeErrors } from "./errors.ts";
import { nodeFS } from "./fs.ts";
import { nodeIO } from "./io.ts";

/**
 * Node.js runtime implementation
 */
export const nodeRuntime: Runtime = {
  name: "node",
  fs: nodeFS,
  env: nodeEnv,
  control: nodeControl,
  io: nodeIO,
  errors: nodeErrors,
  signals: nodeSignals,
};
