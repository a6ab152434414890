import { createAppContext, setGlobalContext } from "./src/context/index.ts";
import { initRuntime } from "./src/runtime/index.ts";
import { runCli } from "./src/cli.ts";

async function main(): Promise<void> {
  const runtime = await initRuntime();
  const ctx = createAppContext(runtime);
  setGlobalContext(ctx);

  await runCli(runtime.control.args, ctx);
}

await main();
