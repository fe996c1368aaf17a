import { describeError } from "@framesplit/partition-plan";
import { FileSystemStoreProvider, ZarrContainerStorage } from "@framesplit/zarr-vds";
import { parseArgs, USAGE } from "./args.js";
import {
  type CliContext,
  runCreate,
  runSources,
  runSplit,
  runVerify,
} from "./commands.js";

export function defaultContext(): CliContext {
  return {
    storage: new ZarrContainerStorage(new FileSystemStoreProvider()),
    log: (line) => console.log(line),
    error: (line) => console.error(line),
  };
}

/** Run `framesplit` with `argv` and return the exit code. */
export async function main(
  argv: readonly string[],
  context: CliContext = defaultContext(),
): Promise<number> {
  try {
    const args = parseArgs(argv);
    switch (args.command) {
      case "help":
        context.log(USAGE);
        return 0;
      case "create":
        return await runCreate(args, context);
      case "sources":
        return await runSources(args, context);
      case "split":
        return await runSplit(args, context);
      case "verify":
        return await runVerify(args, context);
    }
  } catch (error) {
    context.error(`Error: ${describeError(error)}`);
    return 1;
  }
}
