export { parseArgs, USAGE } from "./args.js";
export type {
  CreateArgs,
  HelpArgs,
  ParsedArgs,
  SourcesArgs,
  SplitArgs,
  VerifyArgs,
} from "./args.js";
export type { CliContext } from "./commands.js";
export { defaultContext, main } from "./main.js";
