/**
 * @module args
 *
 * Command-line argument parsing for `framesplit`.
 */

import { ValidationError } from "@framesplit/partition-plan";
import type { ExistingTargetPolicy } from "@framesplit/zarr-vds";

export type CreateArgs = {
  command: "create";
  output: string;
  shape: number[];
  partitions: number;
  dtype: string;
  dataset: string;
  pattern: string | null;
  fillValue: number;
  quiet: boolean;
};

export type SourcesArgs = {
  command: "sources";
  /** Logical container to read the plan from; excludes `shape`. */
  vds: string | null;
  shape: number[] | null;
  partitions: number | null;
  output: string;
  dtype: string;
  dataset: string;
  pattern: string | null;
  /** Random contents instead of fill. */
  fill: boolean;
  seed: number;
  existing: ExistingTargetPolicy;
  quiet: boolean;
};

export type SplitArgs = {
  command: "split";
  input: string;
  output: string;
  partitions: number;
  dataset: string;
  pattern: string | null;
  view: boolean;
  verify: boolean;
  full: boolean;
  existing: ExistingTargetPolicy;
  quiet: boolean;
};

export type VerifyArgs = {
  command: "verify";
  vds: string;
  against: string | null;
  dataset: string | null;
  full: boolean;
  quiet: boolean;
};

export type HelpArgs = { command: "help" };

export type ParsedArgs = CreateArgs | SourcesArgs | SplitArgs | VerifyArgs | HelpArgs;

export const DEFAULT_DTYPE = "float64";
export const DEFAULT_DATASET = "data";
export const DEFAULT_SOURCE_PATTERN = "source_{:03d}.zarr";

const EXISTING_POLICIES: readonly ExistingTargetPolicy[] = ["skip", "fail", "overwrite"];

/** Walks argv, handing out option values. */
class ArgReader {
  private index = 0;

  constructor(
    private readonly args: readonly string[],
    private readonly command: string,
  ) {}

  next(): string | undefined {
    return this.args[this.index++];
  }

  value(flag: string): string {
    const value = this.args[this.index];
    if (value === undefined || (value.startsWith("-") && !isNumeric(value))) {
      throw new ValidationError(`Option ${flag} requires a value`);
    }
    this.index++;
    return value;
  }

  integer(flag: string): number {
    const raw = this.value(flag);
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw new ValidationError(`Option ${flag} expects an integer, got "${raw}"`);
    }
    return value;
  }

  number(flag: string): number {
    const raw = this.value(flag);
    const value = Number(raw);
    if (raw.trim() === "" || !Number.isFinite(value)) {
      throw new ValidationError(`Option ${flag} expects a number, got "${raw}"`);
    }
    return value;
  }

  /** All values up to the next option. */
  dimensions(flag: string): number[] {
    const dims: number[] = [];
    while (this.index < this.args.length) {
      const raw = this.args[this.index];
      if (raw === undefined || raw.startsWith("-")) break;
      const value = Number(raw);
      if (!Number.isInteger(value)) {
        throw new ValidationError(`Option ${flag} expects integers, got "${raw}"`);
      }
      dims.push(value);
      this.index++;
    }
    if (dims.length === 0) {
      throw new ValidationError(`Option ${flag} requires at least one dimension`);
    }
    return dims;
  }

  existing(flag: string): ExistingTargetPolicy {
    const raw = this.value(flag);
    const policy = EXISTING_POLICIES.find((candidate) => candidate === raw);
    if (policy === undefined) {
      throw new ValidationError(
        `Option ${flag} must be one of ${EXISTING_POLICIES.join(", ")}, got "${raw}"`,
      );
    }
    return policy;
  }

  unknown(arg: string): never {
    if (arg.startsWith("-")) {
      throw new ValidationError(`Unknown option ${arg} for ${this.command}`);
    }
    throw new ValidationError(`Unexpected argument "${arg}" for ${this.command}`);
  }
}

function isNumeric(value: string): boolean {
  return value.trim() !== "" && Number.isFinite(Number(value));
}

function required<T>(value: T | null, flag: string, command: string): T {
  if (value === null) {
    throw new ValidationError(`Missing required option ${flag} for ${command}`);
  }
  return value;
}

/**
 * Parse `framesplit` arguments, without the executable and script path.
 *
 * @throws ValidationError for unknown commands or options, missing or
 * malformed values
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const [command, ...rest] = argv;
  if (
    command === undefined ||
    command === "help" ||
    argv.includes("--help") ||
    argv.includes("-h")
  ) {
    return { command: "help" };
  }

  switch (command) {
    case "create":
      return parseCreate(new ArgReader(rest, command));
    case "sources":
      return parseSources(new ArgReader(rest, command));
    case "split":
      return parseSplit(new ArgReader(rest, command));
    case "verify":
      return parseVerify(new ArgReader(rest, command));
    default:
      throw new ValidationError(
        `Unknown command "${command}"; expected create, sources, split or verify`,
      );
  }
}

function parseCreate(reader: ArgReader): CreateArgs {
  let output: string | null = null;
  let shape: number[] | null = null;
  let partitions: number | null = null;
  let dtype = DEFAULT_DTYPE;
  let dataset = DEFAULT_DATASET;
  let pattern: string | null = null;
  let fillValue = 0;
  let quiet = false;

  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    switch (arg) {
      case "-o":
      case "--output":
        output = reader.value(arg);
        break;
      case "-s":
      case "--shape":
        shape = reader.dimensions(arg);
        break;
      case "-n":
      case "--num-files":
        partitions = reader.integer(arg);
        break;
      case "-t":
      case "--dtype":
        dtype = reader.value(arg);
        break;
      case "-d":
      case "--dataset":
        dataset = reader.value(arg);
        break;
      case "-p":
      case "--pattern":
        pattern = reader.value(arg);
        break;
      case "-f":
      case "--fillvalue":
        fillValue = reader.number(arg);
        break;
      case "-q":
      case "--quiet":
        quiet = true;
        break;
      default:
        reader.unknown(arg);
    }
  }

  return {
    command: "create",
    output: required(output, "-o/--output", "create"),
    shape: required(shape, "-s/--shape", "create"),
    partitions: required(partitions, "-n/--num-files", "create"),
    dtype,
    dataset,
    pattern,
    fillValue,
    quiet,
  };
}

function parseSources(reader: ArgReader): SourcesArgs {
  let vds: string | null = null;
  let shape: number[] | null = null;
  let partitions: number | null = null;
  let output = ".";
  let dtype = DEFAULT_DTYPE;
  let dataset = DEFAULT_DATASET;
  let pattern: string | null = null;
  let fill = false;
  let seed = 0;
  let existing: ExistingTargetPolicy = "skip";
  let quiet = false;

  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    switch (arg) {
      case "--vds":
        vds = reader.value(arg);
        break;
      case "-s":
      case "--shape":
        shape = reader.dimensions(arg);
        break;
      case "-n":
      case "--num-files":
        partitions = reader.integer(arg);
        break;
      case "-o":
      case "--output":
        output = reader.value(arg);
        break;
      case "-t":
      case "--dtype":
        dtype = reader.value(arg);
        break;
      case "-d":
      case "--dataset":
        dataset = reader.value(arg);
        break;
      case "-p":
      case "--pattern":
        pattern = reader.value(arg);
        break;
      case "--fill":
        fill = true;
        break;
      case "--seed":
        seed = reader.integer(arg);
        break;
      case "--existing":
        existing = reader.existing(arg);
        break;
      case "-q":
      case "--quiet":
        quiet = true;
        break;
      default:
        reader.unknown(arg);
    }
  }

  if (vds !== null && (shape !== null || partitions !== null)) {
    throw new ValidationError("--vds cannot be combined with -s/--shape or -n/--num-files");
  }
  if (vds === null && (shape === null || partitions === null)) {
    throw new ValidationError("sources needs either --vds or both -s/--shape and -n/--num-files");
  }

  return {
    command: "sources",
    vds,
    shape,
    partitions,
    output,
    dtype,
    dataset,
    pattern,
    fill,
    seed,
    existing,
    quiet,
  };
}

function parseSplit(reader: ArgReader): SplitArgs {
  let input: string | null = null;
  let output: string | null = null;
  let partitions: number | null = null;
  let dataset = DEFAULT_DATASET;
  let pattern: string | null = null;
  let view = false;
  let verify = false;
  let full = false;
  let existing: ExistingTargetPolicy = "skip";
  let quiet = false;

  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    switch (arg) {
      case "-i":
      case "--input":
        input = reader.value(arg);
        break;
      case "-o":
      case "--output":
        output = reader.value(arg);
        break;
      case "-n":
      case "--num-divisions":
        partitions = reader.integer(arg);
        break;
      case "-d":
      case "--dataset":
        dataset = reader.value(arg);
        break;
      case "-p":
      case "--pattern":
        pattern = reader.value(arg);
        break;
      case "--view":
        view = true;
        break;
      case "--verify":
        verify = true;
        break;
      case "--full":
        full = true;
        break;
      case "--existing":
        existing = reader.existing(arg);
        break;
      case "-q":
      case "--quiet":
        quiet = true;
        break;
      default:
        reader.unknown(arg);
    }
  }

  return {
    command: "split",
    input: required(input, "-i/--input", "split"),
    output: required(output, "-o/--output", "split"),
    partitions: required(partitions, "-n/--num-divisions", "split"),
    dataset,
    pattern,
    view,
    verify,
    full,
    existing,
    quiet,
  };
}

function parseVerify(reader: ArgReader): VerifyArgs {
  let vds: string | null = null;
  let against: string | null = null;
  let dataset: string | null = null;
  let full = false;
  let quiet = false;

  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    switch (arg) {
      case "--vds":
        vds = reader.value(arg);
        break;
      case "--against":
        against = reader.value(arg);
        break;
      case "-d":
      case "--dataset":
        dataset = reader.value(arg);
        break;
      case "--full":
        full = true;
        break;
      case "-q":
      case "--quiet":
        quiet = true;
        break;
      default:
        reader.unknown(arg);
    }
  }

  return {
    command: "verify",
    vds: required(vds, "--vds", "verify"),
    against,
    dataset,
    full,
    quiet,
  };
}

export const USAGE = `Split an array along its leading axis into Zarr containers
and reassemble them as one virtual dataset.

Usage:
  framesplit create -o <vds> -s <dims...> -n <N> [options]
  framesplit sources (--vds <vds> | -s <dims...> -n <N>) [options]
  framesplit split -i <input> -o <vds> -n <N> [options]
  framesplit verify --vds <vds> [options]

create:
  -o, --output <path>      Logical container to write
  -s, --shape <dims...>    Full array shape, leading axis first
  -n, --num-files <N>      Number of partitions
  -t, --dtype <type>       Element type (default: ${DEFAULT_DTYPE})
  -d, --dataset <name>     Dataset name (default: ${DEFAULT_DATASET})
  -p, --pattern <pattern>  Partition names, e.g. "run_{:03d}.zarr"
  -f, --fillvalue <value>  Value of unwritten elements (default: 0)

sources:
  --vds <path>             Read the plan from a logical container
  -s, -n, -t, -d, -p       As for create, when no --vds is given
  -o, --output <dir>       Directory for the partitions (default: .)
  --fill                   Fill with random samples instead of leaving empty
  --seed <S>               Seed for --fill (default: 0)
  --existing <policy>      skip, fail or overwrite existing targets (default: skip)

split:
  -i, --input <path>       Container to split
  -o, --output <path>      Logical container to write
  -n, --num-divisions <N>  Number of partitions
  -d, --dataset <name>     Dataset to split (default: ${DEFAULT_DATASET})
  -p, --pattern <pattern>  Partition names
  --view                   Reference the input instead of copying it
  --verify                 Compare the result with the input
  --full                   Verify every frame instead of first, middle and last
  --existing <policy>      skip, fail or overwrite existing targets (default: skip)

verify:
  --vds <path>             Logical container to check
  --against <path>         Original container; defaults to the recorded one,
                           or to the partitions themselves
  -d, --dataset <name>     Dataset name (default: from the container)
  --full                   Check every frame

Common:
  -q, --quiet              Only print errors
  -h, --help               Show this message
`;
