import { ValidationError } from "@framesplit/partition-plan";
import { describe, expect, it } from "vitest";
import { parseArgs } from "../src/args.js";

describe("parseArgs", () => {
  it("parses create with defaults", () => {
    expect(parseArgs(["create", "-o", "run.zarr", "-s", "1003", "512", "512", "-n", "8"])).toEqual({
      command: "create",
      output: "run.zarr",
      shape: [1003, 512, 512],
      partitions: 8,
      dtype: "float64",
      dataset: "data",
      pattern: null,
      fillValue: 0,
      quiet: false,
    });
  });

  it("accepts long options and negative fill values", () => {
    const args = parseArgs([
      "create",
      "--output",
      "run.zarr",
      "--shape",
      "10",
      "--num-files",
      "2",
      "--dtype",
      "<i2",
      "--fillvalue",
      "-1.5",
      "--pattern",
      "part_{}.zarr",
      "--quiet",
    ]);
    expect(args).toMatchObject({
      dtype: "<i2",
      fillValue: -1.5,
      pattern: "part_{}.zarr",
      quiet: true,
    });
  });

  it("parses sources from a stored plan", () => {
    expect(parseArgs(["sources", "--vds", "run.zarr", "--fill", "--seed", "7"])).toEqual({
      command: "sources",
      vds: "run.zarr",
      shape: null,
      partitions: null,
      output: ".",
      dtype: "float64",
      dataset: "data",
      pattern: null,
      fill: true,
      seed: 7,
      existing: "skip",
      quiet: false,
    });
  });

  it("requires either a stored plan or a shape for sources", () => {
    expect(() => parseArgs(["sources", "-s", "10"])).toThrow(
      new ValidationError("sources needs either --vds or both -s/--shape and -n/--num-files"),
    );
    expect(() => parseArgs(["sources", "--vds", "run.zarr", "-n", "2"])).toThrow(
      new ValidationError("--vds cannot be combined with -s/--shape or -n/--num-files"),
    );
  });

  it("parses split flags", () => {
    expect(
      parseArgs([
        "split",
        "-i",
        "in.zarr",
        "-o",
        "out.zarr",
        "-n",
        "4",
        "--view",
        "--verify",
        "--full",
        "--existing",
        "overwrite",
      ]),
    ).toEqual({
      command: "split",
      input: "in.zarr",
      output: "out.zarr",
      partitions: 4,
      dataset: "data",
      pattern: null,
      view: true,
      verify: true,
      full: true,
      existing: "overwrite",
      quiet: false,
    });
  });

  it("parses verify", () => {
    expect(parseArgs(["verify", "--vds", "out.zarr", "--against", "in.zarr", "-d", "frames"])).toEqual({
      command: "verify",
      vds: "out.zarr",
      against: "in.zarr",
      dataset: "frames",
      full: false,
      quiet: false,
    });
  });

  it("returns help when asked or given nothing", () => {
    expect(parseArgs([])).toEqual({ command: "help" });
    expect(parseArgs(["split", "--help"])).toEqual({ command: "help" });
    expect(parseArgs(["help"])).toEqual({ command: "help" });
  });

  it("rejects malformed arguments", () => {
    expect(() => parseArgs(["resize"])).toThrow(
      new ValidationError('Unknown command "resize"; expected create, sources, split or verify'),
    );
    expect(() => parseArgs(["create", "-o", "run.zarr", "-s", "10", "-n", "two"])).toThrow(
      new ValidationError('Option -n expects an integer, got "two"'),
    );
    expect(() => parseArgs(["create", "-o", "-s", "10"])).toThrow(
      new ValidationError("Option -o requires a value"),
    );
    expect(() => parseArgs(["create", "-s", "-n", "2"])).toThrow(
      new ValidationError("Option -s requires at least one dimension"),
    );
    expect(() => parseArgs(["create", "-o", "run.zarr", "-n", "2"])).toThrow(
      new ValidationError("Missing required option -s/--shape for create"),
    );
    expect(() => parseArgs(["verify", "--vds", "a.zarr", "--bogus"])).toThrow(
      new ValidationError("Unknown option --bogus for verify"),
    );
    expect(() => parseArgs(["verify", "--vds", "a.zarr", "extra"])).toThrow(
      new ValidationError('Unexpected argument "extra" for verify'),
    );
    expect(() => parseArgs(["split", "-i", "a", "-o", "b", "-n", "2", "--existing", "keep"])).toThrow(
      new ValidationError('Option --existing must be one of skip, fail, overwrite, got "keep"'),
    );
  });
});
