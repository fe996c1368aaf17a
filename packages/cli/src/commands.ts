/**
 * @module commands
 *
 * The `framesplit` subcommands. Each returns the process exit code.
 */

import { relative, resolve } from "node:path";
import {
  buildPlan,
  createArraySpec,
  defaultNamingPattern,
  type PartitionPlan,
  patternNaming,
} from "@framesplit/partition-plan";
import {
  buildView,
  type ContainerStorage,
  containerDirectory,
  type DataSource,
  type GroundTruth,
  type LogicalArrayView,
  type MaterializeReport,
  materialize,
  openView,
  originalGroundTruth,
  type ProgressObserver,
  targetGroundTruth,
  type VerificationResult,
  verify,
} from "@framesplit/zarr-vds";
import {
  type CreateArgs,
  DEFAULT_SOURCE_PATTERN,
  type SourcesArgs,
  type SplitArgs,
  type VerifyArgs,
} from "./args.js";
import { consoleObserver, describeOutcome } from "./progress.js";

export type CliContext = {
  storage: ContainerStorage;
  log: (line: string) => void;
  error: (line: string) => void;
};

const silent = (): void => {};

function reporter(context: CliContext, quiet: boolean): {
  log: (line: string) => void;
  observer: ProgressObserver | undefined;
} {
  return quiet
    ? { log: silent, observer: undefined }
    : { log: context.log, observer: consoleObserver(context.log) };
}

function describePlan(plan: PartitionPlan, log: (line: string) => void): void {
  const { spec } = plan;
  log(`Shape: [${spec.shape.join(", ")}]`);
  log(`Dtype: ${spec.dtype}`);
  log(`Dataset: ${spec.datasetName}`);
  log(
    `Partitions: ${plan.partitions.length} (${plan.partitions
      .map((partition) => partition.frameCount)
      .join(", ")} frames)`,
  );
}

function reportMaterialized(
  context: CliContext,
  report: MaterializeReport,
  log: (line: string) => void,
): number {
  log(`${report.created} created, ${report.skipped} skipped, ${report.failed} failed`);
  for (const { partition, outcome } of report.partitions) {
    if (outcome.status === "failed") {
      context.error(`Error: ${partition.name}: ${describeOutcome(outcome)}`);
    }
  }
  return report.failed > 0 ? 1 : 0;
}

function reportVerification(
  context: CliContext,
  result: VerificationResult,
  truth: GroundTruth,
  log: (line: string) => void,
): number {
  if (result.passed) {
    log(`Verification passed: ${result.checked} frame(s) match ${truth.label}`);
    return 0;
  }
  for (const mismatch of result.mismatches) {
    context.error(`Mismatch at frame ${mismatch.index}: ${mismatch.detail}`);
  }
  context.error(
    `Error: verification failed: ${result.mismatches.length} mismatch(es) in ${result.checked} frame(s)`,
  );
  return 1;
}

/** Plan plus logical container, without partition data. */
export async function runCreate(args: CreateArgs, context: CliContext): Promise<number> {
  const { log, observer } = reporter(context, args.quiet);
  const spec = createArraySpec({
    shape: args.shape,
    dtype: args.dtype,
    datasetName: args.dataset,
    fillValue: args.fillValue,
  });
  const naming = patternNaming(args.pattern ?? defaultNamingPattern(args.output));
  const plan = buildPlan(spec, args.partitions, naming);

  log(`Creating logical container ${args.output}`);
  describePlan(plan, log);
  await buildView(plan, { storage: context.storage, containerPath: args.output, observer });
  log(`Wrote ${args.output}`);
  return 0;
}

/** Materialize shards from a stored plan or from a shape. */
export async function runSources(args: SourcesArgs, context: CliContext): Promise<number> {
  const { log, observer } = reporter(context, args.quiet);

  let plan: PartitionPlan;
  let baseDir: string;
  if (args.vds !== null) {
    const view = await openView(context.storage, args.vds);
    plan = view.plan;
    baseDir = containerDirectory(args.vds);
    log(`Creating partitions for ${args.vds}`);
  } else {
    const spec = createArraySpec({
      shape: args.shape ?? [],
      dtype: args.dtype,
      datasetName: args.dataset,
    });
    const naming = patternNaming(args.pattern ?? DEFAULT_SOURCE_PATTERN);
    plan = buildPlan(spec, args.partitions ?? 0, naming);
    baseDir = resolve(args.output);
    log(`Creating partitions in ${args.output}`);
  }
  describePlan(plan, log);

  const source: DataSource = args.fill
    ? { kind: "synthetic-random", seed: args.seed }
    : { kind: "zero-fill" };
  const report = await materialize(plan, source, {
    storage: context.storage,
    baseDir,
    existing: args.existing,
    observer,
  });
  return reportMaterialized(context, report, log);
}

/** Split an existing container into shards or views plus a logical container. */
export async function runSplit(args: SplitArgs, context: CliContext): Promise<number> {
  const { storage } = context;
  const { log, observer } = reporter(context, args.quiet);

  const { shape, dtype } = await describeInput(storage, args.input, args.dataset);
  const inputPath = relative(containerDirectory(args.output), resolve(args.input));
  const spec = createArraySpec({ shape, dtype, datasetName: args.dataset });
  const naming = patternNaming(args.pattern ?? defaultNamingPattern(args.output));
  const plan = buildPlan(spec, args.partitions, naming, {
    target: args.view ? { kind: "view", sourcePath: inputPath } : { kind: "shard" },
    originalPath: inputPath,
  });

  log(`Splitting ${args.input} into ${args.output}`);
  describePlan(plan, log);

  let status = 0;
  if (!args.view) {
    const report = await materialize(
      plan,
      { kind: "copy-from", originalPath: args.input },
      {
        storage,
        baseDir: containerDirectory(args.output),
        existing: args.existing,
        observer,
      },
    );
    status = reportMaterialized(context, report, log);
  }

  const view = await buildView(plan, { storage, containerPath: args.output, observer });
  log(`Wrote ${args.output}`);

  if (args.verify) {
    const truth = originalGroundTruth(storage, args.input, args.dataset);
    const result = await verify(view, truth, args.full ? { samples: "full" } : {});
    status = Math.max(status, reportVerification(context, result, truth, log));
  }
  return status;
}

async function describeInput(
  storage: ContainerStorage,
  path: string,
  name: string,
): Promise<{ shape: readonly number[]; dtype: string }> {
  const handle = await storage.open(path, "r");
  try {
    const { shape, dtype } = await storage.openDataset(handle, name);
    return { shape, dtype };
  } finally {
    await storage.close(handle);
  }
}

/** Compare a logical container with its original or its partitions. */
export async function runVerify(args: VerifyArgs, context: CliContext): Promise<number> {
  const { storage } = context;
  const { log } = reporter(context, args.quiet);

  const view = await openView(storage, args.vds, args.dataset ?? undefined);
  const truth = groundTruthFor(view, args, storage);
  log(`Verifying ${args.vds} against ${truth.label}`);
  describePlan(view.plan, log);

  const result = await verify(view, truth, args.full ? { samples: "full" } : {});
  return reportVerification(context, result, truth, log);
}

function groundTruthFor(
  view: LogicalArrayView,
  args: VerifyArgs,
  storage: ContainerStorage,
): GroundTruth {
  const { datasetName } = view.plan.spec;
  if (args.against !== null) {
    return originalGroundTruth(storage, args.against, datasetName);
  }
  if (view.plan.originalPath !== null) {
    const original = resolve(containerDirectory(args.vds), view.plan.originalPath);
    return originalGroundTruth(storage, original, datasetName);
  }
  return targetGroundTruth(view);
}
