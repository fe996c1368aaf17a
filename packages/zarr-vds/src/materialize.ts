/**
 * @module materialize
 *
 * Create and populate the shard containers of a partition plan.
 */

import { resolve } from "node:path";
import {
  describeError,
  frameLength,
  type Partition,
  type PartitionPlan,
  type PhysicalShard,
  sameShape,
  ValidationError,
} from "@framesplit/partition-plan";
import type { PartitionOutcome, ProgressObserver } from "./progress.js";
import { normalSampler, partitionSeed } from "./random.js";
import { allocate } from "./slab.js";
import type { ContainerStorage, DatasetRef } from "./storage/types.js";
import { describeTargetMismatch } from "./view.js";

/** Where shard contents come from. */
export type DataSource =
  /** Nothing is written; shards read back as the fill value. */
  | { kind: "zero-fill" }
  /** Standard normal samples, reproducible from `seed` and the partition index. */
  | { kind: "synthetic-random"; seed: number }
  /** Frames `[start, end)` of an existing unpartitioned container. */
  | { kind: "copy-from"; originalPath: string; datasetName?: string };

/** What to do when a shard container already exists. */
export type ExistingTargetPolicy = "skip" | "fail" | "overwrite";

export const DEFAULT_BATCH_FRAMES = 64;

export type MaterializeOptions = {
  storage: ContainerStorage;
  /** Directory that shard paths are relative to. */
  baseDir: string;
  /** Defaults to `"skip"`, so an interrupted run can be resumed. */
  existing?: ExistingTargetPolicy;
  /** Frames moved per read or write. Defaults to {@link DEFAULT_BATCH_FRAMES}. */
  batchFrames?: number;
  observer?: ProgressObserver;
  /** Checked before each partition; remaining partitions are skipped. */
  signal?: AbortSignal;
};

export type PartitionReport = {
  partition: Partition;
  /** Absolute container path, null for source views. */
  path: string | null;
  outcome: PartitionOutcome;
};

export type MaterializeReport = {
  partitions: PartitionReport[];
  created: number;
  skipped: number;
  failed: number;
};

/**
 * Create one container per shard target of `plan` and fill it from
 * `source`. Partitions are independent: a failure is recorded in the report
 * and the run moves on to the next partition.
 *
 * @throws ValidationError for an invalid batch size, before any I/O
 */
export async function materialize(
  plan: PartitionPlan,
  source: DataSource,
  options: MaterializeOptions,
): Promise<MaterializeReport> {
  const batchFrames = options.batchFrames ?? DEFAULT_BATCH_FRAMES;
  if (!Number.isInteger(batchFrames) || batchFrames < 1) {
    throw new ValidationError(`Batch size must be a positive integer, got ${batchFrames}`);
  }
  if (source.kind === "synthetic-random" && !Number.isInteger(source.seed)) {
    throw new ValidationError(`Seed must be an integer, got ${source.seed}`);
  }

  const context: PartitionContext = {
    plan,
    source,
    storage: options.storage,
    existing: options.existing ?? "skip",
    batchFrames,
  };
  const total = plan.partitions.length;
  const reports: PartitionReport[] = [];

  for (const partition of plan.partitions) {
    const { target } = partition;
    const path = target.kind === "shard" ? resolve(options.baseDir, target.path) : null;

    let outcome: PartitionOutcome;
    if (options.signal?.aborted) {
      outcome = { status: "skipped", reason: "cancelled" };
    } else if (target.kind === "view" || path === null) {
      outcome = { status: "skipped", reason: "source view, nothing to materialize" };
    } else {
      options.observer?.partitionStarted?.(partition, total);
      outcome = await materializeShard(context, partition, target, path);
    }

    options.observer?.partitionFinished?.(partition, outcome, total);
    reports.push({ partition, path, outcome });
  }

  return {
    partitions: reports,
    created: count(reports, "created"),
    skipped: count(reports, "skipped"),
    failed: count(reports, "failed"),
  };
}

type PartitionContext = {
  plan: PartitionPlan;
  source: DataSource;
  storage: ContainerStorage;
  existing: ExistingTargetPolicy;
  batchFrames: number;
};

async function materializeShard(
  context: PartitionContext,
  partition: Partition,
  target: PhysicalShard,
  path: string,
): Promise<PartitionOutcome> {
  const { storage, existing } = context;
  let started = false;
  try {
    if (await storage.exists(path)) {
      if (existing === "skip") {
        const mismatch = await inspectExisting(context, partition, path);
        return mismatch === null
          ? { status: "skipped", reason: "target exists" }
          : { status: "failed", reason: `Target ${path} exists with ${mismatch}` };
      }
      if (existing === "fail") {
        return { status: "failed", reason: `Target ${path} already exists` };
      }
    }

    started = true;
    const handle = await storage.open(path, "w");
    try {
      const { spec } = context.plan;
      const dataset = await storage.createDataset(
        handle,
        spec.datasetName,
        target.shape,
        spec.dtype,
        { fillValue: spec.fillValue },
      );
      await populate(context, partition, dataset);
    } finally {
      await storage.close(handle);
    }
    return { status: "created" };
  } catch (error) {
    let reason = describeError(error);
    if (started) {
      // A partial shard would be skipped on the next run.
      try {
        await storage.remove(path);
      } catch (cleanup) {
        reason += `; removing the partial target failed: ${describeError(cleanup)}`;
      }
    }
    return { status: "failed", reason };
  }
}

/** Why the existing container at `path` cannot back `partition`, or null. */
async function inspectExisting(
  { storage, plan }: PartitionContext,
  partition: Partition,
  path: string,
): Promise<string | null> {
  const handle = await storage.open(path, "r");
  try {
    const dataset = await storage.openDataset(handle, plan.spec.datasetName);
    return describeTargetMismatch(plan, partition, dataset);
  } finally {
    await storage.close(handle);
  }
}

async function populate(
  context: PartitionContext,
  partition: Partition,
  dataset: DatasetRef,
): Promise<void> {
  const { source } = context;
  switch (source.kind) {
    case "zero-fill":
      return;
    case "synthetic-random":
      return writeRandom(context, partition, dataset, source.seed);
    case "copy-from":
      return copyRange(context, partition, dataset, source.originalPath, source.datasetName);
  }
}

async function writeRandom(
  { storage, plan, batchFrames }: PartitionContext,
  partition: Partition,
  dataset: DatasetRef,
  seed: number,
): Promise<void> {
  const sample = normalSampler(partitionSeed(seed, partition.index));
  const frameShape = plan.spec.shape.slice(1);
  const stride = frameLength(plan.spec.shape);

  for (let offset = 0; offset < partition.frameCount; offset += batchFrames) {
    const frames = Math.min(batchFrames, partition.frameCount - offset);
    const data = allocate(plan.spec.dtype, frames * stride);
    for (let i = 0; i < data.length; i++) {
      data[i] = sample();
    }
    await storage.writeSlab(dataset, offset, { data, shape: [frames, ...frameShape] });
  }
}

async function copyRange(
  { storage, plan, batchFrames }: PartitionContext,
  partition: Partition,
  dataset: DatasetRef,
  originalPath: string,
  datasetName: string = plan.spec.datasetName,
): Promise<void> {
  const handle = await storage.open(originalPath, "r");
  try {
    const original = await storage.openDataset(handle, datasetName);
    if (!sameShape(original.shape, plan.spec.shape) || original.dtype !== plan.spec.dtype) {
      throw new ValidationError(
        `Original ${originalPath} is ${original.dtype} [${original.shape.join(", ")}], expected ${plan.spec.dtype} [${plan.spec.shape.join(", ")}]`,
      );
    }

    for (let offset = 0; offset < partition.frameCount; offset += batchFrames) {
      const frames = Math.min(batchFrames, partition.frameCount - offset);
      const from = partition.start + offset;
      const slab = await storage.readSlab(original, [from, from + frames]);
      await storage.writeSlab(dataset, offset, slab);
    }
  } finally {
    await storage.close(handle);
  }
}

function count(
  reports: readonly PartitionReport[],
  status: PartitionOutcome["status"],
): number {
  return reports.filter((report) => report.outcome.status === status).length;
}
