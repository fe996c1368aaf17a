/**
 * @module view
 *
 * Read-only access to a partitioned array as one logical array.
 */

import { dirname, resolve } from "node:path";
import {
  type DType,
  frameLength,
  IndexError,
  IOError,
  type Partition,
  type PartitionPlan,
  sameShape,
  targetPath,
} from "@framesplit/partition-plan";
import { allocate, type ArraySlab, concatSlabs } from "./slab.js";
import type { ContainerStorage, DatasetRef } from "./storage/types.js";

export type LogicalArrayViewOptions = {
  storage: ContainerStorage;
  /** Directory that target paths are relative to. */
  baseDir: string;
};

/** Directory holding the container at `containerPath`. */
export function containerDirectory(containerPath: string): string {
  return dirname(resolve(containerPath));
}

/**
 * Why `dataset` cannot back `partition` of `plan`, or null when it can. A
 * shard must hold exactly the partition's frames; a source view must reach
 * past the end of its offset range. Both must match the element type and
 * frame shape.
 */
export function describeTargetMismatch(
  plan: PartitionPlan,
  partition: Partition,
  dataset: DatasetRef,
): string | null {
  const { spec } = plan;
  const frameShape = spec.shape.slice(1);
  const frames = dataset.shape[0] ?? 0;
  const { target } = partition;
  const leadingFits =
    target.kind === "shard"
      ? frames === partition.frameCount
      : frames >= target.offsetRange[1];
  if (
    leadingFits &&
    dataset.dtype === spec.dtype &&
    sameShape(dataset.shape.slice(1), frameShape)
  ) {
    return null;
  }

  const leading =
    target.kind === "shard" ? `${partition.frameCount}` : `${target.offsetRange[1]}+`;
  return `${dataset.dtype} [${dataset.shape.join(", ")}], expected ${spec.dtype} [${[leading, ...frameShape].join(", ")}]`;
}

/**
 * The partitions of a plan read back as a single array. Reads spanning
 * several partitions return one contiguous slab, identical to the same read
 * on the unpartitioned array.
 *
 * A target container that does not exist yet reads as the fill value, like
 * an unmapped region of the virtual dataset.
 */
export class LogicalArrayView {
  readonly plan: PartitionPlan;
  readonly storage: ContainerStorage;
  private readonly baseDir: string;
  /** Non-empty partitions in ascending start order. */
  private readonly mapped: readonly Partition[];

  constructor(plan: PartitionPlan, options: LogicalArrayViewOptions) {
    this.plan = plan;
    this.storage = options.storage;
    this.baseDir = options.baseDir;
    this.mapped = plan.partitions.filter((partition) => partition.frameCount > 0);
  }

  get shape(): readonly number[] {
    return this.plan.spec.shape;
  }

  get dtype(): DType {
    return this.plan.spec.dtype;
  }

  /** Number of frames along the leading axis. */
  get length(): number {
    return this.plan.spec.shape[0] ?? 0;
  }

  /** Absolute path of a partition's target container. */
  resolveTarget(partition: Partition): string {
    return resolve(this.baseDir, targetPath(partition.target));
  }

  /**
   * Read frames `[start, end)`.
   *
   * @throws IndexError when the range is not inside the leading axis
   */
  async readRange(start: number, end: number): Promise<ArraySlab> {
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      end > this.length ||
      start > end
    ) {
      throw new IndexError(
        `Range [${start}, ${end}) is outside the leading axis of length ${this.length}`,
      );
    }

    const frameShape = this.shape.slice(1);
    if (start === end) {
      return { data: allocate(this.dtype, 0), shape: [0, ...frameShape] };
    }

    const pieces: ArraySlab[] = [];
    for (let i = this.search(start); i < this.mapped.length; i++) {
      const partition = this.mapped[i];
      if (partition === undefined || partition.start >= end) break;
      const from = Math.max(start, partition.start);
      const to = Math.min(end, partition.end);
      pieces.push(await this.readPartition(partition, from, to));
    }
    return concatSlabs(this.dtype, frameShape, pieces);
  }

  readFrame(index: number): Promise<ArraySlab> {
    return this.readRange(index, index + 1);
  }

  /**
   * Partition holding frame `index`.
   *
   * @throws IndexError when `index` is outside the leading axis
   */
  locate(index: number): Partition {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new IndexError(
        `Frame ${index} is outside the leading axis of length ${this.length}`,
      );
    }
    const partition = this.mapped[this.search(index)];
    if (partition === undefined) {
      throw new IndexError(`No partition holds frame ${index}`);
    }
    return partition;
  }

  /** Index into `mapped` of the last partition starting at or before `frame`. */
  private search(frame: number): number {
    let low = 0;
    let high = this.mapped.length - 1;
    let found = 0;
    while (low <= high) {
      const mid = (low + high) >>> 1;
      const partition = this.mapped[mid];
      if (partition !== undefined && partition.start <= frame) {
        found = mid;
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }
    return found;
  }

  private async readPartition(
    partition: Partition,
    from: number,
    to: number,
  ): Promise<ArraySlab> {
    if (!(await this.storage.exists(this.resolveTarget(partition)))) {
      return this.fillSlab(to - from);
    }
    return this.readTarget(partition, from, to);
  }

  /**
   * Read logical frames `[from, to)` of `partition` from its target
   * container, which must exist.
   *
   * @throws IOError when the target cannot be read or its dataset does not
   * fit the partition
   */
  async readTarget(partition: Partition, from: number, to: number): Promise<ArraySlab> {
    const path = this.resolveTarget(partition);
    const offset =
      partition.target.kind === "view" ? partition.target.offsetRange[0] : 0;
    const handle = await this.storage.open(path, "r");
    try {
      const dataset = await this.storage.openDataset(handle, this.plan.spec.datasetName);
      const mismatch = describeTargetMismatch(this.plan, partition, dataset);
      if (mismatch !== null) {
        throw new IOError(`Target ${path} holds ${mismatch}`);
      }
      return await this.storage.readSlab(dataset, [
        offset + from - partition.start,
        offset + to - partition.start,
      ]);
    } finally {
      await this.storage.close(handle);
    }
  }

  private fillSlab(frames: number): ArraySlab {
    const data = allocate(this.dtype, frames * frameLength(this.shape));
    data.fill(this.plan.spec.fillValue);
    return { data, shape: [frames, ...this.shape.slice(1)] };
  }
}
