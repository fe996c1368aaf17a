/**
 * @module types
 *
 * Partition plan data model.
 */

import type { DType } from "./dtype.js";

/** Half-open `[start, end)` range along the leading axis. */
export type FrameRange = readonly [start: number, end: number];

/** Shape, element type and name of the logical array being partitioned. */
export type GlobalArraySpec = {
  /** Dimensions; the first is the partition axis. */
  readonly shape: readonly number[];
  readonly dtype: DType;
  /** Dataset name inside the logical container and every target. */
  readonly datasetName: string;
  /** Value read back for unmapped or never-written elements. */
  readonly fillValue: number;
};

/** Partition backed by its own container holding a copy of the range. */
export type PhysicalShard = {
  readonly kind: "shard";
  /** Container path, relative to the logical container's directory. */
  readonly path: string;
  readonly shape: readonly number[];
};

/** Partition backed by a zero-copy reference into an existing container. */
export type SourceView = {
  readonly kind: "view";
  /** Container path, relative to the logical container's directory. */
  readonly sourcePath: string;
  /** Range of the source's leading axis this partition maps to. */
  readonly offsetRange: FrameRange;
};

export type TargetDescriptor = PhysicalShard | SourceView;

export type TargetKind = TargetDescriptor["kind"];

/** One contiguous range of the leading axis and where its data lives. */
export type Partition = {
  readonly index: number;
  /** Unique identifier produced by the naming function. */
  readonly name: string;
  /** Inclusive. */
  readonly start: number;
  /** Exclusive. */
  readonly end: number;
  readonly frameCount: number;
  readonly target: TargetDescriptor;
};

/** Ordered, contiguous partitioning of a {@link GlobalArraySpec}. */
export type PartitionPlan = {
  readonly spec: GlobalArraySpec;
  readonly partitions: readonly Partition[];
  /** Pattern the partition names were formatted from, if any. */
  readonly namingPattern: string | null;
  /** Container the data was split from, if any. */
  readonly originalPath: string | null;
};
