/**
 * @module storage/types
 *
 * Contract of the hierarchical container the partitioning core works
 * against.
 */

import type { DType, FrameRange } from "@framesplit/partition-plan";
import type { ArraySlab } from "../slab.js";

/**
 * `"r"` requires an existing container and forbids writes, `"w"` truncates,
 * `"a"` opens or creates.
 */
export type OpenMode = "r" | "w" | "a";

export interface ContainerHandle {
  readonly path: string;
  readonly mode: OpenMode;
}

export interface DatasetRef {
  readonly container: ContainerHandle;
  readonly name: string;
  readonly shape: readonly number[];
  readonly dtype: DType;
  /** Whether the dataset is assembled from mapping entries. */
  readonly virtual: boolean;
}

/** Where one logical range of a virtual dataset reads from. */
export type VirtualSource = {
  /** Container path, relative to the virtual dataset's container directory. */
  path: string;
  dataset: string;
  range: FrameRange;
};

/** "Logical range X maps to range Y of dataset D in container Z." */
export type VirtualMapping = {
  logical: FrameRange;
  source: VirtualSource;
};

/** Shape, type and mapping entries of a virtual dataset. */
export interface VirtualLayoutDescription {
  readonly shape: readonly number[];
  readonly dtype: DType;
  readonly fillValue: number;
  readonly mappings: readonly VirtualMapping[];
}

export type CreateDatasetOptions = {
  /** Value read back for elements never written. Defaults to 0. */
  fillValue?: number;
};

/** Container or dataset carrying attributes. */
export type AttributeTarget = ContainerHandle | DatasetRef;

/**
 * Hierarchical container operations. Every failure of the underlying store
 * surfaces as an `IOError`.
 */
export interface ContainerStorage {
  open(path: string, mode: OpenMode): Promise<ContainerHandle>;
  close(handle: ContainerHandle): Promise<void>;
  exists(path: string): Promise<boolean>;
  remove(path: string): Promise<void>;

  /** Allocate a densely stored array. */
  createDataset(
    handle: ContainerHandle,
    name: string,
    shape: readonly number[],
    dtype: DType,
    options?: CreateDatasetOptions,
  ): Promise<DatasetRef>;
  createVirtualDataset(
    handle: ContainerHandle,
    name: string,
    layout: VirtualLayoutDescription,
  ): Promise<DatasetRef>;
  openDataset(handle: ContainerHandle, name: string): Promise<DatasetRef>;
  getVirtualMappings(ref: DatasetRef): Promise<VirtualMapping[]>;

  /** Read frames `[range[0], range[1])` of a physical dataset. */
  readSlab(ref: DatasetRef, range: FrameRange): Promise<ArraySlab>;
  /** Write `slab` starting at frame `start`. */
  writeSlab(ref: DatasetRef, start: number, slab: ArraySlab): Promise<void>;

  getAttr(target: AttributeTarget, key: string): Promise<unknown>;
  getAttrs(target: AttributeTarget): Promise<Record<string, unknown>>;
  setAttr(target: AttributeTarget, key: string, value: unknown): Promise<void>;
  setAttrs(
    target: AttributeTarget,
    attributes: Readonly<Record<string, unknown>>,
  ): Promise<void>;
}
