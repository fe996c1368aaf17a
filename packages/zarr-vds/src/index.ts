/**
 * @framesplit/zarr-vds
 *
 * Materializes partition plans as Zarr v3 containers and reads them back as
 * one logical array.
 *
 * @example
 * ```typescript
 * import { buildPlan, createArraySpec, patternNaming } from "@framesplit/partition-plan";
 * import {
 *   buildView,
 *   FileSystemStoreProvider,
 *   materialize,
 *   ZarrContainerStorage,
 * } from "@framesplit/zarr-vds";
 *
 * const storage = new ZarrContainerStorage(new FileSystemStoreProvider());
 * const spec = createArraySpec({ shape: [1000, 64, 64], dtype: "uint16" });
 * const plan = buildPlan(spec, 10, patternNaming("run_{:03d}.zarr"));
 *
 * await materialize(plan, { kind: "zero-fill" }, { storage, baseDir: "out" });
 * const view = await buildView(plan, { storage, containerPath: "out/run.zarr" });
 * const frames = await view.readRange(95, 105);
 * ```
 *
 * @packageDocumentation
 */

export {
  buildView,
  layoutFor,
  openView,
  targetRange,
  VirtualLayout,
} from "./layout.js";
export type { BuildViewOptions } from "./layout.js";
export { DEFAULT_BATCH_FRAMES, materialize } from "./materialize.js";
export type {
  DataSource,
  ExistingTargetPolicy,
  MaterializeOptions,
  MaterializeReport,
  PartitionReport,
} from "./materialize.js";
export type { PartitionOutcome, ProgressObserver } from "./progress.js";
export { mulberry32, normalSampler, partitionSeed } from "./random.js";
export {
  allocate,
  concatSlabs,
  cStrides,
  firstDifference,
  isNumericArray,
  sliceFrames,
} from "./slab.js";
export type { ArraySlab, NumericArray } from "./slab.js";
export {
  FileSystemStoreProvider,
  MemoryStoreProvider,
  ROOT_METADATA_KEY,
} from "./storage/stores.js";
export type { StoreProvider } from "./storage/stores.js";
export type {
  AttributeTarget,
  ContainerHandle,
  ContainerStorage,
  CreateDatasetOptions,
  DatasetRef,
  OpenMode,
  VirtualLayoutDescription,
  VirtualMapping,
  VirtualSource,
} from "./storage/types.js";
export {
  VIRTUAL_LAYOUT_ATTR,
  ZarrContainerStorage,
} from "./storage/zarr-storage.js";
export {
  DEFAULT_BLOCK_FRAMES,
  defaultSampleIndices,
  originalGroundTruth,
  targetGroundTruth,
  verify,
} from "./verify.js";
export type {
  GroundTruth,
  Mismatch,
  VerificationResult,
  VerifyOptions,
} from "./verify.js";
export {
  containerDirectory,
  describeTargetMismatch,
  LogicalArrayView,
} from "./view.js";
export type { LogicalArrayViewOptions } from "./view.js";
