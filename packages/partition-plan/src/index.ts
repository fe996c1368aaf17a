/**
 * @framesplit/partition-plan
 *
 * Splits an array's leading axis into contiguous partitions and encodes the
 * resulting plan as flat attributes.
 *
 * @example
 * ```typescript
 * import {
 *   buildPlan,
 *   createArraySpec,
 *   encodePlan,
 *   patternNaming,
 * } from "@framesplit/partition-plan";
 *
 * const spec = createArraySpec({ shape: [1003, 512, 512], dtype: "float32" });
 * const plan = buildPlan(spec, 8, patternNaming("run_{:03d}.zarr"));
 * plan.partitions.map((p) => p.frameCount);
 * // [126, 126, 126, 125, 125, 125, 125, 125]
 * const { root, dataset } = encodePlan(plan);
 * ```
 *
 * @packageDocumentation
 */

export {
  DATASET_ATTRS,
  decodePlan,
  encodePlan,
  partitionKey,
  ROOT_ATTRS,
  targetPath,
} from "./codec.js";
export type {
  AttributeMap,
  AttributeValue,
  DecodeOptions,
  EncodedPlan,
  PartitionField,
  StoredAttributes,
} from "./codec.js";
export { divide } from "./divide.js";
export {
  DTYPES,
  isDType,
  isIntegerDType,
  isRepresentable,
  itemSize,
  parseDType,
  valueRange,
} from "./dtype.js";
export type { DType } from "./dtype.js";
export {
  describeError,
  IndexError,
  IOError,
  SchemaError,
  ValidationError,
} from "./errors.js";
export {
  CONTAINER_EXTENSION,
  defaultNamingPattern,
  formatPartitionName,
  hasPlaceholder,
  patternNaming,
} from "./naming.js";
export type { NamingFn } from "./naming.js";
export {
  assertArraySpec,
  buildPlan,
  checkPlanInvariants,
  createArraySpec,
  DEFAULT_DATASET_NAME,
  frameLength,
  partitionShape,
  sameShape,
} from "./plan.js";
export type {
  ArraySpecInput,
  BuildPlanOptions,
  PlanCheckOptions,
  TargetPolicy,
} from "./plan.js";
export type {
  FrameRange,
  GlobalArraySpec,
  Partition,
  PartitionPlan,
  PhysicalShard,
  SourceView,
  TargetDescriptor,
  TargetKind,
} from "./types.js";
