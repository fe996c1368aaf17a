/**
 * @module codec
 *
 * Flat attribute encoding of a {@link PartitionPlan}.
 *
 * Plans are stored as two attribute sets: one on the logical container's
 * root and one on its virtual dataset. Decoding re-checks every plan
 * invariant instead of trusting the stored values.
 */

import { divide } from "./divide.js";
import { type DType, isDType, parseDType } from "./dtype.js";
import { SchemaError, ValidationError } from "./errors.js";
import {
  assertArraySpec,
  checkPlanInvariants,
  DEFAULT_DATASET_NAME,
  partitionShape,
} from "./plan.js";
import type {
  GlobalArraySpec,
  Partition,
  PartitionPlan,
  TargetDescriptor,
  TargetKind,
} from "./types.js";

/** Primitive value storable as an attribute. */
export type AttributeValue =
  | string
  | number
  | boolean
  | readonly number[]
  | readonly string[];

export type AttributeMap = Record<string, AttributeValue>;

/** Encoded plan, split by the node the attributes belong to. */
export type EncodedPlan = {
  /** Attributes of the logical container root. */
  root: AttributeMap;
  /** Attributes of the logical (virtual) dataset. */
  dataset: AttributeMap;
};

/** Attribute sets as read back from storage, before validation. */
export type StoredAttributes = {
  root: Readonly<Record<string, unknown>>;
  dataset: Readonly<Record<string, unknown>>;
};

export type DecodeOptions = {
  /** Used when the metadata does not name the dataset. */
  datasetName?: string;
  /** Defaults to true. */
  allowEmptyPartitions?: boolean;
};

/** Root attribute keys. */
export const ROOT_ATTRS = {
  shape: "vds_shape",
  dtype: "vds_dtype",
  numSources: "vds_num_sources",
  sourcePattern: "vds_source_pattern",
  datasetName: "vds_dataset_name",
  fillValue: "vds_fill_value",
  originalFile: "vds_original_file",
} as const;

/** Dataset attribute keys shared by all partitions. */
export const DATASET_ATTRS = {
  sourceFiles: "source_files",
  framesPerFile: "frames_per_file",
} as const;

export type PartitionField =
  | "file"
  | "start"
  | "end"
  | "frames"
  | "kind"
  | "offset_start"
  | "offset_end";

const PARTITION_KEY = /^source_(\d+)_(file|start|end|frames|kind|offset_start|offset_end)$/;

/** Key of a per-partition attribute, e.g. `source_3_start`. */
export function partitionKey(index: number, field: PartitionField): string {
  return `source_${index}_${field}`;
}

/** Encode a plan as root and dataset attribute sets. */
export function encodePlan(plan: PartitionPlan): EncodedPlan {
  const { spec, partitions } = plan;
  const total = spec.shape[0] ?? 0;

  const root: AttributeMap = {
    [ROOT_ATTRS.shape]: [...spec.shape],
    [ROOT_ATTRS.dtype]: spec.dtype,
    [ROOT_ATTRS.numSources]: partitions.length,
  };
  if (plan.namingPattern !== null) {
    root[ROOT_ATTRS.sourcePattern] = plan.namingPattern;
  }
  root[ROOT_ATTRS.datasetName] = spec.datasetName;
  root[ROOT_ATTRS.fillValue] = spec.fillValue;
  if (plan.originalPath !== null) {
    root[ROOT_ATTRS.originalFile] = plan.originalPath;
  }

  const dataset: AttributeMap = {
    [DATASET_ATTRS.sourceFiles]: partitions.map((p) => p.name),
    [DATASET_ATTRS.framesPerFile]: Math.floor(total / partitions.length),
  };
  for (const partition of partitions) {
    const { index, start, end, frameCount, target } = partition;
    dataset[partitionKey(index, "file")] = targetPath(target);
    dataset[partitionKey(index, "start")] = start;
    dataset[partitionKey(index, "end")] = end;
    dataset[partitionKey(index, "frames")] = frameCount;
    dataset[partitionKey(index, "kind")] = target.kind;
    if (target.kind === "view") {
      dataset[partitionKey(index, "offset_start")] = target.offsetRange[0];
      dataset[partitionKey(index, "offset_end")] = target.offsetRange[1];
    }
  }

  return { root, dataset };
}

/** Container path a target reads from. */
export function targetPath(target: TargetDescriptor): string {
  return target.kind === "shard" ? target.path : target.sourcePath;
}

/**
 * Rebuild a plan from stored attributes.
 *
 * @throws SchemaError when keys are missing, mistyped, or describe a plan
 * that breaks contiguity, coverage or remainder distribution
 */
export function decodePlan(
  attributes: StoredAttributes,
  options: DecodeOptions = {},
): PartitionPlan {
  const { root, dataset } = attributes;

  const shape = readIntArray(root, ROOT_ATTRS.shape, "root");
  const dtype = readDType(root);
  const numSources = readInt(root, ROOT_ATTRS.numSources, "root");
  if (numSources < 1) {
    throw new SchemaError(
      `${ROOT_ATTRS.numSources} must be at least 1, got ${numSources}`,
    );
  }

  const spec: GlobalArraySpec = {
    shape,
    dtype,
    datasetName:
      readOptionalString(root, ROOT_ATTRS.datasetName, "root") ??
      options.datasetName ??
      DEFAULT_DATASET_NAME,
    fillValue: readOptionalNumber(root, ROOT_ATTRS.fillValue, "root") ?? 0,
  };
  try {
    assertArraySpec(spec);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new SchemaError(`Stored array description is invalid: ${error.message}`);
    }
    throw error;
  }

  const sourceFiles = readStringArray(dataset, DATASET_ATTRS.sourceFiles, "dataset");
  if (sourceFiles.length !== numSources) {
    throw new SchemaError(
      `${DATASET_ATTRS.sourceFiles} lists ${sourceFiles.length} identifiers but ${ROOT_ATTRS.numSources} is ${numSources}`,
    );
  }

  const total = spec.shape[0] ?? 0;
  const framesPerFile = readOptionalNumber(dataset, DATASET_ATTRS.framesPerFile, "dataset");
  if (framesPerFile !== null && framesPerFile !== Math.floor(total / numSources)) {
    throw new SchemaError(
      `${DATASET_ATTRS.framesPerFile} is ${framesPerFile}, expected ${Math.floor(total / numSources)}`,
    );
  }

  const partitions = hasPartitionAttributes(dataset, numSources)
    ? readPartitions(dataset, spec, sourceFiles)
    : derivePartitions(spec, sourceFiles);

  const plan: PartitionPlan = {
    spec,
    partitions,
    namingPattern: readOptionalString(root, ROOT_ATTRS.sourcePattern, "root"),
    originalPath: readOptionalString(root, ROOT_ATTRS.originalFile, "root"),
  };

  const violations = checkPlanInvariants(plan, {
    allowEmptyPartitions: options.allowEmptyPartitions,
  });
  if (violations.length > 0) {
    throw new SchemaError(`Invalid partition metadata: ${violations.join("; ")}`);
  }
  return plan;
}

/**
 * Whether per-partition keys are stored. They are optional as a set; keys
 * for partitions past `numSources` are rejected.
 */
function hasPartitionAttributes(
  dataset: Readonly<Record<string, unknown>>,
  numSources: number,
): boolean {
  let found = false;
  for (const key of Object.keys(dataset)) {
    const match = PARTITION_KEY.exec(key);
    if (match === null) continue;
    found = true;
    const index = Number(match[1]);
    if (index >= numSources) {
      throw new SchemaError(
        `Attribute ${key} refers to partition ${index} but there are ${numSources} partitions`,
      );
    }
  }
  return found;
}

function readPartitions(
  dataset: Readonly<Record<string, unknown>>,
  spec: GlobalArraySpec,
  sourceFiles: readonly string[],
): Partition[] {
  return sourceFiles.map((name, index) => {
    const start = readInt(dataset, partitionKey(index, "start"), "dataset");
    const end = readInt(dataset, partitionKey(index, "end"), "dataset");
    const frameCount = readInt(dataset, partitionKey(index, "frames"), "dataset");
    const file = readString(dataset, partitionKey(index, "file"), "dataset");
    const kind = readKind(dataset, index);

    const target: TargetDescriptor =
      kind === "shard"
        ? { kind, path: file, shape: partitionShape(spec, Math.max(frameCount, 0)) }
        : {
            kind,
            sourcePath: file,
            offsetRange: [
              readInt(dataset, partitionKey(index, "offset_start"), "dataset"),
              readInt(dataset, partitionKey(index, "offset_end"), "dataset"),
            ],
          };

    return { index, name, start, end, frameCount, target };
  });
}

/** Ranges re-derived from the shape when only identifiers were stored. */
function derivePartitions(
  spec: GlobalArraySpec,
  sourceFiles: readonly string[],
): Partition[] {
  const sizes = divide(spec.shape[0] ?? 0, sourceFiles.length);
  let offset = 0;
  return sourceFiles.map((name, index) => {
    const frameCount = sizes[index] ?? 0;
    const start = offset;
    offset += frameCount;
    return {
      index,
      name,
      start,
      end: offset,
      frameCount,
      target: { kind: "shard", path: name, shape: partitionShape(spec, frameCount) },
    };
  });
}

function readKind(
  dataset: Readonly<Record<string, unknown>>,
  index: number,
): TargetKind {
  const key = partitionKey(index, "kind");
  if (!Object.hasOwn(dataset, key)) {
    return "shard";
  }
  const value = dataset[key];
  if (value === "shard" || value === "view") {
    return value;
  }
  throw new SchemaError(
    `dataset attribute ${key} must be "shard" or "view", got ${JSON.stringify(value)}`,
  );
}

function readDType(root: Readonly<Record<string, unknown>>): DType {
  const token = readString(root, ROOT_ATTRS.dtype, "root");
  if (isDType(token)) {
    return token;
  }
  try {
    return parseDType(token);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new SchemaError(`${ROOT_ATTRS.dtype}: ${error.message}`);
    }
    throw error;
  }
}

function missing(scope: string, key: string): SchemaError {
  return new SchemaError(`Missing ${scope} attribute ${key}`);
}

function mistyped(scope: string, key: string, expected: string, value: unknown): SchemaError {
  return new SchemaError(
    `${scope} attribute ${key} must be ${expected}, got ${JSON.stringify(value)}`,
  );
}

function readInt(
  attrs: Readonly<Record<string, unknown>>,
  key: string,
  scope: string,
): number {
  if (!Object.hasOwn(attrs, key)) throw missing(scope, key);
  const value = attrs[key];
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw mistyped(scope, key, "an integer", value);
  }
  return value;
}

function readString(
  attrs: Readonly<Record<string, unknown>>,
  key: string,
  scope: string,
): string {
  if (!Object.hasOwn(attrs, key)) throw missing(scope, key);
  const value = attrs[key];
  if (typeof value !== "string") {
    throw mistyped(scope, key, "a string", value);
  }
  return value;
}

function readOptionalString(
  attrs: Readonly<Record<string, unknown>>,
  key: string,
  scope: string,
): string | null {
  return Object.hasOwn(attrs, key) ? readString(attrs, key, scope) : null;
}

function readOptionalNumber(
  attrs: Readonly<Record<string, unknown>>,
  key: string,
  scope: string,
): number | null {
  if (!Object.hasOwn(attrs, key)) return null;
  const value = attrs[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw mistyped(scope, key, "a finite number", value);
  }
  return value;
}

function readIntArray(
  attrs: Readonly<Record<string, unknown>>,
  key: string,
  scope: string,
): number[] {
  if (!Object.hasOwn(attrs, key)) throw missing(scope, key);
  const value: unknown = attrs[key];
  if (!Array.isArray(value)) {
    throw mistyped(scope, key, "an array of integers", value);
  }
  const result: number[] = [];
  for (const item of value) {
    if (typeof item !== "number" || !Number.isSafeInteger(item)) {
      throw mistyped(scope, key, "an array of integers", value);
    }
    result.push(item);
  }
  return result;
}

function readStringArray(
  attrs: Readonly<Record<string, unknown>>,
  key: string,
  scope: string,
): string[] {
  if (!Object.hasOwn(attrs, key)) throw missing(scope, key);
  const value: unknown = attrs[key];
  if (!Array.isArray(value)) {
    throw mistyped(scope, key, "an array of strings", value);
  }
  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") {
      throw mistyped(scope, key, "an array of strings", value);
    }
    result.push(item);
  }
  return result;
}
