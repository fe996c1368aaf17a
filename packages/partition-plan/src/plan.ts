/**
 * @module plan
 *
 * Building and checking partition plans.
 */

import { divide } from "./divide.js";
import { isDType, isRepresentable, parseDType } from "./dtype.js";
import { ValidationError } from "./errors.js";
import type { NamingFn } from "./naming.js";
import type {
  GlobalArraySpec,
  Partition,
  PartitionPlan,
  TargetDescriptor,
} from "./types.js";

/** Loosely typed description of an array, as it arrives from callers. */
export type ArraySpecInput = {
  shape: readonly number[];
  /** Canonical name or array-protocol code. */
  dtype: string;
  /** Defaults to `"data"`. */
  datasetName?: string;
  /** Defaults to 0. */
  fillValue?: number;
};

/** Where each partition's data lives. */
export type TargetPolicy =
  | { kind: "shard" }
  | {
      kind: "view";
      /** Container every partition references, relative to the logical container. */
      sourcePath: string;
    };

export type BuildPlanOptions = {
  /** Defaults to physical shards named after each partition. */
  target?: TargetPolicy;
  /**
   * Accept zero-length partitions when there are more partitions than
   * frames. Defaults to true.
   */
  allowEmptyPartitions?: boolean;
  originalPath?: string | null;
};

export type PlanCheckOptions = {
  /** Defaults to true. */
  allowEmptyPartitions?: boolean;
};

export const DEFAULT_DATASET_NAME = "data";

/** Validate and normalize an array description. */
export function createArraySpec(input: ArraySpecInput): GlobalArraySpec {
  const spec: GlobalArraySpec = {
    shape: [...input.shape],
    dtype: parseDType(input.dtype),
    datasetName: input.datasetName ?? DEFAULT_DATASET_NAME,
    fillValue: input.fillValue ?? 0,
  };
  assertArraySpec(spec);
  return spec;
}

/** Throw a {@link ValidationError} unless `spec` describes a usable array. */
export function assertArraySpec(spec: GlobalArraySpec): void {
  if (spec.shape.length === 0) {
    throw new ValidationError("Shape must have at least one dimension");
  }
  for (const dim of spec.shape) {
    if (!Number.isSafeInteger(dim) || dim < 1) {
      throw new ValidationError(
        `Shape dimensions must be positive integers, got [${spec.shape.join(", ")}]`,
      );
    }
  }
  if (!isDType(spec.dtype)) {
    throw new ValidationError(`Unrecognized dtype "${String(spec.dtype)}"`);
  }
  if (spec.datasetName.length === 0) {
    throw new ValidationError("Dataset name must not be empty");
  }
  if (!Number.isFinite(spec.fillValue)) {
    throw new ValidationError(
      `Fill value must be a finite number, got ${spec.fillValue}`,
    );
  }
  if (!isRepresentable(spec.fillValue, spec.dtype)) {
    throw new ValidationError(
      `Fill value ${spec.fillValue} is not representable as ${spec.dtype}`,
    );
  }
}

/** Shape of a partition holding `frameCount` frames. */
export function partitionShape(
  spec: GlobalArraySpec,
  frameCount: number,
): number[] {
  return [frameCount, ...spec.shape.slice(1)];
}

/** Number of elements in one frame (one index of the leading axis). */
export function frameLength(shape: readonly number[]): number {
  return shape.slice(1).reduce((product, dim) => product * dim, 1);
}

/**
 * Partition `spec` along its leading axis into `n` contiguous ranges.
 *
 * @param naming - identifier for each partition index; must be unique
 */
export function buildPlan(
  spec: GlobalArraySpec,
  n: number,
  naming: NamingFn,
  options: BuildPlanOptions = {},
): PartitionPlan {
  const {
    target = { kind: "shard" },
    allowEmptyPartitions = true,
    originalPath = null,
  } = options;

  assertArraySpec(spec);
  const total = spec.shape[0] ?? 0;
  const sizes = divide(total, n);

  const emptyCount = sizes.filter((size) => size === 0).length;
  if (emptyCount > 0) {
    if (!allowEmptyPartitions) {
      throw new ValidationError(
        `Cannot split ${total} frames into ${n} partitions without empty partitions`,
      );
    }
    console.warn(
      `${n} partitions for ${total} frames: ${emptyCount} partition(s) will be empty`,
    );
  }

  if (target.kind === "view" && target.sourcePath.length === 0) {
    throw new ValidationError("Source view path must not be empty");
  }

  const seen = new Map<string, number>();
  const partitions: Partition[] = [];
  let offset = 0;

  for (const [index, frameCount] of sizes.entries()) {
    const name = naming(index);
    if (typeof name !== "string" || name.length === 0) {
      throw new ValidationError(
        `Naming function returned an empty identifier for partition ${index}`,
      );
    }
    const previous = seen.get(name);
    if (previous !== undefined) {
      throw new ValidationError(
        `Naming function produced "${name}" for both partition ${previous} and ${index}`,
      );
    }
    seen.set(name, index);

    const start = offset;
    const end = offset + frameCount;
    const descriptor: TargetDescriptor =
      target.kind === "shard"
        ? { kind: "shard", path: name, shape: partitionShape(spec, frameCount) }
        : {
            kind: "view",
            sourcePath: target.sourcePath,
            offsetRange: [start, end],
          };

    partitions.push({ index, name, start, end, frameCount, target: descriptor });
    offset = end;
  }

  return {
    spec,
    partitions,
    namingPattern: naming.pattern ?? null,
    originalPath,
  };
}

/**
 * List every way `plan` breaks the partition invariants.
 *
 * Checks ordering, contiguity, coverage, remainder distribution, unique
 * names and target consistency. An empty list means the plan is valid.
 */
export function checkPlanInvariants(
  plan: PartitionPlan,
  options: PlanCheckOptions = {},
): string[] {
  const { allowEmptyPartitions = true } = options;
  const { spec, partitions } = plan;
  const violations: string[] = [];
  const total = spec.shape[0] ?? 0;

  if (partitions.length === 0) {
    return ["Plan has no partitions"];
  }

  const expected = divide(total, partitions.length);
  const names = new Set<string>();
  let previousEnd = 0;

  for (const [position, partition] of partitions.entries()) {
    const { index, name, start, end, frameCount, target } = partition;
    const label = `Partition ${position}`;

    if (index !== position) {
      violations.push(`${label} has index ${index}`);
    }
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
      violations.push(`${label} has non-integer bounds [${start}, ${end})`);
      continue;
    }
    if (start !== previousEnd) {
      violations.push(
        position === 0
          ? `${label} starts at ${start}, expected 0`
          : `${label} starts at ${start} but partition ${position - 1} ends at ${previousEnd}`,
      );
    }
    if (frameCount !== end - start) {
      violations.push(
        `${label} has ${frameCount} frames but spans [${start}, ${end})`,
      );
    }
    if (end < start) {
      violations.push(`${label} ends before it starts`);
    }
    if (frameCount !== expected[position]) {
      violations.push(
        `${label} has ${frameCount} frames, expected ${expected[position]} for ${total} frames in ${partitions.length} partitions`,
      );
    }
    if (frameCount === 0 && !allowEmptyPartitions) {
      violations.push(`${label} is empty`);
    }
    if (name.length === 0) {
      violations.push(`${label} has an empty name`);
    } else if (names.has(name)) {
      violations.push(`${label} reuses the name "${name}"`);
    }
    names.add(name);

    violations.push(...checkTarget(label, spec, partition, target));
    previousEnd = end;
  }

  if (previousEnd !== total) {
    violations.push(
      `Partitions cover [0, ${previousEnd}) but the leading axis has ${total} frames`,
    );
  }

  return violations;
}

function checkTarget(
  label: string,
  spec: GlobalArraySpec,
  partition: Partition,
  target: TargetDescriptor,
): string[] {
  if (target.kind === "shard") {
    const violations: string[] = [];
    if (target.path.length === 0) {
      violations.push(`${label} has an empty shard path`);
    }
    const expectedShape = partitionShape(spec, partition.frameCount);
    if (!sameShape(target.shape, expectedShape)) {
      violations.push(
        `${label} shard shape [${target.shape.join(", ")}] should be [${expectedShape.join(", ")}]`,
      );
    }
    return violations;
  }

  const [offsetStart, offsetEnd] = target.offsetRange;
  const violations: string[] = [];
  if (target.sourcePath.length === 0) {
    violations.push(`${label} has an empty source path`);
  }
  if (!Number.isSafeInteger(offsetStart) || offsetStart < 0) {
    violations.push(`${label} source offset ${offsetStart} is invalid`);
  }
  if (offsetEnd - offsetStart !== partition.frameCount) {
    violations.push(
      `${label} source range [${offsetStart}, ${offsetEnd}) does not hold ${partition.frameCount} frames`,
    );
  }
  return violations;
}

export function sameShape(
  a: readonly number[],
  b: readonly number[],
): boolean {
  return a.length === b.length && a.every((dim, i) => dim === b[i]);
}

