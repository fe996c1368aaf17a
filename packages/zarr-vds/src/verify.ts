/**
 * @module verify
 *
 * Compare a logical view against a ground truth, frame by frame.
 */

import {
  describeError,
  IndexError,
  ValidationError,
} from "@framesplit/partition-plan";
import {
  type ArraySlab,
  concatSlabs,
  firstDifference,
  sliceFrames,
} from "./slab.js";
import type { ContainerStorage } from "./storage/types.js";
import type { LogicalArrayView } from "./view.js";

/** Source of the frames a view is expected to return. */
export interface GroundTruth {
  /** Shown in mismatch details. */
  readonly label: string;
  readRange(start: number, end: number): Promise<ArraySlab>;
}

export type Mismatch = {
  index: number;
  detail: string;
};

export type VerificationResult = {
  passed: boolean;
  /** Frames compared. */
  checked: number;
  mismatches: Mismatch[];
};

export type VerifyOptions = {
  /** Frame indices to compare, or `"full"` for every frame. */
  samples?: readonly number[] | "full";
  /** Frames read at once during a full scan. */
  blockFrames?: number;
};

/** First, middle and last frame, without duplicates. */
export function defaultSampleIndices(total: number): number[] {
  if (total <= 0) return [];
  return [...new Set([0, Math.floor(total / 2), total - 1])];
}

/** The unpartitioned container the plan was split from. */
export function originalGroundTruth(
  storage: ContainerStorage,
  path: string,
  datasetName: string,
): GroundTruth {
  return {
    label: path,
    async readRange(start, end) {
      const handle = await storage.open(path, "r");
      try {
        const dataset = await storage.openDataset(handle, datasetName);
        return await storage.readSlab(dataset, [start, end]);
      } finally {
        await storage.close(handle);
      }
    },
  };
}

/**
 * The partition targets read directly, bypassing the virtual dataset. A
 * missing target, or one whose dataset does not fit its partition, is a
 * read failure rather than fill.
 */
export function targetGroundTruth(view: LogicalArrayView): GroundTruth {
  const { plan } = view;
  const frameShape = plan.spec.shape.slice(1);

  return {
    label: "partition targets",
    async readRange(start, end) {
      const pieces: ArraySlab[] = [];
      for (const partition of plan.partitions) {
        const from = Math.max(start, partition.start);
        const to = Math.min(end, partition.end);
        if (from < to) {
          pieces.push(await view.readTarget(partition, from, to));
        }
      }
      return concatSlabs(plan.spec.dtype, frameShape, pieces);
    },
  };
}

export const DEFAULT_BLOCK_FRAMES = 64;

/**
 * Compare frames of `view` with `truth` for exact element equality. Content
 * mismatches and read failures are returned as data.
 *
 * @throws IndexError when a sample index is outside the leading axis
 */
export async function verify(
  view: LogicalArrayView,
  truth: GroundTruth,
  options: VerifyOptions = {},
): Promise<VerificationResult> {
  const total = view.length;
  const samples = options.samples ?? defaultSampleIndices(total);
  const mismatches: Mismatch[] = [];

  if (samples === "full") {
    const blockFrames = options.blockFrames ?? DEFAULT_BLOCK_FRAMES;
    if (!Number.isInteger(blockFrames) || blockFrames < 1) {
      throw new ValidationError(
        `Block size must be a positive integer, got ${blockFrames}`,
      );
    }
    for (let start = 0; start < total; start += blockFrames) {
      const end = Math.min(start + blockFrames, total);
      mismatches.push(...(await compareBlock(view, truth, start, end)));
    }
    return { passed: mismatches.length === 0, checked: total, mismatches };
  }

  const indices = [...new Set(samples)];
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= total) {
      throw new IndexError(
        `Sample ${index} is outside the leading axis of length ${total}`,
      );
    }
  }
  for (const index of indices) {
    mismatches.push(...(await compareBlock(view, truth, index, index + 1)));
  }
  return { passed: mismatches.length === 0, checked: indices.length, mismatches };
}

async function compareBlock(
  view: LogicalArrayView,
  truth: GroundTruth,
  start: number,
  end: number,
): Promise<Mismatch[]> {
  let actual: ArraySlab;
  let expected: ArraySlab;
  try {
    actual = await view.readRange(start, end);
  } catch (error) {
    return [readFailure(start, end, "view", error)];
  }
  try {
    expected = await truth.readRange(start, end);
  } catch (error) {
    return [readFailure(start, end, truth.label, error)];
  }

  const mismatches: Mismatch[] = [];
  for (let index = start; index < end; index++) {
    const a = sliceFrames(actual, index - start, index - start + 1).data;
    const b = sliceFrames(expected, index - start, index - start + 1).data;
    const at = firstDifference(a, b);
    if (at === -1) continue;
    mismatches.push({
      index,
      detail:
        a.length !== b.length
          ? `view returned ${a.length} elements, ${truth.label} ${b.length}`
          : `element ${at} differs: view ${a[at]}, ${truth.label} ${b[at]}`,
    });
  }
  return mismatches;
}

function readFailure(
  start: number,
  end: number,
  source: string,
  error: unknown,
): Mismatch {
  const frames = end - start === 1 ? `frame ${start}` : `frames [${start}, ${end})`;
  return {
    index: start,
    detail: `Reading ${frames} from ${source} failed: ${describeError(error)}`,
  };
}
