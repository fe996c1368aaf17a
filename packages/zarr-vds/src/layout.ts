/**
 * @module layout
 *
 * Turn a partition plan into a virtual dataset inside a logical container,
 * and open such containers again.
 */

import {
  DEFAULT_DATASET_NAME,
  decodePlan,
  encodePlan,
  type FrameRange,
  type Partition,
  type PartitionPlan,
  type TargetDescriptor,
  ROOT_ATTRS,
  SchemaError,
  targetPath,
  ValidationError,
} from "@framesplit/partition-plan";
import type { ProgressObserver } from "./progress.js";
import type { ContainerStorage, VirtualMapping, VirtualSource } from "./storage/types.js";
import { containerDirectory, LogicalArrayView } from "./view.js";

/** Mapping entries accumulated for one virtual dataset. */
export class VirtualLayout {
  private readonly entries: VirtualMapping[] = [];

  /** Logical range `logical` reads from `source`. */
  map(logical: FrameRange, source: VirtualSource): this {
    const logicalLength = logical[1] - logical[0];
    const sourceLength = source.range[1] - source.range[0];
    if (logicalLength !== sourceLength) {
      throw new ValidationError(
        `Logical range [${logical[0]}, ${logical[1]}) and source range [${source.range[0]}, ${source.range[1]}) differ in length`,
      );
    }
    this.entries.push({ logical, source });
    return this;
  }

  get mappings(): readonly VirtualMapping[] {
    return this.entries;
  }
}

export type BuildViewOptions = {
  storage: ContainerStorage;
  /** Logical container to create; replaced if it exists. */
  containerPath: string;
  observer?: ProgressObserver;
};

/** Range of the target's leading axis that holds a partition's frames. */
export function targetRange(partition: Partition): FrameRange {
  return sourceRangeOf(partition.target, partition.frameCount);
}

function sourceRangeOf(target: TargetDescriptor, frameCount: number): FrameRange {
  return target.kind === "shard" ? [0, frameCount] : target.offsetRange;
}

/** Mapping entries for every non-empty partition of `plan`. */
export function layoutFor(
  plan: PartitionPlan,
  observer?: ProgressObserver,
): VirtualLayout {
  const layout = new VirtualLayout();
  const total = plan.partitions.length;
  for (const partition of plan.partitions) {
    if (partition.frameCount === 0) continue;
    layout.map([partition.start, partition.end], {
      path: targetPath(partition.target),
      dataset: plan.spec.datasetName,
      range: targetRange(partition),
    });
    observer?.partitionMapped?.(partition, total);
  }
  return layout;
}

/**
 * Create the logical container for `plan`: a virtual dataset mapping every
 * non-empty partition, with the encoded plan stored on the container root
 * and on the dataset.
 */
export async function buildView(
  plan: PartitionPlan,
  options: BuildViewOptions,
): Promise<LogicalArrayView> {
  const { storage, containerPath, observer } = options;
  const layout = layoutFor(plan, observer);
  const encoded = encodePlan(plan);

  const handle = await storage.open(containerPath, "w");
  try {
    const dataset = await storage.createVirtualDataset(handle, plan.spec.datasetName, {
      shape: plan.spec.shape,
      dtype: plan.spec.dtype,
      fillValue: plan.spec.fillValue,
      mappings: layout.mappings,
    });
    await storage.setAttrs(handle, encoded.root);
    await storage.setAttrs(dataset, encoded.dataset);
  } finally {
    await storage.close(handle);
  }

  return new LogicalArrayView(plan, {
    storage,
    baseDir: containerDirectory(containerPath),
  });
}

/**
 * Open the logical container at `containerPath`. The stored plan is
 * authoritative; the virtual dataset's mapping entries must agree with it.
 *
 * @throws IOError when the container or dataset cannot be read
 * @throws SchemaError when the stored plan is invalid or disagrees with the
 * mapping entries
 */
export async function openView(
  storage: ContainerStorage,
  containerPath: string,
  datasetName?: string,
): Promise<LogicalArrayView> {
  const handle = await storage.open(containerPath, "r");
  try {
    const root = await storage.getAttrs(handle);
    const storedName = root[ROOT_ATTRS.datasetName];
    const name =
      datasetName ?? (typeof storedName === "string" ? storedName : DEFAULT_DATASET_NAME);
    const dataset = await storage.openDataset(handle, name);
    if (!dataset.virtual) {
      throw new SchemaError(`Dataset ${name} in ${containerPath} is not a virtual dataset`);
    }
    const plan = decodePlan(
      { root, dataset: await storage.getAttrs(dataset) },
      { datasetName: name },
    );
    const stored = await storage.getVirtualMappings(dataset);
    const mismatch = compareMappings(layoutFor(plan).mappings, stored);
    if (mismatch !== null) {
      throw new SchemaError(
        `Mapping entries of ${containerPath} disagree with its plan: ${mismatch}`,
      );
    }
    return new LogicalArrayView(plan, {
      storage,
      baseDir: containerDirectory(containerPath),
    });
  } finally {
    await storage.close(handle);
  }
}

function compareMappings(
  expected: readonly VirtualMapping[],
  stored: readonly VirtualMapping[],
): string | null {
  if (expected.length !== stored.length) {
    return `expected ${expected.length} entries, found ${stored.length}`;
  }
  for (const [i, want] of expected.entries()) {
    const have = stored[i];
    if (have === undefined || describeMapping(want) !== describeMapping(have)) {
      return `entry ${i} is ${have === undefined ? "missing" : describeMapping(have)}, expected ${describeMapping(want)}`;
    }
  }
  return null;
}

function describeMapping({ logical, source }: VirtualMapping): string {
  return `[${logical[0]}, ${logical[1]}) -> ${source.path}:${source.dataset}[${source.range[0]}, ${source.range[1]})`;
}
