import {
  frameLength,
  type GlobalArraySpec,
} from "@framesplit/partition-plan";
import { allocate, type NumericArray } from "../src/slab.js";
import { MemoryStoreProvider } from "../src/storage/stores.js";
import { ZarrContainerStorage } from "../src/storage/zarr-storage.js";

export function memoryStorage(): {
  provider: MemoryStoreProvider;
  storage: ZarrContainerStorage;
} {
  const provider = new MemoryStoreProvider();
  return { provider, storage: new ZarrContainerStorage(provider) };
}

/**
 * Write an unpartitioned container whose element at flat offset `i` is
 * `value(i)`, and return the written elements.
 */
export async function writeOriginal(
  storage: ZarrContainerStorage,
  path: string,
  spec: GlobalArraySpec,
  value: (offset: number) => number = (offset) => offset,
): Promise<NumericArray> {
  const frames = spec.shape[0] ?? 0;
  const data = allocate(spec.dtype, frames * frameLength(spec.shape));
  for (let i = 0; i < data.length; i++) {
    data[i] = value(i);
  }

  const handle = await storage.open(path, "w");
  try {
    const dataset = await storage.createDataset(
      handle,
      spec.datasetName,
      spec.shape,
      spec.dtype,
      { fillValue: spec.fillValue },
    );
    await storage.writeSlab(dataset, 0, { data, shape: [...spec.shape] });
  } finally {
    await storage.close(handle);
  }
  return data;
}

/** Every frame of dataset `name` in the container at `path`. */
export async function readAll(
  storage: ZarrContainerStorage,
  path: string,
  name = "data",
): Promise<NumericArray> {
  const handle = await storage.open(path, "r");
  try {
    const dataset = await storage.openDataset(handle, name);
    const slab = await storage.readSlab(dataset, [0, dataset.shape[0] ?? 0]);
    return slab.data;
  } finally {
    await storage.close(handle);
  }
}
