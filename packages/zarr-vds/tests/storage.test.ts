import { IOError } from "@framesplit/partition-plan";
import { describe, expect, it } from "vitest";
import { MemoryStoreProvider, type StoreProvider } from "../src/storage/stores.js";
import {
  VIRTUAL_LAYOUT_ATTR,
  ZarrContainerStorage,
} from "../src/storage/zarr-storage.js";
import { memoryStorage } from "./helpers.js";

describe("ZarrContainerStorage", () => {
  it("writes and reads back frame ranges", async () => {
    const { storage } = memoryStorage();
    const handle = await storage.open("/mem/a.zarr", "w");
    const dataset = await storage.createDataset(handle, "data", [4, 3], "int16");
    await storage.writeSlab(dataset, 1, {
      data: new Int16Array([1, 2, 3, 4, 5, 6]),
      shape: [2, 3],
    });

    const slab = await storage.readSlab(dataset, [0, 3]);
    expect(slab.shape).toEqual([3, 3]);
    expect(slab.data).toEqual(new Int16Array([0, 0, 0, 1, 2, 3, 4, 5, 6]));
    expect(dataset.shape).toEqual([4, 3]);
    expect(dataset.dtype).toBe("int16");
    expect(dataset.virtual).toBe(false);
  });

  it("reads unwritten frames as the fill value", async () => {
    const { storage } = memoryStorage();
    const handle = await storage.open("/mem/a.zarr", "w");
    const dataset = await storage.createDataset(handle, "data", [2, 2], "float32", {
      fillValue: 1.5,
    });

    const slab = await storage.readSlab(dataset, [1, 2]);
    expect(slab.data).toEqual(new Float32Array([1.5, 1.5]));
  });

  it("reopens datasets from an existing container", async () => {
    const { storage } = memoryStorage();
    const writer = await storage.open("/mem/a.zarr", "w");
    const created = await storage.createDataset(writer, "frames", [3], "uint8");
    await storage.writeSlab(created, 0, { data: new Uint8Array([7, 8, 9]), shape: [3] });
    await storage.close(writer);

    const reader = await storage.open("/mem/a.zarr", "r");
    const dataset = await storage.openDataset(reader, "frames");
    const slab = await storage.readSlab(dataset, [1, 3]);
    expect(slab.data).toEqual(new Uint8Array([8, 9]));
  });

  it("requires an existing container in read mode", async () => {
    const { storage } = memoryStorage();
    await expect(storage.open("/mem/missing.zarr", "r")).rejects.toThrow(
      new IOError("Container not found: /mem/missing.zarr"),
    );
  });

  it("truncates in write mode and keeps contents in append mode", async () => {
    const { storage } = memoryStorage();
    const first = await storage.open("/mem/a.zarr", "w");
    await storage.createDataset(first, "data", [2], "int32");
    await storage.close(first);

    const appended = await storage.open("/mem/a.zarr", "a");
    await expect(storage.openDataset(appended, "data")).resolves.toMatchObject({
      name: "data",
    });

    const truncated = await storage.open("/mem/a.zarr", "w");
    await expect(storage.openDataset(truncated, "data")).rejects.toBeInstanceOf(IOError);
  });

  it("forbids writes through read-only and closed handles", async () => {
    const { storage } = memoryStorage();
    const writer = await storage.open("/mem/a.zarr", "w");
    const dataset = await storage.createDataset(writer, "data", [2], "int32");
    await storage.close(writer);

    const reader = await storage.open("/mem/a.zarr", "r");
    await expect(storage.createDataset(reader, "other", [2], "int32")).rejects.toThrow(
      new IOError("Container /mem/a.zarr is open read-only"),
    );
    await expect(
      storage.writeSlab(dataset, 0, { data: new Int32Array([1, 2]), shape: [2] }),
    ).rejects.toThrow(new IOError("Container /mem/a.zarr is closed"));
  });

  it("rejects slab ranges outside the dataset", async () => {
    const { storage } = memoryStorage();
    const handle = await storage.open("/mem/a.zarr", "w");
    const dataset = await storage.createDataset(handle, "data", [2], "int32");

    await expect(storage.readSlab(dataset, [1, 3])).rejects.toThrow(
      new IOError("Range [1, 3) is outside data with 2 frames"),
    );
    await expect(
      storage.writeSlab(dataset, 1, { data: new Int32Array([1, 2]), shape: [2] }),
    ).rejects.toThrow(new IOError("Range [1, 3) is outside data with 2 frames"));
  });

  it("merges attributes on containers and datasets", async () => {
    const { storage } = memoryStorage();
    const handle = await storage.open("/mem/a.zarr", "w");
    const dataset = await storage.createDataset(handle, "data", [2], "int32");

    await storage.setAttrs(handle, { vds_shape: [2], vds_dtype: "int32" });
    await storage.setAttr(handle, "vds_num_sources", 1);
    await storage.setAttr(dataset, "source_files", ["a"]);

    expect(await storage.getAttrs(handle)).toEqual({
      vds_shape: [2],
      vds_dtype: "int32",
      vds_num_sources: 1,
    });
    expect(await storage.getAttr(dataset, "source_files")).toEqual(["a"]);
    expect(await storage.getAttr(dataset, "vds_shape")).toBeUndefined();
  });

  it("stores virtual mapping entries without data", async () => {
    const { storage } = memoryStorage();
    const handle = await storage.open("/mem/vds.zarr", "w");
    const mappings = [
      { logical: [0, 2], source: { path: "a.zarr", dataset: "data", range: [0, 2] } },
      { logical: [2, 3], source: { path: "b.zarr", dataset: "data", range: [0, 1] } },
    ] as const;
    const dataset = await storage.createVirtualDataset(handle, "data", {
      shape: [3, 2],
      dtype: "float64",
      fillValue: 0,
      mappings,
    });

    expect(dataset.virtual).toBe(true);
    expect(await storage.getVirtualMappings(dataset)).toEqual(mappings);
    expect(Object.keys(await storage.getAttrs(dataset))).toEqual([VIRTUAL_LAYOUT_ATTR]);
    await expect(storage.readSlab(dataset, [0, 1])).rejects.toBeInstanceOf(IOError);
  });

  it("refuses mapping lookups on physical datasets", async () => {
    const { storage } = memoryStorage();
    const handle = await storage.open("/mem/a.zarr", "w");
    const dataset = await storage.createDataset(handle, "data", [2], "int32");

    await expect(storage.getVirtualMappings(dataset)).rejects.toThrow(
      new IOError("Dataset data in /mem/a.zarr is not virtual"),
    );
  });

  it("reports store failures as IOError with the cause", async () => {
    const failing: StoreProvider = {
      open: () => {
        throw new Error("disk unavailable");
      },
      exists: async () => false,
      remove: async () => {},
    };
    const storage = new ZarrContainerStorage(failing);

    const error = await storage.open("/mem/a.zarr", "w").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(IOError);
    expect(error).toMatchObject({
      message: "Cannot open container /mem/a.zarr: disk unavailable",
      cause: new Error("disk unavailable"),
    });
  });

  it("removes containers", async () => {
    const provider = new MemoryStoreProvider();
    const storage = new ZarrContainerStorage(provider);
    await storage.close(await storage.open("/mem/a.zarr", "w"));
    expect(await storage.exists("/mem/a.zarr")).toBe(true);
    expect(provider.paths()).toEqual(["/mem/a.zarr"]);

    await storage.remove("/mem/a.zarr");
    expect(await storage.exists("/mem/a.zarr")).toBe(false);
  });
});
