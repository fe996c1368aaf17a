import {
  buildPlan,
  createArraySpec,
  patternNaming,
  ValidationError,
} from "@framesplit/partition-plan";
import { describe, expect, it, vi } from "vitest";
import { buildView } from "../src/layout.js";
import { materialize } from "../src/materialize.js";
import type { PartitionOutcome, ProgressObserver } from "../src/progress.js";
import { MemoryStoreProvider, type StoreProvider } from "../src/storage/stores.js";
import { ZarrContainerStorage } from "../src/storage/zarr-storage.js";
import { targetGroundTruth, verify } from "../src/verify.js";
import { memoryStorage, readAll, writeOriginal } from "./helpers.js";

const naming = patternNaming("run_{:03d}.zarr");
const spec = createArraySpec({ shape: [6, 2], dtype: "float32" });
const plan = buildPlan(spec, 3, naming);

function outcomes(report: { partitions: { outcome: PartitionOutcome }[] }) {
  return report.partitions.map((entry) => entry.outcome);
}

describe("materialize", () => {
  it("creates zero-filled shards that verify against the view", async () => {
    const { storage } = memoryStorage();
    const report = await materialize(plan, { kind: "zero-fill" }, { storage, baseDir: "/mem" });

    expect(report).toMatchObject({ created: 3, skipped: 0, failed: 0 });
    expect(report.partitions.map((entry) => entry.path)).toEqual([
      "/mem/run_000.zarr",
      "/mem/run_001.zarr",
      "/mem/run_002.zarr",
    ]);
    expect(await readAll(storage, "/mem/run_001.zarr")).toEqual(new Float32Array(4));

    const view = await buildView(plan, { storage, containerPath: "/mem/run.zarr" });
    const result = await verify(view, targetGroundTruth(view), { samples: "full" });
    expect(result).toEqual({ passed: true, checked: 6, mismatches: [] });
  });

  it("sizes each shard to its partition", async () => {
    const { storage } = memoryStorage();
    const uneven = buildPlan(createArraySpec({ shape: [5, 3], dtype: "uint8" }), 2, naming);
    await materialize(uneven, { kind: "zero-fill" }, { storage, baseDir: "/mem" });

    const handle = await storage.open("/mem/run_001.zarr", "r");
    const dataset = await storage.openDataset(handle, "data");
    expect(dataset.shape).toEqual([2, 3]);
    expect(dataset.dtype).toBe("uint8");
  });

  it("generates reproducible random contents per seed and partition", async () => {
    const { storage } = memoryStorage();
    await materialize(plan, { kind: "synthetic-random", seed: 42 }, { storage, baseDir: "/a" });
    await materialize(plan, { kind: "synthetic-random", seed: 42 }, { storage, baseDir: "/b" });
    await materialize(plan, { kind: "synthetic-random", seed: 43 }, { storage, baseDir: "/c" });

    const first = await readAll(storage, "/a/run_000.zarr");
    expect(await readAll(storage, "/b/run_000.zarr")).toEqual(first);
    expect(await readAll(storage, "/c/run_000.zarr")).not.toEqual(first);
    expect(await readAll(storage, "/a/run_001.zarr")).not.toEqual(first);
    expect(Array.from(first).some((value) => value !== 0)).toBe(true);
  });

  it("copies the partition's range of the original", async () => {
    const { storage } = memoryStorage();
    await writeOriginal(storage, "/mem/original.zarr", spec, (i) => i * 10);

    const report = await materialize(
      plan,
      { kind: "copy-from", originalPath: "/mem/original.zarr" },
      { storage, baseDir: "/mem", batchFrames: 1 },
    );

    expect(report.created).toBe(3);
    expect(await readAll(storage, "/mem/run_002.zarr")).toEqual(
      new Float32Array([80, 90, 100, 110]),
    );
  });

  it("fails partitions whose original has a different shape", async () => {
    const { storage } = memoryStorage();
    await writeOriginal(
      storage,
      "/mem/original.zarr",
      createArraySpec({ shape: [6, 3], dtype: "float32" }),
    );

    const report = await materialize(
      plan,
      { kind: "copy-from", originalPath: "/mem/original.zarr" },
      { storage, baseDir: "/mem" },
    );

    expect(report.failed).toBe(3);
    expect(outcomes(report)[0]).toEqual({
      status: "failed",
      reason: "Original /mem/original.zarr is float32 [6, 3], expected float32 [6, 2]",
    });
    expect(await storage.exists("/mem/run_000.zarr")).toBe(false);
  });

  it("skips existing targets by default", async () => {
    const { storage } = memoryStorage();
    await materialize(plan, { kind: "zero-fill" }, { storage, baseDir: "/mem" });
    const report = await materialize(plan, { kind: "zero-fill" }, { storage, baseDir: "/mem" });

    expect(report).toMatchObject({ created: 0, skipped: 3, failed: 0 });
    expect(outcomes(report)[2]).toEqual({ status: "skipped", reason: "target exists" });
  });

  it("fails existing targets that do not fit their partition", async () => {
    const { storage } = memoryStorage();
    const frames = buildPlan(createArraySpec({ shape: [10, 2], dtype: "int32" }), 2, naming);
    await writeOriginal(
      storage,
      "/mem/run_000.zarr",
      createArraySpec({ shape: [8, 3], dtype: "int32" }),
    );

    const report = await materialize(frames, { kind: "zero-fill" }, { storage, baseDir: "/mem" });

    expect(outcomes(report)).toEqual([
      {
        status: "failed",
        reason: "Target /mem/run_000.zarr exists with int32 [8, 3], expected int32 [5, 2]",
      },
      { status: "created" },
    ]);
    expect(await readAll(storage, "/mem/run_000.zarr")).toHaveLength(24);
  });

  it("fails existing targets under the fail policy", async () => {
    const { storage } = memoryStorage();
    await materialize(plan, { kind: "zero-fill" }, { storage, baseDir: "/mem" });
    const report = await materialize(
      plan,
      { kind: "zero-fill" },
      { storage, baseDir: "/mem", existing: "fail" },
    );

    expect(report.failed).toBe(3);
    expect(outcomes(report)[0]).toEqual({
      status: "failed",
      reason: "Target /mem/run_000.zarr already exists",
    });
    expect(await storage.exists("/mem/run_000.zarr")).toBe(true);
  });

  it("replaces existing targets under the overwrite policy", async () => {
    const { storage } = memoryStorage();
    await materialize(plan, { kind: "synthetic-random", seed: 1 }, { storage, baseDir: "/mem" });
    const report = await materialize(
      plan,
      { kind: "zero-fill" },
      { storage, baseDir: "/mem", existing: "overwrite" },
    );

    expect(report.created).toBe(3);
    expect(await readAll(storage, "/mem/run_000.zarr")).toEqual(new Float32Array(4));
  });

  it("records a failing partition and continues with the rest", async () => {
    const memory = new MemoryStoreProvider();
    const provider: StoreProvider = {
      open: (path) => {
        if (path.endsWith("run_001.zarr")) throw new Error("quota exceeded");
        return memory.open(path);
      },
      exists: (path) => memory.exists(path),
      remove: (path) => memory.remove(path),
    };
    const storage = new ZarrContainerStorage(provider);

    const report = await materialize(plan, { kind: "zero-fill" }, { storage, baseDir: "/mem" });

    expect(report).toMatchObject({ created: 2, skipped: 0, failed: 1 });
    expect(outcomes(report)).toEqual([
      { status: "created" },
      {
        status: "failed",
        reason: "Cannot open container /mem/run_001.zarr: quota exceeded",
      },
      { status: "created" },
    ]);
  });

  it("skips source views", async () => {
    const { storage } = memoryStorage();
    const views = buildPlan(spec, 2, naming, {
      target: { kind: "view", sourcePath: "original.zarr" },
    });
    const report = await materialize(views, { kind: "zero-fill" }, { storage, baseDir: "/mem" });

    expect(report.skipped).toBe(2);
    expect(report.partitions[0]).toMatchObject({
      path: null,
      outcome: { status: "skipped", reason: "source view, nothing to materialize" },
    });
  });

  it("stops at the next partition once aborted", async () => {
    const { storage } = memoryStorage();
    const controller = new AbortController();
    const observer: ProgressObserver = {
      partitionFinished: () => controller.abort(),
    };

    const report = await materialize(
      plan,
      { kind: "zero-fill" },
      { storage, baseDir: "/mem", observer, signal: controller.signal },
    );

    expect(outcomes(report)).toEqual([
      { status: "created" },
      { status: "skipped", reason: "cancelled" },
      { status: "skipped", reason: "cancelled" },
    ]);
    expect(await storage.exists("/mem/run_001.zarr")).toBe(false);
  });

  it("reports progress per partition", async () => {
    const { storage } = memoryStorage();
    const partitionStarted = vi.fn();
    const partitionFinished = vi.fn();

    await materialize(
      plan,
      { kind: "zero-fill" },
      { storage, baseDir: "/mem", observer: { partitionStarted, partitionFinished } },
    );

    expect(partitionStarted).toHaveBeenCalledTimes(3);
    expect(partitionFinished).toHaveBeenLastCalledWith(
      plan.partitions[2],
      { status: "created" },
      3,
    );
  });

  it("rejects a non-positive batch size before any I/O", async () => {
    const { provider, storage } = memoryStorage();
    await expect(
      materialize(plan, { kind: "zero-fill" }, { storage, baseDir: "/mem", batchFrames: 0 }),
    ).rejects.toThrow(new ValidationError("Batch size must be a positive integer, got 0"));
    expect(provider.paths()).toEqual([]);
  });
});
