/**
 * @module storage/zarr-storage
 *
 * {@link ContainerStorage} over Zarr v3 hierarchies, using zarrita.
 *
 * A container is a Zarr group. Physical datasets are arrays chunked one
 * frame per chunk. Zarr has no virtual datasets, so a virtual dataset is an
 * array node that never receives chunks and lists its mapping entries under
 * the `vds_layout` attribute; reading it directly yields its fill value.
 */

import {
  type DType,
  describeError,
  type FrameRange,
  IOError,
  isDType,
} from "@framesplit/partition-plan";
import type { AbsolutePath, Mutable } from "@zarrita/storage";
import * as zarr from "zarrita";
import { type ArraySlab, cStrides, isNumericArray } from "../slab.js";
import { ROOT_METADATA_KEY, type StoreProvider } from "./stores.js";
import type {
  AttributeTarget,
  ContainerHandle,
  ContainerStorage,
  CreateDatasetOptions,
  DatasetRef,
  OpenMode,
  VirtualLayoutDescription,
  VirtualMapping,
} from "./types.js";

/** Attribute holding a virtual dataset's mapping entries. */
export const VIRTUAL_LAYOUT_ATTR = "vds_layout";

const textDecoder = new TextDecoder();
const textEncoder = new TextEncoder();

class ZarrContainerHandle implements ContainerHandle {
  closed = false;

  constructor(
    readonly path: string,
    readonly mode: OpenMode,
    readonly root: zarr.Location<Mutable>,
  ) {}
}

class ZarrDatasetRef implements DatasetRef {
  constructor(
    readonly container: ZarrContainerHandle,
    readonly name: string,
    readonly array: zarr.Array<zarr.DataType, Mutable>,
    readonly dtype: DType,
    readonly virtual: boolean,
  ) {}

  get shape(): readonly number[] {
    return this.array.shape;
  }
}

/** Zarr v3 containers resolved through a {@link StoreProvider}. */
export class ZarrContainerStorage implements ContainerStorage {
  constructor(private readonly stores: StoreProvider) {}

  async open(path: string, mode: OpenMode): Promise<ContainerHandle> {
    return guard(`Cannot open container ${path}`, async () => {
      const exists = await this.stores.exists(path);
      if (mode === "r" && !exists) {
        throw new IOError(`Container not found: ${path}`);
      }
      if (mode === "w" && exists) {
        await this.stores.remove(path);
      }

      const root = zarr.root(this.stores.open(path));
      if (mode === "w" || !exists) {
        await zarr.create(root, { attributes: {} });
      }
      return new ZarrContainerHandle(path, mode, root);
    });
  }

  async close(handle: ContainerHandle): Promise<void> {
    own(handle).closed = true;
  }

  exists(path: string): Promise<boolean> {
    return guard(`Cannot check container ${path}`, () =>
      this.stores.exists(path),
    );
  }

  remove(path: string): Promise<void> {
    return guard(`Cannot remove container ${path}`, () =>
      this.stores.remove(path),
    );
  }

  async createDataset(
    handle: ContainerHandle,
    name: string,
    shape: readonly number[],
    dtype: DType,
    options: CreateDatasetOptions = {},
  ): Promise<DatasetRef> {
    const container = writable(handle);
    return guard(`Cannot create dataset ${name} in ${handle.path}`, async () => {
      const location = container.root.resolve(name);
      await zarr.create(location, {
        shape: [...shape],
        chunk_shape: frameChunkShape(shape),
        data_type: dtype,
        fill_value: options.fillValue ?? 0,
      });
      return this.openDataset(container, name);
    });
  }

  async createVirtualDataset(
    handle: ContainerHandle,
    name: string,
    layout: VirtualLayoutDescription,
  ): Promise<DatasetRef> {
    const container = writable(handle);
    return guard(
      `Cannot create virtual dataset ${name} in ${handle.path}`,
      async () => {
        const location = container.root.resolve(name);
        await zarr.create(location, {
          shape: [...layout.shape],
          chunk_shape: frameChunkShape(layout.shape),
          data_type: layout.dtype,
          fill_value: layout.fillValue,
          attributes: {
            [VIRTUAL_LAYOUT_ATTR]: layout.mappings.map(encodeMapping),
          },
        });
        return this.openDataset(container, name);
      },
    );
  }

  async openDataset(handle: ContainerHandle, name: string): Promise<DatasetRef> {
    const container = readable(handle);
    return guard(`Cannot open dataset ${name} in ${handle.path}`, async () => {
      const array = await zarr.open(container.root.resolve(name), {
        kind: "array",
      });
      if (!isDType(array.dtype)) {
        throw new IOError(
          `Dataset ${name} in ${handle.path} has unsupported dtype ${array.dtype}`,
        );
      }
      const attrs = await readNodeAttributes(array);
      const isVirtual = Object.hasOwn(attrs, VIRTUAL_LAYOUT_ATTR);
      return new ZarrDatasetRef(container, name, array, array.dtype, isVirtual);
    });
  }

  async getVirtualMappings(ref: DatasetRef): Promise<VirtualMapping[]> {
    const dataset = ownDataset(ref);
    if (!dataset.virtual) {
      throw new IOError(`Dataset ${ref.name} in ${ref.container.path} is not virtual`);
    }
    const attrs = await guard(`Cannot read layout of ${ref.name}`, () =>
      readNodeAttributes(dataset.array),
    );
    const entries = attrs[VIRTUAL_LAYOUT_ATTR];
    if (!Array.isArray(entries)) {
      throw new IOError(`Malformed ${VIRTUAL_LAYOUT_ATTR} on ${ref.name}`);
    }
    return entries.map((entry: unknown) => decodeMapping(entry, ref.name));
  }

  async readSlab(ref: DatasetRef, range: FrameRange): Promise<ArraySlab> {
    const dataset = ownDataset(ref);
    readable(dataset.container);
    if (dataset.virtual) {
      throw new IOError(
        `Dataset ${ref.name} in ${ref.container.path} is virtual; read it through a logical view`,
      );
    }
    const [start, end] = range;
    const frames = ref.shape[0] ?? 0;
    if (start < 0 || end > frames || start > end) {
      throw new IOError(
        `Range [${start}, ${end}) is outside ${ref.name} with ${frames} frames`,
      );
    }

    return guard(`Cannot read ${ref.name} from ${ref.container.path}`, async () => {
      const chunk = await zarr.get(dataset.array, leadingSelection(ref.shape, start, end));
      if (!isNumericArray(chunk.data)) {
        throw new IOError(`Dataset ${ref.name} did not decode to a numeric array`);
      }
      return { data: chunk.data, shape: [...chunk.shape] };
    });
  }

  async writeSlab(ref: DatasetRef, start: number, slab: ArraySlab): Promise<void> {
    const dataset = ownDataset(ref);
    writable(dataset.container);
    const frames = slab.shape[0] ?? 0;
    const end = start + frames;
    if (start < 0 || end > (ref.shape[0] ?? 0)) {
      throw new IOError(
        `Range [${start}, ${end}) is outside ${ref.name} with ${ref.shape[0] ?? 0} frames`,
      );
    }
    if (frames === 0) return;

    await guard(`Cannot write ${ref.name} in ${ref.container.path}`, () =>
      zarr.set(dataset.array, leadingSelection(ref.shape, start, end), {
        data: slab.data,
        shape: slab.shape,
        stride: cStrides(slab.shape),
      }),
    );
  }

  async getAttr(target: AttributeTarget, key: string): Promise<unknown> {
    const attrs = await this.getAttrs(target);
    return attrs[key];
  }

  async getAttrs(target: AttributeTarget): Promise<Record<string, unknown>> {
    const { store, key } = metadataLocation(target);
    readable(containerOf(target));
    return guard(`Cannot read attributes at ${key}`, async () => {
      const document = await readDocument(store, key);
      return attributesOf(document);
    });
  }

  async setAttr(target: AttributeTarget, key: string, value: unknown): Promise<void> {
    await this.setAttrs(target, { [key]: value });
  }

  async setAttrs(
    target: AttributeTarget,
    attributes: Readonly<Record<string, unknown>>,
  ): Promise<void> {
    const { store, key } = metadataLocation(target);
    writable(containerOf(target));
    await guard(`Cannot write attributes at ${key}`, async () => {
      const document = await readDocument(store, key);
      const updated = {
        ...document,
        attributes: { ...attributesOf(document), ...attributes },
      };
      await store.set(key, textEncoder.encode(JSON.stringify(updated)));
    });
  }
}

/** Run a store operation, reporting foreign failures as {@link IOError}. */
async function guard<T>(action: string, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    if (error instanceof IOError) throw error;
    throw new IOError(`${action}: ${describeError(error)}`, { cause: error });
  }
}

function own(handle: ContainerHandle): ZarrContainerHandle {
  if (!(handle instanceof ZarrContainerHandle)) {
    throw new IOError(`Handle for ${handle.path} was not opened by this storage`);
  }
  return handle;
}

function ownDataset(ref: DatasetRef): ZarrDatasetRef {
  if (!(ref instanceof ZarrDatasetRef)) {
    throw new IOError(`Dataset ${ref.name} was not opened by this storage`);
  }
  return ref;
}

function readable(handle: ContainerHandle): ZarrContainerHandle {
  const container = own(handle);
  if (container.closed) {
    throw new IOError(`Container ${handle.path} is closed`);
  }
  return container;
}

function writable(handle: ContainerHandle): ZarrContainerHandle {
  const container = readable(handle);
  if (container.mode === "r") {
    throw new IOError(`Container ${handle.path} is open read-only`);
  }
  return container;
}

function containerOf(target: AttributeTarget): ContainerHandle {
  return "container" in target ? target.container : target;
}

function metadataLocation(target: AttributeTarget): {
  store: Mutable;
  key: AbsolutePath;
} {
  if ("container" in target) {
    const { array } = ownDataset(target);
    return { store: array.store, key: nodeMetadataKey(array.path) };
  }
  const container = own(target);
  return { store: container.root.store, key: ROOT_METADATA_KEY };
}

function nodeMetadataKey(path: AbsolutePath): AbsolutePath {
  return path === "/" ? ROOT_METADATA_KEY : `${path}/zarr.json`;
}

async function readDocument(
  store: Mutable,
  key: AbsolutePath,
): Promise<Record<string, unknown>> {
  const bytes = await store.get(key);
  if (bytes === undefined) {
    throw new IOError(`No node metadata at ${key}`);
  }
  const document: unknown = JSON.parse(textDecoder.decode(bytes));
  if (!isRecord(document)) {
    throw new IOError(`Node metadata at ${key} is not an object`);
  }
  return document;
}

async function readNodeAttributes(
  array: zarr.Array<zarr.DataType, Mutable>,
): Promise<Record<string, unknown>> {
  const document = await readDocument(array.store, nodeMetadataKey(array.path));
  return attributesOf(document);
}

function attributesOf(document: Record<string, unknown>): Record<string, unknown> {
  const attributes = document.attributes;
  return isRecord(attributes) ? { ...attributes } : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** One chunk per frame along the leading axis. */
function frameChunkShape(shape: readonly number[]): number[] {
  return shape.map((dim, axis) => (axis === 0 ? 1 : Math.max(dim, 1)));
}

function leadingSelection(
  shape: readonly number[],
  start: number,
  end: number,
): (zarr.Slice | null)[] {
  return shape.map((_, axis) => (axis === 0 ? zarr.slice(start, end) : null));
}

function encodeMapping(mapping: VirtualMapping): Record<string, unknown> {
  return {
    start: mapping.logical[0],
    end: mapping.logical[1],
    file: mapping.source.path,
    dataset: mapping.source.dataset,
    source_start: mapping.source.range[0],
    source_end: mapping.source.range[1],
  };
}

function decodeMapping(entry: unknown, name: string): VirtualMapping {
  if (
    isRecord(entry) &&
    typeof entry.start === "number" &&
    typeof entry.end === "number" &&
    typeof entry.file === "string" &&
    typeof entry.dataset === "string" &&
    typeof entry.source_start === "number" &&
    typeof entry.source_end === "number"
  ) {
    return {
      logical: [entry.start, entry.end],
      source: {
        path: entry.file,
        dataset: entry.dataset,
        range: [entry.source_start, entry.source_end],
      },
    };
  }
  throw new IOError(`Malformed mapping entry on ${name}: ${JSON.stringify(entry)}`);
}
