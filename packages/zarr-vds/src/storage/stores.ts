/**
 * @module storage/stores
 *
 * Resolve container paths to zarrita stores.
 */

import { rm } from "node:fs/promises";
import { resolve } from "node:path";
import { FileSystemStore } from "@zarrita/storage";
import type { Mutable } from "@zarrita/storage";

/** Key of a Zarr v3 node's metadata document. */
export const ROOT_METADATA_KEY = "/zarr.json";

/** Hands out one zarrita store per container path. */
export interface StoreProvider {
  /** Store rooted at `path`; need not exist yet. */
  open(path: string): Mutable;
  exists(path: string): Promise<boolean>;
  remove(path: string): Promise<void>;
}

/** Containers as directories on the local filesystem. */
export class FileSystemStoreProvider implements StoreProvider {
  open(path: string): Mutable {
    return new FileSystemStore(resolve(path));
  }

  async exists(path: string): Promise<boolean> {
    const bytes = await this.open(path).get(ROOT_METADATA_KEY);
    return bytes !== undefined;
  }

  async remove(path: string): Promise<void> {
    await rm(resolve(path), { recursive: true, force: true });
  }
}

/** Containers held in process memory, keyed by resolved path. */
export class MemoryStoreProvider implements StoreProvider {
  private readonly stores = new Map<string, Map<string, Uint8Array>>();

  open(path: string): Mutable {
    const key = resolve(path);
    let store = this.stores.get(key);
    if (store === undefined) {
      store = new Map();
      this.stores.set(key, store);
    }
    return store;
  }

  async exists(path: string): Promise<boolean> {
    return this.stores.get(resolve(path))?.has(ROOT_METADATA_KEY) ?? false;
  }

  async remove(path: string): Promise<void> {
    this.stores.delete(resolve(path));
  }

  /** Resolved paths of every container created so far. */
  paths(): string[] {
    return [...this.stores.keys()].filter((key) =>
      this.stores.get(key)?.has(ROOT_METADATA_KEY),
    );
  }
}
