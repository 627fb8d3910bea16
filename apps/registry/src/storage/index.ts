import type {
  ManifestEnumerator,
  ManifestService,
  SchemaRegistry,
} from "@keel/distribution";
import type { StorageDriver } from "../config.js";
import { FsManifestStore } from "./fs-store.js";
import { MemoryManifestStore } from "./memory-store.js";

export type ManifestStore = ManifestService & ManifestEnumerator;

export { FsManifestStore, MemoryManifestStore };

export interface StoreOptions {
  driver: StorageDriver;
  path: string;
}

/** Build and initialize the configured storage driver. */
export async function createManifestStore(
  options: StoreOptions,
  registry: SchemaRegistry,
): Promise<ManifestStore> {
  switch (options.driver) {
    case "memory":
      return new MemoryManifestStore(registry);
    case "filesystem": {
      const store = new FsManifestStore(options.path, registry);
      await store.init();
      return store;
    }
  }
}
