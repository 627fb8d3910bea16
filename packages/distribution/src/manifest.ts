/**
 * Manifest capability contracts.
 *
 * Manifest          — ordered references + serialized payload
 * ManifestBuilder   — incremental construction, per-schema dependency rules
 * ManifestService   — digest-keyed CRUD implemented by a storage collaborator
 *
 * Every concrete schema implements Manifest; storage and HTTP code only ever
 * see these interfaces.
 */

import type { Describable, Descriptor } from "./descriptor.js";
import { validateDescriptor } from "./descriptor.js";
import { digestFromBytes, type Digest } from "./digest.js";
import { CancelledError } from "./errors.js";

export interface ManifestPayload {
  mediaType: string;
  payload: Uint8Array;
}

export interface Manifest {
  /**
   * Content this manifest depends on, in dependency order (base first).
   * Pull planners and GC walkers rely on the order; it is not checked.
   */
  references(): Descriptor[];

  /**
   * Media type and the exact bytes whose digest is this manifest's identity.
   * Throws only for internal encoding faults.
   */
  payload(): ManifestPayload;
}

export interface ManifestBuilder<M extends Manifest = Manifest> {
  /** Finalize: canonical bytes are fixed here. */
  build(): M;

  /** References added so far, in append order. */
  references(): Descriptor[];

  /**
   * Add a dependency after the existing ones. Throws
   * UnsupportedDependencyError for media types the schema cannot hold; the
   * accumulated list is left as it was.
   */
  appendReference(dependency: Describable): void;
}

/** Per-call context. `signal` carries cancellation and deadlines. */
export interface ManifestServiceOptions {
  signal?: AbortSignal;
}

export interface ManifestService {
  exists(digest: Digest, options?: ManifestServiceOptions): Promise<boolean>;

  /** Throws ManifestNotFoundError when absent. */
  get(digest: Digest, options?: ManifestServiceOptions): Promise<Manifest>;

  /** Digest is computed from payload bytes, never taken from the caller. */
  put(manifest: Manifest, options?: ManifestServiceOptions): Promise<Digest>;

  /** Throws ManifestNotFoundError when absent. Referenced content is untouched. */
  delete(digest: Digest, options?: ManifestServiceOptions): Promise<void>;
}

export type ManifestIngester = (digest: Digest) => void | Promise<void>;

export interface ManifestEnumerator {
  /** Calls `ingester` per digest; the first error it throws stops the walk. */
  enumerate(
    ingester: ManifestIngester,
    options?: ManifestServiceOptions,
  ): Promise<void>;
}

/** Throw CancelledError if the signal has fired. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError({ cause: signal.reason });
  }
}

/** Reject references a store should never persist. */
export function validateManifestReferences(manifest: Manifest): void {
  manifest.references().forEach((ref, i) => {
    validateDescriptor(ref, `references[${i}]`);
  });
}

/** Descriptor of a manifest itself, from its payload bytes. */
export function describeManifest(manifest: Manifest): Descriptor {
  const { mediaType, payload } = manifest.payload();
  return {
    mediaType,
    digest: digestFromBytes(payload),
    size: payload.byteLength,
  };
}
