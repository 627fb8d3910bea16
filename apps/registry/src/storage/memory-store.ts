/**
 * In-memory manifest storage.
 *
 * digest → { mediaType, bytes }. Bytes are copied on the way in and out, so
 * a stored record can never drift from its digest.
 */

import {
  digestFromBytes,
  parseDigest,
  throwIfCancelled,
  validateManifestReferences,
  ManifestNotFoundError,
  type Digest,
  type Manifest,
  type ManifestEnumerator,
  type ManifestIngester,
  type ManifestService,
  type ManifestServiceOptions,
  type SchemaRegistry,
} from "@keel/distribution";

interface StoredManifest {
  mediaType: string;
  bytes: Uint8Array;
}

export class MemoryManifestStore implements ManifestService, ManifestEnumerator {
  private readonly records = new Map<Digest, StoredManifest>();

  constructor(private readonly registry: SchemaRegistry) {}

  async exists(digest: Digest, options?: ManifestServiceOptions): Promise<boolean> {
    throwIfCancelled(options?.signal);
    parseDigest(digest);
    return this.records.has(digest);
  }

  async get(digest: Digest, options?: ManifestServiceOptions): Promise<Manifest> {
    throwIfCancelled(options?.signal);
    parseDigest(digest);
    const record = this.records.get(digest);
    if (!record) {
      throw new ManifestNotFoundError(digest);
    }
    return this.registry.unmarshal(record.mediaType, record.bytes.slice()).manifest;
  }

  /** Content-addressed: storing identical bytes twice is a no-op. */
  async put(manifest: Manifest, options?: ManifestServiceOptions): Promise<Digest> {
    throwIfCancelled(options?.signal);
    validateManifestReferences(manifest);

    const { mediaType, payload } = manifest.payload();
    const digest = digestFromBytes(payload);
    if (!this.records.has(digest)) {
      this.records.set(digest, { mediaType, bytes: payload.slice() });
    }
    return digest;
  }

  async delete(digest: Digest, options?: ManifestServiceOptions): Promise<void> {
    throwIfCancelled(options?.signal);
    parseDigest(digest);
    if (!this.records.delete(digest)) {
      throw new ManifestNotFoundError(digest);
    }
  }

  /** Walks a snapshot of the keys, so the ingester may delete as it goes. */
  async enumerate(
    ingester: ManifestIngester,
    options?: ManifestServiceOptions,
  ): Promise<void> {
    for (const digest of [...this.records.keys()].sort()) {
      throwIfCancelled(options?.signal);
      await ingester(digest);
    }
  }

  get size(): number {
    return this.records.size;
  }
}
