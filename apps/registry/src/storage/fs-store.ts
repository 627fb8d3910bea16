/**
 * Content-addressed manifest storage on local filesystem.
 *
 * Layout: {basePath}/{algorithm}/{hex[0:2]}/{hex}/{data,mediatype}
 *
 * Files are written to a temp name and renamed into place; `data` is renamed
 * last, so an entry exists only once both files are complete. Stored bytes
 * are verified against their digest on every read.
 */

import { randomUUID } from "node:crypto";
import { access, mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  CancelledError,
  ManifestInvalidError,
  ManifestNotFoundError,
  digestFromBytes,
  isDigest,
  parseDigest,
  throwIfCancelled,
  validateManifestReferences,
  verifyDigest,
  type Digest,
  type Manifest,
  type ManifestEnumerator,
  type ManifestIngester,
  type ManifestService,
  type ManifestServiceOptions,
  type SchemaRegistry,
} from "@keel/distribution";
import { isAbortError, isFileNotFoundError } from "../util.js";

const DATA_FILE = "data";
const MEDIA_TYPE_FILE = "mediatype";

async function listDir(path: string): Promise<string[]> {
  try {
    return (await readdir(path)).sort();
  } catch (err) {
    if (isFileNotFoundError(err)) return [];
    throw err;
  }
}

export class FsManifestStore implements ManifestService, ManifestEnumerator {
  constructor(
    private readonly basePath: string,
    private readonly registry: SchemaRegistry,
  ) {}

  private entryDir(digest: Digest): string {
    const { algorithm, encoded } = parseDigest(digest);
    return join(this.basePath, algorithm, encoded.substring(0, 2), encoded);
  }

  /** Write `bytes` beside `path` and rename over it. */
  private async writeAtomic(
    path: string,
    bytes: Uint8Array | string,
    signal?: AbortSignal,
  ): Promise<void> {
    const tmp = `${path}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, bytes, { signal });
      throwIfCancelled(signal);
      await rename(tmp, path);
    } catch (err) {
      await rm(tmp, { force: true });
      if (isAbortError(err)) throw new CancelledError({ cause: err });
      throw err;
    }
  }

  /** Initialize the store directory. */
  async init(): Promise<void> {
    await mkdir(this.basePath, { recursive: true });
  }

  async exists(digest: Digest, options?: ManifestServiceOptions): Promise<boolean> {
    throwIfCancelled(options?.signal);
    try {
      await access(join(this.entryDir(digest), DATA_FILE));
      return true;
    } catch (err) {
      if (isFileNotFoundError(err)) return false;
      throw err;
    }
  }

  async get(digest: Digest, options?: ManifestServiceOptions): Promise<Manifest> {
    const signal = options?.signal;
    throwIfCancelled(signal);
    const dir = this.entryDir(digest);

    let bytes: Uint8Array;
    let mediaType: string;
    try {
      bytes = new Uint8Array(await readFile(join(dir, DATA_FILE), { signal }));
      mediaType = await readFile(join(dir, MEDIA_TYPE_FILE), { encoding: "utf-8", signal });
    } catch (err) {
      if (isFileNotFoundError(err)) throw new ManifestNotFoundError(digest);
      if (isAbortError(err)) throw new CancelledError({ cause: err });
      throw err;
    }

    if (!verifyDigest(digest, bytes)) {
      throw new ManifestInvalidError(`stored content does not match ${digest}`);
    }
    return this.registry.unmarshal(mediaType, bytes).manifest;
  }

  /** Content-addressed: identical bytes land on the same entry. */
  async put(manifest: Manifest, options?: ManifestServiceOptions): Promise<Digest> {
    const signal = options?.signal;
    throwIfCancelled(signal);
    validateManifestReferences(manifest);

    const { mediaType, payload } = manifest.payload();
    const digest = digestFromBytes(payload);
    if (await this.exists(digest, options)) {
      return digest;
    }

    const dir = this.entryDir(digest);
    await mkdir(dir, { recursive: true });
    try {
      await this.writeAtomic(join(dir, MEDIA_TYPE_FILE), mediaType, signal);
      await this.writeAtomic(join(dir, DATA_FILE), payload, signal);
    } catch (err) {
      // No committed data: drop the half-written entry, delete cannot see it.
      if (!(await this.exists(digest))) {
        await rm(dir, { recursive: true, force: true });
      }
      throw err;
    }
    return digest;
  }

  /** Removes the entry only; referenced content is not touched. */
  async delete(digest: Digest, options?: ManifestServiceOptions): Promise<void> {
    throwIfCancelled(options?.signal);
    if (!(await this.exists(digest, options))) {
      throw new ManifestNotFoundError(digest);
    }
    const dir = this.entryDir(digest);
    await rm(join(dir, DATA_FILE), { force: true });
    await rm(dir, { recursive: true, force: true });
  }

  /** Committed entries in sorted order; stops on the first ingester error. */
  async enumerate(
    ingester: ManifestIngester,
    options?: ManifestServiceOptions,
  ): Promise<void> {
    for (const algorithm of await listDir(this.basePath)) {
      for (const prefix of await listDir(join(this.basePath, algorithm))) {
        for (const encoded of await listDir(join(this.basePath, algorithm, prefix))) {
          throwIfCancelled(options?.signal);
          const digest = `${algorithm}:${encoded}`;
          if (isDigest(digest) && (await this.exists(digest, options))) {
            await ingester(digest);
          }
        }
      }
    }
  }
}
