/**
 * Filesystem manifest store — cancellation while I/O is in flight.
 *
 * `rename` is wrapped so a test can fire the signal at an exact point in
 * the write sequence.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readdir, rename, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CancelledError, ManifestNotFoundError } from "@keel/distribution";
import { FsManifestStore } from "../src/storage/fs-store.js";
import { sampleIndex, testRegistry } from "./fixtures.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, rename: vi.fn(actual.rename) };
});

const { rename: realRename } =
  await vi.importActual<typeof import("node:fs/promises")>("node:fs/promises");

let tmpDir: string;
let store: FsManifestStore;

async function storedDigests(): Promise<string[]> {
  const seen: string[] = [];
  await store.enumerate((digest) => {
    seen.push(digest);
  });
  return seen;
}

async function tempFiles(): Promise<string[]> {
  const names = await readdir(tmpDir, { recursive: true });
  return names.filter((name) => name.endsWith(".tmp"));
}

describe("FsManifestStore cancellation", () => {
  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "manifest-cancel-"));
    store = new FsManifestStore(tmpDir, testRegistry());
    await store.init();
  });

  afterEach(async () => {
    vi.mocked(rename).mockClear();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("put aborted after the entry check writes nothing", async () => {
    const index = sampleIndex("a");
    const digest = index.descriptor().digest;
    const controller = new AbortController();

    const pending = store.put(index, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toThrow(CancelledError);
    expect(await store.exists(digest)).toBe(false);
    expect(await storedDigests()).toEqual([]);
    expect(await tempFiles()).toEqual([]);
  });

  it("put aborted between the media type and data writes removes the entry", async () => {
    const index = sampleIndex("a");
    const digest = index.descriptor().digest;
    const hex = digest.slice("sha256:".length);
    const controller = new AbortController();

    // First rename commits `mediatype`; the signal fires before `data` is written.
    vi.mocked(rename).mockImplementationOnce(async (from, to) => {
      await realRename(from, to);
      controller.abort();
    });

    await expect(store.put(index, { signal: controller.signal })).rejects.toThrow(
      CancelledError,
    );

    expect(await readdir(join(tmpDir, "sha256", hex.substring(0, 2)))).toEqual([]);
    expect(await store.exists(digest)).toBe(false);
    expect(await storedDigests()).toEqual([]);
    expect(await tempFiles()).toEqual([]);
    await expect(store.get(digest)).rejects.toThrow(ManifestNotFoundError);

    // Nothing left behind blocks a later put.
    expect(await store.put(index)).toBe(digest);
    expect(await storedDigests()).toEqual([digest]);
  });

  it("get aborted while reading rejects with CancelledError", async () => {
    const digest = await store.put(sampleIndex("a"));
    const controller = new AbortController();

    const pending = store.get(digest, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toThrow(CancelledError);
    expect(await store.exists(digest)).toBe(true);
  });
});
