/**
 * Canonical serialization — deterministic JSON encoding.
 *
 * Rules:
 *   1. Field order is fixed by the caller (schemas build ordered objects)
 *   2. Map-like fields (annotations) have keys sorted lexicographically
 *   3. Three-space indentation, no trailing newline
 *   4. UTF-8 bytes
 *
 * Only used when a manifest is built from structure. Bytes received from a
 * client are kept verbatim and never pass through here.
 */

import type { Descriptor, Platform } from "./descriptor.js";

export const CANONICAL_INDENT = "   ";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/** Copy of `record` with keys in sorted order. */
export function sortedRecord(
  record: Readonly<Record<string, string>>,
): Record<string, string> {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(record).sort()) {
    const value = record[key];
    if (value !== undefined) sorted[key] = value;
  }
  return sorted;
}

function orderedPlatform(platform: Platform): Record<string, unknown> {
  const out: Record<string, unknown> = {
    architecture: platform.architecture,
    os: platform.os,
  };
  if (platform["os.version"]) out["os.version"] = platform["os.version"];
  if (platform["os.features"]?.length) out["os.features"] = platform["os.features"];
  if (platform.variant) out.variant = platform.variant;
  return out;
}

/** mediaType, size, digest, then the optional fields when non-empty. */
export function orderedDescriptor(descriptor: Descriptor): Record<string, unknown> {
  const out: Record<string, unknown> = {
    mediaType: descriptor.mediaType,
    size: descriptor.size,
    digest: descriptor.digest,
  };
  if (descriptor.urls?.length) out.urls = descriptor.urls;
  if (descriptor.annotations && Object.keys(descriptor.annotations).length > 0) {
    out.annotations = sortedRecord(descriptor.annotations);
  }
  if (descriptor.platform) out.platform = orderedPlatform(descriptor.platform);
  return out;
}

export function canonicalEncode(ordered: Record<string, unknown>): Uint8Array {
  return encoder.encode(JSON.stringify(ordered, null, CANONICAL_INDENT));
}

/** Strict UTF-8 decode; throws TypeError on malformed input. */
export function decodeUtf8(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}
