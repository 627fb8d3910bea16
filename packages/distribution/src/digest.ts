/**
 * Content digests.
 *
 * Digest = "<algorithm>:<encoded>", e.g. "sha256:e3b0c442...".
 * Always computed over the literal bytes, never over re-encoded structure.
 */

import { sha256, sha384, sha512 } from "@noble/hashes/sha2.js";
import { bytesToHex } from "@noble/hashes/utils.js";
import { DigestInvalidError } from "./errors.js";

/** Algorithm-prefixed content hash. */
export type Digest = string;

export type DigestAlgorithm = "sha256" | "sha384" | "sha512";

export const CANONICAL_ALGORITHM: DigestAlgorithm = "sha256";

const HASHERS: Record<DigestAlgorithm, (bytes: Uint8Array) => Uint8Array> = {
  sha256,
  sha384,
  sha512,
};

/** Hex length of each supported algorithm's output. */
const HEX_LENGTHS: Record<DigestAlgorithm, number> = {
  sha256: 64,
  sha384: 96,
  sha512: 128,
};

const DIGEST_PATTERN = /^([a-z0-9]+(?:[.+_-][a-z0-9]+)*):([a-zA-Z0-9=_-]+)$/;

export function isSupportedAlgorithm(
  algorithm: string,
): algorithm is DigestAlgorithm {
  return Object.prototype.hasOwnProperty.call(HASHERS, algorithm);
}

/** Hash exactly `bytes` and return the prefixed digest. */
export function digestFromBytes(
  bytes: Uint8Array,
  algorithm: DigestAlgorithm = CANONICAL_ALGORITHM,
): Digest {
  return `${algorithm}:${bytesToHex(HASHERS[algorithm](bytes))}`;
}

export interface ParsedDigest {
  algorithm: string;
  encoded: string;
}

/**
 * Validate a digest string.
 * Unknown algorithms pass if they match the grammar; known ones must carry
 * lowercase hex of the right length.
 */
export function parseDigest(value: string): ParsedDigest {
  const match = DIGEST_PATTERN.exec(value);
  if (!match) {
    throw new DigestInvalidError(value, "expected <algorithm>:<encoded>");
  }
  const algorithm = match[1] ?? "";
  const encoded = match[2] ?? "";

  if (isSupportedAlgorithm(algorithm)) {
    if (!/^[0-9a-f]+$/.test(encoded)) {
      throw new DigestInvalidError(value, "encoded part must be lowercase hex");
    }
    if (encoded.length !== HEX_LENGTHS[algorithm]) {
      throw new DigestInvalidError(
        value,
        `${algorithm} requires ${HEX_LENGTHS[algorithm]} hex characters, got ${encoded.length}`,
      );
    }
  }

  return { algorithm, encoded };
}

export function isDigest(value: string): boolean {
  try {
    parseDigest(value);
    return true;
  } catch {
    return false;
  }
}

/** Recompute the digest of `bytes` with the algorithm named in `digest`. */
export function verifyDigest(digest: Digest, bytes: Uint8Array): boolean {
  const { algorithm } = parseDigest(digest);
  if (!isSupportedAlgorithm(algorithm)) {
    throw new DigestInvalidError(digest, `unsupported algorithm ${algorithm}`);
  }
  return digestFromBytes(bytes, algorithm) === digest;
}
