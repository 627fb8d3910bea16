/**
 * Digest computation and parsing.
 */

import { describe, it, expect } from "vitest";
import {
  digestFromBytes,
  parseDigest,
  verifyDigest,
  isDigest,
} from "../src/digest.js";
import { DigestInvalidError } from "../src/errors.js";

describe("digestFromBytes", () => {
  it("sha256 of empty bytes matches known hash", () => {
    expect(digestFromBytes(new Uint8Array(0))).toBe(
      "sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("sha256 of 'hello' matches known hash", () => {
    const hello = new TextEncoder().encode("hello");
    expect(digestFromBytes(hello)).toBe(
      "sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });

  it("sha512 digests carry 128 hex characters", () => {
    const digest = digestFromBytes(new TextEncoder().encode("hello"), "sha512");
    expect(digest).toMatch(/^sha512:[0-9a-f]{128}$/);
  });

  it("differs when a single byte differs", () => {
    const a = new TextEncoder().encode('{"a":1}');
    const b = new TextEncoder().encode('{"a": 1}');
    expect(digestFromBytes(a)).not.toBe(digestFromBytes(b));
  });
});

describe("parseDigest", () => {
  it("splits algorithm and encoded part", () => {
    const parsed = parseDigest(`sha256:${"a".repeat(64)}`);
    expect(parsed).toEqual({ algorithm: "sha256", encoded: "a".repeat(64) });
  });

  it("accepts unknown algorithms that match the grammar", () => {
    expect(parseDigest("multihash+base58:QmRZxt2b1FVZPNqd8hsiykDL3TdBDeTSPX9Kv46HmX4Gx8")).toEqual({
      algorithm: "multihash+base58",
      encoded: "QmRZxt2b1FVZPNqd8hsiykDL3TdBDeTSPX9Kv46HmX4Gx8",
    });
  });

  it("rejects a missing algorithm", () => {
    expect(() => parseDigest("a".repeat(64))).toThrow(DigestInvalidError);
  });

  it("rejects a short sha256", () => {
    expect(() => parseDigest("sha256:abc")).toThrow(
      "sha256 requires 64 hex characters, got 3",
    );
  });

  it("rejects uppercase hex for known algorithms", () => {
    expect(() => parseDigest(`sha256:${"A".repeat(64)}`)).toThrow(DigestInvalidError);
  });

  it("isDigest reports validity without throwing", () => {
    expect(isDigest(`sha256:${"0".repeat(64)}`)).toBe(true);
    expect(isDigest("latest")).toBe(false);
  });
});

describe("verifyDigest", () => {
  it("returns true for matching content", () => {
    const data = new TextEncoder().encode("test content");
    expect(verifyDigest(digestFromBytes(data), data)).toBe(true);
  });

  it("returns false for tampered content", () => {
    const data = new TextEncoder().encode("test content");
    const tampered = new TextEncoder().encode("test conten!");
    expect(verifyDigest(digestFromBytes(data), tampered)).toBe(false);
  });

  it("uses the algorithm named in the digest", () => {
    const data = new TextEncoder().encode("test content");
    expect(verifyDigest(digestFromBytes(data, "sha384"), data)).toBe(true);
  });

  it("throws for algorithms it cannot compute", () => {
    expect(() => verifyDigest("md5:abcd", new Uint8Array(0))).toThrow(
      DigestInvalidError,
    );
  });
});
