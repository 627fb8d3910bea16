/**
 * Media-type dispatch: lookup, fallback, duplicate and sealed registration.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SchemaRegistry, DEFAULT_MEDIA_TYPE, type UnmarshalFunc } from "../src/schema-registry.js";
import type { Manifest } from "../src/manifest.js";
import { digestFromBytes } from "../src/digest.js";
import {
  DuplicateRegistrationError,
  MediaTypeParseError,
  RegistrySealedError,
  UnsupportedMediaTypeError,
} from "../src/errors.js";

// ── Helpers ────────────────────────────────────────────────────────

const TEST_TYPE = "application/vnd.test.index.v1+json";
const OTHER_TYPE = "application/vnd.test.other.v1+json";

/** Records which handler revived the bytes. */
class TaggedManifest implements Manifest {
  constructor(
    readonly handler: string,
    private readonly bytes: Uint8Array,
  ) {}

  references() {
    return [];
  }

  payload() {
    return { mediaType: this.handler, payload: this.bytes };
  }
}

function handler(name: string): UnmarshalFunc {
  return (bytes) => ({
    manifest: new TaggedManifest(name, bytes),
    descriptor: { mediaType: name, digest: digestFromBytes(bytes), size: bytes.byteLength },
  });
}

function handlerName(result: { manifest: Manifest }): string {
  return result.manifest.payload().mediaType;
}

const BODY = new TextEncoder().encode('{"hello":"world"}');

// ── Tests ──────────────────────────────────────────────────────────

describe("SchemaRegistry", () => {
  let registry: SchemaRegistry;

  beforeEach(() => {
    registry = new SchemaRegistry();
  });

  it("dispatches on the exact media type", () => {
    registry.register(TEST_TYPE, handler(TEST_TYPE));
    registry.register(OTHER_TYPE, handler(OTHER_TYPE));

    expect(handlerName(registry.unmarshal(OTHER_TYPE, BODY))).toBe(OTHER_TYPE);
    expect(handlerName(registry.unmarshal(TEST_TYPE, BODY))).toBe(TEST_TYPE);
  });

  it("ignores parameters and case in the Content-Type header", () => {
    registry.register(TEST_TYPE, handler(TEST_TYPE));

    const plain = registry.unmarshal(TEST_TYPE, BODY);
    const withParams = registry.unmarshal(
      "Application/Vnd.Test.Index.V1+JSON; charset=utf-8",
      BODY,
    );

    expect(handlerName(withParams)).toBe(handlerName(plain));
    expect(withParams.descriptor).toEqual(plain.descriptor);
  });

  it("descriptor covers exactly the bytes given", () => {
    registry.register(TEST_TYPE, handler(TEST_TYPE));
    const { descriptor } = registry.unmarshal(TEST_TYPE, BODY);
    expect(descriptor.digest).toBe(digestFromBytes(BODY));
    expect(descriptor.size).toBe(BODY.byteLength);
  });

  it("falls back to the default handler for unknown and empty types", () => {
    registry.register(DEFAULT_MEDIA_TYPE, handler("default"));

    expect(handlerName(registry.unmarshal("", BODY))).toBe("default");
    expect(handlerName(registry.unmarshal(TEST_TYPE, BODY))).toBe("default");
    expect(handlerName(registry.unmarshal("text/plain", BODY))).toBe("default");
  });

  it("prefers an exact match over the default", () => {
    registry.register(DEFAULT_MEDIA_TYPE, handler("default"));
    registry.register(TEST_TYPE, handler(TEST_TYPE));
    expect(handlerName(registry.unmarshal(TEST_TYPE, BODY))).toBe(TEST_TYPE);
  });

  it("fails every input when nothing is registered", () => {
    for (const contentType of ["", TEST_TYPE, "application/json"]) {
      expect(() => registry.unmarshal(contentType, BODY)).toThrow(
        UnsupportedMediaTypeError,
      );
    }
  });

  it("names the offending media type when unsupported", () => {
    registry.register(TEST_TYPE, handler(TEST_TYPE));
    let caught: unknown;
    try {
      registry.unmarshal("application/vnd.unknown+json; q=1", BODY);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(UnsupportedMediaTypeError);
    expect(caught).toMatchObject({ mediaType: "application/vnd.unknown+json" });
  });

  it("rejects a malformed Content-Type before lookup", () => {
    registry.register(DEFAULT_MEDIA_TYPE, handler("default"));
    expect(() => registry.unmarshal("application/", BODY)).toThrow(MediaTypeParseError);
  });

  it("refuses a duplicate registration and keeps the first", () => {
    registry.register(TEST_TYPE, handler("first"));
    expect(() => registry.register(TEST_TYPE, handler("second"))).toThrow(
      DuplicateRegistrationError,
    );
    expect(handlerName(registry.unmarshal(TEST_TYPE, BODY))).toBe("first");
  });

  it("normalises the registered key the way lookups parse Content-Type", () => {
    registry.register("Application/VND.Test.Index.v1+JSON; version=1", handler("mixed"));

    expect(registry.mediaTypes()).toEqual([TEST_TYPE]);
    expect(registry.has(TEST_TYPE)).toBe(true);
    expect(handlerName(registry.unmarshal(TEST_TYPE, BODY))).toBe("mixed");
    expect(() => registry.register(TEST_TYPE, handler("second"))).toThrow(
      DuplicateRegistrationError,
    );
  });

  it("rejects a malformed media type at registration", () => {
    expect(() => registry.register("application/", handler("bad"))).toThrow(MediaTypeParseError);
    expect(registry.mediaTypes()).toEqual([]);
  });

  it("lists registered media types without the default", () => {
    registry.register(DEFAULT_MEDIA_TYPE, handler("default"));
    registry.register(TEST_TYPE, handler(TEST_TYPE));
    registry.register(OTHER_TYPE, handler(OTHER_TYPE));

    expect(new Set(registry.mediaTypes())).toEqual(new Set([TEST_TYPE, OTHER_TYPE]));
  });

  it("refuses registration once sealed but keeps serving lookups", () => {
    registry.register(TEST_TYPE, handler(TEST_TYPE));
    registry.seal();

    expect(registry.sealed).toBe(true);
    expect(() => registry.register(OTHER_TYPE, handler(OTHER_TYPE))).toThrow(
      RegistrySealedError,
    );
    expect(registry.has(OTHER_TYPE)).toBe(false);
    expect(handlerName(registry.unmarshal(TEST_TYPE, BODY))).toBe(TEST_TYPE);
  });

  it("keeps separate instances isolated", () => {
    const other = new SchemaRegistry();
    registry.register(TEST_TYPE, handler(TEST_TYPE));
    expect(other.has(TEST_TYPE)).toBe(false);
    expect(() => other.register(TEST_TYPE, handler(TEST_TYPE))).not.toThrow();
  });
});
