/**
 * DeserializedImageIndex — structured fields plus the canonical bytes.
 *
 * Two ways in:
 *   fromStruct(index)  encode deterministically, keep the result
 *   fromBytes(bytes)   keep the received bytes verbatim, decode for access
 *
 * Once canonical bytes exist every serialization returns exactly them.
 * Re-encoding the structure would change a digest callers have already seen.
 */

import { Value } from "@sinclair/typebox/value";
import {
  canonicalEncode,
  decodeUtf8,
  orderedDescriptor,
  sortedRecord,
} from "../canonical.js";
import {
  createDescriptor,
  descriptorFromWire,
  type Describable,
  type Descriptor,
} from "../descriptor.js";
import { digestFromBytes } from "../digest.js";
import {
  ManifestInvalidError,
  SchemaMismatchError,
  UninitializedManifestError,
} from "../errors.js";
import type { Manifest, ManifestPayload } from "../manifest.js";
import { MediaTypeImageIndex } from "./media-types.js";
import { SchemaVersion, WireImageIndex, type ImageIndex } from "./schema.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Frozen copy with descriptors normalised through createDescriptor. */
function freezeIndex(index: ImageIndex): ImageIndex {
  const layers = index.layers.map(createDescriptor);
  Object.freeze(layers);
  const copy: ImageIndex = {
    schemaVersion: index.schemaVersion,
    mediaType: index.mediaType,
    layers,
  };
  if (index.config) copy.config = createDescriptor(index.config);
  if (index.annotations) copy.annotations = Object.freeze({ ...index.annotations });
  return Object.freeze(copy);
}

/** Missing or null fields take their zero values. */
function indexFromWire(wire: WireImageIndex): ImageIndex {
  const index: ImageIndex = {
    schemaVersion: wire.schemaVersion ?? 0,
    mediaType: wire.mediaType ?? "",
    layers: (wire.layers ?? []).map(descriptorFromWire),
  };
  if (wire.config) index.config = descriptorFromWire(wire.config);
  if (wire.annotations) index.annotations = wire.annotations;
  return index;
}

function encodeIndex(index: ImageIndex): Uint8Array {
  const ordered: Record<string, unknown> = {
    schemaVersion: index.schemaVersion,
    mediaType: index.mediaType,
  };
  if (index.config) ordered.config = orderedDescriptor(index.config);
  ordered.layers = index.layers.map(orderedDescriptor);
  if (index.annotations && Object.keys(index.annotations).length > 0) {
    ordered.annotations = sortedRecord(index.annotations);
  }
  return canonicalEncode(ordered);
}

export class DeserializedImageIndex implements Manifest, Describable {
  readonly manifest: ImageIndex;

  /** Canonical byte representation; absent until fromStruct/fromBytes. */
  private canonical: Uint8Array | undefined;

  /**
   * Wraps structure without canonical bytes. Serializing such a value throws
   * UninitializedManifestError; use fromStruct or fromBytes instead.
   */
  constructor(index: ImageIndex = { ...SchemaVersion, layers: [] }) {
    this.manifest = freezeIndex(index);
  }

  static fromStruct(index: ImageIndex): DeserializedImageIndex {
    const deserialized = new DeserializedImageIndex(index);
    deserialized.canonical = encodeIndex(deserialized.manifest);
    return deserialized;
  }

  /**
   * Keep `bytes` verbatim as canonical, then decode. Throws
   * ManifestInvalidError for malformed JSON or a field of the wrong JSON
   * type, SchemaMismatchError when mediaType is not the image-index type.
   * Descriptor contents are checked at put, not here.
   */
  static fromBytes(bytes: Uint8Array): DeserializedImageIndex {
    const canonical = bytes.slice();

    let decoded: unknown;
    try {
      decoded = JSON.parse(decodeUtf8(canonical));
    } catch (err) {
      throw new ManifestInvalidError("payload is not valid JSON", { cause: err });
    }
    if (!isRecord(decoded)) {
      throw new ManifestInvalidError("payload must be a JSON object");
    }
    if (!Value.Check(WireImageIndex, decoded)) {
      const first = Value.Errors(WireImageIndex, decoded).First();
      throw new ManifestInvalidError(
        first ? `${first.path || "/"}: ${first.message}` : "unexpected structure",
      );
    }
    if (decoded.mediaType !== MediaTypeImageIndex) {
      throw new SchemaMismatchError(MediaTypeImageIndex, decoded.mediaType ?? "");
    }

    const deserialized = new DeserializedImageIndex(indexFromWire(decoded));
    deserialized.canonical = canonical;
    return deserialized;
  }

  get hasCanonicalBytes(): boolean {
    return this.canonical !== undefined;
  }

  /** `[config, ...layers]`; config first marks the root entry. */
  references(): Descriptor[] {
    const { config, layers } = this.manifest;
    return config ? [config, ...layers] : [...layers];
  }

  target(): Descriptor | undefined {
    return this.manifest.config;
  }

  /** Copy of the canonical bytes. */
  marshalJSON(): Uint8Array {
    if (this.canonical === undefined) {
      throw new UninitializedManifestError("DeserializedImageIndex");
    }
    return this.canonical.slice();
  }

  payload(): ManifestPayload {
    return { mediaType: this.manifest.mediaType, payload: this.marshalJSON() };
  }

  descriptor(): Descriptor {
    const bytes = this.marshalJSON();
    return createDescriptor({
      mediaType: this.manifest.mediaType,
      digest: digestFromBytes(bytes),
      size: bytes.byteLength,
    });
  }
}
