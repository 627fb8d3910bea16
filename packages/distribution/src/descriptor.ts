/**
 * Descriptor — a self-describing pointer to content.
 *
 * digest + size + mediaType, with optional platform, annotations and
 * alternate URLs. Values handed out by this package are frozen.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { parseDigest } from "./digest.js";
import { ManifestInvalidError, getErrorMessage } from "./errors.js";

export const Platform = Type.Object({
  architecture: Type.String(),
  os: Type.String(),
  "os.version": Type.Optional(Type.String()),
  "os.features": Type.Optional(Type.Array(Type.String())),
  variant: Type.Optional(Type.String()),
});

export type Platform = Static<typeof Platform>;

export const Descriptor = Type.Object({
  mediaType: Type.String(),
  digest: Type.String(),
  size: Type.Integer({ minimum: 0 }),
  urls: Type.Optional(Type.Array(Type.String())),
  annotations: Type.Optional(Type.Record(Type.String(), Type.String())),
  platform: Type.Optional(Platform),
});

export type Descriptor = Static<typeof Descriptor>;

// ── Wire form ──────────────────────────────────────────────────────
// Decoding follows JSON-into-struct rules: a field may be missing or null
// and then takes its zero value. Only a value of the wrong JSON type fails.

export const Nullable = <T extends TSchema>(schema: T) =>
  Type.Optional(Type.Union([schema, Type.Null()]));

export const WirePlatform = Type.Object({
  architecture: Nullable(Type.String()),
  os: Nullable(Type.String()),
  "os.version": Nullable(Type.String()),
  "os.features": Nullable(Type.Array(Type.String())),
  variant: Nullable(Type.String()),
});

export type WirePlatform = Static<typeof WirePlatform>;

export const WireDescriptor = Type.Object({
  mediaType: Nullable(Type.String()),
  digest: Nullable(Type.String()),
  size: Nullable(Type.Integer()),
  urls: Nullable(Type.Array(Type.String())),
  annotations: Nullable(Type.Record(Type.String(), Type.String())),
  platform: Nullable(WirePlatform),
});

export type WireDescriptor = Static<typeof WireDescriptor>;

function platformFromWire(wire: WirePlatform): Platform {
  return {
    architecture: wire.architecture ?? "",
    os: wire.os ?? "",
    "os.version": wire["os.version"] ?? undefined,
    "os.features": wire["os.features"] ?? undefined,
    variant: wire.variant ?? undefined,
  };
}

/** Zero-fill a decoded descriptor. Range checks happen in validateDescriptor. */
export function descriptorFromWire(wire: WireDescriptor): Descriptor {
  return createDescriptor({
    mediaType: wire.mediaType ?? "",
    digest: wire.digest ?? "",
    size: wire.size ?? 0,
    urls: wire.urls ?? undefined,
    annotations: wire.annotations ?? undefined,
    platform: wire.platform ? platformFromWire(wire.platform) : undefined,
  });
}

/** Anything that can describe itself as a Descriptor. */
export interface Describable {
  descriptor(): Descriptor;
}

export function isDescribable(value: unknown): value is Describable {
  return (
    value !== null &&
    typeof value === "object" &&
    "descriptor" in value &&
    typeof value.descriptor === "function"
  );
}

function freezePlatform(platform: Platform): Platform {
  const copy: Platform = { architecture: platform.architecture, os: platform.os };
  if (platform["os.version"] !== undefined) copy["os.version"] = platform["os.version"];
  if (platform["os.features"] !== undefined) {
    const features = [...platform["os.features"]];
    Object.freeze(features);
    copy["os.features"] = features;
  }
  if (platform.variant !== undefined) copy.variant = platform.variant;
  return Object.freeze(copy);
}

/** Copy and freeze a descriptor so later mutation of the input cannot leak in. */
export function createDescriptor(fields: Descriptor): Descriptor {
  const copy: Descriptor = {
    mediaType: fields.mediaType,
    digest: fields.digest,
    size: fields.size,
  };
  if (fields.urls !== undefined) {
    const urls = [...fields.urls];
    Object.freeze(urls);
    copy.urls = urls;
  }
  if (fields.annotations !== undefined) {
    copy.annotations = Object.freeze({ ...fields.annotations });
  }
  if (fields.platform !== undefined) copy.platform = freezePlatform(fields.platform);
  return Object.freeze(copy);
}

/** Wrap a plain descriptor (a blob handle, say) so builders can take it. */
export function describable(descriptor: Descriptor): Describable {
  const frozen = createDescriptor(descriptor);
  return { descriptor: () => frozen };
}

function sameList(a?: readonly string[], b?: readonly string[]): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function sameMap(
  a?: Readonly<Record<string, string>>,
  b?: Readonly<Record<string, string>>,
): boolean {
  if (a === undefined || b === undefined) return a === b;
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((k) => Object.prototype.hasOwnProperty.call(b, k) && a[k] === b[k]);
}

function samePlatform(a?: Platform, b?: Platform): boolean {
  if (a === undefined || b === undefined) return a === b;
  return (
    a.architecture === b.architecture &&
    a.os === b.os &&
    a["os.version"] === b["os.version"] &&
    a.variant === b.variant &&
    sameList(a["os.features"], b["os.features"])
  );
}

/** Structural equality. Annotation key order does not matter. */
export function descriptorsEqual(a: Descriptor, b: Descriptor): boolean {
  return (
    a.mediaType === b.mediaType &&
    a.digest === b.digest &&
    a.size === b.size &&
    sameList(a.urls, b.urls) &&
    sameMap(a.annotations, b.annotations) &&
    samePlatform(a.platform, b.platform)
  );
}

/**
 * Check the fields a collaborator relies on before persisting a reference.
 * `path` prefixes the message, e.g. "layers[2]".
 */
export function validateDescriptor(descriptor: Descriptor, path = "descriptor"): void {
  if (descriptor.mediaType.length === 0) {
    throw new ManifestInvalidError(`${path}: mediaType is empty`);
  }
  if (!Number.isSafeInteger(descriptor.size) || descriptor.size < 0) {
    throw new ManifestInvalidError(`${path}: size must be a non-negative integer`);
  }
  try {
    parseDigest(descriptor.digest);
  } catch (err) {
    throw new ManifestInvalidError(`${path}: ${getErrorMessage(err) ?? "bad digest"}`, {
      cause: err,
    });
  }
}
