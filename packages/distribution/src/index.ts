/**
 * @keel/distribution — manifest model and media-type schema dispatch.
 *
 * No I/O and no logging. Storage and HTTP collaborators depend on this
 * package, never the reverse.
 */

// Digests + canonical encoding
export {
  digestFromBytes,
  parseDigest,
  verifyDigest,
  isDigest,
  isSupportedAlgorithm,
  CANONICAL_ALGORITHM,
  type Digest,
  type DigestAlgorithm,
  type ParsedDigest,
} from "./digest.js";
export { canonicalEncode, orderedDescriptor, sortedRecord, CANONICAL_INDENT } from "./canonical.js";
export { parseMediaType, type ParsedMediaType } from "./media-type.js";

// Descriptors
export {
  Descriptor,
  Platform,
  WireDescriptor,
  WirePlatform,
  createDescriptor,
  descriptorFromWire,
  describable,
  isDescribable,
  descriptorsEqual,
  validateDescriptor,
  type Describable,
} from "./descriptor.js";

// Contracts
export {
  throwIfCancelled,
  validateManifestReferences,
  describeManifest,
  type Manifest,
  type ManifestPayload,
  type ManifestBuilder,
  type ManifestService,
  type ManifestServiceOptions,
  type ManifestEnumerator,
  type ManifestIngester,
} from "./manifest.js";

// Dispatch
export {
  SchemaRegistry,
  defaultRegistry,
  registerManifestSchema,
  unmarshalManifest,
  manifestMediaTypes,
  DEFAULT_MEDIA_TYPE,
  type UnmarshalFunc,
  type UnmarshalResult,
} from "./schema-registry.js";

// Built-in schemas
export * from "./image-index/index.js";
export { registerBuiltinSchemas, type BuiltinSchemaOptions } from "./builtin.js";

// Errors
export * from "./errors.js";
