/**
 * Start-up registration of the image-index schema.
 */

import { createDescriptor } from "../descriptor.js";
import { digestFromBytes } from "../digest.js";
import { DuplicateRegistrationError } from "../errors.js";
import {
  defaultRegistry,
  DEFAULT_MEDIA_TYPE,
  type SchemaRegistry,
  type UnmarshalResult,
} from "../schema-registry.js";
import { DeserializedImageIndex } from "./deserialized.js";
import { MediaTypeImageIndex } from "./media-types.js";

/** Revive an index; the descriptor covers exactly `bytes`. */
export function unmarshalImageIndex(
  bytes: Uint8Array,
): UnmarshalResult<DeserializedImageIndex> {
  const manifest = DeserializedImageIndex.fromBytes(bytes);
  return {
    manifest,
    descriptor: createDescriptor({
      mediaType: MediaTypeImageIndex,
      digest: digestFromBytes(bytes),
      size: bytes.byteLength,
    }),
  };
}

export interface RegisterOptions {
  /** Also serve as the fallback for absent or unknown Content-Type. */
  asDefault?: boolean;
}

/**
 * Bind the image-index media type on `registry`. Must run exactly once per
 * registry; a second call throws DuplicateRegistrationError. Either both
 * keys are bound or neither is.
 */
export function registerImageIndexSchema(
  registry: SchemaRegistry = defaultRegistry,
  options: RegisterOptions = {},
): void {
  if (options.asDefault && registry.has(DEFAULT_MEDIA_TYPE)) {
    throw new DuplicateRegistrationError(DEFAULT_MEDIA_TYPE);
  }
  registry.register(MediaTypeImageIndex, unmarshalImageIndex);
  if (options.asDefault) {
    registry.register(DEFAULT_MEDIA_TYPE, unmarshalImageIndex);
  }
}
