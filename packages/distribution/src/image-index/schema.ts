/**
 * ImageIndexV1 — wire structure of the image index.
 *
 * Extra fields on the wire are tolerated: they survive in the canonical
 * bytes even though the structured view ignores them. WireImageIndex is what
 * decoding accepts; missing or null fields are zero-filled into ImageIndex.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Descriptor, Nullable, WireDescriptor } from "../descriptor.js";
import { MediaTypeImageIndex } from "./media-types.js";

export const ImageIndex = Type.Object({
  schemaVersion: Type.Integer(),
  mediaType: Type.String(),
  config: Type.Optional(Descriptor),
  layers: Type.Array(Descriptor),
  annotations: Type.Optional(Type.Record(Type.String(), Type.String())),
});

export type ImageIndex = Static<typeof ImageIndex>;

export const WireImageIndex = Type.Object({
  schemaVersion: Nullable(Type.Integer()),
  mediaType: Nullable(Type.String()),
  config: Nullable(WireDescriptor),
  layers: Nullable(Type.Array(WireDescriptor)),
  annotations: Nullable(Type.Record(Type.String(), Type.String())),
});

export type WireImageIndex = Static<typeof WireImageIndex>;

/** Version marker every index produced here carries. */
export const SchemaVersion = {
  schemaVersion: 1,
  mediaType: MediaTypeImageIndex,
} as const;
