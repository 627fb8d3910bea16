/**
 * Shared test data: image indexes built from made-up blobs.
 */

import {
  DeserializedImageIndex,
  ImageIndexBuilder,
  MediaTypeImageConfig,
  MediaTypeLayerGzip,
  SchemaRegistry,
  describable,
  digestFromBytes,
  registerBuiltinSchemas,
} from "@keel/distribution";

const enc = new TextEncoder();

export function blob(mediaType: string, content: string) {
  const bytes = enc.encode(content);
  return describable({ mediaType, digest: digestFromBytes(bytes), size: bytes.byteLength });
}

/** Distinct index per `seed`. */
export function sampleIndex(seed: string): DeserializedImageIndex {
  const builder = new ImageIndexBuilder(blob(MediaTypeImageConfig, `config ${seed}`));
  builder.appendReference(blob(MediaTypeLayerGzip, `layer ${seed}`));
  return builder.build();
}

export function testRegistry(): SchemaRegistry {
  const registry = new SchemaRegistry();
  registerBuiltinSchemas(registry);
  registry.seal();
  return registry;
}
