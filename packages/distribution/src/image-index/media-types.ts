/**
 * Image-index media types.
 *
 * The index itself travels as Content-Type / Accept; config and layer types
 * appear only inside its descriptors.
 */

export const MediaTypeImageIndex = "application/vnd.keel.image.index.v1+json";

export const MediaTypeImageConfig = "application/vnd.keel.image.config.v1+json";

// ── Layers ─────────────────────────────────────────────────────────
export const MediaTypeLayer = "application/vnd.keel.image.layer.v1.tar";
export const MediaTypeLayerGzip = "application/vnd.keel.image.layer.v1.tar+gzip";
export const MediaTypeLayerZstd = "application/vnd.keel.image.layer.v1.tar+zstd";

// Non-distributable layers are referenced but never pushed to a registry.
export const MediaTypeNondistributableLayer =
  "application/vnd.keel.image.layer.nondistributable.v1.tar";
export const MediaTypeNondistributableLayerGzip =
  "application/vnd.keel.image.layer.nondistributable.v1.tar+gzip";
export const MediaTypeNondistributableLayerZstd =
  "application/vnd.keel.image.layer.nondistributable.v1.tar+zstd";

export const LAYER_MEDIA_TYPES: ReadonlySet<string> = new Set([
  MediaTypeLayer,
  MediaTypeLayerGzip,
  MediaTypeLayerZstd,
  MediaTypeNondistributableLayer,
  MediaTypeNondistributableLayerGzip,
  MediaTypeNondistributableLayerZstd,
]);

export function isLayerMediaType(mediaType: string): boolean {
  return LAYER_MEDIA_TYPES.has(mediaType);
}
