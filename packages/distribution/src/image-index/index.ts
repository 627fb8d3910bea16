export {
  MediaTypeImageIndex,
  MediaTypeImageConfig,
  MediaTypeLayer,
  MediaTypeLayerGzip,
  MediaTypeLayerZstd,
  MediaTypeNondistributableLayer,
  MediaTypeNondistributableLayerGzip,
  MediaTypeNondistributableLayerZstd,
  LAYER_MEDIA_TYPES,
  isLayerMediaType,
} from "./media-types.js";
export { ImageIndex, SchemaVersion, WireImageIndex } from "./schema.js";
export { DeserializedImageIndex } from "./deserialized.js";
export { ImageIndexBuilder } from "./builder.js";
export {
  registerImageIndexSchema,
  unmarshalImageIndex,
  type RegisterOptions,
} from "./register.js";
