/**
 * Registration glue for every schema this package ships.
 * Call once per registry during start-up, before it is sealed.
 */

import { UnsupportedMediaTypeError } from "./errors.js";
import { registerImageIndexSchema } from "./image-index/register.js";
import { MediaTypeImageIndex } from "./image-index/media-types.js";
import { defaultRegistry, type SchemaRegistry } from "./schema-registry.js";

export interface BuiltinSchemaOptions {
  /**
   * Built-in media type that also handles absent or unregistered
   * Content-Type values. Empty means no fallback.
   */
  defaultMediaType?: string;
}

const BUILTIN_MEDIA_TYPES: readonly string[] = [MediaTypeImageIndex];

export function registerBuiltinSchemas(
  registry: SchemaRegistry = defaultRegistry,
  options: BuiltinSchemaOptions = {},
): void {
  const fallback = options.defaultMediaType ?? "";
  if (fallback !== "" && !BUILTIN_MEDIA_TYPES.includes(fallback)) {
    throw new UnsupportedMediaTypeError(fallback);
  }

  registerImageIndexSchema(registry, {
    asDefault: fallback === MediaTypeImageIndex,
  });
}
