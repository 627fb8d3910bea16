/**
 * ImageIndexBuilder — assemble an index from a config and ordered layers.
 */

import { createDescriptor, type Describable, type Descriptor } from "../descriptor.js";
import { BuildError, UnsupportedDependencyError } from "../errors.js";
import type { ManifestBuilder } from "../manifest.js";
import { DeserializedImageIndex } from "./deserialized.js";
import { MediaTypeImageConfig, isLayerMediaType } from "./media-types.js";
import { SchemaVersion, type ImageIndex } from "./schema.js";

export class ImageIndexBuilder implements ManifestBuilder<DeserializedImageIndex> {
  private config: Descriptor | undefined;
  private readonly layers: Descriptor[] = [];
  private readonly annotations: Record<string, string> = {};

  constructor(config?: Describable) {
    if (config) this.setConfig(config);
  }

  /** Set (or replace) the config. Only the image-config type is accepted. */
  setConfig(config: Describable): void {
    const descriptor = config.descriptor();
    if (descriptor.mediaType !== MediaTypeImageConfig) {
      throw new UnsupportedDependencyError(descriptor.mediaType);
    }
    this.config = createDescriptor(descriptor);
  }

  appendReference(dependency: Describable): void {
    const descriptor = dependency.descriptor();
    if (!isLayerMediaType(descriptor.mediaType)) {
      throw new UnsupportedDependencyError(descriptor.mediaType);
    }
    this.layers.push(createDescriptor(descriptor));
  }

  annotate(key: string, value: string): void {
    this.annotations[key] = value;
  }

  /** Layers appended so far. The config is not part of this list. */
  references(): Descriptor[] {
    return [...this.layers];
  }

  build(): DeserializedImageIndex {
    if (!this.config) {
      throw new BuildError("config descriptor is required");
    }

    const index: ImageIndex = {
      ...SchemaVersion,
      config: this.config,
      layers: [...this.layers],
    };
    if (Object.keys(this.annotations).length > 0) {
      index.annotations = { ...this.annotations };
    }
    return DeserializedImageIndex.fromStruct(index);
  }
}
