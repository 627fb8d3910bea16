/**
 * Schema registry — media type → reconstruction function.
 *
 * Each schema registers itself once at start-up; the HTTP and storage
 * collaborators then revive typed manifests from (Content-Type, bytes).
 * Registration under "" installs the fallback for absent or unknown types.
 *
 * Lifecycle: register during start-up, seal(), serve. A sealed registry is
 * a map that is never written again, so lookups need no locking.
 */

import type { Descriptor } from "./descriptor.js";
import type { Manifest } from "./manifest.js";
import {
  DuplicateRegistrationError,
  RegistrySealedError,
  UnsupportedMediaTypeError,
} from "./errors.js";
import { parseMediaType } from "./media-type.js";

export interface UnmarshalResult<M extends Manifest = Manifest> {
  manifest: M;
  /** Digest and size of exactly the bytes that were unmarshalled. */
  descriptor: Descriptor;
}

export type UnmarshalFunc = (bytes: Uint8Array) => UnmarshalResult;

/** Key of the fallback registration. */
export const DEFAULT_MEDIA_TYPE = "";

export class SchemaRegistry {
  private readonly mappings = new Map<string, UnmarshalFunc>();
  private isSealed = false;

  /**
   * Bind `mediaType` to `unmarshal`. The key is normalised the way lookups
   * parse Content-Type, so "Application/X; v=1" binds "application/x".
   * An existing binding is never replaced.
   */
  register(mediaType: string, unmarshal: UnmarshalFunc): void {
    if (this.isSealed) {
      throw new RegistrySealedError(mediaType);
    }
    const key = parseMediaType(mediaType).mediaType;
    if (this.mappings.has(key)) {
      throw new DuplicateRegistrationError(key);
    }
    this.mappings.set(key, unmarshal);
  }

  /**
   * Parse the header, look up the exact media type, fall back to the ""
   * registration, else UnsupportedMediaTypeError.
   */
  unmarshal(contentType: string, bytes: Uint8Array): UnmarshalResult {
    const { mediaType } = parseMediaType(contentType);

    const unmarshal =
      this.mappings.get(mediaType) ?? this.mappings.get(DEFAULT_MEDIA_TYPE);
    if (!unmarshal) {
      throw new UnsupportedMediaTypeError(mediaType);
    }
    return unmarshal(bytes);
  }

  has(mediaType: string): boolean {
    return this.mappings.has(parseMediaType(mediaType).mediaType);
  }

  /** Registered media types, excluding the fallback. Treat as a set. */
  mediaTypes(): string[] {
    return [...this.mappings.keys()].filter((t) => t !== DEFAULT_MEDIA_TYPE);
  }

  /** Refuse further registration. Idempotent. */
  seal(): void {
    this.isSealed = true;
  }

  get sealed(): boolean {
    return this.isSealed;
  }
}

// ── Process-wide table ─────────────────────────────────────────────

/** Shared registry for collaborators that do not inject their own. */
export const defaultRegistry = new SchemaRegistry();

export function registerManifestSchema(
  mediaType: string,
  unmarshal: UnmarshalFunc,
): void {
  defaultRegistry.register(mediaType, unmarshal);
}

export function unmarshalManifest(
  contentType: string,
  bytes: Uint8Array,
): UnmarshalResult {
  return defaultRegistry.unmarshal(contentType, bytes);
}

export function manifestMediaTypes(): string[] {
  return defaultRegistry.mediaTypes();
}
