/**
 * Error taxonomy for the manifest core.
 *
 * Every core operation throws one of these to its immediate caller. Nothing
 * here is logged or swallowed; mapping to protocol responses happens at the
 * HTTP edge.
 */

export type DistributionErrorCode =
  | "MEDIA_TYPE_PARSE"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "DUPLICATE_REGISTRATION"
  | "REGISTRY_SEALED"
  | "SCHEMA_MISMATCH"
  | "UNINITIALIZED_MANIFEST"
  | "MANIFEST_NOT_FOUND"
  | "MANIFEST_INVALID"
  | "DIGEST_INVALID"
  | "UNSUPPORTED_DEPENDENCY"
  | "BUILD_FAILED"
  | "CANCELLED";

export abstract class DistributionError extends Error {
  abstract readonly code: DistributionErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Content-Type header could not be parsed as a MIME media type. */
export class MediaTypeParseError extends DistributionError {
  readonly code = "MEDIA_TYPE_PARSE";

  constructor(
    readonly header: string,
    reason: string,
  ) {
    super(`invalid media type "${header}": ${reason}`);
  }
}

export class UnsupportedMediaTypeError extends DistributionError {
  readonly code = "UNSUPPORTED_MEDIA_TYPE";

  constructor(readonly mediaType: string) {
    super(
      `unsupported manifest media type and no default available: ${mediaType}`,
    );
  }
}

export class DuplicateRegistrationError extends DistributionError {
  readonly code = "DUPLICATE_REGISTRATION";

  constructor(readonly mediaType: string) {
    super(
      `manifest media type registration would overwrite existing: ${mediaType}`,
    );
  }
}

export class RegistrySealedError extends DistributionError {
  readonly code = "REGISTRY_SEALED";

  constructor(readonly mediaType: string) {
    super(`schema registry is sealed, cannot register ${mediaType}`);
  }
}

export class SchemaMismatchError extends DistributionError {
  readonly code = "SCHEMA_MISMATCH";

  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`mediaType in manifest should be '${expected}' not '${actual}'`);
  }
}

export class UninitializedManifestError extends DistributionError {
  readonly code = "UNINITIALIZED_MANIFEST";

  constructor(kind: string) {
    super(`JSON representation not initialized in ${kind}`);
  }
}

export class ManifestNotFoundError extends DistributionError {
  readonly code = "MANIFEST_NOT_FOUND";

  constructor(readonly digest: string) {
    super(`manifest unknown: ${digest}`);
  }
}

export class ManifestInvalidError extends DistributionError {
  readonly code = "MANIFEST_INVALID";

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`manifest invalid: ${reason}`, options);
  }
}

export class DigestInvalidError extends DistributionError {
  readonly code = "DIGEST_INVALID";

  constructor(
    readonly digest: string,
    reason: string,
  ) {
    super(`invalid digest "${digest}": ${reason}`);
  }
}

/** A builder refused a reference whose media type it cannot hold. */
export class UnsupportedDependencyError extends DistributionError {
  readonly code = "UNSUPPORTED_DEPENDENCY";

  constructor(readonly mediaType: string) {
    super(`unsupported dependency media type: ${mediaType}`);
  }
}

export class BuildError extends DistributionError {
  readonly code = "BUILD_FAILED";

  constructor(reason: string) {
    super(`cannot build manifest: ${reason}`);
  }
}

export class CancelledError extends DistributionError {
  readonly code = "CANCELLED";

  constructor(options?: { cause?: unknown }) {
    super("operation cancelled", options);
  }
}

function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object";
}

export function getErrorMessage(error: unknown): string | undefined {
  if (!error) {
    return;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (
    isObject(error) &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return;
}
