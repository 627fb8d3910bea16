/**
 * Translate core errors into registry error responses.
 *
 * Body shape: { errors: [{ code, message, detail? }] }
 */

import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import {
  CancelledError,
  DigestInvalidError,
  DistributionError,
  ManifestInvalidError,
  ManifestNotFoundError,
  MediaTypeParseError,
  SchemaMismatchError,
  UnsupportedMediaTypeError,
} from "@keel/distribution";

export type RegistryErrorCode =
  | "MANIFEST_UNKNOWN"
  | "MANIFEST_INVALID"
  | "DIGEST_INVALID"
  | "UNSUPPORTED"
  | "REQUEST_CANCELED"
  | "SIZE_INVALID"
  | "UNKNOWN";

export interface RegistryErrorItem {
  code: RegistryErrorCode;
  message: string;
  detail?: Record<string, unknown>;
}

export interface RegistryErrorResponse {
  errors: RegistryErrorItem[];
}

interface Translated {
  status: number;
  item: RegistryErrorItem;
}

export function translateError(error: Error): Translated {
  const message = error.message;

  if (error instanceof ManifestNotFoundError) {
    return { status: 404, item: { code: "MANIFEST_UNKNOWN", message, detail: { digest: error.digest } } };
  }
  if (error instanceof SchemaMismatchError) {
    return {
      status: 400,
      item: {
        code: "MANIFEST_INVALID",
        message,
        detail: { expected: error.expected, actual: error.actual },
      },
    };
  }
  if (error instanceof ManifestInvalidError) {
    return { status: 400, item: { code: "MANIFEST_INVALID", message } };
  }
  if (error instanceof DigestInvalidError) {
    return { status: 400, item: { code: "DIGEST_INVALID", message, detail: { digest: error.digest } } };
  }
  if (error instanceof UnsupportedMediaTypeError) {
    return { status: 415, item: { code: "UNSUPPORTED", message, detail: { mediaType: error.mediaType } } };
  }
  if (error instanceof MediaTypeParseError) {
    return { status: 415, item: { code: "UNSUPPORTED", message, detail: { header: error.header } } };
  }
  if (error instanceof CancelledError) {
    return { status: 503, item: { code: "REQUEST_CANCELED", message } };
  }
  if (error instanceof DistributionError) {
    return { status: 500, item: { code: "UNKNOWN", message } };
  }

  // Framework errors (body limit, bad headers) carry their own status.
  const statusCode = "statusCode" in error ? error.statusCode : undefined;
  if (typeof statusCode === "number" && statusCode >= 400 && statusCode < 500) {
    return {
      status: statusCode,
      item: { code: statusCode === 413 ? "SIZE_INVALID" : "UNKNOWN", message },
    };
  }
  return { status: 500, item: { code: "UNKNOWN", message: "internal error" } };
}

export function registryErrorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): FastifyReply {
  const { status, item } = translateError(error);
  if (status >= 500) {
    request.log.error({ err: error }, "request failed");
  } else {
    request.log.info({ code: item.code, status }, item.message);
  }
  const body: RegistryErrorResponse = { errors: [item] };
  return reply.status(status).send(body);
}
