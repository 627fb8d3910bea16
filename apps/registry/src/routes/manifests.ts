/**
 * Manifest routes — content-addressed, keyed by digest.
 *
 *   PUT    /v2/manifests/:digest  — ingest (Content-Type selects the schema)
 *   GET    /v2/manifests/:digest  — stored bytes verbatim
 *   HEAD   /v2/manifests/:digest  — headers only
 *   DELETE /v2/manifests/:digest  — remove the entry, referenced content stays
 *   GET    /v2/manifests          — enumerate stored digests
 *
 * Routes never parse JSON themselves: bodies go to the schema registry as
 * raw bytes so the digest is computed over exactly what the client sent.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import {
  DigestInvalidError,
  parseDigest,
  type Digest,
  type SchemaRegistry,
} from "@keel/distribution";
import type { ManifestStore } from "../storage/index.js";

export interface ManifestRouteContext {
  store: ManifestStore;
  registry: SchemaRegistry;
  /** Deadline for the storage work of one request (ms). */
  requestTimeoutMs: number;
}

type DigestParams = { Params: { digest: string } };

/**
 * Signal that fires when the client goes away before the response is done,
 * or when the request deadline passes.
 */
function requestSignal(reply: FastifyReply, timeoutMs: number): AbortSignal {
  const disconnected = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) disconnected.abort();
  });
  return AbortSignal.any([disconnected.signal, AbortSignal.timeout(timeoutMs)]);
}

function digestParam(request: FastifyRequest<DigestParams>): Digest {
  const { digest } = request.params;
  parseDigest(digest);
  return digest;
}

function bodyBytes(body: unknown): Uint8Array {
  return Buffer.isBuffer(body) ? new Uint8Array(body) : new Uint8Array(0);
}

export function manifestRoutes(app: FastifyInstance, ctx: ManifestRouteContext): void {
  /**
   * PUT /v2/manifests/:digest — the URL digest must equal the digest of the
   * body; the stored digest is always the computed one.
   */
  app.put<DigestParams>("/v2/manifests/:digest", async (request, reply) => {
    const claimed = digestParam(request);
    const signal = requestSignal(reply, ctx.requestTimeoutMs);

    const { manifest, descriptor } = ctx.registry.unmarshal(
      request.headers["content-type"] ?? "",
      bodyBytes(request.body),
    );
    if (descriptor.digest !== claimed) {
      throw new DigestInvalidError(claimed, `content hashes to ${descriptor.digest}`);
    }

    const digest = await ctx.store.put(manifest, { signal });
    request.log.info(
      { digest, mediaType: descriptor.mediaType, size: descriptor.size },
      "manifest stored",
    );

    return reply
      .status(201)
      .header("Location", `/v2/manifests/${digest}`)
      .header("Docker-Content-Digest", digest)
      .send();
  });

  app.get<DigestParams>("/v2/manifests/:digest", async (request, reply) => {
    const digest = digestParam(request);
    const manifest = await ctx.store.get(digest, {
      signal: requestSignal(reply, ctx.requestTimeoutMs),
    });
    const { mediaType, payload } = manifest.payload();

    return reply
      .status(200)
      .header("Content-Type", mediaType)
      .header("Docker-Content-Digest", digest)
      .send(Buffer.from(payload));
  });

  app.head<DigestParams>("/v2/manifests/:digest", async (request, reply) => {
    const digest = digestParam(request);
    const manifest = await ctx.store.get(digest, {
      signal: requestSignal(reply, ctx.requestTimeoutMs),
    });
    const { mediaType, payload } = manifest.payload();

    return reply
      .status(200)
      .header("Content-Type", mediaType)
      .header("Content-Length", payload.byteLength)
      .header("Docker-Content-Digest", digest)
      .send();
  });

  app.delete<DigestParams>("/v2/manifests/:digest", async (request, reply) => {
    const digest = digestParam(request);
    await ctx.store.delete(digest, { signal: requestSignal(reply, ctx.requestTimeoutMs) });
    request.log.info({ digest }, "manifest deleted");
    return reply.status(202).send();
  });

  app.get("/v2/manifests", async (_request, reply) => {
    const digests: Digest[] = [];
    await ctx.store.enumerate(
      (digest) => {
        digests.push(digest);
      },
      { signal: requestSignal(reply, ctx.requestTimeoutMs) },
    );
    return reply.send({ digests });
  });
}
