/**
 * Health + API version routes.
 *
 * GET /health — liveness, plus the manifest media types this process accepts
 * GET /v2/    — distribution API version check
 */

import type { FastifyInstance } from "fastify";
import type { SchemaRegistry } from "@keel/distribution";

export function healthRoutes(app: FastifyInstance, registry: SchemaRegistry): void {
  app.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      mediaTypes: registry.mediaTypes().sort(),
      timestamp: Date.now(),
    });
  });

  app.get("/v2/", async (_request, reply) => {
    return reply.header("Docker-Distribution-API-Version", "registry/2.0").send({});
  });
}
