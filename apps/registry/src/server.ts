/**
 * Registry server — HTTP origin for content-addressed manifests.
 *
 * Start-up order: register schemas → seal the registry → open storage →
 * register routes → listen. Nothing is served with a partial schema table.
 *
 * Routes:
 *   GET/PUT/HEAD/DELETE /v2/manifests/{digest}
 *   GET /v2/manifests   — enumerate digests
 *   GET /v2/            — API version check
 *   GET /health         — health check + accepted media types
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify from "fastify";
import { SchemaRegistry, registerBuiltinSchemas } from "@keel/distribution";
import { config } from "./config.js";
import { createManifestStore, type ManifestStore } from "./storage/index.js";
import { manifestRoutes } from "./routes/manifests.js";
import { healthRoutes } from "./routes/health.js";
import { registryErrorHandler } from "./routes/errors.js";

export interface RegistryDeps {
  /** Pre-populated registry; built-in schemas are registered when omitted. */
  registry?: SchemaRegistry;
  store?: ManifestStore;
  /** false silences request logging (tests). */
  logger?: boolean;
  requestTimeoutMs?: number;
}

/** Fresh registry holding every built-in schema, sealed. */
export function createSchemaRegistry(defaultMediaType = config.defaultMediaType): SchemaRegistry {
  const registry = new SchemaRegistry();
  registerBuiltinSchemas(registry, { defaultMediaType });
  registry.seal();
  return registry;
}

export async function buildApp(deps?: RegistryDeps) {
  const registry = deps?.registry ?? createSchemaRegistry();
  registry.seal();

  const app = Fastify({
    logger: deps?.logger === false ? false : { level: config.logLevel },
    bodyLimit: config.bodyLimitBytes,
    exposeHeadRoutes: false, // HEAD /v2/manifests/:digest is defined explicitly
  });

  // Every body is raw bytes; the schema registry decides what they mean.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "buffer" }, (_req, body, done) => {
    done(null, body);
  });

  const store =
    deps?.store ??
    (await createManifestStore(
      { driver: config.storageDriver, path: config.storagePath },
      registry,
    ));

  app.setErrorHandler(registryErrorHandler);

  manifestRoutes(app, {
    store,
    registry,
    requestTimeoutMs: deps?.requestTimeoutMs ?? config.requestTimeoutMs,
  });
  healthRoutes(app, registry);

  app.log.info({ mediaTypes: registry.mediaTypes() }, "manifest schemas registered");
  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── registry config ───");
  console.log(`  port:               ${config.port}`);
  console.log(`  storage_driver:     ${config.storageDriver}`);
  console.log(`  storage_path:       ${config.storagePath}`);
  console.log(`  request_timeout_ms: ${config.requestTimeoutMs}`);
  console.log(`  default_media_type: ${config.defaultMediaType || "(none)"}`);
  console.log("───────────────────────");

  const app = await buildApp();
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
