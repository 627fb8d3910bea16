/**
 * Registry configuration.
 * All env access centralized here — no direct process.env elsewhere.
 */

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export type StorageDriver = "memory" | "filesystem";

function storageDriver(value: string): StorageDriver {
  if (value === "memory" || value === "filesystem") return value;
  throw new Error(`Unknown STORAGE_DRIVER: ${value} (expected memory|filesystem)`);
}

export const config = {
  port: parseInt(env("REGISTRY_PORT", "5000"), 10),
  host: env("REGISTRY_HOST", "0.0.0.0"),
  storageDriver: storageDriver(env("STORAGE_DRIVER", "filesystem")),
  /** Root directory for the filesystem driver. */
  storagePath: env("STORAGE_PATH", "./data/manifests"),
  /** Deadline for a single request's storage work (ms). */
  requestTimeoutMs: parseInt(env("REQUEST_TIMEOUT_MS", "30000"), 10),
  /** Largest manifest body accepted (bytes). Default 4 MiB. */
  bodyLimitBytes: parseInt(env("BODY_LIMIT_BYTES", String(4 * 1024 * 1024)), 10),
  /**
   * Built-in media type used when Content-Type is absent or unregistered.
   * Empty = no fallback, such requests get 415.
   */
  defaultMediaType: env("DEFAULT_MEDIA_TYPE", ""),
  logLevel: env("LOG_LEVEL", "info"),
} as const;

export type RegistryConfig = typeof config;
