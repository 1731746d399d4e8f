/**
 * Env-based configuration for the session coordination core.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as os from "os";
import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export const DEFAULT_UPLOAD_TIMEOUT_MS = 30_000;
export const DEFAULT_CONNECTION_TEST_TIMEOUT_MS = 5_000;
export const DEFAULT_MAX_UPLOAD_BYTES = 100 * 1024 * 1024;
export const DEFAULT_SERVER_PORT = 8080;

export interface CoreConfig {
  /** Backend WebSocket server */
  server: {
    /** Host name or address; empty string = not configured. */
    url: string;
    port: number;
  };

  /** Resource uploads (acknowledged out of band) */
  uploads: {
    /** How long to wait for a file_uploaded acknowledgment (ms). */
    timeoutMs: number;
    /** Largest file accepted before a request is registered (bytes). */
    maxBytes: number;
    /** Backend directory the files land in; empty = ~/Downloads. */
    storageLocation: string;
  };

  /** Settings-screen connection test */
  connection: {
    testTimeoutMs: number;
  };

  /** Priority queue order keys and persistence */
  queue: {
    unitStep: number;
    origin: number;
    /** Adjacent keys closer than this trigger renormalization. */
    minGap: number;
    /** JSON file for the queue store; unset = in-memory store. */
    storePath?: string;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

/** Positive integer from env, or the default when unset/invalid. */
function getPositiveInt(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n <= 0 ? defaultValue : n;
}

function getFiniteNumber(key: string, defaultValue: number, opts: { positive?: boolean } = {}): number {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  const n = Number(v);
  if (!Number.isFinite(n)) return defaultValue;
  if (opts.positive && n <= 0) return defaultValue;
  return n;
}

/**
 * Build config from environment variables.
 * SERVER_URL/SERVER_PORT select the backend; UPLOAD_TIMEOUT_MS, MAX_UPLOAD_BYTES and
 * CONNECTION_TEST_TIMEOUT_MS bound uploads; ORDER_KEY_* tune the queue.
 */
export function loadConfig(): CoreConfig {
  return {
    server: {
      url: getEnv("SERVER_URL") ?? "",
      port: getPositiveInt("SERVER_PORT", DEFAULT_SERVER_PORT),
    },
    uploads: {
      timeoutMs: getPositiveInt("UPLOAD_TIMEOUT_MS", DEFAULT_UPLOAD_TIMEOUT_MS),
      maxBytes: getPositiveInt("MAX_UPLOAD_BYTES", DEFAULT_MAX_UPLOAD_BYTES),
      storageLocation: getEnv("RESOURCE_STORAGE_LOCATION") ?? "",
    },
    connection: {
      testTimeoutMs: getPositiveInt("CONNECTION_TEST_TIMEOUT_MS", DEFAULT_CONNECTION_TEST_TIMEOUT_MS),
    },
    queue: {
      unitStep: getFiniteNumber("ORDER_KEY_UNIT_STEP", 1, { positive: true }),
      origin: getFiniteNumber("ORDER_KEY_ORIGIN", 0),
      minGap: getFiniteNumber("ORDER_KEY_MIN_GAP", 1e-9, { positive: true }),
      storePath: getEnv("QUEUE_STORE_PATH"),
    },
  };
}

/** True once a server address has been entered. */
export function isServerConfigured(config: CoreConfig): boolean {
  return config.server.url.trim().length > 0;
}

export function serverUrl(config: CoreConfig): string {
  return `ws://${config.server.url.trim()}:${config.server.port}`;
}

/** Configured storage location, or the user's Downloads folder when empty. */
export function effectiveStorageLocation(config: CoreConfig): string {
  const configured = config.uploads.storageLocation.trim();
  if (configured) return configured;
  return path.join(os.homedir(), "Downloads");
}
