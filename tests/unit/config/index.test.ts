/**
 * Unit tests for config loading.
 */

import * as os from "os";
import * as path from "path";
import {
  DEFAULT_CONNECTION_TEST_TIMEOUT_MS,
  DEFAULT_MAX_UPLOAD_BYTES,
  DEFAULT_UPLOAD_TIMEOUT_MS,
  effectiveStorageLocation,
  isServerConfigured,
  loadConfig,
  serverUrl,
} from "../../../src/config";

const KEYS = [
  "SERVER_URL",
  "SERVER_PORT",
  "UPLOAD_TIMEOUT_MS",
  "MAX_UPLOAD_BYTES",
  "RESOURCE_STORAGE_LOCATION",
  "CONNECTION_TEST_TIMEOUT_MS",
  "ORDER_KEY_UNIT_STEP",
  "ORDER_KEY_ORIGIN",
  "ORDER_KEY_MIN_GAP",
  "QUEUE_STORE_PATH",
];

describe("loadConfig", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const k of KEYS) {
      saved[k] = process.env[k];
      delete process.env[k];
    }
  });

  afterEach(() => {
    for (const k of KEYS) {
      const v = saved[k];
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
  });

  it("returns defaults when nothing is set", () => {
    const config = loadConfig();
    expect(config.uploads.timeoutMs).toBe(DEFAULT_UPLOAD_TIMEOUT_MS);
    expect(config.uploads.maxBytes).toBe(DEFAULT_MAX_UPLOAD_BYTES);
    expect(config.uploads.maxBytes).toBe(104857600);
    expect(config.connection.testTimeoutMs).toBe(DEFAULT_CONNECTION_TEST_TIMEOUT_MS);
    expect(config.server).toEqual({ url: "", port: 8080 });
    expect(config.queue).toEqual({ unitStep: 1, origin: 0, minGap: 1e-9, storePath: undefined });
    expect(isServerConfigured(config)).toBe(false);
  });

  it("reads values from the environment", () => {
    process.env.SERVER_URL = " 192.168.1.20 ";
    process.env.SERVER_PORT = "9000";
    process.env.UPLOAD_TIMEOUT_MS = "1500";
    process.env.RESOURCE_STORAGE_LOCATION = "/srv/uploads";
    process.env.ORDER_KEY_ORIGIN = "-10";
    process.env.QUEUE_STORE_PATH = "/var/lib/queue.json";
    const config = loadConfig();
    expect(isServerConfigured(config)).toBe(true);
    expect(serverUrl(config)).toBe("ws://192.168.1.20:9000");
    expect(config.uploads.timeoutMs).toBe(1500);
    expect(effectiveStorageLocation(config)).toBe("/srv/uploads");
    expect(config.queue.origin).toBe(-10);
    expect(config.queue.storePath).toBe("/var/lib/queue.json");
  });

  it("falls back to defaults for invalid numbers", () => {
    process.env.UPLOAD_TIMEOUT_MS = "soon";
    process.env.MAX_UPLOAD_BYTES = "-1";
    process.env.ORDER_KEY_UNIT_STEP = "0";
    process.env.ORDER_KEY_MIN_GAP = "NaN";
    const config = loadConfig();
    expect(config.uploads.timeoutMs).toBe(DEFAULT_UPLOAD_TIMEOUT_MS);
    expect(config.uploads.maxBytes).toBe(DEFAULT_MAX_UPLOAD_BYTES);
    expect(config.queue.unitStep).toBe(1);
    expect(config.queue.minGap).toBe(1e-9);
  });

  it("defaults the storage location to Downloads", () => {
    expect(effectiveStorageLocation(loadConfig())).toBe(path.join(os.homedir(), "Downloads"));
  });
});
