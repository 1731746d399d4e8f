#!/usr/bin/env node
/**
 * Entry point: load config, connect to the backend and upload the files named on the command line.
 *
 *   voice-session-core upload <file...>   upload files, one outcome line per file
 *   voice-session-core test-connection    check that the configured server is reachable
 */

import { createSessionCore } from "./core";
import { isServerConfigured, loadConfig, serverUrl } from "./config";
import { logger, logError } from "./logging";
import { logCounters } from "./metrics";
import { WebSocketTransport, testConnection } from "./transport/ws";

async function runTestConnection(): Promise<number> {
  const config = loadConfig();
  const result = await testConnection({
    serverUrl: config.server.url,
    serverPort: String(config.server.port),
    timeoutMs: config.connection.testTimeoutMs,
  });
  console.log(result.message);
  return result.success ? 0 : 1;
}

async function runUpload(files: string[]): Promise<number> {
  const config = loadConfig();
  if (!isServerConfigured(config)) {
    console.error("Server not configured; set SERVER_URL (and SERVER_PORT) in .env.local");
    return 1;
  }
  if (files.length === 0) {
    console.error("No files given");
    return 1;
  }

  const transport = new WebSocketTransport({ url: serverUrl(config) });
  const core = createSessionCore<never>({ config, transport });
  transport.setOnDisconnected(() => {
    logger.warn({ event: "BACKEND_DISCONNECTED" }, "Backend connection lost");
    core.coordinator.dispose("transport disconnected");
  });

  await transport.connect();
  logger.info({ event: "BACKEND_CONNECTED", url: serverUrl(config) }, "Connected to backend");

  const results = await core.uploader.uploadFiles(files);
  for (const item of results) {
    console.log(item.status === "completed" ? `ok      ${item.filename}` : `failed  ${item.filename}: ${item.error ?? "unknown error"}`);
  }
  const lastError = core.uploader.lastError();
  if (lastError) console.error(lastError);

  logCounters();
  await core.dispose();
  transport.disconnect();
  return results.length > 0 && results.every((r) => r.status === "completed") ? 0 : 1;
}

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);
  let code: number;
  switch (command) {
    case "upload":
      code = await runUpload(args);
      break;
    case "test-connection":
      code = await runTestConnection();
      break;
    default:
      console.error("Usage: voice-session-core upload <file...> | test-connection");
      code = 2;
  }
  process.exitCode = code;
}

main().catch((err) => {
  logError(logger, err);
  process.exit(1);
});
