/**
 * Backend WebSocket transport.
 * Connects to ws://<server>:<port>, sends JSON frames, fans inbound JSON frames out to handlers.
 * Also hosts the settings-screen connection test.
 */

import WebSocket from "ws";
import type { IncomingMessage, MessageHandler, OutgoingMessage, Transport } from "./types";
import { toIncomingMessage } from "./types";
import { DEFAULT_CONNECTION_TEST_TIMEOUT_MS } from "../config";
import { errorMessage } from "../errors";
import { logger } from "../logging";

export interface WebSocketTransportConfig {
  url: string;
}

/** Callback when WS disconnects (close or error after being connected). */
export type OnDisconnectedCallback = () => void;

export class WebSocketTransport implements Transport {
  private ws: WebSocket | null = null;
  private readonly config: WebSocketTransportConfig;
  private handlers: MessageHandler[] = [];
  private onDisconnectedCb: OnDisconnectedCallback | null = null;

  constructor(config: WebSocketTransportConfig) {
    this.config = config;
  }

  /** Set callback to be invoked when the WebSocket disconnects (close or error). */
  setOnDisconnected(cb: OnDisconnectedCallback | null): void {
    this.onDisconnectedCb = cb;
  }

  onMessage(handler: MessageHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  connect(): Promise<void> {
    logger.debug({ event: "WS_CONNECT", url: this.config.url }, "WebSocket connecting");
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.config.url);
      this.ws = ws;
      const triggerDisconnected = (): void => {
        this.ws = null;
        this.onDisconnectedCb?.();
      };
      ws.on("open", () => {
        ws.on("close", (code, reason) => {
          logger.warn({ event: "WS_CLOSED", code, reason: reason.toString() }, "WebSocket closed");
          triggerDisconnected();
        });
        ws.on("error", (err) => {
          logger.warn({ event: "WS_ERROR_EVENT", err: err.message }, "WebSocket error");
          triggerDisconnected();
        });
        resolve();
      });
      ws.on("error", (err) => {
        if (this.ws === ws) this.ws = null;
        reject(err);
      });
      ws.on("message", (data) => {
        const msg = parseFrame(rawDataToString(data));
        if (!msg) {
          logger.debug({ event: "WS_FRAME_IGNORED" }, "Ignoring non-JSON or untyped frame");
          return;
        }
        logger.debug({ event: "WS_MESSAGE", type: msg.type }, "WebSocket message");
        this.handlers.forEach((h) => h(msg));
      });
    });
  }

  /** Disconnect and clear socket (e.g. before reconnect). */
  disconnect(): void {
    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws.close();
      this.ws = null;
    }
  }

  send(message: OutgoingMessage): boolean {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      logger.debug({ event: "WS_SEND_SKIP", reason: "not connected", type: message.type }, "WebSocket send skipped (not connected)");
      return false;
    }
    // Upload payloads are large; log the type only.
    logger.debug({ event: "WS_SEND", type: message.type }, "WebSocket send");
    this.ws.send(JSON.stringify(message));
    return true;
  }

  isConnected(): boolean {
    return this.ws != null && this.ws.readyState === WebSocket.OPEN;
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/** Parse one text frame; null when it is not a typed JSON object. */
export function parseFrame(text: string): IncomingMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  return toIncomingMessage(raw);
}

export interface ConnectionTestInput {
  serverUrl: string;
  serverPort: string;
  timeoutMs?: number;
}

export interface ConnectionTestResult {
  success: boolean;
  message: string;
}

/** Validate address/port as typed in settings. Returns an error message, or null when valid. */
export function validateServerInput(serverUrl: string, serverPort: string): string | null {
  if (!serverUrl.trim()) return "Server address is required";
  const portText = serverPort.trim();
  const port = Number(portText);
  if (!/^\d+$/.test(portText) || !Number.isInteger(port) || port < 1 || port > 65535) {
    return "Valid port number is required";
  }
  return null;
}

/**
 * Try to open a WebSocket to the configured server and close it again.
 * Resolves (never rejects) within timeoutMs.
 */
export function testConnection(input: ConnectionTestInput): Promise<ConnectionTestResult> {
  const invalid = validateServerInput(input.serverUrl, input.serverPort);
  if (invalid) return Promise.resolve({ success: false, message: invalid });

  const url = `ws://${input.serverUrl.trim()}:${input.serverPort.trim()}`;
  const timeoutMs = input.timeoutMs ?? DEFAULT_CONNECTION_TEST_TIMEOUT_MS;

  return new Promise((resolve) => {
    let done = false;
    let timer: ReturnType<typeof setTimeout> | null = null;
    let ws: WebSocket;
    try {
      ws = new WebSocket(url, { handshakeTimeout: timeoutMs });
    } catch (err) {
      resolve({ success: false, message: `Connection failed: ${errorMessage(err)}` });
      return;
    }
    const socket = ws;
    const finish = (result: ConnectionTestResult): void => {
      if (done) return;
      done = true;
      if (timer) clearTimeout(timer);
      socket.removeAllListeners();
      // terminate() during the handshake emits one more error
      socket.on("error", () => undefined);
      socket.terminate();
      logger.info({ event: "CONNECTION_TEST", url, success: result.success }, result.message);
      resolve(result);
    };
    timer = setTimeout(() => finish({ success: false, message: `Connection timed out after ${timeoutMs}ms` }), timeoutMs);
    socket.on("open", () => finish({ success: true, message: `Connected to ${url}` }));
    socket.on("error", (err) => finish({ success: false, message: `Connection failed: ${errorMessage(err)}` }));
  });
}
