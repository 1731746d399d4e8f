/**
 * Structured logging for the session coordination core.
 * Logs ack resolution, window claims, queue writes and errors with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error | silent (default: info; silent under Jest)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

export type Logger = pino.Logger;

function parseLevel(raw: string | undefined): LogLevel | undefined {
  const v = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v);
}

const isTest = process.env.NODE_ENV === "test";

const defaultConfig: LoggerConfig = {
  level: parseLevel(process.env.LOG_LEVEL) ?? (isTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !isTest,
};

export function createLogger(config: LoggerConfig = {}): Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Child logger tagged with the owning component. */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

/** Log how a pending request finished. Anything but an acknowledgment is a warning. */
export function logAckSettled(log: Logger, key: string, status: string, fields: Record<string, unknown> = {}): void {
  const payload = { event: "ACK_SETTLED", key, status, ...fields };
  if (status === "acknowledged") log.debug(payload, "Request acknowledged");
  else log.warn(payload, `Request ended: ${status}`);
}

/** Log a queue mutation that reached the store. */
export function logQueueWrite(log: Logger, op: string, sessionId: string | undefined, fields: Record<string, unknown> = {}): void {
  log.info({ event: "QUEUE_WRITE", op, sessionId, ...fields }, `Queue ${op}`);
}

/** Log error. */
export function logError(log: Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
