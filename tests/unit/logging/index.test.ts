import { componentLogger, createLogger, logAckSettled, logError, logQueueWrite, logger } from "../../../src/logging";

describe("logging", () => {
  it("is silent under Jest unless LOG_LEVEL is set", () => {
    expect(logger.level).toBe(process.env.LOG_LEVEL ?? "silent");
  });

  it("tags component loggers", () => {
    const log = componentLogger("window-registry", createLogger({ level: "silent", pretty: false }));
    expect(log.bindings()).toEqual({ component: "window-registry" });
  });

  it("logs errors with context", () => {
    const log = createLogger({ level: "silent", pretty: false });
    const spy = jest.spyOn(log, "error");
    const err = new Error("boom");
    logError(log, err, { event: "TEST_EVENT" });
    expect(spy).toHaveBeenCalledWith({ err: "boom", stack: err.stack, event: "TEST_EVENT" }, "Error");
  });

  it("logs acknowledged requests at debug and other endings at warn", () => {
    const log = createLogger({ level: "silent", pretty: false });
    const debug = jest.spyOn(log, "debug");
    const warn = jest.spyOn(log, "warn");
    logAckSettled(log, "req-1", "acknowledged", { waitedMs: 12 });
    logAckSettled(log, "req-2", "timeout");
    expect(debug).toHaveBeenCalledWith({ event: "ACK_SETTLED", key: "req-1", status: "acknowledged", waitedMs: 12 }, "Request acknowledged");
    expect(warn).toHaveBeenCalledWith({ event: "ACK_SETTLED", key: "req-2", status: "timeout" }, "Request ended: timeout");
  });

  it("logs queue writes", () => {
    const log = createLogger({ level: "silent", pretty: false });
    const info = jest.spyOn(log, "info");
    logQueueWrite(log, "remove", "session-9");
    expect(info).toHaveBeenCalledWith({ event: "QUEUE_WRITE", op: "remove", sessionId: "session-9" }, "Queue remove");
  });
});
