import { WebSocketTransport, parseFrame, testConnection, validateServerInput } from "../../../src/transport/ws";

describe("parseFrame", () => {
  it("parses typed JSON frames", () => {
    expect(parseFrame('{"type":"file_uploaded","filename":"a.txt"}')).toEqual({ type: "file_uploaded", filename: "a.txt" });
  });

  it("returns null for non-JSON or untyped frames", () => {
    expect(parseFrame("not json")).toBeNull();
    expect(parseFrame('{"filename":"a.txt"}')).toBeNull();
    expect(parseFrame("[]")).toBeNull();
  });
});

describe("validateServerInput", () => {
  it("requires an address", () => {
    expect(validateServerInput("  ", "8080")).toBe("Server address is required");
  });

  it("requires a port in range", () => {
    expect(validateServerInput("localhost", "")).toBe("Valid port number is required");
    expect(validateServerInput("localhost", "abc")).toBe("Valid port number is required");
    expect(validateServerInput("localhost", "0")).toBe("Valid port number is required");
    expect(validateServerInput("localhost", "65536")).toBe("Valid port number is required");
    expect(validateServerInput("localhost", "80.5")).toBe("Valid port number is required");
  });

  it("accepts a host and port", () => {
    expect(validateServerInput("192.168.1.10", "8080")).toBeNull();
    expect(validateServerInput("localhost", " 65535 ")).toBeNull();
  });
});

describe("testConnection", () => {
  it("returns the validation message without connecting", async () => {
    await expect(testConnection({ serverUrl: "", serverPort: "8080" })).resolves.toEqual({
      success: false,
      message: "Server address is required",
    });
    await expect(testConnection({ serverUrl: "localhost", serverPort: "x" })).resolves.toEqual({
      success: false,
      message: "Valid port number is required",
    });
  });
});

describe("WebSocketTransport", () => {
  it("reports not connected and refuses to send before connect", () => {
    const transport = new WebSocketTransport({ url: "ws://localhost:8080" });
    expect(transport.isConnected()).toBe(false);
    expect(transport.send({ type: "ping" })).toBe(false);
  });

  it("unsubscribes handlers", () => {
    const transport = new WebSocketTransport({ url: "ws://localhost:8080" });
    const off = transport.onMessage(() => undefined);
    off();
    transport.disconnect();
    expect(transport.isConnected()).toBe(false);
  });
});
