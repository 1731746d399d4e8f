import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { InMemoryQueueStore, JsonFileQueueStore, parseQueueFile } from "../../../src/queue/stores";
import type { QueueEntry } from "../../../src/queue/types";

function entry(sessionId: string, orderKey: number): QueueEntry {
  return { sessionId, priorityBucket: 10, orderKey, stableId: `id-${sessionId}`, queuedAt: "2026-02-01T08:00:00.000Z" };
}

describe("InMemoryQueueStore", () => {
  it("stores copies of entries", async () => {
    const store = new InMemoryQueueStore();
    const e = entry("a", 1);
    await store.writeQueueEntry(e);
    e.orderKey = 99;
    await expect(store.fetchQueueEntries()).resolves.toEqual([entry("a", 1)]);
  });

  it("fails only the requested operation", async () => {
    const store = new InMemoryQueueStore();
    store.failNextWrites(1, "nope", "delete");
    await store.writeQueueEntry(entry("a", 1));
    await expect(store.deleteQueueEntry("a")).rejects.toThrow("nope");
    await store.deleteQueueEntry("a");
    await expect(store.fetchQueueEntries()).resolves.toEqual([]);
    expect(store.calls).toEqual({ write: 1, writeBatch: 0, delete: 1 });
  });
});

describe("JsonFileQueueStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "queue-store-test-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    const store = new JsonFileQueueStore({ filePath: path.join(dir, "queue.json") });
    await expect(store.fetchQueueEntries()).resolves.toEqual([]);
  });

  it("writes through and reads back", async () => {
    const filePath = path.join(dir, "nested", "queue.json");
    const store = new JsonFileQueueStore({ filePath });
    await store.writeQueueEntry(entry("a", 1));
    await store.writeQueueEntries([entry("b", 2), entry("a", 3)]);
    await store.deleteQueueEntry("missing");
    await store.deleteQueueEntry("b");

    const reopened = new JsonFileQueueStore({ filePath });
    await expect(reopened.fetchQueueEntries()).resolves.toEqual([entry("a", 3)]);
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(["queue.json"]);
  });

  it("treats an unreadable file as empty", async () => {
    const filePath = path.join(dir, "queue.json");
    fs.writeFileSync(filePath, "{not json");
    const store = new JsonFileQueueStore({ filePath });
    await expect(store.fetchQueueEntries()).resolves.toEqual([]);
  });
});

describe("parseQueueFile", () => {
  it("skips malformed rows and fills optional fields", () => {
    const text = JSON.stringify({
      entries: [{ sessionId: "a", priorityBucket: 1, orderKey: 2 }, { sessionId: 5 }, "x"],
    });
    expect(parseQueueFile(text)).toEqual([
      { sessionId: "a", priorityBucket: 1, orderKey: 2, stableId: "a", queuedAt: "1970-01-01T00:00:00.000Z" },
    ]);
  });

  it("rejects files without an entries array", () => {
    expect(parseQueueFile("[]")).toBeNull();
    expect(parseQueueFile('{"entries":{}}')).toBeNull();
  });
});
