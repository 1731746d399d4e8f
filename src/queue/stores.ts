/**
 * QueueStore implementations: in-memory (default, and the test stand-in) and a JSON file.
 */

import * as fs from "fs";
import * as path from "path";
import type { QueueEntry, QueueStore } from "./types";
import { errorMessage } from "../errors";
import type { Logger } from "../logging";
import { componentLogger } from "../logging";

export type StoreOperation = "write" | "writeBatch" | "delete";

export class InMemoryQueueStore implements QueueStore {
  private readonly rows = new Map<string, QueueEntry>();
  private failuresLeft = 0;
  private failureMessage = "store unavailable";
  private failureOnly: StoreOperation | null = null;
  /** Successful write calls, by operation. */
  readonly calls: Record<StoreOperation, number> = { write: 0, writeBatch: 0, delete: 0 };

  constructor(initial: QueueEntry[] = []) {
    for (const entry of initial) this.rows.set(entry.sessionId, { ...entry });
  }

  /** Make the next `count` write/delete calls reject; `only` restricts this to one operation. */
  failNextWrites(count = 1, message = "store unavailable", only: StoreOperation | null = null): void {
    this.failuresLeft = count;
    this.failureMessage = message;
    this.failureOnly = only;
  }

  async fetchQueueEntries(): Promise<QueueEntry[]> {
    return [...this.rows.values()].map((e) => ({ ...e }));
  }

  async writeQueueEntry(entry: QueueEntry): Promise<void> {
    this.maybeFail("write");
    this.rows.set(entry.sessionId, { ...entry });
    this.calls.write += 1;
  }

  async writeQueueEntries(entries: QueueEntry[]): Promise<void> {
    this.maybeFail("writeBatch");
    for (const entry of entries) this.rows.set(entry.sessionId, { ...entry });
    this.calls.writeBatch += 1;
  }

  async deleteQueueEntry(sessionId: string): Promise<void> {
    this.maybeFail("delete");
    this.rows.delete(sessionId);
    this.calls.delete += 1;
  }

  totalWrites(): number {
    return this.calls.write + this.calls.writeBatch + this.calls.delete;
  }

  private maybeFail(op: StoreOperation): void {
    if (this.failuresLeft <= 0) return;
    if (this.failureOnly !== null && this.failureOnly !== op) return;
    this.failuresLeft -= 1;
    throw new Error(this.failureMessage);
  }
}

export interface JsonFileQueueStoreConfig {
  filePath: string;
  logger?: Logger;
}

/**
 * Write-through JSON file: `{ "entries": [QueueEntry, ...] }`.
 * Each write rewrites the whole file through a temp file and rename.
 */
export class JsonFileQueueStore implements QueueStore {
  private readonly filePath: string;
  private readonly log: Logger;

  constructor(config: JsonFileQueueStoreConfig) {
    this.filePath = config.filePath;
    this.log = config.logger ?? componentLogger("queue-store");
  }

  async fetchQueueEntries(): Promise<QueueEntry[]> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const entries = parseQueueFile(text);
    if (entries === null) {
      this.log.warn({ event: "QUEUE_STORE_UNREADABLE", filePath: this.filePath }, "Queue file is not valid; starting empty");
      return [];
    }
    return entries;
  }

  async writeQueueEntry(entry: QueueEntry): Promise<void> {
    const rows = await this.readRows();
    rows.set(entry.sessionId, entry);
    await this.persist(rows);
  }

  async writeQueueEntries(entries: QueueEntry[]): Promise<void> {
    const rows = await this.readRows();
    for (const entry of entries) rows.set(entry.sessionId, entry);
    await this.persist(rows);
  }

  async deleteQueueEntry(sessionId: string): Promise<void> {
    const rows = await this.readRows();
    if (!rows.delete(sessionId)) return;
    await this.persist(rows);
  }

  private async readRows(): Promise<Map<string, QueueEntry>> {
    const entries = await this.fetchQueueEntries();
    return new Map(entries.map((e) => [e.sessionId, e]));
  }

  private async persist(rows: Map<string, QueueEntry>): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    const body = JSON.stringify({ entries: [...rows.values()] }, null, 2);
    await fs.promises.writeFile(tmp, body, "utf8");
    try {
      await fs.promises.rename(tmp, this.filePath);
    } catch (err) {
      await fs.promises.rm(tmp, { force: true });
      this.log.error({ event: "QUEUE_STORE_WRITE_FAILED", filePath: this.filePath, err: errorMessage(err) }, "Queue file write failed");
      throw err;
    }
    this.log.debug({ event: "QUEUE_STORE_WRITTEN", filePath: this.filePath, count: rows.size }, "Queue file written");
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function toQueueEntry(raw: unknown): QueueEntry | null {
  if (raw == null || typeof raw !== "object") return null;
  if (!("sessionId" in raw) || typeof raw.sessionId !== "string") return null;
  if (!("priorityBucket" in raw) || typeof raw.priorityBucket !== "number") return null;
  if (!("orderKey" in raw) || typeof raw.orderKey !== "number") return null;
  const stableId = "stableId" in raw && typeof raw.stableId === "string" ? raw.stableId : raw.sessionId;
  const queuedAt = "queuedAt" in raw && typeof raw.queuedAt === "string" ? raw.queuedAt : new Date(0).toISOString();
  return {
    sessionId: raw.sessionId,
    priorityBucket: raw.priorityBucket,
    orderKey: raw.orderKey,
    stableId,
    queuedAt,
  };
}

/** Parse the queue file; null when it is not `{ entries: [...] }`. Malformed rows are skipped. */
export function parseQueueFile(text: string): QueueEntry[] | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  if (raw == null || typeof raw !== "object" || !("entries" in raw) || !Array.isArray(raw.entries)) return null;
  const out: QueueEntry[] = [];
  for (const row of raw.entries) {
    const entry = toQueueEntry(row);
    if (entry) out.push(entry);
  }
  return out;
}
