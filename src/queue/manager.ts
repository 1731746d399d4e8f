import * as crypto from "crypto";
import { SerialExecutor } from "../common/serial";
import { StoreWriteError, errorMessage } from "../errors";
import type { Logger } from "../logging";
import { componentLogger, logQueueWrite } from "../logging";
import { incrementCounter } from "../metrics";
import {
  computeInsertionKey,
  isStrictlyBetween,
  needsRenormalization,
  renormalizedKeys,
  sortQueueEntries,
  tailKey,
} from "./order-keys";
import type {
  OrderKeyOptions,
  PriorityBucket,
  QueueChange,
  QueueChangeReason,
  QueueEntry,
  QueueListener,
  QueueStore,
} from "./types";
import { PRIORITY } from "./types";

export interface PriorityQueueManagerConfig {
  store: QueueStore;
  orderKeys?: OrderKeyOptions;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * PriorityQueueManager
 *
 * In-memory view of the session queue with write-through to a QueueStore. Every mutation runs
 * on one SerialExecutor and awaits its store write before the next one starts, so a move and a
 * renormalization never interleave. The in-memory change is applied first and rolled back if
 * the store rejects it; a rejected mutation throws StoreWriteError and notifies nobody.
 */
export class PriorityQueueManager {
  private rows = new Map<string, QueueEntry>();
  private listeners: QueueListener[] = [];
  private readonly serial = new SerialExecutor();
  private readonly store: QueueStore;
  private readonly orderKeys: OrderKeyOptions;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(config: PriorityQueueManagerConfig) {
    this.store = config.store;
    this.orderKeys = config.orderKeys ?? {};
    this.log = config.logger ?? componentLogger("priority-queue");
    this.now = config.now ?? (() => new Date());
    this.generateId = config.generateId ?? (() => crypto.randomUUID());
  }

  /** Replace in-memory state with the store's contents; renormalizes if keys are too close. */
  load(): Promise<QueueEntry[]> {
    return this.serial.run(async () => {
      const fetched = await this.store.fetchQueueEntries();
      this.rows = new Map(fetched.map((e) => [e.sessionId, { ...e }]));
      this.log.info({ event: "QUEUE_LOADED", count: this.rows.size }, "Queue loaded from store");
      if (needsRenormalization(fetched, this.orderKeys)) {
        await this.tryRenormalizeAfter("load");
      }
      this.emit("loaded");
      return this.entries();
    });
  }

  /** Sorted snapshot. */
  entries(): QueueEntry[] {
    return sortQueueEntries([...this.rows.values()]).map((e) => ({ ...e }));
  }

  has(sessionId: string): boolean {
    return this.rows.has(sessionId);
  }

  get(sessionId: string): QueueEntry | undefined {
    const entry = this.rows.get(sessionId);
    return entry ? { ...entry } : undefined;
  }

  /** Queue a session at the tail of `bucket`. Already queued: returns the existing entry, no write. */
  add(sessionId: string, bucket: PriorityBucket = PRIORITY.LOW): Promise<QueueEntry> {
    return this.serial.run(async () => {
      const existing = this.rows.get(sessionId);
      if (existing) return { ...existing };
      const entry: QueueEntry = {
        sessionId,
        priorityBucket: bucket,
        orderKey: tailKey([...this.rows.values()], bucket, this.orderKeys),
        stableId: this.generateId(),
        queuedAt: this.now().toISOString(),
      };
      await this.commit("add", withEntry(this.rows, entry), () => this.store.writeQueueEntry(entry));
      logQueueWrite(this.log, "add", sessionId, { bucket, orderKey: entry.orderKey });
      this.emit("added", sessionId);
      return { ...entry };
    });
  }

  /** Dequeue a session. Returns false when it was not queued. */
  remove(sessionId: string): Promise<boolean> {
    return this.serial.run(async () => {
      if (!this.rows.has(sessionId)) return false;
      const next = new Map(this.rows);
      next.delete(sessionId);
      await this.commit("remove", next, () => this.store.deleteQueueEntry(sessionId));
      logQueueWrite(this.log, "remove", sessionId);
      this.emit("removed", sessionId);
      return true;
    });
  }

  /** Move a session to the tail of another bucket. No-op when absent or unchanged. */
  changePriority(sessionId: string, bucket: PriorityBucket): Promise<QueueEntry | null> {
    return this.serial.run(async () => {
      const current = this.rows.get(sessionId);
      if (!current) return null;
      if (current.priorityBucket === bucket) return { ...current };
      const others = [...this.rows.values()].filter((e) => e.sessionId !== sessionId);
      const entry: QueueEntry = { ...current, priorityBucket: bucket, orderKey: tailKey(others, bucket, this.orderKeys) };
      await this.commit("change_priority", withEntry(this.rows, entry), () => this.store.writeQueueEntry(entry));
      logQueueWrite(this.log, "change_priority", sessionId, { from: current.priorityBucket, to: bucket });
      this.emit("priority_changed", sessionId);
      return { ...entry };
    });
  }

  /**
   * Place `movingId` between `aboveId` and `belowId` with one write.
   * The target bucket is below's, else above's; a neighbor in another bucket is ignored.
   * Returns the moved entry, or null when nothing changed.
   */
  reorder(movingId: string, aboveId: string | null, belowId: string | null): Promise<QueueEntry | null> {
    return this.serial.run(() => this.reorderNow(movingId, aboveId, belowId));
  }

  /**
   * List drag contract: insert the entry at `sourceIndex` before `destination` in the sorted,
   * pre-move list (`destination === length` means the end).
   */
  moveByIndex(sourceIndex: number, destination: number): Promise<QueueEntry | null> {
    return this.serial.run(async () => {
      const sorted = this.entries();
      const moving = sorted[sourceIndex];
      if (!moving || destination < 0 || destination > sorted.length) return null;
      if (destination === sourceIndex || destination === sourceIndex + 1) {
        this.log.debug({ event: "QUEUE_MOVE_NOOP", sessionId: moving.sessionId, sourceIndex, destination }, "Move to current slot ignored");
        return null;
      }
      const above = sorted[destination - 1];
      const below = sorted[destination];
      return this.reorderNow(moving.sessionId, above ? above.sessionId : null, below ? below.sessionId : null);
    });
  }

  /** Reassign every key to even spacing in one batch write. Order is unchanged. */
  renormalize(): Promise<QueueEntry[]> {
    return this.serial.run(async () => {
      await this.renormalizeNow();
      this.emit("renormalized");
      return this.entries();
    });
  }

  subscribe(listener: QueueListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /** Resolves when every mutation submitted so far has finished. */
  drain(): Promise<void> {
    return this.serial.drain();
  }

  private async reorderNow(movingId: string, aboveId: string | null, belowId: string | null): Promise<QueueEntry | null> {
    const moving = this.rows.get(movingId);
    if (!moving) return null;
    let above = this.neighbor(aboveId, movingId);
    let below = this.neighbor(belowId, movingId);
    const anchor = below ?? above;
    if (!anchor) {
      this.log.debug({ event: "QUEUE_MOVE_NOOP", sessionId: movingId }, "No neighbors; nothing to reorder");
      return null;
    }
    const bucket = anchor.priorityBucket;
    if (above && above.priorityBucket !== bucket) above = null;
    if (below && below.priorityBucket !== bucket) below = null;

    if (moving.priorityBucket === bucket && this.sitsBetween(moving, above, below)) {
      this.log.debug({ event: "QUEUE_MOVE_NOOP", sessionId: movingId }, "Already between the given neighbors");
      return null;
    }

    let orderKey = computeInsertionKey(above, below, this.orderKeys);
    if (!isStrictlyBetween(orderKey, above, below)) {
      this.log.info({ event: "QUEUE_KEY_EXHAUSTED", sessionId: movingId, orderKey }, "No room between neighbors; renormalizing first");
      await this.renormalizeNow();
      above = above ? this.rows.get(above.sessionId) ?? null : null;
      below = below ? this.rows.get(below.sessionId) ?? null : null;
      orderKey = computeInsertionKey(above, below, this.orderKeys);
    }
    const entry: QueueEntry = { ...moving, priorityBucket: bucket, orderKey };
    await this.commit("reorder", withEntry(this.rows, entry), () => this.store.writeQueueEntry(entry));
    logQueueWrite(this.log, "reorder", movingId, { above: above?.sessionId, below: below?.sessionId, orderKey: entry.orderKey });
    if (needsRenormalization([...this.rows.values()], this.orderKeys)) {
      await this.tryRenormalizeAfter("reorder");
    }
    this.emit("reordered", movingId);
    const moved = this.rows.get(movingId);
    return moved ? { ...moved } : null;
  }

  private neighbor(id: string | null, movingId: string): QueueEntry | null {
    if (id === null || id === movingId) return null;
    return this.rows.get(id) ?? null;
  }

  /** True when `above` and `below` are exactly the entry's current neighbors in its bucket. */
  private sitsBetween(moving: QueueEntry, above: QueueEntry | null, below: QueueEntry | null): boolean {
    const bucket = sortQueueEntries([...this.rows.values()].filter((e) => e.priorityBucket === moving.priorityBucket));
    const i = bucket.findIndex((e) => e.sessionId === moving.sessionId);
    const currentAbove = bucket[i - 1]?.sessionId ?? null;
    const currentBelow = bucket[i + 1]?.sessionId ?? null;
    return currentAbove === (above?.sessionId ?? null) && currentBelow === (below?.sessionId ?? null);
  }

  /**
   * Renormalize after a committed move or load. A failure here keeps the committed change and
   * leaves the keys for the next post-move check.
   */
  private async tryRenormalizeAfter(trigger: "load" | "reorder"): Promise<void> {
    try {
      await this.renormalizeNow();
    } catch (err) {
      this.log.warn({ event: "QUEUE_RENORMALIZE_DEFERRED", trigger, err: errorMessage(err) }, "Renormalization failed; will retry after next move");
    }
  }

  private async renormalizeNow(): Promise<void> {
    const next = new Map(this.rows);
    for (const { sessionId, orderKey } of renormalizedKeys([...this.rows.values()], this.orderKeys)) {
      const current = next.get(sessionId);
      if (current) next.set(sessionId, { ...current, orderKey });
    }
    const batch = sortQueueEntries([...next.values()]);
    await this.commit("renormalize", next, () => this.store.writeQueueEntries(batch));
    incrementCounter("queueRenormalizations");
    logQueueWrite(this.log, "renormalize", undefined, { count: batch.length });
  }

  private async commit(op: string, next: Map<string, QueueEntry>, write: () => Promise<void>): Promise<void> {
    const previous = this.rows;
    this.rows = next;
    try {
      await write();
    } catch (err) {
      this.rows = previous;
      incrementCounter("queueRollbacks");
      this.log.error({ event: "QUEUE_WRITE_FAILED", op, err: errorMessage(err) }, "Store write failed; in-memory change rolled back");
      throw new StoreWriteError(`Queue ${op} failed: ${errorMessage(err)}`, err);
    }
    incrementCounter("queueWrites");
  }

  private emit(reason: QueueChangeReason, sessionId?: string): void {
    if (this.listeners.length === 0) return;
    const change: QueueChange = { reason, sessionId, entries: this.entries() };
    this.listeners.forEach((l) => l(change));
  }
}

function withEntry(rows: Map<string, QueueEntry>, entry: QueueEntry): Map<string, QueueEntry> {
  const next = new Map(rows);
  next.set(entry.sessionId, entry);
  return next;
}
