/**
 * Priority queue types. Entries sort by (priorityBucket asc, orderKey asc, stableId asc).
 */

export const PRIORITY = {
  HIGH: 1,
  MEDIUM: 5,
  LOW: 10,
} as const;

/** Lower sorts first. Any small integer is accepted; PRIORITY names the usual three. */
export type PriorityBucket = number;

export interface QueueEntry {
  sessionId: string;
  priorityBucket: PriorityBucket;
  /** Fractional position within the bucket. */
  orderKey: number;
  /** Tie-break so the order is total even when keys collide. */
  stableId: string;
  /** ISO timestamp of when the session was queued. */
  queuedAt: string;
}

/** Persistent store collaborator. Write-through and authoritative. */
export interface QueueStore {
  fetchQueueEntries(): Promise<QueueEntry[]>;
  writeQueueEntry(entry: QueueEntry): Promise<void>;
  /** Single batch write; used by renormalization. */
  writeQueueEntries(entries: QueueEntry[]): Promise<void>;
  deleteQueueEntry(sessionId: string): Promise<void>;
}

export type QueueChangeReason = "added" | "removed" | "priority_changed" | "reordered" | "renormalized" | "loaded";

export interface QueueChange {
  reason: QueueChangeReason;
  sessionId?: string;
  /** Sorted snapshot after the change. */
  entries: QueueEntry[];
}

export type QueueListener = (change: QueueChange) => void;

export interface OrderKeyOptions {
  origin?: number;
  unitStep?: number;
  minGap?: number;
}
