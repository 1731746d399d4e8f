/**
 * Fractional order keys: O(1) moves by midpoint insertion, with a gap check that triggers an
 * O(n) renormalization before precision runs out.
 */

import type { OrderKeyOptions, PriorityBucket, QueueEntry } from "./types";

export const ORDER_KEY_ORIGIN = 0;
export const ORDER_KEY_UNIT_STEP = 1;
export const ORDER_KEY_MIN_GAP = 1e-9;
/** Gaps are also compared against this many units of float precision at the keys' magnitude. */
export const ORDER_KEY_PRECISION_ULPS = 1024;

type KeyedEntry = Pick<QueueEntry, "priorityBucket" | "orderKey" | "stableId">;

function resolveOptions(options: OrderKeyOptions = {}): Required<OrderKeyOptions> {
  return {
    origin: options.origin ?? ORDER_KEY_ORIGIN,
    unitStep: options.unitStep ?? ORDER_KEY_UNIT_STEP,
    minGap: options.minGap ?? ORDER_KEY_MIN_GAP,
  };
}

export function compareQueueEntries(a: KeyedEntry, b: KeyedEntry): number {
  if (a.priorityBucket !== b.priorityBucket) return a.priorityBucket - b.priorityBucket;
  if (a.orderKey !== b.orderKey) return a.orderKey < b.orderKey ? -1 : 1;
  if (a.stableId === b.stableId) return 0;
  return a.stableId < b.stableId ? -1 : 1;
}

export function sortQueueEntries<T extends KeyedEntry>(entries: readonly T[]): T[] {
  return [...entries].sort(compareQueueEntries);
}

/**
 * Key for an entry placed between `above` and `below`.
 * Both: midpoint. Only below: below - step. Only above: above + step. Neither: origin.
 */
export function computeInsertionKey(
  above: Pick<QueueEntry, "orderKey"> | null,
  below: Pick<QueueEntry, "orderKey"> | null,
  options?: OrderKeyOptions
): number {
  const { origin, unitStep } = resolveOptions(options);
  if (above && below) return (above.orderKey + below.orderKey) / 2;
  if (below) return below.orderKey - unitStep;
  if (above) return above.orderKey + unitStep;
  return origin;
}

function groupByBucket<T extends KeyedEntry>(sorted: readonly T[]): T[][] {
  const groups: T[][] = [];
  let current: T[] = [];
  for (const entry of sorted) {
    if (current.length > 0 && current[0].priorityBucket !== entry.priorityBucket) {
      groups.push(current);
      current = [];
    }
    current.push(entry);
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

/** Smallest gap between `a` and `b` that still leaves room for a distinct midpoint. */
export function gapFloor(a: number, b: number, minGap: number = ORDER_KEY_MIN_GAP): number {
  const magnitude = Math.max(Math.abs(a), Math.abs(b));
  return Math.max(minGap, magnitude * Number.EPSILON * ORDER_KEY_PRECISION_ULPS);
}

/** True when `key` sorts strictly after `above` and strictly before `below`, where present. */
export function isStrictlyBetween(
  key: number,
  above: Pick<QueueEntry, "orderKey"> | null,
  below: Pick<QueueEntry, "orderKey"> | null
): boolean {
  if (!Number.isFinite(key)) return false;
  if (above && !(above.orderKey < key)) return false;
  if (below && !(key < below.orderKey)) return false;
  return true;
}

/**
 * True when some adjacent pair in the same bucket is within gapFloor of each other (equal keys
 * included), or a key is not finite. Keys in different buckets are never compared.
 */
export function needsRenormalization(entries: readonly KeyedEntry[], options?: OrderKeyOptions): boolean {
  const { minGap } = resolveOptions(options);
  if (entries.some((e) => !Number.isFinite(e.orderKey))) return true;
  for (const group of groupByBucket(sortQueueEntries(entries))) {
    for (let i = 1; i < group.length; i++) {
      const a = group[i - 1].orderKey;
      const b = group[i].orderKey;
      if (b - a <= gapFloor(a, b, minGap)) return true;
    }
  }
  return false;
}

/** Evenly spaced keys per bucket in current order: origin + step, origin + 2*step, ... */
export function renormalizedKeys<T extends KeyedEntry & Pick<QueueEntry, "sessionId">>(
  entries: readonly T[],
  options?: OrderKeyOptions
): Array<{ sessionId: string; orderKey: number }> {
  const { origin, unitStep } = resolveOptions(options);
  const out: Array<{ sessionId: string; orderKey: number }> = [];
  for (const group of groupByBucket(sortQueueEntries(entries))) {
    group.forEach((entry, i) => out.push({ sessionId: entry.sessionId, orderKey: origin + (i + 1) * unitStep }));
  }
  return out;
}

/** Key that appends to the tail of `bucket`. */
export function tailKey(entries: readonly KeyedEntry[], bucket: PriorityBucket, options?: OrderKeyOptions): number {
  const { origin, unitStep } = resolveOptions(options);
  let max: number | null = null;
  for (const entry of entries) {
    if (entry.priorityBucket !== bucket || !Number.isFinite(entry.orderKey)) continue;
    if (max === null || entry.orderKey > max) max = entry.orderKey;
  }
  return (max ?? origin) + unitStep;
}
