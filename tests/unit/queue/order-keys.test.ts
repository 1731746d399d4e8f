import {
  compareQueueEntries,
  computeInsertionKey,
  isStrictlyBetween,
  needsRenormalization,
  renormalizedKeys,
  sortQueueEntries,
  tailKey,
} from "../../../src/queue/order-keys";
import type { QueueEntry } from "../../../src/queue/types";

function entry(sessionId: string, priorityBucket: number, orderKey: number, stableId = sessionId): QueueEntry {
  return { sessionId, priorityBucket, orderKey, stableId, queuedAt: "2026-01-01T00:00:00.000Z" };
}

describe("computeInsertionKey", () => {
  it("uses the midpoint between two neighbors", () => {
    expect(computeInsertionKey({ orderKey: 1 }, { orderKey: 2 })).toBe(1.5);
  });

  it("steps before below at the head and after above at the tail", () => {
    expect(computeInsertionKey(null, { orderKey: 3 })).toBe(2);
    expect(computeInsertionKey({ orderKey: 3 }, null)).toBe(4);
  });

  it("returns the origin for the first entry", () => {
    expect(computeInsertionKey(null, null)).toBe(0);
    expect(computeInsertionKey(null, null, { origin: 100 })).toBe(100);
  });

  it("honours a custom step", () => {
    expect(computeInsertionKey(null, { orderKey: 10 }, { unitStep: 5 })).toBe(5);
    expect(computeInsertionKey({ orderKey: 10 }, null, { unitStep: 5 })).toBe(15);
  });
});

describe("sortQueueEntries", () => {
  it("orders by bucket, then key, then stable id", () => {
    const sorted = sortQueueEntries([
      entry("low", 10, 0),
      entry("b", 1, 2, "s2"),
      entry("a", 1, 2, "s1"),
      entry("first", 1, 1),
    ]);
    expect(sorted.map((e) => e.sessionId)).toEqual(["first", "a", "b", "low"]);
  });

  it("is total even when every key collides", () => {
    const items = ["e", "c", "a", "d", "b"].map((id) => entry(id, 5, 1));
    const sorted = sortQueueEntries(items);
    expect(sorted.map((e) => e.stableId)).toEqual(["a", "b", "c", "d", "e"]);
    for (let i = 1; i < sorted.length; i++) {
      expect(compareQueueEntries(sorted[i - 1], sorted[i])).toBeLessThan(0);
    }
  });

  it("does not mutate its input", () => {
    const items = [entry("b", 1, 2), entry("a", 1, 1)];
    sortQueueEntries(items);
    expect(items.map((e) => e.sessionId)).toEqual(["b", "a"]);
  });
});

describe("needsRenormalization", () => {
  it("is false for evenly spaced keys", () => {
    expect(needsRenormalization([entry("a", 1, 1), entry("b", 1, 2), entry("c", 1, 3)])).toBe(false);
  });

  it("is true when two keys in a bucket are equal or closer than the floor", () => {
    expect(needsRenormalization([entry("a", 1, 1), entry("b", 1, 1)])).toBe(true);
    expect(needsRenormalization([entry("a", 1, 1), entry("b", 1, 1 + 1e-12)])).toBe(true);
    expect(needsRenormalization([entry("a", 1, 1), entry("b", 1, 1.25)], { minGap: 0.5 })).toBe(true);
  });

  it("never compares keys across buckets", () => {
    expect(needsRenormalization([entry("a", 1, 1), entry("b", 5, 1)])).toBe(false);
  });

  it("is true for a non-finite key", () => {
    expect(needsRenormalization([entry("a", 1, Number.NaN)])).toBe(true);
  });

  it("flags repeated midpoint insertion before keys collide", () => {
    let above = 1;
    const below = 2;
    let steps = 0;
    while (!needsRenormalization([entry("a", 1, above), entry("b", 1, below)])) {
      above = (above + below) / 2;
      steps += 1;
    }
    expect(above).toBeLessThan(below);
    expect(steps).toBeLessThan(40);
  });

  it("scales the floor with key magnitude", () => {
    expect(needsRenormalization([entry("a", 1, 1e12), entry("b", 1, 1e12 + 0.1)])).toBe(true);
    expect(needsRenormalization([entry("a", 1, 1e12), entry("b", 1, 1e12 + 1)])).toBe(false);
    expect(needsRenormalization([entry("a", 1, 1), entry("b", 1, 1 + 1e-6)])).toBe(false);
  });

  it("flags large keys while a distinct midpoint still exists", () => {
    let above = 1e7;
    const below = 2e7;
    while (!needsRenormalization([entry("a", 1, above), entry("b", 1, below)])) {
      above = (above + below) / 2;
    }
    expect(isStrictlyBetween((above + below) / 2, { orderKey: above }, { orderKey: below })).toBe(true);
  });
});

describe("isStrictlyBetween", () => {
  it("requires the key to sort strictly inside its neighbors", () => {
    expect(isStrictlyBetween(1.5, { orderKey: 1 }, { orderKey: 2 })).toBe(true);
    expect(isStrictlyBetween(1, { orderKey: 1 }, { orderKey: 2 })).toBe(false);
    expect(isStrictlyBetween(2, { orderKey: 1 }, { orderKey: 2 })).toBe(false);
    expect(isStrictlyBetween(3, { orderKey: 2 }, null)).toBe(true);
    expect(isStrictlyBetween(3, null, { orderKey: 2 })).toBe(false);
    expect(isStrictlyBetween(Number.NaN, null, null)).toBe(false);
  });
});

describe("insertion stability", () => {
  it.each([1, 1e7, 1e12])("keeps earlier entries in order at key magnitude %d", (magnitude) => {
    const options = { origin: magnitude, unitStep: magnitude };
    let slots: Array<{ id: number; orderKey: number }> = [{ id: 0, orderKey: computeInsertionKey(null, null, options) }];
    for (let id = 1; id <= 30; id++) {
      const position = (id * 7) % (slots.length + 1);
      const above = slots[position - 1] ?? null;
      const below = slots[position] ?? null;
      const before = slots.map((s) => s.id);
      slots = [...slots.slice(0, position), { id, orderKey: computeInsertionKey(above, below, options) }, ...slots.slice(position)];

      const byKey = [...slots].sort((x, y) => x.orderKey - y.orderKey).map((s) => s.id);
      expect(byKey).toEqual(slots.map((s) => s.id));
      expect(byKey.filter((x) => x !== id)).toEqual(before);
    }
  });
});

describe("renormalizedKeys", () => {
  it("spaces keys evenly per bucket in current order", () => {
    const keys = renormalizedKeys([entry("c", 1, 0.75), entry("a", 1, 0.5), entry("x", 10, -3), entry("b", 1, 0.5000001)]);
    expect(keys).toEqual([
      { sessionId: "a", orderKey: 1 },
      { sessionId: "b", orderKey: 2 },
      { sessionId: "c", orderKey: 3 },
      { sessionId: "x", orderKey: 1 },
    ]);
  });

  it("uses origin and step", () => {
    expect(renormalizedKeys([entry("a", 1, 7), entry("b", 1, 8)], { origin: 10, unitStep: 10 })).toEqual([
      { sessionId: "a", orderKey: 20 },
      { sessionId: "b", orderKey: 30 },
    ]);
  });
});

describe("tailKey", () => {
  it("appends after the largest key of the bucket", () => {
    const entries = [entry("a", 1, 4), entry("b", 1, 2), entry("c", 10, 50)];
    expect(tailKey(entries, 1)).toBe(5);
    expect(tailKey(entries, 10)).toBe(51);
  });

  it("starts an empty bucket at origin + step", () => {
    expect(tailKey([entry("a", 1, 4)], 5)).toBe(1);
  });
});
