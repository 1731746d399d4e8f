import { getCounters, incrementCounter, logCounters, resetCounters } from "../../../src/metrics";

describe("metrics counters", () => {
  beforeEach(() => resetCounters());

  it("increments and resets", () => {
    incrementCounter("acksResolved");
    incrementCounter("queueWrites", 3);
    expect(getCounters()).toMatchObject({ acksResolved: 1, queueWrites: 3, acksTimedOut: 0 });
    resetCounters();
    expect(getCounters().queueWrites).toBe(0);
  });

  it("returns a copy", () => {
    const snapshot = getCounters();
    snapshot.claimsGranted = 42;
    expect(getCounters().claimsGranted).toBe(0);
  });

  it("logs without throwing", () => {
    incrementCounter("claimsRedirected");
    expect(() => logCounters()).not.toThrow();
  });
});
