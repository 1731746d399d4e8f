/**
 * Process-lifetime counters for the coordination core.
 * logCounters() emits them as one structured event.
 */

import { logger } from "../logging";

export interface Counters {
  acksResolved: number;
  acksTimedOut: number;
  acksTransportFailed: number;
  acksFallbackMatched: number;
  /** Acks for keys that were no longer pending (late after timeout, or never sent). */
  acksDropped: number;
  /** Completions drained after the caller abandoned the request. */
  acksDiscarded: number;
  claimsGranted: number;
  claimsRedirected: number;
  queueWrites: number;
  queueRenormalizations: number;
  queueRollbacks: number;
}

export type CounterName = keyof Counters;

function emptyCounters(): Counters {
  return {
    acksResolved: 0,
    acksTimedOut: 0,
    acksTransportFailed: 0,
    acksFallbackMatched: 0,
    acksDropped: 0,
    acksDiscarded: 0,
    claimsGranted: 0,
    claimsRedirected: 0,
    queueWrites: 0,
    queueRenormalizations: 0,
    queueRollbacks: 0,
  };
}

let counters: Counters = emptyCounters();

export function incrementCounter(name: CounterName, by = 1): void {
  counters[name] += by;
}

export function getCounters(): Counters {
  return { ...counters };
}

export function resetCounters(): void {
  counters = emptyCounters();
}

export function logCounters(): void {
  logger.info(
    {
      event: "COORDINATION_METRICS",
      acks_resolved: counters.acksResolved,
      acks_timed_out: counters.acksTimedOut,
      acks_transport_failed: counters.acksTransportFailed,
      acks_fallback_matched: counters.acksFallbackMatched,
      acks_dropped: counters.acksDropped,
      acks_discarded: counters.acksDiscarded,
      claims_granted: counters.claimsGranted,
      claims_redirected: counters.claimsRedirected,
      queue_writes: counters.queueWrites,
      queue_renormalizations: counters.queueRenormalizations,
      queue_rollbacks: counters.queueRollbacks,
    },
    "Coordination counters"
  );
}
