import type { AckOutcome, BeginRequestOptions, PendingCompletion, SendCapability } from "./types";
import { DuplicateKeyError, errorMessage } from "../errors";
import type { Logger } from "../logging";
import { componentLogger, logAckSettled } from "../logging";
import { incrementCounter } from "../metrics";

export interface AckCoordinatorConfig<TPayload> {
  /** Fire-and-forget send through the transport collaborator. */
  send: SendCapability<TPayload>;
  logger?: Logger;
}

/**
 * AckCoordinator
 *
 * Turns "send a request, later receive a keyed acknowledgment, or time out" into one awaitable
 * outcome. Every path that finishes a request (ack, timeout, send failure, dispose) goes through
 * take(), which removes the pending entry with no await between lookup and delete. Whichever
 * path takes the entry first is the only one that settles the caller; the others see nothing
 * pending and drop.
 *
 * Abandoning (AbortSignal) settles the caller immediately but leaves the entry registered, so a
 * late ack or the timeout still drains it.
 */
export class AckCoordinator<TPayload, TResult> {
  private readonly pending = new Map<string, PendingCompletion<TResult>>();
  private readonly send: SendCapability<TPayload>;
  private readonly log: Logger;

  constructor(config: AckCoordinatorConfig<TPayload>) {
    this.send = config.send;
    this.log = config.logger ?? componentLogger("ack-coordinator");
  }

  beginRequest(key: string, payload: TPayload, options: BeginRequestOptions): Promise<AckOutcome<TResult>> {
    if (this.pending.has(key)) {
      return Promise.reject(new DuplicateKeyError(key));
    }
    if (options.signal?.aborted) {
      return Promise.resolve({ status: "abandoned" });
    }

    return new Promise<AckOutcome<TResult>>((resolve) => {
      const entry: PendingCompletion<TResult> = {
        key,
        label: options.label,
        createdAt: Date.now(),
        timer: null,
        abandoned: false,
        settle: resolve,
      };
      this.pending.set(key, entry);

      entry.timer = setTimeout(() => this.onTimeout(entry), options.timeoutMs);
      entry.timer.unref?.();

      const signal = options.signal;
      if (signal) {
        const onAbort = (): void => this.abandon(entry);
        signal.addEventListener("abort", onAbort, { once: true });
        entry.detachAbort = () => signal.removeEventListener("abort", onAbort);
      }

      this.log.debug({ event: "ACK_REQUEST_BEGIN", key, label: options.label, timeoutMs: options.timeoutMs }, "Request registered");

      let failure: string | null = null;
      try {
        if (!this.send(payload)) failure = "transport not connected";
      } catch (err) {
        failure = errorMessage(err);
      }
      if (failure !== null) {
        const taken = this.take(key, entry);
        if (!taken) return;
        incrementCounter("acksTransportFailed");
        logAckSettled(this.log, key, "transport_failure", { label: taken.label, reason: failure });
        this.complete(taken, { status: "transport_failure", reason: failure });
      }
    });
  }

  /** Inbound ack for `key`. Returns false (and drops) when nothing is pending under it. */
  resolve(key: string, result: TResult): boolean {
    const entry = this.take(key);
    if (!entry) {
      incrementCounter("acksDropped");
      this.log.debug({ event: "ACK_UNKNOWN_KEY", key }, "No pending request for ack (already resolved or timed out)");
      return false;
    }
    incrementCounter("acksResolved");
    logAckSettled(this.log, key, "acknowledged", { label: entry.label, waitedMs: Date.now() - entry.createdAt });
    this.complete(entry, { status: "acknowledged", result });
    return true;
  }

  /** Resolve the oldest pending request carrying `label`. */
  resolveByLabel(label: string, result: TResult): boolean {
    for (const entry of this.pending.values()) {
      if (entry.label === label) return this.resolve(entry.key, result);
    }
    return false;
  }

  /**
   * Last resort for acks whose key matches nothing (e.g. the backend renamed the file on
   * conflict). Only resolves when exactly one request is pending; otherwise it cannot tell
   * which one the ack belongs to and drops it.
   */
  resolveByFallbackMatch(result: TResult, receivedLabel?: string): boolean {
    if (this.pending.size !== 1) {
      incrementCounter("acksDropped");
      this.log.warn(
        { event: "ACK_AMBIGUOUS_FALLBACK", pendingCount: this.pending.size, receivedLabel },
        "Unmatched ack with zero or several pending requests; dropping"
      );
      return false;
    }
    const [only] = this.pending.values();
    this.log.warn(
      { event: "ACK_FALLBACK_MATCH", key: only.key, sentLabel: only.label, receivedLabel },
      "Ack key mismatch; completing the only pending request"
    );
    incrementCounter("acksFallbackMatched");
    return this.resolve(only.key, result);
  }

  isPending(key: string): boolean {
    return this.pending.has(key);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /** Pending keys, oldest first. */
  pendingKeys(): string[] {
    return [...this.pending.keys()];
  }

  /** Fail every pending request (e.g. on shutdown). */
  dispose(reason = "coordinator disposed"): void {
    for (const key of [...this.pending.keys()]) {
      const entry = this.take(key);
      if (!entry) continue;
      incrementCounter("acksTransportFailed");
      this.complete(entry, { status: "transport_failure", reason });
    }
  }

  /** The single removal primitive. `expected` guards against a stale timer taking a newer entry under the same key. */
  private take(key: string, expected?: PendingCompletion<TResult>): PendingCompletion<TResult> | undefined {
    const entry = this.pending.get(key);
    if (!entry || (expected !== undefined && entry !== expected)) return undefined;
    this.pending.delete(key);
    if (entry.timer) clearTimeout(entry.timer);
    entry.timer = null;
    entry.detachAbort?.();
    return entry;
  }

  private complete(entry: PendingCompletion<TResult>, outcome: AckOutcome<TResult>): void {
    if (entry.abandoned) {
      incrementCounter("acksDiscarded");
      this.log.debug({ event: "ACK_DISCARDED", key: entry.key, status: outcome.status }, "Completion for abandoned request discarded");
      return;
    }
    entry.settle(outcome);
  }

  private onTimeout(entry: PendingCompletion<TResult>): void {
    const taken = this.take(entry.key, entry);
    if (!taken) return;
    incrementCounter("acksTimedOut");
    logAckSettled(this.log, taken.key, "timeout", { label: taken.label });
    this.complete(taken, { status: "timeout" });
  }

  private abandon(entry: PendingCompletion<TResult>): void {
    if (entry.abandoned || this.pending.get(entry.key) !== entry) return;
    entry.abandoned = true;
    this.log.debug({ event: "ACK_ABANDONED", key: entry.key, label: entry.label }, "Caller stopped waiting; entry left to drain");
    entry.settle({ status: "abandoned" });
  }
}
