/**
 * Types for out-of-band request acknowledgment (upload_file → file_uploaded).
 */

/** Terminal result of one acknowledged request. Exactly one is delivered per request. */
export type AckOutcome<TResult> =
  | { status: "acknowledged"; result: TResult }
  | { status: "timeout" }
  | { status: "transport_failure"; reason: string }
  /** The caller stopped waiting; the pending entry is drained later by the ack or the timeout. */
  | { status: "abandoned" };

export type AckStatus = AckOutcome<unknown>["status"];

/** Hands a payload to the transport. Returns false (or throws) when it could not be sent. */
export type SendCapability<TPayload> = (payload: TPayload) => boolean;

export interface BeginRequestOptions {
  timeoutMs: number;
  /** Human-readable secondary key (e.g. the filename) for backends that do not echo the request id. */
  label?: string;
  /** Abort to stop waiting without removing the pending entry. */
  signal?: AbortSignal;
}

/** Internal record of one outstanding request. Owned by the coordinator. */
export interface PendingCompletion<TResult> {
  key: string;
  label?: string;
  createdAt: number;
  timer: ReturnType<typeof setTimeout> | null;
  /** Caller no longer listens; the eventual completion is discarded. */
  abandoned: boolean;
  settle: (outcome: AckOutcome<TResult>) => void;
  detachAbort?: () => void;
}
