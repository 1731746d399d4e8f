/**
 * Backend WebSocket message types (upload subset).
 * Outgoing keys are snake_case; the backend echoes request_id when it supports it.
 */

/** Outgoing upload message. */
export interface UploadFileMessage {
  type: "upload_file";
  request_id: string;
  filename: string;
  /** Base64 file content. */
  content: string;
  storage_location: string;
}

export type OutgoingMessage = UploadFileMessage | { type: string; [key: string]: unknown };

/** Incoming message (any type). */
export interface IncomingMessage {
  type: string;
  [key: string]: unknown;
}

export const INCOMING_TYPES = {
  FILE_UPLOADED: "file_uploaded",
  /** Older backends serialize the keyword as-is. */
  FILE_UPLOADED_LEGACY: "file-uploaded",
  ERROR: "error",
} as const;

/** Normalized acknowledgment for one upload. */
export interface UploadResponse {
  /** Echoed request id, when the backend supports it. */
  requestId?: string;
  /** Final filename on the backend (may differ from the sent one after a rename). */
  filename: string;
  success: boolean;
  message?: string;
}

export type MessageHandler = (msg: IncomingMessage) => void;

/** Transport collaborator: fire-and-forget send plus inbound fan-out. */
export interface Transport {
  /** Returns false when the message could not be handed to the socket. */
  send(message: OutgoingMessage): boolean;
  isConnected(): boolean;
  /** Returns an unsubscribe function. */
  onMessage(handler: MessageHandler): () => void;
}

const UPLOAD_ERROR_PREFIX = "Failed to upload file";

function stringField(msg: IncomingMessage, key: string): string | undefined {
  const v = msg[key];
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

/** Narrow an untrusted parsed frame to IncomingMessage. */
export function toIncomingMessage(raw: unknown): IncomingMessage | null {
  if (raw == null || typeof raw !== "object" || Array.isArray(raw)) return null;
  if (!("type" in raw) || typeof raw.type !== "string") return null;
  const type = raw.type;
  const msg: IncomingMessage = { type };
  for (const [k, v] of Object.entries(raw)) msg[k] = v;
  return msg;
}

/**
 * Map an inbound frame to an upload acknowledgment, or null when it is not one.
 * Errors count as upload failures only when they carry a request_id or the upload error prefix.
 */
export function parseUploadResponse(msg: IncomingMessage): UploadResponse | null {
  const requestId = stringField(msg, "request_id");

  if (msg.type === INCOMING_TYPES.FILE_UPLOADED || msg.type === INCOMING_TYPES.FILE_UPLOADED_LEGACY) {
    return { requestId, filename: stringField(msg, "filename") ?? "", success: true };
  }

  if (msg.type === INCOMING_TYPES.ERROR) {
    const message = stringField(msg, "message");
    const isUploadError = requestId !== undefined || (message?.startsWith(UPLOAD_ERROR_PREFIX) ?? false);
    if (!isUploadError) return null;
    return { requestId, filename: stringField(msg, "filename") ?? "", success: false, message };
  }

  return null;
}
