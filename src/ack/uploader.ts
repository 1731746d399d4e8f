/**
 * Resource uploads: validate, send upload_file, await the out-of-band file_uploaded ack.
 * Each file is tracked as an UploadProgress item the UI can render and retry.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import type { AckCoordinator } from "./coordinator";
import type { AckOutcome } from "./types";
import type { Transport, UploadFileMessage, UploadResponse } from "../transport/types";
import type { CoordinationErrorCode } from "../errors";
import { CoordinationError, FileNotFoundError, SizeLimitExceededError, errorMessage } from "../errors";
import type { Logger } from "../logging";
import { componentLogger } from "../logging";

export type UploadStatus = "pending" | "uploading" | "completed" | "failed";

export interface UploadProgress {
  /** Stable item id (survives retries). */
  id: string;
  /** Request id of the current attempt; echoed back by the backend as request_id. */
  requestId: string;
  filename: string;
  filePath: string;
  storageLocation: string;
  totalBytes: number;
  bytesUploaded: number;
  status: UploadStatus;
  error?: string;
  errorCode?: CoordinationErrorCode;
  /** Failed items that may succeed when sent again (timeouts, transport and backend failures). */
  retryable: boolean;
}

export type UploadListener = (items: UploadProgress[]) => void;

export interface ResourceUploaderConfig {
  transport: Transport;
  coordinator: AckCoordinator<UploadFileMessage, UploadResponse>;
  /** Effective storage location (already defaulted). */
  storageLocation: string;
  timeoutMs: number;
  maxBytes: number;
  /** Completed items are dropped from progress after this long; 0 keeps them. */
  completedRetentionMs?: number;
  logger?: Logger;
}

export interface UploadFileOptions {
  storageLocation?: string;
  /** Stop waiting for the ack; the item fails as cancelled and stays retryable. */
  signal?: AbortSignal;
}

const DEFAULT_COMPLETED_RETENTION_MS = 3000;

export class ResourceUploader {
  private readonly config: ResourceUploaderConfig;
  private readonly log: Logger;
  private items: UploadProgress[] = [];
  private listeners: UploadListener[] = [];
  private lastErrorMessage: string | null = null;

  constructor(config: ResourceUploaderConfig) {
    this.config = config;
    this.log = config.logger ?? componentLogger("resource-uploader");
  }

  /** Upload several files one after another. Requires a connected transport. */
  async uploadFiles(filePaths: string[], options: UploadFileOptions = {}): Promise<UploadProgress[]> {
    if (!this.config.transport.isConnected()) {
      this.lastErrorMessage = "Not connected to server";
      this.log.warn({ event: "UPLOAD_SKIPPED", reason: "not_connected", count: filePaths.length }, "Not connected, cannot upload files");
      return [];
    }
    this.lastErrorMessage = null;
    const results: UploadProgress[] = [];
    for (const filePath of filePaths) {
      results.push(await this.uploadFile(filePath, options));
    }
    return results;
  }

  /**
   * Upload one file. Validation failures (missing file, too large) are recorded as failed items
   * before any request is registered.
   */
  async uploadFile(filePath: string, options: UploadFileOptions = {}): Promise<UploadProgress> {
    const id = crypto.randomUUID();
    const filename = path.basename(filePath);
    const storageLocation = options.storageLocation ?? this.config.storageLocation;

    let size: number;
    try {
      const stat = await fs.promises.stat(filePath);
      if (!stat.isFile()) throw new FileNotFoundError(filePath);
      size = stat.size;
    } catch {
      const err = new FileNotFoundError(filePath);
      this.log.error({ event: "UPLOAD_FILE_NOT_FOUND", filePath }, "File does not exist");
      return this.addFailed({ id, filename, filePath, storageLocation, totalBytes: 0 }, err);
    }

    if (size > this.config.maxBytes) {
      const err = new SizeLimitExceededError(filename, size, this.config.maxBytes);
      this.log.error({ event: "UPLOAD_TOO_LARGE", filename, size, maxBytes: this.config.maxBytes }, "File too large");
      return this.addFailed({ id, filename, filePath, storageLocation, totalBytes: size }, err);
    }

    const item: UploadProgress = {
      id,
      requestId: crypto.randomUUID(),
      filename,
      filePath,
      storageLocation,
      totalBytes: size,
      bytesUploaded: 0,
      status: "pending",
      retryable: false,
    };
    this.items.push(item);
    this.emit();
    return this.perform(item, options.signal);
  }

  /** Send a failed, retryable item again under a fresh request id. */
  async retry(id: string, options: { signal?: AbortSignal } = {}): Promise<UploadProgress | null> {
    const item = this.items.find((i) => i.id === id);
    if (!item || item.status !== "failed" || !item.retryable) return null;
    item.requestId = crypto.randomUUID();
    item.status = "pending";
    item.error = undefined;
    item.errorCode = undefined;
    item.retryable = false;
    item.bytesUploaded = 0;
    this.emit();
    this.log.info({ event: "UPLOAD_RETRY", id, filename: item.filename }, "Retrying upload");
    return this.perform(item, options.signal);
  }

  /**
   * Route an inbound ack. An echoed request id is authoritative: if it matches nothing the ack
   * is late and is dropped. Without an id, match by filename, then fall back to the single
   * pending upload.
   */
  handleUploadResponse(response: UploadResponse): boolean {
    this.log.info(
      { event: "UPLOAD_RESPONSE", requestId: response.requestId, filename: response.filename, success: response.success },
      "Upload response"
    );
    const { coordinator } = this.config;
    if (response.requestId !== undefined) {
      return coordinator.resolve(response.requestId, response);
    }
    if (response.filename && coordinator.resolveByLabel(response.filename, response)) {
      return true;
    }
    return coordinator.resolveByFallbackMatch(response, response.filename || undefined);
  }

  progress(): UploadProgress[] {
    return this.items.map((i) => ({ ...i }));
  }

  lastError(): string | null {
    return this.lastErrorMessage;
  }

  clearCompleted(): void {
    this.removeWhere((i) => i.status === "completed");
  }

  clearFailed(): void {
    this.removeWhere((i) => i.status === "failed");
  }

  subscribe(listener: UploadListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private async perform(item: UploadProgress, signal?: AbortSignal): Promise<UploadProgress> {
    this.update(item, { status: "uploading" });

    let content: string;
    try {
      const data = await fs.promises.readFile(item.filePath);
      content = data.toString("base64");
      this.update(item, { bytesUploaded: data.length });
    } catch (err) {
      this.log.error({ event: "UPLOAD_READ_FAILED", filename: item.filename, err: errorMessage(err) }, "Failed to read file");
      return this.fail(item, errorMessage(err), true);
    }

    const message: UploadFileMessage = {
      type: "upload_file",
      request_id: item.requestId,
      filename: item.filename,
      content,
      storage_location: item.storageLocation,
    };
    this.log.info(
      { event: "UPLOAD_SEND", requestId: item.requestId, filename: item.filename, bytes: item.totalBytes, storageLocation: item.storageLocation },
      "Sending upload_file"
    );

    const outcome = await this.config.coordinator.beginRequest(item.requestId, message, {
      timeoutMs: this.config.timeoutMs,
      label: item.filename,
      signal,
    });
    return this.applyOutcome(item, outcome);
  }

  private applyOutcome(item: UploadProgress, outcome: AckOutcome<UploadResponse>): UploadProgress {
    switch (outcome.status) {
      case "acknowledged":
        if (outcome.result.success) return this.complete(item, outcome.result);
        return this.fail(item, outcome.result.message ?? "Upload failed", true);
      case "timeout":
        return this.fail(item, "Upload timed out", true);
      case "transport_failure":
        return this.fail(item, outcome.reason, true);
      case "abandoned":
        return this.fail(item, "Upload cancelled", true);
    }
  }

  private complete(item: UploadProgress, response: UploadResponse): UploadProgress {
    this.update(item, { status: "completed" });
    this.log.info(
      { event: "UPLOAD_COMPLETED", filename: item.filename, storedAs: response.filename || item.filename },
      "Upload successful"
    );
    const retentionMs = this.config.completedRetentionMs ?? DEFAULT_COMPLETED_RETENTION_MS;
    if (retentionMs > 0) {
      const timer = setTimeout(() => this.removeWhere((i) => i.id === item.id && i.status === "completed"), retentionMs);
      timer.unref?.();
    }
    return { ...item };
  }

  private fail(item: UploadProgress, error: string, retryable: boolean): UploadProgress {
    this.update(item, { status: "failed", error, retryable });
    this.log.warn({ event: "UPLOAD_FAILED", filename: item.filename, error, retryable }, "Upload failed");
    return { ...item };
  }

  private addFailed(
    base: Pick<UploadProgress, "id" | "filename" | "filePath" | "storageLocation" | "totalBytes">,
    err: CoordinationError
  ): UploadProgress {
    const item: UploadProgress = {
      ...base,
      requestId: "",
      bytesUploaded: 0,
      status: "failed",
      error: err.message,
      errorCode: err.code,
      retryable: false,
    };
    this.items.push(item);
    this.emit();
    return { ...item };
  }

  private update(item: UploadProgress, patch: Partial<UploadProgress>): void {
    Object.assign(item, patch);
    this.emit();
  }

  private removeWhere(predicate: (item: UploadProgress) => boolean): void {
    const before = this.items.length;
    this.items = this.items.filter((i) => !predicate(i));
    if (this.items.length !== before) this.emit();
  }

  private emit(): void {
    if (this.listeners.length === 0) return;
    const snapshot = this.progress();
    this.listeners.forEach((l) => l(snapshot));
  }
}
