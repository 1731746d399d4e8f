export { AckCoordinator } from "./ack/coordinator";
export type { AckCoordinatorConfig } from "./ack/coordinator";
export type { AckOutcome, AckStatus, BeginRequestOptions, SendCapability } from "./ack/types";
export { ResourceUploader } from "./ack/uploader";
export type { ResourceUploaderConfig, UploadFileOptions, UploadListener, UploadProgress, UploadStatus } from "./ack/uploader";

export { SerialExecutor } from "./common/serial";

export {
  DEFAULT_CONNECTION_TEST_TIMEOUT_MS,
  DEFAULT_MAX_UPLOAD_BYTES,
  DEFAULT_SERVER_PORT,
  DEFAULT_UPLOAD_TIMEOUT_MS,
  effectiveStorageLocation,
  isServerConfigured,
  loadConfig,
  serverUrl,
} from "./config";
export type { CoreConfig } from "./config";

export { createSessionCore } from "./core";
export type { SessionCore, SessionCoreOptions } from "./core";

export {
  CoordinationError,
  DuplicateKeyError,
  FileNotFoundError,
  SizeLimitExceededError,
  StoreWriteError,
  errorMessage,
  isCoordinationError,
} from "./errors";
export type { CoordinationErrorCode } from "./errors";

export { componentLogger, createLogger, logError, logger } from "./logging";
export type { Logger, LoggerConfig, LogLevel } from "./logging";

export { getCounters, incrementCounter, logCounters, resetCounters } from "./metrics";
export type { CounterName, Counters } from "./metrics";

export { PriorityQueueManager } from "./queue/manager";
export type { PriorityQueueManagerConfig } from "./queue/manager";
export {
  ORDER_KEY_MIN_GAP,
  ORDER_KEY_ORIGIN,
  ORDER_KEY_UNIT_STEP,
  compareQueueEntries,
  computeInsertionKey,
  needsRenormalization,
  renormalizedKeys,
  sortQueueEntries,
  tailKey,
} from "./queue/order-keys";
export { InMemoryQueueStore, JsonFileQueueStore, parseQueueFile } from "./queue/stores";
export { PRIORITY } from "./queue/types";
export type { OrderKeyOptions, PriorityBucket, QueueChange, QueueChangeReason, QueueEntry, QueueListener, QueueStore } from "./queue/types";

export { INCOMING_TYPES, parseUploadResponse, toIncomingMessage } from "./transport/types";
export type { IncomingMessage, MessageHandler, OutgoingMessage, Transport, UploadFileMessage, UploadResponse } from "./transport/types";
export { WebSocketTransport, parseFrame, testConnection, validateServerInput } from "./transport/ws";
export type { ConnectionTestInput, ConnectionTestResult, WebSocketTransportConfig } from "./transport/ws";

export { WindowSessionRegistry } from "./windows/registry";
export type { ClaimResult, DetachedListener, WindowSessionRegistryConfig } from "./windows/registry";
