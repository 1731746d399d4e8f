/**
 * Composition root: one coordinator, uploader, window registry and queue manager, wired to a
 * transport and a queue store. Callers hold the returned handles; there are no singletons.
 */

import { AckCoordinator } from "./ack/coordinator";
import { ResourceUploader } from "./ack/uploader";
import type { CoreConfig } from "./config";
import { effectiveStorageLocation } from "./config";
import type { Logger } from "./logging";
import { componentLogger, logger as rootLogger } from "./logging";
import { PriorityQueueManager } from "./queue/manager";
import { InMemoryQueueStore, JsonFileQueueStore } from "./queue/stores";
import type { QueueStore } from "./queue/types";
import type { Transport, UploadFileMessage, UploadResponse } from "./transport/types";
import { parseUploadResponse } from "./transport/types";
import type { WindowSessionRegistryConfig } from "./windows/registry";
import { WindowSessionRegistry } from "./windows/registry";

export interface SessionCoreOptions<W> {
  config: CoreConfig;
  transport: Transport;
  /** Defaults to a JSON file store when config.queue.storePath is set, else in-memory. */
  queueStore?: QueueStore;
  windows?: Omit<WindowSessionRegistryConfig<W>, "logger">;
  logger?: Logger;
}

export interface SessionCore<W> {
  coordinator: AckCoordinator<UploadFileMessage, UploadResponse>;
  uploader: ResourceUploader;
  windows: WindowSessionRegistry<W>;
  queue: PriorityQueueManager;
  /** Stop routing transport messages and fail whatever is still pending. */
  dispose(): Promise<void>;
}

export function createSessionCore<W>(options: SessionCoreOptions<W>): SessionCore<W> {
  const { config, transport } = options;
  const base = options.logger ?? rootLogger;

  const coordinator = new AckCoordinator<UploadFileMessage, UploadResponse>({
    send: (message) => transport.send(message),
    logger: componentLogger("ack-coordinator", base),
  });

  const uploader = new ResourceUploader({
    transport,
    coordinator,
    storageLocation: effectiveStorageLocation(config),
    timeoutMs: config.uploads.timeoutMs,
    maxBytes: config.uploads.maxBytes,
    logger: componentLogger("resource-uploader", base),
  });

  const windows = new WindowSessionRegistry<W>({
    ...options.windows,
    logger: componentLogger("window-registry", base),
  });

  const queueStore =
    options.queueStore ??
    (config.queue.storePath
      ? new JsonFileQueueStore({ filePath: config.queue.storePath, logger: componentLogger("queue-store", base) })
      : new InMemoryQueueStore());

  const queue = new PriorityQueueManager({
    store: queueStore,
    orderKeys: { origin: config.queue.origin, unitStep: config.queue.unitStep, minGap: config.queue.minGap },
    logger: componentLogger("priority-queue", base),
  });

  const unsubscribe = transport.onMessage((msg) => {
    const response = parseUploadResponse(msg);
    if (response) uploader.handleUploadResponse(response);
  });

  base.info(
    { event: "SESSION_CORE_READY", uploadTimeoutMs: config.uploads.timeoutMs, queueStore: queueStore.constructor.name },
    "Session core ready"
  );

  return {
    coordinator,
    uploader,
    windows,
    queue,
    async dispose() {
      unsubscribe();
      coordinator.dispose();
      await queue.drain();
      base.info({ event: "SESSION_CORE_DISPOSED" }, "Session core disposed");
    },
  };
}
