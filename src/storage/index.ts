import type { AppConfig, ScoreBounds } from "../config";
import { connectDatabase, ensureSchema } from "../db/client";
import type { Logger } from "../logger";
import { RetryingStorageBackend, type StorageBackend } from "./backend";
import { FileStorageBackend } from "./file-backend";
import { LegacyDocumentSource, LegacyImportingBackend } from "./legacy";
import { PostgresStorageBackend } from "./pg-backend";

export { RetryingStorageBackend, withStorageRetry } from "./backend";
export type { SessionMutator, StorageBackend } from "./backend";
export { FileStorageBackend } from "./file-backend";
export { PostgresStorageBackend } from "./pg-backend";
export { LegacyDocumentSource, LegacyImportingBackend } from "./legacy";

// Builds the configured physical backend, layers legacy import on top when a
// legacy document is configured, and wraps the result in retry-once.
export async function createStorageBackend(
  storage: AppConfig["storage"],
  bounds: ScoreBounds,
  logger: Logger,
): Promise<StorageBackend> {
  const log = logger.child({ component: "storage" });

  let backend: StorageBackend;
  if (storage.driver === "postgres") {
    const handle = connectDatabase(storage.databaseUrl, storage.statementTimeoutMs);
    await ensureSchema(handle.db);
    backend = new PostgresStorageBackend(handle.db, handle.close);
    log.info({ driver: "postgres" }, "storage ready");
  } else {
    backend = new FileStorageBackend(storage.dataDir, log);
    log.info({ driver: "file", dataDir: storage.dataDir }, "storage ready");
  }

  if (storage.legacyDataFile) {
    const legacy = new LegacyDocumentSource(storage.legacyDataFile, bounds, log);
    backend = new LegacyImportingBackend(backend, legacy, log);
    log.info({ legacyDataFile: storage.legacyDataFile }, "legacy import enabled");
  }

  return new RetryingStorageBackend(backend, log);
}
