import type { Logger } from "../logger";
import { AppError, StorageUnavailableError } from "../errors";
import type { AnalyticsEventRecord, CuppingSession } from "../types/session";

// Receives the current record and returns its replacement. Throwing an
// AppError aborts the update without writing anything.
export type SessionMutator = (current: CuppingSession) => CuppingSession;

/**
 * Durable store for cupping sessions and interaction events.
 *
 * Implementations guarantee that a record is either fully written or not
 * visible at all, and that reads never wait on writes to a different record.
 * `listAll` is not a cross-record snapshot: a concurrent create may or may not
 * be included.
 */
export interface StorageBackend {
  put(record: CuppingSession): Promise<void>;
  get(sessionId: string): Promise<CuppingSession | null>;
  getByShareId(shareId: string): Promise<CuppingSession | null>;
  listAll(): Promise<CuppingSession[]>;
  exists(shareId: string): Promise<boolean>;
  // Read-modify-write of one record; resolves null when the record is unknown.
  update(sessionId: string, mutator: SessionMutator): Promise<CuppingSession | null>;
  appendEvent(event: AnalyticsEventRecord): Promise<void>;
  listEvents(shareId: string): Promise<AnalyticsEventRecord[]>;
  close(): Promise<void>;
}

// Runs one storage call, retrying once on I/O failure. Domain errors raised
// inside the call (validation, not found) are passed through untouched.
export async function withStorageRetry<T>(operation: string, logger: Logger, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (firstError) {
    if (firstError instanceof AppError) throw firstError;
    logger.warn({ operation, err: firstError }, "storage call failed, retrying once");
    try {
      return await fn();
    } catch (secondError) {
      if (secondError instanceof AppError) throw secondError;
      logger.error({ operation, err: secondError }, "storage call failed twice");
      throw new StorageUnavailableError(operation, secondError);
    }
  }
}

// Decorator applying `withStorageRetry` to every call of the wrapped backend.
export class RetryingStorageBackend implements StorageBackend {
  constructor(
    private readonly inner: StorageBackend,
    private readonly logger: Logger,
  ) {}

  put(record: CuppingSession) {
    return withStorageRetry("put", this.logger, () => this.inner.put(record));
  }

  get(sessionId: string) {
    return withStorageRetry("get", this.logger, () => this.inner.get(sessionId));
  }

  getByShareId(shareId: string) {
    return withStorageRetry("getByShareId", this.logger, () => this.inner.getByShareId(shareId));
  }

  listAll() {
    return withStorageRetry("listAll", this.logger, () => this.inner.listAll());
  }

  exists(shareId: string) {
    return withStorageRetry("exists", this.logger, () => this.inner.exists(shareId));
  }

  update(sessionId: string, mutator: SessionMutator) {
    return withStorageRetry("update", this.logger, () => this.inner.update(sessionId, mutator));
  }

  appendEvent(event: AnalyticsEventRecord) {
    return withStorageRetry("appendEvent", this.logger, () => this.inner.appendEvent(event));
  }

  listEvents(shareId: string) {
    return withStorageRetry("listEvents", this.logger, () => this.inner.listEvents(shareId));
  }

  close() {
    return this.inner.close();
  }
}
