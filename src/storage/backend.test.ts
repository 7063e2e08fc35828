import { describe, expect, it, vi } from "vitest";

import { NotFoundError, StorageUnavailableError } from "../errors";
import { makeSession, silentLogger } from "../test-helpers";
import { RetryingStorageBackend, withStorageRetry, type StorageBackend } from "./backend";

describe("withStorageRetry", () => {
  it("retries a failed call once", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Error("EIO")).mockResolvedValueOnce("ok");

    await expect(withStorageRetry("get", silentLogger, fn)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("gives up with StorageUnavailableError after the second failure", async () => {
    const cause = new Error("ECONNREFUSED");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Error("EIO")).mockRejectedValueOnce(cause);

    const failure = withStorageRetry("listAll", silentLogger, fn);

    await expect(failure).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(failure).rejects.toMatchObject({
      status: 503,
      message: "Storage unavailable during listAll",
      cause,
    });
  });

  it("passes domain errors through without retrying", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(NotFoundError.session("abc"));

    await expect(withStorageRetry("get", silentLogger, fn)).rejects.toBeInstanceOf(NotFoundError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("RetryingStorageBackend", () => {
  function stubBackend(overrides: Partial<StorageBackend>): StorageBackend {
    return {
      put: async () => undefined,
      get: async () => null,
      getByShareId: async () => null,
      listAll: async () => [],
      exists: async () => false,
      update: async () => null,
      appendEvent: async () => undefined,
      listEvents: async () => [],
      close: async () => undefined,
      ...overrides,
    };
  }

  it("recovers from a single transient failure", async () => {
    const session = makeSession();
    const get = vi
      .fn<StorageBackend["get"]>()
      .mockRejectedValueOnce(new Error("EAGAIN"))
      .mockResolvedValueOnce(session);
    const backend = new RetryingStorageBackend(stubBackend({ get }), silentLogger);

    await expect(backend.get(session.sessionId)).resolves.toEqual(session);
    expect(get).toHaveBeenCalledTimes(2);
  });

  it("surfaces a persistent failure as unavailable", async () => {
    const appendEvent = vi.fn<StorageBackend["appendEvent"]>().mockRejectedValue(new Error("ENOSPC"));
    const backend = new RetryingStorageBackend(stubBackend({ appendEvent }), silentLogger);

    await expect(
      backend.appendEvent({ eventType: "view", shareId: "share-a", timestamp: new Date(), payload: {} }),
    ).rejects.toThrow("Storage unavailable during appendEvent");
    expect(appendEvent).toHaveBeenCalledTimes(2);
  });
});
