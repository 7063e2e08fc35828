import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ValidationError } from "../errors";
import { FileStorageBackend } from "../storage";
import { makeTempDir, removeDir, silentLogger } from "../test-helpers";
import { EventLog } from "./event-log";

describe("EventLog", () => {
  let dataDir: string;
  let storage: FileStorageBackend;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    storage = new FileStorageBackend(dataDir, silentLogger);
  });

  afterEach(async () => {
    await storage.close();
    await removeDir(dataDir);
  });

  it("records events with the clock's timestamp", async () => {
    const log = new EventLog(storage, () => new Date("2025-01-01T10:00:00.000Z"));

    const event = await log.append({ eventType: "social_share", shareId: "share-a", payload: { platform: "twitter" } });

    expect(event).toEqual({
      eventType: "social_share",
      shareId: "share-a",
      timestamp: new Date("2025-01-01T10:00:00.000Z"),
      payload: { platform: "twitter" },
    });
    expect(await log.query("share-a")).toEqual([event]);
  });

  it("returns events oldest first", async () => {
    const times = ["2025-01-01T10:02:00.000Z", "2025-01-01T10:01:00.000Z", "2025-01-01T10:03:00.000Z"];
    let index = 0;
    const log = new EventLog(storage, () => new Date(times[index++]));

    await log.append({ eventType: "view", shareId: "share-a" });
    await log.append({ eventType: "copy_link", shareId: "share-a" });
    await log.append({ eventType: "card_download", shareId: "share-a" });

    expect((await log.query("share-a")).map((event) => event.eventType)).toEqual([
      "copy_link",
      "view",
      "card_download",
    ]);
  });

  it("rejects unknown event types and non-object payloads", async () => {
    const log = new EventLog(storage);

    await expect(log.append({ eventType: "like", shareId: "share-a" })).rejects.toMatchObject({
      issues: [{ field: "eventType", message: "must be one of view, social_share, card_download, qr_download, copy_link" }],
    });
    await expect(log.append({ eventType: "view", shareId: "share-a", payload: ["x"] })).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(await log.query("share-a")).toEqual([]);
  });

  it("propagates storage failures instead of dropping the event", async () => {
    const log = new EventLog({
      appendEvent: async () => {
        throw new Error("ENOSPC");
      },
      listEvents: async () => [],
    });

    await expect(log.append({ eventType: "view", shareId: "share-a" })).rejects.toThrow("ENOSPC");
  });

  it("summarizes engagement for one share id", async () => {
    const log = new EventLog(storage);
    await log.append({ eventType: "view", shareId: "share-a" });
    await log.append({ eventType: "view", shareId: "share-a" });
    await log.append({ eventType: "social_share", shareId: "share-a", payload: { platform: " Twitter" } });
    await log.append({ eventType: "social_share", shareId: "share-a", payload: { platform: "twitter" } });
    await log.append({ eventType: "social_share", shareId: "share-a", payload: { platform: "facebook" } });
    await log.append({ eventType: "social_share", shareId: "share-a" });
    await log.append({ eventType: "card_download", shareId: "share-a" });
    await log.append({ eventType: "qr_download", shareId: "share-a" });
    await log.append({ eventType: "copy_link", shareId: "share-a" });
    await log.append({ eventType: "view", shareId: "share-b" });

    expect(await log.engagementSummary("share-a")).toEqual({
      viewCount: 2,
      shareCountByPlatform: { twitter: 2, facebook: 1, unknown: 1 },
      downloadCount: 2,
      copyLinkCount: 1,
    });
  });

  it("counts platform names that collide with object built-ins", async () => {
    const log = new EventLog(storage);
    await log.append({ eventType: "social_share", shareId: "share-a", payload: { platform: "constructor" } });
    await log.append({ eventType: "social_share", shareId: "share-a", payload: { platform: "__proto__" } });
    await log.append({ eventType: "social_share", shareId: "share-a", payload: { platform: "__proto__" } });

    const { shareCountByPlatform } = await log.engagementSummary("share-a");

    expect(Object.entries(shareCountByPlatform)).toEqual([
      ["constructor", 1],
      ["__proto__", 2],
    ]);
  });
});
