import { ValidationError } from "../errors";
import type { StorageBackend } from "../storage";
import type { EngagementSummary } from "../types/api";
import { EVENT_TYPES, isEventType, type AnalyticsEventRecord } from "../types/session";

export type EventInput = {
  eventType: unknown;
  shareId: string;
  payload?: unknown;
};

// Append-only log of share-page interactions. Appends are never dropped: a
// storage failure reaches the caller.
export class EventLog {
  constructor(
    private readonly storage: Pick<StorageBackend, "appendEvent" | "listEvents">,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async append(input: EventInput): Promise<AnalyticsEventRecord> {
    if (!isEventType(input.eventType)) {
      throw new ValidationError([{ field: "eventType", message: `must be one of ${EVENT_TYPES.join(", ")}` }]);
    }
    const payload = input.payload ?? {};
    if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
      throw new ValidationError([{ field: "payload", message: "must be an object" }]);
    }

    const event: AnalyticsEventRecord = {
      eventType: input.eventType,
      shareId: input.shareId,
      timestamp: this.clock(),
      payload: Object.fromEntries(Object.entries(payload)),
    };
    await this.storage.appendEvent(event);
    return event;
  }

  // Oldest first; events with equal timestamps keep their append order.
  async query(shareId: string): Promise<AnalyticsEventRecord[]> {
    const events = await this.storage.listEvents(shareId);
    return events.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  async engagementSummary(shareId: string): Promise<EngagementSummary> {
    const summary: EngagementSummary = { viewCount: 0, shareCountByPlatform: {}, downloadCount: 0, copyLinkCount: 0 };
    // Platform names are client input; a Map keeps them away from Object.prototype.
    const platforms = new Map<string, number>();
    for (const event of await this.query(shareId)) {
      switch (event.eventType) {
        case "view":
          summary.viewCount += 1;
          break;
        case "social_share": {
          const raw = event.payload.platform;
          const platform = (typeof raw === "string" && raw.trim().toLowerCase()) || "unknown";
          platforms.set(platform, (platforms.get(platform) ?? 0) + 1);
          break;
        }
        case "card_download":
        case "qr_download":
          summary.downloadCount += 1;
          break;
        case "copy_link":
          summary.copyLinkCount += 1;
          break;
      }
    }
    summary.shareCountByPlatform = Object.fromEntries(platforms);
    return summary;
  }
}
