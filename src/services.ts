import { AnalyticsEngine } from "./analytics/engine";
import type { AppServices } from "./app";
import type { AppConfig } from "./config";
import { EventLog } from "./events/event-log";
import type { Logger } from "./logger";
import { SessionRepository, type Clock } from "./sessions/repository";
import { ShareIdService } from "./sessions/share-id";
import type { StorageBackend } from "./storage";

// Wires the core services over one storage backend. No module-level state:
// each call builds an independent graph.
export function createServices(
  config: Pick<AppConfig, "shareId" | "scoring">,
  storage: StorageBackend,
  logger: Logger,
  clock: Clock = () => new Date(),
): AppServices {
  const shareIds = new ShareIdService(storage, config.shareId, logger.child({ component: "share-id" }));
  const sessions = new SessionRepository(storage, shareIds, config.scoring, clock);
  return {
    sessions,
    shareIds,
    analytics: new AnalyticsEngine(sessions, config.scoring.bounds),
    events: new EventLog(storage, clock),
    logger,
  };
}
