import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";

import {
  DAY_MS,
  HOUR_MS,
  WEEK_MS,
  sessionProfile,
  trendDirection,
  type AnalyticsEngine,
  type AnalyticsFilter,
} from "./analytics/engine";
import { AppError, NotFoundError, ValidationError } from "./errors";
import type { EventLog } from "./events/event-log";
import type { Logger } from "./logger";
import { toOwnerSession, toPublicSession, type SessionRepository } from "./sessions/repository";
import { SHARE_ID_PATTERN, type ShareIdService } from "./sessions/share-id";
import { parseAnonymousFlag } from "./sessions/validation";
import type {
  CreateSessionResponse,
  ErrorResponse,
  SessionInsightsResponse,
  TemporalTrendResponse,
  ValidationErrorResponse,
  ValidationIssue,
} from "./types/api";

export type AppServices = {
  sessions: SessionRepository;
  shareIds: ShareIdService;
  analytics: AnalyticsEngine;
  events: EventLog;
  logger: Logger;
};

const BUCKET_SIZES = new Map<string, number>([
  ["hour", HOUR_MS],
  ["day", DAY_MS],
  ["week", WEEK_MS],
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Single-valued query parameter, or undefined when absent or repeated.
function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function parseDateParam(req: Request, name: string, issues: ValidationIssue[]): Date | undefined {
  const raw = queryParam(req, name);
  if (raw === undefined) return undefined;
  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    issues.push({ field: name, message: "must be a valid date" });
    return undefined;
  }
  return parsed;
}

// Shared analytics filter: origin, from, to, includeExcluded.
function parseAnalyticsFilter(req: Request): AnalyticsFilter {
  const issues: ValidationIssue[] = [];
  const from = parseDateParam(req, "from", issues);
  const to = parseDateParam(req, "to", issues);
  const includeExcluded = queryParam(req, "includeExcluded");
  if (includeExcluded !== undefined && includeExcluded !== "true" && includeExcluded !== "false") {
    issues.push({ field: "includeExcluded", message: "must be true or false" });
  }
  if (from && to && from > to) issues.push({ field: "from", message: "must not be after to" });
  if (issues.length) throw new ValidationError(issues);

  return { origin: queryParam(req, "origin"), from, to, includeExcluded: includeExcluded === "true" };
}

function requireShareId(req: Request<{ shareId: string }>): string {
  const shareId = req.params.shareId;
  if (!shareId || !SHARE_ID_PATTERN.test(shareId)) throw new NotFoundError("Shared session not found");
  return shareId;
}

// Standardizes validation error response shape.
function sendValidationError(res: Response, issues: ValidationIssue[], status = 400): void {
  const payload: ValidationErrorResponse = { errors: issues };
  res.status(status).json(payload);
}

function sendError(res: Response, status: number, message: string): void {
  const payload: ErrorResponse = { error: message };
  res.status(status).json(payload);
}

// Builds the HTTP surface over already-wired services, for the server and tests alike.
export function createApp(services: AppServices) {
  const { sessions, shareIds, analytics, events, logger } = services;
  const app = express();

  // Basic middleware: CORS and JSON body parsing.
  app.use(cors());
  app.use(express.json());

  // Quick health endpoint to confirm service is up.
  app.get("/health", (_req, res) => {
    res.status(200).json({ ok: true, message: "cupping-journal-api is running" });
  });

  // POST /sessions
  // Validates and stores a cupping session. The session id in the response is
  // the creator's handle for later edits; it is returned nowhere else.
  app.post("/sessions", async (req, res) => {
    const body: unknown = req.body;
    const anonymousMode = parseAnonymousFlag(isRecord(body) ? body.anonymousMode : undefined);
    const shareId = await sessions.create(body, anonymousMode);
    const { sessionId } = await sessions.getByShareId(shareId);
    const payload: CreateSessionResponse = { sessionId, shareId, shareUrl: shareIds.shareUrl(shareId) };
    res.status(201).json(payload);
  });

  // GET /sessions
  // Every session as publicly rendered, oldest first.
  app.get("/sessions", async (_req, res) => {
    res.json((await sessions.listAll()).map(toPublicSession));
  });

  // GET /sessions/:id
  app.get("/sessions/:id", async (req, res) => {
    res.json(toOwnerSession(await sessions.getById(req.params.id)));
  });

  // PATCH /sessions/:id
  // Late edits to attributes and flavor notes, refused once finalized.
  app.patch("/sessions/:id", async (req, res) => {
    res.json(toOwnerSession(await sessions.amend(req.params.id, req.body)));
  });

  // PATCH /sessions/:id/anonymous
  // Switches the displayed identity for every current and future public view.
  app.patch("/sessions/:id/anonymous", async (req, res) => {
    const body: unknown = req.body;
    const anonymousMode = parseAnonymousFlag(isRecord(body) ? body.anonymousMode : undefined, { required: true });
    res.json(toOwnerSession(await sessions.setAnonymous(req.params.id, anonymousMode)));
  });

  // PATCH /sessions/:id/finalize
  app.patch("/sessions/:id/finalize", async (req, res) => {
    res.json(toOwnerSession(await sessions.finalize(req.params.id)));
  });

  // PATCH /sessions/:id/exclude
  // Soft exclusion from community analytics; the share link keeps working.
  app.patch("/sessions/:id/exclude", async (req, res) => {
    res.json(toOwnerSession(await sessions.exclude(req.params.id)));
  });

  // PATCH /sessions/:id/restore
  app.patch("/sessions/:id/restore", async (req, res) => {
    res.json(toOwnerSession(await sessions.restore(req.params.id)));
  });

  // GET /sessions/:id/insights
  // Single-session profile plus comparisons against the community.
  app.get("/sessions/:id/insights", async (req, res) => {
    const session = await sessions.getById(req.params.id);
    const payload: SessionInsightsResponse = {
      ...sessionProfile(session),
      observations: await analytics.sessionInsights(session),
    };
    res.json(payload);
  });

  // GET /share/:shareId
  // Public rendering with anonymity applied.
  app.get("/share/:shareId", async (req, res) => {
    const session = await sessions.getByShareId(requireShareId(req));
    res.json(toPublicSession(session));
  });

  // POST /share/:shareId/events
  // Event ingestion from the presentation layer (views, shares, downloads).
  app.post("/share/:shareId/events", async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      sendValidationError(res, [{ field: "body", message: "must be a JSON object" }]);
      return;
    }
    await events.append({ eventType: body.eventType, shareId: requireShareId(req), payload: body.payload });
    res.status(201).json({ ok: true });
  });

  // GET /share/:shareId/events
  app.get("/share/:shareId/events", async (req, res) => {
    res.json(await events.query(requireShareId(req)));
  });

  // GET /share/:shareId/engagement
  app.get("/share/:shareId/engagement", async (req, res) => {
    res.json(await events.engagementSummary(requireShareId(req)));
  });

  // GET /analytics/trends?origin=&from=&to=&includeExcluded=
  // Community snapshot recomputed from every stored session.
  app.get("/analytics/trends", async (req, res) => {
    res.json(await analytics.communityTrends(parseAnalyticsFilter(req)));
  });

  // GET /analytics/temporal?bucket=hour|day|week plus the trends filter.
  app.get("/analytics/temporal", async (req, res) => {
    const bucket = queryParam(req, "bucket") ?? "day";
    const bucketSizeMs = BUCKET_SIZES.get(bucket);
    if (bucketSizeMs === undefined) {
      sendValidationError(res, [{ field: "bucket", message: "must be hour, day or week" }]);
      return;
    }
    const points = await analytics.temporalTrend(bucketSizeMs, parseAnalyticsFilter(req));
    const payload: TemporalTrendResponse = { bucketSizeMs, direction: trendDirection(points), points };
    res.json(payload);
  });

  app.use((_req, res) => {
    sendError(res, 404, "Route not found");
  });

  // Maps domain errors to status codes; anything unexpected is logged and hidden.
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ValidationError) {
      sendValidationError(res, error.issues);
    } else if (isRecord(error) && error.type === "entity.parse.failed") {
      sendValidationError(res, [{ field: "body", message: "must be valid JSON" }]);
    } else if (error instanceof AppError) {
      if (error.status >= 500) logger.error({ err: error, path: req.path }, error.message);
      sendError(res, error.status, error.message);
    } else {
      logger.error({ err: error, method: req.method, path: req.path }, "unhandled request error");
      sendError(res, 500, "Internal server error");
    }
  });

  return app;
}
