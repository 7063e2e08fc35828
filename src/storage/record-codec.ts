import { z } from "zod";

import {
  CURRENT_SCHEMA_VERSION,
  EVENT_TYPES,
  type AnalyticsEventRecord,
  type CuppingSession,
} from "../types/session";

// JSON shape of a session on disk: every field, dates as ISO strings, plus the
// schema version marker.

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const StoredSessionSchema = z.object({
  schemaVersion: z.literal(CURRENT_SCHEMA_VERSION),
  sessionId: z.string().min(1),
  shareId: z.string().min(1),
  tasterName: z.string(),
  anonymousMode: z.boolean(),
  attributes: z.record(z.string(), z.number()),
  origin: z.string(),
  producer: z.string(),
  roastLevel: z.string(),
  preparationMethod: z.string(),
  flavorNotes: z.array(z.string()),
  cost: z.number().nullable(),
  createdAt: isoDate,
  updatedAt: isoDate,
  finalizedAt: isoDate.nullable(),
  excludedAt: isoDate.nullable(),
});

export type StoredSession = z.input<typeof StoredSessionSchema>;

export function encodeSession(session: CuppingSession): StoredSession {
  return {
    schemaVersion: CURRENT_SCHEMA_VERSION,
    sessionId: session.sessionId,
    shareId: session.shareId,
    tasterName: session.tasterName,
    anonymousMode: session.anonymousMode,
    attributes: { ...session.attributes },
    origin: session.origin,
    producer: session.producer,
    roastLevel: session.roastLevel,
    preparationMethod: session.preparationMethod,
    flavorNotes: [...session.flavorNotes],
    cost: session.cost,
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString(),
    finalizedAt: session.finalizedAt ? session.finalizedAt.toISOString() : null,
    excludedAt: session.excludedAt ? session.excludedAt.toISOString() : null,
  };
}

// Throws when the document is not a current-version session record.
export function decodeSession(raw: unknown): CuppingSession {
  const { schemaVersion: _version, ...session } = StoredSessionSchema.parse(raw);
  return session;
}

const StoredEventSchema = z.object({
  eventType: z.enum(EVENT_TYPES),
  shareId: z.string(),
  timestamp: isoDate,
  payload: z.record(z.string(), z.unknown()),
});

export function encodeEvent(event: AnalyticsEventRecord): string {
  return JSON.stringify({
    eventType: event.eventType,
    shareId: event.shareId,
    timestamp: event.timestamp.toISOString(),
    payload: event.payload,
  });
}

export function decodeEvent(line: string): AnalyticsEventRecord | null {
  try {
    const parsed = StoredEventSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    // Torn trailing line from an interrupted append.
    return null;
  }
}
