import { asc, eq } from "drizzle-orm";

import type { Database } from "../db/client";
import { ShareIdTakenError } from "../errors";
import { analyticsEvents, cuppingSessions } from "../db/schema";
import {
  CURRENT_SCHEMA_VERSION,
  isEventType,
  type AnalyticsEventRecord,
  type CuppingSession,
} from "../types/session";
import type { SessionMutator, StorageBackend } from "./backend";

type SessionRow = typeof cuppingSessions.$inferSelect;

// Maps DB session row to the domain record (drops the version marker).
function fromRow(row: SessionRow): CuppingSession {
  return {
    sessionId: row.sessionId,
    shareId: row.shareId,
    tasterName: row.tasterName,
    anonymousMode: row.anonymousMode,
    attributes: row.attributes,
    origin: row.origin,
    producer: row.producer,
    roastLevel: row.roastLevel,
    preparationMethod: row.preparationMethod,
    flavorNotes: row.flavorNotes,
    cost: row.cost,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    finalizedAt: row.finalizedAt,
    excludedAt: row.excludedAt,
  };
}

const UNIQUE_VIOLATION = "23505";

// Inserts upsert on session_id, so the only unique key a put can violate is share_id.
function isUniqueViolation(error: unknown): boolean {
  for (let current = error; current instanceof Error; current = current.cause) {
    if ("code" in current && current.code === UNIQUE_VIOLATION) return true;
  }
  return false;
}

function toRow(record: CuppingSession): typeof cuppingSessions.$inferInsert {
  return { ...record, schemaVersion: CURRENT_SCHEMA_VERSION };
}

// Columns a rewrite may touch; ids and creation time stay as first written.
function mutableColumns(record: CuppingSession): Partial<typeof cuppingSessions.$inferInsert> {
  return {
    tasterName: record.tasterName,
    anonymousMode: record.anonymousMode,
    attributes: record.attributes,
    origin: record.origin,
    producer: record.producer,
    roastLevel: record.roastLevel,
    preparationMethod: record.preparationMethod,
    flavorNotes: record.flavorNotes,
    cost: record.cost,
    schemaVersion: CURRENT_SCHEMA_VERSION,
    updatedAt: record.updatedAt,
    finalizedAt: record.finalizedAt,
    excludedAt: record.excludedAt,
  };
}

/**
 * Relational store over the `cupping_sessions` / `analytics_events` tables.
 * Per-record atomicity comes from single-statement writes and, for
 * read-modify-write, a row lock held inside a transaction.
 */
export class PostgresStorageBackend implements StorageBackend {
  constructor(
    private readonly db: Database,
    private readonly onClose: () => Promise<void> = async () => {},
  ) {}

  async put(record: CuppingSession): Promise<void> {
    try {
      await this.db
        .insert(cuppingSessions)
        .values(toRow(record))
        .onConflictDoUpdate({ target: cuppingSessions.sessionId, set: mutableColumns(record) });
    } catch (error) {
      if (isUniqueViolation(error)) throw new ShareIdTakenError(record.shareId, { cause: error });
      throw error;
    }
  }

  async get(sessionId: string): Promise<CuppingSession | null> {
    const rows = await this.db.select().from(cuppingSessions).where(eq(cuppingSessions.sessionId, sessionId));
    return rows[0] ? fromRow(rows[0]) : null;
  }

  async getByShareId(shareId: string): Promise<CuppingSession | null> {
    const rows = await this.db.select().from(cuppingSessions).where(eq(cuppingSessions.shareId, shareId));
    return rows[0] ? fromRow(rows[0]) : null;
  }

  async listAll(): Promise<CuppingSession[]> {
    const rows = await this.db
      .select()
      .from(cuppingSessions)
      .orderBy(asc(cuppingSessions.createdAt), asc(cuppingSessions.sessionId));
    return rows.map(fromRow);
  }

  async exists(shareId: string): Promise<boolean> {
    const rows = await this.db
      .select({ sessionId: cuppingSessions.sessionId })
      .from(cuppingSessions)
      .where(eq(cuppingSessions.shareId, shareId))
      .limit(1);
    return rows.length > 0;
  }

  async update(sessionId: string, mutator: SessionMutator): Promise<CuppingSession | null> {
    return this.db.transaction(async (tx) => {
      const rows = await tx
        .select()
        .from(cuppingSessions)
        .where(eq(cuppingSessions.sessionId, sessionId))
        .for("update");
      if (!rows[0]) return null;

      const current = fromRow(rows[0]);
      const next = mutator(current);
      if (next.sessionId !== current.sessionId || next.shareId !== current.shareId) {
        throw new Error("session and share ids are immutable");
      }

      await tx.update(cuppingSessions).set(mutableColumns(next)).where(eq(cuppingSessions.sessionId, sessionId));
      return next;
    });
  }

  async appendEvent(event: AnalyticsEventRecord): Promise<void> {
    await this.db.insert(analyticsEvents).values({
      eventType: event.eventType,
      shareId: event.shareId,
      payload: event.payload,
      occurredAt: event.timestamp,
    });
  }

  async listEvents(shareId: string): Promise<AnalyticsEventRecord[]> {
    const rows = await this.db
      .select()
      .from(analyticsEvents)
      .where(eq(analyticsEvents.shareId, shareId))
      .orderBy(asc(analyticsEvents.occurredAt), asc(analyticsEvents.id));

    const events: AnalyticsEventRecord[] = [];
    for (const row of rows) {
      const eventType = row.eventType;
      // Rows written by something other than the event log are ignored.
      if (!isEventType(eventType)) continue;
      events.push({ eventType, shareId: row.shareId, timestamp: row.occurredAt, payload: row.payload });
    }
    return events;
  }

  close(): Promise<void> {
    return this.onClose();
  }
}
