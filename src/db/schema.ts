import {
  pgTable,
  text,
  timestamp,
  integer,
  boolean,
  doublePrecision,
  jsonb,
  serial,
  index,
} from "drizzle-orm/pg-core";

// Cupping session entity.
// One evaluation per row; attributes and flavor notes are stored as JSON.
export const cuppingSessions = pgTable(
  "cupping_sessions",
  {
    sessionId: text("session_id").primaryKey(),
    shareId: text("share_id").notNull().unique(),
    tasterName: text("taster_name").notNull(),
    anonymousMode: boolean("anonymous_mode").notNull().default(false),
    attributes: jsonb("attributes").$type<Record<string, number>>().notNull(),
    origin: text("origin").notNull(),
    producer: text("producer").notNull(),
    roastLevel: text("roast_level").notNull(),
    preparationMethod: text("preparation_method").notNull(),
    flavorNotes: jsonb("flavor_notes").$type<string[]>().notNull(),
    cost: doublePrecision("cost"), // null for imported legacy rows
    schemaVersion: integer("schema_version").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
    finalizedAt: timestamp("finalized_at", { withTimezone: true }),
    excludedAt: timestamp("excluded_at", { withTimezone: true }), // soft exclusion, rows are never deleted
  },
  (table) => ({
    createdAtIdx: index("cupping_sessions_created_at_idx").on(table.createdAt),
  }),
);

// Append-only interaction log keyed by share id (no foreign key on purpose:
// events may outlive the session they point at).
export const analyticsEvents = pgTable(
  "analytics_events",
  {
    id: serial("id").primaryKey(),
    eventType: text("event_type").notNull(),
    shareId: text("share_id").notNull(),
    payload: jsonb("payload").$type<Record<string, unknown>>().notNull(),
    occurredAt: timestamp("occurred_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    shareOccurredAtIdx: index("analytics_events_share_occurred_at_idx").on(table.shareId, table.occurredAt),
  }),
);
