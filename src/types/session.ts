// Core record shapes shared by storage, repository and analytics.

// Marker written with every persisted session. Version 1 is the legacy
// single-document JSON layout handled by the legacy importer.
export const CURRENT_SCHEMA_VERSION = 2;

export const ANONYMOUS_TASTER = "Anonymous Taster";

// Sensory attribute name -> score within the configured bounds.
export type AttributeScores = Record<string, number>;

// One cupping evaluation as stored.
export type CuppingSession = {
  sessionId: string;
  shareId: string;
  tasterName: string;
  anonymousMode: boolean;
  attributes: AttributeScores;
  origin: string;
  producer: string;
  roastLevel: string;
  preparationMethod: string;
  flavorNotes: string[];
  // Null only for records imported from the legacy layout, which had no cost.
  cost: number | null;
  createdAt: Date;
  updatedAt: Date;
  finalizedAt: Date | null;
  excludedAt: Date | null;
};

// Validated input for a new session; ids and timestamps are assigned on create.
export type NewSessionInput = {
  tasterName: string;
  attributes: AttributeScores;
  origin: string;
  producer: string;
  roastLevel: string;
  preparationMethod: string;
  flavorNotes: string[];
  cost: number;
};

export type SessionAmendment = {
  attributes?: AttributeScores;
  flavorNotes?: string[];
};

export const EVENT_TYPES = ["view", "social_share", "card_download", "qr_download", "copy_link"] as const;

export type EventType = (typeof EVENT_TYPES)[number];

// Append-only interaction record. `shareId` may outlive the session it names.
export type AnalyticsEventRecord = {
  eventType: EventType;
  shareId: string;
  timestamp: Date;
  payload: Record<string, unknown>;
};

export function isEventType(value: unknown): value is EventType {
  return typeof value === "string" && EVENT_TYPES.some((type) => type === value);
}
