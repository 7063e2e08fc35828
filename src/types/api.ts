// Shared response contract types for HTTP handlers and charting clients.

// One field-level validation issue.
export type ValidationIssue = {
  field: string;
  message: string;
};

// Standardized validation error payload.
export type ValidationErrorResponse = {
  errors: ValidationIssue[];
};

export type ErrorResponse = {
  error: string;
};

export type CreateSessionResponse = {
  sessionId: string;
  shareId: string;
  shareUrl: string;
};

// Session as rendered on public share pages. Never carries the internal id.
export type PublicSessionResponse = {
  shareId: string;
  taster: string;
  anonymousMode: boolean;
  attributes: Record<string, number>;
  compositeScore: number | null;
  origin: string;
  producer: string;
  roastLevel: string;
  preparationMethod: string;
  flavorNotes: string[];
  cost: number | null;
  createdAt: Date;
  finalized: boolean;
};

// View for the holder of the session id: the public rendering plus lifecycle
// state. The taster still follows the anonymity flag.
export type OwnerSessionResponse = PublicSessionResponse & {
  sessionId: string;
  updatedAt: Date;
  finalizedAt: Date | null;
  excludedAt: Date | null;
};

export type AttributeStats = {
  mean: number;
  min: number;
  max: number;
  count: number;
  // One unit-width bin per score step, starting at the lower bound.
  histogram: Array<{ from: number; to: number; count: number }>;
};

export type FlavorRankingEntry = {
  note: string;
  count: number;
};

export type QualityRankingEntry = {
  shareId: string;
  taster: string;
  origin: string;
  compositeScore: number;
  createdAt: Date;
};

export type OriginBreakdownEntry = {
  origin: string;
  count: number;
  meanCompositeScore: number | null;
};

export type QualityTier = "outstanding" | "excellent" | "veryGood" | "good" | "fair";

// Full community snapshot; recomputed per request, never persisted.
export type AggregateSnapshot = {
  totalSessions: number;
  communityMean: number | null;
  attributes: Record<string, AttributeStats>;
  flavorRanking: FlavorRankingEntry[];
  qualityRanking: QualityRankingEntry[];
  origins: OriginBreakdownEntry[];
  preparationMethods: Array<{ method: string; count: number }>;
  qualityTiers: Record<QualityTier, number>;
  specialtyShare: number | null;
};

export type TemporalTrendPoint = {
  bucketStart: Date;
  meanCompositeScore: number;
  count: number;
};

export type TrendDirection = "up" | "down" | "flat";

export type TemporalTrendResponse = {
  bucketSizeMs: number;
  direction: TrendDirection;
  points: TemporalTrendPoint[];
};

export type SessionProfile = {
  compositeScore: number | null;
  strongestAttribute: { name: string; score: number } | null;
  weakestAttribute: { name: string; score: number } | null;
};

export type SessionInsightsResponse = SessionProfile & {
  observations: string[];
};

export type EngagementSummary = {
  viewCount: number;
  shareCountByPlatform: Record<string, number>;
  downloadCount: number;
  copyLinkCount: number;
};
