import type { ScoreBounds } from "../config";
import { displayTaster } from "../sessions/repository";
import type {
  AggregateSnapshot,
  AttributeStats,
  FlavorRankingEntry,
  OriginBreakdownEntry,
  QualityRankingEntry,
  QualityTier,
  SessionProfile,
  TemporalTrendPoint,
  TrendDirection,
} from "../types/api";
import type { CuppingSession } from "../types/session";
import { compositeScore, mean } from "./scoring";

export type AnalyticsFilter = {
  origin?: string;
  from?: Date;
  to?: Date;
  // Soft-excluded sessions are left out unless asked for.
  includeExcluded?: boolean;
};

export type SessionSource = {
  listAll(): Promise<CuppingSession[]>;
};

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

// Composite thresholds per tier, highest first.
const QUALITY_TIERS: Array<[QualityTier, number]> = [
  ["outstanding", 9],
  ["excellent", 8.5],
  ["veryGood", 8],
  ["good", 7.5],
  ["fair", Number.NEGATIVE_INFINITY],
];
const SPECIALTY_THRESHOLD = 8;

export function applyFilter(sessions: CuppingSession[], filter: AnalyticsFilter = {}): CuppingSession[] {
  const origin = filter.origin?.trim().toLowerCase();
  return sessions.filter((session) => {
    if (!filter.includeExcluded && session.excludedAt) return false;
    if (origin && session.origin.toLowerCase() !== origin) return false;
    if (filter.from && session.createdAt < filter.from) return false;
    if (filter.to && session.createdAt > filter.to) return false;
    return true;
  });
}

// Earliest first; session id settles identical timestamps.
function chronological(sessions: CuppingSession[]): CuppingSession[] {
  return [...sessions].sort(
    (a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.sessionId.localeCompare(b.sessionId),
  );
}

export function normalizeFlavorNote(note: string): string {
  return note.trim().toLowerCase().replace(/\s+/g, " ");
}

function attributeStats(values: number[], bounds: ScoreBounds): AttributeStats {
  const steps = Math.max(1, Math.ceil(bounds.max - bounds.min));
  const histogram = Array.from({ length: steps }, (_, index) => ({
    from: bounds.min + index,
    to: Math.min(bounds.min + index + 1, bounds.max),
    count: 0,
  }));
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    const bin = Math.min(steps - 1, Math.max(0, Math.floor(value - bounds.min)));
    histogram[bin].count += 1;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return {
    mean: mean(values) ?? 0,
    min,
    max,
    count: values.length,
    histogram,
  };
}

// Counts each note once per session; ties keep the order notes first appeared in.
export function rankFlavorNotes(sessions: CuppingSession[]): FlavorRankingEntry[] {
  const counts = new Map<string, number>();
  for (const session of chronological(sessions)) {
    const notes = new Set(session.flavorNotes.map(normalizeFlavorNote).filter(Boolean));
    for (const note of notes) counts.set(note, (counts.get(note) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, so insertion (first-seen) order breaks ties.
  return Array.from(counts.entries())
    .map(([note, count]) => ({ note, count }))
    .sort((a, b) => b.count - a.count);
}

// Highest composite first; an earlier session wins a tie.
export function rankSessions(sessions: CuppingSession[]): QualityRankingEntry[] {
  const entries: Array<QualityRankingEntry & { sessionId: string }> = [];
  for (const session of sessions) {
    const score = compositeScore(session);
    if (score === null) continue;
    entries.push({
      sessionId: session.sessionId,
      shareId: session.shareId,
      taster: displayTaster(session),
      origin: session.origin,
      compositeScore: score,
      createdAt: session.createdAt,
    });
  }
  return entries
    .sort(
      (a, b) =>
        b.compositeScore - a.compositeScore ||
        a.createdAt.getTime() - b.createdAt.getTime() ||
        a.sessionId.localeCompare(b.sessionId),
    )
    .map(({ sessionId: _sessionId, ...entry }) => entry);
}

// Groups by a text field; largest group first, ties in order of first appearance.
function groupSessions(
  sessions: CuppingSession[],
  key: (session: CuppingSession) => string,
): Array<{ name: string; members: CuppingSession[] }> {
  const groups = new Map<string, CuppingSession[]>();
  for (const session of chronological(sessions)) {
    const name = key(session).trim() || "Unknown";
    const group = groups.get(name);
    if (group) group.push(session);
    else groups.set(name, [session]);
  }
  return Array.from(groups.entries())
    .map(([name, members]) => ({ name, members }))
    .sort((a, b) => b.members.length - a.members.length);
}

function originBreakdown(sessions: CuppingSession[]): OriginBreakdownEntry[] {
  return groupSessions(sessions, (session) => session.origin).map(({ name, members }) => ({
    origin: name,
    count: members.length,
    meanCompositeScore: mean(
      members.map(compositeScore).filter((score): score is number => score !== null),
    ),
  }));
}

function tierFor(score: number): QualityTier {
  for (const [tier, threshold] of QUALITY_TIERS) {
    if (score >= threshold) return tier;
  }
  return "fair";
}

/**
 * Stateless aggregation over the full session collection. Every query reads
 * the collection afresh; a failed read aborts the query instead of returning
 * partial figures.
 */
export class AnalyticsEngine {
  constructor(
    private readonly sessions: SessionSource,
    private readonly bounds: ScoreBounds,
  ) {}

  async communityTrends(filter: AnalyticsFilter = {}): Promise<AggregateSnapshot> {
    return this.snapshot(applyFilter(await this.sessions.listAll(), filter));
  }

  snapshot(sessions: CuppingSession[]): AggregateSnapshot {
    const valuesByAttribute = new Map<string, number[]>();
    for (const session of chronological(sessions)) {
      for (const [name, score] of Object.entries(session.attributes)) {
        const values = valuesByAttribute.get(name);
        if (values) values.push(score);
        else valuesByAttribute.set(name, [score]);
      }
    }
    const attributes: Record<string, AttributeStats> = {};
    for (const [name, values] of valuesByAttribute) attributes[name] = attributeStats(values, this.bounds);

    const composites = sessions.map(compositeScore).filter((score): score is number => score !== null);
    const qualityTiers: Record<QualityTier, number> = { outstanding: 0, excellent: 0, veryGood: 0, good: 0, fair: 0 };
    for (const score of composites) qualityTiers[tierFor(score)] += 1;

    return {
      totalSessions: sessions.length,
      communityMean: mean(composites),
      attributes,
      flavorRanking: rankFlavorNotes(sessions),
      qualityRanking: rankSessions(sessions),
      origins: originBreakdown(sessions),
      preparationMethods: groupSessions(sessions, (session) => session.preparationMethod).map(
        ({ name, members }) => ({ method: name, count: members.length }),
      ),
      qualityTiers,
      specialtyShare: composites.length
        ? composites.filter((score) => score >= SPECIALTY_THRESHOLD).length / composites.length
        : null,
    };
  }

  async temporalTrend(bucketSizeMs: number, filter: AnalyticsFilter = {}): Promise<TemporalTrendPoint[]> {
    return bucketByTime(applyFilter(await this.sessions.listAll(), filter), bucketSizeMs);
  }

  // Compares one session with every other non-excluded session.
  async sessionInsights(session: CuppingSession): Promise<string[]> {
    const community = (await this.sessions.listAll()).filter(
      (candidate) => candidate.sessionId !== session.sessionId && !candidate.excludedAt,
    );
    return describeSession(session, community);
  }
}

// Fixed-width windows aligned to the Unix epoch (UTC). Empty windows are omitted.
export function bucketByTime(sessions: CuppingSession[], bucketSizeMs: number): TemporalTrendPoint[] {
  if (!Number.isFinite(bucketSizeMs) || bucketSizeMs <= 0) {
    throw new RangeError("bucket size must be a positive number of milliseconds");
  }

  const buckets = new Map<number, number[]>();
  for (const session of sessions) {
    const score = compositeScore(session);
    if (score === null) continue;
    const start = Math.floor(session.createdAt.getTime() / bucketSizeMs) * bucketSizeMs;
    const scores = buckets.get(start);
    if (scores) scores.push(score);
    else buckets.set(start, [score]);
  }

  return Array.from(buckets.entries())
    .sort(([a], [b]) => a - b)
    .map(([start, scores]) => ({
      bucketStart: new Date(start),
      meanCompositeScore: scores.reduce((sum, value) => sum + value, 0) / scores.length,
      count: scores.length,
    }));
}

export function trendDirection(points: TemporalTrendPoint[]): TrendDirection {
  if (points.length < 2) return "flat";
  const latest = points[points.length - 1].meanCompositeScore;
  const previous = points[points.length - 2].meanCompositeScore;
  if (latest > previous) return "up";
  if (latest < previous) return "down";
  return "flat";
}

function signed(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}`;
}

export function describeSession(session: CuppingSession, community: CuppingSession[]): string[] {
  const own = compositeScore(session);
  const communityScores = community.map(compositeScore).filter((score): score is number => score !== null);
  const communityMean = mean(communityScores);
  if (own === null || communityMean === null) return [];

  const observations: string[] = [];
  const delta = own - communityMean;
  const rounded = Number(delta.toFixed(2));
  if (rounded > 0) {
    observations.push(
      `Composite score ${own.toFixed(2)} is above the community mean of ${communityMean.toFixed(2)} (${signed(delta)}).`,
    );
  } else if (rounded < 0) {
    observations.push(
      `Composite score ${own.toFixed(2)} is below the community mean of ${communityMean.toFixed(2)} (${signed(delta)}).`,
    );
  } else {
    observations.push(`Composite score ${own.toFixed(2)} matches the community mean of ${communityMean.toFixed(2)}.`);
  }

  let largest: { name: string; own: number; community: number } | null = null;
  for (const [name, score] of Object.entries(session.attributes)) {
    const others = community
      .map((candidate) => candidate.attributes[name])
      .filter((value): value is number => typeof value === "number");
    const attributeMean = mean(others);
    if (attributeMean === null) continue;
    if (!largest || Math.abs(score - attributeMean) > Math.abs(largest.own - largest.community)) {
      largest = { name, own: score, community: attributeMean };
    }
  }
  if (largest) {
    observations.push(
      `Largest deviation: ${largest.name} at ${largest.own.toFixed(2)} vs community ${largest.community.toFixed(2)} (${signed(largest.own - largest.community)}).`,
    );
  }

  return observations;
}

// Single-session facts that need no community data.
export function sessionProfile(session: CuppingSession): SessionProfile {
  const entries = Object.entries(session.attributes);
  let strongest: { name: string; score: number } | null = null;
  let weakest: { name: string; score: number } | null = null;
  for (const [name, score] of entries) {
    if (!strongest || score > strongest.score) strongest = { name, score };
    if (!weakest || score < weakest.score) weakest = { name, score };
  }
  return { compositeScore: compositeScore(session), strongestAttribute: strongest, weakestAttribute: weakest };
}
