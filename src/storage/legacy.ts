import fs from "fs/promises";
import { z } from "zod";

import type { ScoreBounds } from "../config";
import type { Logger } from "../logger";
import type { AnalyticsEventRecord, AttributeScores, CuppingSession } from "../types/session";
import type { SessionMutator, StorageBackend } from "./backend";

/**
 * Legacy layout (schema version 1): the earlier app kept everything in one
 * JSON document, `{ cupping_sessions: [...], analytics: [...] }`, with each
 * session holding `samples` and per-sample score sheets on the SCA form.
 *
 * Records found only there are translated and written once to the current
 * backend on first read. The legacy document itself is never modified.
 */

// Legacy score sheet categories -> current attribute names.
const LEGACY_CATEGORIES: Record<string, string> = {
  fragrance: "aroma",
  flavor: "flavor",
  aftertaste: "aftertaste",
  acidity: "acidity",
  body: "body",
  balance: "balance",
  uniformity: "uniformity",
  clean_cup: "clean_cup",
  sweetness: "sweetness",
  overall: "overall",
};

const LegacySessionSchema = z
  .object({
    session_id: z.string().min(1).nullish(),
    share_id: z.string().min(1).nullish(),
    cupper: z.string().nullish(),
    producer: z.string().nullish(),
    protocol: z.string().nullish(),
    status: z.string().nullish(),
    anonymous_mode: z.boolean().nullish(),
    date: z.string().nullish(),
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
    samples: z.array(z.object({ origin: z.string().nullish() }).passthrough()).nullish(),
    scores: z.array(z.record(z.string(), z.unknown())).nullish(),
  })
  .passthrough();

type LegacySession = z.infer<typeof LegacySessionSchema>;

const LegacyDocumentSchema = z
  .object({
    cupping_sessions: z.array(z.unknown()).default([]),
  })
  .passthrough();

const LEGACY_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2})?)(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

// The earlier app wrote naive ISO timestamps with microseconds; read them as UTC.
export function parseLegacyTimestamp(value: string | null | undefined): Date | null {
  const match = value ? LEGACY_TIMESTAMP.exec(value.trim()) : null;
  if (!match) return null;
  const [, date, time, fraction, zone] = match;
  const parsed = new Date(`${date}T${time ?? "00:00:00"}${fraction ? fraction.slice(0, 4) : ""}${zone ?? "Z"}`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

type TranslationResult = { record: CuppingSession; dropped: string[] } | { skipped: string };

export function translateLegacySession(raw: unknown, bounds: ScoreBounds): TranslationResult {
  const parsed = LegacySessionSchema.safeParse(raw);
  if (!parsed.success) return { skipped: "unreadable legacy record" };

  const legacy: LegacySession = parsed.data;
  if (!legacy.share_id) return { skipped: "legacy record has no share id" };

  const createdAt = parseLegacyTimestamp(legacy.created_at) ?? parseLegacyTimestamp(legacy.date);
  if (!createdAt) return { skipped: "legacy record has no usable timestamp" };

  const sheets = legacy.scores ?? [];
  const attributes: AttributeScores = {};
  const dropped: string[] = [];
  for (const [category, attribute] of Object.entries(LEGACY_CATEGORIES)) {
    const values = sheets
      .map((sheet) => sheet[category])
      .filter((value): value is number => typeof value === "number" && Number.isFinite(value));
    if (!values.length) continue;
    const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
    if (mean < bounds.min || mean > bounds.max) {
      dropped.push(attribute);
      continue;
    }
    attributes[attribute] = mean;
  }

  const flavorNotes: string[] = [];
  const seen = new Set<string>();
  for (const sheet of sheets) {
    const selected = sheet.selected_flavors;
    if (!Array.isArray(selected)) continue;
    for (const flavor of selected) {
      if (typeof flavor !== "string" || !flavor.trim()) continue;
      const key = flavor.trim().toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      flavorNotes.push(flavor.trim());
    }
  }

  const origin = legacy.samples?.find((sample) => sample.origin?.trim())?.origin?.trim();

  return {
    record: {
      sessionId: legacy.session_id ?? `legacy-${legacy.share_id}`,
      shareId: legacy.share_id,
      tasterName: legacy.cupper?.trim() ?? "",
      anonymousMode: legacy.anonymous_mode ?? false,
      attributes,
      origin: origin || "Unknown",
      producer: legacy.producer?.trim() || "Unknown",
      roastLevel: "Unknown",
      preparationMethod: legacy.protocol?.trim() || "Cupping",
      flavorNotes,
      cost: null,
      createdAt,
      updatedAt: parseLegacyTimestamp(legacy.updated_at) ?? createdAt,
      finalizedAt: legacy.status === "Scored" ? createdAt : null,
      excludedAt: null,
    },
    dropped,
  };
}

/**
 * Read-only view of the legacy document, re-parsed only when its mtime changes.
 */
export class LegacyDocumentSource {
  private cached: CuppingSession[] = [];
  private cachedMtimeMs = -1;

  constructor(
    readonly filePath: string,
    private readonly bounds: ScoreBounds,
    private readonly logger: Logger,
  ) {}

  async load(): Promise<CuppingSession[]> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(this.filePath)).mtimeMs;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }
    if (mtimeMs === this.cachedMtimeMs) return this.cached;

    const document = LegacyDocumentSchema.parse(JSON.parse(await fs.readFile(this.filePath, "utf-8")));
    const records: CuppingSession[] = [];
    for (const raw of document.cupping_sessions) {
      const result = translateLegacySession(raw, this.bounds);
      if ("skipped" in result) {
        this.logger.warn({ file: this.filePath, reason: result.skipped }, "skipping legacy session");
        continue;
      }
      if (result.dropped.length) {
        this.logger.warn(
          { sessionId: result.record.sessionId, attributes: result.dropped },
          "dropping out-of-range legacy attributes",
        );
      }
      records.push(result.record);
    }

    this.cached = records;
    this.cachedMtimeMs = mtimeMs;
    return records;
  }
}

/**
 * Decorator that imports legacy records into the current backend on read.
 * Once a record exists in the current backend it is authoritative and the
 * legacy copy is never consulted for it again.
 */
export class LegacyImportingBackend implements StorageBackend {
  constructor(
    private readonly current: StorageBackend,
    private readonly legacy: LegacyDocumentSource,
    private readonly logger: Logger,
  ) {}

  put(record: CuppingSession): Promise<void> {
    return this.current.put(record);
  }

  async get(sessionId: string): Promise<CuppingSession | null> {
    const record = await this.current.get(sessionId);
    if (record) return record;
    const legacy = (await this.legacy.load()).find((candidate) => candidate.sessionId === sessionId);
    return legacy ? this.importRecord(legacy) : null;
  }

  async getByShareId(shareId: string): Promise<CuppingSession | null> {
    const record = await this.current.getByShareId(shareId);
    if (record) return record;
    const legacy = (await this.legacy.load()).find((candidate) => candidate.shareId === shareId);
    return legacy ? this.importRecord(legacy) : null;
  }

  async listAll(): Promise<CuppingSession[]> {
    const records = await this.current.listAll();
    const known = new Set(records.map((record) => record.sessionId));
    let imported = false;
    for (const legacy of await this.legacy.load()) {
      if (known.has(legacy.sessionId)) continue;
      const record = await this.importRecord(legacy);
      if (!record) continue;
      known.add(record.sessionId);
      records.push(record);
      imported = true;
    }
    if (!imported) return records;
    return records.sort(
      (a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.sessionId.localeCompare(b.sessionId),
    );
  }

  async exists(shareId: string): Promise<boolean> {
    if (await this.current.exists(shareId)) return true;
    return (await this.legacy.load()).some((record) => record.shareId === shareId);
  }

  async update(sessionId: string, mutator: SessionMutator): Promise<CuppingSession | null> {
    // Make sure a legacy-only record is in the current layout before rewriting it.
    if (!(await this.get(sessionId))) return null;
    return this.current.update(sessionId, mutator);
  }

  appendEvent(event: AnalyticsEventRecord): Promise<void> {
    return this.current.appendEvent(event);
  }

  listEvents(shareId: string): Promise<AnalyticsEventRecord[]> {
    return this.current.listEvents(shareId);
  }

  close(): Promise<void> {
    return this.current.close();
  }

  private async importRecord(record: CuppingSession): Promise<CuppingSession | null> {
    // Another request may have imported (and since edited) it already.
    const existing = await this.current.get(record.sessionId);
    if (existing) return existing;
    if (await this.current.exists(record.shareId)) {
      this.logger.warn(
        { sessionId: record.sessionId, shareId: record.shareId },
        "legacy share id already taken in current store, not importing",
      );
      return null;
    }

    await this.current.put(record);
    this.logger.info({ sessionId: record.sessionId }, "imported legacy session into current layout");
    return record;
  }
}
