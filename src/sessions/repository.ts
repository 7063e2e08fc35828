import { randomUUID } from "crypto";

import { compositeScore } from "../analytics/scoring";
import { NotFoundError, ValidationError } from "../errors";
import type { StorageBackend } from "../storage";
import type { OwnerSessionResponse, PublicSessionResponse } from "../types/api";
import { ANONYMOUS_TASTER, type CuppingSession, type SessionAmendment } from "../types/session";
import { SHARE_ID_PATTERN, type ShareIdService } from "./share-id";
import { validateAmendment, validateNewSession, type ScoringRules } from "./validation";

export type Clock = () => Date;

/**
 * Typed access to cupping sessions. Input is validated here, at the boundary,
 * before anything reaches the storage backend.
 */
export class SessionRepository {
  constructor(
    private readonly storage: StorageBackend,
    private readonly shareIds: ShareIdService,
    private readonly rules: ScoringRules,
    private readonly clock: Clock = () => new Date(),
  ) {}

  // Returns the public share id of the stored session. A share id claimed by
  // another writer between minting and the write is replaced by a fresh one.
  async create(sessionData: unknown, anonymousMode: boolean): Promise<string> {
    const input = validateNewSession(sessionData, this.rules);
    const sessionId = randomUUID();
    const now = this.clock();

    return this.shareIds.mintWith((shareId) =>
      this.storage.put({
        sessionId,
        shareId,
        ...input,
        anonymousMode,
        createdAt: now,
        updatedAt: now,
        finalizedAt: null,
        excludedAt: null,
      }),
    );
  }

  async getById(sessionId: string): Promise<CuppingSession> {
    const record = await this.storage.get(sessionId);
    if (!record) throw NotFoundError.session(sessionId);
    return record;
  }

  // Public lookup: errors never mention internal ids.
  async getByShareId(shareId: string): Promise<CuppingSession> {
    if (!SHARE_ID_PATTERN.test(shareId)) throw new NotFoundError("Shared session not found");
    const record = await this.storage.getByShareId(shareId);
    if (!record) throw NotFoundError.sharedSession(shareId);
    return record;
  }

  // Idempotent. Takes effect on every later read, including links shared before the change.
  async setAnonymous(sessionId: string, anonymousMode: boolean): Promise<CuppingSession> {
    const existing = await this.getById(sessionId);
    if (existing.anonymousMode === anonymousMode) return existing;
    return this.mutate(sessionId, (current) =>
      current.anonymousMode === anonymousMode ? current : { ...current, anonymousMode, updatedAt: this.clock() },
    );
  }

  listAll(): Promise<CuppingSession[]> {
    return this.storage.listAll();
  }

  // Late edits before finalization: attributes merge, flavor notes append.
  async amend(sessionId: string, changes: unknown): Promise<CuppingSession> {
    const amendment: SessionAmendment = validateAmendment(changes, this.rules);
    return this.mutate(sessionId, (current) => {
      if (current.finalizedAt) {
        throw new ValidationError([{ field: "finalizedAt", message: "session is finalized and can no longer be amended" }]);
      }
      return {
        ...current,
        attributes: { ...current.attributes, ...amendment.attributes },
        flavorNotes: appendNotes(current.flavorNotes, amendment.flavorNotes ?? []),
        updatedAt: this.clock(),
      };
    });
  }

  finalize(sessionId: string): Promise<CuppingSession> {
    return this.mutate(sessionId, (current) => {
      if (current.finalizedAt) return current;
      const now = this.clock();
      return { ...current, finalizedAt: now, updatedAt: now };
    });
  }

  // Soft exclusion keeps share links and aggregate history intact.
  exclude(sessionId: string): Promise<CuppingSession> {
    return this.mutate(sessionId, (current) => {
      if (current.excludedAt) return current;
      const now = this.clock();
      return { ...current, excludedAt: now, updatedAt: now };
    });
  }

  restore(sessionId: string): Promise<CuppingSession> {
    return this.mutate(sessionId, (current) =>
      current.excludedAt ? { ...current, excludedAt: null, updatedAt: this.clock() } : current,
    );
  }

  private async mutate(
    sessionId: string,
    mutator: (current: CuppingSession) => CuppingSession,
  ): Promise<CuppingSession> {
    const updated = await this.storage.update(sessionId, mutator);
    if (!updated) throw NotFoundError.session(sessionId);
    return updated;
  }
}

function appendNotes(existing: string[], additions: string[]): string[] {
  const seen = new Set(existing.map((note) => note.toLowerCase()));
  const notes = [...existing];
  for (const note of additions) {
    const key = note.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    notes.push(note);
  }
  return notes;
}

export function displayTaster(session: Pick<CuppingSession, "anonymousMode" | "tasterName">): string {
  return session.anonymousMode ? ANONYMOUS_TASTER : session.tasterName;
}

// Public rendering; identity follows the stored anonymity flag at read time.
export function toPublicSession(session: CuppingSession): PublicSessionResponse {
  return {
    shareId: session.shareId,
    taster: displayTaster(session),
    anonymousMode: session.anonymousMode,
    attributes: { ...session.attributes },
    compositeScore: compositeScore(session),
    origin: session.origin,
    producer: session.producer,
    roastLevel: session.roastLevel,
    preparationMethod: session.preparationMethod,
    flavorNotes: [...session.flavorNotes],
    cost: session.cost,
    createdAt: session.createdAt,
    finalized: session.finalizedAt !== null,
  };
}

export function toOwnerSession(session: CuppingSession): OwnerSessionResponse {
  return {
    ...toPublicSession(session),
    sessionId: session.sessionId,
    updatedAt: session.updatedAt,
    finalizedAt: session.finalizedAt,
    excludedAt: session.excludedAt,
  };
}
