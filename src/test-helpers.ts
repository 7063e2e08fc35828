import fs from "fs/promises";
import os from "os";
import path from "path";

import { createLogger } from "./logger";
import type { CuppingSession } from "./types/session";

// Shared fixtures for the vitest suites.

export const silentLogger = createLogger("silent");

export async function makeTempDir(prefix = "cupping-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

let sequence = 0;

export function makeSession(overrides: Partial<CuppingSession> = {}): CuppingSession {
  sequence += 1;
  const createdAt = overrides.createdAt ?? new Date(Date.UTC(2025, 0, 1, 12, 0, sequence));
  return {
    sessionId: `session-${sequence}`,
    shareId: `share${String(sequence).padStart(5, "0")}`,
    tasterName: "Dana",
    anonymousMode: false,
    attributes: { aroma: 8, acidity: 7.5, body: 7 },
    origin: "Ethiopia",
    producer: "Guji Highlands",
    roastLevel: "Light",
    preparationMethod: "Cupping",
    flavorNotes: ["jasmine", "bergamot"],
    cost: 18.5,
    createdAt,
    updatedAt: createdAt,
    finalizedAt: null,
    excludedAt: null,
    ...overrides,
  };
}

// Minimal valid create payload for the default scoring rules.
export function sessionPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    tasterName: "Dana",
    attributes: { aroma: 8, acidity: 7.5, body: 7, flavor: 8, aftertaste: 7, balance: 7.5, overall: 8 },
    origin: "Ethiopia",
    producer: "Guji Highlands",
    roastLevel: "Light",
    preparationMethod: "Cupping",
    flavorNotes: ["jasmine", "bergamot"],
    cost: 18.5,
    ...overrides,
  };
}
