import type { CuppingSession } from "../types/session";

// Ordinary arithmetic mean; null for an empty list so callers never divide by zero.
export function mean(values: number[]): number | null {
  return values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : null;
}

// Composite score: mean of every numeric attribute of one session.
export function compositeScore(session: Pick<CuppingSession, "attributes">): number | null {
  return mean(Object.values(session.attributes));
}
