import type { ScoreBounds } from "../config";
import { ValidationError } from "../errors";
import type { ValidationIssue } from "../types/api";
import type { AttributeScores, NewSessionInput, SessionAmendment } from "../types/session";

export type ScoringRules = {
  bounds: ScoreBounds;
  requiredAttributes: string[];
};

const ATTRIBUTE_NAME = /^[a-z][a-z_]*$/;
const MAX_FLAVOR_NOTE_LENGTH = 64;

type Parsed<T> = { value: T; issue: ValidationIssue | null };

// Parses an optional numeric input from request payloads.
// Returns:
// - null when empty
// - NaN when invalid
// - number when valid
export function parseOptionalNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === "") return null;
  if (typeof value !== "number" && typeof value !== "string") return NaN;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : NaN;
}

// Decimal validator used for sensory attribute scores.
export function parseNumberInRange(value: unknown, fieldName: string, min: number, max: number): Parsed<number | null> {
  const parsed = parseOptionalNumber(value);
  if (parsed === null) return { value: null, issue: { field: fieldName, message: "is required" } };
  if (Number.isNaN(parsed)) return { value: null, issue: { field: fieldName, message: "must be a number" } };
  if (parsed < min || parsed > max) {
    return { value: null, issue: { field: fieldName, message: `must be between ${min} and ${max}` } };
  }
  return { value: parsed, issue: null };
}

function parseRequiredText(value: unknown, fieldName: string): Parsed<string> {
  if (typeof value !== "string" || !value.trim()) {
    return { value: "", issue: { field: fieldName, message: "is required" } };
  }
  return { value: value.trim(), issue: null };
}

function parseCost(value: unknown): Parsed<number> {
  const parsed = parseOptionalNumber(value);
  if (parsed === null) return { value: 0, issue: { field: "cost", message: "is required" } };
  if (Number.isNaN(parsed)) return { value: 0, issue: { field: "cost", message: "must be a number" } };
  if (parsed < 0) return { value: 0, issue: { field: "cost", message: "must be zero or more" } };
  return { value: parsed, issue: null };
}

// Accepts a list of strings or a comma-separated string; trims and drops
// case-insensitive duplicates, keeping the first spelling.
export function parseFlavorNotes(value: unknown): Parsed<string[]> {
  const rawNotes = typeof value === "string" ? value.split(",") : value;
  if (!Array.isArray(rawNotes)) {
    return { value: [], issue: { field: "flavorNotes", message: "must be a list of flavor notes" } };
  }

  const notes: string[] = [];
  const seen = new Set<string>();
  for (const note of rawNotes) {
    if (typeof note !== "string") {
      return { value: [], issue: { field: "flavorNotes", message: "must contain only text" } };
    }
    const trimmed = note.trim();
    if (!trimmed) continue;
    if (trimmed.length > MAX_FLAVOR_NOTE_LENGTH) {
      return {
        value: [],
        issue: { field: "flavorNotes", message: `entries must be at most ${MAX_FLAVOR_NOTE_LENGTH} characters` },
      };
    }
    const key = trimmed.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    notes.push(trimmed);
  }
  return { value: notes, issue: null };
}

// Validates every attribute present; when `required` is given, each of those
// names must be present too.
function parseAttributes(
  value: unknown,
  bounds: ScoreBounds,
  required: string[],
): { value: AttributeScores; issues: ValidationIssue[] } {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { value: {}, issues: [{ field: "attributes", message: "must be an object of attribute scores" }] };
  }

  const issues: ValidationIssue[] = [];
  const scores: AttributeScores = {};
  const entries = new Map<string, unknown>(Object.entries(value));

  for (const name of required) {
    if (!entries.has(name)) issues.push({ field: `attributes.${name}`, message: "is required" });
  }
  for (const [name, raw] of entries) {
    if (!ATTRIBUTE_NAME.test(name)) {
      issues.push({ field: `attributes.${name}`, message: "must be a lowercase attribute name" });
      continue;
    }
    const parsed = parseNumberInRange(raw, `attributes.${name}`, bounds.min, bounds.max);
    if (parsed.issue) issues.push(parsed.issue);
    else if (parsed.value !== null) scores[name] = parsed.value;
  }

  return { value: scores, issues };
}

function asObject(body: unknown): Record<string, unknown> {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new ValidationError([{ field: "body", message: "must be a JSON object" }]);
  }
  return Object.fromEntries(Object.entries(body));
}

// Missing means "not anonymous"; anything other than a boolean is rejected.
export function parseAnonymousFlag(value: unknown, { required = false } = {}): boolean {
  if (value === undefined && !required) return false;
  if (typeof value !== "boolean") {
    throw new ValidationError([{ field: "anonymousMode", message: "must be true or false" }]);
  }
  return value;
}

// Collects every field issue so clients can show all problems at once.
export function validateNewSession(body: unknown, rules: ScoringRules): NewSessionInput {
  const fields = asObject(body);
  const issues: ValidationIssue[] = [];

  const tasterName = parseRequiredText(fields.tasterName, "tasterName");
  const origin = parseRequiredText(fields.origin, "origin");
  const producer = parseRequiredText(fields.producer, "producer");
  const roastLevel = parseRequiredText(fields.roastLevel, "roastLevel");
  const preparationMethod = parseRequiredText(fields.preparationMethod, "preparationMethod");
  const cost = parseCost(fields.cost);
  const flavorNotes =
    fields.flavorNotes === undefined
      ? { value: [], issue: { field: "flavorNotes", message: "is required" } }
      : parseFlavorNotes(fields.flavorNotes);

  const attributes = parseAttributes(fields.attributes, rules.bounds, rules.requiredAttributes);

  issues.push(
    ...[tasterName.issue, origin.issue, producer.issue, roastLevel.issue, preparationMethod.issue].filter(
      (issue): issue is ValidationIssue => issue !== null,
    ),
  );
  issues.push(...attributes.issues);
  if (cost.issue) issues.push(cost.issue);
  if (flavorNotes.issue) issues.push(flavorNotes.issue);

  if (issues.length) throw new ValidationError(issues);

  return {
    tasterName: tasterName.value,
    attributes: attributes.value,
    origin: origin.value,
    producer: producer.value,
    roastLevel: roastLevel.value,
    preparationMethod: preparationMethod.value,
    flavorNotes: flavorNotes.value,
    cost: cost.value,
  };
}

// Late edits: any subset of attributes (still bounded) and/or more flavor notes.
export function validateAmendment(body: unknown, rules: ScoringRules): SessionAmendment {
  const fields = asObject(body);
  const amendment: SessionAmendment = {};
  const issues: ValidationIssue[] = [];

  if (fields.attributes !== undefined) {
    const attributes = parseAttributes(fields.attributes, rules.bounds, []);
    issues.push(...attributes.issues);
    amendment.attributes = attributes.value;
  }
  if (fields.flavorNotes !== undefined) {
    const notes = parseFlavorNotes(fields.flavorNotes);
    if (notes.issue) issues.push(notes.issue);
    else amendment.flavorNotes = notes.value;
  }
  if (fields.attributes === undefined && fields.flavorNotes === undefined) {
    issues.push({ field: "body", message: "must include attributes or flavorNotes" });
  }

  if (issues.length) throw new ValidationError(issues);
  return amendment;
}
