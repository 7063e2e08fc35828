import { describe, expect, it } from "vitest";

import { ValidationError } from "../errors";
import type { ValidationIssue } from "../types/api";
import {
  parseAnonymousFlag,
  parseFlavorNotes,
  parseNumberInRange,
  validateAmendment,
  validateNewSession,
  type ScoringRules,
} from "./validation";

const rules: ScoringRules = { bounds: { min: 0, max: 10 }, requiredAttributes: ["aroma", "acidity", "body"] };

function validBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    tasterName: "  Dana ",
    attributes: { aroma: 8, acidity: "7.5", body: 7 },
    origin: "Ethiopia",
    producer: "Guji Highlands",
    roastLevel: "Light",
    preparationMethod: "Cupping",
    flavorNotes: " Citrus, floral,citrus",
    cost: "18.5",
    ...overrides,
  };
}

function issuesOf(fn: () => unknown): ValidationIssue[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  throw new Error("expected a ValidationError");
}

describe("validateNewSession", () => {
  it("returns trimmed, typed input", () => {
    expect(validateNewSession(validBody(), rules)).toEqual({
      tasterName: "Dana",
      attributes: { aroma: 8, acidity: 7.5, body: 7 },
      origin: "Ethiopia",
      producer: "Guji Highlands",
      roastLevel: "Light",
      preparationMethod: "Cupping",
      flavorNotes: ["Citrus", "floral"],
      cost: 18.5,
    });
  });

  it("accepts attributes beyond the required set", () => {
    const input = validateNewSession(validBody({ attributes: { aroma: 8, acidity: 7, body: 7, sweetness: 9 } }), rules);
    expect(input.attributes.sweetness).toBe(9);
  });

  it("collects every problem in field order", () => {
    const issues = issuesOf(() =>
      validateNewSession(validBody({ origin: " ", attributes: { aroma: 8, acidity: 11, body: 7 } }), rules),
    );
    expect(issues).toEqual([
      { field: "origin", message: "is required" },
      { field: "attributes.acidity", message: "must be between 0 and 10" },
    ]);
  });

  it("requires every configured attribute", () => {
    expect(issuesOf(() => validateNewSession(validBody({ attributes: { aroma: 8, acidity: 7 } }), rules))).toEqual([
      { field: "attributes.body", message: "is required" },
    ]);
  });

  it("rejects malformed attribute names and non-numeric scores", () => {
    const issues = issuesOf(() =>
      validateNewSession(validBody({ attributes: { aroma: "strong", acidity: 7, body: 7, "Clean-Cup": 8 } }), rules),
    );
    expect(issues).toEqual([
      { field: "attributes.aroma", message: "must be a number" },
      { field: "attributes.Clean-Cup", message: "must be a lowercase attribute name" },
    ]);
  });

  it("rejects negative cost and missing flavor notes", () => {
    const body = validBody({ cost: -2 });
    delete body.flavorNotes;
    expect(issuesOf(() => validateNewSession(body, rules))).toEqual([
      { field: "cost", message: "must be zero or more" },
      { field: "flavorNotes", message: "is required" },
    ]);
  });

  it("rejects a body that is not an object", () => {
    expect(issuesOf(() => validateNewSession(["not", "an", "object"], rules))).toEqual([
      { field: "body", message: "must be a JSON object" },
    ]);
  });
});

describe("validateAmendment", () => {
  it("needs at least one editable field", () => {
    expect(issuesOf(() => validateAmendment({}, rules))).toEqual([
      { field: "body", message: "must include attributes or flavorNotes" },
    ]);
  });

  it("does not require the full attribute set", () => {
    expect(validateAmendment({ attributes: { body: 6.5 }, flavorNotes: ["Cocoa"] }, rules)).toEqual({
      attributes: { body: 6.5 },
      flavorNotes: ["Cocoa"],
    });
  });

  it("still enforces score bounds", () => {
    expect(issuesOf(() => validateAmendment({ attributes: { body: 12 } }, rules))).toEqual([
      { field: "attributes.body", message: "must be between 0 and 10" },
    ]);
  });
});

describe("field parsers", () => {
  it("parses numbers within a range", () => {
    expect(parseNumberInRange("9.25", "score", 0, 10)).toEqual({ value: 9.25, issue: null });
    expect(parseNumberInRange(undefined, "score", 0, 10).issue).toEqual({ field: "score", message: "is required" });
    expect(parseNumberInRange(true, "score", 0, 10).issue).toEqual({ field: "score", message: "must be a number" });
  });

  it("rejects non-text flavor notes and overlong entries", () => {
    expect(parseFlavorNotes(["citrus", 4]).issue).toEqual({ field: "flavorNotes", message: "must contain only text" });
    expect(parseFlavorNotes(["x".repeat(65)]).issue).toEqual({
      field: "flavorNotes",
      message: "entries must be at most 64 characters",
    });
    expect(parseFlavorNotes({ note: "citrus" }).issue).toEqual({
      field: "flavorNotes",
      message: "must be a list of flavor notes",
    });
  });

  it("treats a missing anonymity flag as off unless required", () => {
    expect(parseAnonymousFlag(undefined)).toBe(false);
    expect(parseAnonymousFlag(true)).toBe(true);
    expect(issuesOf(() => parseAnonymousFlag(undefined, { required: true }))).toEqual([
      { field: "anonymousMode", message: "must be true or false" },
    ]);
    expect(issuesOf(() => parseAnonymousFlag("yes"))).toEqual([
      { field: "anonymousMode", message: "must be true or false" },
    ]);
  });
});
