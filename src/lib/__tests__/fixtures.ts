import type { ActionabilityAssessment, GoldStandardEntry } from "@/types";
import { createAssessment, type AssessmentFields } from "../assessment";

export function makeAssessment(overrides: Partial<AssessmentFields> = {}): ActionabilityAssessment {
  return createAssessment({
    gene: "BRAF",
    variant: "V600E",
    tumor_type: "Melanoma",
    tier: "Tier I",
    confidence_score: 0.9,
    summary: "Test summary.",
    rationale: "Test rationale.",
    ...overrides,
  });
}

export function makeEntry(overrides: Partial<GoldStandardEntry> = {}): GoldStandardEntry {
  return {
    gene: "BRAF",
    variant: "V600E",
    tumor_type: "Melanoma",
    expected_tier: "Tier I",
    notes: null,
    references: [],
    ...overrides,
  };
}
