import { describe, expect, it } from "vitest";
import type { ActionabilityTier } from "@/types";
import { computeValidationMetrics, toValidationResult } from "../metrics";
import { formatAssessmentReport, formatValidationReport, pct, tierDistribution } from "../report";
import { makeAssessment, makeEntry } from "./fixtures";

const rule = "=".repeat(80);

describe("pct", () => {
  it("formats a ratio as a percentage", () => {
    expect(pct(0.9)).toBe("90.0%");
    expect(pct(1 / 3, 2)).toBe("33.33%");
  });
});

describe("formatAssessmentReport", () => {
  it("renders the assessment sections", () => {
    const lines = formatAssessmentReport(
      makeAssessment({
        recommended_therapies: [
          { drug_name: "Dabrafenib", evidence_level: "A", approval_status: null, clinical_context: null },
        ],
        clinical_trials_available: true,
      }),
    ).split("\n");

    expect(lines[0]).toBe(rule);
    expect(lines.at(-1)).toBe(rule);
    expect(lines).toContain("Variant: BRAF V600E");
    expect(lines).toContain("Tier: Tier I");
    expect(lines).toContain("Confidence: 90.0%");
    expect(lines).toContain("Evidence Strength: Not specified");
    expect(lines).toContain("RECOMMENDED THERAPIES (1)");
    expect(lines).toContain("1. Dabrafenib");
    expect(lines).toContain("   Evidence Level: A");
    expect(lines).not.toContain("   Approval Status: null");
    expect(lines).toContain("Clinical trials may be available for this variant.");
    expect(lines.some(l => l.startsWith("KEY REFERENCES"))).toBe(false);
  });
});

describe("formatValidationReport", () => {
  const miss = (expected: ActionabilityTier, predicted: ActionabilityTier) =>
    toValidationResult(makeEntry({ expected_tier: expected }), makeAssessment({ tier: predicted, confidence_score: 0.4 }));

  it("prints totals, per-tier metrics and failures", () => {
    const metrics = computeValidationMetrics(
      [toValidationResult(makeEntry(), makeAssessment()), miss("Tier II", "Tier III"), miss("Tier I", "Unknown")],
      1,
    );
    const lines = formatValidationReport(metrics).split("\n");

    expect(lines).toContain("Total Cases: 3");
    expect(lines).toContain("Failed Assessments: 1");
    expect(lines).toContain("Overall Accuracy: 33.33%");
    expect(lines).toContain("  TP: 1, FP: 0, FN: 1");
    expect(lines).toContain("FAILURE ANALYSIS (2 errors)");
    expect(lines).toContain("   Expected: Tier II | Predicted: Tier III | Distance: 1");
    expect(lines).toContain("   Expected: Tier I | Predicted: Unknown | Distance: n/a (Unknown tier)");
  });

  it("lists at most ten failures", () => {
    const results = Array.from({ length: 12 }, () => miss("Tier I", "Tier IV"));
    const lines = formatValidationReport(computeValidationMetrics(results)).split("\n");

    expect(lines).toContain("10. BRAF V600E in Melanoma");
    expect(lines).not.toContain("11. BRAF V600E in Melanoma");
    expect(lines).toContain("... and 2 more errors");
  });
});

describe("tierDistribution", () => {
  it("counts tiers sorted by label", () => {
    const batch = [makeAssessment({ tier: "Tier II" }), makeAssessment({ tier: "Tier I" }), makeAssessment({ tier: "Tier II" })];
    expect(tierDistribution(batch)).toEqual([
      ["Tier I", 1],
      ["Tier II", 2],
    ]);
  });
});
