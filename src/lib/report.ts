import type { ActionabilityAssessment, ActionabilityTier, ValidationMetrics } from "@/types";
import { UNCOMPARABLE_TIER_DISTANCE, orderedTierMetrics } from "./metrics";

const WIDTH = 80;
const RULE = "=".repeat(WIDTH);
const THIN = "-".repeat(WIDTH);
const MAX_LISTED_FAILURES = 10;

export const pct = (value: number, digits = 1) => `${(value * 100).toFixed(digits)}%`;

export function formatAssessmentReport(a: ActionabilityAssessment): string {
  const lines = [
    RULE,
    "VARIANT ACTIONABILITY ASSESSMENT REPORT",
    RULE,
    "",
    `Variant: ${a.gene} ${a.variant}`,
    `Tumor Type: ${a.tumor_type}`,
    "",
    `Tier: ${a.tier}`,
    `Confidence: ${pct(a.confidence_score)}`,
    `Evidence Strength: ${a.evidence_strength ?? "Not specified"}`,
    "",
    THIN,
    "SUMMARY",
    THIN,
    a.summary,
    "",
    THIN,
    "RATIONALE",
    THIN,
    a.rationale,
  ];

  if (a.recommended_therapies.length > 0) {
    lines.push("", THIN, `RECOMMENDED THERAPIES (${a.recommended_therapies.length})`, THIN);
    a.recommended_therapies.forEach((t, idx) => {
      lines.push("", `${idx + 1}. ${t.drug_name}`);
      if (t.evidence_level) lines.push(`   Evidence Level: ${t.evidence_level}`);
      if (t.approval_status) lines.push(`   Approval Status: ${t.approval_status}`);
      if (t.clinical_context) lines.push(`   Clinical Context: ${t.clinical_context}`);
    });
  }

  if (a.clinical_trials_available) {
    lines.push("", THIN, "Clinical trials may be available for this variant.");
  }

  if (a.references.length > 0) {
    lines.push("", THIN, `KEY REFERENCES (${a.references.length})`, THIN);
    a.references.forEach((ref, idx) => lines.push(`${idx + 1}. ${ref}`));
  }

  lines.push("", RULE);
  return lines.join("\n");
}

const formatDistance = (distance: number) =>
  distance === UNCOMPARABLE_TIER_DISTANCE ? "n/a (Unknown tier)" : String(distance);

export function formatValidationReport(m: ValidationMetrics): string {
  const lines = [
    RULE,
    "VALIDATION REPORT",
    RULE,
    "",
    `Total Cases: ${m.total_cases}`,
    `Correct Predictions: ${m.correct_predictions}`,
    `Failed Assessments: ${m.failed_cases}`,
    `Overall Accuracy: ${pct(m.accuracy, 2)}`,
    `Average Confidence: ${pct(m.average_confidence, 2)}`,
    "",
    THIN,
    "PER-TIER METRICS",
    THIN,
  ];

  for (const t of orderedTierMetrics(m)) {
    lines.push(
      "",
      `${t.tier}:`,
      `  Precision: ${pct(t.precision, 2)}`,
      `  Recall: ${pct(t.recall, 2)}`,
      `  F1 Score: ${pct(t.f1_score, 2)}`,
      `  TP: ${t.true_positives}, FP: ${t.false_positives}, FN: ${t.false_negatives}`,
    );
  }

  if (m.failure_analysis.length > 0) {
    lines.push("", THIN, `FAILURE ANALYSIS (${m.failure_analysis.length} errors)`, THIN);
    m.failure_analysis.slice(0, MAX_LISTED_FAILURES).forEach((f, idx) => {
      lines.push(
        "",
        `${idx + 1}. ${f.variant} in ${f.tumor_type}`,
        `   Expected: ${f.expected} | Predicted: ${f.predicted} | Distance: ${formatDistance(f.tier_distance)}`,
        `   Confidence: ${pct(f.confidence, 2)}`,
        `   Summary: ${f.summary}`,
      );
    });
    if (m.failure_analysis.length > MAX_LISTED_FAILURES) {
      lines.push("", `... and ${m.failure_analysis.length - MAX_LISTED_FAILURES} more errors`);
    }
  }

  lines.push("", RULE);
  return lines.join("\n");
}

/** Tier counts of a batch, sorted by tier label. */
export function tierDistribution(assessments: readonly ActionabilityAssessment[]): Array<[ActionabilityTier, number]> {
  const counts = new Map<ActionabilityTier, number>();
  for (const a of assessments) counts.set(a.tier, (counts.get(a.tier) ?? 0) + 1);
  return [...counts.entries()].sort(([a], [b]) => a.localeCompare(b));
}
