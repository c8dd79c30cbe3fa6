import {
  ORDERED_TIERS,
  type ActionabilityAssessment,
  type ActionabilityTier,
  type FailureRecord,
  type GoldStandardEntry,
  type TierComparison,
  type TierMetrics,
  type ValidationMetrics,
  type ValidationResult,
} from "@/types";

/** Serialized tier distance when either side is "Unknown". Not a number to average. */
export const UNCOMPARABLE_TIER_DISTANCE = 999;

const SUMMARY_CHARS = 200;
const DISTANCES = [0, 1, 2, 3] as const;

function tierIndex(tier: ActionabilityTier): 0 | 1 | 2 | 3 | null {
  switch (tier) {
    case "Tier I": return 0;
    case "Tier II": return 1;
    case "Tier III": return 2;
    case "Tier IV": return 3;
    case "Unknown": return null;
  }
}

export function compareTiers(expected: ActionabilityTier, predicted: ActionabilityTier): TierComparison {
  const e = tierIndex(expected);
  const p = tierIndex(predicted);
  if (e === null || p === null) return { comparable: false };

  return { comparable: true, distance: DISTANCES[Math.abs(e - p)] };
}

/** Ordinal gap (0-3), or UNCOMPARABLE_TIER_DISTANCE when either tier is Unknown. */
export function tierDistance(expected: ActionabilityTier, predicted: ActionabilityTier): number {
  const comparison = compareTiers(expected, predicted);
  return comparison.comparable ? comparison.distance : UNCOMPARABLE_TIER_DISTANCE;
}

export function toValidationResult(entry: GoldStandardEntry, assessment: ActionabilityAssessment): ValidationResult {
  return {
    gene: entry.gene,
    variant: entry.variant,
    tumor_type: entry.tumor_type,
    expected_tier: entry.expected_tier,
    predicted_tier: assessment.tier,
    is_correct: entry.expected_tier === assessment.tier,
    confidence_score: assessment.confidence_score,
    tier_distance: tierDistance(entry.expected_tier, assessment.tier),
    assessment,
  };
}

// ── Per-tier statistics ───────────────────────────────────────────────────

export type ConfusionCounts = { true_positives: number; false_positives: number; false_negatives: number };

export function tierMetrics(tier: ActionabilityTier, counts: ConfusionCounts): TierMetrics {
  const { true_positives: tp, false_positives: fp, false_negatives: fn } = counts;
  const precision = tp + fp > 0 ? tp / (tp + fp) : 0;
  const recall = tp + fn > 0 ? tp / (tp + fn) : 0;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
  return { tier, ...counts, precision, recall, f1_score: f1 };
}

function truncateSummary(summary: string): string {
  return summary.length > SUMMARY_CHARS ? summary.slice(0, SUMMARY_CHARS) + "..." : summary;
}

export function toFailureRecord(result: ValidationResult): FailureRecord {
  return {
    variant: `${result.gene} ${result.variant}`,
    tumor_type: result.tumor_type,
    expected: result.expected_tier,
    predicted: result.predicted_tier,
    tier_distance: result.tier_distance,
    confidence: result.confidence_score,
    summary: truncateSummary(result.assessment.summary),
  };
}

// ── Fold ──────────────────────────────────────────────────────────────────

type Accumulator = {
  correct: number;
  confidenceSum: number;
  counts: Map<ActionabilityTier, ConfusionCounts>;
  failures: FailureRecord[];
};

function bump(
  counts: Map<ActionabilityTier, ConfusionCounts>,
  tier: ActionabilityTier,
  field: keyof ConfusionCounts,
): Map<ActionabilityTier, ConfusionCounts> {
  const current = counts.get(tier) ?? { true_positives: 0, false_positives: 0, false_negatives: 0 };
  return new Map(counts).set(tier, { ...current, [field]: current[field] + 1 });
}

function step(acc: Accumulator, result: ValidationResult): Accumulator {
  if (result.is_correct) {
    return {
      ...acc,
      correct: acc.correct + 1,
      confidenceSum: acc.confidenceSum + result.confidence_score,
      counts: bump(acc.counts, result.expected_tier, "true_positives"),
    };
  }

  // A miss counts against two different tiers: FN for the expected one, FP for the predicted one.
  const withMiss = bump(acc.counts, result.expected_tier, "false_negatives");
  return {
    ...acc,
    confidenceSum: acc.confidenceSum + result.confidence_score,
    counts: bump(withMiss, result.predicted_tier, "false_positives"),
    failures: [...acc.failures, toFailureRecord(result)],
  };
}

/**
 * Pure sequential fold over completed results. `failedCases` is how many
 * entries were attempted but produced no result; it does not enter any ratio.
 */
export function computeValidationMetrics(results: readonly ValidationResult[], failedCases = 0): ValidationMetrics {
  const initial: Accumulator = { correct: 0, confidenceSum: 0, counts: new Map(), failures: [] };
  const acc = results.reduce(step, initial);
  const total = results.length;

  const tier_metrics: ValidationMetrics["tier_metrics"] = {};
  for (const [tier, counts] of acc.counts) {
    tier_metrics[tier] = tierMetrics(tier, counts);
  }

  return {
    total_cases: total,
    correct_predictions: acc.correct,
    failed_cases: failedCases,
    accuracy: total > 0 ? acc.correct / total : 0,
    average_confidence: total > 0 ? acc.confidenceSum / total : 0,
    tier_metrics,
    failure_analysis: acc.failures,
  };
}

/** Tier I..IV in reporting order, skipping tiers that never occurred. */
export function orderedTierMetrics(metrics: ValidationMetrics): TierMetrics[] {
  return ORDERED_TIERS.flatMap(tier => {
    const m = metrics.tier_metrics[tier];
    return m ? [m] : [];
  });
}
