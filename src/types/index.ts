// Field names are snake_case: these are the JSON shapes written to result files.

export const TIERS = ["Tier I", "Tier II", "Tier III", "Tier IV", "Unknown"] as const;

export type ActionabilityTier = (typeof TIERS)[number];

/** The four ordered tiers, most actionable first. "Unknown" sits outside the ordering. */
export const ORDERED_TIERS = ["Tier I", "Tier II", "Tier III", "Tier IV"] as const;

export type VariantInput = Readonly<{
  gene: string;
  variant: string;
  tumor_type: string;
}>;

export type CivicEvidence = {
  evidence_type: string | null;
  evidence_level: string | null;
  clinical_significance: string | null;
  disease: string | null;
  drugs: string[];
  description: string | null;
};

export type ClinVarEvidence = {
  clinical_significance: string | null;
  review_status: string | null;
  conditions: string[];
  variation_id: string | null;
};

export type CosmicEvidence = {
  mutation_id: string | null;
  primary_site: string | null;
  primary_histology: string | null;
  mutation_frequency: number | null;
};

export type EvidenceBundle = Readonly<{
  variant_id: string;            // "{gene}:{variant}"
  gene: string;
  variant: string;
  civic: readonly CivicEvidence[];
  clinvar: readonly ClinVarEvidence[];
  cosmic: readonly CosmicEvidence[];
}>;

export type RecommendedTherapy = {
  drug_name: string;
  evidence_level: string | null;
  approval_status: string | null;
  clinical_context: string | null;   // e.g. first-line, resistant
};

export type ActionabilityAssessment = Readonly<{
  gene: string;
  variant: string;
  tumor_type: string;
  tier: ActionabilityTier;
  confidence_score: number;      // [0, 1], 3 decimals
  summary: string;
  rationale: string;
  evidence_strength: string | null;
  clinical_trials_available: boolean;
  recommended_therapies: readonly RecommendedTherapy[];
  references: readonly string[];
}>;

export type GoldStandardEntry = Readonly<{
  gene: string;
  variant: string;
  tumor_type: string;
  expected_tier: ActionabilityTier;
  notes: string | null;
  references: readonly string[];
}>;

export type TierComparison =
  | { comparable: true; distance: 0 | 1 | 2 | 3 }
  | { comparable: false };

export type ValidationResult = {
  gene: string;
  variant: string;
  tumor_type: string;
  expected_tier: ActionabilityTier;
  predicted_tier: ActionabilityTier;
  is_correct: boolean;
  confidence_score: number;
  tier_distance: number;         // 999 when either tier is Unknown
  assessment: ActionabilityAssessment;
};

export type TierMetrics = {
  tier: ActionabilityTier;
  true_positives: number;
  false_positives: number;
  false_negatives: number;
  precision: number;
  recall: number;
  f1_score: number;
};

export type FailureRecord = {
  variant: string;               // "{gene} {variant}"
  tumor_type: string;
  expected: ActionabilityTier;
  predicted: ActionabilityTier;
  tier_distance: number;
  confidence: number;
  summary: string;
};

export type ValidationMetrics = {
  total_cases: number;
  correct_predictions: number;
  failed_cases: number;          // attempted, but the assessment call failed
  accuracy: number;
  average_confidence: number;
  tier_metrics: Partial<Record<ActionabilityTier, TierMetrics>>;
  failure_analysis: FailureRecord[];
};

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type CompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
};
