import { TIERS, type ActionabilityAssessment, type ActionabilityTier, type RecommendedTherapy } from "@/types";
import { AssessmentValidationError, LLMServiceError, errorMessage } from "./errors";
import { createLogger } from "./log";

export const DEFAULT_CONFIDENCE = 0.5;
export const NO_SUMMARY = "No summary provided";
export const NO_RATIONALE = "No rationale provided";

export type AssessmentFields = {
  gene: string;
  variant: string;
  tumor_type: string;
  tier: ActionabilityTier;
  confidence_score: number;
  summary: string;
  rationale: string;
  evidence_strength?: string | null;
  clinical_trials_available?: boolean;
  recommended_therapies?: RecommendedTherapy[];
  references?: string[];
};

export function isTier(value: unknown): value is ActionabilityTier {
  return typeof value === "string" && TIERS.some(tier => tier === value);
}

/**
 * The only way to build an assessment. A confidence outside [0, 1] is rejected,
 * never clamped; accepted values are rounded to 3 decimals.
 */
export function createAssessment(fields: AssessmentFields): ActionabilityAssessment {
  const { confidence_score: confidence } = fields;
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new AssessmentValidationError(`Confidence score must be between 0 and 1, got ${confidence}`);
  }
  if (!isTier(fields.tier)) {
    throw new AssessmentValidationError(`Unknown tier: ${String(fields.tier)}`);
  }

  return Object.freeze({
    gene: fields.gene,
    variant: fields.variant,
    tumor_type: fields.tumor_type,
    tier: fields.tier,
    confidence_score: Math.round(confidence * 1000) / 1000,
    summary: fields.summary,
    rationale: fields.rationale,
    evidence_strength: fields.evidence_strength ?? null,
    clinical_trials_available: fields.clinical_trials_available ?? false,
    recommended_therapies: Object.freeze((fields.recommended_therapies ?? []).map(t => Object.freeze({ ...t }))),
    references: Object.freeze([...(fields.references ?? [])]),
  });
}

// ── Stage 1: raw model text → loose JSON object ───────────────────────────

// ``` with an optional language tag: ```json, ```JSON, ```javascript
const OPENING_FENCE = /^```[\w-]*\s*/;

/**
 * Parses the model reply, tolerating a surrounding markdown fence with or
 * without a language tag. Malformed JSON is final: it is not retried.
 */
export function parseJsonResponse(raw: string): Record<string, unknown> {
  let body = raw.trim().replace(OPENING_FENCE, "");
  if (body.endsWith("```")) body = body.slice(0, -3);
  body = body.trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new LLMServiceError(`Invalid JSON response from LLM: ${errorMessage(err)}`, { cause: err });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new LLMServiceError("Invalid JSON response from LLM: expected an object");
  }
  return { ...parsed };
}

// ── Stage 2: loose object → strict assessment ─────────────────────────────

export type AssessmentContext = { gene: string; variant: string; tumor_type: string };

function fail(field: string, value: unknown): never {
  throw new LLMServiceError(`Failed to validate LLM response: ${field} has unusable value ${JSON.stringify(value)}`);
}

function optionalText(field: string, value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return fail(field, value);
}

function textOr(field: string, value: unknown, fallback: string): string {
  return optionalText(field, value) ?? fallback;
}

function confidenceOf(value: unknown): number {
  if (value === undefined || value === null) return DEFAULT_CONFIDENCE;
  const n = typeof value === "number" ? value : typeof value === "string" && value.trim() ? Number(value) : NaN;
  if (!Number.isFinite(n)) return fail("confidence_score", value);
  return n;
}

function flagOf(field: string, value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return fail(field, value);
}

function listOf(field: string, value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value;
  return fail(field, value);
}

function therapyOf(value: unknown, idx: number): RecommendedTherapy {
  const field = `recommended_therapies[${idx}]`;
  if (typeof value === "string" && value.trim()) {
    return { drug_name: value, evidence_level: null, approval_status: null, clinical_context: null };
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) return fail(field, value);

  const entry: Record<string, unknown> = { ...value };
  const drugName = optionalText(`${field}.drug_name`, entry.drug_name);
  if (!drugName) return fail(`${field}.drug_name`, entry.drug_name);

  return {
    drug_name: drugName,
    evidence_level: optionalText(`${field}.evidence_level`, entry.evidence_level),
    approval_status: optionalText(`${field}.approval_status`, entry.approval_status),
    clinical_context: optionalText(`${field}.clinical_context`, entry.clinical_context),
  };
}

/**
 * Maps the loose model object onto the assessment schema. The `tier` key is
 * required; any value that is not a known tier (null, a number, "Tier Z")
 * degrades to "Unknown". Every other field has a
 * default, and values that cannot be coerced raise LLMServiceError.
 */
export function coerceAssessment(data: Record<string, unknown>, context: AssessmentContext): ActionabilityAssessment {
  if (!("tier" in data) || data.tier === undefined) {
    throw new LLMServiceError("Missing required field: tier");
  }

  const rawTier = data.tier;
  const tierText = typeof rawTier === "string" ? rawTier.trim() : rawTier;
  let tier: ActionabilityTier = "Unknown";
  if (isTier(tierText)) {
    tier = tierText;
  } else {
    createLogger(`assess:${context.gene}:${context.variant}`).warn(
      `invalid tier ${JSON.stringify(rawTier)}, defaulting to Unknown`,
    );
  }

  const fields: AssessmentFields = {
    ...context,
    tier,
    confidence_score: confidenceOf(data.confidence_score),
    summary: textOr("summary", data.summary, NO_SUMMARY),
    rationale: textOr("rationale", data.rationale, NO_RATIONALE),
    evidence_strength: optionalText("evidence_strength", data.evidence_strength),
    clinical_trials_available: flagOf("clinical_trials_available", data.clinical_trials_available),
    recommended_therapies: listOf("recommended_therapies", data.recommended_therapies).map(therapyOf),
    references: listOf("references", data.references).map((ref, idx) => {
      const text = optionalText(`references[${idx}]`, ref);
      return text ?? fail(`references[${idx}]`, ref);
    }),
  };

  try {
    return createAssessment(fields);
  } catch (err) {
    throw new LLMServiceError(`Failed to validate LLM response: ${errorMessage(err)}`, { cause: err });
  }
}
