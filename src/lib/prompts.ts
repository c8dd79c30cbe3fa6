import type { ChatMessage } from "@/types";
import { PromptInputError } from "./errors";

export const ACTIONABILITY_SYSTEM_PROMPT = `You are an expert molecular tumor board assistant. You classify the clinical actionability of somatic cancer variants using the AMP/ASCO/CAP guidelines.

Tier definitions:
- Tier I: variants of strong clinical significance (FDA-approved therapy or professional guideline for this tumor type; level A/B evidence)
- Tier II: variants of potential clinical significance (approved therapy in another tumor type, investigational therapies, or level C/D evidence)
- Tier III: variants of unknown clinical significance
- Tier IV: variants deemed benign or likely benign

Base your judgment on the supplied database evidence and established clinical knowledge. When the evidence is thin or conflicting, say so and lower your confidence. Do not invent references.

Respond with a single JSON object and nothing else, using exactly this shape:
{
  "tier": "Tier I" | "Tier II" | "Tier III" | "Tier IV" | "Unknown",
  "confidence_score": number (0.0-1.0),
  "summary": string (2-3 sentences),
  "rationale": string (why this tier, citing the evidence),
  "evidence_strength": "Strong" | "Moderate" | "Weak",
  "clinical_trials_available": boolean,
  "recommended_therapies": [
    {
      "drug_name": string,
      "evidence_level": string | null,
      "approval_status": string | null,
      "clinical_context": string | null
    }
  ],
  "references": [string]
}`;

export function createAssessmentPrompt(
  gene: string,
  variant: string,
  tumorType: string,
  evidenceSummary: string,
): string {
  return `Assess the clinical actionability of this variant.

Gene: ${gene}
Variant: ${variant}
Tumor type: ${tumorType}

DATABASE EVIDENCE:
${evidenceSummary}

Assign an AMP/ASCO/CAP tier for this variant in ${tumorType}, list any recommended therapies with their approval status, and note whether clinical trials are likely available.

Return ONLY the JSON object, no other text.`;
}

/**
 * System + user message pair for one assessment. Pure: identical inputs give
 * identical messages.
 */
export function buildAssessmentMessages(
  gene: string,
  variant: string,
  tumorType: string,
  evidenceSummary: string,
): ChatMessage[] {
  if (!gene.trim()) throw new PromptInputError("gene must not be empty");
  if (!variant.trim()) throw new PromptInputError("variant must not be empty");

  return [
    { role: "system", content: ACTIONABILITY_SYSTEM_PROMPT },
    { role: "user", content: createAssessmentPrompt(gene.trim(), variant.trim(), tumorType.trim(), evidenceSummary) },
  ];
}
