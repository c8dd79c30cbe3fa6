import type { ActionabilityAssessment, ChatMessage, EvidenceBundle } from "@/types";
import { coerceAssessment, parseJsonResponse } from "./assessment";
import { DEFAULT_MODEL } from "./config";
import { LLMServiceError, errorMessage } from "./errors";
import { summarizeEvidence } from "./evidence";
import { createLogger } from "./log";
import type { CompletionFn } from "./openrouter";
import { buildAssessmentMessages } from "./prompts";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "./retry";

export type LLMServiceOptions = {
  complete: CompletionFn;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  retry?: Partial<RetryPolicy>;
};

/**
 * Turns variant context plus an evidence bundle into a validated assessment.
 * Only the completion call is retried; bad JSON and bad schema fail at once.
 */
export class LLMService {
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
  private readonly complete: CompletionFn;
  private readonly retryPolicy: RetryPolicy;

  constructor({ complete, model = DEFAULT_MODEL, temperature = 0.1, maxTokens = 2000, retry }: LLMServiceOptions) {
    this.complete = complete;
    this.model = model;
    this.temperature = temperature;
    this.maxTokens = maxTokens;
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...retry };
  }

  async assessVariant(
    gene: string,
    variant: string,
    tumorType: string,
    evidence: EvidenceBundle,
  ): Promise<ActionabilityAssessment> {
    const log = createLogger(`assess:${gene}:${variant}`);

    let messages: ChatMessage[];
    try {
      messages = buildAssessmentMessages(gene, variant, tumorType, summarizeEvidence(evidence));
    } catch (err) {
      throw new LLMServiceError(`Cannot build prompt: ${errorMessage(err)}`, { cause: err });
    }

    log.info(`assessing in ${tumorType}`, { model: this.model });

    // ── Completion call (retried) ───────────────────────────────────────
    const outcome = await withRetry(
      () => this.complete({
        model: this.model,
        messages,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      }),
      {
        ...this.retryPolicy,
        onRetry: ({ attempt, delayMs, error }) =>
          log.warn(`completion failed, retry ${attempt}/${this.retryPolicy.maxAttempts - 1} in ${delayMs}ms`, {
            error: error.message,
          }),
      },
    );

    if (!outcome.ok) {
      log.error("LLM API call failed", { attempts: outcome.attempts, error: outcome.error.message });
      throw new LLMServiceError(
        `LLM API call failed after ${outcome.attempts} attempt${outcome.attempts === 1 ? "" : "s"}: ${outcome.error.message}`,
        { cause: outcome.error },
      );
    }
    log.debug("model responded", { rawLength: outcome.value.length, attempts: outcome.attempts });

    // ── Parse + coerce (never retried) ──────────────────────────────────
    try {
      const data = parseJsonResponse(outcome.value);
      const assessment = coerceAssessment(data, { gene, variant, tumor_type: tumorType });
      log.info("assessment complete", { tier: assessment.tier, confidence: assessment.confidence_score });
      return assessment;
    } catch (err) {
      log.error("unusable model output", { error: errorMessage(err), raw: outcome.value.slice(0, 200) });
      throw err;
    }
  }
}
