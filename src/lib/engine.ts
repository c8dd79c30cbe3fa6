import type { ActionabilityAssessment, VariantInput } from "@/types";
import { failures, runBatch, successes } from "./batch";
import { loadConfig, type AppConfig } from "./config";
import { errorMessage } from "./errors";
import { LLMService } from "./llm";
import { createLogger } from "./log";
import { MyVariantClient, type EvidenceSource } from "./myvariant";
import { createOpenRouterCompletion } from "./openrouter";
import { createCompletionThrottle } from "./upstashRateLimit";

export const DEFAULT_BATCH_CONCURRENCY = 5;

/** Anything that can assess one variant; the validator only needs this much. */
export interface VariantAssessor {
  assessVariant(input: VariantInput): Promise<ActionabilityAssessment>;
}

export type EngineDeps = {
  evidence: EvidenceSource;
  llm: LLMService;
};

/** Evidence fetch followed by the model judgment, for one variant or many. */
export class AssessmentEngine implements VariantAssessor {
  private readonly evidence: EvidenceSource;
  private readonly llm: LLMService;

  constructor({ evidence, llm }: EngineDeps) {
    this.evidence = evidence;
    this.llm = llm;
  }

  get model(): string {
    return this.llm.model;
  }

  async assessVariant(input: VariantInput): Promise<ActionabilityAssessment> {
    const evidence = await this.evidence.fetchEvidence(input.gene, input.variant);
    return this.llm.assessVariant(input.gene, input.variant, input.tumor_type, evidence);
  }

  /**
   * Best effort: failed items are logged and dropped, the rest come back in
   * input order. The result may be shorter than `inputs`.
   */
  async batchAssess(
    inputs: readonly VariantInput[],
    maxConcurrent = DEFAULT_BATCH_CONCURRENCY,
  ): Promise<ActionabilityAssessment[]> {
    const log = createLogger("batch");
    log.info("starting", { variants: inputs.length, maxConcurrent, model: this.model });

    const outcomes = await runBatch(inputs, input => this.assessVariant(input), maxConcurrent);

    const failed = failures(outcomes);
    for (const { index, input, error } of failed) {
      log.error("variant failed", {
        index,
        variant: `${input.gene} ${input.variant}`,
        tumorType: input.tumor_type,
        error: errorMessage(error),
      });
    }

    const assessments = successes(outcomes);
    log.info("complete", { succeeded: assessments.length, failed: failed.length });
    return assessments;
  }

  close(): void {
    this.evidence.close();
  }
}

export type EngineOptions = {
  model?: string;
  temperature?: number;
  config?: AppConfig;
};

export function createEngine({ model, temperature, config = loadConfig() }: EngineOptions = {}): AssessmentEngine {
  const complete = createOpenRouterCompletion({
    keys: config.openRouterKeys,
    baseUrl: config.openRouterBase,
    appUrl: config.appUrl,
    throttle: createCompletionThrottle({ perMinute: config.completionsPerMinute, upstash: config.upstash }),
  });

  return new AssessmentEngine({
    evidence: new MyVariantClient({ baseUrl: config.myVariantBase }),
    llm: new LLMService({
      complete,
      model: model ?? config.model,
      temperature: temperature ?? config.temperature,
      maxTokens: config.maxTokens,
    }),
  });
}

/** Fresh engine for one run; its network resources are released however `fn` ends. */
export async function withEngine<T>(
  create: () => AssessmentEngine,
  fn: (engine: AssessmentEngine) => Promise<T>,
): Promise<T> {
  const engine = create();
  try {
    return await fn(engine);
  } finally {
    engine.close();
  }
}
