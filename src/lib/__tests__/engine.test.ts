import { describe, expect, it, vi } from "vitest";
import type { EvidenceBundle, VariantInput } from "@/types";
import { AssessmentEngine, withEngine } from "../engine";
import { MyVariantApiError } from "../errors";
import { buildEvidenceBundle } from "../evidence";
import { LLMService } from "../llm";
import type { CompletionFn } from "../openrouter";
import type { EvidenceSource } from "../myvariant";

class FakeEvidence implements EvidenceSource {
  closed = false;
  constructor(private readonly failFor: string | null = null) {}

  async fetchEvidence(gene: string, variant: string): Promise<EvidenceBundle> {
    if (gene === this.failFor) throw new MyVariantApiError("MyVariant API 500: test", { status: 500 });
    return buildEvidenceBundle(gene, variant, []);
  }

  close(): void {
    this.closed = true;
  }
}

const complete: CompletionFn = async request => {
  const user = request.messages[1].content;
  if (user.includes("Gene: TP53")) return { ok: false, retryable: true, error: new Error("OpenRouter 502 bad gateway") };
  const tier = user.includes("Gene: BRAF") ? "Tier I" : "Tier III";
  return { ok: true, value: JSON.stringify({ tier, confidence_score: 0.8 }) };
};

const llm = () => new LLMService({ complete, retry: { minDelayMs: 0, maxDelayMs: 0, sleep: async () => {} } });

const inputs: VariantInput[] = [
  { gene: "BRAF", variant: "V600E", tumor_type: "Melanoma" },
  { gene: "KRAS", variant: "G12C", tumor_type: "Colorectal" },
  { gene: "TP53", variant: "R175H", tumor_type: "Breast" },
  { gene: "EGFR", variant: "L858R", tumor_type: "Lung" },
  { gene: "PIK3CA", variant: "H1047R", tumor_type: "Breast" },
];

describe("AssessmentEngine", () => {
  it("fetches evidence then asks the model", async () => {
    const engine = new AssessmentEngine({ evidence: new FakeEvidence(), llm: llm() });

    const a = await engine.assessVariant(inputs[0]);

    expect(a.tier).toBe("Tier I");
    expect(a.tumor_type).toBe("Melanoma");
  });

  it("drops a variant whose completion keeps failing and keeps the rest in order", async () => {
    const engine = new AssessmentEngine({ evidence: new FakeEvidence(), llm: llm() });

    const results = await engine.batchAssess(inputs, 2);

    expect(results.map(a => a.gene)).toEqual(["BRAF", "KRAS", "EGFR", "PIK3CA"]);
  });

  it("drops a variant whose evidence fetch fails", async () => {
    const engine = new AssessmentEngine({ evidence: new FakeEvidence("KRAS"), llm: llm() });

    const results = await engine.batchAssess(inputs, 5);

    expect(results.map(a => a.gene)).toEqual(["BRAF", "EGFR", "PIK3CA"]);
  });
});

describe("withEngine", () => {
  it("closes the engine after the callback", async () => {
    const evidence = new FakeEvidence();
    const result = await withEngine(() => new AssessmentEngine({ evidence, llm: llm() }), async engine => engine.model);

    expect(result).toBe("openai/gpt-4o-mini");
    expect(evidence.closed).toBe(true);
  });

  it("closes the engine when the callback throws", async () => {
    const evidence = new FakeEvidence();
    const run = withEngine(
      () => new AssessmentEngine({ evidence, llm: llm() }),
      async () => {
        throw new Error("interrupted");
      },
    );

    await expect(run).rejects.toThrow("interrupted");
    expect(evidence.closed).toBe(true);
  });

  it("propagates evidence errors from a single assessment", async () => {
    const evidence = new FakeEvidence("BRAF");
    const close = vi.spyOn(evidence, "close");

    await expect(
      withEngine(() => new AssessmentEngine({ evidence, llm: llm() }), engine => engine.assessVariant(inputs[0])),
    ).rejects.toBeInstanceOf(MyVariantApiError);
    expect(close).toHaveBeenCalledTimes(1);
  });
});
