import { readFile } from "node:fs/promises";
import type { GoldStandardEntry, ValidationMetrics, ValidationResult } from "@/types";
import { isTier } from "./assessment";
import { failures, runBatch, successes } from "./batch";
import type { VariantAssessor } from "./engine";
import { GoldStandardError, errorMessage } from "./errors";
import { createLogger } from "./log";
import { computeValidationMetrics, toValidationResult } from "./metrics";

export const DEFAULT_VALIDATION_CONCURRENCY = 3;

function requiredText(entry: Record<string, unknown>, field: string, idx: number): string {
  const value = entry[field];
  if (typeof value !== "string" || !value.trim()) {
    throw new GoldStandardError(`entries[${idx}].${field} must be a non-empty string`);
  }
  return value.trim();
}

function parseEntry(raw: unknown, idx: number): GoldStandardEntry {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new GoldStandardError(`entries[${idx}] must be an object`);
  }
  const entry: Record<string, unknown> = { ...raw };

  const expected = entry.expected_tier;
  if (!isTier(expected)) {
    throw new GoldStandardError(`entries[${idx}].expected_tier is not a valid tier: ${JSON.stringify(expected)}`);
  }

  const notes = entry.notes;
  if (notes !== undefined && notes !== null && typeof notes !== "string") {
    throw new GoldStandardError(`entries[${idx}].notes must be a string`);
  }

  const references = entry.references ?? [];
  if (!Array.isArray(references) || !references.every((r): r is string => typeof r === "string")) {
    throw new GoldStandardError(`entries[${idx}].references must be a list of strings`);
  }

  return {
    gene: requiredText(entry, "gene", idx),
    variant: requiredText(entry, "variant", idx),
    tumor_type: requiredText(entry, "tumor_type", idx),
    expected_tier: expected,
    notes: notes ?? null,
    references,
  };
}

/** Validates a parsed gold-standard document: `{ "entries": [...] }`. */
export function parseGoldStandard(data: unknown): GoldStandardEntry[] {
  if (typeof data !== "object" || data === null || !("entries" in data) || !Array.isArray(data.entries)) {
    throw new GoldStandardError('gold standard must be an object with an "entries" array');
  }
  return data.entries.map(parseEntry);
}

export async function loadGoldStandard(path: string): Promise<GoldStandardEntry[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new GoldStandardError(`cannot read gold standard file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new GoldStandardError(`gold standard file ${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  return parseGoldStandard(data);
}

export class Validator {
  constructor(private readonly assessor: VariantAssessor) {}

  async validateEntry(entry: GoldStandardEntry): Promise<ValidationResult> {
    const assessment = await this.assessor.assessVariant({
      gene: entry.gene,
      variant: entry.variant,
      tumor_type: entry.tumor_type,
    });
    return toValidationResult(entry, assessment);
  }

  /**
   * Assesses every entry concurrently, then folds the successful results into
   * metrics. Entries whose assessment fails are logged and counted in
   * `failed_cases`, not scored.
   */
  async validateDataset(
    entries: readonly GoldStandardEntry[],
    maxConcurrent = DEFAULT_VALIDATION_CONCURRENCY,
  ): Promise<ValidationMetrics> {
    const log = createLogger("validate");
    log.info("starting", { entries: entries.length, maxConcurrent });

    const outcomes = await runBatch(entries, entry => this.validateEntry(entry), maxConcurrent);

    const failed = failures(outcomes);
    for (const { index, input, error } of failed) {
      log.error("entry failed", {
        index,
        variant: `${input.gene} ${input.variant}`,
        tumorType: input.tumor_type,
        error: errorMessage(error),
      });
    }

    const metrics = computeValidationMetrics(successes(outcomes), failed.length);
    log.info("complete", {
      scored: metrics.total_cases,
      failed: metrics.failed_cases,
      accuracy: Number(metrics.accuracy.toFixed(4)),
    });
    return metrics;
  }
}
