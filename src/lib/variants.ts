import { readFile } from "node:fs/promises";
import type { VariantInput } from "@/types";
import { TumorboardError, errorMessage } from "./errors";

export class VariantInputError extends TumorboardError {}

/** HGVS-like "{gene}:{variant}" key, used to join evidence across sources. */
export function toHgvs(input: Pick<VariantInput, "gene" | "variant">): string {
  return `${input.gene}:${input.variant}`;
}

export function parseVariantInputs(data: unknown): VariantInput[] {
  if (!Array.isArray(data)) {
    throw new VariantInputError("batch input must be a JSON array of {gene, variant, tumor_type}");
  }

  return data.map((item: unknown, idx) => {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw new VariantInputError(`item ${idx} must be an object`);
    }
    const fields: Record<string, unknown> = { ...item };
    const read = (field: "gene" | "variant" | "tumor_type") => {
      const value = fields[field];
      if (typeof value !== "string" || !value.trim()) {
        throw new VariantInputError(`item ${idx}: ${field} must be a non-empty string`);
      }
      return value.trim();
    };
    return Object.freeze({ gene: read("gene"), variant: read("variant"), tumor_type: read("tumor_type") });
  });
}

export async function loadVariantInputs(path: string): Promise<VariantInput[]> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new VariantInputError(`cannot load variants from ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return parseVariantInputs(data);
}
