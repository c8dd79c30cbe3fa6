import type { CivicEvidence, ClinVarEvidence, CosmicEvidence, EvidenceBundle } from "@/types";
import { toHgvs } from "./variants";

const SUMMARY_ITEMS_PER_SOURCE = 10;
const DESCRIPTION_CHARS = 300;

type Json = Record<string, unknown>;

export function hasEvidence(bundle: EvidenceBundle): boolean {
  return bundle.civic.length > 0 || bundle.clinvar.length > 0 || bundle.cosmic.length > 0;
}

// ── Tolerant field readers ────────────────────────────────────────────────

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// A sub-object may arrive as a single object or as a list of them.
function objects(value: unknown): Json[] {
  if (Array.isArray(value)) return value.filter(isObject);
  return isObject(value) ? [value] : [];
}

function text(value: unknown): string | null {
  if (typeof value === "string") return value.trim() || null;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

// `{name: "..."}`, `{display_name: "..."}` or a bare string.
function named(value: unknown): string | null {
  if (isObject(value)) return text(value.name) ?? text(value.display_name);
  return text(value);
}

function names(value: unknown): string[] {
  const list = Array.isArray(value) ? value : value === undefined || value === null ? [] : [value];
  return list.map(named).filter((n): n is string => n !== null);
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

// ── Per-source parsers ────────────────────────────────────────────────────

export function parseCivicEvidence(civic: unknown): CivicEvidence[] {
  return objects(civic).flatMap(entry => {
    const items = Array.isArray(entry.evidence_items) ? entry.evidence_items : entry.evidence;
    return objects(items).map(item => ({
      evidence_type: text(item.evidence_type),
      evidence_level: text(item.evidence_level),
      clinical_significance: text(item.clinical_significance) ?? text(item.significance),
      disease: named(item.disease),
      drugs: names(item.drugs ?? item.therapies),
      description: text(item.description),
    }));
  });
}

export function parseClinVarEvidence(clinvar: unknown): ClinVarEvidence[] {
  return objects(clinvar).map(entry => {
    const rcv = objects(entry.rcv);
    const rcvSignificance = unique(rcv.map(r => text(r.clinical_significance)).filter((s): s is string => s !== null));
    const conditions = entry.conditions !== undefined
      ? names(entry.conditions)
      : unique(rcv.flatMap(r => names(r.conditions)));

    return {
      clinical_significance: text(entry.clinical_significance) ?? (rcvSignificance.length ? rcvSignificance.join("; ") : null),
      review_status: text(entry.review_status) ?? rcv.map(r => text(r.review_status)).find(s => s !== null) ?? null,
      conditions,
      variation_id: text(entry.variation_id ?? entry.variant_id),
    };
  });
}

export function parseCosmicEvidence(cosmic: unknown): CosmicEvidence[] {
  return objects(cosmic).map(entry => {
    const freq = typeof entry.mut_freq === "number" ? entry.mut_freq : Number(text(entry.mut_freq) ?? NaN);
    return {
      mutation_id: text(entry.cosmic_id),
      primary_site: text(entry.tumor_site) ?? text(entry.primary_site),
      primary_histology: text(entry.histology) ?? text(entry.primary_histology),
      mutation_frequency: Number.isFinite(freq) ? freq : null,
    };
  });
}

/**
 * Flattens every hit's CIViC, ClinVar and COSMIC sub-records into one bundle,
 * keeping the order in which they appear. Missing sub-objects are skipped.
 */
export function buildEvidenceBundle(gene: string, variant: string, hits: unknown): EvidenceBundle {
  const civic: CivicEvidence[] = [];
  const clinvar: ClinVarEvidence[] = [];
  const cosmic: CosmicEvidence[] = [];

  for (const hit of objects(hits)) {
    civic.push(...parseCivicEvidence(hit.civic));
    clinvar.push(...parseClinVarEvidence(hit.clinvar));
    cosmic.push(...parseCosmicEvidence(hit.cosmic));
  }

  return Object.freeze({
    variant_id: toHgvs({ gene, variant }),
    gene,
    variant,
    civic: Object.freeze(civic),
    clinvar: Object.freeze(clinvar),
    cosmic: Object.freeze(cosmic),
  });
}

// ── Summary text for the prompt ───────────────────────────────────────────

function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max) + "..." : value;
}

function section<T>(title: string, items: readonly T[], line: (item: T) => string): string[] {
  if (items.length === 0) return [];
  const lines = [`${title} (${items.length} ${items.length === 1 ? "record" : "records"}):`];
  items.slice(0, SUMMARY_ITEMS_PER_SOURCE).forEach((item, idx) => lines.push(`  ${idx + 1}. ${line(item)}`));
  if (items.length > SUMMARY_ITEMS_PER_SOURCE) {
    lines.push(`  ... and ${items.length - SUMMARY_ITEMS_PER_SOURCE} more`);
  }
  lines.push("");
  return lines;
}

function civicLine(e: CivicEvidence): string {
  const parts = [
    `[${e.evidence_type ?? "Unspecified type"}, Level ${e.evidence_level ?? "?"}]`,
    e.clinical_significance ?? "Significance not stated",
  ];
  if (e.disease) parts.push(`Disease: ${e.disease}`);
  if (e.drugs.length) parts.push(`Drugs: ${e.drugs.join(", ")}`);
  const head = parts.join(" | ");
  return e.description ? `${head}\n     ${truncate(e.description, DESCRIPTION_CHARS)}` : head;
}

function clinvarLine(e: ClinVarEvidence): string {
  const parts = [e.clinical_significance ?? "Significance not stated"];
  if (e.review_status) parts.push(`Review: ${e.review_status}`);
  if (e.conditions.length) parts.push(`Conditions: ${e.conditions.join(", ")}`);
  if (e.variation_id) parts.push(`Variation ID: ${e.variation_id}`);
  return parts.join(" | ");
}

function cosmicLine(e: CosmicEvidence): string {
  const parts = [e.mutation_id ?? "Unidentified mutation"];
  if (e.primary_site) parts.push(`Site: ${e.primary_site}`);
  if (e.primary_histology) parts.push(`Histology: ${e.primary_histology}`);
  if (e.mutation_frequency !== null) parts.push(`Frequency: ${e.mutation_frequency}`);
  return parts.join(" | ");
}

/** Deterministic plain-text rendering of a bundle, embedded in the user prompt. */
export function summarizeEvidence(bundle: EvidenceBundle): string {
  const label = `${bundle.gene} ${bundle.variant}`;
  if (!hasEvidence(bundle)) {
    return `No evidence found in CIViC, ClinVar, or COSMIC for ${label}.`;
  }

  const lines = [
    `Evidence for ${label}:`,
    "",
    ...section("CIViC Evidence", bundle.civic, civicLine),
    ...section("ClinVar Evidence", bundle.clinvar, clinvarLine),
    ...section("COSMIC Evidence", bundle.cosmic, cosmicLine),
  ];
  return lines.join("\n").trimEnd();
}
