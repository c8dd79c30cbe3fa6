import type { EvidenceBundle } from "@/types";
import { MYVARIANT_BASE } from "./config";
import { MyVariantApiError } from "./errors";
import { buildEvidenceBundle, hasEvidence } from "./evidence";
import { createLogger } from "./log";

const REQUEST_TIMEOUT_MS = 30_000;
const FIELDS = "civic,clinvar,cosmic";
const MAX_HITS = 10;

export type MyVariantClientOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/** Evidence source for the engine; the MyVariant.info client is the real one. */
export interface EvidenceSource {
  fetchEvidence(gene: string, variant: string): Promise<EvidenceBundle>;
  close(): void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class MyVariantClient implements EvidenceSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  // Aborting this cancels every request still in flight when the client closes.
  private lifetime: AbortController | null = new AbortController();

  constructor({ baseUrl = MYVARIANT_BASE, timeoutMs = REQUEST_TIMEOUT_MS, fetchImpl }: MyVariantClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get closed(): boolean {
    return this.lifetime === null;
  }

  close(): void {
    this.lifetime?.abort();
    this.lifetime = null;
  }

  async fetchEvidence(gene: string, variant: string): Promise<EvidenceBundle> {
    const log = createLogger(`myvariant:${gene}:${variant}`);
    const body = await this.query(`${gene} ${variant}`);
    const hits = body.hits ?? [];

    const bundle = buildEvidenceBundle(gene, variant, hits);
    if (!hasEvidence(bundle)) {
      log.warn("no evidence found, assessing without it", { hits: Array.isArray(hits) ? hits.length : 0 });
    } else {
      log.debug("evidence fetched", {
        civic: bundle.civic.length,
        clinvar: bundle.clinvar.length,
        cosmic: bundle.cosmic.length,
      });
    }
    return bundle;
  }

  private async query(q: string): Promise<Record<string, unknown>> {
    if (!this.lifetime) throw new MyVariantApiError("MyVariant client is closed");

    const url = `${this.baseUrl}/query?${new URLSearchParams({ q, fields: FIELDS, size: String(MAX_HITS) })}`;
    const signal = AbortSignal.any([this.lifetime.signal, AbortSignal.timeout(this.timeoutMs)]);

    let resp: Response;
    try {
      resp = await this.fetchImpl(url, { headers: { Accept: "application/json" }, signal });
    } catch (err) {
      const name = err instanceof Error ? err.name : "";
      const reason = name === "TimeoutError"
        ? `no response within ${this.timeoutMs / 1000} s`
        : name === "AbortError" ? "client closed" : String(err);
      throw new MyVariantApiError(`MyVariant request failed: ${reason}`, { cause: err });
    }

    if (!resp.ok) {
      const detail = await resp.text().catch(() => "");
      throw new MyVariantApiError(`MyVariant API ${resp.status}: ${detail.slice(0, 300)}`, { status: resp.status });
    }

    let data: unknown;
    try {
      data = await resp.json();
    } catch (err) {
      throw new MyVariantApiError("MyVariant returned a non-JSON body", { status: resp.status, cause: err });
    }
    if (!isRecord(data)) {
      throw new MyVariantApiError("MyVariant returned an unexpected response shape", { status: resp.status });
    }
    return data;
  }
}
