import { afterEach, describe, expect, it, vi } from "vitest";
import { MyVariantApiError } from "../errors";
import { MyVariantClient } from "../myvariant";

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

async function failure(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error("expected a rejection");
    },
    (err: unknown) => err,
  );
}

describe("MyVariantClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("queries civic, clinvar and cosmic fields for the variant", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      json({ hits: [{ cosmic: { cosmic_id: "COSM476", tumor_site: "skin" } }] }),
    );
    const client = new MyVariantClient({ baseUrl: "https://myvariant.test/v1/", fetchImpl });

    const bundle = await client.fetchEvidence("BRAF", "V600E");

    expect(fetchImpl).toHaveBeenCalledWith(
      "https://myvariant.test/v1/query?q=BRAF+V600E&fields=civic%2Cclinvar%2Ccosmic&size=10",
      expect.objectContaining({ headers: { Accept: "application/json" } }),
    );
    expect(bundle.cosmic).toEqual([
      { mutation_id: "COSM476", primary_site: "skin", primary_histology: null, mutation_frequency: null },
    ]);
  });

  it("uses the global fetch when none is injected", async () => {
    const stub = vi.fn<typeof fetch>(async () => json({ hits: [] }));
    vi.stubGlobal("fetch", stub);

    const bundle = await new MyVariantClient({ baseUrl: "https://myvariant.test/v1" }).fetchEvidence("KRAS", "G12C");

    expect(stub).toHaveBeenCalledTimes(1);
    expect(bundle.variant_id).toBe("KRAS:G12C");
  });

  it("returns an empty bundle when the body has no hits", async () => {
    const client = new MyVariantClient({ fetchImpl: async () => json({ total: 0 }) });
    const bundle = await client.fetchEvidence("KRAS", "G12C");
    expect([bundle.civic.length, bundle.clinvar.length, bundle.cosmic.length]).toEqual([0, 0, 0]);
  });

  it("raises MyVariantApiError with the status on a non-2xx reply", async () => {
    const client = new MyVariantClient({ fetchImpl: async () => new Response("upstream down", { status: 503 }) });

    const err = await failure(client.fetchEvidence("BRAF", "V600E"));

    expect(err).toBeInstanceOf(MyVariantApiError);
    expect(err).toHaveProperty("status", 503);
    expect(err).toHaveProperty("message", "MyVariant API 503: upstream down");
  });

  it("wraps transport failures", async () => {
    const client = new MyVariantClient({
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      },
    });

    const err = await failure(client.fetchEvidence("BRAF", "V600E"));

    expect(err).toBeInstanceOf(MyVariantApiError);
    expect(err).toHaveProperty("message", "MyVariant request failed: TypeError: fetch failed");
    expect(err).toHaveProperty("status", null);
  });

  it("rejects bodies that are not JSON objects", async () => {
    const html = new MyVariantClient({ fetchImpl: async () => new Response("<html></html>", { status: 200 }) });
    const list = new MyVariantClient({ fetchImpl: async () => json([]) });

    expect(await failure(html.fetchEvidence("BRAF", "V600E"))).toHaveProperty(
      "message",
      "MyVariant returned a non-JSON body",
    );
    expect(await failure(list.fetchEvidence("BRAF", "V600E"))).toHaveProperty(
      "message",
      "MyVariant returned an unexpected response shape",
    );
  });

  it("refuses requests after close", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => json({ hits: [] }));
    const client = new MyVariantClient({ fetchImpl });

    client.close();

    expect(client.closed).toBe(true);
    expect(await failure(client.fetchEvidence("BRAF", "V600E"))).toHaveProperty(
      "message",
      "MyVariant client is closed",
    );
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("aborts in-flight requests on close", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const aborted = new Error("aborted");
            aborted.name = "AbortError";
            reject(aborted);
          });
        }),
    );
    const client = new MyVariantClient({ fetchImpl });

    const pending = failure(client.fetchEvidence("BRAF", "V600E"));
    client.close();

    expect(await pending).toHaveProperty("message", "MyVariant request failed: client closed");
  });
});
