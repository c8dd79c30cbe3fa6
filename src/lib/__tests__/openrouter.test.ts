import { describe, expect, it, vi } from "vitest";
import type { CompletionRequest } from "@/types";
import { ConfigError } from "../errors";
import { createKeyRotation, createOpenRouterCompletion } from "../openrouter";

const request: CompletionRequest = {
  model: "openai/gpt-4o-mini",
  messages: [
    { role: "system", content: "system prompt" },
    { role: "user", content: "user prompt" },
  ],
  temperature: 0.1,
  max_tokens: 2000,
};

const reply = (content: string) => new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });

describe("createKeyRotation", () => {
  it("cycles through the keys", () => {
    const next = createKeyRotation(["test-key-a", "test-key-b", "test-key-c"]);
    expect([next(), next(), next(), next()]).toEqual(["test-key-a", "test-key-b", "test-key-c", "test-key-a"]);
  });
});

describe("createOpenRouterCompletion", () => {
  it("requires at least one key", () => {
    expect(() => createOpenRouterCompletion({ keys: [] })).toThrow(ConfigError);
  });

  it("posts the request and returns the message content", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => reply('{"tier": "Tier I"}'));
    const complete = createOpenRouterCompletion({ keys: ["test-secret"], baseUrl: "https://openrouter.test/chat", fetchImpl });

    expect(await complete(request)).toEqual({ ok: true, value: '{"tier": "Tier I"}' });
    expect(fetchImpl).toHaveBeenCalledWith(
      "https://openrouter.test/chat",
      expect.objectContaining({
        method: "POST",
        body: JSON.stringify(request),
        headers: expect.objectContaining({ Authorization: "Bearer test-secret", "X-Title": "TumorBoard" }),
      }),
    );
  });

  it("rotates keys across calls", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => reply("{}"));
    const complete = createOpenRouterCompletion({ keys: ["test-key-a", "test-key-b"], fetchImpl });

    await complete(request);
    await complete(request);

    const bearer = (key: string) =>
      expect.objectContaining({ headers: expect.objectContaining({ Authorization: `Bearer ${key}` }) });
    expect(fetchImpl).toHaveBeenNthCalledWith(1, expect.any(String), bearer("test-key-a"));
    expect(fetchImpl).toHaveBeenNthCalledWith(2, expect.any(String), bearer("test-key-b"));
  });

  it("waits on the throttle with the model name", async () => {
    const acquire = vi.fn(async (_key: string) => {});
    const complete = createOpenRouterCompletion({
      keys: ["test-secret"],
      throttle: { acquire },
      fetchImpl: async () => reply("{}"),
    });

    await complete(request);

    expect(acquire).toHaveBeenCalledWith("openai/gpt-4o-mini");
  });

  it("reports empty content as retryable", async () => {
    const complete = createOpenRouterCompletion({ keys: ["test-secret"], fetchImpl: async () => reply("   ") });

    const result = await complete(request);

    expect(result).toMatchObject({ ok: false, retryable: true });
    if (!result.ok) expect(result.error.message).toBe("Empty response from LLM");
  });

  it("reports HTTP errors as retryable with the provider message", async () => {
    const complete = createOpenRouterCompletion({
      keys: ["test-secret"],
      fetchImpl: async () => new Response(JSON.stringify({ error: { message: "Rate limit exceeded" } }), { status: 429 }),
    });

    const result = await complete(request);

    expect(result).toMatchObject({ ok: false, retryable: true });
    if (!result.ok) expect(result.error.message).toBe("OpenRouter 429 Rate limit exceeded");
  });

  it("reports network failures as retryable", async () => {
    const complete = createOpenRouterCompletion({
      keys: ["test-secret"],
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      },
    });

    const result = await complete(request);

    expect(result).toMatchObject({ ok: false, retryable: true });
    if (!result.ok) expect(result.error.message).toBe("network error reaching OpenRouter: TypeError: fetch failed");
  });
});
