import type { CompletionRequest } from "@/types";
import type { AttemptResult } from "./retry";
import type { CompletionThrottle } from "./upstashRateLimit";
import { ConfigError } from "./errors";
import { OPENROUTER_BASE } from "./config";

const COMPLETION_TIMEOUT_MS = 90_000; // per attempt

/** One completion attempt; transport failures and empty content come back retryable. */
export type CompletionFn = (request: CompletionRequest) => Promise<AttemptResult<string>>;

// Round-robin over the configured keys (OPENROUTER_API_KEY=key1,key2,key3).
export function createKeyRotation(keys: string[]): () => string {
  let keyIdx = 0;
  return () => {
    if (keys.length === 0) throw new ConfigError("OPENROUTER_API_KEY is not configured");
    const key = keys[keyIdx % keys.length];
    keyIdx = (keyIdx + 1) % keys.length;
    return key;
  };
}

// Read the OpenRouter error body and extract a useful message.
async function readOpenRouterError(resp: Response): Promise<string> {
  const text = await resp.text().catch(() => "");
  try {
    const json: unknown = JSON.parse(text);
    if (typeof json === "object" && json !== null && "error" in json) {
      const { error } = json;
      if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
        return `${resp.status} ${error.message.slice(0, 300)}`;
      }
    }
  } catch {
    // not JSON: fall through to the raw body
  }
  return text ? `${resp.status} ${text.slice(0, 300)}` : `HTTP ${resp.status}`;
}

function contentOf(data: unknown): string | null {
  if (typeof data !== "object" || data === null || !("choices" in data) || !Array.isArray(data.choices)) return null;
  const [choice] = data.choices;
  if (typeof choice !== "object" || choice === null || !("message" in choice)) return null;
  const { message } = choice;
  if (typeof message !== "object" || message === null || !("content" in message)) return null;
  return typeof message.content === "string" ? message.content : null;
}

export type OpenRouterOptions = {
  keys: string[];
  baseUrl?: string;
  appUrl?: string;
  timeoutMs?: number;
  throttle?: CompletionThrottle;
  fetchImpl?: typeof fetch;
};

export function createOpenRouterCompletion({
  keys,
  baseUrl = OPENROUTER_BASE,
  appUrl = "http://localhost:3000",
  timeoutMs = COMPLETION_TIMEOUT_MS,
  throttle,
  fetchImpl = (input, init) => fetch(input, init),
}: OpenRouterOptions): CompletionFn {
  if (keys.length === 0) throw new ConfigError("OPENROUTER_API_KEY is not configured");
  const nextKey = createKeyRotation(keys);

  return async request => {
    await throttle?.acquire(request.model);
    const apiKey = nextKey();

    let resp: Response;
    try {
      resp = await fetchImpl(baseUrl, {
        method: "POST",
        signal: AbortSignal.timeout(timeoutMs),
        headers: {
          Authorization: "Bearer " + apiKey,
          "Content-Type": "application/json",
          "HTTP-Referer": appUrl,
          "X-Title": "TumorBoard",
        },
        body: JSON.stringify(request),
      });
    } catch (err) {
      const name = err instanceof Error ? err.name : "";
      const reason = name === "TimeoutError"
        ? `model timed out, no response within ${timeoutMs / 1000} s`
        : `network error reaching OpenRouter: ${String(err)}`;
      return { ok: false, retryable: true, error: new Error(reason, { cause: err }) };
    }

    if (!resp.ok) {
      return { ok: false, retryable: true, error: new Error(`OpenRouter ${await readOpenRouterError(resp)}`) };
    }

    let data: unknown;
    try {
      data = await resp.json();
    } catch (err) {
      return { ok: false, retryable: true, error: new Error("OpenRouter returned a non-JSON body", { cause: err }) };
    }

    const content = contentOf(data);
    if (!content?.trim()) {
      return { ok: false, retryable: true, error: new Error("Empty response from LLM") };
    }
    return { ok: true, value: content };
  };
}
