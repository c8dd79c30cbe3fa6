import { ConfigError } from "./errors";

export type AppConfig = {
  openRouterKeys: string[];
  openRouterBase: string;
  model: string;
  temperature: number;
  maxTokens: number;
  myVariantBase: string;
  completionsPerMinute: number;
  appUrl: string;
  upstash: { url: string; token: string } | null;
};

export const DEFAULT_MODEL = "openai/gpt-4o-mini";
export const OPENROUTER_BASE = "https://openrouter.ai/api/v1/chat/completions";
export const MYVARIANT_BASE = "https://myvariant.info/v1";

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number, { min, max }: { min: number; max?: number }): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || (max !== undefined && value > max)) {
    const range = max === undefined ? `>= ${min}` : `in [${min}, ${max}]`;
    throw new ConfigError(`${name} must be a number ${range}, got "${raw}"`);
  }
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * Reads configuration from the environment. OPENROUTER_API_KEY may hold
 * several comma-separated keys; they are used round-robin.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const openRouterKeys = (env.OPENROUTER_API_KEY ?? "")
    .split(",")
    .map(k => k.trim())
    .filter(Boolean);

  const upstashUrl = env.UPSTASH_REDIS_REST_URL?.trim();
  const upstashToken = env.UPSTASH_REDIS_REST_TOKEN?.trim();

  return {
    openRouterKeys,
    openRouterBase: readString(env, "OPENROUTER_BASE", OPENROUTER_BASE),
    model: readString(env, "TUMORBOARD_MODEL", DEFAULT_MODEL),
    temperature: readNumber(env, "TUMORBOARD_TEMPERATURE", 0.1, { min: 0, max: 2 }),
    maxTokens: Math.floor(readNumber(env, "TUMORBOARD_MAX_TOKENS", 2000, { min: 1 })),
    myVariantBase: readString(env, "MYVARIANT_BASE", MYVARIANT_BASE).replace(/\/+$/, ""),
    completionsPerMinute: Math.floor(readNumber(env, "COMPLETIONS_PER_MINUTE", 60, { min: 1 })),
    appUrl: readString(env, "APP_URL", "http://localhost:3000"),
    upstash: upstashUrl && upstashToken ? { url: upstashUrl, token: upstashToken } : null,
  };
}
