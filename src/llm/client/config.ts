import {
  getProviderApiKey,
  getProviderApiKeyEnv,
  getProviderBaseUrl,
  type RemoteLLMProvider,
} from "../../config/llm_providers";
import { errorMessage } from "../../errors";

const DEFAULT_PROVIDER_COOLDOWN_MS = 20_000;
const MAX_PROVIDER_COOLDOWN_MS = 5 * 60 * 1_000;

const COOLDOWN_SIGNALS = [
  "429",
  "too many requests",
  "rate limit",
  "timeout",
  "timed out",
  "temporarily unavailable",
  "overloaded",
  "503",
  "502",
  "504",
  "econnreset",
  "enotfound",
  "api key is required",
];

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

export function jsonOnlyInstruction(enabled: boolean): string {
  return enabled ? "\n\nReturn only a valid JSON object with no extra text." : "";
}

export function requireProviderApiKey(provider: RemoteLLMProvider): string {
  const apiKey = getProviderApiKey(provider);
  if (apiKey.length > 0) {
    return apiKey;
  }

  throw new Error(`${provider} API key is required. Set ${getProviderApiKeyEnv(provider)}.`);
}

export function requireProviderBaseUrl(provider: RemoteLLMProvider): string {
  return normalizeBaseUrl(getProviderBaseUrl(provider));
}

export function resolveProviderCooldownMs(env: NodeJS.ProcessEnv = process.env): number {
  const raw = Number(env.ESG_PROVIDER_COOLDOWN_MS ?? DEFAULT_PROVIDER_COOLDOWN_MS);
  if (!Number.isFinite(raw)) {
    return DEFAULT_PROVIDER_COOLDOWN_MS;
  }

  return Math.max(1_000, Math.min(MAX_PROVIDER_COOLDOWN_MS, Math.round(raw)));
}

export function shouldMarkProviderCooldown(error: unknown): boolean {
  const normalized = errorMessage(error).toLowerCase();
  return COOLDOWN_SIGNALS.some((signal) => normalized.includes(signal));
}
