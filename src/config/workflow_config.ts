import { type LLMProvider, resolveModelForProvider, resolveProvider } from "./llm_providers";

export const DEFAULT_STAGE_TIMEOUT_MS = 60_000;
export const MIN_STAGE_TIMEOUT_MS = 1;
export const MAX_STAGE_TIMEOUT_MS = 10 * 60 * 1_000;

export const DEFAULT_TEMPERATURE = 0.3;
export const MIN_TEMPERATURE = 0;
export const MAX_TEMPERATURE = 1;

export const DEFAULT_MAX_TOKENS = 900;
export const MIN_MAX_TOKENS = 128;
export const MAX_MAX_TOKENS = 4_000;

export type ArchiveBackend = "postgres" | "memory";

export interface NarrativeSettings {
  provider: LLMProvider;
  model: string;
  temperature: number;
  maxTokens: number;
}

function envNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value !== "string" || value.trim().length === 0) {
    return null;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function clampStageTimeoutMs(value: unknown): number {
  const parsed = envNumber(value);
  if (parsed === null) {
    return DEFAULT_STAGE_TIMEOUT_MS;
  }

  return Math.min(MAX_STAGE_TIMEOUT_MS, Math.max(MIN_STAGE_TIMEOUT_MS, Math.round(parsed)));
}

export function clampTemperature(value: unknown): number {
  const parsed = envNumber(value);
  if (parsed === null) {
    return DEFAULT_TEMPERATURE;
  }

  return Math.min(MAX_TEMPERATURE, Math.max(MIN_TEMPERATURE, Number(parsed.toFixed(2))));
}

export function clampMaxTokens(value: unknown): number {
  const parsed = envNumber(value);
  if (parsed === null) {
    return DEFAULT_MAX_TOKENS;
  }

  return Math.min(MAX_MAX_TOKENS, Math.max(MIN_MAX_TOKENS, Math.round(parsed)));
}

export function resolveStageTimeoutMs(candidate?: number, env: NodeJS.ProcessEnv = process.env): number {
  return clampStageTimeoutMs(candidate ?? env.ESG_STAGE_TIMEOUT_MS);
}

export function resolveNarrativeSettings(
  overrides: Partial<NarrativeSettings> = {},
  env: NodeJS.ProcessEnv = process.env,
): NarrativeSettings {
  const provider = overrides.provider ?? resolveProvider(env.ESG_PROVIDER);

  return {
    provider,
    model: resolveModelForProvider(provider, overrides.model ?? env.ESG_MODEL),
    temperature: clampTemperature(overrides.temperature ?? env.ESG_TEMPERATURE),
    maxTokens: clampMaxTokens(overrides.maxTokens ?? env.ESG_MAX_TOKENS),
  };
}

export function resolveArchiveBackend(env: NodeJS.ProcessEnv = process.env): ArchiveBackend {
  const raw = (env.ESG_ARCHIVE_BACKEND ?? "").trim().toLowerCase();
  if (raw === "postgres" || raw === "memory") {
    return raw;
  }

  return (env.POSTGRES_URL ?? "").trim().length > 0 ? "postgres" : "memory";
}
