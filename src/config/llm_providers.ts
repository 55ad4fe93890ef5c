export type RemoteLLMProvider = "OpenAI" | "Anthropic";

/** `Template` renders narratives locally from stage facts and never leaves the process. */
export type LLMProvider = RemoteLLMProvider | "Template";

interface ProviderSettings {
  models: readonly string[];
  apiKeyEnv: string;
  baseUrlEnv: string;
  defaultBaseUrl: string;
}

export const PROVIDER_SETTINGS: Record<RemoteLLMProvider, ProviderSettings> = {
  OpenAI: {
    models: ["gpt-4o-mini", "gpt-4o"],
    apiKeyEnv: "OPENAI_API_KEY",
    baseUrlEnv: "OPENAI_BASE_URL",
    defaultBaseUrl: "https://api.openai.com/v1",
  },
  Anthropic: {
    models: ["claude-3-5-haiku-latest", "claude-3-5-sonnet-latest"],
    apiKeyEnv: "ANTHROPIC_API_KEY",
    baseUrlEnv: "ANTHROPIC_BASE_URL",
    defaultBaseUrl: "https://api.anthropic.com",
  },
};

export const TEMPLATE_MODEL = "template-v1";

const FAILOVER_PRIORITY = Object.freeze<RemoteLLMProvider[]>(["OpenAI", "Anthropic"]);

function envValue(env: NodeJS.ProcessEnv | undefined, key: string): string {
  if (!env) {
    return "";
  }

  return (env[key] ?? "").trim();
}

export function isRemoteProvider(provider: LLMProvider): provider is RemoteLLMProvider {
  return provider !== "Template";
}

export function providerFailoverOrder(preferredProvider: RemoteLLMProvider): RemoteLLMProvider[] {
  return [preferredProvider, ...FAILOVER_PRIORITY.filter((provider) => provider !== preferredProvider)];
}

export function resolveProvider(value: unknown): LLMProvider {
  if (typeof value !== "string") {
    return "Template";
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "openai") {
    return "OpenAI";
  }
  if (normalized === "anthropic") {
    return "Anthropic";
  }
  return "Template";
}

export function resolveModelForProvider(provider: LLMProvider, candidate?: string): string {
  if (!isRemoteProvider(provider)) {
    return TEMPLATE_MODEL;
  }

  const options = PROVIDER_SETTINGS[provider].models;
  if (typeof candidate === "string" && options.includes(candidate)) {
    return candidate;
  }
  return options[0] ?? candidate ?? "";
}

export function getProviderApiKey(provider: RemoteLLMProvider, env: NodeJS.ProcessEnv = process.env): string {
  return envValue(env, PROVIDER_SETTINGS[provider].apiKeyEnv);
}

export function getProviderApiKeyEnv(provider: RemoteLLMProvider): string {
  return PROVIDER_SETTINGS[provider].apiKeyEnv;
}

export function getProviderBaseUrl(provider: RemoteLLMProvider, env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = envValue(env, PROVIDER_SETTINGS[provider].baseUrlEnv);
  return fromEnv.length > 0 ? fromEnv : PROVIDER_SETTINGS[provider].defaultBaseUrl;
}
