import {
  getProviderApiKey,
  getProviderApiKeyEnv,
  isRemoteProvider,
  type LLMProvider,
  providerFailoverOrder,
  type RemoteLLMProvider,
  resolveModelForProvider,
} from "../../config/llm_providers";
import { errorMessage } from "../../errors";
import { resolveProviderCooldownMs, shouldMarkProviderCooldown } from "./config";
import { createProviderClient } from "./providers";
import { TemplateNarrativeClient } from "./template";
import type { LLMClient, LLMCompletionRequest } from "./types";

class ResilientProviderClient implements LLMClient {
  readonly provider: RemoteLLMProvider;

  private readonly registry: ProviderClientRegistry;

  constructor(provider: RemoteLLMProvider, registry: ProviderClientRegistry) {
    this.provider = provider;
    this.registry = registry;
  }

  async complete(request: LLMCompletionRequest): Promise<string> {
    return this.registry.completeWithFallback(this.provider, request);
  }
}

type ProviderClientFactory = (provider: RemoteLLMProvider) => LLMClient;

export interface ProviderClientRegistryOptions {
  createClient?: ProviderClientFactory;
  cooldownMs?: number;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
}

export class ProviderClientRegistry {
  private readonly clients = new Map<RemoteLLMProvider, LLMClient>();
  private readonly resilientClients = new Map<RemoteLLMProvider, LLMClient>();
  private readonly providerCooldownUntil = new Map<RemoteLLMProvider, number>();
  private readonly templateClient = new TemplateNarrativeClient();
  private readonly createClient: ProviderClientFactory;
  private readonly providerCooldownMs: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly now: () => number;

  constructor(options: ProviderClientRegistryOptions = {}) {
    this.createClient = options.createClient ?? createProviderClient;
    this.env = options.env ?? process.env;
    this.providerCooldownMs = options.cooldownMs ?? resolveProviderCooldownMs(this.env);
    this.now = options.now ?? Date.now;
  }

  getClient(provider: RemoteLLMProvider): LLMClient {
    const existing = this.clients.get(provider);
    if (existing) {
      return existing;
    }

    const created = this.createClient(provider);
    this.clients.set(provider, created);
    return created;
  }

  getResilientClient(provider: LLMProvider): LLMClient {
    if (!isRemoteProvider(provider)) {
      return this.templateClient;
    }

    const existing = this.resilientClients.get(provider);
    if (existing) {
      return existing;
    }

    const created = new ResilientProviderClient(provider, this);
    this.resilientClients.set(provider, created);
    return created;
  }

  async completeWithFallback(preferredProvider: RemoteLLMProvider, request: LLMCompletionRequest): Promise<string> {
    const failures: string[] = [];

    for (const provider of this.buildAttemptOrder(preferredProvider)) {
      if (request.signal?.aborted) {
        failures.push(`${provider}: aborted`);
        break;
      }

      if (getProviderApiKey(provider, this.env).length === 0) {
        failures.push(`${provider}: missing ${getProviderApiKeyEnv(provider)}`);
        this.markProviderCooldown(provider);
        continue;
      }

      try {
        const result = await this.getClient(provider).complete({
          ...request,
          model: provider === preferredProvider ? request.model : resolveModelForProvider(provider),
        });
        this.clearProviderCooldown(provider);
        return result;
      } catch (error) {
        failures.push(`${provider}: ${errorMessage(error)}`);
        if (shouldMarkProviderCooldown(error)) {
          this.markProviderCooldown(provider);
        }
      }
    }

    throw new Error(`All providers failed. Attempts: ${failures.join(" | ")}`);
  }

  isProviderOnCooldown(provider: RemoteLLMProvider): boolean {
    const until = this.providerCooldownUntil.get(provider);
    return typeof until === "number" && until > this.now();
  }

  private buildAttemptOrder(preferredProvider: RemoteLLMProvider): RemoteLLMProvider[] {
    const ordered = providerFailoverOrder(preferredProvider);
    const ready = ordered.filter((provider) => !this.isProviderOnCooldown(provider));

    if (ready.length === ordered.length || ready.length === 0) {
      return ordered;
    }

    const cooldown = ordered.filter((provider) => this.isProviderOnCooldown(provider));
    return [...ready, ...cooldown];
  }

  private markProviderCooldown(provider: RemoteLLMProvider): void {
    this.providerCooldownUntil.set(provider, this.now() + this.providerCooldownMs);
  }

  private clearProviderCooldown(provider: RemoteLLMProvider): void {
    this.providerCooldownUntil.delete(provider);
  }
}
