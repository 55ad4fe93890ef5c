import type { LLMProvider } from "../config/llm_providers";
import { ProviderClientRegistry } from "./client/registry";
import type { LLMClient } from "./client/types";

export type { LLMClient, LLMCompletionRequest } from "./client/types";
export { ProviderClientRegistry } from "./client/registry";
export { TemplateNarrativeClient } from "./client/template";

const defaultRegistry = new ProviderClientRegistry();

export function getNarrativeClient(provider: LLMProvider): LLMClient {
  return defaultRegistry.getResilientClient(provider);
}
