export { getPromptDefinition, PROMPT_REGISTRY } from "./registry";
export type { PromptDefinition, PromptRegistry } from "./types";
