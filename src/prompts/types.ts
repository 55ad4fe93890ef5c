import type { StageName } from "../schemas/artifacts";

export interface PromptDefinition {
  id: StageName;
  version: string;
  systemMessage: string;
  userTemplate: string;
}

export type PromptRegistry = Record<StageName, PromptDefinition>;
