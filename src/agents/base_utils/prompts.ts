import { getPromptDefinition } from "../../prompts";
import type { StageName } from "../../schemas/artifacts";

export interface PromptPayload {
  version: string;
  systemMessage: string;
  userTemplate: string;
}

export function loadStagePrompt(stage: StageName): PromptPayload {
  const prompt = getPromptDefinition(stage);

  return {
    version: prompt.version,
    systemMessage: prompt.systemMessage,
    userTemplate: prompt.userTemplate,
  };
}

/** Single pass: placeholders inside substituted values are left as written. */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) =>
    Object.hasOwn(variables, key) ? (variables[key] ?? placeholder) : placeholder,
  );
}
