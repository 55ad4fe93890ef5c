import { vi } from "vitest";

import { createEsgStageAgents, type EsgStageAgents, type StageView } from "../../src/agents";
import type { LLMClient, LLMCompletionRequest } from "../../src/llm/client";
import { TemplateNarrativeClient } from "../../src/llm/client";
import { type Artifact, STAGE_NAMES } from "../../src/schemas/artifacts";
import type { EnterpriseInput } from "../../src/schemas/enterprise_input";

export const ACME_INPUT: EnterpriseInput = {
  name: "Acme Co",
  sector: "Manufacturing",
  period: "2024",
};

export function templateAgents(): EsgStageAgents {
  return createEsgStageAgents({ client: new TemplateNarrativeClient() });
}

export function stageOf(request: LLMCompletionRequest): string {
  return request.userMessage.match(/^STAGE: (\w+)$/m)?.[1] ?? "";
}

/**
 * Template narratives everywhere except the named stage, which never answers and
 * only settles once its abort signal fires.
 */
export function hangingStageClient(stage: string): LLMClient & { aborted: string[] } {
  const template = new TemplateNarrativeClient();
  const aborted: string[] = [];

  return {
    provider: "Template",
    aborted,
    complete: vi.fn(async (request: LLMCompletionRequest) => {
      if (stageOf(request) !== stage) {
        return template.complete(request);
      }

      return new Promise<string>((_resolve, reject) => {
        request.signal?.addEventListener("abort", () => {
          aborted.push(stage);
          reject(new Error("request aborted"));
        });
      });
    }),
  };
}

export function templateDependencies(client: LLMClient = new TemplateNarrativeClient()) {
  return {
    narrative: { client, model: "template-v1", temperature: 0, maxTokens: 256 },
  };
}

export function viewOf(input: EnterpriseInput, artifacts: Artifact[] = []): StageView {
  return { input, artifacts, signal: new AbortController().signal };
}

/** Runs the canonical stages in order with template narratives and returns every artifact. */
export async function runTemplateStages(input: EnterpriseInput = ACME_INPUT): Promise<Artifact[]> {
  const agents = templateAgents();
  const artifacts: Artifact[] = [];
  for (const stage of STAGE_NAMES) {
    artifacts.push(await agents[stage].execute(viewOf(input, artifacts)));
  }
  return artifacts;
}
