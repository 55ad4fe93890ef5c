import { resolveNarrativeSettings, type NarrativeSettings } from "../config/workflow_config";
import type { GuidelineMappingService } from "../guidelines/mapping";
import { getNarrativeClient, type LLMClient } from "../llm/client";
import type { StageArtifactMap, StageName } from "../schemas/artifacts";
import type { StageAgent, StageAgentDependencies } from "./base";
import { MaterialityAgent } from "./materiality";
import { PeerBenchmarkAgent } from "./peer_benchmark";
import { PolicyBenchmarkAgent } from "./policy_benchmark";
import { ReportCompilerAgent } from "./report_compiler";
import { StakeholderAnalysisAgent } from "./stakeholder_analysis";

export type { NarrativeFacts, NarrativeRuntime, StageAgent, StageView } from "./base";
export { ReportStageAgent } from "./base";
export { MaterialityAgent } from "./materiality";
export { PeerBenchmarkAgent } from "./peer_benchmark";
export { PolicyBenchmarkAgent } from "./policy_benchmark";
export { ReportCompilerAgent } from "./report_compiler";
export { StakeholderAnalysisAgent } from "./stakeholder_analysis";

/** The closed set of stage implementations, one per stage. */
export type EsgStageAgents = {
  [S in StageName]: StageAgent<StageArtifactMap[S]>;
};

export interface CreateStageAgentsOptions {
  settings?: Partial<NarrativeSettings>;
  client?: LLMClient;
  guidelines?: GuidelineMappingService;
}

export function createEsgStageAgents(options: CreateStageAgentsOptions = {}): EsgStageAgents {
  const settings = resolveNarrativeSettings({
    ...options.settings,
    provider: options.client?.provider ?? options.settings?.provider,
  });
  const dependencies: StageAgentDependencies = {
    narrative: {
      client: options.client ?? getNarrativeClient(settings.provider),
      model: settings.model,
      temperature: settings.temperature,
      maxTokens: settings.maxTokens,
    },
    guidelines: options.guidelines,
  };

  return {
    StakeholderAnalysis: new StakeholderAnalysisAgent(dependencies),
    Materiality: new MaterialityAgent(dependencies),
    PolicyBenchmark: new PolicyBenchmarkAgent(dependencies),
    PeerBenchmark: new PeerBenchmarkAgent(dependencies),
    ReportCompiler: new ReportCompilerAgent(dependencies),
  };
}
