import type { StageName } from "../schemas/artifacts";
import type { PromptDefinition, PromptRegistry } from "./types";

const SHARED_PROTOCOL = `You are one stage of an ESG reporting pipeline that drafts a sustainability report for an enterprise.
Every number, topic, clause and peer in FACTS_JSON was computed upstream and is authoritative.

OPERATIONAL PROTOCOL:
1. Write only from FACTS_JSON. Never invent topics, scores, clauses or peers.
2. Keep guideline references exactly as given (for example "GRI 2-9" or "SSE 2.1").
3. Summary: two to four plain sentences for a sustainability lead.
4. Highlights: at most twelve short bullet strings, most material first.

Return JSON only, matching this shape: {"summary":"...","highlights":["..."]}`;

const USER_TEMPLATE = `Enterprise: {enterprise_name} ({sector}), reporting period {period}.
STAGE: {stage}
FACTS_JSON:
{facts_json}`;

function stagePrompt(id: StageName, persona: string): PromptDefinition {
  return {
    id,
    version: "1.0.0",
    systemMessage: `ROLE: ${id} writer.\n${SHARED_PROTOCOL}\n\nSTAGE MODULE:\n${persona}`,
    userTemplate: USER_TEMPLATE,
  };
}

export const PROMPT_REGISTRY: PromptRegistry = {
  StakeholderAnalysis: stagePrompt(
    "StakeholderAnalysis",
    "Describe which stakeholder groups matter most to this enterprise and how it engages them. Lead with the highest priority groups.",
  ),
  Materiality: stagePrompt(
    "Materiality",
    "Explain the materiality assessment: which topics are material, which quadrant each sits in and which stakeholders raise them.",
  ),
  PolicyBenchmark: stagePrompt(
    "PolicyBenchmark",
    "Summarize alignment against the disclosure guidelines. Name aligned topics first, then gaps that need policy work.",
  ),
  PeerBenchmark: stagePrompt(
    "PeerBenchmark",
    "Compare the enterprise with its sector peers. Call out topics where peers lead and where the enterprise is at parity.",
  ),
  ReportCompiler: stagePrompt(
    "ReportCompiler",
    "Introduce the compiled report draft. Mention its sections and the open items a reviewer should confirm first.",
  ),
};

export function getPromptDefinition(stage: StageName): PromptDefinition {
  return PROMPT_REGISTRY[stage];
}
