import { citationKey, citationLabel, mergeCitations } from "../guidelines/mapping";
import type {
  Citation,
  MaterialityArtifact,
  PeerBenchmarkArtifact,
  PolicyBenchmarkArtifact,
  ReportCompilerArtifact,
  ReportSection,
  Reproducibility,
  StageName,
  StageNarrative,
  StakeholderAnalysisArtifact,
} from "../schemas/artifacts";
import type { EnterpriseInput } from "../schemas/enterprise_input";
import { STAGE_DEPENDENCIES } from "../workflow/stages";
import { type NarrativeFacts, ReportStageAgent, type StageView } from "./base";

export const REPORT_SECTION_IDS = [
  "overview",
  "governance",
  "stakeholder_engagement",
  "materiality",
  "policy_alignment",
  "peer_insights",
  "next_steps",
  "appendix",
] as const;

export type ReportSectionId = (typeof REPORT_SECTION_IDS)[number];

const SECTION_TITLES: Record<ReportSectionId, string> = {
  overview: "Company overview",
  governance: "ESG governance",
  stakeholder_engagement: "Stakeholder engagement",
  materiality: "Materiality assessment",
  policy_alignment: "Policy alignment",
  peer_insights: "Peer insights",
  next_steps: "Next steps",
  appendix: "Guideline index",
};

interface ReportDraft {
  title: string;
  sections: ReportSection[];
  citations: Citation[];
}

interface UpstreamArtifacts {
  stakeholders: StakeholderAnalysisArtifact;
  materiality: MaterialityArtifact;
  policy: PolicyBenchmarkArtifact;
  peers: PeerBenchmarkArtifact;
}

/** Inline reference list, e.g. "[SSE 2.1] [GRI 2-9]". */
export function inlineCitations(citations: readonly Citation[]): string {
  return citations.map((citation) => `[${citationLabel(citation)}]`).join(" ");
}

function withCitations(line: string, citations: readonly Citation[]): string {
  return citations.length > 0 ? `${line} ${inlineCitations(citations)}` : line;
}

function section(id: ReportSectionId, lines: string[], citations: readonly Citation[]): ReportSection {
  return {
    id,
    title: SECTION_TITLES[id],
    body: lines.join("\n"),
    citation_keys: mergeCitations(citations).map(citationKey),
  };
}

function overviewSection(input: EnterpriseInput): ReportSection {
  const lines = [`${input.name} operates in the ${input.sector} sector. This draft covers the ${input.period} reporting period.`];
  if (input.region) {
    lines.push(`Primary region: ${input.region}.`);
  }
  if (input.description) {
    lines.push(input.description);
  }
  if (input.strategy_focus) {
    lines.push(`Sustainability strategy focus: ${input.strategy_focus}`);
  }
  return section("overview", lines, []);
}

function governanceSection(governance: readonly Citation[], { materiality }: UpstreamArtifacts): ReportSection {
  const topic = materiality.payload.topics.find((entry) => entry.category === "governance");
  const lines = [
    withCitations(
      "The board holds ultimate responsibility for ESG matters and reviews sustainability risks and targets at least annually.",
      governance,
    ),
  ];
  if (topic) {
    lines.push(`${topic.name} is assessed in the ${topic.quadrant} quadrant of the materiality matrix.`);
  }
  return section("governance", lines, governance);
}

function stakeholderSection({ stakeholders }: UpstreamArtifacts): ReportSection {
  const lines = [withCitations(stakeholders.payload.summary, stakeholders.citations)];
  for (const group of stakeholders.payload.groups) {
    lines.push(
      `- ${group.name} (${group.priority} priority): ${group.concerns.join("; ")}. Channels: ${group.engagement_channels.join(", ")}.`,
    );
  }
  return section("stakeholder_engagement", lines, stakeholders.citations);
}

function materialitySection({ materiality }: UpstreamArtifacts): ReportSection {
  const lines = [materiality.payload.summary];
  for (const topic of materiality.payload.topics.filter((entry) => entry.material)) {
    lines.push(
      withCitations(
        `- ${topic.name}: impact ${topic.impact_score}, stakeholder relevance ${topic.stakeholder_relevance_score} (${topic.quadrant}).`,
        topic.citations,
      ),
    );
  }
  return section("materiality", lines, materiality.citations);
}

function policySection({ policy }: UpstreamArtifacts): ReportSection {
  const lines = [policy.payload.summary];
  for (const entry of policy.payload.checklist) {
    lines.push(withCitations(`- ${entry.topic}: ${entry.status}. ${entry.note}`, entry.clauses));
  }
  return section("policy_alignment", lines, policy.citations);
}

function peerSection({ peers }: UpstreamArtifacts): ReportSection {
  const lines = [withCitations(peers.payload.summary, peers.citations)];
  for (const entry of peers.payload.positioning) {
    lines.push(`- ${entry.topic}: ${entry.position}. ${entry.note}`);
  }
  return section("peer_insights", lines, peers.citations);
}

function nextStepsSection({ policy, peers }: UpstreamArtifacts): ReportSection {
  const gaps = policy.payload.checklist.filter((entry) => entry.status === "gap");
  const peerLed = peers.payload.positioning.filter((entry) => entry.position === "peer-led");
  const lines: string[] = [];

  for (const entry of gaps) {
    lines.push(withCitations(`- Close the disclosure gap on ${entry.topic}.`, entry.clauses));
  }
  for (const entry of peerLed) {
    lines.push(`- Benchmark ${entry.topic} practice against ${entry.leading_peers.join(", ")}.`);
  }
  if (lines.length === 0) {
    lines.push("- Maintain current disclosure practice and re-run the materiality assessment next period.");
  }

  return section(
    "next_steps",
    lines,
    gaps.flatMap((entry) => entry.clauses),
  );
}

function appendixSection(citations: readonly Citation[]): ReportSection {
  const lines = citations.map((citation) => `[${citationLabel(citation)}] ${citation.text}`);
  return section("appendix", lines.length > 0 ? lines : ["No guideline clauses were cited."], citations);
}

export function renderDraftText(title: string, sections: readonly ReportSection[]): string {
  return [`# ${title}`, ...sections.map((entry) => `## ${entry.title}\n\n${entry.body}`)].join("\n\n");
}

export class ReportCompilerAgent extends ReportStageAgent<ReportCompilerArtifact, ReportDraft> {
  readonly stage = "ReportCompiler" as const;
  readonly dependsOn: readonly StageName[] = STAGE_DEPENDENCIES.ReportCompiler;

  protected draft(view: StageView): ReportDraft {
    const upstream: UpstreamArtifacts = {
      stakeholders: this.requireArtifact(view, "StakeholderAnalysis"),
      materiality: this.requireArtifact(view, "Materiality"),
      policy: this.requireArtifact(view, "PolicyBenchmark"),
      peers: this.requireArtifact(view, "PeerBenchmark"),
    };
    const citations = mergeCitations(
      upstream.materiality.citations,
      upstream.policy.citations,
      upstream.peers.citations,
    );

    return {
      title: `${view.input.name} ${view.input.period} ESG Report (Draft)`,
      sections: [
        overviewSection(view.input),
        governanceSection(this.guidelines.lookup("governance"), upstream),
        stakeholderSection(upstream),
        materialitySection(upstream),
        policySection(upstream),
        peerSection(upstream),
        nextStepsSection(upstream),
        appendixSection(citations),
      ],
      citations,
    };
  }

  protected narrativeFacts(draft: ReportDraft): NarrativeFacts {
    return {
      headline: `${draft.title} has ${draft.sections.length} sections citing ${draft.citations.length} guideline clauses.`,
      points: draft.sections.map((entry) => `${entry.title}: ${entry.citation_keys.length} citations`),
    };
  }

  protected finalize(draft: ReportDraft, narrative: StageNarrative, reproducibility: Reproducibility): ReportCompilerArtifact {
    return {
      stage: this.stage,
      payload: {
        ...narrative,
        title: draft.title,
        sections: draft.sections,
        draft_text: renderDraftText(draft.title, draft.sections),
      },
      citations: draft.citations,
      sections: draft.sections.map((entry) => entry.id),
      reproducibility,
    };
  }
}
