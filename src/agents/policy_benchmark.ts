import { citationLabel, mergeCitations } from "../guidelines/mapping";
import type {
  Citation,
  MaterialTopic,
  PolicyAlignmentStatus,
  PolicyBenchmarkArtifact,
  PolicyChecklistEntry,
  Reproducibility,
  StageName,
  StageNarrative,
} from "../schemas/artifacts";
import { STAGE_DEPENDENCIES } from "../workflow/stages";
import { type NarrativeFacts, ReportStageAgent, type StageView } from "./base";

export const ALIGNED_IMPACT_THRESHOLD = 4.5;

export function policyStatus(topic: MaterialTopic, clauses: readonly Citation[]): PolicyAlignmentStatus {
  if (clauses.length === 0) {
    return "not-applicable";
  }
  return topic.impact_score >= ALIGNED_IMPACT_THRESHOLD ? "aligned" : "gap";
}

function policyNote(status: PolicyAlignmentStatus, clauses: readonly Citation[]): string {
  const labels = clauses.map(citationLabel).join(", ");

  switch (status) {
    case "aligned":
      return `Current disclosure practice meets ${labels}.`;
    case "gap":
      return `Policy and disclosure need strengthening against ${labels}.`;
    case "not-applicable":
      return "No disclosure guideline maps to this topic category.";
  }
}

export class PolicyBenchmarkAgent extends ReportStageAgent<PolicyBenchmarkArtifact, PolicyChecklistEntry[]> {
  readonly stage = "PolicyBenchmark" as const;
  readonly dependsOn: readonly StageName[] = STAGE_DEPENDENCIES.PolicyBenchmark;

  protected draft(view: StageView): PolicyChecklistEntry[] {
    const materiality = this.requireArtifact(view, "Materiality");

    return materiality.payload.topics
      .filter((topic) => topic.material)
      .map((topic) => {
        const clauses = this.guidelines.lookup(topic.category);
        const status = policyStatus(topic, clauses);
        return {
          topic_id: topic.id,
          topic: topic.name,
          status,
          clauses,
          note: policyNote(status, clauses),
        };
      });
  }

  protected narrativeFacts(checklist: PolicyChecklistEntry[]): NarrativeFacts {
    const count = (status: PolicyAlignmentStatus) => checklist.filter((entry) => entry.status === status).length;

    return {
      headline: `Policy checklist covers ${checklist.length} material topics: ${count("aligned")} aligned, ${count("gap")} with gaps, ${count("not-applicable")} without mapped guidance.`,
      points: checklist.map((entry) => `${entry.topic}: ${entry.status}`),
    };
  }

  protected finalize(
    checklist: PolicyChecklistEntry[],
    narrative: StageNarrative,
    reproducibility: Reproducibility,
  ): PolicyBenchmarkArtifact {
    return {
      stage: this.stage,
      payload: { ...narrative, checklist },
      citations: mergeCitations(...checklist.map((entry) => entry.clauses)),
      sections: checklist.map((entry) => entry.topic_id),
      reproducibility,
    };
  }
}
