import { mergeCitations } from "../guidelines/mapping";
import type {
  MaterialityArtifact,
  MaterialityPayload,
  MaterialityQuadrant,
  MaterialTopic,
  Reproducibility,
  StageName,
  StageNarrative,
} from "../schemas/artifacts";
import { STAGE_DEPENDENCIES } from "../workflow/stages";
import { type NarrativeFacts, ReportStageAgent, type StageAgentDependencies, type StageView } from "./base";
import { REFERENCE_DATA, sectorMatches, type TopicTable, type TopicTemplate } from "./reference_data";

export const QUADRANT_THRESHOLD = 4;

/** Relevance drop applied when none of a topic's linked stakeholder groups was identified. */
export const MISSING_STAKEHOLDER_PENALTY = 1;

export function classifyQuadrant(impact: number, relevance: number): MaterialityQuadrant {
  const highImpact = impact >= QUADRANT_THRESHOLD;
  const highRelevance = relevance >= QUADRANT_THRESHOLD;

  if (highImpact && highRelevance) {
    return "high-impact-high-relevance";
  }
  if (highImpact) {
    return "high-impact";
  }
  if (highRelevance) {
    return "high-relevance";
  }
  return "moderate";
}

function roundScore(value: number): number {
  return Math.round(Math.max(0, Math.min(5, value)) * 10) / 10;
}

export function selectTopics(sector: string, table: TopicTable = REFERENCE_DATA.topics): TopicTemplate[] {
  return [
    ...table.base_topics,
    ...table.sector_topics.filter((rule) => sectorMatches(sector, rule.sectors)).map((rule) => rule.topic),
  ];
}

export class MaterialityAgent extends ReportStageAgent<MaterialityArtifact, MaterialTopic[]> {
  readonly stage = "Materiality" as const;
  readonly dependsOn: readonly StageName[] = STAGE_DEPENDENCIES.Materiality;

  private readonly table: TopicTable;

  constructor(dependencies: StageAgentDependencies, table: TopicTable = REFERENCE_DATA.topics) {
    super(dependencies);
    this.table = table;
  }

  protected draft(view: StageView): MaterialTopic[] {
    const stakeholders = this.requireArtifact(view, "StakeholderAnalysis");
    const present = new Set(stakeholders.payload.groups.map((group) => group.id));

    return selectTopics(view.input.sector, this.table).map((topic) => {
      const linked = topic.stakeholders.filter((id) => present.has(id));
      const relevance = roundScore(topic.relevance - (linked.length > 0 ? 0 : MISSING_STAKEHOLDER_PENALTY));
      const impact = roundScore(topic.impact);
      const quadrant = classifyQuadrant(impact, relevance);

      return {
        id: topic.id,
        name: topic.name,
        description: topic.description,
        category: topic.category,
        impact_score: impact,
        stakeholder_relevance_score: relevance,
        stakeholder_groups: linked,
        quadrant,
        material: quadrant !== "moderate",
        citations: this.guidelines.lookup(topic.category),
      };
    });
  }

  protected narrativeFacts(topics: MaterialTopic[], view: StageView): NarrativeFacts {
    const material = topics.filter((topic) => topic.material);

    return {
      headline: `${material.length} of ${topics.length} topics are material for ${view.input.name} in ${view.input.period}.`,
      points: material.map(
        (topic) =>
          `${topic.name}: impact ${topic.impact_score}, stakeholder relevance ${topic.stakeholder_relevance_score} (${topic.quadrant})`,
      ),
    };
  }

  protected finalize(
    topics: MaterialTopic[],
    narrative: StageNarrative,
    reproducibility: Reproducibility,
  ): MaterialityArtifact {
    const quadrants: MaterialityPayload["quadrants"] = {
      "high-impact-high-relevance": [],
      "high-impact": [],
      "high-relevance": [],
      moderate: [],
    };
    for (const topic of topics) {
      quadrants[topic.quadrant].push(topic.id);
    }

    return {
      stage: this.stage,
      payload: { ...narrative, topics, quadrants },
      citations: mergeCitations(...topics.map((topic) => topic.citations)),
      sections: topics.map((topic) => topic.id),
      reproducibility,
    };
  }
}
