import type {
  Reproducibility,
  StageName,
  StageNarrative,
  StakeholderAnalysisArtifact,
  StakeholderGroup,
} from "../schemas/artifacts";
import type { EnterpriseInput } from "../schemas/enterprise_input";
import { STAGE_DEPENDENCIES } from "../workflow/stages";
import { type NarrativeFacts, ReportStageAgent, type StageAgentDependencies, type StageView } from "./base";
import { REFERENCE_DATA, sectorMatches, type StakeholderTable, type StakeholderTemplate } from "./reference_data";

const PRIORITY_WEIGHT: Record<StakeholderGroup["priority"], number> = {
  High: 0,
  Medium: 1,
  Low: 2,
};

export function selectStakeholderGroups(
  input: EnterpriseInput,
  table: StakeholderTable = REFERENCE_DATA.stakeholders,
): StakeholderGroup[] {
  const description = (input.description ?? "").toLowerCase();
  const candidates: StakeholderTemplate[] = [
    ...table.base_groups,
    ...table.sector_groups
      .filter(
        (rule) =>
          sectorMatches(input.sector, rule.sectors) ||
          rule.description_keywords.some((keyword) => description.includes(keyword)),
      )
      .map((rule) => rule.group),
  ];

  return candidates
    .map((group, order) => ({ group, order }))
    .sort((a, b) => PRIORITY_WEIGHT[a.group.priority] - PRIORITY_WEIGHT[b.group.priority] || a.order - b.order)
    .map(({ group }, index) => ({
      id: group.id,
      name: group.name,
      description: group.description,
      concerns: [...group.concerns],
      engagement_channels: [...group.engagement_channels],
      priority: group.priority,
      rank: index + 1,
    }));
}

export class StakeholderAnalysisAgent extends ReportStageAgent<StakeholderAnalysisArtifact, StakeholderGroup[]> {
  readonly stage = "StakeholderAnalysis" as const;
  readonly dependsOn: readonly StageName[] = STAGE_DEPENDENCIES.StakeholderAnalysis;

  private readonly table: StakeholderTable;

  constructor(dependencies: StageAgentDependencies, table: StakeholderTable = REFERENCE_DATA.stakeholders) {
    super(dependencies);
    this.table = table;
  }

  protected draft(view: StageView): StakeholderGroup[] {
    return selectStakeholderGroups(view.input, this.table);
  }

  protected narrativeFacts(groups: StakeholderGroup[], view: StageView): NarrativeFacts {
    const highPriority = groups.filter((group) => group.priority === "High").length;

    return {
      headline: `${view.input.name} engages ${groups.length} stakeholder groups, ${highPriority} of them high priority.`,
      points: groups.map((group) => `${group.name} (${group.priority}): ${group.concerns.join("; ")}`),
    };
  }

  protected finalize(
    groups: StakeholderGroup[],
    narrative: StageNarrative,
    reproducibility: Reproducibility,
  ): StakeholderAnalysisArtifact {
    return {
      stage: this.stage,
      payload: { ...narrative, groups },
      citations: this.guidelines.lookup("stakeholder_engagement"),
      sections: groups.map((group) => group.id),
      reproducibility,
    };
  }
}
