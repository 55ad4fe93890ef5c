import { errorMessage, StageExecutionError } from "../errors";
import { guidelineMapping, type GuidelineMappingService } from "../guidelines/mapping";
import type { LLMClient } from "../llm/client";
import {
  type Artifact,
  findArtifact,
  type Reproducibility,
  type StageArtifactMap,
  type StageName,
  type StageNarrative,
  stageNarrativeSchema,
} from "../schemas/artifacts";
import { type EnterpriseInput, formatZodIssues } from "../schemas/enterprise_input";
import { parseJsonObject } from "./base_utils/parse";
import { loadStagePrompt, renderTemplate } from "./base_utils/prompts";

const MAX_HIGHLIGHTS = 12;

/** What a stage may see: the input plus only the artifacts it declared. */
export interface StageView {
  input: EnterpriseInput;
  artifacts: readonly Artifact[];
  signal: AbortSignal;
}

export interface StageAgent<A extends Artifact = Artifact> {
  readonly stage: A["stage"];
  readonly dependsOn: readonly StageName[];
  execute(view: StageView): Promise<A>;
}

export interface NarrativeRuntime {
  client: LLMClient;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface NarrativeFacts {
  headline: string;
  points: string[];
}

export interface StageAgentDependencies {
  narrative: NarrativeRuntime;
  guidelines?: GuidelineMappingService;
}

export abstract class ReportStageAgent<A extends Artifact, D> implements StageAgent<A> {
  abstract readonly stage: A["stage"];
  abstract readonly dependsOn: readonly StageName[];

  protected readonly narrative: NarrativeRuntime;
  protected readonly guidelines: GuidelineMappingService;

  constructor(dependencies: StageAgentDependencies) {
    this.narrative = dependencies.narrative;
    this.guidelines = dependencies.guidelines ?? guidelineMapping;
  }

  /** Structured content, derived from the view and reference data only. */
  protected abstract draft(view: StageView): D;

  protected abstract narrativeFacts(draft: D, view: StageView): NarrativeFacts;

  protected abstract finalize(draft: D, narrative: StageNarrative, reproducibility: Reproducibility): A;

  async execute(view: StageView): Promise<A> {
    for (const dependency of this.dependsOn) {
      this.requireArtifact(view, dependency);
    }

    const draft = this.draft(view);
    const narrative = await this.narrate(this.narrativeFacts(draft, view), view);
    return this.finalize(draft, narrative, this.reproducibility());
  }

  protected requireArtifact<S extends StageName>(view: StageView, stage: S): StageArtifactMap[S] {
    const artifact = findArtifact(view.artifacts, stage);
    if (!artifact) {
      throw new StageExecutionError(this.stage, `missing upstream artifact ${stage}`);
    }
    return artifact;
  }

  protected reproducibility(): Reproducibility {
    return this.narrative.client.provider === "Template" ? "deterministic" : "generated";
  }

  private async narrate(facts: NarrativeFacts, view: StageView): Promise<StageNarrative> {
    const prompt = loadStagePrompt(this.stage);
    const userMessage = renderTemplate(prompt.userTemplate, {
      stage: this.stage,
      enterprise_name: view.input.name,
      sector: view.input.sector,
      period: view.input.period,
      facts_json: JSON.stringify({ headline: facts.headline, points: facts.points.slice(0, MAX_HIGHLIGHTS) }),
    });

    let raw: string;
    try {
      raw = await this.narrative.client.complete({
        model: this.narrative.model,
        systemMessage: prompt.systemMessage,
        userMessage,
        temperature: this.narrative.temperature,
        maxTokens: this.narrative.maxTokens,
        requireJsonObject: true,
        signal: view.signal,
      });
    } catch (error) {
      const detail = view.signal.aborted ? "narrative generation aborted" : "narrative generation failed";
      throw new StageExecutionError(this.stage, `${detail}: ${errorMessage(error)}`, { cause: error });
    }

    const decoded = parseJsonObject(raw);
    if (!decoded) {
      throw new StageExecutionError(this.stage, "narrative output is not a JSON object");
    }

    const highlights = decoded.highlights;
    const parsed = stageNarrativeSchema.safeParse({
      summary: decoded.summary,
      highlights: Array.isArray(highlights) ? highlights.slice(0, MAX_HIGHLIGHTS) : highlights,
    });
    if (!parsed.success) {
      throw new StageExecutionError(
        this.stage,
        `narrative output is invalid: ${formatZodIssues(parsed.error).join("; ")}`,
      );
    }

    return parsed.data;
  }
}
