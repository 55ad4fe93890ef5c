import { randomUUID } from "node:crypto";

import { createEsgStageAgents, type CreateStageAgentsOptions, type EsgStageAgents } from "../agents";
import { resolveStageTimeoutMs } from "../config/workflow_config";
import { errorMessage, StageExecutionError } from "../errors";
import type { Artifact, StageName } from "../schemas/artifacts";
import { type EnterpriseInput, parseEnterpriseInput } from "../schemas/enterprise_input";
import {
  PACKAGE_SCHEMA_VERSION,
  type PackageFailure,
  type ReportPackage,
} from "../schemas/report_package";
import { openArchiveStore, type ArchiveStore } from "../store/archive";
import { deepFreeze, runWithStageTimeout, WorkflowContext } from "./runtime";
import { CANONICAL_STAGE_ORDER, stageOrderIssues } from "./stages";
import type { EsgWorkflowEngineOptions, WorkflowTraceEvent } from "./states";

function asStageExecutionError(stage: StageName, error: unknown): StageExecutionError {
  if (error instanceof StageExecutionError) {
    return error;
  }
  return new StageExecutionError(stage, errorMessage(error), { cause: error });
}

export class EsgWorkflowEngine {
  readonly stageOrder: readonly StageName[];

  private readonly agents: EsgStageAgents;
  private readonly stageTimeoutMs: number;
  private readonly onTrace?: (event: WorkflowTraceEvent) => void;
  private readonly now: () => Date;
  private readonly createPackageId: () => string;

  constructor(options: EsgWorkflowEngineOptions) {
    const stageOrder = [...(options.stageOrder ?? CANONICAL_STAGE_ORDER)];

    const mismatched = CANONICAL_STAGE_ORDER.filter((stage) => options.agents[stage].stage !== stage);
    if (mismatched.length > 0) {
      throw new Error(`Stage agents registered under the wrong stage: ${mismatched.join(", ")}`);
    }

    const dependencies = {
      StakeholderAnalysis: options.agents.StakeholderAnalysis.dependsOn,
      Materiality: options.agents.Materiality.dependsOn,
      PolicyBenchmark: options.agents.PolicyBenchmark.dependsOn,
      PeerBenchmark: options.agents.PeerBenchmark.dependsOn,
      ReportCompiler: options.agents.ReportCompiler.dependsOn,
    };
    const issues = stageOrderIssues(stageOrder, dependencies);
    if (issues.length > 0) {
      throw new Error(`Invalid stage order: ${issues.join("; ")}`);
    }

    this.stageOrder = Object.freeze(stageOrder);
    this.agents = options.agents;
    this.stageTimeoutMs = resolveStageTimeoutMs(options.stageTimeoutMs);
    this.onTrace = options.onTrace;
    this.now = options.now ?? (() => new Date());
    this.createPackageId = options.createPackageId ?? (() => `pkg-${randomUUID()}`);
  }

  /**
   * Runs every stage once, in order. A stage failure ends the run early and is
   * recorded on the returned partial package; it is never thrown.
   */
  async run(input: EnterpriseInput): Promise<ReportPackage> {
    const validated = parseEnterpriseInput(input);
    const context = new WorkflowContext(validated);
    let failure: PackageFailure | null = null;

    for (const stage of this.stageOrder) {
      const agent = this.agents[stage];
      this.trace({ tag: "START", stage, message: `${stage} started` });

      try {
        const artifact = await runWithStageTimeout<Artifact>(stage, this.stageTimeoutMs, (signal) =>
          agent.execute(context.viewFor(agent.dependsOn, signal)),
        );
        if (artifact.stage !== stage) {
          throw new StageExecutionError(stage, `agent returned an artifact for ${artifact.stage}`);
        }
        context.record(deepFreeze(artifact));
        this.trace({ tag: "DONE", stage, message: `${stage} produced ${artifact.sections.length} sections` });
      } catch (error) {
        const stageError = asStageExecutionError(stage, error);
        failure = { stage, reason: stageError.message };
        console.warn(`[workflow] stage ${stage} failed: ${stageError.message}`);
        this.trace({ tag: "ERROR", stage, message: stageError.message });
        break;
      }
    }

    return this.seal(validated, context.snapshot(), failure);
  }

  /**
   * Artifacts are sealed in canonical stage order; `stage_order` keeps the order they ran in.
   * A reordered run that fails part way can therefore hold a non-contiguous set of stages.
   */
  private seal(input: EnterpriseInput, artifacts: Artifact[], failure: PackageFailure | null): ReportPackage {
    const canonical = [...artifacts].sort(
      (left, right) => CANONICAL_STAGE_ORDER.indexOf(left.stage) - CANONICAL_STAGE_ORDER.indexOf(right.stage),
    );
    const pkg: ReportPackage = {
      schema_version: PACKAGE_SCHEMA_VERSION,
      package_id: this.createPackageId(),
      status: failure ? "partial" : "complete",
      failure,
      created_at: this.now().toISOString(),
      stage_order: [...this.stageOrder],
      input,
      artifacts: canonical,
      confirmations: [],
    };
    return deepFreeze(pkg);
  }

  private trace(event: WorkflowTraceEvent): void {
    this.onTrace?.(event);
  }
}

export interface RunEsgWorkflowOptions extends CreateStageAgentsOptions {
  agents?: EsgStageAgents;
  stageOrder?: readonly StageName[];
  stageTimeoutMs?: number;
  onTrace?: (event: WorkflowTraceEvent) => void;
  archive?: ArchiveStore;
}

/** Runs one workflow and archives the resulting package, complete or partial. */
export async function runEsgWorkflow(input: unknown, options: RunEsgWorkflowOptions = {}): Promise<ReportPackage> {
  const engine = new EsgWorkflowEngine({
    agents:
      options.agents ??
      createEsgStageAgents({ settings: options.settings, client: options.client, guidelines: options.guidelines }),
    stageOrder: options.stageOrder,
    stageTimeoutMs: options.stageTimeoutMs,
    onTrace: options.onTrace,
  });

  const pkg = await engine.run(parseEnterpriseInput(input));
  const archive = options.archive ?? (await openArchiveStore());
  await archive.persist(pkg);
  return pkg;
}
