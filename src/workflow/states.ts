import type { EsgStageAgents } from "../agents";
import type { StageName } from "../schemas/artifacts";

export type WorkflowTraceTag = "START" | "DONE" | "ERROR";

export interface WorkflowTraceEvent {
  tag: WorkflowTraceTag;
  stage: StageName;
  message: string;
}

export interface EsgWorkflowEngineOptions {
  agents: EsgStageAgents;
  /** Defaults to the canonical order. Independent stages may be swapped. */
  stageOrder?: readonly StageName[];
  stageTimeoutMs?: number;
  onTrace?: (event: WorkflowTraceEvent) => void;
  now?: () => Date;
  createPackageId?: () => string;
}
