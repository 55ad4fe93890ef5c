import { StageExecutionError } from "../errors";
import type { Artifact, StageName } from "../schemas/artifacts";
import type { EnterpriseInput } from "../schemas/enterprise_input";
import type { StageView } from "../agents";

/** Run-scoped stage results. Grows by one artifact per completed stage and is dropped after sealing. */
export class WorkflowContext {
  private readonly artifacts = new Map<StageName, Artifact>();

  constructor(readonly input: EnterpriseInput) {}

  has(stage: StageName): boolean {
    return this.artifacts.has(stage);
  }

  record(artifact: Artifact): void {
    if (this.artifacts.has(artifact.stage)) {
      throw new StageExecutionError(artifact.stage, "stage already produced an artifact in this run");
    }
    this.artifacts.set(artifact.stage, artifact);
  }

  viewFor(dependencies: readonly StageName[], signal: AbortSignal): StageView {
    const artifacts: Artifact[] = [];
    for (const stage of dependencies) {
      const artifact = this.artifacts.get(stage);
      if (artifact) {
        artifacts.push(artifact);
      }
    }

    return { input: this.input, artifacts, signal };
  }

  snapshot(): Artifact[] {
    return [...this.artifacts.values()];
  }
}

/**
 * Bounds one stage invocation. On expiry the stage's signal is aborted and the
 * returned promise rejects, whether or not the stage honours the signal.
 */
export function runWithStageTimeout<T>(
  stage: StageName,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new StageExecutionError(stage, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      clearTimeout(timer);
      reject(error);
      return;
    }

    pending.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
