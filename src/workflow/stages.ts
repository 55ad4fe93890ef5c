import { STAGE_NAMES, type StageName } from "../schemas/artifacts";

export const CANONICAL_STAGE_ORDER: readonly StageName[] = STAGE_NAMES;

/** Declared upstream artifacts per stage. PolicyBenchmark and PeerBenchmark are independent of each other. */
export const STAGE_DEPENDENCIES: Readonly<Record<StageName, readonly StageName[]>> = Object.freeze({
  StakeholderAnalysis: [],
  Materiality: ["StakeholderAnalysis"],
  PolicyBenchmark: ["Materiality"],
  PeerBenchmark: ["Materiality"],
  ReportCompiler: ["StakeholderAnalysis", "Materiality", "PolicyBenchmark", "PeerBenchmark"],
});

export function isStageName(value: string): value is StageName {
  return CANONICAL_STAGE_ORDER.some((stage) => stage === value);
}

/**
 * Structural check of a stage order against a dependency declaration. Returns the
 * problems found; an empty list means the order is runnable.
 */
export function stageOrderIssues(
  order: readonly string[],
  dependencies: Readonly<Record<StageName, readonly StageName[]>> = STAGE_DEPENDENCIES,
): string[] {
  const issues: string[] = [];
  const positions = new Map<StageName, number>();

  order.forEach((stage, index) => {
    if (!isStageName(stage)) {
      issues.push(`unknown stage "${stage}"`);
      return;
    }
    if (positions.has(stage)) {
      issues.push(`stage ${stage} appears more than once`);
      return;
    }
    positions.set(stage, index);
  });

  for (const stage of CANONICAL_STAGE_ORDER) {
    const position = positions.get(stage);
    if (position === undefined) {
      issues.push(`stage ${stage} is missing`);
      continue;
    }

    for (const dependency of dependencies[stage]) {
      const dependencyPosition = positions.get(dependency);
      if (dependencyPosition !== undefined && dependencyPosition > position) {
        issues.push(`stage ${stage} runs before its dependency ${dependency}`);
      }
    }
  }

  return issues;
}
