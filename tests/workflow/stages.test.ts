import { describe, expect, it } from "vitest";

import { CANONICAL_STAGE_ORDER, isStageName, STAGE_DEPENDENCIES, stageOrderIssues } from "../../src/workflow/stages";

describe("stageOrderIssues", () => {
  it("accepts the canonical order", () => {
    expect(stageOrderIssues(CANONICAL_STAGE_ORDER)).toEqual([]);
  });

  it("accepts swapping the two benchmark stages", () => {
    expect(
      stageOrderIssues(["StakeholderAnalysis", "Materiality", "PeerBenchmark", "PolicyBenchmark", "ReportCompiler"]),
    ).toEqual([]);
  });

  it("reports a stage scheduled before its dependency", () => {
    expect(
      stageOrderIssues(["StakeholderAnalysis", "Materiality", "PolicyBenchmark", "ReportCompiler", "PeerBenchmark"]),
    ).toEqual(["stage ReportCompiler runs before its dependency PeerBenchmark"]);
  });

  it("reports unknown, duplicated and missing stages", () => {
    expect(
      stageOrderIssues(["StakeholderAnalysis", "Materiality", "Materiality", "Summary", "PolicyBenchmark", "ReportCompiler"]),
    ).toEqual([
      "stage Materiality appears more than once",
      'unknown stage "Summary"',
      "stage PeerBenchmark is missing",
    ]);
  });

  it("checks against a custom dependency declaration", () => {
    const dependencies = { ...STAGE_DEPENDENCIES, PeerBenchmark: ["PolicyBenchmark" as const] };

    expect(
      stageOrderIssues(
        ["StakeholderAnalysis", "Materiality", "PeerBenchmark", "PolicyBenchmark", "ReportCompiler"],
        dependencies,
      ),
    ).toEqual(["stage PeerBenchmark runs before its dependency PolicyBenchmark"]);
  });
});

describe("isStageName", () => {
  it("recognises only the five stages", () => {
    expect(isStageName("ReportCompiler")).toBe(true);
    expect(isStageName("reportcompiler")).toBe(false);
  });
});
