import { describe, expect, it } from "vitest";

import { parseArgs, summarizeRun } from "../src/runner";
import { EsgWorkflowEngine } from "../src/workflow/esg_workflow";
import { ACME_INPUT, templateAgents } from "./helpers/fixtures";

describe("runner", () => {
  it("parses run flags", () => {
    expect(
      parseArgs([
        "--name",
        "Acme Co",
        "--sector",
        "Manufacturing",
        "--period",
        "2024",
        "--strategy-focus",
        "Net zero",
        "--stage-timeout-ms",
        "5000",
        "--full-output",
      ]),
    ).toEqual({
      name: "Acme Co",
      sector: "Manufacturing",
      period: "2024",
      strategyFocus: "Net zero",
      stageTimeoutMs: 5000,
      fullOutput: true,
    });
  });

  it("parses archive lookups and ignores unknown or dangling flags", () => {
    expect(parseArgs(["--list", "--verbose", "yes", "--show", "pkg-1", "--stage-timeout-ms", "soon", "--region"])).toEqual({
      list: true,
      show: "pkg-1",
    });
  });

  it("summarizes a package per stage", async () => {
    const pkg = await new EsgWorkflowEngine({
      agents: templateAgents(),
      createPackageId: () => "pkg-acme",
      now: () => new Date("2025-03-01T09:30:00.000Z"),
    }).run(ACME_INPUT);

    const summary = summarizeRun(pkg);

    expect(summary).toMatchObject({
      package_id: "pkg-acme",
      status: "complete",
      failure: null,
      created_at: "2025-03-01T09:30:00.000Z",
    });
    expect(summary.stages).toEqual([
      {
        stage: "StakeholderAnalysis",
        sections: 6,
        citations: 2,
        summary: "Acme Co engages 6 stakeholder groups, 4 of them high priority.",
      },
      {
        stage: "Materiality",
        sections: 6,
        citations: 8,
        summary: "5 of 6 topics are material for Acme Co in 2024.",
      },
      {
        stage: "PolicyBenchmark",
        sections: 5,
        citations: 6,
        summary: "Policy checklist covers 5 material topics: 2 aligned, 2 with gaps, 1 without mapped guidance.",
      },
      {
        stage: "PeerBenchmark",
        sections: 5,
        citations: 1,
        summary: "Acme Co is compared with 2 peers; peers lead on 3 of 5 material topics.",
      },
      {
        stage: "ReportCompiler",
        sections: 8,
        citations: 9,
        summary: "Acme Co 2024 ESG Report (Draft) has 8 sections citing 9 guideline clauses.",
      },
    ]);
  });
});
