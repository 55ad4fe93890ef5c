import "dotenv/config";

import { ValidationError } from "./errors";
import type { ReportPackage } from "./schemas/report_package";
import { closeArchiveStore, openArchiveStore } from "./store/archive";
import { runEsgWorkflow } from "./workflow/esg_workflow";

export interface CliArgs {
  name?: string;
  sector?: string;
  period?: string;
  region?: string;
  description?: string;
  strategyFocus?: string;
  stageTimeoutMs?: number;
  list?: boolean;
  show?: string;
  fullOutput?: boolean;
}

type StringFlag = "name" | "sector" | "period" | "region" | "description" | "strategyFocus" | "show";

const VALUE_FLAGS: Record<string, StringFlag> = {
  "--name": "name",
  "--sector": "sector",
  "--period": "period",
  "--region": "region",
  "--description": "description",
  "--strategy-focus": "strategyFocus",
  "--show": "show",
};

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i] ?? "";

    if (current === "--full-output") {
      args.fullOutput = true;
      continue;
    }

    if (current === "--list") {
      args.list = true;
      continue;
    }

    const next = argv[i + 1];
    if (!next) {
      continue;
    }

    if (current === "--stage-timeout-ms") {
      const parsed = Number(next);
      if (!Number.isNaN(parsed)) {
        args.stageTimeoutMs = parsed;
      }
      i += 1;
      continue;
    }

    const key = VALUE_FLAGS[current];
    if (key) {
      args[key] = next;
      i += 1;
    }
  }

  return args;
}

export function summarizeRun(pkg: ReportPackage): Record<string, unknown> {
  return {
    package_id: pkg.package_id,
    status: pkg.status,
    failure: pkg.failure,
    created_at: pkg.created_at,
    stages: pkg.artifacts.map((artifact) => ({
      stage: artifact.stage,
      sections: artifact.sections.length,
      citations: artifact.citations.length,
      summary: artifact.payload.summary,
    })),
  };
}

async function execute(parsed: CliArgs): Promise<void> {
  if (parsed.list) {
    const archive = await openArchiveStore();
    console.log(JSON.stringify({ mode: "list", packages: await archive.list() }, null, 2));
    return;
  }

  if (parsed.show) {
    const archive = await openArchiveStore();
    const pkg = await archive.get(parsed.show);
    console.log(JSON.stringify({ mode: "show", result: parsed.fullOutput ? pkg : summarizeRun(pkg) }, null, 2));
    return;
  }

  if (!parsed.name || !parsed.sector || !parsed.period) {
    throw new ValidationError("--name, --sector and --period are required to run a workflow");
  }

  const pkg = await runEsgWorkflow(
    {
      name: parsed.name,
      sector: parsed.sector,
      period: parsed.period,
      region: parsed.region,
      description: parsed.description,
      strategy_focus: parsed.strategyFocus,
    },
    {
      stageTimeoutMs: parsed.stageTimeoutMs,
      onTrace: (event) => {
        console.error(`[workflow] ${event.tag} ${event.message}`);
      },
    },
  );

  console.log(JSON.stringify({ mode: "run", result: parsed.fullOutput ? pkg : summarizeRun(pkg) }, null, 2));
}

async function main(): Promise<void> {
  try {
    await execute(parseArgs(process.argv.slice(2)));
  } finally {
    await closeArchiveStore();
  }
}

if (process.argv[1] && /runner\.[cm]?[jt]s$/.test(process.argv[1])) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
