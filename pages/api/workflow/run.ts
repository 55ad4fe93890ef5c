import type { NextApiRequest, NextApiResponse } from "next";
import { z } from "zod";

import { rejectMethod, sendError } from "../../../src/api/responses";
import { ValidationError } from "../../../src/errors";
import { formatZodIssues } from "../../../src/schemas/enterprise_input";
import { runEsgWorkflow } from "../../../src/workflow/esg_workflow";
import type { WorkflowTraceEvent } from "../../../src/workflow/states";

const runBodySchema = z
  .object({
    input: z.unknown(),
    stageTimeoutMs: z.number().int().min(1).max(600_000).optional(),
  })
  .strict();

export default async function handler(req: NextApiRequest, res: NextApiResponse): Promise<void> {
  if (rejectMethod(req, res, ["POST"])) {
    return;
  }

  try {
    const parsedBody = runBodySchema.safeParse(req.body ?? {});
    if (!parsedBody.success) {
      throw new ValidationError("Invalid request payload", formatZodIssues(parsedBody.error));
    }

    const trace: WorkflowTraceEvent[] = [];
    const pkg = await runEsgWorkflow(parsedBody.data.input, {
      stageTimeoutMs: parsedBody.data.stageTimeoutMs,
      onTrace: (event) => {
        trace.push(event);
      },
    });

    res.status(201).json({ package: pkg, trace });
  } catch (error) {
    sendError(res, "api/workflow/run", error);
  }
}
