import { z } from "zod";

import { ValidationError } from "../errors";

export const peerInputSchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    focus: z.string().trim().min(1).max(500),
    topics: z.array(z.string().trim().min(1).max(80)).max(20).optional(),
  })
  .strict();

export type PeerInput = z.infer<typeof peerInputSchema>;

export const enterpriseInputSchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    sector: z.string().trim().min(1).max(120),
    period: z.string().trim().min(1).max(40),
    region: z.string().trim().max(120).optional(),
    description: z.string().trim().max(4000).optional(),
    strategy_focus: z.string().trim().max(2000).optional(),
    peers: z.array(peerInputSchema).max(20).optional(),
  })
  .strict();

export type EnterpriseInput = z.infer<typeof enterpriseInputSchema>;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseEnterpriseInput(value: unknown): EnterpriseInput {
  const parsed = enterpriseInputSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError("Enterprise input is invalid", formatZodIssues(parsed.error));
  }

  return parsed.data;
}
