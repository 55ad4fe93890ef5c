import type { NextApiRequest, NextApiResponse } from "next";

import { NotFoundError, PersistenceError, ValidationError } from "../errors";

export interface ErrorResponse {
  error: string;
  details?: string[];
}

export function rejectMethod(req: NextApiRequest, res: NextApiResponse, allowed: readonly string[]): boolean {
  if (req.method && allowed.includes(req.method)) {
    return false;
  }

  res.setHeader("Allow", allowed.join(", "));
  res.status(405).json({ error: "Method not allowed" });
  return true;
}

export function queryParam(req: NextApiRequest, name: string): string | null {
  const raw = req.query[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Maps the workflow error taxonomy onto HTTP statuses; anything else is a 500. */
export function sendError(res: NextApiResponse, scope: string, error: unknown): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message, details: error.issues });
    return;
  }

  if (error instanceof NotFoundError) {
    res.status(404).json({ error: error.message });
    return;
  }

  if (error instanceof PersistenceError) {
    console.error(`[${scope}] archive unavailable`, error);
    res.status(503).json({ error: "Archive is unavailable" });
    return;
  }

  console.error(`[${scope}] request failed`, error);
  res.status(500).json({ error: "Internal server error" });
}
