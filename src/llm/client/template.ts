import { z } from "zod";

import type { LLMClient, LLMCompletionRequest } from "./types";

const FACTS_MARKER = "FACTS_JSON:";

const narrativeFactsSchema = z.object({
  headline: z.string().trim().min(1),
  points: z.array(z.string()).default([]),
});

export type NarrativeFacts = z.infer<typeof narrativeFactsSchema>;

/**
 * Reads the facts block that closes the user message. Enterprise text earlier in the
 * message may contain the marker too, so markers are tried from the last one back.
 */
export function readNarrativeFacts(userMessage: string): NarrativeFacts {
  let markerIndex = userMessage.lastIndexOf(FACTS_MARKER);
  if (markerIndex === -1) {
    throw new Error("Template narrative request is missing FACTS_JSON");
  }

  let decodeError: unknown;
  while (markerIndex !== -1) {
    const raw = userMessage.slice(markerIndex + FACTS_MARKER.length).trim();
    try {
      return parseFacts(JSON.parse(raw));
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
      if (decodeError === undefined) {
        decodeError = error;
      }
    }
    markerIndex = markerIndex === 0 ? -1 : userMessage.lastIndexOf(FACTS_MARKER, markerIndex - 1);
  }

  throw new Error("Template narrative facts are not valid JSON", { cause: decodeError });
}

function parseFacts(decoded: unknown): NarrativeFacts {
  const parsed = narrativeFactsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new Error("Template narrative facts are missing a headline");
  }

  return parsed.data;
}

/**
 * Local narrative writer. It restates the facts a stage already computed, so the same
 * request always yields the same text.
 */
export class TemplateNarrativeClient implements LLMClient {
  readonly provider = "Template" as const;

  async complete(request: LLMCompletionRequest): Promise<string> {
    if (request.signal?.aborted) {
      throw new Error("Template narrative request was aborted");
    }

    const facts = readNarrativeFacts(request.userMessage);
    return JSON.stringify({
      summary: facts.headline,
      highlights: facts.points.slice(0, 12),
    });
  }
}
