import { z } from "zod";

import { citationSchema, type Citation } from "../schemas/artifacts";
import guidelineData from "./data/guidelines.json";

export interface GuidelineMappingService {
  lookup(category: string): Citation[];
  categories(): string[];
}

const guidelineDataSchema = z.object({
  references: z.record(citationSchema),
  categories: z.record(z.array(z.string().min(1))),
});

export function normalizeCategory(category: string): string {
  return category
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, "_");
}

export function citationKey(citation: Citation): string {
  return `${citation.source}:${citation.clause_id}`;
}

export function citationLabel(citation: Citation): string {
  return citation.source === "GRI" ? `GRI ${citation.clause_id}` : `SSE ${citation.clause_id}`;
}

/** Ordered union of citation lists; the first occurrence of each clause wins. */
export function mergeCitations(...lists: ReadonlyArray<readonly Citation[]>): Citation[] {
  const seen = new Set<string>();
  const merged: Citation[] = [];

  for (const list of lists) {
    for (const citation of list) {
      const key = citationKey(citation);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      merged.push(citation);
    }
  }

  return merged;
}

export function createGuidelineMapping(data: unknown): GuidelineMappingService {
  const parsed = guidelineDataSchema.parse(data);
  const table = new Map<string, readonly Citation[]>();

  for (const [category, referenceKeys] of Object.entries(parsed.categories)) {
    const citations = referenceKeys.map((referenceKey) => {
      const reference = parsed.references[referenceKey];
      if (!reference) {
        throw new Error(`Guideline category "${category}" references unknown clause "${referenceKey}"`);
      }
      return Object.freeze({ ...reference });
    });
    table.set(normalizeCategory(category), Object.freeze(citations));
  }

  return {
    lookup(category: string): Citation[] {
      return [...(table.get(normalizeCategory(category)) ?? [])];
    },
    categories(): string[] {
      return [...table.keys()];
    },
  };
}

export const guidelineMapping: GuidelineMappingService = createGuidelineMapping(guidelineData);

export function lookupGuidelines(category: string): Citation[] {
  return guidelineMapping.lookup(category);
}
