function extractBalancedJsonObject(content: string): string | null {
  const start = content.indexOf("{");
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < content.length; i += 1) {
    const ch = content[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth += 1;
    } else if (ch === "}") {
      depth -= 1;
      if (depth === 0) {
        return content.slice(start, i + 1);
      }
    }
  }

  return null;
}

function tryParse(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pulls the first JSON object out of a model reply. Replies may wrap the object in a
 * fenced block or surround it with prose, and some carry a trailing comma before a closer.
 */
export function parseJsonObject(content: string): Record<string, unknown> | null {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const candidates = [trimmed];
  for (const match of trimmed.matchAll(/```(?:json)?\s*([\s\S]*?)```/gi)) {
    const block = match[1]?.trim();
    if (block) {
      candidates.push(block);
    }
  }

  const balanced = extractBalancedJsonObject(trimmed);
  if (balanced) {
    candidates.push(balanced);
  }

  const seen = new Set<string>();
  for (const candidate of candidates) {
    for (const attempt of [candidate, candidate.replace(/,\s*([}\]])/g, "$1")]) {
      if (seen.has(attempt)) {
        continue;
      }
      seen.add(attempt);

      const parsed = tryParse(attempt);
      if (isPlainObject(parsed)) {
        return parsed;
      }
    }
  }

  return null;
}
