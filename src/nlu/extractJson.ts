const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/i;

function tryParseObject(text: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(text);
    if (value !== null && typeof value === "object" && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
  } catch {
    // not JSON, caller moves on to the next strategy
  }
  return undefined;
}

/**
 * Pulls a JSON object out of model output: the whole text, then a fenced
 * code block, then the outermost pair of braces. Never throws.
 */
export function extractJson(text: string): Record<string, unknown> | undefined {
  const trimmed = text.trim();
  const direct = tryParseObject(trimmed);
  if (direct) {
    return direct;
  }

  const fenced = trimmed.match(FENCED_BLOCK)?.[1];
  if (fenced !== undefined) {
    const fromBlock = tryParseObject(fenced);
    if (fromBlock) {
      return fromBlock;
    }
  }

  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first >= 0 && last > first) {
    return tryParseObject(trimmed.slice(first, last + 1));
  }
  return undefined;
}
