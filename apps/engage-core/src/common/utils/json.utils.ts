const FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/;

/**
 * Remove a surrounding markdown code fence (``` or ```json) from model output.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCE.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

/**
 * JSON.parse that returns undefined instead of throwing.
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
