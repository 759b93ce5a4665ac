export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts bare JSON, a ```json fence, or an object embedded in chatter. */
export function extractJsonObject(rawText: string): JsonObject | null {
  const raw = rawText.trim();
  if (!raw) return null;

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  const candidates = [
    raw,
    raw.match(/```(?:json)?\s*([\s\S]*?)```/i)?.[1] ?? '',
    start >= 0 && end > start ? raw.slice(start, end + 1) : '',
  ]
    .map((item) => item.trim())
    .filter(Boolean);

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (isJsonObject(parsed)) return parsed;
    } catch {
      // try next candidate
    }
  }

  return null;
}
