export type RequestHeaders = Record<string, string | string[] | undefined>;

/**
 * First value of a header, trimmed. Repeated headers arrive as arrays from
 * Node's parser; blank values count as absent.
 */
export function readHeaderValue(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    if (typeof first !== "string") return null;
    const trimmed = first.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
}
