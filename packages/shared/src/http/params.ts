import { isNonEmptyString, isObject } from "../validation.js";

/** A trimmed, non-empty route parameter, or null. */
export function readPathParam(params: unknown, name: string): string | null {
  if (!isObject(params)) return null;
  const value = params[name];
  return isNonEmptyString(value) ? value.trim() : null;
}
