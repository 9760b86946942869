import type { AuthConfig } from "./config.js";

type CorsConfig = Pick<AuthConfig, "corsOrigins" | "corsAllowedHeaders" | "corsMaxAgeSeconds">;

export type CorsDecision =
  | { allowed: true; headers: Record<string, string> }
  | { allowed: false; origin: string };

function policyHeaders(
  allowOrigin: string,
  config: CorsConfig,
  allowMethods: readonly string[],
): Record<string, string> {
  return {
    "access-control-allow-origin": allowOrigin,
    "access-control-allow-methods": allowMethods.join(", "),
    "access-control-allow-headers": config.corsAllowedHeaders,
    "access-control-max-age": String(config.corsMaxAgeSeconds),
  };
}

/**
 * Exact-match origin check. No scheme, port or case normalization: an origin
 * is allowed only when the allow-list holds the identical string, or when the
 * allow-list is the wildcard.
 */
export function evaluateCors(
  origin: string | undefined,
  config: CorsConfig,
  allowMethods: readonly string[],
): CorsDecision {
  if (config.corsOrigins === "*") {
    return { allowed: true, headers: policyHeaders("*", config, allowMethods) };
  }

  // Same-origin and non-browser callers send no Origin; nothing to negotiate.
  if (origin === undefined) {
    return { allowed: true, headers: {} };
  }

  if (!config.corsOrigins.has(origin)) {
    return { allowed: false, origin };
  }

  return {
    allowed: true,
    headers: { ...policyHeaders(origin, config, allowMethods), vary: "Origin" },
  };
}
