import { readHeaderValue, type RequestHeaders } from "../http/headers.js";
import type { AuthConfig } from "./config.js";
import { devBypassIdentity, type CallerIdentity } from "./identity.js";

export const DEV_EMAIL_HEADER = "x-dev-email";

type DevBypassConfig = Pick<AuthConfig, "bypassEnabled" | "bypassDefaultEmail">;

/**
 * Substitute identity source for local development. Returns null when the
 * bypass is off or when neither the header nor the configured default names
 * anyone; callers must treat null as "no identity", never as anonymous access.
 */
export function resolveDevBypass(
  headers: RequestHeaders,
  config: DevBypassConfig,
): CallerIdentity | null {
  if (!config.bypassEnabled) return null;
  const email = readHeaderValue(headers[DEV_EMAIL_HEADER]) ?? config.bypassDefaultEmail;
  if (!email) return null;
  return devBypassIdentity(email);
}
