import { isNonEmptyString, isObject, splitList } from "../validation.js";

export const PROJECT_ID_VARIABLES = [
  "FIREBASE_PROJECT_ID",
  "GOOGLE_CLOUD_PROJECT",
  "GCLOUD_PROJECT",
  "GCP_PROJECT",
] as const;

export const SERVICE_ACCOUNT_VARIABLE = "FIREBASE_SERVICE_ACCOUNT";

export const DEFAULT_SIGNING_KEYS_URL =
  "https://www.googleapis.com/service_accounts/v1/jwk/securetoken@system.gserviceaccount.com";
export const DEFAULT_SIGNING_KEYS_TTL_SECONDS = 600;
export const DEFAULT_CORS_ALLOWED_HEADERS = "Authorization, Content-Type, X-Dev-Email";
export const DEFAULT_CORS_MAX_AGE_SECONDS = 3600;

export type AuthEnv = Record<string, string | undefined>;

export type CorsOrigins = "*" | ReadonlySet<string>;

export interface ServiceAccountCredential {
  readonly projectId: string;
  readonly clientEmail: string;
  readonly privateKey: string;
}

export interface AuthConfig {
  readonly projectIds: readonly string[];
  readonly serviceAccount: ServiceAccountCredential | null;
  readonly bypassEnabled: boolean;
  readonly bypassDefaultEmail: string | null;
  readonly requireVerifiedEmail: boolean;
  readonly corsOrigins: CorsOrigins;
  readonly corsAllowedHeaders: string;
  readonly corsMaxAgeSeconds: number;
  readonly signingKeysUrl: string;
  readonly signingKeysTtlSeconds: number;
}

export class AuthConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "AuthConfigError";
  }
}

function readEnv(env: AuthEnv, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function parseFlag(raw: string | null, fallback = false): boolean {
  if (!raw) return fallback;
  const normalized = raw.toLowerCase();
  return normalized === "true" || normalized === "1";
}

function parsePositiveInteger(env: AuthEnv, name: string, fallback: number): number {
  const raw = readEnv(env, name);
  if (raw === null) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new AuthConfigError(name, `${name} must be a positive integer`);
  }
  return Number(raw);
}

export function parseServiceAccount(raw: string): ServiceAccountCredential {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new AuthConfigError(
      SERVICE_ACCOUNT_VARIABLE,
      `${SERVICE_ACCOUNT_VARIABLE} is not valid JSON`,
      { cause: err },
    );
  }

  if (!isObject(parsed) || parsed.type !== "service_account") {
    throw new AuthConfigError(
      SERVICE_ACCOUNT_VARIABLE,
      `${SERVICE_ACCOUNT_VARIABLE} must be a service_account document`,
    );
  }

  const { project_id: projectId, client_email: clientEmail, private_key: privateKey } = parsed;
  if (!isNonEmptyString(projectId) || !isNonEmptyString(clientEmail) || !isNonEmptyString(privateKey)) {
    throw new AuthConfigError(
      SERVICE_ACCOUNT_VARIABLE,
      `${SERVICE_ACCOUNT_VARIABLE} must include project_id, client_email and private_key`,
    );
  }

  return Object.freeze({ projectId: projectId.trim(), clientEmail: clientEmail.trim(), privateKey });
}

export function parseCorsOrigins(raw: string | null): CorsOrigins {
  if (!raw) return "*";
  const origins = splitList(raw);
  if (origins.length === 0 || origins.includes("*")) return "*";
  return new Set(origins);
}

function resolveProjectIds(env: AuthEnv, serviceAccount: ServiceAccountCredential | null): string[] {
  let primary: string | null = null;
  for (const name of PROJECT_ID_VARIABLES) {
    primary = readEnv(env, name);
    if (primary) break;
  }
  primary = primary ?? serviceAccount?.projectId ?? null;
  if (!primary) {
    throw new AuthConfigError(
      PROJECT_ID_VARIABLES[0],
      `No project id configured; set one of ${PROJECT_ID_VARIABLES.join(", ")} or ${SERVICE_ACCOUNT_VARIABLE}`,
    );
  }

  const ids = [primary];
  for (const extra of splitList(env.AUTH_ADDITIONAL_PROJECT_IDS)) {
    if (!ids.includes(extra)) ids.push(extra);
  }
  return ids;
}

/**
 * Reads the auth configuration from the environment. Throws AuthConfigError
 * for anything that would leave the process unable to verify callers.
 */
export function loadAuthConfig(env: AuthEnv): AuthConfig {
  const rawServiceAccount = readEnv(env, SERVICE_ACCOUNT_VARIABLE);
  const serviceAccount = rawServiceAccount ? parseServiceAccount(rawServiceAccount) : null;
  const projectIds = resolveProjectIds(env, serviceAccount);

  const bypassEnabled = parseFlag(readEnv(env, "AUTH_DEV_BYPASS"));
  if (bypassEnabled && readEnv(env, "NODE_ENV") === "production") {
    throw new AuthConfigError("AUTH_DEV_BYPASS", "AUTH_DEV_BYPASS cannot be enabled in production");
  }

  return Object.freeze({
    projectIds: Object.freeze(projectIds),
    serviceAccount,
    bypassEnabled,
    bypassDefaultEmail: readEnv(env, "AUTH_DEV_BYPASS_EMAIL"),
    requireVerifiedEmail: parseFlag(readEnv(env, "AUTH_REQUIRE_VERIFIED_EMAIL"), true),
    corsOrigins: parseCorsOrigins(readEnv(env, "CORS_ALLOWED_ORIGINS")),
    corsAllowedHeaders: readEnv(env, "CORS_ALLOWED_HEADERS") ?? DEFAULT_CORS_ALLOWED_HEADERS,
    corsMaxAgeSeconds: parsePositiveInteger(env, "CORS_MAX_AGE_SECONDS", DEFAULT_CORS_MAX_AGE_SECONDS),
    signingKeysUrl: readEnv(env, "AUTH_SIGNING_KEYS_URL") ?? DEFAULT_SIGNING_KEYS_URL,
    signingKeysTtlSeconds: parsePositiveInteger(
      env,
      "AUTH_SIGNING_KEYS_TTL_SECONDS",
      DEFAULT_SIGNING_KEYS_TTL_SECONDS,
    ),
  });
}
