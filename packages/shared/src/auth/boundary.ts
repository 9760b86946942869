import type { RequestHeaders } from "../http/headers.js";
import { loadAuthConfig, type AuthConfig, type AuthEnv } from "./config.js";
import { resolveDevBypass } from "./dev-bypass.js";
import { admitted, rejected, type VerificationOutcome } from "./identity.js";
import { authLogger, type AuthLogger } from "./logger.js";
import { httpSigningKeyFetcher, SigningKeyCache, type SigningKeyFetcher } from "./signing-keys.js";
import { TokenVerifier } from "./token-verifier.js";

export interface AuthContext {
  readonly config: AuthConfig;
  readonly verifier: TokenVerifier;
}

export interface AuthContextOptions {
  fetchKeys?: SigningKeyFetcher;
  now?: () => number;
}

export interface AuthRequest {
  headers: RequestHeaders;
}

export function createAuthContext(config: AuthConfig, options: AuthContextOptions = {}): AuthContext {
  const keys = new SigningKeyCache({
    fetchKeys: options.fetchKeys ?? httpSigningKeyFetcher(config.signingKeysUrl),
    ttlMs: config.signingKeysTtlSeconds * 1000,
    now: options.now,
  });
  return Object.freeze({ config, verifier: new TokenVerifier(config, keys, options.now) });
}

let processAuthContext: AuthContext | null = null;

/**
 * Without arguments, resolves the process-wide context from process.env once
 * and reuses it. An explicit env always builds a fresh context.
 */
export function loadAuthContext(env?: AuthEnv): AuthContext {
  if (env) return createAuthContext(loadAuthConfig(env));
  if (!processAuthContext) {
    processAuthContext = createAuthContext(loadAuthConfig(process.env));
  }
  return processAuthContext;
}

/**
 * The one gate every endpoint passes before domain logic. With the bypass
 * off, only the token verifier runs. With it on, the bypass is tried first
 * and a real bearer token still works when the bypass yields nobody.
 */
export async function authenticate(
  request: AuthRequest,
  context: AuthContext,
  log: AuthLogger = authLogger,
): Promise<VerificationOutcome> {
  const { config, verifier } = context;
  const authorization = request.headers.authorization;

  if (!config.bypassEnabled) {
    return verifier.verify(authorization, log);
  }

  const bypassIdentity = resolveDevBypass(request.headers, config);
  if (bypassIdentity) return admitted(bypassIdentity);

  const outcome = await verifier.verify(authorization, log);
  if (!outcome.ok && outcome.reason === "missing-credential") {
    return rejected("bypass-without-identity");
  }
  return outcome;
}
