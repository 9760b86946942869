import { createLocalJWKSet, errors, jwtVerify, type JSONWebKeySet, type JWTPayload } from "jose";
import type { AuthConfig } from "./config.js";
import {
  admitted,
  rejected,
  verifiedIdentity,
  type RejectionReason,
  type VerificationOutcome,
} from "./identity.js";
import { authLogger, type AuthLogger } from "./logger.js";
import type { SigningKeyCache } from "./signing-keys.js";

export const FIREBASE_ISSUER_PREFIX = "https://securetoken.google.com/";

const BEARER_PATTERN = /^Bearer (\S+)$/i;
const MAX_SUBJECT_LENGTH = 128;
const UNKNOWN_KEY = Symbol("unknown-key");

type TokenVerifierConfig = Pick<AuthConfig, "projectIds" | "requireVerifiedEmail">;

export function parseBearerHeader(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const match = BEARER_PATTERN.exec(value.trim());
  return match ? match[1] : null;
}

export function issuerFor(projectId: string): string {
  return `${FIREBASE_ISSUER_PREFIX}${projectId}`;
}

function reasonFor(err: unknown): RejectionReason | null {
  if (err instanceof errors.JWTExpired) return "expired";
  if (err instanceof errors.JWTClaimValidationFailed) {
    if (err.reason !== "check_failed") return "malformed-credential";
    switch (err.claim) {
      case "aud":
        return "wrong-audience";
      case "iss":
        return "wrong-issuer";
      case "nbf":
      case "iat":
        return "expired";
      default:
        return "malformed-credential";
    }
  }
  if (err instanceof errors.JWSSignatureVerificationFailed) return "invalid-signature";
  if (err instanceof errors.JOSEError) return "malformed-credential";
  return null;
}

/**
 * Verifies identity-provider ID tokens locally against the cached key set.
 * Every failure maps onto a specific rejection reason; only key retrieval
 * problems escape as SigningKeyFetchError.
 */
export class TokenVerifier {
  constructor(
    private readonly config: TokenVerifierConfig,
    private readonly keys: SigningKeyCache,
    private readonly now: () => number = Date.now,
  ) {}

  async verify(rawHeader: unknown, log: AuthLogger = authLogger): Promise<VerificationOutcome> {
    const token = parseBearerHeader(rawHeader);
    if (!token) return rejected("missing-credential");

    const snapshot = await this.keys.current(log);
    const outcome = await this.check(token, snapshot.jwks);
    if (outcome !== UNKNOWN_KEY) return outcome;

    // Unknown kid: the provider may have rotated since the last fetch.
    const refreshed = await this.keys.refreshAfterMiss(log);
    if (!refreshed) return rejected("invalid-signature");
    const retried = await this.check(token, refreshed.jwks);
    return retried === UNKNOWN_KEY ? rejected("invalid-signature") : retried;
  }

  private async check(
    token: string,
    jwks: JSONWebKeySet,
  ): Promise<VerificationOutcome | typeof UNKNOWN_KEY> {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, createLocalJWKSet(jwks), {
        algorithms: ["RS256"],
        audience: [...this.config.projectIds],
        requiredClaims: ["exp", "iat", "sub"],
        clockTolerance: 0,
        currentDate: new Date(this.now()),
      }));
    } catch (err) {
      if (err instanceof errors.JWKSNoMatchingKey) return UNKNOWN_KEY;
      const reason = reasonFor(err);
      if (!reason) throw err;
      return rejected(reason);
    }
    return this.toOutcome(payload);
  }

  private toOutcome(payload: JWTPayload): VerificationOutcome {
    // jose has matched the audience; the issuer must name that same project.
    const audiences = Array.isArray(payload.aud) ? payload.aud : [payload.aud];
    const project = this.config.projectIds.find((id) => audiences.includes(id));
    if (!project || payload.iss !== issuerFor(project)) return rejected("wrong-issuer");

    if (typeof payload.iat !== "number" || payload.iat > Math.floor(this.now() / 1000)) {
      return rejected("expired");
    }

    const subject = payload.sub;
    if (typeof subject !== "string" || subject.length === 0 || subject.length > MAX_SUBJECT_LENGTH) {
      return rejected("malformed-credential");
    }

    const emailVerified = payload.email_verified === true;
    if (this.config.requireVerifiedEmail && !emailVerified) {
      return rejected("unverified-email");
    }

    // An unverified email never becomes the caller's email; ownership then falls back to sub.
    const email =
      emailVerified && typeof payload.email === "string" && payload.email.length > 0
        ? payload.email
        : null;
    return admitted(verifiedIdentity(subject, email));
  }
}
