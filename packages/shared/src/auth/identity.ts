export type IdentitySource = "verified-token" | "dev-bypass";

export interface CallerIdentity {
  readonly subject: string;
  readonly email: string | null;
  readonly source: IdentitySource;
}

export type RejectionReason =
  | "missing-credential"
  | "malformed-credential"
  | "invalid-signature"
  | "expired"
  | "wrong-audience"
  | "wrong-issuer"
  | "unverified-email"
  | "bypass-without-identity";

export type VerificationOutcome =
  | { readonly ok: true; readonly identity: CallerIdentity }
  | { readonly ok: false; readonly reason: RejectionReason };

export function admitted(identity: CallerIdentity): VerificationOutcome {
  return { ok: true, identity };
}

export function rejected(reason: RejectionReason): VerificationOutcome {
  return { ok: false, reason };
}

export function verifiedIdentity(subject: string, email: string | null): CallerIdentity {
  return Object.freeze({ subject, email, source: "verified-token" as const });
}

export function devBypassIdentity(email: string): CallerIdentity {
  return Object.freeze({ subject: email, email, source: "dev-bypass" as const });
}

/** Key used to record ownership: the email when the provider supplied one. */
export function callerKey(identity: CallerIdentity): string {
  return identity.email ?? identity.subject;
}

const REJECTION_MESSAGES: Record<RejectionReason, string> = {
  "missing-credential": "Authorization header must carry a bearer token",
  "malformed-credential": "Bearer token could not be parsed",
  "invalid-signature": "Bearer token signature is not valid",
  expired: "Bearer token is expired or not yet valid",
  "wrong-audience": "Bearer token was issued for another project",
  "wrong-issuer": "Bearer token was issued by an unexpected issuer",
  "unverified-email": "Email address on the token is not verified",
  "bypass-without-identity": "Development bypass is enabled but no identity was supplied",
};

export function describeRejection(reason: RejectionReason): string {
  return REJECTION_MESSAGES[reason];
}
