import type { JSONWebKeySet, JWK } from "jose";
import { fingerprint } from "../crypto/fingerprint.js";
import { isObject } from "../validation.js";
import type { AuthLogger } from "./logger.js";

const FETCH_TIMEOUT_MS = 5000;
const DEFAULT_REFRESH_COOLDOWN_MS = 30_000;

// Public-key members only; private parameters such as "d" are never copied.
const JWK_STRING_FIELDS = ["kty", "kid", "alg", "use", "n", "e", "crv", "x", "y"] as const;

export type SigningKeyFetcher = (signal: AbortSignal) => Promise<unknown>;

export interface SigningKeySnapshot {
  readonly jwks: JSONWebKeySet;
  readonly fingerprint: string;
  readonly fetchedAt: number;
  readonly expiresAt: number;
}

export interface SigningKeyCacheOptions {
  fetchKeys: SigningKeyFetcher;
  ttlMs: number;
  refreshCooldownMs?: number;
  now?: () => number;
}

export class SigningKeyFetchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SigningKeyFetchError";
  }
}

export function httpSigningKeyFetcher(url: string): SigningKeyFetcher {
  return async (signal) => {
    const response = await fetch(url, { method: "GET", signal });
    if (!response.ok) {
      throw new Error(`signing key endpoint responded with ${response.status}`);
    }
    return response.json();
  };
}

function toJwk(value: unknown): JWK | null {
  if (!isObject(value) || typeof value.kty !== "string") return null;
  const jwk: JWK = {};
  for (const field of JWK_STRING_FIELDS) {
    const member = value[field];
    if (typeof member === "string") jwk[field] = member;
  }
  return jwk;
}

export function toJsonWebKeySet(body: unknown): JSONWebKeySet | null {
  if (!isObject(body) || !Array.isArray(body.keys)) return null;
  const keys: JWK[] = [];
  for (const entry of body.keys) {
    const jwk = toJwk(entry);
    if (jwk) keys.push(jwk);
  }
  return keys.length > 0 ? { keys } : null;
}

/**
 * Process-wide read-through cache of the identity provider's signing keys.
 * The snapshot is replaced as a whole; concurrent cold-cache fetches are
 * allowed and the last successful one wins. Once warm, an expired snapshot
 * keeps being served while a refresh is in flight or a failed one is
 * within the refresh cooldown.
 */
export class SigningKeyCache {
  private snapshot: SigningKeySnapshot | null = null;
  private refreshing: Promise<SigningKeySnapshot> | null = null;
  private lastFailureAt: number | null = null;
  private readonly now: () => number;
  private readonly refreshCooldownMs: number;

  constructor(private readonly options: SigningKeyCacheOptions) {
    this.now = options.now ?? Date.now;
    this.refreshCooldownMs = options.refreshCooldownMs ?? DEFAULT_REFRESH_COOLDOWN_MS;
  }

  async current(log: AuthLogger): Promise<SigningKeySnapshot> {
    const snapshot = this.snapshot;
    if (snapshot && snapshot.expiresAt > this.now()) return snapshot;
    if (!snapshot) return this.fetch(log);

    // Expired: one refresh at a time, and none while a recent failure cools down.
    if (this.refreshing || this.coolingDown()) return snapshot;

    this.refreshing = this.fetch(log);
    try {
      return await this.refreshing;
    } catch (err) {
      log.warn({ err, fingerprint: snapshot.fingerprint }, "auth: key refresh failed, serving stale keys");
      return snapshot;
    } finally {
      this.refreshing = null;
    }
  }

  /**
   * Called when a token names a key the snapshot lacks. Returns null while the
   * last fetch, or the last failed attempt, is younger than the cooldown.
   */
  async refreshAfterMiss(log: AuthLogger): Promise<SigningKeySnapshot | null> {
    const snapshot = this.snapshot;
    if (snapshot && this.now() - snapshot.fetchedAt < this.refreshCooldownMs) return null;
    if (snapshot && this.coolingDown()) return null;
    return this.fetch(log);
  }

  private coolingDown(): boolean {
    return this.lastFailureAt !== null && this.now() - this.lastFailureAt < this.refreshCooldownMs;
  }

  private async fetch(log: AuthLogger): Promise<SigningKeySnapshot> {
    let body: unknown;
    try {
      body = await this.options.fetchKeys(AbortSignal.timeout(FETCH_TIMEOUT_MS));
    } catch (err) {
      this.lastFailureAt = this.now();
      throw new SigningKeyFetchError("Failed to fetch identity provider signing keys", { cause: err });
    }

    const jwks = toJsonWebKeySet(body);
    if (!jwks) {
      this.lastFailureAt = this.now();
      throw new SigningKeyFetchError("Identity provider returned no usable signing keys");
    }

    const fetchedAt = this.now();
    const next: SigningKeySnapshot = {
      jwks,
      fingerprint: fingerprint(jwks),
      fetchedAt,
      expiresAt: fetchedAt + this.options.ttlMs,
    };
    const previous = this.snapshot;
    this.snapshot = next;
    this.lastFailureAt = null;

    if (previous && previous.fingerprint !== next.fingerprint) {
      log.info(
        { fingerprint: next.fingerprint, previousFingerprint: previous.fingerprint },
        "auth: signing keys rotated",
      );
    } else {
      log.debug({ fingerprint: next.fingerprint, keyCount: jwks.keys.length }, "auth: signing keys loaded");
    }
    return next;
  }
}
