import type { FastifyReply, FastifyRequest } from "fastify";
import { authenticate, type AuthContext } from "../auth/boundary.js";
import { evaluateCors } from "../auth/cors.js";
import { describeRejection, type CallerIdentity, type VerificationOutcome } from "../auth/identity.js";
import { SigningKeyFetchError } from "../auth/signing-keys.js";

export interface EndpointGuardOptions {
  allowMethods: readonly string[];
}

export interface EndpointGuard {
  /** Answers an OPTIONS request; never authenticates. */
  preflight(req: FastifyRequest, reply: FastifyReply): FastifyReply;
  /**
   * Applies the CORS policy, then the auth boundary. Returns the caller, or
   * null once a refusal has been sent; the handler must return at that point.
   */
  admit(req: FastifyRequest, reply: FastifyReply): Promise<CallerIdentity | null>;
}

/**
 * Builds the guard one endpoint module owns. Every module creates its own,
 * so a module deployed alone carries the same checks as in the monolith.
 */
export function createEndpointGuard(
  context: AuthContext,
  options: EndpointGuardOptions,
): EndpointGuard {
  const allowMethods = options.allowMethods.includes("OPTIONS")
    ? [...options.allowMethods]
    : [...options.allowMethods, "OPTIONS"];

  function applyCors(req: FastifyRequest, reply: FastifyReply): boolean {
    const decision = evaluateCors(req.headers.origin, context.config, allowMethods);
    if (!decision.allowed) {
      req.log.warn({ origin: decision.origin }, "cors: origin rejected");
      reply.code(403).send({
        error: "origin_not_allowed",
        message: "Origin is not in the CORS allow-list",
      });
      return false;
    }
    reply.headers(decision.headers);
    return true;
  }

  return {
    preflight(req, reply) {
      if (!applyCors(req, reply)) return reply;
      return reply.code(204).send();
    },

    async admit(req, reply) {
      if (!applyCors(req, reply)) return null;

      let outcome: VerificationOutcome;
      try {
        outcome = await authenticate(req, context, req.log);
      } catch (err) {
        if (err instanceof SigningKeyFetchError) {
          req.log.error({ err }, "auth: signing keys unavailable");
          reply.code(503).send({
            error: "identity_provider_unavailable",
            message: "Caller identity cannot be verified right now",
          });
          return null;
        }
        req.log.error({ err }, "auth: verification failed unexpectedly");
        reply.code(500).send({ error: "internal_error" });
        return null;
      }

      if (!outcome.ok) {
        req.log.warn({ reason: outcome.reason }, "auth: request rejected");
        reply.code(401).send({
          error: "unauthorized",
          reason: outcome.reason,
          message: describeRejection(outcome.reason),
        });
        return null;
      }

      req.log.debug(
        { subject: outcome.identity.subject, source: outcome.identity.source },
        "auth: caller admitted",
      );
      return outcome.identity;
    },
  };
}
