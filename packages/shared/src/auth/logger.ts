import type { FastifyBaseLogger } from "fastify";
import { pino } from "pino";

export type AuthLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

// Used when no request logger is at hand, e.g. key refreshes outside Fastify.
export const authLogger: AuthLogger = pino({
  name: "marketplace-auth",
  level: process.env.LOG_LEVEL || "info",
});
