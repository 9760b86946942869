import type { IncomingMessage, ServerResponse } from "node:http";
import type { FastifyInstance } from "fastify";

export type HttpFunction = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

async function boot(build: () => Promise<FastifyInstance>): Promise<FastifyInstance> {
  const app = await build();
  await app.ready();
  return app;
}

/**
 * Adapts one endpoint module to a function runtime that hands over raw
 * (req, res) pairs. The app is built on the first invocation and reused for
 * the life of the instance; a failed build fails every later call too.
 */
export function createHttpFunction(build: () => Promise<FastifyInstance>): HttpFunction {
  let instance: Promise<FastifyInstance> | null = null;

  return async (req, res) => {
    if (!instance) instance = boot(build);
    const app = await instance;
    app.server.emit("request", req, res);
  };
}
