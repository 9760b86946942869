import Fastify, { type FastifyInstance } from "fastify";
import {
  resolveOntologyStore,
  type OntologyStore,
  type OntologyStoreOptions,
} from "@ontology-marketplace/catalog-store";
import {
  createEndpointGuard,
  isObject,
  isStringArray,
  loadAuthContext,
  type AddTagsRequest,
  type AuthContext,
  type ListTagsResponse,
} from "@ontology-marketplace/shared";

export const TAGS_PATH = "/tags";

export interface TagsDeps {
  store: OntologyStore;
  auth: AuthContext;
}

export function parseAddTagsRequest(body: unknown): AddTagsRequest | null {
  if (!isObject(body) || !isStringArray(body.tags)) return null;
  return { tags: body.tags };
}

export function registerTags(app: FastifyInstance, deps: TagsDeps): void {
  const guard = createEndpointGuard(deps.auth, { allowMethods: ["GET", "POST"] });

  app.options(TAGS_PATH, async (req, reply) => guard.preflight(req, reply));

  app.get(TAGS_PATH, async (req, reply) => {
    const caller = await guard.admit(req, reply);
    if (!caller) return reply;

    const response: ListTagsResponse = { tags: deps.store.listTags() };
    return response;
  });

  app.post(TAGS_PATH, async (req, reply) => {
    const caller = await guard.admit(req, reply);
    if (!caller) return reply;

    const parsed = parseAddTagsRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected { tags: string[] }",
      });
    }

    const response: ListTagsResponse = { tags: deps.store.addTags(parsed.tags) };
    return response;
  });
}

interface BuildServerOptions extends OntologyStoreOptions {
  auth?: AuthContext;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: true });
  const auth = options.auth || loadAuthContext();
  const { store, owned } = resolveOntologyStore(options);

  app.get("/health", async () => ({ ok: true, service: "tags" }));
  registerTags(app, { store, auth });

  app.addHook("onClose", async () => {
    if (owned) {
      store.close();
    }
  });

  return app;
}
