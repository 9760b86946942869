import Fastify, { type FastifyInstance } from "fastify";
import {
  resolveOntologyStore,
  type OntologyStore,
  type OntologyStoreOptions,
} from "@ontology-marketplace/catalog-store";
import {
  callerKey,
  createEndpointGuard,
  loadAuthContext,
  readPathParam,
  type AuthContext,
  type LikeOntologyResponse,
} from "@ontology-marketplace/shared";

export const LIKE_ONTOLOGY_PATH = "/like_ontology/:ontologyId";

export interface LikeOntologyDeps {
  store: OntologyStore;
  auth: AuthContext;
}

export function registerLikeOntology(app: FastifyInstance, deps: LikeOntologyDeps): void {
  const guard = createEndpointGuard(deps.auth, { allowMethods: ["POST"] });

  app.options(LIKE_ONTOLOGY_PATH, async (req, reply) => guard.preflight(req, reply));

  app.post(LIKE_ONTOLOGY_PATH, async (req, reply) => {
    const caller = await guard.admit(req, reply);
    if (!caller) return reply;

    const ontologyId = readPathParam(req.params, "ontologyId");
    if (!ontologyId) {
      return reply.code(400).send({ error: "invalid_ontology_id" });
    }

    // Repeat likes from the same caller are absorbed by the store.
    const result = deps.store.likeOntology(ontologyId, callerKey(caller));
    if (!result) {
      return reply.code(404).send({ error: "ontology_not_found" });
    }

    const response: LikeOntologyResponse = { ontologyId, ...result };
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

  app.get("/health", async () => ({ ok: true, service: "like-ontology" }));
  registerLikeOntology(app, { store, auth });

  app.addHook("onClose", async () => {
    if (owned) {
      store.close();
    }
  });

  return app;
}
