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
  parseOntologyUpdate,
  readPathParam,
  type AuthContext,
  type UpdateOntologyResponse,
} from "@ontology-marketplace/shared";

export const UPDATE_ONTOLOGY_PATH = "/update_ontology/:ontologyId";

export interface UpdateOntologyDeps {
  store: OntologyStore;
  auth: AuthContext;
}

export function registerUpdateOntology(app: FastifyInstance, deps: UpdateOntologyDeps): void {
  const guard = createEndpointGuard(deps.auth, { allowMethods: ["PUT"] });

  app.options(UPDATE_ONTOLOGY_PATH, async (req, reply) => guard.preflight(req, reply));

  app.put(UPDATE_ONTOLOGY_PATH, async (req, reply) => {
    const caller = await guard.admit(req, reply);
    if (!caller) return reply;

    const ontologyId = readPathParam(req.params, "ontologyId");
    if (!ontologyId) {
      return reply.code(400).send({ error: "invalid_ontology_id" });
    }

    const existing = deps.store.getOntology(ontologyId);
    if (!existing) {
      return reply.code(404).send({ error: "ontology_not_found" });
    }

    if (existing.ownerEmail !== callerKey(caller)) {
      return reply.code(403).send({
        error: "forbidden",
        message: "Only the owner can update this ontology",
      });
    }

    const update = parseOntologyUpdate(req.body);
    if (!update) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected an object of ontology fields with valid types",
      });
    }

    if (update.sourceUrl !== undefined && update.sourceUrl !== existing.sourceUrl) {
      const clash = deps.store.findOntologyBySourceUrl(update.sourceUrl);
      if (clash) {
        return reply.code(409).send({
          error: "source_url_conflict",
          message: "Another ontology already uses this sourceUrl",
        });
      }
    }

    const ontology = deps.store.updateOntology(ontologyId, update);
    if (!ontology) {
      return reply.code(404).send({ error: "ontology_not_found" });
    }

    req.log.info({ ontologyId, fields: Object.keys(update) }, "ontology updated");
    const response: UpdateOntologyResponse = { ontology };
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

  app.get("/health", async () => ({ ok: true, service: "update-ontology" }));
  registerUpdateOntology(app, { store, auth });

  app.addHook("onClose", async () => {
    if (owned) {
      store.close();
    }
  });

  return app;
}
