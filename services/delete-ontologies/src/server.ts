import Fastify, { type FastifyInstance } from "fastify";
import {
  resolveOntologyStore,
  type OntologyStore,
  type OntologyStoreOptions,
} from "@ontology-marketplace/catalog-store";
import {
  callerKey,
  createEndpointGuard,
  isNonEmptyString,
  loadAuthContext,
  type AuthContext,
  type DeleteOntologiesResponse,
} from "@ontology-marketplace/shared";

export const DELETE_ONTOLOGIES_PATH = "/delete_ontologies";

export interface DeleteOntologiesDeps {
  store: OntologyStore;
  auth: AuthContext;
}

export function parseDeleteOntologiesRequest(body: unknown): string[] | null {
  if (!Array.isArray(body) || body.length === 0) return null;
  const ids: string[] = [];
  for (const item of body) {
    if (!isNonEmptyString(item)) return null;
    ids.push(item.trim());
  }
  return ids;
}

export function registerDeleteOntologies(app: FastifyInstance, deps: DeleteOntologiesDeps): void {
  const guard = createEndpointGuard(deps.auth, { allowMethods: ["DELETE"] });

  app.options(DELETE_ONTOLOGIES_PATH, async (req, reply) => guard.preflight(req, reply));

  app.delete(DELETE_ONTOLOGIES_PATH, async (req, reply) => {
    const caller = await guard.admit(req, reply);
    if (!caller) return reply;

    const ids = parseDeleteOntologiesRequest(req.body);
    if (!ids) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected a non-empty JSON array of ontology ids",
      });
    }

    // Only the caller's own ontologies are eligible; others count as not found.
    const deletedCount = deps.store.deleteOwnedOntologies(ids, callerKey(caller));
    if (deletedCount === 0) {
      return reply.code(404).send({
        error: "ontologies_not_found",
        message: "No ontologies found with the provided ids for this caller",
      });
    }

    req.log.info({ requested: ids.length, deletedCount }, "ontologies deleted");
    const response: DeleteOntologiesResponse = {
      deletedCount,
      message: `Successfully deleted ${deletedCount} ontologies`,
    };
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

  app.get("/health", async () => ({ ok: true, service: "delete-ontologies" }));
  registerDeleteOntologies(app, { store, auth });

  app.addHook("onClose", async () => {
    if (owned) {
      store.close();
    }
  });

  return app;
}
