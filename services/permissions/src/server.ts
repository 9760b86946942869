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
  type OntologyPermissionsResponse,
} from "@ontology-marketplace/shared";

export const PERMISSIONS_PATH = "/permissions/:ontologyId";

export interface PermissionsDeps {
  store: OntologyStore;
  auth: AuthContext;
}

export function registerPermissions(app: FastifyInstance, deps: PermissionsDeps): void {
  const guard = createEndpointGuard(deps.auth, { allowMethods: ["GET"] });

  app.options(PERMISSIONS_PATH, async (req, reply) => guard.preflight(req, reply));

  app.get(PERMISSIONS_PATH, async (req, reply) => {
    const caller = await guard.admit(req, reply);
    if (!caller) return reply;

    const ontologyId = readPathParam(req.params, "ontologyId");
    if (!ontologyId) {
      return reply.code(400).send({ error: "invalid_ontology_id" });
    }

    const ontology = deps.store.getOntology(ontologyId);
    if (!ontology) {
      return reply.code(404).send({ error: "ontology_not_found" });
    }

    const isOwner = ontology.ownerEmail === callerKey(caller);
    const response: OntologyPermissionsResponse = {
      ontologyId,
      canEdit: isOwner,
      canDelete: isOwner,
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

  app.get("/health", async () => ({ ok: true, service: "permissions" }));
  registerPermissions(app, { store, auth });

  app.addHook("onClose", async () => {
    if (owned) {
      store.close();
    }
  });

  return app;
}
