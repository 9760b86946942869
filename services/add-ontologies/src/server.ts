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
  parseNewOntology,
  type AddOntologiesResponse,
  type AuthContext,
  type NewOntology,
} from "@ontology-marketplace/shared";

export const ADD_ONTOLOGIES_PATH = "/add_ontologies";

export interface AddOntologiesDeps {
  store: OntologyStore;
  auth: AuthContext;
}

export function parseAddOntologiesRequest(body: unknown): NewOntology[] | null {
  if (!Array.isArray(body)) return null;
  const entries: NewOntology[] = [];
  for (const item of body) {
    const parsed = parseNewOntology(item);
    if (!parsed) return null;
    entries.push(parsed);
  }
  return entries;
}

export function registerAddOntologies(app: FastifyInstance, deps: AddOntologiesDeps): void {
  const guard = createEndpointGuard(deps.auth, { allowMethods: ["POST"] });

  app.options(ADD_ONTOLOGIES_PATH, async (req, reply) => guard.preflight(req, reply));

  app.post(ADD_ONTOLOGIES_PATH, async (req, reply) => {
    const caller = await guard.admit(req, reply);
    if (!caller) return reply;

    const entries = parseAddOntologiesRequest(req.body);
    if (!entries) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected a JSON array of ontologies with name and sourceUrl",
      });
    }

    const { created, skipped } = deps.store.addOntologies(entries, callerKey(caller));
    req.log.info({ created: created.length, skipped }, "ontologies added");

    const response: AddOntologiesResponse = {
      created: created.map(({ uuid, name }) => ({ uuid, name })),
      skipped,
      message: `Successfully added ${created.length} ontologies. Skipped ${skipped} ontologies that already existed.`,
    };
    return reply.code(201).send(response);
  });
}

interface BuildServerOptions extends OntologyStoreOptions {
  auth?: AuthContext;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: true });
  const auth = options.auth || loadAuthContext();
  const { store, owned } = resolveOntologyStore(options);

  app.get("/health", async () => ({ ok: true, service: "add-ontologies" }));
  registerAddOntologies(app, { store, auth });

  app.addHook("onClose", async () => {
    if (owned) {
      store.close();
    }
  });

  return app;
}
