import Fastify, { type FastifyInstance } from "fastify";
import {
  resolveOntologyStore,
  type OntologyStore,
  type OntologyStoreOptions,
} from "@ontology-marketplace/catalog-store";
import {
  callerKey,
  createEndpointGuard,
  isObject,
  loadAuthContext,
  type AuthContext,
  type SearchOntologiesResponse,
} from "@ontology-marketplace/shared";

export const SEARCH_ONTOLOGIES_PATH = "/search_ontologies";
export const DEFAULT_SEARCH_LIMIT = 100;
export const MAX_SEARCH_LIMIT = 100;

const INTEGER_PATTERN = /^-?\d+$/;

export interface SearchQuery {
  searchTerm: string | null;
  limit: number;
  offset: number;
}

export interface SearchOntologiesDeps {
  store: OntologyStore;
  auth: AuthContext;
}

function parseInteger(value: unknown, fallback: number): number | null {
  if (value === undefined || value === "") return fallback;
  if (typeof value !== "string" || !INTEGER_PATTERN.test(value.trim())) return null;
  return Number(value.trim());
}

export function parseSearchQuery(query: unknown): SearchQuery | null {
  if (query === undefined) {
    return { searchTerm: null, limit: DEFAULT_SEARCH_LIMIT, offset: 0 };
  }
  if (!isObject(query)) return null;

  const term = query.search_term;
  if (term !== undefined && typeof term !== "string") return null;

  const limit = parseInteger(query.limit, DEFAULT_SEARCH_LIMIT);
  const offset = parseInteger(query.offset, 0);
  if (limit === null || offset === null) return null;

  return {
    searchTerm: term ? term : null,
    limit: Math.min(Math.max(limit, 1), MAX_SEARCH_LIMIT),
    offset: Math.max(offset, 0),
  };
}

export function registerSearchOntologies(app: FastifyInstance, deps: SearchOntologiesDeps): void {
  const guard = createEndpointGuard(deps.auth, { allowMethods: ["GET"] });

  app.options(SEARCH_ONTOLOGIES_PATH, async (req, reply) => guard.preflight(req, reply));

  app.get(SEARCH_ONTOLOGIES_PATH, async (req, reply) => {
    const caller = await guard.admit(req, reply);
    if (!caller) return reply;

    const parsed = parseSearchQuery(req.query);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_query",
        message: "limit and offset must be integers; search_term must be a single string",
      });
    }

    const { results, total } = deps.store.searchOntologies({
      ...parsed,
      viewer: callerKey(caller),
    });

    const response: SearchOntologiesResponse = {
      results,
      count: results.length,
      total,
      offset: parsed.offset,
      limit: parsed.limit,
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

  app.get("/health", async () => ({ ok: true, service: "search-ontologies" }));
  registerSearchOntologies(app, { store, auth });

  app.addHook("onClose", async () => {
    if (owned) {
      store.close();
    }
  });

  return app;
}
