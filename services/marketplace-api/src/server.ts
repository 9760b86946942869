import Fastify from "fastify";
import { registerAddOntologies } from "@ontology-marketplace/add-ontologies";
import {
  resolveOntologyStore,
  type OntologyStoreOptions,
} from "@ontology-marketplace/catalog-store";
import { registerDeleteOntologies } from "@ontology-marketplace/delete-ontologies";
import { registerLikeOntology } from "@ontology-marketplace/like-ontology";
import { registerPermissions } from "@ontology-marketplace/permissions";
import { registerSearchOntologies } from "@ontology-marketplace/search-ontologies";
import { loadAuthContext, type AuthContext } from "@ontology-marketplace/shared";
import { registerTags } from "@ontology-marketplace/tags";
import { registerUpdateOntology } from "@ontology-marketplace/update-ontology";
import { buildOpenApiSpec } from "./openapi.js";

interface BuildServerOptions extends OntologyStoreOptions {
  auth?: AuthContext;
  serviceBaseUrl?: string;
}

/**
 * All endpoint modules in one process. Each module still builds its own
 * guard from the shared context; there is no app-wide auth hook.
 */
export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: true });
  const auth = options.auth || loadAuthContext();
  const { store, owned } = resolveOntologyStore(options);
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4200}`;

  app.get("/health", async () => ({ ok: true, service: "marketplace-api" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  const deps = { store, auth };
  registerSearchOntologies(app, deps);
  registerAddOntologies(app, deps);
  registerDeleteOntologies(app, deps);
  registerUpdateOntology(app, deps);
  registerLikeOntology(app, deps);
  registerTags(app, deps);
  registerPermissions(app, deps);

  app.addHook("onClose", async () => {
    if (owned) {
      store.close();
    }
  });

  return app;
}
