import { createHttpFunction } from "@ontology-marketplace/shared";
import { buildServer } from "./server.js";

export const marketplaceApi = createHttpFunction(() => buildServer());
