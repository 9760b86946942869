import { createHttpFunction } from "@ontology-marketplace/shared";
import { buildServer } from "./server.js";

export const searchOntologies = createHttpFunction(() => buildServer());
