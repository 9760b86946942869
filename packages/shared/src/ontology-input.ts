import type { NewOntology, OntologyUpdate } from "./types/ontology.js";
import {
  isFiniteNumber,
  isNonEmptyString,
  isNonNegativeInteger,
  isObject,
  isStringArray,
} from "./validation.js";

type OptionalFields = Pick<
  NewOntology,
  "imageUrl" | "description" | "nodeCount" | "relationshipCount" | "score"
>;

function parseOptionalFields(body: Record<string, unknown>): OptionalFields | null {
  const { imageUrl, description, nodeCount, relationshipCount, score } = body;
  if (imageUrl !== undefined && typeof imageUrl !== "string") return null;
  if (description !== undefined && typeof description !== "string") return null;
  if (nodeCount !== undefined && !isNonNegativeInteger(nodeCount)) return null;
  if (relationshipCount !== undefined && !isNonNegativeInteger(relationshipCount)) return null;
  if (score !== undefined && !isFiniteNumber(score)) return null;

  const fields: OptionalFields = {};
  if (imageUrl !== undefined) fields.imageUrl = imageUrl;
  if (description !== undefined) fields.description = description;
  if (nodeCount !== undefined) fields.nodeCount = nodeCount;
  if (relationshipCount !== undefined) fields.relationshipCount = relationshipCount;
  if (score !== undefined) fields.score = score;
  return fields;
}

export function parseNewOntology(body: unknown): NewOntology | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.name) || !isNonEmptyString(body.sourceUrl)) return null;
  if (body.isPublic !== undefined && typeof body.isPublic !== "boolean") return null;

  const optional = parseOptionalFields(body);
  if (!optional) return null;

  return {
    name: body.name.trim(),
    sourceUrl: body.sourceUrl.trim(),
    ...optional,
    isPublic: body.isPublic ?? false,
  };
}

/** Every field optional; an update naming no known field is still valid. */
export function parseOntologyUpdate(body: unknown): OntologyUpdate | null {
  if (!isObject(body)) return null;
  if (body.name !== undefined && !isNonEmptyString(body.name)) return null;
  if (body.sourceUrl !== undefined && !isNonEmptyString(body.sourceUrl)) return null;
  if (body.isPublic !== undefined && typeof body.isPublic !== "boolean") return null;
  if (body.tags !== undefined && !isStringArray(body.tags)) return null;

  const optional = parseOptionalFields(body);
  if (!optional) return null;

  const update: OntologyUpdate = { ...optional };
  if (body.name !== undefined) update.name = body.name.trim();
  if (body.sourceUrl !== undefined) update.sourceUrl = body.sourceUrl.trim();
  if (body.isPublic !== undefined) update.isPublic = body.isPublic;
  if (body.tags !== undefined) update.tags = body.tags;
  return update;
}
