import type { RejectionReason } from "../auth/identity.js";
import type { NewOntology, Ontology, OntologyUpdate } from "./ontology.js";

export interface ErrorResponse {
  error: string;
  message?: string;
}

export interface UnauthorizedResponse extends ErrorResponse {
  error: "unauthorized";
  reason: RejectionReason;
}

export interface SearchOntologiesResponse {
  results: Ontology[];
  count: number;
  total: number;
  offset: number;
  limit: number;
}

export type AddOntologiesRequest = NewOntology[];

export interface AddOntologiesResponse {
  created: Array<Pick<Ontology, "uuid" | "name">>;
  skipped: number;
  message: string;
}

export type DeleteOntologiesRequest = string[];

export interface DeleteOntologiesResponse {
  deletedCount: number;
  message: string;
}

export type UpdateOntologyRequest = OntologyUpdate;

export interface UpdateOntologyResponse {
  ontology: Ontology;
}

export interface LikeOntologyResponse {
  ontologyId: string;
  liked: boolean;
  likeCount: number;
}

export interface ListTagsResponse {
  tags: string[];
}

export interface AddTagsRequest {
  tags: string[];
}

export interface OntologyPermissionsResponse {
  ontologyId: string;
  canEdit: boolean;
  canDelete: boolean;
}
