export interface NewOntology {
  name: string;
  sourceUrl: string;
  imageUrl?: string;
  description?: string;
  nodeCount?: number;
  relationshipCount?: number;
  score?: number;
  isPublic: boolean;
}

export interface OntologyUpdate {
  name?: string;
  sourceUrl?: string;
  imageUrl?: string;
  description?: string;
  nodeCount?: number;
  relationshipCount?: number;
  score?: number;
  isPublic?: boolean;
  tags?: string[];
}

export interface Ontology extends NewOntology {
  uuid: string;
  ownerEmail: string;
  tags: string[];
  likeCount: number;
  createdAt: string;   // ISO date
  updatedAt: string;   // ISO date
}

export function normalizeTag(tag: string): string | null {
  const normalized = tag.trim().toLowerCase();
  return normalized.length > 0 ? normalized : null;
}

export function normalizeTags(tags: string[]): string[] {
  const unique = new Set<string>();
  for (const tag of tags) {
    const normalized = normalizeTag(tag);
    if (normalized) unique.add(normalized);
  }
  return [...unique];
}
