import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import {
  normalizeTags,
  type NewOntology,
  type Ontology,
  type OntologyUpdate,
} from "@ontology-marketplace/shared";

export const DEFAULT_CATALOG_DB_PATH = "data/catalog.db";

export interface SearchOntologiesQuery {
  /** Case-sensitive substring of name or description; null matches all. */
  searchTerm: string | null;
  /** Caller whose private ontologies are visible alongside public ones. */
  viewer: string;
  limit: number;
  offset: number;
}

export interface SearchOntologiesResult {
  results: Ontology[];
  total: number;
}

export interface AddOntologiesResult {
  created: Ontology[];
  skipped: number;
}

export interface LikeResult {
  liked: boolean;
  likeCount: number;
}

export interface OntologyStore {
  addOntologies(entries: NewOntology[], ownerEmail: string): AddOntologiesResult;
  getOntology(uuid: string): Ontology | null;
  findOntologyBySourceUrl(sourceUrl: string): Ontology | null;
  searchOntologies(query: SearchOntologiesQuery): SearchOntologiesResult;
  updateOntology(uuid: string, update: OntologyUpdate): Ontology | null;
  deleteOwnedOntologies(uuids: string[], ownerEmail: string): number;
  likeOntology(uuid: string, email: string): LikeResult | null;
  listTags(): string[];
  addTags(tags: string[]): string[];
  close(): void;
}

interface OntologyRow {
  ontology_json: string;
  like_count: number;
}

interface FilterParams {
  viewer: string;
  term: string | null;
}

interface SearchParams extends FilterParams {
  limit: number;
  offset: number;
}

interface CountRow {
  total: number;
}

interface TagRow {
  name: string;
}

function toOntology(row: OntologyRow): Ontology {
  return { ...(JSON.parse(row.ontology_json) as Ontology), likeCount: row.like_count };
}

function buildOntology(entry: NewOntology, ownerEmail: string, now: string): Ontology {
  return {
    uuid: randomUUID(),
    name: entry.name,
    sourceUrl: entry.sourceUrl,
    ...(entry.imageUrl !== undefined ? { imageUrl: entry.imageUrl } : {}),
    ...(entry.description !== undefined ? { description: entry.description } : {}),
    ...(entry.nodeCount !== undefined ? { nodeCount: entry.nodeCount } : {}),
    ...(entry.relationshipCount !== undefined ? { relationshipCount: entry.relationshipCount } : {}),
    ...(entry.score !== undefined ? { score: entry.score } : {}),
    isPublic: entry.isPublic,
    ownerEmail,
    tags: [],
    likeCount: 0,
    createdAt: now,
    updatedAt: now,
  };
}

function applyUpdate(existing: Ontology, update: OntologyUpdate, now: string): Ontology {
  const next: Ontology = { ...existing, updatedAt: now };
  if (update.name !== undefined) next.name = update.name;
  if (update.sourceUrl !== undefined) next.sourceUrl = update.sourceUrl;
  if (update.imageUrl !== undefined) next.imageUrl = update.imageUrl;
  if (update.description !== undefined) next.description = update.description;
  if (update.nodeCount !== undefined) next.nodeCount = update.nodeCount;
  if (update.relationshipCount !== undefined) next.relationshipCount = update.relationshipCount;
  if (update.score !== undefined) next.score = update.score;
  if (update.isPublic !== undefined) next.isPublic = update.isPublic;
  if (update.tags !== undefined) next.tags = normalizeTags(update.tags);
  return next;
}

const ONTOLOGY_COLUMNS = `
  o.ontology_json,
  (SELECT COUNT(*) FROM ontology_likes l WHERE l.ontology_uuid = o.uuid) AS like_count
`;

const SEARCH_FILTER = `
  (o.is_public = 1 OR o.owner_email = @viewer)
  AND (
    @term IS NULL
    OR instr(o.name, @term) > 0
    OR instr(COALESCE(o.description, ''), @term) > 0
  )
`;

export class SqliteOntologyStore implements OntologyStore {
  private readonly db: Database.Database;
  private readonly insertOntologyStmt: Database.Statement<
    [string, string, string, string, string | null, number, string, string]
  >;
  private readonly getOntologyStmt: Database.Statement<[string], OntologyRow>;
  private readonly getBySourceUrlStmt: Database.Statement<[string], OntologyRow>;
  private readonly searchStmt: Database.Statement<[SearchParams], OntologyRow>;
  private readonly countStmt: Database.Statement<[FilterParams], CountRow>;
  private readonly updateOntologyStmt: Database.Statement<
    [string, string, string | null, number, string, string]
  >;
  private readonly deleteOwnedStmt: Database.Statement<[string, string]>;
  private readonly deleteLikesStmt: Database.Statement<[string]>;
  private readonly putLikeStmt: Database.Statement<[string, string, string]>;
  private readonly countLikesStmt: Database.Statement<[string], CountRow>;
  private readonly putTagStmt: Database.Statement<[string]>;
  private readonly listTagsStmt: Database.Statement<[], TagRow>;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ontologies (
        uuid TEXT PRIMARY KEY,
        source_url TEXT NOT NULL UNIQUE,
        owner_email TEXT NOT NULL,
        name TEXT NOT NULL,
        description TEXT,
        is_public INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        ontology_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_ontologies_created
      ON ontologies(created_at DESC);

      CREATE INDEX IF NOT EXISTS idx_ontologies_owner
      ON ontologies(owner_email);

      CREATE TABLE IF NOT EXISTS ontology_likes (
        ontology_uuid TEXT NOT NULL,
        email TEXT NOT NULL,
        liked_at TEXT NOT NULL,
        PRIMARY KEY(ontology_uuid, email)
      );

      CREATE TABLE IF NOT EXISTS tags (
        name TEXT PRIMARY KEY
      );
    `);

    this.insertOntologyStmt = this.db.prepare(`
      INSERT INTO ontologies (uuid, source_url, owner_email, name, description, is_public, created_at, ontology_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(source_url) DO NOTHING
    `);

    this.getOntologyStmt = this.db.prepare(`
      SELECT ${ONTOLOGY_COLUMNS}
      FROM ontologies o
      WHERE o.uuid = ?
      LIMIT 1
    `) as Database.Statement<[string], OntologyRow>;

    this.getBySourceUrlStmt = this.db.prepare(`
      SELECT ${ONTOLOGY_COLUMNS}
      FROM ontologies o
      WHERE o.source_url = ?
      LIMIT 1
    `) as Database.Statement<[string], OntologyRow>;

    this.searchStmt = this.db.prepare(`
      SELECT ${ONTOLOGY_COLUMNS}
      FROM ontologies o
      WHERE ${SEARCH_FILTER}
      ORDER BY o.created_at DESC, o.rowid DESC
      LIMIT @limit OFFSET @offset
    `) as Database.Statement<[SearchParams], OntologyRow>;

    this.countStmt = this.db.prepare(`
      SELECT COUNT(*) AS total
      FROM ontologies o
      WHERE ${SEARCH_FILTER}
    `) as Database.Statement<[FilterParams], CountRow>;

    this.updateOntologyStmt = this.db.prepare(`
      UPDATE ontologies
      SET source_url = ?, name = ?, description = ?, is_public = ?, ontology_json = ?
      WHERE uuid = ?
    `);

    this.deleteOwnedStmt = this.db.prepare(`
      DELETE FROM ontologies
      WHERE uuid = ? AND owner_email = ?
    `);

    this.deleteLikesStmt = this.db.prepare(`
      DELETE FROM ontology_likes
      WHERE ontology_uuid = ?
    `);

    this.putLikeStmt = this.db.prepare(`
      INSERT INTO ontology_likes (ontology_uuid, email, liked_at)
      VALUES (?, ?, ?)
      ON CONFLICT(ontology_uuid, email) DO NOTHING
    `);

    this.countLikesStmt = this.db.prepare(`
      SELECT COUNT(*) AS total
      FROM ontology_likes
      WHERE ontology_uuid = ?
    `) as Database.Statement<[string], CountRow>;

    this.putTagStmt = this.db.prepare(`
      INSERT INTO tags (name)
      VALUES (?)
      ON CONFLICT(name) DO NOTHING
    `);

    this.listTagsStmt = this.db.prepare(`
      SELECT name
      FROM tags
      ORDER BY name ASC
    `) as Database.Statement<[], TagRow>;
  }

  addOntologies(entries: NewOntology[], ownerEmail: string): AddOntologiesResult {
    const insertAll = this.db.transaction((batch: NewOntology[]) => {
      const created: Ontology[] = [];
      let skipped = 0;
      for (const entry of batch) {
        const ontology = buildOntology(entry, ownerEmail, new Date().toISOString());
        const info = this.insertOntologyStmt.run(
          ontology.uuid,
          ontology.sourceUrl,
          ontology.ownerEmail,
          ontology.name,
          ontology.description ?? null,
          ontology.isPublic ? 1 : 0,
          ontology.createdAt,
          JSON.stringify(ontology),
        );
        if (info.changes === 0) {
          skipped += 1;
        } else {
          created.push(ontology);
        }
      }
      return { created, skipped };
    });
    return insertAll(entries);
  }

  getOntology(uuid: string): Ontology | null {
    const row = this.getOntologyStmt.get(uuid);
    return row ? toOntology(row) : null;
  }

  findOntologyBySourceUrl(sourceUrl: string): Ontology | null {
    const row = this.getBySourceUrlStmt.get(sourceUrl);
    return row ? toOntology(row) : null;
  }

  searchOntologies(query: SearchOntologiesQuery): SearchOntologiesResult {
    const filter: FilterParams = { viewer: query.viewer, term: query.searchTerm };
    const results = this.searchStmt
      .all({ ...filter, limit: query.limit, offset: query.offset })
      .map(toOntology);
    const count = this.countStmt.get(filter);
    return { results, total: count ? count.total : 0 };
  }

  updateOntology(uuid: string, update: OntologyUpdate): Ontology | null {
    const write = this.db.transaction((): Ontology | null => {
      const existing = this.getOntology(uuid);
      if (!existing) return null;

      const next = applyUpdate(existing, update, new Date().toISOString());
      this.updateOntologyStmt.run(
        next.sourceUrl,
        next.name,
        next.description ?? null,
        next.isPublic ? 1 : 0,
        JSON.stringify(next),
        uuid,
      );
      for (const tag of next.tags) this.putTagStmt.run(tag);
      return next;
    });
    return write();
  }

  deleteOwnedOntologies(uuids: string[], ownerEmail: string): number {
    const deleteAll = this.db.transaction((ids: string[]) => {
      let deleted = 0;
      for (const uuid of new Set(ids)) {
        const info = this.deleteOwnedStmt.run(uuid, ownerEmail);
        if (info.changes > 0) {
          this.deleteLikesStmt.run(uuid);
          deleted += info.changes;
        }
      }
      return deleted;
    });
    return deleteAll(uuids);
  }

  likeOntology(uuid: string, email: string): LikeResult | null {
    const like = this.db.transaction((): LikeResult | null => {
      if (!this.getOntologyStmt.get(uuid)) return null;
      this.putLikeStmt.run(uuid, email, new Date().toISOString());
      const count = this.countLikesStmt.get(uuid);
      return { liked: true, likeCount: count ? count.total : 0 };
    });
    return like();
  }

  listTags(): string[] {
    return this.listTagsStmt.all().map((row) => row.name);
  }

  addTags(tags: string[]): string[] {
    const insertAll = this.db.transaction((names: string[]) => {
      for (const name of names) this.putTagStmt.run(name);
    });
    insertAll(normalizeTags(tags));
    return this.listTags();
  }

  close(): void {
    this.db.close();
  }
}

export interface OntologyStoreOptions {
  store?: OntologyStore;
  dbPath?: string;
}

/**
 * Uses the injected store when given, otherwise opens the SQLite catalog.
 * `owned` tells the caller whether closing the store is its job.
 */
export function resolveOntologyStore(options: OntologyStoreOptions): {
  store: OntologyStore;
  owned: boolean;
} {
  if (options.store) return { store: options.store, owned: false };
  const dbPath = options.dbPath || process.env.CATALOG_DB_PATH || DEFAULT_CATALOG_DB_PATH;
  return { store: new SqliteOntologyStore(dbPath), owned: true };
}
