/**
 * SQLite document store on Drizzle ORM.
 *
 * @example
 * ```typescript
 * import { drizzle } from "drizzle-orm/better-sqlite3";
 * import Database from "better-sqlite3";
 * import { createSqliteDocumentStore, getSqliteMigrationSQL } from "entity-integrity/sqlite";
 *
 * const sqlite = new Database("app.db");
 * sqlite.exec(getSqliteMigrationSQL());
 * const store = createSqliteDocumentStore(drizzle(sqlite));
 * ```
 */
import { and, eq, type SQL, sql } from "drizzle-orm";
import { type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

import { type EntityDocument, type EntityState } from "../../core/types";
import { type CountFilter, type DocumentStore } from "../../store/types";
import { nowIso } from "../../utils/date";
import { generateId } from "../../utils/id";
import { collectionScope, sqliteJsonPath } from "./queries";
import {
  type SqliteDocumentsTable,
  type SqliteTables,
  tables as defaultTables,
} from "./schema/sqlite";

export type SqliteDocumentStoreOptions = Readonly<{
  /**
   * Custom table definitions.
   * Defaults to a single `documents` table.
   */
  tables?: SqliteTables;
}>;

/**
 * `json_extract(body, '$.f') = ?` for single-valued fields,
 * `EXISTS (SELECT 1 FROM json_each(body, '$.f') WHERE value = ?)` for arrays.
 * Membership only matches array fields; json_each would otherwise walk a
 * scalar as a one-element list.
 */
export function buildSqliteCountCondition(
  documents: SqliteDocumentsTable,
  filter: CountFilter,
): SQL {
  const path = sqliteJsonPath(filter.field);
  if (filter.op === "eq") {
    return sql`json_extract(${documents.body}, ${path}) = ${filter.value}`;
  }
  return sql`(json_type(${documents.body}, ${path}) = 'array' AND EXISTS (SELECT 1 FROM json_each(${documents.body}, ${path}) WHERE value = ${filter.value}))`;
}

export function buildSqliteCountQuery(
  db: BetterSQLite3Database,
  documents: SqliteDocumentsTable,
  collection: string,
  filter: CountFilter,
) {
  return db
    .select({ count: sql<number>`count(*)` })
    .from(documents)
    .where(
      and(
        collectionScope(documents.collection, collection),
        buildSqliteCountCondition(documents, filter),
      ),
    );
}

function splitId(document: EntityState): [string | undefined, Record<string, unknown>] {
  const { id, ...body } = document;
  return [id, body];
}

/**
 * Creates a document store over a better-sqlite3 Drizzle database. The
 * table must already exist; `close()` does not close the database.
 */
export function createSqliteDocumentStore(
  db: BetterSQLite3Database,
  options: SqliteDocumentStoreOptions = {},
): DocumentStore {
  const { documents } = options.tables ?? defaultTables;

  const byKey = (collection: string, id: string) =>
    and(eq(documents.collection, collection), eq(documents.id, id));

  return {
    async countDocuments(collection, filter, countOptions) {
      countOptions?.signal?.throwIfAborted();
      const row = buildSqliteCountQuery(db, documents, collection, filter).get();
      return Number(row?.count ?? 0);
    },

    async getDocument(collection, id) {
      const row = db
        .select({ id: documents.id, body: documents.body })
        .from(documents)
        .where(byKey(collection, id))
        .get();
      if (row === undefined) return undefined;
      return { ...row.body, id: row.id };
    },

    async insertDocument(collection, document): Promise<EntityDocument> {
      const [givenId, body] = splitId(document);
      const id = givenId ?? generateId();
      const now = nowIso();
      db.insert(documents)
        .values({ collection, id, body, createdAt: now, updatedAt: now })
        .run();
      return { ...body, id };
    },

    async replaceDocument(collection, id, document) {
      const [nextId = id, body] = splitId(document);
      const result = db
        .update(documents)
        .set({ id: nextId, body, updatedAt: nowIso() })
        .where(byKey(collection, id))
        .run();
      return result.changes > 0;
    },

    async removeDocument(collection, id) {
      const result = db.delete(documents).where(byKey(collection, id)).run();
      return result.changes > 0;
    },

    async close() {
      // The database is owned by the caller.
    },
  };
}

export type { SqliteTableNames, SqliteTables } from "./schema/sqlite";
export { createSqliteTables, tables } from "./schema/sqlite";
