/**
 * PostgreSQL document store on Drizzle ORM.
 *
 * @example
 * ```typescript
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { createPostgresDocumentStore } from "entity-integrity/postgres";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const store = createPostgresDocumentStore(drizzle(pool));
 * ```
 */
import { and, eq, type SQL, sql } from "drizzle-orm";
import { type PgDatabase, type PgQueryResultHKT } from "drizzle-orm/pg-core";

import { type EntityDocument, type EntityState } from "../../core/types";
import { type CountFilter, type DocumentStore } from "../../store/types";
import { nowIso } from "../../utils/date";
import { generateId } from "../../utils/id";
import { collectionScope, postgresJsonKey } from "./queries";
import {
  type PostgresDocumentsTable,
  type PostgresTables,
  tables as defaultTables,
} from "./schema/postgres";

export type AnyPgDatabase = PgDatabase<PgQueryResultHKT, Record<string, unknown>>;

export type PostgresDocumentStoreOptions = Readonly<{
  tables?: PostgresTables;
}>;

/**
 * `body ->> 'f' = $1` for single-valued fields,
 * `body -> 'f' @> $1::jsonb` (a one-element array) for arrays.
 */
export function buildPostgresCountCondition(
  documents: PostgresDocumentsTable,
  filter: CountFilter,
): SQL {
  const key = postgresJsonKey(filter.field);
  if (filter.op === "eq") {
    return sql`${documents.body} ->> ${key} = ${filter.value}`;
  }
  return sql`${documents.body} -> ${key} @> ${JSON.stringify([filter.value])}::jsonb`;
}

export function buildPostgresCountQuery(
  db: AnyPgDatabase,
  documents: PostgresDocumentsTable,
  collection: string,
  filter: CountFilter,
) {
  return db
    .select({ count: sql<string>`count(*)` })
    .from(documents)
    .where(
      and(
        collectionScope(documents.collection, collection),
        buildPostgresCountCondition(documents, filter),
      ),
    );
}

/**
 * Rejects with the signal's reason as soon as it aborts. node-postgres has
 * no per-query cancellation, so the statement itself runs to completion.
 */
async function raceAbort<T>(
  query: Promise<T>,
  signal: AbortSignal | undefined,
): Promise<T> {
  if (signal === undefined) return query;
  signal.throwIfAborted();

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => {
      reject(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([query, aborted]);
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort);
  }
}

function splitId(document: EntityState): [string | undefined, Record<string, unknown>] {
  const { id, ...body } = document;
  return [id, body];
}

/**
 * Creates a document store over a node-postgres Drizzle database. The table
 * must already exist; `close()` does not end the pool.
 */
export function createPostgresDocumentStore(
  db: AnyPgDatabase,
  options: PostgresDocumentStoreOptions = {},
): DocumentStore {
  const { documents } = options.tables ?? defaultTables;

  const byKey = (collection: string, id: string) =>
    and(eq(documents.collection, collection), eq(documents.id, id));

  return {
    async countDocuments(collection, filter, countOptions) {
      const query = buildPostgresCountQuery(db, documents, collection, filter);
      const rows = await raceAbort(query.execute(), countOptions?.signal);
      // count(*) is bigint, which node-postgres returns as a string
      return Number(rows[0]?.count ?? 0);
    },

    async getDocument(collection, id) {
      const rows = await db
        .select({ id: documents.id, body: documents.body })
        .from(documents)
        .where(byKey(collection, id))
        .limit(1);
      const row = rows[0];
      if (row === undefined) return undefined;
      return { ...row.body, id: row.id };
    },

    async insertDocument(collection, document): Promise<EntityDocument> {
      const [givenId, body] = splitId(document);
      const id = givenId ?? generateId();
      const now = nowIso();
      await db
        .insert(documents)
        .values({ collection, id, body, createdAt: now, updatedAt: now });
      return { ...body, id };
    },

    async replaceDocument(collection, id, document) {
      const [nextId = id, body] = splitId(document);
      const rows = await db
        .update(documents)
        .set({ id: nextId, body, updatedAt: nowIso() })
        .where(byKey(collection, id))
        .returning({ id: documents.id });
      return rows.length > 0;
    },

    async removeDocument(collection, id) {
      const rows = await db
        .delete(documents)
        .where(byKey(collection, id))
        .returning({ id: documents.id });
      return rows.length > 0;
    },

    async close() {
      // The pool is owned by the caller.
    },
  };
}

export type { PostgresTableNames, PostgresTables } from "./schema/postgres";
export { createPostgresTables, tables } from "./schema/postgres";
