/**
 * Drizzle SQLite schema for the document store.
 *
 * Every collection shares one table, keyed by (collection, id). Document
 * fields live in `body` as JSON text and are queried with json_extract and
 * json_each.
 *
 * @example
 * ```typescript
 * import { createSqliteTables } from "entity-integrity/sqlite";
 * const tables = createSqliteTables({ documents: "workflow_documents" });
 * ```
 */
import { index, primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Table name configuration.
 */
export type SqliteTableNames = Readonly<{
  documents: string;
}>;

const DEFAULT_TABLE_NAMES: SqliteTableNames = {
  documents: "documents",
};

/**
 * Creates SQLite table definitions with customizable table names.
 * Index names are derived from table names.
 */
export function createSqliteTables(names: Partial<SqliteTableNames> = {}) {
  const n: SqliteTableNames = { ...DEFAULT_TABLE_NAMES, ...names };

  const documents = sqliteTable(
    n.documents,
    {
      collection: text("collection").notNull(),
      id: text("id").notNull(),
      body: text("body", { mode: "json" })
        .$type<Record<string, unknown>>()
        .notNull(),
      createdAt: text("created_at").notNull(),
      updatedAt: text("updated_at").notNull(),
    },
    (t) => [
      primaryKey({ columns: [t.collection, t.id] }),
      index(`${n.documents}_collection_idx`).on(t.collection),
    ],
  );

  return { documents } as const;
}

/**
 * Default tables with standard names.
 */
export const tables = createSqliteTables();

export type SqliteTables = ReturnType<typeof createSqliteTables>;

export type SqliteDocumentsTable = SqliteTables["documents"];
