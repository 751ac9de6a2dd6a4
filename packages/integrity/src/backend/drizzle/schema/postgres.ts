/**
 * Drizzle PostgreSQL schema for the document store.
 *
 * Same layout as the SQLite schema, with PostgreSQL-native types: `body` is
 * JSONB and timestamps are TIMESTAMPTZ.
 */
import {
  index,
  jsonb,
  pgTable,
  primaryKey,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

/**
 * Table name configuration.
 */
export type PostgresTableNames = Readonly<{
  documents: string;
}>;

const DEFAULT_TABLE_NAMES: PostgresTableNames = {
  documents: "documents",
};

export function createPostgresTables(names: Partial<PostgresTableNames> = {}) {
  const n: PostgresTableNames = { ...DEFAULT_TABLE_NAMES, ...names };

  const documents = pgTable(
    n.documents,
    {
      collection: text("collection").notNull(),
      id: text("id").notNull(),
      body: jsonb("body").$type<Record<string, unknown>>().notNull(),
      createdAt: timestamp("created_at", {
        withTimezone: true,
        mode: "string",
      }).notNull(),
      updatedAt: timestamp("updated_at", {
        withTimezone: true,
        mode: "string",
      }).notNull(),
    },
    (t) => [
      primaryKey({ columns: [t.collection, t.id] }),
      index(`${n.documents}_collection_idx`).on(t.collection),
    ],
  );

  return { documents } as const;
}

export const tables = createPostgresTables();

export type PostgresTables = ReturnType<typeof createPostgresTables>;

export type PostgresDocumentsTable = PostgresTables["documents"];
