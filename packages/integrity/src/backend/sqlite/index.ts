/**
 * SQLite document store.
 *
 * @example Quick start with in-memory database
 * ```typescript
 * import { createLocalSqliteDocumentStore } from "entity-integrity/sqlite";
 *
 * const { store } = createLocalSqliteDocumentStore({ graph: workflowGraph });
 * const validator = createReferenceValidator(workflowGraph, store);
 * ```
 *
 * @example File-based database for persistent local development
 * ```typescript
 * const { store, db } = createLocalSqliteDocumentStore({ path: "./dev.db" });
 * ```
 */
import Database from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";
import { getTableConfig } from "drizzle-orm/sqlite-core";

import { ConfigurationError } from "../../errors";
import { type ReferenceGraph } from "../../registry/reference-graph";
import { type DocumentStore } from "../../store/types";
import { generateReferenceIndexSQL, generateSqliteDDL } from "../drizzle/ddl";
import {
  createSqliteDocumentStore,
  type SqliteTables,
  tables as defaultTables,
} from "../drizzle/sqlite";

type NodeModuleVersionMismatch = Readonly<{
  compiled: number;
  required: number;
}>;

function getUnknownErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function parseNodeModuleVersionMismatchMessage(
  message: string,
): NodeModuleVersionMismatch | undefined {
  const regexp =
    /NODE_MODULE_VERSION (?<compiled>\d+)[\s\S]*?NODE_MODULE_VERSION (?<required>\d+)/;
  const match = regexp.exec(message);
  if (!match?.groups) return undefined;

  const compiled = Number(match.groups.compiled);
  const required = Number(match.groups.required);

  if (!Number.isFinite(compiled) || !Number.isFinite(required))
    return undefined;

  return { compiled, required };
}

function createDatabase(path: string): Database.Database {
  try {
    return new Database(path);
  } catch (error) {
    const mismatch = parseNodeModuleVersionMismatchMessage(
      getUnknownErrorMessage(error),
    );
    if (!mismatch) throw error;

    throw new ConfigurationError(
      [
        "Failed to load better-sqlite3 native addon.",
        `It was compiled for NODE_MODULE_VERSION ${mismatch.compiled}, but this Node.js runtime requires ${mismatch.required}.`,
        "Rebuild it with: npm rebuild better-sqlite3",
      ].join(" "),
      {
        nodeVersion: process.version,
        nodeModuleVersion: process.versions.modules,
        compiledNodeModuleVersion: mismatch.compiled,
        requiredNodeModuleVersion: mismatch.required,
      },
      { cause: error },
    );
  }
}

// ============================================================
// Types
// ============================================================

export type LocalSqliteDocumentStoreOptions = Readonly<{
  /**
   * Path to the SQLite database file.
   * Defaults to ":memory:" for an in-memory database.
   */
  path?: string;

  /**
   * When given, the reference indexes for this graph are created too.
   */
  graph?: ReferenceGraph;

  tables?: SqliteTables;
}>;

export type LocalSqliteDocumentStoreResult = Readonly<{
  store: DocumentStore;
  /** The underlying Drizzle database, for direct SQL access */
  db: BetterSQLite3Database;
}>;

// ============================================================
// Factory Function
// ============================================================

/**
 * Opens a SQLite database, creates the documents table (and reference
 * indexes when a graph is given) and returns a store that closes the
 * database on `close()`.
 *
 * @throws ConfigurationError if the better-sqlite3 native addon was built
 *   for a different Node.js version
 */
export function createLocalSqliteDocumentStore(
  options: LocalSqliteDocumentStoreOptions = {},
): LocalSqliteDocumentStoreResult {
  const path = options.path ?? ":memory:";
  const tables = options.tables ?? defaultTables;

  const sqlite = createDatabase(path);
  const db = drizzle(sqlite);

  const statements = [
    ...generateSqliteDDL(tables),
    ...(options.graph ?
      generateReferenceIndexSQL(
        options.graph,
        "sqlite",
        getTableName(tables),
      )
    : []),
  ];
  for (const statement of statements) {
    sqlite.exec(statement);
  }

  const store = createSqliteDocumentStore(db, { tables });
  let isClosed = false;

  function close(): Promise<void> {
    if (isClosed) return Promise.resolve();
    isClosed = true;
    sqlite.close();
    return Promise.resolve();
  }

  return { store: { ...store, close }, db };
}

function getTableName(tables: SqliteTables): string {
  return getTableConfig(tables.documents).name;
}

export {
  buildSqliteCountCondition,
  buildSqliteCountQuery,
  createSqliteDocumentStore,
  createSqliteTables,
  type SqliteDocumentStoreOptions,
  type SqliteTableNames,
  type SqliteTables,
  tables,
} from "../drizzle/sqlite";
export {
  generateReferenceIndexSQL,
  generateSqliteDDL,
  getSqliteMigrationSQL,
} from "../drizzle/ddl";
