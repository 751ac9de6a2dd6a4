/**
 * PostgreSQL document store.
 *
 * Use `getPostgresMigrationSQL()` for the table DDL and
 * `generateReferenceIndexSQL(graph, "postgres")` for the reference indexes.
 *
 * @example
 * ```typescript
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { createPostgresDocumentStore, getPostgresMigrationSQL } from "entity-integrity/postgres";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * await pool.query(getPostgresMigrationSQL());
 * const store = createPostgresDocumentStore(drizzle(pool));
 * ```
 */

export {
  type AnyPgDatabase,
  buildPostgresCountCondition,
  buildPostgresCountQuery,
  createPostgresDocumentStore,
  createPostgresTables,
  type PostgresDocumentStoreOptions,
  type PostgresTableNames,
  type PostgresTables,
  tables,
} from "../drizzle/postgres";

export {
  generatePostgresDDL,
  generateReferenceIndexSQL,
  getPostgresMigrationSQL,
} from "../drizzle/ddl";
