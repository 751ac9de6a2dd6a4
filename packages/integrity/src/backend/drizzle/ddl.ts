/**
 * DDL generation for the document stores.
 *
 * Table DDL is derived from the Drizzle table definitions so migrations
 * match the schema the stores query. Reference indexes are derived from the
 * reference graph: one partial expression index per (collection, field).
 */
import { getTableConfig as getPgTableConfig, type PgTable } from "drizzle-orm/pg-core";
import {
  getTableConfig as getSqliteTableConfig,
  type SQLiteTable,
} from "drizzle-orm/sqlite-core";

import { type ReferenceGraph } from "../../registry/reference-graph";
import { assertQueryIdentifier, quoteIdentifier, stringLiteral } from "./queries";
import { type PostgresTables, tables as postgresTables } from "./schema/postgres";
import { type SqliteTables, tables as sqliteTables } from "./schema/sqlite";

type TableConfigLike = Readonly<{
  name: string;
  columns: readonly Readonly<{
    name: string;
    notNull: boolean;
    getSQLType: () => string;
  }>[];
  primaryKeys: readonly Readonly<{ columns: readonly Readonly<{ name: string }>[] }>[];
  indexes: readonly Readonly<{
    config: Readonly<{
      name?: string | undefined;
      unique: boolean;
      columns: readonly unknown[];
    }>;
  }>[];
}>;

// ============================================================
// Table DDL
// ============================================================

function renderIndexColumn(column: unknown): string {
  if (
    typeof column === "object" &&
    column !== null &&
    "name" in column &&
    typeof column.name === "string"
  ) {
    return quoteIdentifier(column.name);
  }
  throw new Error("Only plain column indexes are supported in document tables");
}

function generateCreateTableSQL(config: TableConfigLike): string {
  const columnDefs = config.columns.map((column) =>
    [
      quoteIdentifier(column.name),
      column.getSQLType().toUpperCase(),
      ...(column.notNull ? ["NOT NULL"] : []),
    ].join(" "),
  );

  const pk = config.primaryKeys[0];
  if (pk) {
    const pkColumns = pk.columns.map((c) => quoteIdentifier(c.name)).join(", ");
    columnDefs.push(`PRIMARY KEY (${pkColumns})`);
  }

  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(config.name)} (\n  ${columnDefs.join(",\n  ")}\n);`;
}

function generateCreateIndexSQL(config: TableConfigLike): string[] {
  return config.indexes.map(({ config: index }) => {
    const columns = index.columns.map((c) => renderIndexColumn(c)).join(", ");
    const unique = index.unique ? "UNIQUE " : "";
    const name = index.name ?? `${config.name}_idx`;
    return `CREATE ${unique}INDEX IF NOT EXISTS ${quoteIdentifier(name)} ON ${quoteIdentifier(config.name)} (${columns});`;
  });
}

function generateDDL(configs: readonly TableConfigLike[]): string[] {
  // Tables first, then indexes
  return [
    ...configs.map((config) => generateCreateTableSQL(config)),
    ...configs.flatMap((config) => generateCreateIndexSQL(config)),
  ];
}

/**
 * Generates all DDL statements for the given SQLite tables.
 */
export function generateSqliteDDL(tables: SqliteTables = sqliteTables): string[] {
  const all: SQLiteTable[] = Object.values(tables);
  return generateDDL(all.map((table) => getSqliteTableConfig(table)));
}

/**
 * Generates all DDL statements for the given PostgreSQL tables.
 */
export function generatePostgresDDL(
  tables: PostgresTables = postgresTables,
): string[] {
  const all: PgTable[] = Object.values(tables);
  return generateDDL(all.map((table) => getPgTableConfig(table)));
}

export function getSqliteMigrationSQL(tables: SqliteTables = sqliteTables): string {
  return generateSqliteDDL(tables).join("\n\n");
}

export function getPostgresMigrationSQL(
  tables: PostgresTables = postgresTables,
): string {
  return generatePostgresDDL(tables).join("\n\n");
}

// ============================================================
// Reference Indexes
// ============================================================

export type IndexDialect = "sqlite" | "postgres";

/**
 * Generates one partial expression index per reference edge, named
 * `idx_<collection>_<field>` and scoped to the edge's collection, so that
 * every reference count is an index lookup.
 *
 * PostgreSQL indexes array fields with GIN for `@>`. SQLite cannot index
 * json_each membership, so many-valued edges are skipped there. Edges that
 * share a collection and field produce a single index. When two different
 * pairs render to the same name, later ones get a numeric suffix.
 *
 * @example
 * ```typescript
 * generateReferenceIndexSQL(workflowGraph, "sqlite")[0];
 * // CREATE INDEX IF NOT EXISTS "idx_sources_protocolId" ON "documents"
 * //   (json_extract("body", '$.protocolId')) WHERE "collection" = 'sources';
 * ```
 */
export function generateReferenceIndexSQL(
  graph: ReferenceGraph,
  dialect: IndexDialect,
  tableName = "documents",
): string[] {
  const statements: string[] = [];
  const indexed = new Set<string>();
  const usedNames = new Set<string>();
  const table = quoteIdentifier(tableName);

  for (const edge of graph.edges) {
    if (dialect === "sqlite" && edge.cardinality === "many") continue;

    const { collection, foreignKeyField: field } = edge;
    assertQueryIdentifier("collection", collection);
    assertQueryIdentifier("field", field);

    // Identifiers cannot contain a dot, so the key is unambiguous
    const key = `${collection}.${field}`;
    if (indexed.has(key)) continue;
    indexed.add(key);

    const indexName = uniqueIndexName(`idx_${collection}_${field}`, usedNames);

    const scope = `WHERE "collection" = ${stringLiteral(collection)}`;
    const name = quoteIdentifier(indexName);

    if (dialect === "sqlite") {
      statements.push(
        `CREATE INDEX IF NOT EXISTS ${name} ON ${table} (json_extract("body", ${stringLiteral(`$.${field}`)})) ${scope};`,
      );
    } else if (edge.cardinality === "many") {
      statements.push(
        `CREATE INDEX IF NOT EXISTS ${name} ON ${table} USING GIN (("body" -> ${stringLiteral(field)})) ${scope};`,
      );
    } else {
      statements.push(
        `CREATE INDEX IF NOT EXISTS ${name} ON ${table} (("body" ->> ${stringLiteral(field)})) ${scope};`,
      );
    }
  }

  return statements;
}

function uniqueIndexName(base: string, usedNames: Set<string>): string {
  let name = base;
  for (let suffix = 2; usedNames.has(name); suffix++) {
    name = `${base}_${suffix}`;
  }
  usedNames.add(name);
  return name;
}
