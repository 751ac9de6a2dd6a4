/**
 * SQL building blocks shared by the SQLite and PostgreSQL document stores.
 *
 * Collection and field names are inlined as literals (not bound) so that
 * the partial expression indexes from `generateReferenceIndexSQL` match the
 * count queries. Both are checked against the identifier pattern first.
 */
import { type Column, type SQL, sql } from "drizzle-orm";

import { isPlainIdentifier } from "../../core/entity";
import { ConfigurationError } from "../../errors";

export function assertQueryIdentifier(
  kind: "collection" | "field",
  value: string,
): void {
  if (!isPlainIdentifier(value)) {
    throw new ConfigurationError(
      `Invalid ${kind} name "${value}" in document query`,
      { [kind]: value },
    );
  }
}

export function quoteIdentifier(value: string): string {
  return `"${value.replaceAll('"', '""')}"`;
}

/**
 * Single-quoted SQL string literal. Only used for validated identifiers.
 */
export function stringLiteral(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

/**
 * `<column> = '<collection>'`, inlined.
 */
export function collectionScope(column: Column, collection: string): SQL {
  assertQueryIdentifier("collection", collection);
  return sql`${column} = ${sql.raw(stringLiteral(collection))}`;
}

/**
 * SQLite JSON path for a top-level field, as a literal: `'$.protocolId'`.
 */
export function sqliteJsonPath(field: string): SQL {
  assertQueryIdentifier("field", field);
  return sql.raw(stringLiteral(`$.${field}`));
}

/**
 * PostgreSQL JSONB key, as a literal: `'protocolId'`.
 */
export function postgresJsonKey(field: string): SQL {
  assertQueryIdentifier("field", field);
  return sql.raw(stringLiteral(field));
}
