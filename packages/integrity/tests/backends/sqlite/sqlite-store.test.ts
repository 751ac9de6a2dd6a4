/**
 * SQLite Document Store Tests
 *
 * Runs against a real in-memory better-sqlite3 database.
 */
import { sql } from "drizzle-orm";
import { SQLiteSyncDialect } from "drizzle-orm/sqlite-core";
import { describe, expect, it } from "vitest";

import {
  buildSqliteCountCondition,
  createLocalSqliteDocumentStore,
  createSqliteTables,
  generateReferenceIndexSQL,
  generateSqliteDDL,
  getSqliteMigrationSQL,
  tables,
} from "../../../src/backend/sqlite";
import { workflowGraph } from "../../../src/domain/workflow";
import { ConfigurationError } from "../../../src/errors";
import { createTestDatabase, createTestStore } from "../../test-utils";
import { createDocumentStoreTestSuite } from "../document-store-suite";

// ============================================================
// Shared Document Store Suite
// ============================================================

createDocumentStoreTestSuite("SQLite", () => createTestStore());

// ============================================================
// SQLite-Specific Tests
// ============================================================

describe("SQLite count conditions", () => {
  const dialect = new SQLiteSyncDialect();

  it("renders json_extract equality for single-valued fields", () => {
    const query = dialect.sqlToQuery(
      buildSqliteCountCondition(tables.documents, {
        field: "protocolId",
        op: "eq",
        value: "P1",
      }),
    );

    expect(query.sql).toBe(
      `json_extract("documents"."body", '$.protocolId') = ?`,
    );
    expect(query.params).toEqual(["P1"]);
  });

  it("renders array-guarded json_each membership for many-valued fields", () => {
    const query = dialect.sqlToQuery(
      buildSqliteCountCondition(tables.documents, {
        field: "stepIds",
        op: "contains",
        value: "T1",
      }),
    );

    expect(query.sql).toBe(
      `(json_type("documents"."body", '$.stepIds') = 'array' AND EXISTS (SELECT 1 FROM json_each("documents"."body", '$.stepIds') WHERE value = ?))`,
    );
    expect(query.params).toEqual(["T1"]);
  });

  it("rejects field names that are not identifiers", () => {
    expect(() =>
      buildSqliteCountCondition(tables.documents, {
        field: "protocolId') OR 1=1 --",
        op: "eq",
        value: "P1",
      }),
    ).toThrow(ConfigurationError);
  });

  it("rejects collection names that are not identifiers", async () => {
    const store = createTestStore();

    await expect(
      store.countDocuments("sources'", {
        field: "protocolId",
        op: "eq",
        value: "P1",
      }),
    ).rejects.toThrow(`Invalid collection name "sources'" in document query`);
  });
});

describe("SQLite DDL", () => {
  it("generates the documents table and its collection index", () => {
    expect(generateSqliteDDL()).toEqual([
      [
        `CREATE TABLE IF NOT EXISTS "documents" (`,
        `  "collection" TEXT NOT NULL,`,
        `  "id" TEXT NOT NULL,`,
        `  "body" TEXT NOT NULL,`,
        `  "created_at" TEXT NOT NULL,`,
        `  "updated_at" TEXT NOT NULL,`,
        `  PRIMARY KEY ("collection", "id")`,
        `);`,
      ].join("\n"),
      `CREATE INDEX IF NOT EXISTS "documents_collection_idx" ON "documents" ("collection");`,
    ]);
  });

  it("joins statements into one migration script", () => {
    expect(getSqliteMigrationSQL()).toBe(generateSqliteDDL().join("\n\n"));
  });

  it("uses custom table names", () => {
    const custom = createSqliteTables({ documents: "workflow_documents" });
    const [createTable, createIndex] = generateSqliteDDL(custom);

    expect(createTable).toContain(
      `CREATE TABLE IF NOT EXISTS "workflow_documents" (`,
    );
    expect(createIndex).toBe(
      `CREATE INDEX IF NOT EXISTS "workflow_documents_collection_idx" ON "workflow_documents" ("collection");`,
    );
  });

  it("generates partial expression indexes for single-valued references", () => {
    expect(generateReferenceIndexSQL(workflowGraph, "sqlite")).toEqual([
      `CREATE INDEX IF NOT EXISTS "idx_sources_protocolId" ON "documents" (json_extract("body", '$.protocolId')) WHERE "collection" = 'sources';`,
      `CREATE INDEX IF NOT EXISTS "idx_destinations_protocolId" ON "documents" (json_extract("body", '$.protocolId')) WHERE "collection" = 'destinations';`,
      `CREATE INDEX IF NOT EXISTS "idx_steps_entityId" ON "documents" (json_extract("body", '$.entityId')) WHERE "collection" = 'steps';`,
      `CREATE INDEX IF NOT EXISTS "idx_orchestratedflows_flowId" ON "documents" (json_extract("body", '$.flowId')) WHERE "collection" = 'orchestratedflows';`,
    ]);
  });
});

describe("createLocalSqliteDocumentStore", () => {
  it("creates the reference indexes when given a graph", () => {
    const { db } = createTestDatabase(workflowGraph);

    const rows = db.all<{ name: string }>(
      sql`SELECT name FROM sqlite_master WHERE type = 'index' AND name LIKE 'idx_%' ORDER BY name`,
    );

    expect(rows).toEqual([
      { name: "idx_destinations_protocolId" },
      { name: "idx_orchestratedflows_flowId" },
      { name: "idx_sources_protocolId" },
      { name: "idx_steps_entityId" },
    ]);
  });

  it("counts through the partial index", async () => {
    const { store } = createTestDatabase(workflowGraph);
    await store.insertDocument("sources", { id: "S1", protocolId: "P1" });
    await store.insertDocument("destinations", { id: "D1", protocolId: "P1" });

    expect(
      await store.countDocuments("sources", {
        field: "protocolId",
        op: "eq",
        value: "P1",
      }),
    ).toBe(1);
  });

  it("closes the database once", async () => {
    const { store } = createLocalSqliteDocumentStore();

    await store.close();
    await expect(store.close()).resolves.toBeUndefined();
  });
});
