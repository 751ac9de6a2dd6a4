/**
 * Shared helpers for examples
 *
 * Provides an in-memory SQLite document store with the workflow reference
 * indexes already created.
 */
import { workflowGraph } from "entity-integrity";
import { createLocalSqliteDocumentStore } from "entity-integrity/sqlite";

export function createExampleStore() {
  const { store } = createLocalSqliteDocumentStore({ graph: workflowGraph });
  return store;
}
