/**
 * Example 03: Array References and Command Rejections
 *
 * This example demonstrates:
 * - Many-valued references (a flow lists its steps)
 * - Inspecting references without a verdict
 * - Re-keying an entity through a guarded update
 * - Replying to a rejected command on a message bus
 */
import {
  createDocumentRepository,
  createIntegrityGate,
  createReferenceValidator,
  isIntegrityViolation,
  toCommandRejection,
  workflowGraph,
} from "entity-integrity";

import { createExampleStore } from "./_helpers";

export async function main() {
  const store = createExampleStore();
  const repository = createDocumentRepository(workflowGraph, store);
  const validator = createReferenceValidator(workflowGraph, store);
  const gate = createIntegrityGate({ validator, repository });

  const processor = await repository.create("Processor", {
    name: "normalize",
    version: "2.1.0",
    inputSchema: "raw-order",
    outputSchema: "order",
  });
  const last = await repository.create("Step", { entityId: processor.id });
  const first = await repository.create("Step", {
    entityId: processor.id,
    nextStepIds: [last.id],
  });
  await repository.create("Flow", {
    name: "orders",
    version: "1.0.0",
    stepIds: [first.id, last.id],
  });

  // ============================================================
  // Inspect
  // ============================================================

  const summary = await validator.getReferences("Step", last.id);
  console.log(`Step ${last.id} is referenced by:`, summary.byType);

  // ============================================================
  // Re-key rejected: the old id is still referenced
  // ============================================================

  try {
    await gate.guardedUpdate("Step", last.id, {
      id: "step-final",
      entityId: processor.id,
    });
  } catch (error) {
    if (!isIntegrityViolation(error)) throw error;
    console.log("Command rejected:", toCommandRejection(error));
  }

  // ============================================================
  // An unreferenced processor can be updated
  // ============================================================

  const spare = await repository.create("Processor", {
    name: "spare",
    version: "0.1.0",
    inputSchema: "a",
    outputSchema: "b",
  });
  const updated = await gate.guardedUpdate("Processor", spare.id, {
    name: "spare",
    version: "0.2.0",
    inputSchema: "a",
    outputSchema: "b",
  });
  console.log("Updated processor version:", updated.version);

  await store.close();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
