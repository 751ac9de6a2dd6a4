/**
 * Example 01: Guarded Protocol Deletion
 *
 * This example demonstrates:
 * - Wiring a validator, a repository and the integrity gate
 * - A delete rejected because sources still reference the protocol
 * - Turning the rejection into a 409 conflict payload
 * - The same delete succeeding once the sources are gone
 */
import {
  createDocumentRepository,
  createIntegrityGate,
  createReferenceValidator,
  isIntegrityViolation,
  toConflictResponse,
  workflowGraph,
} from "entity-integrity";

import { createExampleStore } from "./_helpers";

export async function main() {
  const store = createExampleStore();
  const repository = createDocumentRepository(workflowGraph, store);
  const validator = createReferenceValidator(workflowGraph, store);
  const gate = createIntegrityGate({ validator, repository });

  // ============================================================
  // Seed: one protocol, two sources using it
  // ============================================================

  const http = await repository.create("Protocol", { name: "HTTP" });
  const sources = await Promise.all(
    ["orders", "invoices"].map((name) =>
      repository.create("Source", {
        name,
        version: "1.0.0",
        address: `https://example.test/${name}`,
        protocolId: http.id,
      }),
    ),
  );
  console.log(`Created protocol ${http.id} with ${sources.length} sources`);

  // ============================================================
  // Rejected delete
  // ============================================================

  try {
    await gate.guardedDelete("Protocol", http.id);
    throw new Error("Expected the delete to be rejected");
  } catch (error) {
    if (!isIntegrityViolation(error)) throw error;
    const response = toConflictResponse(error);
    console.log(`HTTP ${response.status}: ${response.body.error}`);
    console.log("Referencing entities:", response.body.referencingEntities);
  }

  const stillThere = await repository.getById("Protocol", http.id);
  console.log("Protocol still exists:", stillThere !== undefined);

  // ============================================================
  // Remove the dependents, then delete
  // ============================================================

  for (const source of sources) {
    await gate.guardedDelete("Source", source.id);
  }

  const verdict = await validator.validateDeletion("Protocol", http.id);
  console.log("Valid after removing sources:", verdict.isValid);

  await gate.guardedDelete("Protocol", http.id);
  console.log("Protocol deleted:", (await repository.getById("Protocol", http.id)) === undefined);

  await store.close();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
