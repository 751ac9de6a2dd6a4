/**
 * Example 02: Validation Policy and Hooks
 *
 * This example demonstrates:
 * - Reading policy flags from environment variables
 * - Per-edge toggles and the kill switch
 * - Observability hooks as the logging surface
 */
import {
  createFlagPolicySource,
  createReferenceValidator,
  flagEnvName,
  readPolicyFlagsFromEnv,
  VALIDATION_ENABLED_FLAG,
  workflowGraph,
} from "entity-integrity";
import { createMemoryDocumentStore } from "entity-integrity/memory";

export async function main() {
  const store = createMemoryDocumentStore();

  const protocol = await store.insertDocument("protocols", { name: "SFTP" });
  await store.insertDocument("sources", {
    name: "nightly-drop",
    version: "1.0.0",
    address: "sftp://example.test/drop",
    protocolId: protocol.id,
  });
  await store.insertDocument("destinations", {
    name: "archive",
    version: "1.0.0",
    address: "sftp://example.test/archive",
    protocolId: protocol.id,
  });

  // A stand-in for process.env that the example can change between calls
  const env: Record<string, string | undefined> = {};

  const validator = createReferenceValidator(workflowGraph, store, {
    policy: createFlagPolicySource(workflowGraph, () =>
      readPolicyFlagsFromEnv(workflowGraph, env),
    ),
    hooks: {
      onCountEnd: (ctx, { edge, count }) => {
        console.log(`  [${ctx.validationId}] ${edge.id}: ${count}`);
      },
      onValidationSkipped: (ctx) => {
        console.log(`  Validation disabled, ${ctx.entityType}/${ctx.entityId} not checked`);
      },
    },
  });

  // ============================================================
  // All edges enabled
  // ============================================================

  console.log("Default policy:");
  const all = await validator.validateDeletion("Protocol", protocol.id);
  console.log(all.isValid ? "  valid" : `  ${all.errorMessage}`);

  // ============================================================
  // Destination edge toggled off
  // ============================================================

  env[flagEnvName("ReferentialIntegrity:ValidateDestinationReferences")] = "false";
  console.log("Destination references not validated:");
  const partial = await validator.validateDeletion("Protocol", protocol.id);
  console.log("  totalReferences:", partial.summary.totalReferences);

  // ============================================================
  // Kill switch
  // ============================================================

  env[flagEnvName(VALIDATION_ENABLED_FLAG)] = "off";
  console.log("Kill switch off:");
  const skipped = await validator.validateDeletion("Protocol", protocol.id);
  console.log("  valid:", skipped.isValid, "skipped:", skipped.skipped);

  await store.close();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
