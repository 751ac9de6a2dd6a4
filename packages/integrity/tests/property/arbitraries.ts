/**
 * Shared Arbitrary Generators for Property-Based Tests
 *
 * Documents referencing protocols and steps, drawn from a small id pool so
 * that collisions are common.
 */
import fc from "fast-check";

import { type ValidationPolicy } from "../../src/policy";

// ============================================================
// Ids
// ============================================================

export const protocolIdArb = fc.constantFrom("P1", "P2", "P3");

export const stepIdArb = fc.constantFrom("T1", "T2", "T3", "T4");

// ============================================================
// Documents
// ============================================================

export type ProtocolReferences = Readonly<{
  sources: readonly string[];
  destinations: readonly string[];
}>;

/**
 * The protocol id each generated source and destination points at.
 */
export const protocolReferencesArb: fc.Arbitrary<ProtocolReferences> =
  fc.record({
    sources: fc.array(protocolIdArb, { maxLength: 12 }),
    destinations: fc.array(protocolIdArb, { maxLength: 12 }),
  });

export type StepReferences = Readonly<{
  flows: readonly (readonly string[])[];
  steps: readonly (readonly string[])[];
}>;

/**
 * Step id lists held by generated flows (`stepIds`) and steps
 * (`nextStepIds`, which is not a reference edge).
 */
export const stepReferencesArb: fc.Arbitrary<StepReferences> = fc.record({
  flows: fc.array(fc.uniqueArray(stepIdArb, { maxLength: 4 }), {
    maxLength: 8,
  }),
  steps: fc.array(fc.uniqueArray(stepIdArb, { maxLength: 3 }), {
    maxLength: 8,
  }),
});

// ============================================================
// Policies
// ============================================================

const edgeIdArb = fc.constantFrom(
  "Source.protocolId->Protocol",
  "Destination.protocolId->Protocol",
  "Flow.stepIds->Step",
  "OrchestratedFlow.flowId->Flow",
);

/**
 * Random kill switch, parallel flag and a subset of edge toggles.
 */
export const policyArb: fc.Arbitrary<ValidationPolicy> = fc.record({
  enabled: fc.boolean(),
  parallel: fc.boolean(),
  edges: fc
    .array(fc.tuple(edgeIdArb, fc.boolean()), { maxLength: 4 })
    .map((entries) => Object.fromEntries(entries)),
});
