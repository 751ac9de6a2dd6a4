/**
 * The workflow-definition model: protocols and the sources, destinations,
 * processors, steps and flows built on them.
 *
 * @example
 * ```typescript
 * import { workflowGraph } from "entity-integrity";
 *
 * workflowGraph.edgesInto("Protocol").map((edge) => edge.id);
 * // ["Source.protocolId->Protocol", "Destination.protocolId->Protocol"]
 * ```
 */
import { z } from "zod";

import { defineEntity } from "../core/entity";
import { reference } from "../core/reference";
import { defineReferenceGraph } from "../registry/reference-graph";

const entityId = z.string().min(1);

const auditFields = {
  description: z.string().optional(),
  createdBy: z.string().optional(),
  updatedBy: z.string().optional(),
};

const versionedFields = {
  name: z.string().min(1),
  version: z.string().min(1),
};

// ============================================================
// Entities
// ============================================================

export const Protocol = defineEntity("Protocol", {
  collection: "protocols",
  description: "Transport or format spoken by sources and destinations",
  schema: z.object({
    name: z.string().min(1),
    ...auditFields,
  }),
});

export const Source = defineEntity("Source", {
  collection: "sources",
  schema: z.object({
    ...versionedFields,
    address: z.string().min(1),
    configuration: z.record(z.string(), z.unknown()).default({}),
    protocolId: entityId,
    ...auditFields,
  }),
});

export const Destination = defineEntity("Destination", {
  collection: "destinations",
  schema: z.object({
    ...versionedFields,
    address: z.string().min(1),
    configuration: z.record(z.string(), z.unknown()).default({}),
    protocolId: entityId,
    ...auditFields,
  }),
});

/**
 * `protocolId` is informational here and is not a reference edge.
 */
export const Processor = defineEntity("Processor", {
  collection: "processors",
  schema: z.object({
    ...versionedFields,
    protocolId: entityId.optional(),
    inputSchema: z.string().min(1),
    outputSchema: z.string().min(1),
    ...auditFields,
  }),
});

export const Importer = defineEntity("Importer", {
  collection: "importers",
  schema: z.object({
    ...versionedFields,
    configuration: z.record(z.string(), z.unknown()).default({}),
    ...auditFields,
  }),
});

export const Exporter = defineEntity("Exporter", {
  collection: "exporters",
  schema: z.object({
    ...versionedFields,
    configuration: z.record(z.string(), z.unknown()).default({}),
    ...auditFields,
  }),
});

/**
 * A step runs one processor, importer or exporter (`entityId`) and hands
 * off to `nextStepIds`. Hand-offs may form cycles and are not reference
 * edges.
 */
export const Step = defineEntity("Step", {
  collection: "steps",
  schema: z.object({
    entityId,
    nextStepIds: z.array(entityId).default([]),
    ...auditFields,
  }),
});

export const Flow = defineEntity("Flow", {
  collection: "flows",
  schema: z.object({
    ...versionedFields,
    stepIds: z.array(entityId).default([]),
    ...auditFields,
  }),
});

export const OrchestratedFlow = defineEntity("OrchestratedFlow", {
  collection: "orchestratedflows",
  schema: z.object({
    ...versionedFields,
    flowId: entityId,
    assignmentIds: z.array(entityId).default([]),
    ...auditFields,
  }),
});

// ============================================================
// Graph
// ============================================================

export const workflowEntities = [
  Protocol,
  Source,
  Destination,
  Processor,
  Importer,
  Exporter,
  Step,
  Flow,
  OrchestratedFlow,
] as const;

export const workflowGraph = defineReferenceGraph({
  entities: workflowEntities,
  references: [
    reference(Source, "protocolId", Protocol, {
      flag: "ReferentialIntegrity:ValidateSourceReferences",
    }),
    reference(Destination, "protocolId", Protocol, {
      flag: "ReferentialIntegrity:ValidateDestinationReferences",
    }),
    reference(Step, "entityId", Processor),
    reference(Step, "entityId", Importer),
    reference(Step, "entityId", Exporter),
    reference(Flow, "stepIds", Step),
    reference(OrchestratedFlow, "flowId", Flow),
  ],
});
