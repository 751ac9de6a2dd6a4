/**
 * Entity Integrity: referential-integrity validation for entities kept in a
 * schema-less document store.
 *
 * @example
 * ```typescript
 * import {
 *   createDocumentRepository,
 *   createIntegrityGate,
 *   createReferenceValidator,
 *   isIntegrityViolation,
 *   toConflictResponse,
 *   workflowGraph,
 * } from "entity-integrity";
 * import { createLocalSqliteDocumentStore } from "entity-integrity/sqlite";
 *
 * const { store } = createLocalSqliteDocumentStore({ graph: workflowGraph });
 * const gate = createIntegrityGate({
 *   validator: createReferenceValidator(workflowGraph, store),
 *   repository: createDocumentRepository(workflowGraph, store),
 * });
 *
 * try {
 *   await gate.guardedDelete("Protocol", protocolId);
 * } catch (error) {
 *   if (isIntegrityViolation(error)) return toConflictResponse(error);
 *   throw error;
 * }
 * ```
 */

// ============================================================
// Core DSL
// ============================================================

export {
  defineEntity,
  type DefineEntityOptions,
  isPlainIdentifier,
} from "./core/entity";
export {
  defaultReferenceFlag,
  reference,
  referenceEdgeId,
  type ReferenceOptions,
} from "./core/reference";
export type {
  Cardinality,
  EntityDefinition,
  EntityDocument,
  EntityField,
  EntitySchema,
  EntityState,
  ReferenceDeclaration,
  ReferenceEdge,
} from "./core/types";

// ============================================================
// Reference Graph
// ============================================================

export {
  defineReferenceGraph,
  ReferenceGraph,
  type ReferenceGraphInput,
} from "./registry/reference-graph";

// ============================================================
// Workflow Model
// ============================================================

export {
  Destination,
  Exporter,
  Flow,
  Importer,
  OrchestratedFlow,
  Processor,
  Protocol,
  Source,
  Step,
  workflowEntities,
  workflowGraph,
} from "./domain/workflow";

// ============================================================
// Validation
// ============================================================

export { countReferences } from "./validation/counter";
export {
  buildReferenceSummary,
  emptyReferenceSummary,
  renderViolationMessage,
  verdictToError,
} from "./validation/summary";
export type {
  CountEndInfo,
  InvalidVerdict,
  ReferenceCount,
  ReferenceSummary,
  ValidateOptions,
  ValidationContext,
  ValidationEndInfo,
  ValidationHooks,
  ValidationOperation,
  ValidationVerdict,
  ValidVerdict,
} from "./validation/types";
export {
  createReferenceValidator,
  ReferenceValidator,
  type ReferenceValidatorOptions,
} from "./validation/validator";

// ============================================================
// Policy
// ============================================================

export {
  createFlagPolicySource,
  DEFAULT_VALIDATION_POLICY,
  flagEnvName,
  type FlagPolicySourceOptions,
  isEdgeEnabled,
  loadValidationPolicy,
  PARALLEL_VALIDATION_FLAG,
  parsePolicyFlags,
  type PolicyFlags,
  policyFlagNames,
  type PolicySource,
  readPolicyFlagsFromEnv,
  resolvePolicy,
  VALIDATION_ENABLED_FLAG,
  type ValidationPolicy,
} from "./policy";

// ============================================================
// Integrity Gate
// ============================================================

export {
  createIntegrityGate,
  IntegrityGate,
  type IntegrityGateOptions,
} from "./gate/integrity-gate";
export {
  type CommandRejection,
  type ConflictResponse,
  listReferencingEntities,
  type ReferencingEntity,
  toCommandRejection,
  toConflictResponse,
} from "./gate/responses";
export type {
  GateHooks,
  GateOperationContext,
  GuardedOperationOptions,
} from "./gate/types";

// ============================================================
// Persistence
// ============================================================

export {
  createDocumentRepository,
  DocumentRepository,
} from "./store/repository";
export type {
  CountFilter,
  CountOptions,
  DocumentStore,
  EntityRepository,
} from "./store/types";

// ============================================================
// Errors
// ============================================================

export {
  ConfigurationError,
  CountingFailureError,
  EntityNotFoundError,
  type ErrorCategory,
  getErrorSuggestion,
  IntegrityError,
  type IntegrityErrorOptions,
  IntegrityViolationError,
  isIntegrityError,
  isIntegrityViolation,
  isSystemError,
  isUserRecoverable,
  UnknownEntityTypeError,
  ValidationError,
  type ValidationErrorDetails,
  type ValidationIssue,
} from "./errors";

// ============================================================
// Utilities
// ============================================================

export {
  err,
  generateId,
  type IdGenerator,
  isErr,
  isOk,
  map,
  mapErr,
  nowIso,
  ok,
  type Result,
  unwrap,
} from "./utils";
