/**
 * Caller-facing payloads for rejected operations.
 *
 * HTTP handlers answer an IntegrityViolationError with a 409 conflict;
 * message consumers reply with a rejected command. Both list the
 * referencing types with their counts so a person can find and remove the
 * blocking entities. Neither carries store error text.
 */
import { type IntegrityViolationError } from "../errors";
import { type ReferenceSummary } from "../validation/types";

export type ReferencingEntity = Readonly<{
  entityType: string;
  count: number;
}>;

export type ConflictResponse = Readonly<{
  status: 409;
  body: Readonly<{
    error: string;
    errorCode: string;
    subjectType: string;
    subjectId: string;
    totalReferences: number;
    referencingEntities: readonly ReferencingEntity[];
  }>;
}>;

export type CommandRejection = Readonly<{
  success: false;
  error: string;
  errorCode: string;
  references: Readonly<{
    totalReferences: number;
    referencingEntities: readonly ReferencingEntity[];
  }>;
}>;

/**
 * Referencing types with a non-zero count, in declaration order.
 */
export function listReferencingEntities(
  summary: ReferenceSummary,
): ReferencingEntity[] {
  return Object.entries(summary.byType)
    .filter(([, count]) => count > 0)
    .map(([entityType, count]) => ({ entityType, count }));
}

/**
 * @example
 * ```typescript
 * try {
 *   await gate.guardedDelete("Protocol", id);
 *   return { status: 204 };
 * } catch (error) {
 *   if (isIntegrityViolation(error)) return toConflictResponse(error);
 *   throw error;
 * }
 * ```
 */
export function toConflictResponse(
  error: IntegrityViolationError,
): ConflictResponse {
  return {
    status: 409,
    body: {
      error: error.message,
      errorCode: error.code,
      subjectType: error.subjectType,
      subjectId: error.subjectId,
      totalReferences: error.summary.totalReferences,
      referencingEntities: listReferencingEntities(error.summary),
    },
  };
}

export function toCommandRejection(
  error: IntegrityViolationError,
): CommandRejection {
  return {
    success: false,
    error: error.message,
    errorCode: error.code,
    references: {
      totalReferences: error.summary.totalReferences,
      referencingEntities: listReferencingEntities(error.summary),
    },
  };
}
