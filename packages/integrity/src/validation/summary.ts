import { IntegrityViolationError } from "../errors";
import {
  type ReferenceCount,
  type ReferenceSummary,
  type ValidationVerdict,
} from "./types";

export function buildReferenceSummary(
  subjectType: string,
  subjectId: string,
  counts: readonly ReferenceCount[],
): ReferenceSummary {
  const byType: Record<string, number> = {};
  let totalReferences = 0;

  for (const { edge, count } of counts) {
    byType[edge.fromType] = (byType[edge.fromType] ?? 0) + count;
    totalReferences += count;
  }

  return Object.freeze({
    subjectType,
    subjectId,
    counts: Object.freeze([...counts]),
    byType: Object.freeze(byType),
    totalReferences,
    hasReferences: totalReferences > 0,
  });
}

export function emptyReferenceSummary(
  subjectType: string,
  subjectId: string,
): ReferenceSummary {
  return buildReferenceSummary(subjectType, subjectId, []);
}

/**
 * Renders the violation message for a summary, e.g.
 * "Cannot delete/modify Protocol. Found 2 Source reference(s) and 1 Destination reference(s)."
 *
 * Only types with a non-zero count are listed, in declaration order.
 */
export function renderViolationMessage(summary: ReferenceSummary): string {
  const clauses = Object.entries(summary.byType)
    .filter(([, count]) => count > 0)
    .map(([entityType, count]) => `${count} ${entityType} reference(s)`);

  return `Cannot delete/modify ${summary.subjectType}. Found ${clauses.join(" and ")}.`;
}

/**
 * Converts an invalid verdict into the error the gate throws.
 * Valid verdicts yield `undefined`.
 */
export function verdictToError(
  verdict: ValidationVerdict,
): IntegrityViolationError | undefined {
  if (verdict.isValid) return undefined;
  return new IntegrityViolationError(verdict.errorMessage, verdict.summary);
}
