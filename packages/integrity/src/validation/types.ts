import { type ReferenceEdge } from "../core/types";

// ============================================================
// Counts and Summaries
// ============================================================

/**
 * Number of documents referencing the subject along one edge. Produced fresh
 * on every validation call.
 */
export type ReferenceCount = Readonly<{
  edge: ReferenceEdge;
  count: number;
}>;

/**
 * Aggregated counts for one validated entity.
 */
export type ReferenceSummary = Readonly<{
  subjectType: string;
  subjectId: string;
  /** One entry per validated edge, in declaration order */
  counts: readonly ReferenceCount[];
  /** Sums per referencing entity type, keyed in first-declaration order */
  byType: Readonly<Record<string, number>>;
  totalReferences: number;
  hasReferences: boolean;
}>;

// ============================================================
// Verdicts
// ============================================================

type VerdictBase = Readonly<{
  subjectType: string;
  subjectId: string;
  summary: ReferenceSummary;
  /** Wall-clock time spent validating, in milliseconds */
  validationDurationMs: number;
  /** True when validation was turned off by policy */
  skipped: boolean;
}>;

export type ValidVerdict = VerdictBase & Readonly<{ isValid: true }>;

export type InvalidVerdict = VerdictBase &
  Readonly<{
    isValid: false;
    errorMessage: string;
  }>;

export type ValidationVerdict = ValidVerdict | InvalidVerdict;

// ============================================================
// Hooks
// ============================================================

export type ValidationOperation = "delete" | "update" | "inspect";

/**
 * Context passed to validation hooks.
 */
export type ValidationContext = Readonly<{
  /** Unique ID for this validation call */
  validationId: string;
  operation: ValidationOperation;
  entityType: string;
  entityId: string;
  startedAt: Date;
}>;

export type CountEndInfo = Readonly<{
  edge: ReferenceEdge;
  count: number;
  durationMs: number;
}>;

export type ValidationEndInfo = Readonly<{
  summary: ReferenceSummary;
  /** Absent for `inspect` calls, which render no verdict */
  verdict?: ValidationVerdict;
}>;

/**
 * Observability hooks for validation calls.
 *
 * @example
 * ```typescript
 * const validator = createReferenceValidator(graph, store, {
 *   hooks: {
 *     onValidationSkipped: (ctx) => {
 *       logger.warn(`Integrity validation disabled, ${ctx.entityType}/${ctx.entityId} not checked`);
 *     },
 *     onValidationEnd: (ctx, { verdict }) => {
 *       if (verdict) {
 *         metrics.histogram("integrity.validation", verdict.validationDurationMs);
 *       }
 *     },
 *   },
 * });
 * ```
 */
export type ValidationHooks = Readonly<{
  onValidationStart?: (ctx: ValidationContext) => void;
  onCountEnd?: (ctx: ValidationContext, info: CountEndInfo) => void;
  /** Paired with every `onValidationStart` that does not end in `onError` */
  onValidationEnd?: (ctx: ValidationContext, result: ValidationEndInfo) => void;
  /** Called instead of any counting when the kill switch is off */
  onValidationSkipped?: (ctx: ValidationContext) => void;
  onError?: (ctx: ValidationContext, error: Error) => void;
}>;

export type ValidateOptions = Readonly<{
  signal?: AbortSignal;
}>;
