/**
 * Entity Integrity Error Hierarchy
 *
 * All errors extend IntegrityError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   await gate.guardedDelete("Protocol", protocolId);
 * } catch (error) {
 *   if (isIntegrityViolation(error)) {
 *     return toConflictResponse(error);
 *   }
 *   throw error;
 * }
 * ```
 */
import { type ReferenceSummary } from "../validation/types";

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `constraint`: A dependent entity blocks the operation. Recoverable by changing data.
 * - `system`: Infrastructure failure. May require investigation or retry.
 */
export type ErrorCategory = "user" | "constraint" | "system";

/**
 * Options for IntegrityError constructor.
 */
export type IntegrityErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all entity integrity errors.
 */
export class IntegrityError extends Error {
  /** Machine-readable error code (e.g., "COUNTING_FAILURE") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: IntegrityErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "IntegrityError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Referential Integrity (category: "constraint")
// ============================================================

/**
 * Thrown when a delete or update is blocked because other entities still
 * reference the subject.
 *
 * This is the only error callers are expected to special-case: map it to a
 * 409 conflict or a rejected command, and do not retry it automatically.
 *
 * @example
 * ```typescript
 * try {
 *   await gate.guardedDelete("Protocol", "P1");
 * } catch (error) {
 *   if (error instanceof IntegrityViolationError) {
 *     console.log(error.summary.byType); // { Source: 2, Destination: 0 }
 *   }
 * }
 * ```
 */
export class IntegrityViolationError extends IntegrityError {
  readonly subjectType: string;
  readonly subjectId: string;
  readonly summary: ReferenceSummary;

  constructor(
    message: string,
    summary: ReferenceSummary,
    options?: { cause?: unknown },
  ) {
    const referencingTypes = Object.entries(summary.byType)
      .filter(([, count]) => count > 0)
      .map(([entityType]) => entityType);

    super(message, "REFERENTIAL_INTEGRITY_VIOLATION", {
      details: {
        subjectType: summary.subjectType,
        subjectId: summary.subjectId,
        totalReferences: summary.totalReferences,
        byType: summary.byType,
      },
      category: "constraint",
      suggestion: `Remove or re-point the referencing ${referencingTypes.join(", ")} entities first, then retry.`,
      cause: options?.cause,
    });
    this.name = "IntegrityViolationError";
    this.subjectType = summary.subjectType;
    this.subjectId = summary.subjectId;
    this.summary = summary;
  }
}

// ============================================================
// Infrastructure Errors (category: "system")
// ============================================================

/**
 * Thrown when counting references along one edge fails in the store.
 *
 * The store's own error is kept as `cause` and never copied into the message.
 * Counting is a read, so retrying is safe.
 */
export class CountingFailureError extends IntegrityError {
  constructor(
    details: Readonly<{
      edgeId: string;
      collection: string;
      field: string;
      targetType: string;
      targetId: string;
      reason?: string;
    }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Failed to count references to ${details.targetType}/${details.targetId} along "${details.edgeId}"`,
      "COUNTING_FAILURE",
      {
        details,
        category: "system",
        suggestion: `Check the document store connection and retry. Counting is read-only and safe to repeat.`,
        cause: options?.cause,
      },
    );
    this.name = "CountingFailureError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when the reference graph, an entity definition or a validation
 * policy flag is invalid.
 */
export class ConfigurationError extends IntegrityError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review your entity and reference definitions.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Input Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "configuration.host") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code?: string;
}>;

/**
 * Details for ValidationError.
 */
export type ValidationErrorDetails = Readonly<{
  entityType: string;
  operation: "create" | "update";
  id?: string;
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when an entity document does not match its schema.
 */
export class ValidationError extends IntegrityError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    const fieldList =
      details.issues.length > 0 ?
        details.issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following fields: ${fieldList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

/**
 * Thrown by a repository when the entity to update or delete does not exist.
 */
export class EntityNotFoundError extends IntegrityError {
  constructor(entityType: string, id: string, options?: { cause?: unknown }) {
    super(`Entity not found: ${entityType}/${id}`, "ENTITY_NOT_FOUND", {
      details: { entityType, id },
      category: "user",
      suggestion: `Verify the ${entityType} ID "${id}" exists and has not been deleted.`,
      cause: options?.cause,
    });
    this.name = "EntityNotFoundError";
  }
}

/**
 * Thrown when an entity type is not registered in the reference graph.
 */
export class UnknownEntityTypeError extends IntegrityError {
  constructor(entityType: string, options?: { cause?: unknown }) {
    super(`Entity type not found: ${entityType}`, "UNKNOWN_ENTITY_TYPE", {
      details: { entityType },
      category: "user",
      suggestion: `Verify "${entityType}" is declared with defineEntity() and passed to defineReferenceGraph().`,
      cause: options?.cause,
    });
    this.name = "UnknownEntityTypeError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for IntegrityError.
 */
export function isIntegrityError(error: unknown): error is IntegrityError {
  return error instanceof IntegrityError;
}

/**
 * Type guard for IntegrityViolationError.
 */
export function isIntegrityViolation(
  error: unknown,
): error is IntegrityViolationError {
  return error instanceof IntegrityViolationError;
}

/**
 * Check if error is recoverable by user action (user or constraint error).
 */
export function isUserRecoverable(error: unknown): boolean {
  if (!isIntegrityError(error)) return false;
  return error.category === "user" || error.category === "constraint";
}

/**
 * Check if error indicates a system/infrastructure issue.
 */
export function isSystemError(error: unknown): boolean {
  return isIntegrityError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isIntegrityError(error) ? error.suggestion : undefined;
}
