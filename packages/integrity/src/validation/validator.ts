import { type ReferenceEdge } from "../core/types";
import {
  DEFAULT_VALIDATION_POLICY,
  isEdgeEnabled,
  type PolicySource,
  resolvePolicy,
} from "../policy";
import { type ReferenceGraph } from "../registry/reference-graph";
import { type DocumentStore } from "../store/types";
import { generateId } from "../utils/id";
import { countReferences } from "./counter";
import {
  buildReferenceSummary,
  emptyReferenceSummary,
  renderViolationMessage,
} from "./summary";
import {
  type ReferenceCount,
  type ReferenceSummary,
  type ValidateOptions,
  type ValidationContext,
  type ValidationHooks,
  type ValidationOperation,
  type ValidationVerdict,
} from "./types";

export type ReferenceValidatorOptions = Readonly<{
  /** Fixed policy or a function re-resolved on every call */
  policy?: PolicySource;
  hooks?: ValidationHooks;
}>;

/**
 * Decides whether an entity may be deleted or modified by counting the
 * documents that still reference it.
 *
 * Stateless between calls: counts are never cached, and the policy is
 * resolved at the start of every call.
 */
export class ReferenceValidator {
  readonly #graph: ReferenceGraph;
  readonly #store: DocumentStore;
  readonly #policy: PolicySource;
  readonly #hooks: ValidationHooks;

  constructor(
    graph: ReferenceGraph,
    store: DocumentStore,
    options: ReferenceValidatorOptions = {},
  ) {
    this.#graph = graph;
    this.#store = store;
    this.#policy = options.policy ?? DEFAULT_VALIDATION_POLICY;
    this.#hooks = options.hooks ?? {};
  }

  /**
   * Validates that `type`/`id` can be deleted.
   *
   * @throws UnknownEntityTypeError if `type` is not in the graph
   * @throws CountingFailureError if a count fails in the store
   */
  async validateDeletion(
    type: string,
    id: string,
    options: ValidateOptions = {},
  ): Promise<ValidationVerdict> {
    return this.#validate("delete", type, id, options);
  }

  /**
   * Validates that `type`/`id` can be modified. Counts exactly as
   * `validateDeletion` does; a re-keying update validates the old id.
   */
  async validateUpdate(
    type: string,
    id: string,
    options: ValidateOptions = {},
  ): Promise<ValidationVerdict> {
    return this.#validate("update", type, id, options);
  }

  /**
   * Counts references without rendering a verdict. Per-edge toggles and the
   * parallel flag apply; the kill switch does not.
   */
  async getReferences(
    type: string,
    id: string,
    options: ValidateOptions = {},
  ): Promise<ReferenceSummary> {
    this.#graph.getEntity(type);
    const policy = resolvePolicy(this.#policy);
    const ctx = this.#createContext("inspect", type, id);

    this.#hooks.onValidationStart?.(ctx);
    return this.#withErrorHook(ctx, async () => {
      const edges = this.#graph
        .edgesInto(type)
        .filter((edge) => isEdgeEnabled(policy, edge));
      const counts = await this.#countEdges(
        ctx,
        edges,
        policy.parallel,
        options.signal,
      );
      const summary = buildReferenceSummary(type, id, counts);
      this.#hooks.onValidationEnd?.(ctx, { summary });
      return summary;
    });
  }

  // === Internal: Validation ===

  async #validate(
    operation: ValidationOperation,
    type: string,
    id: string,
    options: ValidateOptions,
  ): Promise<ValidationVerdict> {
    this.#graph.getEntity(type);
    const policy = resolvePolicy(this.#policy);
    const ctx = this.#createContext(operation, type, id);

    if (!policy.enabled) {
      this.#hooks.onValidationSkipped?.(ctx);
      return {
        isValid: true,
        subjectType: type,
        subjectId: id,
        summary: emptyReferenceSummary(type, id),
        validationDurationMs: 0,
        skipped: true,
      };
    }

    this.#hooks.onValidationStart?.(ctx);
    const startTime = Date.now();

    return this.#withErrorHook(ctx, async () => {
      const edges = this.#graph
        .edgesInto(type)
        .filter((edge) => isEdgeEnabled(policy, edge));
      const counts = await this.#countEdges(
        ctx,
        edges,
        policy.parallel,
        options.signal,
      );
      const summary = buildReferenceSummary(type, id, counts);
      const base = {
        subjectType: type,
        subjectId: id,
        summary,
        validationDurationMs: Date.now() - startTime,
        skipped: false,
      };
      const verdict: ValidationVerdict =
        summary.hasReferences ?
          {
            ...base,
            isValid: false,
            errorMessage: renderViolationMessage(summary),
          }
        : { ...base, isValid: true };

      this.#hooks.onValidationEnd?.(ctx, { summary, verdict });
      return verdict;
    });
  }

  // === Internal: Counting ===

  /**
   * Counts every edge, linked to the caller's signal.
   *
   * In parallel mode the first failure aborts the remaining counts, and every
   * dispatched count is settled before that failure is rethrown. A caller
   * abort rejects with the caller's reason.
   */
  async #countEdges(
    ctx: ValidationContext,
    edges: readonly ReferenceEdge[],
    parallel: boolean,
    callerSignal: AbortSignal | undefined,
  ): Promise<ReferenceCount[]> {
    callerSignal?.throwIfAborted();

    const controller = new AbortController();
    const forwardAbort = () => {
      controller.abort(callerSignal?.reason);
    };
    callerSignal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      if (!parallel) {
        const counts: ReferenceCount[] = [];
        for (const edge of edges) {
          controller.signal.throwIfAborted();
          counts.push(await this.#countEdge(ctx, edge, controller.signal));
        }
        return counts;
      }

      // Failures in the order they occurred
      const failures: unknown[] = [];
      const settled = await Promise.allSettled(
        edges.map(async (edge) => {
          try {
            return await this.#countEdge(ctx, edge, controller.signal);
          } catch (error) {
            failures.push(error);
            if (failures.length === 1) {
              controller.abort(error);
            }
            throw error;
          }
        }),
      );

      if (callerSignal?.aborted) {
        throw callerSignal.reason;
      }
      if (failures.length > 0) {
        throw failures[0];
      }

      return settled.flatMap((result) =>
        result.status === "fulfilled" ? [result.value] : [],
      );
    } finally {
      callerSignal?.removeEventListener("abort", forwardAbort);
    }
  }

  async #countEdge(
    ctx: ValidationContext,
    edge: ReferenceEdge,
    signal: AbortSignal,
  ): Promise<ReferenceCount> {
    const startTime = Date.now();
    const result = await countReferences(this.#store, edge, ctx.entityId, {
      signal,
    });
    this.#hooks.onCountEnd?.(ctx, {
      edge,
      count: result.count,
      durationMs: Date.now() - startTime,
    });
    return result;
  }

  // === Internal: Hook Helpers ===

  #createContext(
    operation: ValidationOperation,
    entityType: string,
    entityId: string,
  ): ValidationContext {
    return {
      validationId: generateId(),
      operation,
      entityType,
      entityId,
      startedAt: new Date(),
    };
  }

  async #withErrorHook<T>(
    ctx: ValidationContext,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.#hooks.onError?.(
        ctx,
        error instanceof Error ? error : new Error(String(error)),
      );
      throw error;
    }
  }
}

/**
 * Creates a reference validator over a graph and a document store.
 *
 * @example
 * ```typescript
 * const validator = createReferenceValidator(workflowGraph, store, {
 *   policy: createFlagPolicySource(workflowGraph, () =>
 *     readPolicyFlagsFromEnv(workflowGraph),
 *   ),
 * });
 *
 * const verdict = await validator.validateDeletion("Protocol", "P1");
 * if (!verdict.isValid) console.log(verdict.errorMessage);
 * ```
 */
export function createReferenceValidator(
  graph: ReferenceGraph,
  store: DocumentStore,
  options: ReferenceValidatorOptions = {},
): ReferenceValidator {
  return new ReferenceValidator(graph, store, options);
}
