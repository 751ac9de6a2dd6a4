// ============================================================
// Gate Hooks
// ============================================================

/**
 * Context passed to gate operation hooks.
 */
export type GateOperationContext = Readonly<{
  /** Unique ID for this operation */
  operationId: string;
  operation: "update" | "delete";
  entityType: string;
  entityId: string;
  startedAt: Date;
}>;

/**
 * Observability hooks for guarded operations. Rejections by the integrity
 * check reach `onError` with the IntegrityViolationError.
 *
 * @example
 * ```typescript
 * const gate = createIntegrityGate({
 *   validator,
 *   repository,
 *   hooks: {
 *     onOperationEnd: (ctx, { durationMs }) => {
 *       console.log(`[${ctx.operationId}] ${ctx.operation} ${ctx.entityType}/${ctx.entityId} in ${durationMs}ms`);
 *     },
 *   },
 * });
 * ```
 */
export type GateHooks = Readonly<{
  onOperationStart?: (ctx: GateOperationContext) => void;
  onOperationEnd?: (
    ctx: GateOperationContext,
    result: Readonly<{ durationMs: number }>,
  ) => void;
  onError?: (ctx: GateOperationContext, error: Error) => void;
}>;

export type GuardedOperationOptions = Readonly<{
  signal?: AbortSignal;
}>;
