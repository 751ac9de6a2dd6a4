import { type EntityDocument, type EntityState } from "../core/types";
import { type EntityRepository } from "../store/types";
import { generateId } from "../utils/id";
import { verdictToError } from "../validation/summary";
import { type ReferenceValidator } from "../validation/validator";
import {
  type GateHooks,
  type GateOperationContext,
  type GuardedOperationOptions,
} from "./types";

export type IntegrityGateOptions = Readonly<{
  validator: ReferenceValidator;
  repository: EntityRepository;
  hooks?: GateHooks;
}>;

/**
 * Wraps a repository's update and delete so they only run once the
 * validator finds no remaining references.
 *
 * A rejected operation never reaches the repository. The check and the
 * write are not atomic: a reference created in between is not seen.
 */
export class IntegrityGate {
  readonly #validator: ReferenceValidator;
  readonly #repository: EntityRepository;
  readonly #hooks: GateHooks;

  constructor(options: IntegrityGateOptions) {
    this.#validator = options.validator;
    this.#repository = options.repository;
    this.#hooks = options.hooks ?? {};
  }

  /**
   * Deletes `type`/`id` if nothing references it.
   *
   * @throws IntegrityViolationError if references remain
   * @throws EntityNotFoundError from the repository if the entity is missing
   */
  async guardedDelete(
    type: string,
    id: string,
    options: GuardedOperationOptions = {},
  ): Promise<void> {
    const ctx = this.#createContext("delete", type, id);
    return this.#withOperationHooks(ctx, async () => {
      const verdict = await this.#validator.validateDeletion(type, id, options);
      const violation = verdictToError(verdict);
      if (violation) throw violation;
      return this.#repository.delete(type, id);
    });
  }

  /**
   * Updates `type`/`id` if nothing references it. When `newState.id`
   * re-keys the entity, the old id is the one validated.
   *
   * @throws IntegrityViolationError if references remain
   * @throws EntityNotFoundError from the repository if the entity is missing
   */
  async guardedUpdate(
    type: string,
    id: string,
    newState: EntityState,
    options: GuardedOperationOptions = {},
  ): Promise<EntityDocument> {
    const ctx = this.#createContext("update", type, id);
    return this.#withOperationHooks(ctx, async () => {
      const verdict = await this.#validator.validateUpdate(type, id, options);
      const violation = verdictToError(verdict);
      if (violation) throw violation;
      return this.#repository.update(type, id, newState);
    });
  }

  // === Internal: Hook Helpers ===

  #createContext(
    operation: GateOperationContext["operation"],
    entityType: string,
    entityId: string,
  ): GateOperationContext {
    return {
      operationId: generateId(),
      operation,
      entityType,
      entityId,
      startedAt: new Date(),
    };
  }

  async #withOperationHooks<T>(
    ctx: GateOperationContext,
    fn: () => Promise<T>,
  ): Promise<T> {
    this.#hooks.onOperationStart?.(ctx);
    const startTime = Date.now();
    try {
      const result = await fn();
      this.#hooks.onOperationEnd?.(ctx, {
        durationMs: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.#hooks.onError?.(
        ctx,
        error instanceof Error ? error : new Error(String(error)),
      );
      throw error;
    }
  }
}

export function createIntegrityGate(options: IntegrityGateOptions): IntegrityGate {
  return new IntegrityGate(options);
}
