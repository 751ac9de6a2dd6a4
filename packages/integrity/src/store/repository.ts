import { type z } from "zod";

import { type EntityDocument, type EntityState } from "../core/types";
import {
  EntityNotFoundError,
  type ValidationErrorDetails,
  ValidationError,
  type ValidationIssue,
} from "../errors";
import { type ReferenceGraph } from "../registry/reference-graph";
import { type DocumentStore, type EntityRepository } from "./types";

function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Entity persistence over a document store. State is validated against the
 * entity's schema; reference integrity is not checked here.
 */
export class DocumentRepository implements EntityRepository {
  readonly #graph: ReferenceGraph;
  readonly #store: DocumentStore;

  constructor(graph: ReferenceGraph, store: DocumentStore) {
    this.#graph = graph;
    this.#store = store;
  }

  async getById(type: string, id: string): Promise<EntityDocument | undefined> {
    return this.#store.getDocument(this.#graph.collectionOf(type), id);
  }

  async create(type: string, state: EntityState): Promise<EntityDocument> {
    const collection = this.#graph.collectionOf(type);
    const fields = this.#parse(type, state, { operation: "create", id: state.id });
    return this.#store.insertDocument(
      collection,
      state.id === undefined ? fields : { ...fields, id: state.id },
    );
  }

  /**
   * Replaces the entity's fields. `state.id`, when present and different,
   * re-keys the entity.
   *
   * @throws EntityNotFoundError if nothing is stored under `id`
   */
  async update(
    type: string,
    id: string,
    state: EntityState,
  ): Promise<EntityDocument> {
    const collection = this.#graph.collectionOf(type);
    const fields = this.#parse(type, state, { operation: "update", id });
    const document = { ...fields, id: state.id ?? id };

    const replaced = await this.#store.replaceDocument(collection, id, document);
    if (!replaced) {
      throw new EntityNotFoundError(type, id);
    }
    return document;
  }

  /**
   * @throws EntityNotFoundError if nothing is stored under `id`
   */
  async delete(type: string, id: string): Promise<void> {
    const removed = await this.#store.removeDocument(
      this.#graph.collectionOf(type),
      id,
    );
    if (!removed) {
      throw new EntityNotFoundError(type, id);
    }
  }

  #parse(
    type: string,
    state: EntityState,
    context: Pick<ValidationErrorDetails, "operation" | "id">,
  ): Record<string, unknown> {
    // Unknown keys, `id` included, are stripped by the object schema.
    const result = this.#graph.getEntity(type).schema.safeParse(state);
    if (!result.success) {
      throw new ValidationError(
        `Invalid ${type}: ${result.error.issues.map((issue) => issue.message).join("; ")}`,
        {
          entityType: type,
          operation: context.operation,
          ...(context.id === undefined ? {} : { id: context.id }),
          issues: toValidationIssues(result.error),
        },
        { cause: result.error },
      );
    }
    return result.data;
  }
}

export function createDocumentRepository(
  graph: ReferenceGraph,
  store: DocumentStore,
): EntityRepository {
  return new DocumentRepository(graph, store);
}
