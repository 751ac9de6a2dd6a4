import { type EntityDocument, type EntityState } from "../core/types";

// ============================================================
// Document Store
// ============================================================

/**
 * Filter for counting documents by one field.
 *
 * - `eq`: the field holds exactly `value`
 * - `contains`: the field is an array that includes `value`
 */
export type CountFilter = Readonly<{
  field: string;
  op: "eq" | "contains";
  value: string;
}>;

export type CountOptions = Readonly<{
  signal?: AbortSignal;
}>;

/**
 * Schema-less document storage keyed by collection and id.
 *
 * Stores provide no foreign-key enforcement of their own; integrity is
 * checked by counting referencing documents before a write.
 */
export interface DocumentStore {
  /**
   * Counts documents in `collection` matching `filter`. Read-only.
   * Rejects with `signal.reason` when the signal is aborted.
   */
  countDocuments(
    collection: string,
    filter: CountFilter,
    options?: CountOptions,
  ): Promise<number>;

  getDocument(collection: string, id: string): Promise<EntityDocument | undefined>;

  /**
   * Inserts a document. An id is generated when `document.id` is absent.
   */
  insertDocument(collection: string, document: EntityState): Promise<EntityDocument>;

  /**
   * Replaces the document stored under `id`. A different `document.id`
   * re-keys it. Returns false when nothing is stored under `id`.
   */
  replaceDocument(
    collection: string,
    id: string,
    document: EntityDocument,
  ): Promise<boolean>;

  removeDocument(collection: string, id: string): Promise<boolean>;

  close(): Promise<void>;
}

// ============================================================
// Entity Repository
// ============================================================

/**
 * Plain persistence for entities, with no integrity checks. The integrity
 * gate wraps it.
 */
export interface EntityRepository {
  getById(type: string, id: string): Promise<EntityDocument | undefined>;

  create(type: string, state: EntityState): Promise<EntityDocument>;

  /**
   * @throws EntityNotFoundError if no entity is stored under `id`
   */
  update(type: string, id: string, state: EntityState): Promise<EntityDocument>;

  /**
   * @throws EntityNotFoundError if no entity is stored under `id`
   */
  delete(type: string, id: string): Promise<void>;
}
