/**
 * In-process document store backed by Maps.
 *
 * Same semantics as the SQL stores. Used by tests and examples.
 */
import { type EntityDocument, type EntityState } from "../../core/types";
import {
  type CountFilter,
  type CountOptions,
  type DocumentStore,
} from "../../store/types";
import { nowIso } from "../../utils/date";
import { generateId } from "../../utils/id";

type StoredDocument = Readonly<{
  body: Readonly<Record<string, unknown>>;
  createdAt: string;
  updatedAt: string;
}>;

function splitId(
  document: EntityState,
): [string | undefined, Record<string, unknown>] {
  const { id, ...body } = document;
  return [id, structuredClone(body)];
}

function matches(body: Readonly<Record<string, unknown>>, filter: CountFilter) {
  const value = body[filter.field];
  if (filter.op === "eq") {
    return value === filter.value;
  }
  return Array.isArray(value) && value.includes(filter.value);
}

export class MemoryDocumentStore implements DocumentStore {
  readonly #collections = new Map<string, Map<string, StoredDocument>>();

  #collection(name: string): Map<string, StoredDocument> {
    let documents = this.#collections.get(name);
    if (!documents) {
      documents = new Map();
      this.#collections.set(name, documents);
    }
    return documents;
  }

  async countDocuments(
    collection: string,
    filter: CountFilter,
    options?: CountOptions,
  ): Promise<number> {
    options?.signal?.throwIfAborted();
    let count = 0;
    for (const { body } of this.#collection(collection).values()) {
      if (matches(body, filter)) count++;
    }
    return count;
  }

  async getDocument(
    collection: string,
    id: string,
  ): Promise<EntityDocument | undefined> {
    const stored = this.#collection(collection).get(id);
    if (stored === undefined) return undefined;
    return { ...structuredClone(stored.body), id };
  }

  async insertDocument(
    collection: string,
    document: EntityState,
  ): Promise<EntityDocument> {
    const documents = this.#collection(collection);
    const [givenId, body] = splitId(document);
    const id = givenId ?? generateId();
    if (documents.has(id)) {
      throw new Error(`Document ${collection}/${id} already exists`);
    }
    const now = nowIso();
    documents.set(id, { body, createdAt: now, updatedAt: now });
    return { ...structuredClone(body), id };
  }

  async replaceDocument(
    collection: string,
    id: string,
    document: EntityDocument,
  ): Promise<boolean> {
    const documents = this.#collection(collection);
    const existing = documents.get(id);
    if (existing === undefined) return false;

    const [nextId = id, body] = splitId(document);
    if (nextId !== id && documents.has(nextId)) {
      throw new Error(`Document ${collection}/${nextId} already exists`);
    }

    documents.delete(id);
    documents.set(nextId, {
      body,
      createdAt: existing.createdAt,
      updatedAt: nowIso(),
    });
    return true;
  }

  async removeDocument(collection: string, id: string): Promise<boolean> {
    return this.#collection(collection).delete(id);
  }

  async close(): Promise<void> {
    this.#collections.clear();
  }
}

export function createMemoryDocumentStore(): DocumentStore {
  return new MemoryDocumentStore();
}
