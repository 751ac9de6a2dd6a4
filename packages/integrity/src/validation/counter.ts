import { type ReferenceEdge } from "../core/types";
import { CountingFailureError } from "../errors";
import { type DocumentStore } from "../store/types";
import { type ReferenceCount } from "./types";

/**
 * Counts documents referencing `targetId` along one edge.
 *
 * Issues exactly one read against the edge's collection: an equality match
 * for single-valued fields, array membership for many-valued ones.
 *
 * @throws CountingFailureError if the store rejects or returns a non-count
 */
export async function countReferences(
  store: DocumentStore,
  edge: ReferenceEdge,
  targetId: string,
  options: Readonly<{ signal?: AbortSignal }> = {},
): Promise<ReferenceCount> {
  const { signal } = options;
  const failureDetails = {
    edgeId: edge.id,
    collection: edge.collection,
    field: edge.foreignKeyField,
    targetType: edge.toType,
    targetId,
  };

  let count: number;
  try {
    count = await store.countDocuments(
      edge.collection,
      {
        field: edge.foreignKeyField,
        op: edge.cardinality === "many" ? "contains" : "eq",
        value: targetId,
      },
      signal === undefined ? undefined : { signal },
    );
  } catch (error) {
    // Aborts propagate as-is so callers see their own reason.
    if (signal?.aborted && error === signal.reason) {
      throw error;
    }
    throw new CountingFailureError(failureDetails, { cause: error });
  }

  if (!Number.isSafeInteger(count) || count < 0) {
    throw new CountingFailureError({
      ...failureDetails,
      reason: `Store returned an invalid count: ${String(count)}`,
    });
  }

  return { edge, count };
}
