import { toReferenceEdge } from "../core/reference";
import {
  type EntityDefinition,
  type ReferenceDeclaration,
  type ReferenceEdge,
} from "../core/types";
import { ConfigurationError, UnknownEntityTypeError } from "../errors";

export type ReferenceGraphInput = Readonly<{
  entities: readonly EntityDefinition[];
  references: readonly ReferenceDeclaration[];
}>;

// ============================================================
// Reference Graph
// ============================================================

/**
 * Static declaration of which entity types point at which, and through
 * which field. Built once, never mutated.
 *
 * Edge order is declaration order everywhere, which keeps rendered
 * violation messages reproducible.
 */
export class ReferenceGraph {
  readonly entityTypes: readonly string[];
  readonly edges: readonly ReferenceEdge[];
  /** Distinct edge flag names, in declaration order */
  readonly flags: readonly string[];

  readonly #entities: ReadonlyMap<string, EntityDefinition>;
  readonly #incoming: ReadonlyMap<string, readonly ReferenceEdge[]>;
  readonly #outgoing: ReadonlyMap<string, readonly ReferenceEdge[]>;

  constructor(
    entities: ReadonlyMap<string, EntityDefinition>,
    edges: readonly ReferenceEdge[],
  ) {
    this.#entities = entities;
    this.entityTypes = Object.freeze([...entities.keys()]);
    this.edges = Object.freeze([...edges]);
    this.flags = Object.freeze([...new Set(edges.map((edge) => edge.flag))]);
    this.#incoming = groupEdges(edges, (edge) => edge.toType);
    this.#outgoing = groupEdges(edges, (edge) => edge.fromType);
  }

  /**
   * Edges whose `toType` is `type` ("who points at me"). Unknown and
   * unreferenced types yield an empty list.
   */
  edgesInto(type: string): readonly ReferenceEdge[] {
    return this.#incoming.get(type) ?? [];
  }

  /**
   * Edges whose `fromType` is `type`.
   */
  edgesFrom(type: string): readonly ReferenceEdge[] {
    return this.#outgoing.get(type) ?? [];
  }

  hasEntity(type: string): boolean {
    return this.#entities.has(type);
  }

  /**
   * @throws UnknownEntityTypeError if the type is not registered
   */
  getEntity(type: string): EntityDefinition {
    const entity = this.#entities.get(type);
    if (entity === undefined) {
      throw new UnknownEntityTypeError(type);
    }
    return entity;
  }

  collectionOf(type: string): string {
    return this.getEntity(type).collection;
  }
}

function groupEdges(
  edges: readonly ReferenceEdge[],
  keyOf: (edge: ReferenceEdge) => string,
): ReadonlyMap<string, readonly ReferenceEdge[]> {
  const groups = new Map<string, ReferenceEdge[]>();
  for (const edge of edges) {
    const key = keyOf(edge);
    const group = groups.get(key);
    if (group) {
      group.push(edge);
    } else {
      groups.set(key, [edge]);
    }
  }
  const frozen = new Map<string, readonly ReferenceEdge[]>();
  for (const [key, group] of groups) {
    frozen.set(key, Object.freeze(group));
  }
  return frozen;
}

// ============================================================
// Construction
// ============================================================

function registerEntities(
  entities: readonly EntityDefinition[],
): Map<string, EntityDefinition> {
  const byName = new Map<string, EntityDefinition>();
  const collections = new Map<string, string>();

  for (const entity of entities) {
    if (byName.has(entity.name)) {
      throw new ConfigurationError(
        `Entity type "${entity.name}" is declared more than once`,
        { entityType: entity.name },
      );
    }
    const owner = collections.get(entity.collection);
    if (owner !== undefined) {
      throw new ConfigurationError(
        `Collection "${entity.collection}" is used by both "${owner}" and "${entity.name}"`,
        { collection: entity.collection, entityTypes: [owner, entity.name] },
        { suggestion: `Give each entity type its own collection.` },
      );
    }
    byName.set(entity.name, entity);
    collections.set(entity.collection, entity.name);
  }

  return byName;
}

function resolveEdge(
  declaration: ReferenceDeclaration,
  entities: ReadonlyMap<string, EntityDefinition>,
): ReferenceEdge {
  const missing = [declaration.from.name, declaration.to.name].filter(
    (name) => !entities.has(name),
  );
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Reference "${declaration.from.name}.${declaration.foreignKeyField}" points between unregistered entity types: ${missing.join(", ")}`,
      {
        fromType: declaration.from.name,
        toType: declaration.to.name,
        missing,
        registered: [...entities.keys()],
      },
      { suggestion: `Add ${missing.join(", ")} to the entities list.` },
    );
  }

  if (!(declaration.foreignKeyField in declaration.from.schema.shape)) {
    throw new ConfigurationError(
      `Reference field "${declaration.foreignKeyField}" is not declared on entity "${declaration.from.name}"`,
      {
        fromType: declaration.from.name,
        toType: declaration.to.name,
        foreignKeyField: declaration.foreignKeyField,
      },
    );
  }

  return toReferenceEdge(declaration);
}

/**
 * Builds the reference graph from entity definitions and reference
 * declarations.
 *
 * @example
 * ```typescript
 * const graph = defineReferenceGraph({
 *   entities: [Protocol, Source],
 *   references: [reference(Source, "protocolId", Protocol)],
 * });
 *
 * graph.edgesInto("Protocol"); // [Source.protocolId->Protocol]
 * ```
 *
 * @throws ConfigurationError on duplicate names, unknown endpoints or
 *   missing foreign-key fields
 */
export function defineReferenceGraph(input: ReferenceGraphInput): ReferenceGraph {
  const entities = registerEntities(input.entities);

  const edges: ReferenceEdge[] = [];
  const seen = new Set<string>();
  for (const declaration of input.references) {
    const edge = resolveEdge(declaration, entities);
    if (seen.has(edge.id)) {
      throw new ConfigurationError(
        `Reference "${edge.id}" is declared more than once`,
        { edgeId: edge.id },
      );
    }
    seen.add(edge.id);
    edges.push(edge);
  }

  return new ReferenceGraph(entities, edges);
}
