import { type z } from "zod";

// ============================================================
// Brands
// ============================================================

/** Brand key for EntityDefinition */
export const ENTITY_BRAND = "__entity" as const;

/** Brand key for ReferenceDeclaration */
export const REFERENCE_BRAND = "__reference" as const;

// ============================================================
// Entity Definitions
// ============================================================

/**
 * Zod object schema describing an entity's document fields (excluding `id`).
 */
export type EntitySchema = z.ZodObject<z.ZodRawShape>;

/**
 * One managed kind of business object, stored in its own collection.
 */
export type EntityDefinition<
  K extends string = string,
  S extends EntitySchema = EntitySchema,
> = Readonly<{
  [ENTITY_BRAND]: true;
  name: K;
  collection: string;
  schema: S;
  description: string | undefined;
}>;

/**
 * Field names of an entity's schema.
 */
export type EntityField<E extends EntityDefinition> = keyof E["schema"]["shape"] &
  string;

/**
 * A stored entity document. `id` is the identity-bearing field.
 */
export type EntityDocument = Readonly<{ id: string } & Record<string, unknown>>;

/**
 * Fields supplied when creating or updating an entity. An `id` that differs
 * from the current one re-keys the document.
 */
export type EntityState = Readonly<{ id?: string } & Record<string, unknown>>;

// ============================================================
// References
// ============================================================

/**
 * Whether the foreign-key field holds one id or an array of ids.
 */
export type Cardinality = "single" | "many";

/**
 * A reference declared with `reference()`, not yet resolved into a graph.
 */
export type ReferenceDeclaration<
  From extends EntityDefinition = EntityDefinition,
  To extends EntityDefinition = EntityDefinition,
> = Readonly<{
  [REFERENCE_BRAND]: true;
  from: From;
  to: To;
  foreignKeyField: EntityField<From>;
  cardinality: Cardinality;
  flag: string;
}>;

/**
 * A resolved edge of the reference graph: documents of `fromType`, stored in
 * `collection`, point at `toType` through `foreignKeyField`.
 */
export type ReferenceEdge = Readonly<{
  /** Stable identifier, e.g. "Source.protocolId->Protocol" */
  id: string;
  fromType: string;
  toType: string;
  foreignKeyField: string;
  cardinality: Cardinality;
  /** Backing collection of `fromType` */
  collection: string;
  /** Policy flag that toggles validation of this edge */
  flag: string;
}>;
