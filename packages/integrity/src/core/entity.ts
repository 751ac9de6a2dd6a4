import { ConfigurationError } from "../errors";
import { ENTITY_BRAND, type EntityDefinition, type EntitySchema } from "./types";

/**
 * Property names reserved for system use. Documents carry `id` outside the
 * schema.
 */
const RESERVED_ENTITY_KEYS = new Set(["id", "_id"]);

/**
 * Collection and field names are spliced into store queries and index DDL,
 * so they are restricted to plain identifiers.
 */
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isPlainIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

/**
 * Options for defining an entity type.
 */
export type DefineEntityOptions<S extends EntitySchema> = Readonly<{
  /** Backing collection name */
  collection: string;
  /** Zod schema for document fields */
  schema: S;
  /** Optional description for documentation */
  description?: string;
}>;

function validateEntity(name: string, collection: string, schema: EntitySchema) {
  if (!isPlainIdentifier(name)) {
    throw new ConfigurationError(
      `Entity name "${name}" is not a valid identifier`,
      { entityType: name },
    );
  }

  if (!isPlainIdentifier(collection)) {
    throw new ConfigurationError(
      `Collection name "${collection}" for entity "${name}" is not a valid identifier`,
      { entityType: name, collection },
      {
        suggestion: `Use letters, digits and underscores only, starting with a letter or underscore.`,
      },
    );
  }

  const fields = Object.keys(schema.shape);
  const reserved = fields.filter((field) => RESERVED_ENTITY_KEYS.has(field));
  if (reserved.length > 0) {
    throw new ConfigurationError(
      `Entity "${name}" schema contains reserved property names: ${reserved.join(", ")}`,
      { entityType: name, reserved, reservedKeys: [...RESERVED_ENTITY_KEYS] },
      {
        suggestion: `Remove the conflicting properties. "id" is added to every document automatically.`,
      },
    );
  }

  const invalid = fields.filter((field) => !isPlainIdentifier(field));
  if (invalid.length > 0) {
    throw new ConfigurationError(
      `Entity "${name}" schema contains field names that are not identifiers: ${invalid.join(", ")}`,
      { entityType: name, invalid },
    );
  }
}

/**
 * Creates an entity type definition.
 *
 * @example
 * ```typescript
 * const Protocol = defineEntity("Protocol", {
 *   collection: "protocols",
 *   schema: z.object({ name: z.string().min(1) }),
 * });
 * ```
 */
export function defineEntity<K extends string, S extends EntitySchema>(
  name: K,
  options: DefineEntityOptions<S>,
): EntityDefinition<K, S> {
  validateEntity(name, options.collection, options.schema);

  return Object.freeze({
    [ENTITY_BRAND]: true as const,
    name,
    collection: options.collection,
    schema: options.schema,
    description: options.description,
  });
}
