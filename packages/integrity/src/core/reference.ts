import { z } from "zod";

import { ConfigurationError } from "../errors";
import {
  type Cardinality,
  type EntityDefinition,
  type EntityField,
  REFERENCE_BRAND,
  type ReferenceDeclaration,
  type ReferenceEdge,
} from "./types";

export type ReferenceOptions = Readonly<{
  /**
   * Policy flag that toggles validation of this reference.
   * Defaults to `ReferentialIntegrity:Validate<From>To<To>References`.
   */
  flag?: string;
}>;

/**
 * Array-valued fields hold many ids; optional, nullable and default wrappers
 * are looked through.
 */
function isArrayField(field: unknown): boolean {
  if (
    field instanceof z.ZodOptional ||
    field instanceof z.ZodNullable ||
    field instanceof z.ZodDefault
  ) {
    return isArrayField(field.unwrap());
  }
  return field instanceof z.ZodArray;
}

export function defaultReferenceFlag(fromType: string, toType: string): string {
  return `ReferentialIntegrity:Validate${fromType}To${toType}References`;
}

/**
 * Declares that documents of `from` reference `to` through `foreignKeyField`.
 *
 * Cardinality follows the field's schema: an array of ids is "many",
 * anything else is "single".
 *
 * @example
 * ```typescript
 * const sourceProtocol = reference(Source, "protocolId", Protocol, {
 *   flag: "ReferentialIntegrity:ValidateSourceReferences",
 * });
 * const flowSteps = reference(Flow, "stepIds", Step); // many
 * ```
 */
export function reference<
  From extends EntityDefinition,
  To extends EntityDefinition,
>(
  from: From,
  foreignKeyField: EntityField<From>,
  to: To,
  options: ReferenceOptions = {},
): ReferenceDeclaration<From, To> {
  const shape: Record<string, unknown> = from.schema.shape;
  if (!(foreignKeyField in shape)) {
    throw new ConfigurationError(
      `Reference field "${foreignKeyField}" is not declared on entity "${from.name}"`,
      {
        fromType: from.name,
        toType: to.name,
        foreignKeyField,
        availableFields: Object.keys(shape),
      },
    );
  }

  const cardinality: Cardinality =
    isArrayField(shape[foreignKeyField]) ? "many" : "single";

  return Object.freeze({
    [REFERENCE_BRAND]: true as const,
    from,
    to,
    foreignKeyField,
    cardinality,
    flag: options.flag ?? defaultReferenceFlag(from.name, to.name),
  });
}

/**
 * Stable edge identifier, e.g. "Flow.stepIds->Step".
 */
export function referenceEdgeId(
  fromType: string,
  foreignKeyField: string,
  toType: string,
): string {
  return `${fromType}.${foreignKeyField}->${toType}`;
}

/**
 * Resolves a declaration into a graph edge.
 */
export function toReferenceEdge(declaration: ReferenceDeclaration): ReferenceEdge {
  const fromType = declaration.from.name;
  const toType = declaration.to.name;
  return Object.freeze({
    id: referenceEdgeId(fromType, declaration.foreignKeyField, toType),
    fromType,
    toType,
    foreignKeyField: declaration.foreignKeyField,
    cardinality: declaration.cardinality,
    collection: declaration.from.collection,
    flag: declaration.flag,
  });
}
