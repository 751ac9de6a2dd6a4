/**
 * Validation policy: the kill switch, the parallel flag and one toggle per
 * reference edge.
 *
 * Policies are plain values. Hosts that keep flags in an external
 * configuration source use `createFlagPolicySource`, which re-reads the flags
 * on every validation call so changes apply without a restart.
 */
import { z } from "zod";

import { type ReferenceEdge } from "../core/types";
import { ConfigurationError } from "../errors";
import { type ReferenceGraph } from "../registry/reference-graph";
import { err, ok, type Result, unwrap } from "../utils/result";

// ============================================================
// Types
// ============================================================

export type ValidationPolicy = Readonly<{
  /** Kill switch. When false every validation is valid and skipped. */
  enabled: boolean;
  /** Count all edges concurrently instead of one at a time */
  parallel: boolean;
  /** Per-edge toggles keyed by edge id. A missing entry means "validate". */
  edges: Readonly<Record<string, boolean>>;
}>;

/**
 * A fixed policy, or a function resolved at the start of every call.
 */
export type PolicySource = ValidationPolicy | (() => ValidationPolicy);

/**
 * Raw flag values as read from configuration. Booleans and boolean strings
 * ("true", "0", "off", ...) are accepted.
 */
export type PolicyFlags = Readonly<Record<string, unknown>>;

// ============================================================
// Constants
// ============================================================

export const VALIDATION_ENABLED_FLAG = "Features:ReferentialIntegrityValidation";

export const PARALLEL_VALIDATION_FLAG =
  "ReferentialIntegrity:EnableParallelValidation";

export const DEFAULT_VALIDATION_POLICY: ValidationPolicy = Object.freeze({
  enabled: true,
  parallel: true,
  edges: Object.freeze({}),
});

const flagValueSchema = z.union([z.boolean(), z.stringbool()]).optional();

// ============================================================
// Resolution
// ============================================================

export function resolvePolicy(source: PolicySource): ValidationPolicy {
  return typeof source === "function" ? source() : source;
}

export function isEdgeEnabled(
  policy: ValidationPolicy,
  edge: ReferenceEdge,
): boolean {
  return policy.edges[edge.id] !== false;
}

// ============================================================
// Flag Parsing
// ============================================================

/**
 * All flag names a graph's policy reads: the kill switch, the parallel flag
 * and each edge flag.
 */
export function policyFlagNames(graph: ReferenceGraph): readonly string[] {
  return [VALIDATION_ENABLED_FLAG, PARALLEL_VALIDATION_FLAG, ...graph.flags];
}

/**
 * Parses raw flag values into a policy. Absent flags default to true.
 */
export function parsePolicyFlags(
  graph: ReferenceGraph,
  flags: PolicyFlags,
): Result<ValidationPolicy, ConfigurationError> {
  const values = new Map<string, boolean>();
  const invalid: { flag: string; value: unknown; message: string }[] = [];

  for (const flag of policyFlagNames(graph)) {
    const raw = flags[flag];
    const parsed = flagValueSchema.safeParse(raw);
    if (parsed.success) {
      values.set(flag, parsed.data ?? true);
    } else {
      invalid.push({
        flag,
        value: raw,
        message: parsed.error.issues[0]?.message ?? "Invalid boolean",
      });
    }
  }

  if (invalid.length > 0) {
    return err(
      new ConfigurationError(
        `Invalid validation policy flags: ${invalid.map((entry) => entry.flag).join(", ")}`,
        { invalid },
        {
          suggestion: `Use true/false, 1/0, yes/no, on/off or enabled/disabled.`,
        },
      ),
    );
  }

  const edges: Record<string, boolean> = {};
  for (const edge of graph.edges) {
    edges[edge.id] = values.get(edge.flag) ?? true;
  }

  return ok(
    Object.freeze({
      enabled: values.get(VALIDATION_ENABLED_FLAG) ?? true,
      parallel: values.get(PARALLEL_VALIDATION_FLAG) ?? true,
      edges: Object.freeze(edges),
    }),
  );
}

/**
 * Parses flags into a policy, throwing on invalid values. Intended for
 * startup, where a bad flag should stop the process.
 *
 * @throws ConfigurationError
 */
export function loadValidationPolicy(
  graph: ReferenceGraph,
  flags: PolicyFlags,
): ValidationPolicy {
  return unwrap(parsePolicyFlags(graph, flags));
}

export type FlagPolicySourceOptions = Readonly<{
  /**
   * Receives errors from re-reads after startup. Defaults to
   * `console.warn(error.toLogString())`.
   */
  onError?: (error: ConfigurationError) => void;
}>;

function warnPolicyError(error: ConfigurationError): void {
  console.warn(
    `[entity-integrity] Keeping previous validation policy.\n${error.toLogString()}`,
  );
}

/**
 * Creates a policy source backed by a flag reader.
 *
 * The flags are parsed once immediately, and an invalid initial read throws.
 * Each later call re-reads them; when a re-read is invalid the last good
 * policy stays in force and the error is reported through `onError`.
 *
 * @throws ConfigurationError if the initial flags are invalid
 */
export function createFlagPolicySource(
  graph: ReferenceGraph,
  readFlags: () => PolicyFlags,
  options: FlagPolicySourceOptions = {},
): () => ValidationPolicy {
  const report = options.onError ?? warnPolicyError;
  let current = loadValidationPolicy(graph, readFlags());

  return () => {
    const result = parsePolicyFlags(graph, readFlags());
    if (result.success) {
      current = result.data;
    } else {
      report(result.error);
    }
    return current;
  };
}

// ============================================================
// Environment
// ============================================================

/**
 * Environment variable name for a flag: ":" becomes "__", upper-cased.
 *
 * @example
 * ```typescript
 * flagEnvName("Features:ReferentialIntegrityValidation");
 * // "FEATURES__REFERENTIALINTEGRITYVALIDATION"
 * ```
 */
export function flagEnvName(flag: string): string {
  return flag.replaceAll(":", "__").toUpperCase();
}

/**
 * Reads the graph's policy flags from environment variables. Unset
 * variables are left out, so they default to true.
 */
export function readPolicyFlagsFromEnv(
  graph: ReferenceGraph,
  env: Readonly<Record<string, string | undefined>> = process.env,
): PolicyFlags {
  const flags: Record<string, string> = {};
  for (const flag of policyFlagNames(graph)) {
    const value = env[flagEnvName(flag)];
    if (value !== undefined) {
      flags[flag] = value;
    }
  }
  return flags;
}
