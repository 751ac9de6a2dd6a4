/**
 * Unit tests for entity integrity error classes.
 */
import { describe, expect, it } from "vitest";

import {
  ConfigurationError,
  CountingFailureError,
  EntityNotFoundError,
  getErrorSuggestion,
  IntegrityError,
  IntegrityViolationError,
  isIntegrityError,
  isIntegrityViolation,
  isSystemError,
  isUserRecoverable,
  UnknownEntityTypeError,
  ValidationError,
} from "../src/errors";
import { workflowGraph } from "../src/domain/workflow";
import { buildReferenceSummary } from "../src/validation/summary";

function protocolSummary(sources: number, destinations: number) {
  const [sourceEdge, destinationEdge] = workflowGraph.edgesInto("Protocol");
  if (!sourceEdge || !destinationEdge) throw new Error("missing edges");
  return buildReferenceSummary("Protocol", "P1", [
    { edge: sourceEdge, count: sources },
    { edge: destinationEdge, count: destinations },
  ]);
}

describe("IntegrityError", () => {
  it("creates error with message, code, and options", () => {
    const error = new IntegrityError("test message", "TEST_CODE", {
      category: "user",
    });
    expect(error.message).toBe("test message");
    expect(error.code).toBe("TEST_CODE");
    expect(error.name).toBe("IntegrityError");
    expect(error.category).toBe("user");
    expect(error.details).toEqual({});
    expect(error.suggestion).toBeUndefined();
  });

  it("renders a user message with the suggestion", () => {
    const error = new IntegrityError("failed", "X", {
      category: "user",
      suggestion: "try again",
    });
    expect(error.toUserMessage()).toBe("failed\n\nSuggestion: try again");
  });

  it("renders a log string with details and cause", () => {
    const error = new IntegrityError("failed", "X", {
      category: "system",
      details: { edgeId: "A.b->C" },
      cause: "socket closed",
    });
    expect(error.toLogString()).toBe(
      [
        "[X] failed",
        "  Category: system",
        '  Details: {"edgeId":"A.b->C"}',
        "  Cause: socket closed",
      ].join("\n"),
    );
  });
});

describe("IntegrityViolationError", () => {
  it("carries the summary and names the blocking types", () => {
    const summary = protocolSummary(2, 0);
    const error = new IntegrityViolationError("blocked", summary);

    expect(error.code).toBe("REFERENTIAL_INTEGRITY_VIOLATION");
    expect(error.category).toBe("constraint");
    expect(error.subjectType).toBe("Protocol");
    expect(error.subjectId).toBe("P1");
    expect(error.summary).toBe(summary);
    expect(error.details).toEqual({
      subjectType: "Protocol",
      subjectId: "P1",
      totalReferences: 2,
      byType: { Source: 2, Destination: 0 },
    });
    expect(error.suggestion).toBe(
      "Remove or re-point the referencing Source entities first, then retry.",
    );
  });

  it("is user recoverable and not a system error", () => {
    const error = new IntegrityViolationError("blocked", protocolSummary(1, 1));
    expect(isIntegrityViolation(error)).toBe(true);
    expect(isUserRecoverable(error)).toBe(true);
    expect(isSystemError(error)).toBe(false);
  });
});

describe("CountingFailureError", () => {
  const details = {
    edgeId: "Source.protocolId->Protocol",
    collection: "sources",
    field: "protocolId",
    targetType: "Protocol",
    targetId: "P1",
  };

  it("keeps the store error as cause only", () => {
    const cause = new Error("connection refused: 10.0.0.5:5432");
    const error = new CountingFailureError(details, { cause });

    expect(error.message).toBe(
      'Failed to count references to Protocol/P1 along "Source.protocolId->Protocol"',
    );
    expect(error.cause).toBe(cause);
    expect(error.code).toBe("COUNTING_FAILURE");
    expect(isSystemError(error)).toBe(true);
    expect(isUserRecoverable(error)).toBe(false);
  });
});

describe("user errors", () => {
  it("ConfigurationError defaults its suggestion", () => {
    const error = new ConfigurationError("bad graph");
    expect(error.code).toBe("CONFIGURATION_ERROR");
    expect(getErrorSuggestion(error)).toBe(
      "Review your entity and reference definitions.",
    );
  });

  it("ValidationError lists the failing fields", () => {
    const error = new ValidationError("Invalid Source", {
      entityType: "Source",
      operation: "create",
      issues: [
        { path: "protocolId", message: "Required" },
        { path: "", message: "Bad root" },
      ],
    });
    expect(error.suggestion).toBe(
      "Check the following fields: protocolId, (root). See error.details.issues for specific validation failures.",
    );
  });

  it("EntityNotFoundError names the entity", () => {
    const error = new EntityNotFoundError("Source", "S9");
    expect(error.message).toBe("Entity not found: Source/S9");
    expect(error.details).toEqual({ entityType: "Source", id: "S9" });
  });

  it("UnknownEntityTypeError names the type", () => {
    const error = new UnknownEntityTypeError("Widget");
    expect(error.message).toBe("Entity type not found: Widget");
    expect(error.code).toBe("UNKNOWN_ENTITY_TYPE");
  });
});

describe("guards", () => {
  it("reject values that are not integrity errors", () => {
    expect(isIntegrityError(new Error("plain"))).toBe(false);
    expect(isIntegrityViolation("blocked")).toBe(false);
    expect(isUserRecoverable(undefined)).toBe(false);
    expect(getErrorSuggestion(new Error("plain"))).toBeUndefined();
  });
});
