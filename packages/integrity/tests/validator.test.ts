/**
 * Tests for the reference validator.
 */
import { beforeEach, describe, expect, it, vi } from "vitest";

import { createMemoryDocumentStore } from "../src/backend/memory";
import { workflowGraph } from "../src/domain/workflow";
import {
  CountingFailureError,
  UnknownEntityTypeError,
} from "../src/errors";
import { DEFAULT_VALIDATION_POLICY, type ValidationPolicy } from "../src/policy";
import { type DocumentStore } from "../src/store/types";
import { type ValidationContext } from "../src/validation/types";
import { createReferenceValidator } from "../src/validation/validator";
import { createTestStore, instrumentStore } from "./test-utils";

const DISABLED: ValidationPolicy = {
  ...DEFAULT_VALIDATION_POLICY,
  enabled: false,
};

async function seedProtocolReferences(store: DocumentStore): Promise<void> {
  await store.insertDocument("protocols", { id: "P1", name: "HTTP" });
  await store.insertDocument("protocols", { id: "P2", name: "FTP" });
  await store.insertDocument("sources", { id: "S1", protocolId: "P1" });
  await store.insertDocument("sources", { id: "S2", protocolId: "P1" });
  await store.insertDocument("sources", { id: "S3", protocolId: "P2" });
  await store.insertDocument("destinations", { id: "D1", protocolId: "P1" });
}

describe("ReferenceValidator", () => {
  describe("Protocol referenced by sources and destinations", () => {
    let store: DocumentStore;

    beforeEach(async () => {
      store = createTestStore(workflowGraph);
      await seedProtocolReferences(store);
    });

    it("rejects deleting a referenced protocol", async () => {
      const validator = createReferenceValidator(workflowGraph, store);

      const verdict = await validator.validateDeletion("Protocol", "P1");

      expect(verdict.isValid).toBe(false);
      expect(verdict.skipped).toBe(false);
      expect(verdict.subjectType).toBe("Protocol");
      expect(verdict.subjectId).toBe("P1");
      expect(verdict.summary.byType).toEqual({ Source: 2, Destination: 1 });
      expect(verdict.summary.totalReferences).toBe(3);
      if (!verdict.isValid) {
        expect(verdict.errorMessage).toBe(
          "Cannot delete/modify Protocol. Found 2 Source reference(s) and 1 Destination reference(s).",
        );
      }
      expect(verdict.validationDurationMs).toBeGreaterThanOrEqual(0);
    });

    it("lists only the non-zero types in the message", async () => {
      const validator = createReferenceValidator(workflowGraph, store);

      const verdict = await validator.validateDeletion("Protocol", "P2");

      expect(verdict.isValid).toBe(false);
      if (!verdict.isValid) {
        expect(verdict.errorMessage).toBe(
          "Cannot delete/modify Protocol. Found 1 Source reference(s).",
        );
      }
    });

    it("accepts a protocol nothing references", async () => {
      await store.insertDocument("protocols", { id: "P3", name: "SFTP" });
      const validator = createReferenceValidator(workflowGraph, store);

      const verdict = await validator.validateDeletion("Protocol", "P3");

      expect(verdict.isValid).toBe(true);
      expect(verdict.summary.totalReferences).toBe(0);
      expect(verdict.summary.byType).toEqual({ Source: 0, Destination: 0 });
    });

    it("validates updates exactly as deletions", async () => {
      const validator = createReferenceValidator(workflowGraph, store);

      const deletion = await validator.validateDeletion("Protocol", "P1");
      const update = await validator.validateUpdate("Protocol", "P1");

      expect(update.isValid).toBe(deletion.isValid);
      expect(update.summary).toEqual(deletion.summary);
    });

    it("sees references removed since the last call", async () => {
      const validator = createReferenceValidator(workflowGraph, store);
      expect((await validator.validateDeletion("Protocol", "P1")).isValid).toBe(
        false,
      );

      await store.removeDocument("sources", "S1");
      await store.removeDocument("sources", "S2");
      await store.removeDocument("destinations", "D1");

      expect((await validator.validateDeletion("Protocol", "P1")).isValid).toBe(
        true,
      );
    });
  });

  describe("edges", () => {
    it("counts array membership for many-valued references", async () => {
      const store = createMemoryDocumentStore();
      await store.insertDocument("flows", { id: "F1", stepIds: ["T1", "T2"] });
      await store.insertDocument("flows", { id: "F2", stepIds: ["T2"] });
      await store.insertDocument("steps", {
        id: "T1",
        entityId: "PR1",
        nextStepIds: ["T2"],
      });
      const validator = createReferenceValidator(workflowGraph, store);

      const verdict = await validator.validateDeletion("Step", "T2");

      expect(verdict.summary.byType).toEqual({ Flow: 2 });
      if (!verdict.isValid) {
        expect(verdict.errorMessage).toBe(
          "Cannot delete/modify Step. Found 2 Flow reference(s).",
        );
      }
    });

    it("accepts a type no edge points at without counting", async () => {
      const store = instrumentStore(createMemoryDocumentStore());
      const validator = createReferenceValidator(workflowGraph, store);

      const verdict = await validator.validateDeletion("OrchestratedFlow", "O1");

      expect(verdict.isValid).toBe(true);
      expect(verdict.summary.counts).toEqual([]);
      expect(store.countCalls).toEqual([]);
    });

    it("rejects an unregistered entity type", async () => {
      const validator = createReferenceValidator(
        workflowGraph,
        createMemoryDocumentStore(),
      );

      await expect(validator.validateDeletion("Widget", "W1")).rejects.toThrow(
        UnknownEntityTypeError,
      );
    });
  });

  describe("policy", () => {
    let store: ReturnType<typeof instrumentStore>;

    beforeEach(async () => {
      store = instrumentStore(createMemoryDocumentStore());
      await seedProtocolReferences(store);
    });

    it("skips every count when the kill switch is off", async () => {
      const onValidationSkipped = vi.fn();
      const onValidationStart = vi.fn();
      const validator = createReferenceValidator(workflowGraph, store, {
        policy: DISABLED,
        hooks: { onValidationSkipped, onValidationStart },
      });

      const verdict = await validator.validateDeletion("Protocol", "P1");

      expect(verdict).toEqual({
        isValid: true,
        subjectType: "Protocol",
        subjectId: "P1",
        summary: {
          subjectType: "Protocol",
          subjectId: "P1",
          counts: [],
          byType: {},
          totalReferences: 0,
          hasReferences: false,
        },
        validationDurationMs: 0,
        skipped: true,
      });
      expect(store.countCalls).toEqual([]);
      expect(onValidationSkipped).toHaveBeenCalledTimes(1);
      expect(onValidationStart).not.toHaveBeenCalled();
    });

    it("still rejects unregistered types when the kill switch is off", async () => {
      const validator = createReferenceValidator(workflowGraph, store, {
        policy: DISABLED,
      });

      await expect(validator.validateUpdate("Widget", "W1")).rejects.toThrow(
        UnknownEntityTypeError,
      );
    });

    it("skips edges turned off by policy", async () => {
      const validator = createReferenceValidator(workflowGraph, store, {
        policy: {
          ...DEFAULT_VALIDATION_POLICY,
          edges: { "Source.protocolId->Protocol": false },
        },
      });

      const verdict = await validator.validateDeletion("Protocol", "P1");

      expect(store.countCalls.map((call) => call.collection)).toEqual([
        "destinations",
      ]);
      expect(verdict.summary.byType).toEqual({ Destination: 1 });
      if (!verdict.isValid) {
        expect(verdict.errorMessage).toBe(
          "Cannot delete/modify Protocol. Found 1 Destination reference(s).",
        );
      }
    });

    it("resolves a policy function on every call", async () => {
      let enabled = true;
      const validator = createReferenceValidator(workflowGraph, store, {
        policy: () => ({ ...DEFAULT_VALIDATION_POLICY, enabled }),
      });

      expect((await validator.validateDeletion("Protocol", "P1")).skipped).toBe(
        false,
      );
      enabled = false;
      expect((await validator.validateDeletion("Protocol", "P1")).skipped).toBe(
        true,
      );
    });

    it("counts sequentially when parallel validation is off", async () => {
      const validator = createReferenceValidator(workflowGraph, store, {
        policy: { ...DEFAULT_VALIDATION_POLICY, parallel: false },
      });

      const verdict = await validator.validateDeletion("Protocol", "P1");

      expect(verdict.summary.totalReferences).toBe(3);
      expect(store.countCalls.map((call) => call.collection)).toEqual([
        "sources",
        "destinations",
      ]);
    });
  });

  describe("getReferences", () => {
    it("counts even when the kill switch is off", async () => {
      const store = createMemoryDocumentStore();
      await seedProtocolReferences(store);
      const validator = createReferenceValidator(workflowGraph, store, {
        policy: DISABLED,
      });

      const summary = await validator.getReferences("Protocol", "P1");

      expect(summary.byType).toEqual({ Source: 2, Destination: 1 });
      expect(summary.hasReferences).toBe(true);
    });

    it("reports the inspect operation to hooks", async () => {
      const contexts: ValidationContext[] = [];
      const validator = createReferenceValidator(
        workflowGraph,
        createMemoryDocumentStore(),
        { hooks: { onValidationStart: (ctx) => contexts.push(ctx) } },
      );

      await validator.getReferences("Flow", "F1");

      expect(contexts.map((ctx) => ctx.operation)).toEqual(["inspect"]);
    });

    it("ends every inspection it starts, without a verdict", async () => {
      const store = createMemoryDocumentStore();
      await seedProtocolReferences(store);
      const events: string[] = [];
      const validator = createReferenceValidator(workflowGraph, store, {
        hooks: {
          onValidationStart: (ctx) => {
            events.push(`start ${ctx.validationId}`);
          },
          onValidationEnd: (ctx, { summary, verdict }) => {
            events.push(`end ${ctx.validationId}`);
            expect(verdict).toBeUndefined();
            expect(summary.totalReferences).toBe(3);
          },
        },
      });

      await validator.getReferences("Protocol", "P1");

      expect(events).toHaveLength(2);
      expect(events[1]).toBe(events[0]?.replace("start", "end"));
    });
  });

  describe("hooks", () => {
    it("reports start, each count and the verdict", async () => {
      const store = createMemoryDocumentStore();
      await seedProtocolReferences(store);
      const events: string[] = [];
      const validator = createReferenceValidator(workflowGraph, store, {
        policy: { ...DEFAULT_VALIDATION_POLICY, parallel: false },
        hooks: {
          onValidationStart: (ctx) => {
            events.push(`start ${ctx.operation} ${ctx.entityType}/${ctx.entityId}`);
          },
          onCountEnd: (_ctx, { edge, count }) => {
            events.push(`count ${edge.id}=${count}`);
          },
          onValidationEnd: (_ctx, { verdict }) => {
            events.push(`end ${String(verdict?.isValid)}`);
          },
        },
      });

      await validator.validateUpdate("Protocol", "P1");

      expect(events).toEqual([
        "start update Protocol/P1",
        "count Source.protocolId->Protocol=2",
        "count Destination.protocolId->Protocol=1",
        "end false",
      ]);
    });

    it("gives each call its own validation id", async () => {
      const ids: string[] = [];
      const validator = createReferenceValidator(
        workflowGraph,
        createMemoryDocumentStore(),
        { hooks: { onValidationStart: (ctx) => ids.push(ctx.validationId) } },
      );

      await validator.validateDeletion("Protocol", "P1");
      await validator.validateDeletion("Protocol", "P1");

      expect(ids).toHaveLength(2);
      expect(ids[0]).not.toBe(ids[1]);
    });

    it("reports counting failures and fails closed", async () => {
      const cause = new Error("connection reset");
      const store = instrumentStore(createMemoryDocumentStore(), {
        failures: { destinations: cause },
      });
      const onError = vi.fn();
      const onValidationEnd = vi.fn();
      const validator = createReferenceValidator(workflowGraph, store, {
        hooks: { onError, onValidationEnd },
      });

      const error = await validator
        .validateDeletion("Protocol", "P1")
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(CountingFailureError);
      if (error instanceof CountingFailureError) {
        expect(error.details.edgeId).toBe("Destination.protocolId->Protocol");
        expect(error.cause).toBe(cause);
      }
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[1]).toBe(error);
      expect(onValidationEnd).not.toHaveBeenCalled();
    });
  });
});
