import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { stepFailureSchema } from "@/lib/contracts";
import { ConnectionError, QueryTimeoutError, toStepFailure } from "@/server/errors";

describe("toStepFailure", () => {
  it("keeps the kind and retry flag of a known failure", () => {
    assert.deepEqual(toStepFailure(new QueryTimeoutError("Graph query timed out:\n  slow scan")), {
      kind: "QueryTimeoutError",
      message: "Graph query timed out: slow scan",
      retryable: true,
    });
    assert.deepEqual(toStepFailure(new ConnectionError("Graph store unreachable")), {
      kind: "ConnectionError",
      message: "Graph store unreachable",
      retryable: false,
    });
  });

  it("reports anything else as a non-retryable unexpected error", () => {
    const failure = toStepFailure("boom");

    assert.deepEqual(failure, { kind: "UnexpectedError", message: "boom", retryable: false });
    assert.equal(stepFailureSchema.safeParse(failure).success, true);
  });

  it("shortens long messages", () => {
    const failure = toStepFailure(new Error("x".repeat(500)));

    assert.equal(failure.message.length, 400);
    assert.equal(failure.message.endsWith("…"), true);
  });
});
