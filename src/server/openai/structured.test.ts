import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { OracleOutputError } from "@/server/errors";
import {
  cleanMarkdownResponse,
  completeStructured,
  parsePossibleJson,
  parseStructured,
} from "@/server/openai/structured";
import { ScriptedOracle } from "@/test-support/scripted-oracle";

const labelSchema = z.object({ mode: z.enum(["conversational", "research"]) });

describe("structured model output", () => {
  it("strips markdown fences", () => {
    assert.equal(cleanMarkdownResponse('```json\n{"mode":"research"}\n```'), '{"mode":"research"}');
  });

  it("parses JSON wrapped in prose", () => {
    assert.deepEqual(parsePossibleJson('Sure! Here it is: {"mode": "research"} hope it helps'), {
      mode: "research",
    });
    assert.deepEqual(parsePossibleJson("The list: [1, 2]"), [1, 2]);
  });

  it("rejects prose with no JSON", () => {
    assert.throws(() => parsePossibleJson("research, probably"), OracleOutputError);
    assert.throws(() => parsePossibleJson("   "), OracleOutputError);
  });

  it("names the failing path when validation fails", () => {
    assert.throws(
      () => parseStructured('{"mode":"chat"}', labelSchema, "mode_label"),
      (error: unknown) =>
        error instanceof OracleOutputError &&
        error.message.startsWith("Model output for mode_label failed validation at mode"),
    );
  });

  it("sends the schema hint and validates the reply", async () => {
    const oracle = new ScriptedOracle().enqueue("classify", '{"mode":"conversational"}');
    const result = await completeStructured(
      oracle,
      {
        operation: "classify",
        system: "label",
        prompt: "hello",
        schema: { name: "mode_label", schema: { type: "object" } },
      },
      labelSchema,
    );

    assert.deepEqual(result, { mode: "conversational" });
    assert.equal(oracle.calls[0]?.schema?.name, "mode_label");
  });
});
