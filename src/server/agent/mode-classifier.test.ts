import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { OracleUnavailableError } from "@/server/errors";
import { ModeClassifier } from "@/server/agent/mode-classifier";
import { Session } from "@/server/agent/session";
import { ScriptedOracle, json } from "@/test-support/scripted-oracle";

describe("ModeClassifier", () => {
  it("returns the model's label", async () => {
    const oracle = new ScriptedOracle().enqueue("classify", json({ mode: "research" }));
    const classifier = new ModeClassifier({ oracle });

    assert.equal(await classifier.classify(new Session(), "Which GO terms does BRCA1 have?"), "research");
  });

  it("includes recent turns in the prompt", async () => {
    const oracle = new ScriptedOracle().enqueue("classify", json({ mode: "research" }));
    const session = new Session();
    session.append({ speaker: "user", text: "Tell me about INSR", mode: "research" });
    const classifier = new ModeClassifier({ oracle, historyTurns: 4 });

    await classifier.classify(session, "and its pathways?");

    assert.equal(
      oracle.callsFor("classify")[0]?.prompt,
      "Conversation so far:\nUser: Tell me about INSR\n\nLatest message: and its pathways?",
    );
  });

  it("falls back to conversational on an unknown label", async () => {
    const oracle = new ScriptedOracle().enqueue("classify", json({ mode: "chitchat" }));
    const classifier = new ModeClassifier({ oracle });

    assert.equal(await classifier.classify(new Session(), "hmm"), "conversational");
  });

  it("falls back to conversational when the model is unavailable", async () => {
    const oracle = new ScriptedOracle().enqueue("classify", new OracleUnavailableError("offline"));
    const classifier = new ModeClassifier({ oracle });

    assert.equal(await classifier.classify(new Session(), "What regulates TP53?"), "conversational");
  });

  it("does not ask the model about an empty message", async () => {
    const oracle = new ScriptedOracle();
    const classifier = new ModeClassifier({ oracle });

    assert.equal(await classifier.classify(new Session(), "   "), "conversational");
    assert.equal(oracle.calls.length, 0);
  });
});
