import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import { fileURLToPath } from "node:url";
import type { AnnotationDataset } from "@/server/annotations/dataset";
import { SqliteAnnotationDataset } from "@/server/annotations/dataset";
import { DatasetUnavailableError, OracleUnavailableError, QueryTimeoutError } from "@/server/errors";
import { createToolAdapters } from "@/server/tools/adapters";
import { AnnotationQueryTool } from "@/server/tools/annotation-query";
import { GraphAnalysisTool } from "@/server/tools/graph-analysis";
import { GraphQueryTool } from "@/server/tools/graph-query";
import { createCapabilityRegistry } from "@/server/tools/registry";
import { Executor } from "@/server/agent/executor";
import { ModeClassifier } from "@/server/agent/mode-classifier";
import {
  ConversationOrchestrator,
  cancelledReply,
  degradedNotice,
  unavailableReply,
} from "@/server/agent/orchestrator";
import { Planner } from "@/server/agent/planner";
import { Session } from "@/server/agent/session";
import { HypothesisSynthesizer } from "@/server/agent/synthesizer";
import { FakeGraphStore } from "@/test-support/fake-graph-store";
import { ScriptedOracle, json } from "@/test-support/scripted-oracle";

const fixturePath = fileURLToPath(new URL("../annotations/fixtures/sample.gaf", import.meta.url));

type Harness = {
  oracle: ScriptedOracle;
  store?: FakeGraphStore;
  dataset?: () => Promise<AnnotationDataset>;
  degradedFailureThreshold?: number;
};

function buildOrchestrator({ oracle, store = new FakeGraphStore(), dataset, degradedFailureThreshold = 3 }: Harness) {
  const registry = createCapabilityRegistry();
  const adapters = createToolAdapters({
    graphQuery: new GraphQueryTool({ oracle, store, maxAttempts: 2, reviewResults: false }),
    tabularQuery: new AnnotationQueryTool({
      oracle,
      dataset:
        dataset ??
        (async () => {
          throw new DatasetUnavailableError("GAF file is not readable: missing.gaf");
        }),
      reviewResults: false,
      maxRows: 50,
    }),
    graphAnalysis: new GraphAnalysisTool({ oracle, maxAttempts: 2 }),
  });
  return new ConversationOrchestrator({
    oracle,
    registry,
    classifier: new ModeClassifier({ oracle }),
    planner: new Planner({ oracle, review: false, maxSteps: 6 }),
    executor: new Executor(registry, adapters),
    synthesizer: new HypothesisSynthesizer({ oracle }),
    session: new Session({ id: "test-session", maxTurns: 20 }),
    degradedFailureThreshold,
  });
}

function planJson(...steps: { tool: string; subQuery: string; dependsOn?: number[] }[]) {
  return json({
    objective: "Answer the question",
    steps: steps.map((step) => ({ goal: "flexible", dependsOn: [], ...step })),
  });
}

const brca1Sql =
  "SELECT DB_Object_Symbol, GO_ID, Evidence FROM gaf WHERE DB_Object_Symbol = 'BRCA1' ORDER BY GO_ID";

describe("ConversationOrchestrator", () => {
  let dataset: SqliteAnnotationDataset;

  before(async () => {
    dataset = await SqliteAnnotationDataset.fromGafFile(fixturePath);
  });

  after(() => {
    dataset.close();
  });

  it("answers small talk without planning", async () => {
    const oracle = new ScriptedOracle()
      .enqueue("classify", json({ mode: "conversational" }))
      .enqueue("converse", "  Hello! Ask me about genes or pathways.  ");
    const orchestrator = buildOrchestrator({ oracle });

    const reply = await orchestrator.handle("Hi there");

    assert.deepEqual(reply, {
      mode: "conversational",
      text: "Hello! Ask me about genes or pathways.",
      followUps: [],
      plan: undefined,
      results: undefined,
      degraded: false,
    });
    assert.equal(oracle.callsFor("plan").length, 0);
    assert.equal(orchestrator.state, "idle");
    assert.deepEqual(
      orchestrator.session.turns.map((turn) => [turn.speaker, turn.mode]),
      [
        ["user", "conversational"],
        ["system", "conversational"],
      ],
    );
  });

  it("researches GO annotations end to end", async () => {
    const oracle = new ScriptedOracle()
      .enqueue("classify", json({ mode: "research" }))
      .enqueue("plan", planJson({ tool: "gaf_query", subQuery: "GO terms annotated to BRCA1 with evidence" }))
      .enqueue("generate_query", json({ query: brca1Sql, explanation: "BRCA1 annotations" }))
      .enqueue(
        "synthesize",
        json({
          hypothesis: "BRCA1 takes part in DNA repair (GO:0006281, IDA) in the nucleus.",
          followUps: ["Which pathways include BRCA1?"],
        }),
      );
    const orchestrator = buildOrchestrator({ oracle, dataset: async () => dataset });

    const reply = await orchestrator.handle("Which GO terms does BRCA1 have?");

    assert.equal(reply.mode, "research");
    assert.equal(
      reply.text,
      "BRCA1 takes part in DNA repair (GO:0006281, IDA) in the nucleus.\n\nData used:\n- Step 1 (gaf_query): 3 rows; fields DB_Object_Symbol, GO_ID, Evidence",
    );
    assert.deepEqual(reply.followUps, ["Which pathways include BRCA1?"]);
    assert.equal(reply.plan?.steps[0]?.tool, "gaf_query");
    const [result] = reply.results ?? [];
    assert.equal(result?.status, "success");
    if (result?.status === "success" && result.payload.kind === "tabular_query") {
      assert.deepEqual(result.payload.evidenceLegend, {
        IEA: "Inferred from Electronic Annotation",
        IDA: "Inferred from Direct Assay",
      });
    } else {
      assert.fail("expected a tabular result");
    }
    const systemTurn = orchestrator.session.turns[1];
    assert.equal(systemTurn?.hypothesis?.followUps.length, 1);
    assert.equal(orchestrator.session.mode, "research");
  });

  it("apologizes for a plan that names an unknown tool", async () => {
    const store = new FakeGraphStore();
    const oracle = new ScriptedOracle()
      .enqueue("classify", json({ mode: "research" }))
      .enqueue("plan", planJson({ tool: "kegg_lookup_v2", subQuery: "Genes in the insulin pathway" }));
    const orchestrator = buildOrchestrator({ oracle, store });

    const reply = await orchestrator.handle("Which genes are in the insulin pathway?");

    assert.equal(reply.mode, "conversational");
    assert.equal(
      reply.text,
      'I\'m sorry, I couldn\'t put together a research plan for that (Step 1 names unknown tool "kegg_lookup_v2"). Could you rephrase the question, or name the genes or pathways you are interested in?',
    );
    assert.equal(oracle.callsFor("generate_query").length, 0);
    assert.deepEqual(store.statements, []);
  });

  it("reports a timed-out graph query and the analysis that depended on it", async () => {
    const store = new FakeGraphStore().always(new QueryTimeoutError("Graph query timed out after 20000 ms"));
    const oracle = new ScriptedOracle()
      .enqueue("classify", json({ mode: "research" }))
      .enqueue(
        "plan",
        planJson(
          { tool: "kegg_query", subQuery: "Insulin pathway relations around INSR" },
          { tool: "graph_analysis", subQuery: "Impact of INSR on the insulin pathway", dependsOn: [1] },
        ),
      )
      .always(
        "generate_query",
        json({ query: "MATCH (g:Gene)-[r]->(t:Gene) RETURN g.name AS source, type(r) AS relation, t.name AS target", explanation: "" }),
      )
      .enqueue("synthesize", json({ hypothesis: "The impact of INSR could not be assessed.", followUps: [] }));
    const orchestrator = buildOrchestrator({ oracle, store });

    const reply = await orchestrator.handle("What is the impact of INSR on insulin signalling?");

    assert.equal(reply.mode, "research");
    assert.equal(store.statements.length, 2);
    assert.deepEqual(
      reply.results?.map((result) =>
        result.status === "failure" ? [result.error.kind, result.attempts] : ["success", result.attempts],
      ),
      [
        ["QueryTimeoutError", 2],
        ["AnalysisParameterError", 0],
      ],
    );
    assert.equal(
      reply.text,
      [
        "The impact of INSR could not be assessed.",
        "Data used:\n- none",
        [
          "Could not be determined:",
          '- Step 1 (kegg_query) could not be completed: "Insulin pathway relations around INSR" failed with QueryTimeoutError: Graph query timed out after 20000 ms',
          '- Step 2 (graph_analysis) could not be completed: "Impact of INSR on the insulin pathway" failed with AnalysisParameterError: Step 2 needs graph data from step(s) 1, which did not succeed',
        ].join("\n"),
      ].join("\n\n"),
    );
    assert.equal(reply.degraded, false);
  });

  it("flags the session as degraded after repeated backend failures", async () => {
    const oracle = new ScriptedOracle()
      .always("classify", json({ mode: "research" }))
      .always("plan", planJson({ tool: "gaf_query", subQuery: "GO terms of TP53" }))
      .always("synthesize", json({ hypothesis: "The annotation data is not available.", followUps: [] }));
    const orchestrator = buildOrchestrator({ oracle, degradedFailureThreshold: 2 });

    const first = await orchestrator.handle("GO terms of TP53?");
    const second = await orchestrator.handle("And of BRCA1?");

    assert.equal(first.degraded, false);
    assert.equal(second.degraded, true);
    assert.ok(second.text.endsWith(`\n\n${degradedNotice}`));
    assert.equal(orchestrator.session.fatalFailures, 2);
    assert.equal(oracle.callsFor("generate_query").length, 0);
  });

  it("serializes concurrent turns", async () => {
    const seen: number[] = [];
    const oracle = new ScriptedOracle().always("classify", json({ mode: "conversational" }));
    const orchestrator = buildOrchestrator({ oracle });
    oracle.always("converse", () => {
      seen.push(orchestrator.session.turns.length);
      return "ok";
    });

    await Promise.all([orchestrator.handle("first"), orchestrator.handle("second")]);

    assert.deepEqual(seen, [1, 3]);
    assert.deepEqual(
      orchestrator.session.turns.map((turn) => turn.text),
      ["first", "ok", "second", "ok"],
    );
  });

  it("returns a cancellation notice when the turn is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const oracle = new ScriptedOracle()
      .enqueue("classify", json({ mode: "research" }))
      .enqueue("plan", planJson({ tool: "gaf_query", subQuery: "GO terms of INSR" }));
    const orchestrator = buildOrchestrator({ oracle, dataset: async () => dataset });

    const reply = await orchestrator.handle("GO terms of INSR?", { signal: controller.signal });

    assert.equal(reply.mode, "research");
    assert.equal(reply.text, cancelledReply);
    assert.equal(reply.plan?.steps.length, 1);
    assert.equal(oracle.callsFor("generate_query").length, 0);
  });

  it("lets the planner call finish and then stops when aborted during planning", async () => {
    const controller = new AbortController();
    const oracle = new ScriptedOracle()
      .enqueue("classify", json({ mode: "research" }))
      .enqueue("plan", () => {
        controller.abort();
        return planJson({ tool: "gaf_query", subQuery: "GO terms of INSR" });
      });
    const orchestrator = buildOrchestrator({ oracle, dataset: async () => dataset });

    const reply = await orchestrator.handle("GO terms of INSR?", { signal: controller.signal });

    assert.equal(reply.mode, "research");
    assert.equal(reply.text, cancelledReply);
    assert.equal(reply.plan?.steps[0]?.subQuery, "GO terms of INSR");
    assert.equal(oracle.callsFor("generate_query").length, 0);
    assert.equal(orchestrator.state, "idle");
  });

  it("skips synthesis when aborted while a step runs", async () => {
    const controller = new AbortController();
    const oracle = new ScriptedOracle()
      .enqueue("classify", json({ mode: "research" }))
      .enqueue("plan", planJson({ tool: "gaf_query", subQuery: "GO terms annotated to BRCA1" }))
      .enqueue("generate_query", () => {
        controller.abort();
        return json({ query: brca1Sql, explanation: "BRCA1 annotations" });
      });
    const orchestrator = buildOrchestrator({ oracle, dataset: async () => dataset });

    const reply = await orchestrator.handle("GO terms of BRCA1?", { signal: controller.signal });

    assert.equal(reply.text, cancelledReply);
    assert.equal(oracle.callsFor("generate_query").length, 1);
    assert.equal(oracle.callsFor("synthesize").length, 0);
  });

  it("keeps the stored turn apart from the returned reply", async () => {
    const oracle = new ScriptedOracle()
      .enqueue("classify", json({ mode: "research" }))
      .enqueue("plan", planJson({ tool: "gaf_query", subQuery: "GO terms annotated to BRCA1" }))
      .enqueue("generate_query", json({ query: brca1Sql, explanation: "BRCA1 annotations" }))
      .enqueue("synthesize", json({ hypothesis: "BRCA1 acts in DNA repair.", followUps: [] }));
    const orchestrator = buildOrchestrator({ oracle, dataset: async () => dataset });

    const reply = await orchestrator.handle("GO terms of BRCA1?");
    reply.plan?.steps.push({ index: 2, tool: "kegg_query", subQuery: "added later", goal: "flexible", dependsOn: [] });

    const stored = orchestrator.session.turns[1];
    assert.equal(reply.plan?.steps.length, 2);
    assert.equal(stored?.plan?.steps.length, 1);
    assert.equal(Object.isFrozen(stored?.plan?.steps), true);
    assert.notEqual(stored?.plan, reply.plan);
  });

  it("apologizes when the planner output is unusable", async () => {
    const oracle = new ScriptedOracle()
      .enqueue("classify", json({ mode: "research" }))
      .enqueue("plan", "Let me think about INSR first.");
    const orchestrator = buildOrchestrator({ oracle });

    const reply = await orchestrator.handle("How is INSR regulated?");

    assert.equal(reply.mode, "conversational");
    assert.match(reply.text, /^I'm sorry, I couldn't put together a research plan for that \(Planner output unusable \(OracleOutputError\)/);
  });

  it("replies with a notice when the model is unavailable", async () => {
    const oracle = new ScriptedOracle()
      .enqueue("classify", new OracleUnavailableError("offline"))
      .enqueue("converse", new OracleUnavailableError("offline"));
    const orchestrator = buildOrchestrator({ oracle });

    const reply = await orchestrator.handle("Hello?");

    assert.equal(reply.mode, "conversational");
    assert.equal(reply.text, unavailableReply);
  });

  it("starts over after a reset", async () => {
    const oracle = new ScriptedOracle()
      .always("classify", json({ mode: "conversational" }))
      .always("converse", "Hi!");
    const orchestrator = buildOrchestrator({ oracle });
    await orchestrator.handle("Hello");
    orchestrator.session.fatalFailures = 5;

    orchestrator.reset();

    assert.equal(orchestrator.session.turns.length, 0);
    assert.equal(orchestrator.degraded, false);
    assert.equal(orchestrator.state, "idle");
  });
});
