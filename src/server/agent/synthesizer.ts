import { z } from "zod";
import { hypothesisSchema, type Hypothesis, type Plan, type PlanStep, type StepResult } from "@/lib/contracts";
import { compactText } from "@/lib/graph";
import type { Oracle } from "@/server/openai/oracle";
import { completeStructured } from "@/server/openai/structured";
import { toErrorMessage, warnEvent, warnTurnLog, type TurnLogContext } from "@/server/telemetry";

const hypothesisJsonSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    hypothesis: { type: "string" },
    followUps: { type: "array", items: { type: "string" } },
  },
  required: ["hypothesis", "followUps"],
} as const;

const hypothesisOutputSchema = z.object({
  hypothesis: z.string().trim().min(1),
  followUps: z.array(z.string()),
});

const MAX_FOLLOW_UPS = 3;
const SUMMARY_ROWS = 5;

function stepFor(plan: Plan, result: StepResult): PlanStep | undefined {
  return plan.steps[result.step - 1];
}

function columnsOf(result: StepResult & { status: "success" }): string[] {
  const payload = result.payload;
  if (payload.kind === "tabular_query") return payload.columns;
  if (payload.kind === "graph_query") return Object.keys(payload.rows[0] ?? {});
  return Object.keys(payload.result);
}

/** One line per successful step: tool, row count and the fields the data carried. */
export function dataUsedLines(results: readonly StepResult[]): string[] {
  const lines: string[] = [];
  for (const result of results) {
    if (result.status !== "success") continue;
    const payload = result.payload;
    const columns = columnsOf(result);
    const fields = columns.length > 0 ? `; fields ${columns.join(", ")}` : "";
    if (payload.kind === "graph_analysis") {
      lines.push(`Step ${result.step} (${result.tool}): ${payload.analysis} analysis${fields}`);
      continue;
    }
    const size = `${payload.rowCount} row${payload.rowCount === 1 ? "" : "s"}${payload.truncated ? " (truncated)" : ""}`;
    lines.push(`Step ${result.step} (${result.tool}): ${size}${fields}`);
  }
  return lines;
}

/** One line per failed step, naming what could not be completed and why. */
export function unresolvedLines(plan: Plan, results: readonly StepResult[]): string[] {
  const lines: string[] = [];
  for (const result of results) {
    if (result.status !== "failure") continue;
    const step = stepFor(plan, result);
    const task = step ? `"${compactText(step.subQuery, 140)}"` : "this step";
    lines.push(
      `Step ${result.step} (${result.tool}) could not be completed: ${task} failed with ${result.error.kind}: ${result.error.message}`,
    );
  }
  return lines;
}

/** Compact, prompt-sized view of one step result. */
export function summarizeResult(plan: Plan, result: StepResult): string {
  const step = stepFor(plan, result);
  const header = `Step ${result.step} [${result.tool}] ${step ? compactText(step.subQuery, 200) : ""}`.trim();
  if (result.status === "failure") {
    return `${header}\nFAILED (${result.error.kind}): ${result.error.message}`;
  }
  const payload = result.payload;
  switch (payload.kind) {
    case "tabular_query": {
      const legend = Object.entries(payload.evidenceLegend)
        .map(([code, description]) => `${code} = ${description}`)
        .join("; ");
      return [
        header,
        `SQL: ${payload.query}`,
        `${payload.rowCount} rows; columns ${payload.columns.join(", ")}`,
        `First rows: ${compactText(JSON.stringify(payload.rows.slice(0, SUMMARY_ROWS)), 1_500)}`,
        legend ? `Evidence codes: ${legend}` : "",
      ]
        .filter(Boolean)
        .join("\n");
    }
    case "graph_query":
      return [
        header,
        `Cypher: ${payload.statement}`,
        `${payload.rowCount} rows; ${payload.fragment.nodes.length} nodes, ${payload.fragment.edges.length} edges`,
        `First rows: ${compactText(JSON.stringify(payload.rows.slice(0, SUMMARY_ROWS)), 1_500)}`,
      ].join("\n");
    case "graph_analysis":
      return [
        header,
        `Analysis: ${payload.analysis} ${JSON.stringify(payload.parameters)}`,
        `Result: ${compactText(JSON.stringify(payload.result), 1_500)}`,
      ].join("\n");
  }
}

function composeText(narrative: string, used: string[], unresolved: string[]): string {
  const sections = [narrative.trim(), `Data used:\n${used.length > 0 ? used.map((line) => `- ${line}`).join("\n") : "- none"}`];
  if (unresolved.length > 0) {
    sections.push(`Could not be determined:\n${unresolved.map((line) => `- ${line}`).join("\n")}`);
  }
  return sections.join("\n\n");
}

function fallbackNarrative(question: string, plan: Plan, results: readonly StepResult[]): string {
  const succeeded = results.filter((result) => result.status === "success");
  if (succeeded.length === 0) {
    return `None of the research steps for "${compactText(question, 160)}" returned data, so no hypothesis can be drawn yet.`;
  }
  return [
    `Results gathered for "${compactText(question, 160)}" (automatic summary; the narrative could not be generated):`,
    ...succeeded.map((result) => summarizeResult(plan, result)),
  ].join("\n\n");
}

type SynthesizeOptions = {
  log?: TurnLogContext;
};

export class HypothesisSynthesizer {
  private readonly oracle: Oracle;

  constructor(options: { oracle: Oracle }) {
    this.oracle = options.oracle;
  }

  /**
   * Always yields a hypothesis: the narrative comes from the model when it can,
   * and the data-used and unresolved sections are appended deterministically.
   */
  async synthesize(
    question: string,
    plan: Plan,
    results: readonly StepResult[],
    options: SynthesizeOptions = {},
  ): Promise<Hypothesis> {
    const used = dataUsedLines(results);
    const unresolved = unresolvedLines(plan, results);

    let narrative: string;
    let followUps: string[] = [];
    try {
      const output = await completeStructured(
        this.oracle,
        {
          operation: "synthesize",
          system:
            "You are a biomedical research assistant. Write a concise hypothesis that answers the question from the step results, citing the genes, GO terms, evidence codes or pathways they contain. Say plainly which parts could not be determined because a step failed. Suggest up to three follow-up questions. Respond only with JSON {hypothesis, followUps}.",
          prompt: [
            `Question: ${question}`,
            `Objective: ${plan.objective}`,
            `Step results:\n\n${results.map((result) => summarizeResult(plan, result)).join("\n\n")}`,
          ].join("\n\n"),
          schema: { name: "hypothesis", schema: hypothesisJsonSchema },
        },
        hypothesisOutputSchema,
      );
      narrative = output.hypothesis;
      followUps = output.followUps
        .map((followUp) => followUp.trim())
        .filter(Boolean)
        .slice(0, MAX_FOLLOW_UPS);
    } catch (error) {
      const fields = { message: toErrorMessage(error) };
      if (options.log) warnTurnLog(options.log, "synthesizer.fallback", fields);
      else warnEvent("synthesizer.fallback", fields);
      narrative = fallbackNarrative(question, plan, results);
    }

    return hypothesisSchema.parse({
      text: composeText(narrative, used, unresolved),
      followUps,
      unresolved,
    });
  }
}
