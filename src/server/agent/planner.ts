import { z } from "zod";
import {
  planSchema,
  type CapabilityDescriptor,
  type CapabilityKind,
  type Plan,
  type PlanStep,
} from "@/lib/contracts";
import { appConfig } from "@/server/config";
import { AgentError, PlanGenerationError, UnknownToolError } from "@/server/errors";
import type { Oracle } from "@/server/openai/oracle";
import { completeStructured, reviewJsonSchema, reviewOutputSchema } from "@/server/openai/structured";
import { stepTurnLog, toErrorMessage, warnEvent, warnTurnLog, type TurnLogContext } from "@/server/telemetry";
import { defaultTieBreak, rankCapabilities } from "@/server/tools/registry";

const planJsonSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    objective: { type: "string" },
    steps: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        properties: {
          tool: { type: "string" },
          subQuery: { type: "string" },
          goal: { type: "string" },
          dependsOn: { type: "array", items: { type: "integer" } },
        },
        required: ["tool", "subQuery", "goal", "dependsOn"],
      },
    },
  },
  required: ["objective", "steps"],
} as const;

const planOutputSchema = z.object({
  objective: z.string(),
  steps: z.array(
    z.object({
      tool: z.string(),
      subQuery: z.string(),
      goal: z.string(),
      dependsOn: z.array(z.number().int()),
    }),
  ),
});

type PlanOutput = z.infer<typeof planOutputSchema>;

type PlannerOptions = {
  oracle: Oracle;
  maxSteps?: number;
  review?: boolean;
  maxAttempts?: number;
  tieBreak?: readonly CapabilityKind[];
};

type PlanCallOptions = {
  log?: TurnLogContext;
};

const kindLabels: Record<CapabilityKind, string> = {
  graph_analysis: "graph analysis",
  graph_query: "graph query",
  tabular_query: "tabular query",
};

/**
 * Turns raw planner output into a Plan, or throws. Nothing is repaired: an
 * empty or oversized plan, an unknown tool, an empty sub-query or a forward
 * dependency rejects the whole plan.
 */
export function validatePlan(
  question: string,
  output: PlanOutput,
  capabilities: readonly CapabilityDescriptor[],
  maxSteps: number,
): Plan {
  if (output.steps.length === 0) {
    throw new PlanGenerationError("The plan has no steps");
  }
  if (output.steps.length > maxSteps) {
    throw new PlanGenerationError(`The plan has ${output.steps.length} steps; at most ${maxSteps} are allowed`);
  }

  const known = new Set(capabilities.map((capability) => capability.name));
  const steps: PlanStep[] = output.steps.map((raw, position) => {
    const index = position + 1;
    const tool = raw.tool.trim();
    if (!tool) throw new PlanGenerationError(`Step ${index} names no tool`);
    if (!known.has(tool)) throw new UnknownToolError(tool, index);
    const subQuery = raw.subQuery.trim();
    if (!subQuery) throw new PlanGenerationError(`Step ${index} has an empty sub-query`);
    for (const dependency of raw.dependsOn) {
      if (dependency < 1 || dependency >= index) {
        throw new PlanGenerationError(`Step ${index} depends on step ${dependency}, which does not precede it`);
      }
    }
    return {
      index,
      tool,
      subQuery,
      goal: raw.goal.trim() || "flexible",
      dependsOn: [...new Set(raw.dependsOn)].sort((a, b) => a - b),
    };
  });

  return planSchema.parse({ question, objective: output.objective.trim() || question, steps });
}

export class Planner {
  private readonly oracle: Oracle;
  private readonly maxSteps: number;
  private readonly review: boolean;
  private readonly maxAttempts: number;
  private readonly tieBreak: readonly CapabilityKind[];

  constructor(options: PlannerOptions) {
    this.oracle = options.oracle;
    this.maxSteps = options.maxSteps ?? appConfig.planner.maxSteps;
    this.review = options.review ?? appConfig.planner.review;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? appConfig.planner.maxAttempts);
    this.tieBreak = options.tieBreak ?? defaultTieBreak;
  }

  async plan(
    question: string,
    capabilities: readonly CapabilityDescriptor[],
    conversationContext: string,
    options: PlanCallOptions = {},
  ): Promise<Plan> {
    let reflection: string | null = null;
    let lastPlan: Plan | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      let plan: Plan;
      try {
        plan = await this.generate(question, capabilities, conversationContext, reflection, options);
      } catch (error) {
        // a failed regeneration keeps the last well-formed plan
        if (!lastPlan) throw error;
        if (options.log) {
          warnTurnLog(options.log, "planner.regeneration_failed", { message: toErrorMessage(error) });
        }
        return lastPlan;
      }
      lastPlan = plan;
      if (options.log) {
        stepTurnLog(options.log, "planner.plan", {
          attempt,
          steps: plan.steps.map((step) => step.tool),
        });
      }
      if (!this.review) return plan;

      const verdict = await this.reviewPlan(plan, options);
      if (verdict.accepted) return plan;
      reflection = verdict.reflection;
      if (options.log) {
        warnTurnLog(options.log, "planner.plan_rejected", { attempt, reflection });
      }
    }

    if (!lastPlan) throw new PlanGenerationError("No plan was produced");
    return lastPlan;
  }

  private async generate(
    question: string,
    capabilities: readonly CapabilityDescriptor[],
    conversationContext: string,
    reflection: string | null,
    options: PlanCallOptions,
  ): Promise<Plan> {
    const ranked = rankCapabilities(capabilities, this.tieBreak);
    const order = this.tieBreak.map((kind) => kindLabels[kind]).join(" > ");
    const prompt = [
      conversationContext ? `Conversation so far:\n${conversationContext}` : "",
      `Available tools (most specific first):\n${ranked
        .map((capability) => `- ${capability.name} [${capability.kind}]: ${capability.description}`)
        .join("\n")}`,
      [
        "Rules:",
        `- use between 1 and ${this.maxSteps} steps, each naming exactly one tool from the list`,
        `- when several tools could answer a step, prefer the most specific one: ${order}`,
        "- dependsOn lists the earlier step numbers (1-based) whose output the step needs; use [] otherwise",
        "- goal describes the expected output shape, or \"flexible\"",
        "- objective is a one-sentence research objective distilled from the conversation",
      ].join("\n"),
      reflection ? `A reviewer rejected the previous plan: ${reflection}` : "",
      `Question: ${question}`,
    ];

    let output: PlanOutput;
    try {
      output = await completeStructured(
        this.oracle,
        {
          operation: "plan",
          system:
            "You plan biomedical research by splitting a question into steps answered by the listed tools. Respond only with JSON.",
          prompt: prompt.filter(Boolean).join("\n\n"),
          schema: { name: "research_plan", schema: planJsonSchema },
        },
        planOutputSchema,
      );
    } catch (error) {
      if (error instanceof AgentError) {
        throw new PlanGenerationError(`Planner output unusable (${error.kind}): ${error.message}`);
      }
      throw new PlanGenerationError(`Planner failed: ${toErrorMessage(error)}`);
    }

    return validatePlan(question, output, capabilities, this.maxSteps);
  }

  private async reviewPlan(plan: Plan, options: PlanCallOptions): Promise<{ accepted: boolean; reflection: string }> {
    try {
      const verdict = await completeStructured(
        this.oracle,
        {
          operation: "plan_review",
          system:
            "You review research plans. Accept a plan whose steps, taken together, can answer the question with the named tools; otherwise explain what to change. Respond with JSON {acceptance, reflection}.",
          prompt: `Question: ${plan.question}\n\nPlan:\n${JSON.stringify(
            { objective: plan.objective, steps: plan.steps },
            null,
            2,
          )}`,
          schema: { name: "plan_review", schema: reviewJsonSchema },
        },
        reviewOutputSchema,
      );
      return { accepted: verdict.acceptance, reflection: verdict.reflection };
    } catch (error) {
      const fields = { message: toErrorMessage(error) };
      if (options.log) warnTurnLog(options.log, "planner.review_skipped", fields);
      else warnEvent("planner.review_skipped", fields);
      return { accepted: true, reflection: "" };
    }
  }
}
