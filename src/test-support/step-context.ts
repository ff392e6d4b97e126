import type { PlanStep, StepResult } from "@/lib/contracts";
import type { StepContext } from "@/server/tools/adapters";

export function planStep(overrides: Partial<PlanStep> = {}): PlanStep {
  return {
    index: 1,
    tool: "kegg_query",
    subQuery: "Find the relations of INSR",
    goal: "flexible",
    dependsOn: [],
    ...overrides,
  };
}

export function stepContext(
  step: Partial<PlanStep> = {},
  dependencyResults: StepResult[] = [],
): StepContext {
  return {
    question: "How does INSR signal?",
    objective: "Understand INSR signalling",
    step: planStep(step),
    priorResults: dependencyResults,
    dependencyResults,
  };
}
